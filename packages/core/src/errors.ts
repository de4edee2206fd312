// packages/core/src/errors.ts

export type ErrorCode =
  | 'UNRESOLVED_CONTEXT'
  | 'UNDEFINED_VARIABLE'
  | 'UNSUPPORTED_FUNCTION'
  | 'UNSUPPORTED_SYNTAX'
  | 'TYPE_MAPPING';

export class TranslationError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class UnresolvedContextError extends TranslationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UNRESOLVED_CONTEXT', message, details);
  }
}

export class UndefinedVariableError extends TranslationError {
  readonly variable: string;
  constructor(name: string) {
    super('UNDEFINED_VARIABLE', `Session variable '$${name}' does not exist`, { name });
    this.variable = name;
  }
}

export class UnsupportedFunctionError extends TranslationError {
  readonly functionName: string;
  readonly arity: number;
  constructor(name: string, arity: number, reason?: string) {
    super(
      'UNSUPPORTED_FUNCTION',
      `Unsupported function ${name} with ${arity} argument${arity === 1 ? '' : 's'}${reason ? `: ${reason}` : ''}`,
      { name, arity }
    );
    this.functionName = name;
    this.arity = arity;
  }
}

export class UnsupportedSyntaxError extends TranslationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('UNSUPPORTED_SYNTAX', message, details);
  }
}

export class TypeMappingError extends TranslationError {
  constructor(typeName: string, direction: 'forward' | 'backward') {
    super(
      'TYPE_MAPPING',
      direction === 'backward'
        ? `No source type is registered for native type ${typeName}`
        : `Unsupported data type ${typeName}`,
      { type: typeName, direction }
    );
  }
}

export const Errors = {
  NO_CONTEXT: (ref: string, missing: 'database' | 'schema') =>
    new UnresolvedContextError(
      `Cannot resolve ${ref}: this session does not have a current ${missing}. Call 'USE ${missing.toUpperCase()}', or use a qualified name.`,
      { ref, missing }
    ),
  UNDEFINED_VARIABLE: (name: string) => new UndefinedVariableError(name),
  UNSUPPORTED_FUNCTION: (name: string, arity: number, reason?: string) =>
    new UnsupportedFunctionError(name, arity, reason),
  SYNTAX: (message: string, offset?: number) =>
    new UnsupportedSyntaxError(message, offset === undefined ? undefined : { offset }),
  TYPE_FORWARD: (name: string) => new TypeMappingError(name, 'forward'),
  TYPE_BACKWARD: (name: string) => new TypeMappingError(name, 'backward')
};

export const isTranslationError = (e: unknown): e is TranslationError => e instanceof TranslationError;
