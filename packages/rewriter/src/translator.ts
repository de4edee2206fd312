// packages/rewriter/src/translator.ts
import {
  DEFAULT_EXTENSIONS,
  DEFAULT_TARGET,
  Errors,
  UnsupportedFunctionError,
  UnsupportedSyntaxError,
  createLogger,
  type ExtensionNames,
  type FrostConfig,
  type Logger,
  type MetadataEffect,
  type QualifiedName,
  type RewriteResult,
  type RewriteTrace,
  type StatementKind,
  type TargetCapabilities
} from '@frostbridge/core';
import { defaultCatalog, type FunctionCatalog, type SessionValues } from '@frostbridge/catalog';
import { Emitter, checkSource, parseScript, tokenize, type ParsedStatement, type Statement } from '@frostbridge/sql';
import type { SessionContext } from '@frostbridge/session';
import { LruCache } from './cache';
import { metadataEffects } from './effects';
import { normalize } from './normalize';
import { resolveStatement } from './resolve';
import { CallRewriter } from './rewrite';
import { hasVariables, substituteVariables } from './variables';

export interface TranslatorOptions {
  target?: TargetCapabilities;
  /** LRU capacity; 0 disables caching */
  cacheSize?: number;
  catalog?: FunctionCatalog;
  /** where SHOW and INFORMATION_SCHEMA views find the account catalog */
  extensions?: ExtensionNames;
  logger?: Logger;
}

export interface Translation extends RewriteResult {
  /** the statement as written */
  readonly text: string;
  readonly trace: RewriteTrace;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
}

function statementKind(s: Statement): StatementKind {
  switch (s.kind) {
    case 'query':
    case 'show':
      return 'query';
    case 'insert':
    case 'copy':
    case 'update':
    case 'delete':
      return 'dml';
    case 'merge':
      return 'merge';
    case 'create_table':
    case 'create_view':
    case 'create_namespace':
    case 'drop':
    case 'alter_table':
      return 'ddl';
    case 'use':
    case 'set':
    case 'unset':
    case 'alter_session':
      return 'session';
    case 'describe':
      return 'describe';
    case 'attach':
    case 'detach':
      return 'passthrough';
  }
}

function sessionValues(session: SessionContext): SessionValues {
  const values: SessionValues = {};
  if (session.database !== undefined) values.database = session.database;
  if (session.schema !== undefined) values.schema = session.schema;
  if (session.role !== undefined) values.role = session.role;
  if (session.warehouse !== undefined) values.warehouse = session.warehouse;
  return values;
}

const elapsed = (since: number): number => performance.now() - since;

const freezeEffect = (e: MetadataEffect): MetadataEffect => {
  Object.freeze(e.table);
  if (e.kind === 'columns') {
    e.columns.forEach((c) => Object.freeze(c));
    Object.freeze(e.columns);
  }
  return Object.freeze(e);
};

/** Cached entries are shared between callers, so nothing in them may be mutable. */
const frozenEntry = (t: Translation): Translation =>
  Object.freeze({ ...t, metadataEffects: Object.freeze(t.metadataEffects.map(freezeEffect)) });

/**
 * Syntax errors from tokenizing or parsing carry `details.source`: whether
 * Snowflake's own grammar accepts the text, so callers can tell a construct the
 * translator does not cover from malformed input.
 */
function frontEnd<T>(sql: string, step: () => T): T {
  try {
    return step();
  } catch (err: unknown) {
    if (!(err instanceof UnsupportedSyntaxError)) throw err;
    throw new UnsupportedSyntaxError(err.message, { ...err.details, source: checkSource(sql) });
  }
}

/**
 * Translates Snowflake statements to DuckDB under a caller-owned session.
 * `translate` never mutates the session; `translateScript` applies each
 * statement's delta before translating the next.
 */
export class Translator {
  readonly target: TargetCapabilities;
  readonly extensions: ExtensionNames;
  private readonly catalog: FunctionCatalog;
  private readonly cache: LruCache<Translation>;
  private readonly log: Logger;

  constructor(opts: TranslatorOptions = {}) {
    this.target = opts.target ?? DEFAULT_TARGET;
    this.extensions = opts.extensions ?? DEFAULT_EXTENSIONS;
    this.catalog = opts.catalog ?? defaultCatalog();
    this.cache = new LruCache(opts.cacheSize ?? 1024);
    this.log = opts.logger ?? createLogger('rewriter');
  }

  static fromConfig(config: FrostConfig, logger?: Logger): Translator {
    return new Translator({
      target: config.target,
      cacheSize: config.cacheSize,
      extensions: config.extensions,
      ...(logger ? { logger } : {})
    });
  }

  translate(sql: string, session: SessionContext): Translation {
    const started = performance.now();
    const raw = frontEnd(sql, () => tokenize(sql));
    const cacheable = !hasVariables(raw);
    const key = `${session.cacheKey()}\n${sql}`;

    if (cacheable) {
      const cached = this.cache.get(key);
      if (cached) {
        this.log.debug({ kind: cached.statementKind, ms: elapsed(started), cacheHit: true }, 'translated');
        // cacheable statements consume no variables; each caller gets its own empty set
        return { ...cached, consumedVariables: new Set<string>(), trace: { ...cached.trace, cacheHit: true } };
      }
    }

    const { tokens, consumed } = cacheable ? { tokens: raw, consumed: new Set<string>() } : substituteVariables(sql, session, raw);
    const parsed = frontEnd(sql, () => parseScript(sql, tokens));
    if (parsed.length !== 1) {
      throw Errors.SYNTAX(parsed.length === 0 ? 'Empty SQL statement' : `Expected a single statement but got ${parsed.length}`);
    }

    const result = this.run(parsed[0], session, consumed);
    if (cacheable) this.cache.set(key, frozenEntry(result));
    this.log.debug({ kind: result.statementKind, ms: elapsed(started), cacheHit: false }, 'translated');
    return result;
  }

  /** Splits on top-level `;` and applies each statement's delta before the next one. */
  translateScript(sql: string, session: SessionContext): Translation[] {
    const out: Translation[] = [];
    for (const { text } of frontEnd(sql, () => parseScript(sql))) {
      const t = this.translate(text, session);
      if (t.mutatedSession) session.applyDelta(t.mutatedSession);
      out.push(t);
    }
    return out;
  }

  cacheStats(): CacheStats {
    return { size: this.cache.size, hits: this.cache.hits, misses: this.cache.misses };
  }

  clearCache(): void {
    this.cache.clear();
  }

  private run({ statement, text }: ParsedStatement, session: SessionContext, consumed: Set<string>): Translation {
    try {
      let mark = performance.now();
      const delta = session.deltaFor(statement);
      const normalized = normalize(statement, { session, target: this.target, extensions: this.extensions });
      const normalizeMs = elapsed(mark);

      mark = performance.now();
      const locals = new Set<string>();
      const resolved = normalized.statements.map((s) => {
        const r = resolveStatement(s, { session, locals });
        if (s.kind === 'create_table' && s.temporary) locals.add(session.fold(s.name[s.name.length - 1]));
        return r;
      });
      const resolveMs = elapsed(mark);

      mark = performance.now();
      const rewriter = new CallRewriter(this.catalog, { session: sessionValues(session) });
      const rewritten = resolved.map((s) => rewriter.statement(s));
      const rewriteMs = elapsed(mark);

      mark = performance.now();
      const emitter = new Emitter({ casePolicy: session.casePolicy });
      const emittedSql = rewritten.map((s) => emitter.statement(s)).join(';\n');
      const emitMs = elapsed(mark);

      const flags = { ...normalized.flags, ...(consumed.size ? { substitutedVariables: consumed.size } : {}) };
      const describe: QualifiedName | undefined =
        statement.kind === 'describe' ? session.qualifiedName(statement.name) : undefined;

      return {
        emittedSql,
        text,
        consumedVariables: consumed,
        ...(delta.kind !== 'none' ? { mutatedSession: delta } : {}),
        statementKind: statementKind(statement),
        metadataEffects: metadataEffects(statement, session),
        ...(describe ? { describe } : {}),
        trace: {
          normalizeMs,
          resolveMs,
          rewriteMs,
          emitMs,
          functions: rewriter.hits,
          cacheHit: false,
          ...(Object.keys(flags).length ? { flags } : {})
        }
      };
    } catch (err) {
      if (err instanceof UnsupportedFunctionError) {
        this.log.warn({ name: err.functionName, arity: err.arity }, err.message);
      }
      throw err;
    }
  }
}
