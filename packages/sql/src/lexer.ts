// packages/sql/src/lexer.ts
import { Errors } from '@frostbridge/core';

export type TokenType =
  | 'word'
  | 'quoted'
  | 'string'
  | 'number'
  | 'variable'
  | 'param'
  | 'placeholder'
  | 'stage'
  | 'op'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

export interface TokenizeOptions {
  /** accept `@0`, `@1`, `@*` (macro templates only) */
  placeholders?: boolean;
}

const TWO_CHAR = new Set([':=', '::', '||', '<=', '>=', '<>', '!=', '=>', '->', '<<', '>>']);
const ONE_CHAR = new Set(['(', ')', ',', '.', ';', ':', '[', ']', '{', '}', '+', '-', '*', '/', '%', '=', '<', '>', '&', '|', '^', '~', '?']);

const ESCAPES: Record<string, string> = {
  n: '\n', t: '\t', r: '\r', b: '\b', f: '\f', '0': '\0', '\\': '\\', "'": "'", '"': '"'
};

const isDigit = (c: string | undefined): boolean => c !== undefined && c >= '0' && c <= '9';
const isStageStart = (c: string | undefined): boolean => c !== undefined && /[\p{L}_~%]/u.test(c);
const isStagePart = (c: string | undefined): boolean => c !== undefined && /[^\s;,()'"]/u.test(c);
const isIdentStart = (c: string | undefined): boolean => c !== undefined && /[\p{L}_]/u.test(c);
const isIdentPart = (c: string | undefined): boolean => c !== undefined && /[\p{L}\p{N}_$]/u.test(c);

export class Tokenizer {
  private pos = 0;
  private readonly out: Token[] = [];

  constructor(private readonly src: string, private readonly opts: TokenizeOptions = {}) {}

  run(): Token[] {
    const s = this.src;
    for (;;) {
      this.skipTrivia();
      if (this.pos >= s.length) break;
      const start = this.pos;
      const c = s[start];
      const next = s[start + 1];

      if (c === "'") {
        this.push('string', this.readString(), start);
      } else if ((c === 'E' || c === 'e') && next === "'") {
        this.pos++;
        this.push('string', this.readString(), start);
      } else if (c === '"') {
        this.push('quoted', this.readQuoted(), start);
      } else if (c === '$') {
        this.readDollar(start);
      } else if (isDigit(c) || (c === '.' && isDigit(next))) {
        this.push('number', this.readNumber(), start);
      } else if (isIdentStart(c)) {
        while (isIdentPart(s[this.pos])) this.pos++;
        this.push('word', s.slice(start, this.pos), start);
      } else if (c === '@' && this.opts.placeholders) {
        this.pos++;
        if (s[this.pos] === '*') {
          this.pos++;
          this.push('placeholder', '*', start);
        } else {
          while (isDigit(s[this.pos])) this.pos++;
          if (this.pos === start + 1) throw Errors.SYNTAX(`Bad placeholder at offset ${start}`, start);
          this.push('placeholder', s.slice(start + 1, this.pos), start);
        }
      } else if (c === '@') {
        // stage location: @name, @~, @%table, each optionally followed by /path
        this.pos++;
        if (isStageStart(s[this.pos])) while (isStagePart(s[this.pos])) this.pos++;
        if (this.pos === start + 1) throw Errors.SYNTAX(`Expected a stage name after '@' at offset ${start}`, start);
        this.push('stage', s.slice(start + 1, this.pos), start);
      } else if (TWO_CHAR.has(s.slice(start, start + 2))) {
        this.pos += 2;
        this.push('op', s.slice(start, start + 2), start);
      } else if (ONE_CHAR.has(c)) {
        this.pos++;
        this.push('op', c, start);
      } else {
        throw Errors.SYNTAX(`Unexpected character '${c}' at offset ${start}`, start);
      }
    }
    this.out.push({ type: 'eof', value: '', start: s.length, end: s.length });
    return this.out;
  }

  private push(type: TokenType, value: string, start: number) {
    this.out.push({ type, value, start, end: this.pos });
  }

  private skipTrivia() {
    const s = this.src;
    while (this.pos < s.length) {
      const c = s[this.pos];
      if (c === ' ' || c === '\t' || c === '\n' || c === '\r') {
        this.pos++;
      } else if ((c === '-' && s[this.pos + 1] === '-') || (c === '/' && s[this.pos + 1] === '/')) {
        const nl = s.indexOf('\n', this.pos);
        this.pos = nl < 0 ? s.length : nl + 1;
      } else if (c === '/' && s[this.pos + 1] === '*') {
        const close = s.indexOf('*/', this.pos + 2);
        if (close < 0) throw Errors.SYNTAX(`Unterminated comment at offset ${this.pos}`, this.pos);
        this.pos = close + 2;
      } else {
        return;
      }
    }
  }

  // single-quoted; both '' and backslash escapes are honoured
  private readString(): string {
    const s = this.src;
    const start = this.pos;
    this.pos++;
    let value = '';
    while (this.pos < s.length) {
      const c = s[this.pos];
      if (c === "'") {
        if (s[this.pos + 1] === "'") {
          value += "'";
          this.pos += 2;
          continue;
        }
        this.pos++;
        return value;
      }
      if (c === '\\' && this.pos + 1 < s.length) {
        const e = s[this.pos + 1];
        value += ESCAPES[e] ?? e;
        this.pos += 2;
        continue;
      }
      value += c;
      this.pos++;
    }
    throw Errors.SYNTAX(`Unterminated string literal at offset ${start}`, start);
  }

  private readQuoted(): string {
    const s = this.src;
    const start = this.pos;
    this.pos++;
    let value = '';
    while (this.pos < s.length) {
      const c = s[this.pos];
      if (c === '"') {
        if (s[this.pos + 1] === '"') {
          value += '"';
          this.pos += 2;
          continue;
        }
        this.pos++;
        if (value === '') throw Errors.SYNTAX(`Empty quoted identifier at offset ${start}`, start);
        return value;
      }
      value += c;
      this.pos++;
    }
    throw Errors.SYNTAX(`Unterminated quoted identifier at offset ${start}`, start);
  }

  private readDollar(start: number) {
    const s = this.src;
    if (s[start + 1] === '$') {
      const close = s.indexOf('$$', start + 2);
      if (close < 0) throw Errors.SYNTAX(`Unterminated $$ string at offset ${start}`, start);
      this.pos = close + 2;
      this.push('string', s.slice(start + 2, close), start);
      return;
    }
    this.pos = start + 1;
    if (isDigit(s[this.pos])) {
      while (isDigit(s[this.pos])) this.pos++;
      this.push('param', s.slice(start, this.pos), start);
      return;
    }
    if (isIdentStart(s[this.pos])) {
      while (isIdentPart(s[this.pos]) && s[this.pos] !== '$') this.pos++;
      this.push('variable', s.slice(start + 1, this.pos), start);
      return;
    }
    throw Errors.SYNTAX(`Unexpected character '$' at offset ${start}`, start);
  }

  private readNumber(): string {
    const s = this.src;
    const start = this.pos;
    while (isDigit(s[this.pos])) this.pos++;
    if (s[this.pos] === '.' && s[this.pos + 1] !== '.') {
      this.pos++;
      while (isDigit(s[this.pos])) this.pos++;
    }
    if ((s[this.pos] === 'e' || s[this.pos] === 'E') &&
        (isDigit(s[this.pos + 1]) || ((s[this.pos + 1] === '+' || s[this.pos + 1] === '-') && isDigit(s[this.pos + 2])))) {
      this.pos += 2;
      while (isDigit(s[this.pos])) this.pos++;
    }
    return s.slice(start, this.pos);
  }
}

export const tokenize = (sql: string, opts?: TokenizeOptions): Token[] => new Tokenizer(sql, opts).run();
