// packages/sql/src/parser.ts
// Recursive-descent parser for the Snowflake statement surface (plus the DuckDB
// forms the emitter produces, so emitted text parses back to the same tree).
import { Errors, type Identifier } from '@frostbridge/core';
import { tokenize, type Token, type TokenizeOptions } from './lexer';
import { isReserved } from './keywords';
import { normalizeDatePart, isSteppablePart } from './date-parts';
import {
  call, lit,
  type AlterAction, type Assignment, type BinaryOp, type Call, type CaseExpr, type ColumnDef, type CopyOptions, type Cte,
  type Expr, type FromItem, type JoinType, type MergeClause, type NamedArg, type OrderItem,
  type DerivedTable, type ParsedStatement, type PathStep, type Query, type Select, type SetOp, type Star,
  type Statement, type TableConstraint, type TableFunction, type TableRef, type TypeName, type Values,
  type WindowSpec, type With
} from './ast';

const COMPARISON: ReadonlyMap<string, BinaryOp> = new Map<string, BinaryOp>([
  ['=', '='], ['<>', '<>'], ['!=', '<>'], ['<', '<'], ['<=', '<='], ['>', '>'], ['>=', '>=']
]);

// niladic functions written without parentheses
const BARE_FUNCTIONS = new Set([
  'CURRENT_DATE', 'CURRENT_TIME', 'CURRENT_TIMESTAMP', 'CURRENT_USER', 'LOCALTIME', 'LOCALTIMESTAMP'
]);

const TYPED_LITERALS = new Set([
  'DATE', 'TIME', 'TIMESTAMP', 'TIMESTAMP_NTZ', 'TIMESTAMP_LTZ', 'TIMESTAMP_TZ', 'TIMESTAMPTZ', 'DATETIME'
]);

const NEGATABLE = ['IN', 'BETWEEN', 'LIKE', 'ILIKE', 'RLIKE', 'REGEXP'];

export class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  // ---------- token helpers ----------
  private peek(k = 0): Token {
    return this.tokens[Math.min(this.pos + k, this.tokens.length - 1)];
  }

  private next(): Token {
    const t = this.peek();
    if (t.type !== 'eof') this.pos++;
    return t;
  }

  private isWord(kw: string, k = 0): boolean {
    const t = this.peek(k);
    return t.type === 'word' && t.value.toUpperCase() === kw;
  }

  private isOp(op: string, k = 0): boolean {
    const t = this.peek(k);
    return t.type === 'op' && t.value === op;
  }

  private acceptWord(...kws: string[]): boolean {
    if (!kws.every((kw, i) => this.isWord(kw, i))) return false;
    this.pos += kws.length;
    return true;
  }

  private acceptOp(op: string): boolean {
    if (!this.isOp(op)) return false;
    this.pos++;
    return true;
  }

  private expectWord(...kws: string[]): void {
    for (const kw of kws) if (!this.acceptWord(kw)) this.fail(kw);
  }

  private expectOp(op: string): void {
    if (!this.acceptOp(op)) this.fail(`'${op}'`);
  }

  fail(expected: string): never {
    const t = this.peek();
    const got = t.type === 'eof' ? 'end of input' : `'${t.value}'`;
    throw Errors.SYNTAX(`Expected ${expected} but got ${got} at offset ${t.start}`, t.start);
  }

  atEnd(): boolean {
    return this.peek().type === 'eof';
  }

  current(): Token {
    return this.peek();
  }

  previous(): Token {
    return this.tokens[Math.max(this.pos - 1, 0)];
  }

  acceptSemicolon(): boolean {
    return this.acceptOp(';');
  }

  // ---------- names ----------
  parseIdentifier(what = 'identifier'): Identifier {
    const t = this.peek();
    if (t.type === 'quoted') {
      this.pos++;
      return { name: t.value, quoted: true };
    }
    if (t.type === 'word') {
      this.pos++;
      return { name: t.value, quoted: false };
    }
    return this.fail(what);
  }

  private parseObjectName(): Identifier[] {
    const parts = [this.parseIdentifier('object name')];
    while (this.isOp('.')) {
      this.pos++;
      parts.push(this.parseIdentifier('object name'));
    }
    return parts;
  }

  private parseIdentList(): Identifier[] {
    const out = [this.parseIdentifier()];
    while (this.acceptOp(',')) out.push(this.parseIdentifier());
    return out;
  }

  private parseParenIdentList(): Identifier[] {
    this.expectOp('(');
    const out = this.parseIdentList();
    this.expectOp(')');
    return out;
  }

  private parseAlias(): Identifier | undefined {
    if (this.acceptWord('AS')) return this.parseIdentifier('alias');
    const t = this.peek();
    if (t.type === 'quoted' || (t.type === 'word' && !isReserved(t.value))) return this.parseIdentifier();
    return undefined;
  }

  parseTypeName(): TypeName {
    let name = this.parseIdentifier('type name').name.toUpperCase();
    if (name === 'DOUBLE' && this.acceptWord('PRECISION')) name = 'DOUBLE PRECISION';
    else if ((name === 'CHARACTER' || name === 'CHAR') && this.acceptWord('VARYING')) name = 'VARCHAR';
    else if ((name === 'TIMESTAMP' || name === 'TIME') && this.acceptWord('WITH', 'TIME', 'ZONE')) name += ' WITH TIME ZONE';
    else if (name === 'TIMESTAMP' || name === 'TIME') this.acceptWord('WITHOUT', 'TIME', 'ZONE');
    const params: number[] = [];
    if (this.acceptOp('(')) {
      do {
        const t = this.next();
        if (t.type !== 'number') this.fail('numeric type parameter');
        params.push(Number(t.value));
      } while (this.acceptOp(','));
      this.expectOp(')');
    }
    let arrayDepth = 0;
    while (this.isOp('[') && this.isOp(']', 1)) {
      this.pos += 2;
      arrayDepth++;
    }
    return { name, params, arrayDepth };
  }

  // --------------------
  // Expressions
  // --------------------
  parseExpr(): Expr {
    return this.parseOr();
  }

  private parseExprList(): Expr[] {
    const out = [this.parseExpr()];
    while (this.acceptOp(',')) out.push(this.parseExpr());
    return out;
  }

  private parseOr(): Expr {
    let left = this.parseAnd();
    while (this.acceptWord('OR')) left = { kind: 'binary', op: 'OR', left, right: this.parseAnd() };
    return left;
  }

  private parseAnd(): Expr {
    let left = this.parseNot();
    while (this.acceptWord('AND')) left = { kind: 'binary', op: 'AND', left, right: this.parseNot() };
    return left;
  }

  private parseNot(): Expr {
    if (this.isWord('NOT') && !this.isWord('EXISTS', 1)) {
      this.pos++;
      return { kind: 'unary', op: 'NOT', expr: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    let left = this.parseBitOr();
    for (;;) {
      const t = this.peek();
      const cmp = t.type === 'op' ? COMPARISON.get(t.value) : undefined;
      if (cmp) {
        this.pos++;
        left = { kind: 'binary', op: cmp, left, right: this.parseBitOr() };
        continue;
      }
      if (this.acceptWord('IS')) {
        const not = this.acceptWord('NOT');
        if (this.acceptWord('NULL')) left = { kind: 'is', expr: left, not, value: 'NULL' };
        else if (this.acceptWord('TRUE')) left = { kind: 'is', expr: left, not, value: 'TRUE' };
        else if (this.acceptWord('FALSE')) left = { kind: 'is', expr: left, not, value: 'FALSE' };
        else if (this.acceptWord('DISTINCT', 'FROM')) left = { kind: 'distinct', left, right: this.parseBitOr(), not };
        else this.fail('NULL, TRUE, FALSE or DISTINCT FROM');
        continue;
      }
      const negated = this.isWord('NOT') && NEGATABLE.some((w) => this.isWord(w, 1));
      const k = negated ? 1 : 0;
      if (this.isWord('IN', k)) {
        this.pos += k + 1;
        left = this.parseInTail(left, negated);
      } else if (this.isWord('BETWEEN', k)) {
        this.pos += k + 1;
        const low = this.parseBitOr();
        this.expectWord('AND');
        left = { kind: 'between', expr: left, low, high: this.parseBitOr(), not: negated };
      } else if (this.isWord('LIKE', k) || this.isWord('ILIKE', k)) {
        const ilike = this.isWord('ILIKE', k);
        this.pos += k + 1;
        const op: BinaryOp = ilike ? (negated ? 'NOT ILIKE' : 'ILIKE') : negated ? 'NOT LIKE' : 'LIKE';
        left = { kind: 'binary', op, left, right: this.parseBitOr() };
      } else if (this.isWord('RLIKE', k) || this.isWord('REGEXP', k)) {
        this.pos += k + 1;
        const m = call('RLIKE', [left, this.parseBitOr()]);
        left = negated ? { kind: 'unary', op: 'NOT', expr: m } : m;
      } else {
        return left;
      }
    }
  }

  private parseInTail(expr: Expr, not: boolean): Expr {
    this.expectOp('(');
    if (this.isQueryStart()) {
      const query = this.parseQuery();
      this.expectOp(')');
      return { kind: 'in', expr, not, query };
    }
    const list = this.parseExprList();
    this.expectOp(')');
    return { kind: 'in', expr, not, list };
  }

  private parseBinaryLevel(ops: readonly BinaryOp[], nextLevel: () => Expr): Expr {
    let left = nextLevel();
    for (;;) {
      const t = this.peek();
      const op = t.type === 'op' ? ops.find((o) => o === t.value) : undefined;
      if (!op) return left;
      this.pos++;
      left = { kind: 'binary', op, left, right: nextLevel() };
    }
  }

  private parseBitOr = (): Expr => this.parseBinaryLevel(['|'], this.parseBitAnd);
  private parseBitAnd = (): Expr => this.parseBinaryLevel(['&'], this.parseShift);
  private parseShift = (): Expr => this.parseBinaryLevel(['<<', '>>'], this.parseConcat);
  private parseConcat = (): Expr => this.parseBinaryLevel(['||'], this.parseAdditive);
  private parseAdditive = (): Expr => this.parseBinaryLevel(['+', '-'], this.parseMultiplicative);
  private parseMultiplicative = (): Expr => this.parseBinaryLevel(['*', '/', '%'], this.parseUnary);

  private parseUnary = (): Expr => {
    if (this.acceptOp('-')) return { kind: 'unary', op: '-', expr: this.parseUnary() };
    if (this.acceptOp('+')) return { kind: 'unary', op: '+', expr: this.parseUnary() };
    if (this.acceptOp('~')) return { kind: 'unary', op: '~', expr: this.parseUnary() };
    return this.parsePostfix();
  };

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();
    for (;;) {
      if (this.acceptOp('::')) {
        expr = { kind: 'cast', expr, type: this.parseTypeName(), mode: 'CAST' };
      } else if (this.acceptOp('[')) {
        expr = appendPath(expr, this.parseBracketStep());
      } else if (this.acceptOp(':')) {
        expr = appendPath(expr, { kind: 'key', name: this.parsePathKey() });
      } else if (expr.kind === 'path' && this.isOp('.')) {
        this.pos++;
        expr = appendPath(expr, { kind: 'key', name: this.parsePathKey() });
      } else {
        return expr;
      }
    }
  }

  private parsePathKey(): string {
    const t = this.peek();
    if (t.type === 'word' || t.type === 'quoted') {
      this.pos++;
      return t.value;
    }
    return this.fail('path element');
  }

  private parseBracketStep(): PathStep {
    const t = this.peek();
    if ((t.type === 'string' || t.type === 'number') && this.isOp(']', 1)) {
      this.pos += 2;
      return t.type === 'string' ? { kind: 'key', name: t.value } : { kind: 'index', value: Number(t.value) };
    }
    const expr = this.parseExpr();
    this.expectOp(']');
    return { kind: 'dynamic', expr };
  }

  private parsePrimary(): Expr {
    const t = this.peek();
    switch (t.type) {
      case 'number':
        this.pos++;
        return lit.num(t.value);
      case 'string':
        this.pos++;
        return lit.str(t.value);
      case 'variable':
        this.pos++;
        return { kind: 'variable', name: t.value };
      case 'param':
        this.pos++;
        return { kind: 'param', text: t.value };
      case 'placeholder':
        this.pos++;
        return { kind: 'placeholder', index: t.value === '*' ? 'rest' : Number(t.value) };
      case 'quoted':
        return this.parseNameExpr();
      case 'word':
        return this.parseWordExpr(t);
      case 'op':
        if (t.value === '(') return this.parseParenExpr();
        if (t.value === '[') return this.parseArrayLit();
        if (t.value === '{') return this.parseStructLit();
        if (t.value === '?') {
          this.pos++;
          return { kind: 'param', text: '?' };
        }
        if (t.value === '*') {
          this.pos++;
          return this.parseStarTail();
        }
        break;
      default:
        break;
    }
    return this.fail('expression');
  }

  private parseWordExpr(t: Token): Expr {
    const up = t.value.toUpperCase();
    if (this.isOp('->', 1)) {
      this.pos += 2;
      return { kind: 'lambda', params: [{ name: t.value, quoted: false }], body: this.parseExpr() };
    }
    switch (up) {
      case 'NULL':
        this.pos++;
        return lit.null();
      case 'TRUE':
      case 'FALSE':
        this.pos++;
        return lit.bool(up === 'TRUE');
      case 'CASE':
        return this.parseCase();
      case 'CAST':
      case 'TRY_CAST':
        if (this.isOp('(', 1)) return this.parseCast(up === 'CAST' ? 'CAST' : 'TRY_CAST');
        break;
      case 'EXISTS':
        if (this.isOp('(', 1)) {
          this.pos += 2;
          const query = this.parseQuery();
          this.expectOp(')');
          return { kind: 'exists', query };
        }
        break;
      case 'NOT':
        if (this.isWord('EXISTS', 1)) {
          this.pos++;
          return { kind: 'unary', op: 'NOT', expr: this.parsePrimary() };
        }
        break;
      case 'INTERVAL':
        return this.parseInterval();
      case 'EXTRACT':
        if (this.isOp('(', 1)) return this.parseExtract();
        break;
      default:
        break;
    }
    if (TYPED_LITERALS.has(up) && this.peek(1).type === 'string') {
      this.pos++;
      return { kind: 'typed', type: up, value: this.next().value };
    }
    if (BARE_FUNCTIONS.has(up) && !this.isOp('(', 1)) {
      this.pos++;
      return call(t.value, [], { bare: true });
    }
    if (isReserved(up) && !this.isOp('(', 1)) this.fail('expression');
    return this.parseNameExpr();
  }

  private parseNameExpr(): Expr {
    const parts = [this.parseIdentifier()];
    for (;;) {
      if (this.isOp('.') && this.isOp('*', 1)) {
        this.pos += 2;
        return this.parseStarTail(parts);
      }
      const after = this.peek(1);
      if (this.isOp('.') && (after.type === 'word' || after.type === 'quoted')) {
        this.pos++;
        parts.push(this.parseIdentifier());
        continue;
      }
      break;
    }
    if (this.isOp('(')) {
      if (parts.length !== 1 || parts[0].quoted) this.fail('an unqualified function name');
      return this.parseCallTail(parts[0].name);
    }
    return { kind: 'column', parts };
  }

  private parseStarTail(qualifier?: Identifier[]): Star {
    const star: Star = { kind: 'star' };
    if (qualifier) star.qualifier = qualifier;
    if (this.acceptWord('EXCLUDE')) {
      star.exclude = this.isOp('(') ? this.parseParenIdentList() : [this.parseIdentifier()];
    }
    return star;
  }

  parseCallTail(name: string): Call {
    this.expectOp('(');
    const c: Call = { kind: 'call', name, args: [] };
    if (this.acceptOp(')')) return this.parseCallSuffix(c);
    if (this.isOp('*') && this.isOp(')', 1)) {
      this.pos += 2;
      c.star = true;
      return this.parseCallSuffix(c);
    }
    if (this.acceptWord('DISTINCT')) c.distinct = true;
    else this.acceptWord('ALL');

    const up = name.toUpperCase();
    if (up === 'POSITION') {
      // POSITION(needle IN haystack)
      const needle = this.parseBitOr();
      if (this.acceptWord('IN')) {
        c.args.push(needle, this.parseExpr());
        this.expectOp(')');
        return this.parseCallSuffix(c);
      }
      c.args.push(needle);
      if (this.acceptOp(',')) c.args.push(...this.parseExprList());
      this.expectOp(')');
      return this.parseCallSuffix(c);
    }

    do {
      const t = this.peek();
      if (t.type === 'word' && (this.isOp('=>', 1) || this.isOp(':=', 1))) {
        this.pos += 2;
        const arg: NamedArg = { name: t.value.toUpperCase(), value: this.parseExpr() };
        (c.namedArgs ??= []).push(arg);
      } else {
        c.args.push(this.parseExpr());
      }
    } while (this.acceptOp(','));

    if (up === 'SUBSTRING' || up === 'SUBSTR') {
      if (this.acceptWord('FROM')) c.args.push(this.parseExpr());
      if (this.acceptWord('FOR')) c.args.push(this.parseExpr());
    }
    if (this.acceptWord('ORDER', 'BY')) c.orderBy = this.parseOrderList();
    this.expectOp(')');
    return this.parseCallSuffix(c);
  }

  private parseCallSuffix(c: Call): Call {
    if (this.acceptWord('WITHIN', 'GROUP')) {
      this.expectOp('(');
      this.expectWord('ORDER', 'BY');
      c.withinGroup = this.parseOrderList();
      this.expectOp(')');
    }
    if (this.isWord('FILTER') && this.isOp('(', 1)) {
      this.pos += 2;
      this.expectWord('WHERE');
      c.filter = this.parseExpr();
      this.expectOp(')');
    }
    if (this.acceptWord('OVER')) c.over = this.parseWindowSpec();
    return c;
  }

  private parseWindowSpec(): WindowSpec {
    this.expectOp('(');
    const spec: WindowSpec = { partitionBy: [], orderBy: [] };
    if (this.acceptWord('PARTITION', 'BY')) spec.partitionBy = this.parseExprList();
    if (this.acceptWord('ORDER', 'BY')) spec.orderBy = this.parseOrderList();
    if (this.isWord('ROWS') || this.isWord('RANGE') || this.isWord('GROUPS')) {
      const words: string[] = [];
      while (!this.isOp(')')) {
        const t = this.next();
        if (t.type === 'eof') this.fail("')'");
        words.push(t.type === 'word' ? t.value.toUpperCase() : t.value);
      }
      spec.frame = words.join(' ');
    }
    this.expectOp(')');
    return spec;
  }

  private parseOrderList(): OrderItem[] {
    const out: OrderItem[] = [];
    do {
      const item: OrderItem = { expr: this.parseExpr() };
      if (this.acceptWord('ASC')) item.direction = 'ASC';
      else if (this.acceptWord('DESC')) item.direction = 'DESC';
      if (this.acceptWord('NULLS', 'FIRST')) item.nulls = 'FIRST';
      else if (this.acceptWord('NULLS', 'LAST')) item.nulls = 'LAST';
      out.push(item);
    } while (this.acceptOp(','));
    return out;
  }

  private parseCase(): CaseExpr {
    this.expectWord('CASE');
    const node: CaseExpr = { kind: 'case', whens: [] };
    if (!this.isWord('WHEN')) node.operand = this.parseExpr();
    while (this.acceptWord('WHEN')) {
      const when = this.parseExpr();
      this.expectWord('THEN');
      node.whens.push({ when, then: this.parseExpr() });
    }
    if (node.whens.length === 0) this.fail('WHEN');
    if (this.acceptWord('ELSE')) node.else = this.parseExpr();
    this.expectWord('END');
    return node;
  }

  private parseCast(mode: 'CAST' | 'TRY_CAST'): Expr {
    this.pos += 2;
    const expr = this.parseExpr();
    this.expectWord('AS');
    const type = this.parseTypeName();
    this.expectOp(')');
    return { kind: 'cast', expr, type, mode };
  }

  private parseInterval(): Expr {
    this.expectWord('INTERVAL');
    const t = this.peek();
    let value: Expr;
    if (t.type === 'string' || t.type === 'number') {
      this.pos++;
      value = t.type === 'string' ? lit.str(t.value) : lit.num(t.value);
    } else if (this.acceptOp('(')) {
      value = this.parseExpr();
      this.expectOp(')');
    } else {
      return this.fail('interval value');
    }
    const u = this.peek();
    const part = u.type === 'word' ? normalizeDatePart(u.value) : undefined;
    if (part && isSteppablePart(part)) {
      this.pos++;
      return { kind: 'interval', value, unit: part.toUpperCase() };
    }
    return { kind: 'interval', value };
  }

  private parseExtract(): Expr {
    this.pos += 2;
    const t = this.next();
    if (t.type !== 'word' && t.type !== 'string') this.fail('date part');
    this.expectWord('FROM');
    const expr = this.parseExpr();
    this.expectOp(')');
    return { kind: 'extract', part: t.value.toUpperCase(), expr };
  }

  private parseParenExpr(): Expr {
    this.expectOp('(');
    if (this.isQueryStart()) {
      const query = this.parseQuery();
      this.expectOp(')');
      return { kind: 'subquery', query };
    }
    const first = this.parseExpr();
    if (this.acceptOp(',')) {
      const items = [first, ...this.parseExprList()];
      this.expectOp(')');
      if (this.acceptOp('->')) {
        const params = items.map((i) =>
          i.kind === 'column' && i.parts.length === 1 ? i.parts[0] : this.fail('lambda parameter')
        );
        return { kind: 'lambda', params, body: this.parseExpr() };
      }
      return { kind: 'tuple', items };
    }
    this.expectOp(')');
    return { kind: 'paren', expr: first };
  }

  private parseArrayLit(): Expr {
    this.expectOp('[');
    if (this.acceptOp(']')) return { kind: 'array', items: [] };
    const items = this.parseExprList();
    this.expectOp(']');
    return { kind: 'array', items };
  }

  private parseStructLit(): Expr {
    this.expectOp('{');
    const entries: Array<{ key: string; value: Expr }> = [];
    if (!this.acceptOp('}')) {
      do {
        const k = this.next();
        if (k.type !== 'string' && k.type !== 'word' && k.type !== 'quoted') this.fail('object key');
        this.expectOp(':');
        entries.push({ key: k.value, value: this.parseExpr() });
      } while (this.acceptOp(','));
      this.expectOp('}');
    }
    return { kind: 'struct', entries };
  }

  // --------------------
  // Queries
  // --------------------
  private isQueryStart(k = 0): boolean {
    return this.isWord('SELECT', k) || this.isWord('WITH', k) || this.isWord('VALUES', k);
  }

  parseQuery(): Query {
    const w = this.isWord('WITH') ? this.parseWith() : undefined;
    const q = this.parseSetExpr();
    if (!w) return q;
    if (q.kind !== 'select' && q.kind !== 'setop') return this.fail('SELECT after WITH');
    q.with = w;
    return q;
  }

  private parseWith(): With {
    this.expectWord('WITH');
    const recursive = this.acceptWord('RECURSIVE');
    const ctes: Cte[] = [];
    do {
      const name = this.parseIdentifier('CTE name');
      const columns = this.isOp('(') ? this.parseParenIdentList() : undefined;
      this.expectWord('AS');
      this.expectOp('(');
      const query = this.parseQuery();
      this.expectOp(')');
      ctes.push(columns ? { name, columns, query } : { name, query });
    } while (this.acceptOp(','));
    return { recursive, ctes };
  }

  private parseSetExpr(): Query {
    let left = this.parseQueryTerm();
    for (;;) {
      let op: SetOp['op'] | undefined;
      if (this.acceptWord('UNION')) op = 'UNION';
      else if (this.acceptWord('INTERSECT')) op = 'INTERSECT';
      else if (this.acceptWord('EXCEPT') || this.acceptWord('MINUS')) op = 'EXCEPT';
      if (!op) return left;
      const all = this.acceptWord('ALL');
      if (!all) this.acceptWord('DISTINCT');
      left = { kind: 'setop', op, all, left, right: this.parseQueryTerm() };
    }
  }

  private parseQueryTerm(): Query {
    if (this.isWord('SELECT')) return this.parseSelect();
    if (this.isWord('VALUES')) return this.parseValues();
    if (this.acceptOp('(')) {
      const query = this.parseQuery();
      this.expectOp(')');
      return { kind: 'nested', query };
    }
    return this.fail('SELECT');
  }

  private parseValues(): Values {
    this.expectWord('VALUES');
    const rows: Expr[][] = [];
    do {
      this.expectOp('(');
      rows.push(this.parseExprList());
      this.expectOp(')');
    } while (this.acceptOp(','));
    return { kind: 'values', rows };
  }

  private parseSelect(): Select {
    this.expectWord('SELECT');
    const s: Select = { kind: 'select', distinct: false, columns: [], from: [] };
    if (this.acceptWord('DISTINCT')) s.distinct = true;
    else this.acceptWord('ALL');
    if (this.acceptWord('TOP')) s.top = this.parsePrimary();
    do {
      if (this.acceptOp('*')) {
        s.columns.push({ expr: this.parseStarTail() });
      } else {
        const expr = this.parseExpr();
        const alias = expr.kind === 'star' ? undefined : this.parseAlias();
        s.columns.push(alias ? { expr, alias } : { expr });
      }
    } while (this.acceptOp(','));
    if (this.acceptWord('FROM')) s.from = this.parseFromList();
    if (this.acceptWord('WHERE')) s.where = this.parseExpr();
    if (this.acceptWord('GROUP', 'BY')) s.groupBy = this.acceptWord('ALL') ? 'ALL' : this.parseExprList();
    if (this.acceptWord('HAVING')) s.having = this.parseExpr();
    if (this.acceptWord('QUALIFY')) s.qualify = this.parseExpr();
    if (this.acceptWord('ORDER', 'BY')) s.orderBy = this.parseOrderList();
    if (this.acceptWord('LIMIT')) {
      s.limit = this.parseExpr();
      if (this.acceptWord('OFFSET')) s.offset = this.parseExpr();
    } else if (this.acceptWord('OFFSET')) {
      s.offset = this.parseExpr();
      if (!this.acceptWord('ROWS')) this.acceptWord('ROW');
      if (this.isWord('FETCH')) s.limit = this.parseFetch();
    } else if (this.isWord('FETCH')) {
      s.limit = this.parseFetch();
    }
    return s;
  }

  private parseFetch(): Expr {
    this.expectWord('FETCH');
    if (!this.acceptWord('FIRST')) this.expectWord('NEXT');
    const n = this.parseExpr();
    if (!this.acceptWord('ROWS')) this.expectWord('ROW');
    this.expectWord('ONLY');
    return n;
  }

  private parseFromList(): FromItem[] {
    const out = [this.parseFromItem()];
    while (this.acceptOp(',')) out.push(this.parseFromItem());
    return out;
  }

  private parseJoinType(): JoinType | undefined {
    if (this.acceptWord('JOIN') || this.acceptWord('INNER', 'JOIN')) return 'INNER';
    if (this.acceptWord('CROSS', 'JOIN')) return 'CROSS';
    for (const side of ['LEFT', 'RIGHT', 'FULL'] as const) {
      if (this.acceptWord(side, 'JOIN') || this.acceptWord(side, 'OUTER', 'JOIN')) return side;
    }
    return undefined;
  }

  private parseFromItem(): FromItem {
    let left = this.parseFromPrimary();
    for (;;) {
      const type = this.parseJoinType();
      if (!type) return left;
      const right = this.parseFromPrimary();
      if (type !== 'CROSS' && this.acceptWord('ON')) left = { kind: 'join', type, left, right, on: this.parseExpr() };
      else if (type !== 'CROSS' && this.acceptWord('USING')) left = { kind: 'join', type, left, right, using: this.parseParenIdentList() };
      else left = { kind: 'join', type, left, right };
    }
  }

  private withAlias<T extends TableRef | DerivedTable | TableFunction>(item: T): T {
    const alias = this.parseAlias();
    if (!alias) return item;
    item.alias = alias;
    if (this.isOp('(')) item.columnAliases = this.parseParenIdentList();
    return item;
  }

  private parseFromPrimary(): FromItem {
    const lateral = this.acceptWord('LATERAL');
    if (this.isWord('TABLE') && this.isOp('(', 1)) {
      this.pos += 2;
      const name = this.parseIdentifier('table function');
      const fn = this.parseCallTail(name.name);
      this.expectOp(')');
      return this.withAlias({ kind: 'function', call: fn, lateral, wrapped: true });
    }
    if (this.acceptOp('(')) {
      const query = this.parseQuery();
      this.expectOp(')');
      return this.withAlias({ kind: 'derived', query, lateral });
    }
    if (this.isWord('VALUES')) return this.withAlias({ kind: 'derived', query: this.parseValues(), lateral: false });

    const name = this.parseObjectName();
    if (this.isOp('(')) {
      if (name.length !== 1) this.fail('an unqualified table function');
      return this.withAlias({ kind: 'function', call: this.parseCallTail(name[0].name), lateral, wrapped: false });
    }
    if (lateral) this.fail('subquery or table function after LATERAL');
    const ref: TableRef = { kind: 'table', name };
    if ((this.isWord('AT') || this.isWord('BEFORE')) && this.isOp('(', 1)) {
      const kind = this.isWord('AT') ? 'AT' : 'BEFORE';
      this.pos += 2;
      const args: NamedArg[] = [];
      do {
        const n = this.next();
        if (n.type !== 'word') this.fail('time travel argument');
        this.expectOp('=>');
        args.push({ name: n.value.toUpperCase(), value: this.parseExpr() });
      } while (this.acceptOp(','));
      this.expectOp(')');
      ref.timeTravel = { kind, args };
    }
    return this.withAlias(ref);
  }

  private parseTableTarget(): TableRef {
    return this.withAlias({ kind: 'table', name: this.parseObjectName() });
  }

  private parseAssignments(): Assignment[] {
    const out: Assignment[] = [];
    do {
      const column = this.parseObjectName();
      this.expectOp('=');
      out.push({ column, value: this.parseExpr() });
    } while (this.acceptOp(','));
    return out;
  }

  // --------------------
  // Statements
  // --------------------
  parseStatement(): Statement {
    const t = this.peek();
    if (this.isQueryStart() || this.isOp('(')) return { kind: 'query', query: this.parseQuery() };
    if (t.type !== 'word') return this.fail('statement');
    switch (t.value.toUpperCase()) {
      case 'INSERT': return this.parseInsert();
      case 'UPDATE': return this.parseUpdate();
      case 'DELETE': return this.parseDelete();
      case 'MERGE': return this.parseMerge();
      case 'CREATE': return this.parseCreate();
      case 'DROP': return this.parseDrop();
      case 'ALTER': return this.parseAlter();
      case 'USE': return this.parseUse();
      case 'SET': return this.parseSet();
      case 'UNSET': return this.parseUnset();
      case 'DESCRIBE':
      case 'DESC': return this.parseDescribe();
      case 'SHOW': return this.parseShow();
      case 'COPY': return this.parseCopy();
      case 'ATTACH': return this.parseAttach();
      case 'DETACH': return this.parseDetach();
      default:
        throw Errors.SYNTAX(`Unsupported statement '${t.value}' at offset ${t.start}`, t.start);
    }
  }

  private parseInsert(): Statement {
    this.expectWord('INSERT');
    const overwrite = this.acceptWord('OVERWRITE');
    this.expectWord('INTO');
    const table = this.parseObjectName();
    const columns = this.isOp('(') && !this.isQueryStart(1) ? this.parseParenIdentList() : undefined;
    const source = this.parseQuery();
    return columns
      ? { kind: 'insert', table, columns, source, overwrite }
      : { kind: 'insert', table, source, overwrite };
  }

  private parseUpdate(): Statement {
    this.expectWord('UPDATE');
    const table = this.parseTableTarget();
    this.expectWord('SET');
    const set = this.parseAssignments();
    const from = this.acceptWord('FROM') ? this.parseFromList() : [];
    const where = this.acceptWord('WHERE') ? this.parseExpr() : undefined;
    return { kind: 'update', table, set, from, where };
  }

  private parseDelete(): Statement {
    this.expectWord('DELETE', 'FROM');
    const table = this.parseTableTarget();
    const using = this.acceptWord('USING') ? this.parseFromList() : [];
    const where = this.acceptWord('WHERE') ? this.parseExpr() : undefined;
    return { kind: 'delete', table, using, where };
  }

  private parseMerge(): Statement {
    this.expectWord('MERGE', 'INTO');
    const target = this.parseTableTarget();
    this.expectWord('USING');
    const source = this.parseFromPrimary();
    this.expectWord('ON');
    const on = this.parseExpr();
    const clauses: MergeClause[] = [];
    while (this.acceptWord('WHEN')) {
      const matched = !this.acceptWord('NOT');
      this.expectWord('MATCHED');
      const condition = this.acceptWord('AND') ? this.parseExpr() : undefined;
      this.expectWord('THEN');
      if (matched && this.acceptWord('UPDATE')) {
        this.expectWord('SET');
        clauses.push({ matched, condition, action: { kind: 'update', set: this.parseAssignments() } });
      } else if (matched && this.acceptWord('DELETE')) {
        clauses.push({ matched, condition, action: { kind: 'delete' } });
      } else if (!matched && this.acceptWord('INSERT')) {
        const columns = this.isOp('(') ? this.parseParenIdentList() : undefined;
        this.expectWord('VALUES');
        this.expectOp('(');
        const values = this.parseExprList();
        this.expectOp(')');
        clauses.push({ matched, condition, action: { kind: 'insert', columns, values } });
      } else {
        this.fail(matched ? 'UPDATE or DELETE' : 'INSERT');
      }
    }
    if (clauses.length === 0) this.fail('WHEN');
    return { kind: 'merge', target, source, on, clauses };
  }

  private parseCreate(): Statement {
    this.expectWord('CREATE');
    const orReplace = this.acceptWord('OR', 'REPLACE');
    this.acceptWord('SECURE');
    if (!this.acceptWord('LOCAL')) this.acceptWord('GLOBAL');
    const temporary = this.acceptWord('TEMPORARY') || this.acceptWord('TEMP') || this.acceptWord('VOLATILE');
    if (!temporary) this.acceptWord('TRANSIENT');

    if (this.acceptWord('TABLE')) {
      const ifNotExists = this.acceptWord('IF', 'NOT', 'EXISTS');
      const name = this.parseObjectName();
      let columns: ColumnDef[] | undefined;
      let constraints: TableConstraint[] | undefined;
      if (this.acceptOp('(')) {
        columns = [];
        constraints = [];
        do {
          const constraint = this.parseTableConstraint();
          if (constraint) constraints.push(constraint);
          else columns.push(this.parseColumnDef());
        } while (this.acceptOp(','));
        this.expectOp(')');
      }
      const as = this.acceptWord('AS') ? this.parseQuery() : undefined;
      if (!columns && !as) this.fail("'(' or AS");
      return { kind: 'create_table', name, orReplace, temporary, ifNotExists, columns, constraints, as };
    }
    if (this.acceptWord('VIEW')) {
      const ifNotExists = this.acceptWord('IF', 'NOT', 'EXISTS');
      const name = this.parseObjectName();
      const columns = this.isOp('(') ? this.parseParenIdentList() : undefined;
      this.expectWord('AS');
      return { kind: 'create_view', name, orReplace, ifNotExists, columns, query: this.parseQuery() };
    }
    const object = this.acceptWord('DATABASE') ? 'DATABASE' : this.acceptWord('SCHEMA') ? 'SCHEMA' : undefined;
    if (!object) return this.fail('TABLE, VIEW, DATABASE or SCHEMA');
    const ifNotExists = this.acceptWord('IF', 'NOT', 'EXISTS');
    return { kind: 'create_namespace', object, name: this.parseObjectName(), orReplace, ifNotExists };
  }

  private parseTableConstraint(): TableConstraint | undefined {
    if (this.acceptWord('CONSTRAINT')) this.parseIdentifier('constraint name');
    if (this.acceptWord('PRIMARY', 'KEY')) return { kind: 'PRIMARY KEY', columns: this.parseParenIdentList() };
    if (this.isWord('UNIQUE') && this.isOp('(', 1)) {
      this.pos++;
      return { kind: 'UNIQUE', columns: this.parseParenIdentList() };
    }
    if (this.isWord('FOREIGN')) this.fail('column definition (FOREIGN KEY is not supported)');
    return undefined;
  }

  private parseColumnDef(): ColumnDef {
    const def: ColumnDef = { name: this.parseIdentifier('column name'), type: this.parseTypeName() };
    for (;;) {
      if (this.acceptWord('NOT', 'NULL')) def.notNull = true;
      else if (this.acceptWord('NULL')) def.notNull = false;
      else if (this.acceptWord('DEFAULT')) def.default = this.parseExpr();
      else if (this.acceptWord('PRIMARY', 'KEY')) def.primaryKey = true;
      else if (this.acceptWord('UNIQUE')) def.unique = true;
      else if (this.acceptWord('COLLATE') || this.acceptWord('COMMENT')) {
        if (this.next().type !== 'string') this.fail('string literal');
      } else if (this.isWord('AUTOINCREMENT') || this.isWord('IDENTITY')) {
        throw Errors.SYNTAX(`Unsupported column option ${this.peek().value} at offset ${this.peek().start}`, this.peek().start);
      } else {
        return def;
      }
    }
  }

  private parseDrop(): Statement {
    this.expectWord('DROP');
    const t = this.peek();
    const object = t.value.toUpperCase();
    if (t.type !== 'word' || !['TABLE', 'VIEW', 'SCHEMA', 'DATABASE'].includes(object)) {
      return this.fail('TABLE, VIEW, SCHEMA or DATABASE');
    }
    this.pos++;
    const ifExists = this.acceptWord('IF', 'EXISTS');
    const name = this.parseObjectName();
    const cascade = this.acceptWord('CASCADE');
    if (!cascade) this.acceptWord('RESTRICT');
    const kind = object === 'TABLE' ? 'TABLE' : object === 'VIEW' ? 'VIEW' : object === 'SCHEMA' ? 'SCHEMA' : 'DATABASE';
    return { kind: 'drop', object: kind, name, ifExists, cascade };
  }

  private parseAlter(): Statement {
    this.expectWord('ALTER');
    if (this.acceptWord('SESSION')) {
      while (!this.atEnd() && !this.isOp(';')) this.pos++;
      return { kind: 'alter_session' };
    }
    this.expectWord('TABLE');
    const ifExists = this.acceptWord('IF', 'EXISTS');
    const name = this.parseObjectName();
    let action: AlterAction;
    if (this.acceptWord('ADD')) {
      this.acceptWord('COLUMN');
      const ifNotExists = this.acceptWord('IF', 'NOT', 'EXISTS');
      action = { kind: 'add_column', column: this.parseColumnDef(), ifNotExists };
    } else if (this.acceptWord('DROP')) {
      this.acceptWord('COLUMN');
      const colIfExists = this.acceptWord('IF', 'EXISTS');
      action = { kind: 'drop_column', column: this.parseIdentifier('column name'), ifExists: colIfExists };
    } else if (this.acceptWord('RENAME', 'COLUMN')) {
      const from = this.parseIdentifier('column name');
      this.expectWord('TO');
      action = { kind: 'rename_column', from, to: this.parseIdentifier('column name') };
    } else if (this.acceptWord('RENAME', 'TO')) {
      action = { kind: 'rename', to: this.parseObjectName() };
    } else {
      return this.fail('ADD, DROP or RENAME');
    }
    return { kind: 'alter_table', name, ifExists, action };
  }

  private parseUse(): Statement {
    this.expectWord('USE');
    for (const object of ['DATABASE', 'SCHEMA', 'ROLE', 'WAREHOUSE'] as const) {
      if (this.acceptWord(object)) return { kind: 'use', object, name: this.parseObjectName() };
    }
    return { kind: 'use', name: this.parseObjectName() };
  }

  private parseSet(): Statement {
    this.expectWord('SET');
    if (this.isOp('(')) {
      const names = this.parseParenIdentList();
      this.expectOp('=');
      this.expectOp('(');
      const values = this.parseExprList();
      this.expectOp(')');
      if (values.length !== names.length) {
        throw Errors.SYNTAX(`SET assigns ${names.length} variables but ${values.length} values were given`);
      }
      return { kind: 'set', assignments: names.map((name, i) => ({ name, value: values[i] })) };
    }
    const name = this.parseIdentifier('variable name');
    this.expectOp('=');
    return { kind: 'set', assignments: [{ name, value: this.parseExpr() }] };
  }

  private parseUnset(): Statement {
    this.expectWord('UNSET');
    return { kind: 'unset', names: this.isOp('(') ? this.parseParenIdentList() : [this.parseIdentifier('variable name')] };
  }

  private parseDescribe(): Statement {
    this.next();
    const object = this.acceptWord('VIEW') ? 'VIEW' : 'TABLE';
    if (object === 'TABLE') this.acceptWord('TABLE');
    return { kind: 'describe', object, name: this.parseObjectName() };
  }

  private parseShow(): Statement {
    this.expectWord('SHOW');
    if (this.acceptWord('DATABASES')) return { kind: 'show', object: 'DATABASES' };
    for (const [object, scope] of [['SCHEMAS', 'DATABASE'], ['OBJECTS', 'SCHEMA']] as const) {
      if (!this.acceptWord(object)) continue;
      if (!this.acceptWord('IN')) return { kind: 'show', object };
      this.acceptWord(scope);
      return { kind: 'show', object, scope: this.parseObjectName() };
    }
    return this.fail('DATABASES, SCHEMAS or OBJECTS');
  }

  private parseCopy(): Statement {
    this.expectWord('COPY');
    if (!this.acceptWord('INTO')) return this.parseFileCopy();
    const table = this.parseObjectName();
    this.expectWord('FROM');
    const t = this.next();
    let location: string | undefined;
    if (t.type === 'stage') location = t.value;
    else if (t.type === 'string' && t.value.startsWith('@') && t.value.length > 1) location = t.value.slice(1);
    if (location === undefined) {
      throw Errors.SYNTAX(`COPY INTO reads from a stage (@name) but got '${t.value}' at offset ${t.start}`, t.start);
    }
    const options: CopyOptions = {};
    while (!this.atEnd() && !this.isOp(';')) {
      const name = this.parseIdentifier('copy option').name.toUpperCase();
      if (name !== 'FILE_FORMAT') throw Errors.SYNTAX(`COPY option ${name} is not supported`);
      this.expectOp('=');
      this.parseFileFormat(options);
    }
    return { kind: 'copy', table, source: { kind: 'stage', location }, options };
  }

  // DuckDB: COPY t FROM 'file' (FORMAT CSV, HEADER, DELIMITER '|')
  private parseFileCopy(): Statement {
    const table = this.parseObjectName();
    this.expectWord('FROM');
    const p = this.next();
    if (p.type !== 'string') this.fail('file path');
    const options: CopyOptions = {};
    if (this.acceptOp('(')) {
      do {
        const name = this.parseIdentifier('copy option').name.toUpperCase();
        if (name === 'FORMAT') {
          const format = this.parseIdentifier('format').name.toUpperCase();
          if (format !== 'CSV' && format !== 'JSON' && format !== 'PARQUET') throw Errors.SYNTAX(`Copy format ${format} is not supported`);
          options.format = format;
        } else if (name === 'HEADER') {
          options.header = !this.acceptWord('FALSE');
          if (options.header) this.acceptWord('TRUE');
        } else if (name === 'DELIMITER') {
          const d = this.next();
          if (d.type !== 'string') this.fail('string literal');
          options.delimiter = d.value;
        } else {
          throw Errors.SYNTAX(`COPY option ${name} is not supported`);
        }
      } while (this.acceptOp(','));
      this.expectOp(')');
    }
    return { kind: 'copy', table, source: { kind: 'file', path: p.value }, options };
  }

  private parseFileFormat(options: CopyOptions): void {
    this.expectOp('(');
    while (!this.acceptOp(')')) {
      const name = this.parseIdentifier('file format option').name.toUpperCase();
      this.expectOp('=');
      const v = this.next();
      switch (name) {
        case 'TYPE': {
          const format = v.value.toUpperCase();
          if (format !== 'CSV' && format !== 'JSON' && format !== 'PARQUET') {
            throw Errors.SYNTAX(`File format type ${format} is not supported`);
          }
          options.format = format;
          break;
        }
        case 'SKIP_HEADER':
          if (v.type !== 'number' || (v.value !== '0' && v.value !== '1')) throw Errors.SYNTAX('SKIP_HEADER must be 0 or 1');
          options.header = v.value === '1';
          break;
        case 'FIELD_DELIMITER':
          if (v.type !== 'string') this.fail('string literal');
          options.delimiter = v.value;
          break;
        default:
          throw Errors.SYNTAX(`File format option ${name} is not supported`);
      }
      this.acceptOp(',');
    }
  }

  private parseAttach(): Statement {
    this.expectWord('ATTACH');
    this.acceptWord('DATABASE');
    const ifNotExists = this.acceptWord('IF', 'NOT', 'EXISTS');
    const p = this.next();
    if (p.type !== 'string') this.fail('database path');
    this.acceptWord('AS');
    return { kind: 'attach', path: p.value, alias: this.parseIdentifier('database alias'), ifNotExists };
  }

  private parseDetach(): Statement {
    this.expectWord('DETACH');
    this.acceptWord('DATABASE');
    const ifExists = this.acceptWord('IF', 'EXISTS');
    return { kind: 'detach', name: this.parseIdentifier('database name'), ifExists };
  }
}

function appendPath(expr: Expr, step: PathStep): Expr {
  if (expr.kind === 'path') return { ...expr, steps: [...expr.steps, step] };
  return { kind: 'path', base: expr, steps: [step] };
}

// ---------- entry points ----------
/** `tokens` may be supplied when the caller has already rewritten the token stream. */
export function parseScript(sql: string, tokens: Token[] = tokenize(sql)): ParsedStatement[] {
  const p = new Parser(tokens);
  const out: ParsedStatement[] = [];
  while (!p.atEnd()) {
    if (p.acceptSemicolon()) continue;
    const start = p.current().start;
    const statement = p.parseStatement();
    out.push({ statement, text: sql.slice(start, p.previous().end) });
    if (!p.atEnd() && !p.acceptSemicolon()) p.fail("';' or end of input");
  }
  return out;
}

export function parseStatement(sql: string): Statement {
  const parsed = parseScript(sql);
  if (parsed.length !== 1) {
    throw Errors.SYNTAX(parsed.length === 0 ? 'Empty SQL statement' : `Expected a single statement but got ${parsed.length}`);
  }
  return parsed[0].statement;
}

export function parseQuery(sql: string): Query {
  const s = parseStatement(sql);
  if (s.kind !== 'query') throw Errors.SYNTAX(`Expected a query but got ${s.kind}`);
  return s.query;
}

export function parseExpression(sql: string, opts: TokenizeOptions = {}): Expr {
  const p = new Parser(tokenize(sql, opts));
  const expr = p.parseExpr();
  if (!p.atEnd()) p.fail('end of expression');
  return expr;
}
