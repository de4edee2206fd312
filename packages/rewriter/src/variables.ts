// packages/rewriter/src/variables.ts
// `$name` references are replaced in the token stream, before parsing, so the parser
// only ever sees literals where variables stood.
import type { ScalarValue } from '@frostbridge/core';
import { tokenize, type Token } from '@frostbridge/sql';
import type { SessionContext } from '@frostbridge/session';

export interface SubstitutedTokens {
  tokens: Token[];
  /** folded variable names */
  consumed: Set<string>;
}

function literalTokens(value: ScalarValue, at: Token): Token[] {
  const tok = (type: Token['type'], v: string): Token => ({ type, value: v, start: at.start, end: at.end });
  if (value === null) return [tok('word', 'NULL')];
  if (typeof value === 'boolean') return [tok('word', value ? 'TRUE' : 'FALSE')];
  if (typeof value === 'string') return [tok('string', value)];
  // the literal text goes through untouched; no round trip through a double
  const { text } = value;
  if (text.startsWith('-')) return [tok('op', '('), tok('op', '-'), tok('number', text.slice(1)), tok('op', ')')];
  return [tok('number', text)];
}

export const hasVariables = (tokens: Token[]): boolean => tokens.some((t) => t.type === 'variable');

export function substituteVariables(sql: string, session: SessionContext, tokens: Token[] = tokenize(sql)): SubstitutedTokens {
  const consumed = new Set<string>();
  const out: Token[] = [];
  for (const t of tokens) {
    if (t.type !== 'variable') {
      out.push(t);
      continue;
    }
    const value = session.substituteVariable(t.value);
    consumed.add(session.fold({ name: t.value, quoted: false }));
    out.push(...literalTokens(value, t));
  }
  return { tokens: out, consumed };
}
