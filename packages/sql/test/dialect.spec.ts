// packages/sql/test/dialect.spec.ts
import { describe, it, expect } from 'vitest';
import { checkSource } from '../src';

describe('checkSource', () => {
  it('counts the statements of well-formed Snowflake text', () => {
    expect(checkSource('SELECT a FROM t')).toEqual({ valid: true, statements: 1 });
    expect(checkSource('SELECT a FROM t; SELECT 1')).toEqual({ valid: true, statements: 2 });
  });

  it('accepts statements the translator does not cover', () => {
    expect(checkSource('TRUNCATE TABLE t')).toEqual({ valid: true, statements: 1 });
  });

  it('rejects malformed text with the grammar error', () => {
    const r = checkSource('SELECT (1');
    expect(r.valid).toBe(false);
    if (!r.valid) expect(r.error.length).toBeGreaterThan(0);
  });
});
