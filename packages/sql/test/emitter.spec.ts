// packages/sql/test/emitter.spec.ts
import { describe, it, expect } from 'vitest';
import { UnsupportedSyntaxError } from '@frostbridge/core';
import { Emitter, parseStatement, quoteString, bin, col, lit } from '../src';

const upper = new Emitter({ casePolicy: 'UPPERCASE_UNQUOTED' });
const asWritten = new Emitter({ casePolicy: 'AS_WRITTEN' });

const roundTrip = (sql: string): string => upper.statement(parseStatement(sql));

describe('Emitter', () => {
  it('folds unquoted names and quotes only when needed', () => {
    expect(upper.ident({ name: 'orders', quoted: false })).toBe('ORDERS');
    expect(upper.ident({ name: 'order', quoted: false })).toBe('"ORDER"');
    expect(upper.ident({ name: 'mixed', quoted: true })).toBe('"mixed"');
    expect(asWritten.ident({ name: 'mixed', quoted: false })).toBe('mixed');
    expect(asWritten.ident({ name: 'a b', quoted: true })).toBe('"a b"');
  });

  it('escapes strings, switching to E-strings for backslashes', () => {
    expect(quoteString("it's")).toBe("'it''s'");
    expect(quoteString('a\\b')).toBe("E'a\\\\b'");
  });

  it('parenthesizes by precedence and associativity', () => {
    expect(upper.expr(bin('*', bin('+', col('a'), col('b')), col('c')))).toBe('(A + B) * C');
    expect(upper.expr(bin('-', col('a'), bin('-', col('b'), col('c'))))).toBe('A - (B - C)');
    expect(upper.expr(bin('-', bin('-', col('a'), col('b')), col('c')))).toBe('A - B - C');
    expect(upper.expr(bin('AND', bin('OR', col('a'), col('b')), col('c')))).toBe('(A OR B) AND C');
  });

  it('never glues two minus signs into a comment', () => {
    expect(upper.expr({ kind: 'unary', op: '-', expr: { kind: 'unary', op: '-', expr: lit.num(1) } })).toBe('- -1');
  });

  it('prints casts in function form', () => {
    expect(roundTrip('SELECT a::NUMBER(10,2)')).toBe('SELECT CAST(A AS NUMBER(10,2))');
  });

  it('prints negated predicates', () => {
    expect(roundTrip('SELECT * FROM t WHERE NOT a IN (1, 2) AND b NOT BETWEEN 1 AND 2')).toBe(
      'SELECT * FROM T WHERE NOT A IN (1, 2) AND B NOT BETWEEN 1 AND 2'
    );
  });

  it('prints MINUS as EXCEPT', () => {
    expect(roundTrip('SELECT a FROM t MINUS SELECT a FROM u')).toBe('SELECT A FROM T EXCEPT SELECT A FROM U');
  });

  it('prints windows, lambdas and intervals', () => {
    expect(roundTrip('SELECT a FROM t QUALIFY row_number() OVER (PARTITION BY b ORDER BY c DESC) = 1')).toBe(
      'SELECT A FROM T QUALIFY row_number() OVER (PARTITION BY B ORDER BY C DESC) = 1'
    );
    expect(roundTrip('SELECT list_transform(l, x -> x + 1)')).toBe('SELECT list_transform(L, X -> X + 1)');
    expect(roundTrip("SELECT d + INTERVAL '3' DAY")).toBe("SELECT D + INTERVAL '3' DAY");
  });

  it('prints DDL with constraints', () => {
    expect(
      roundTrip("CREATE TABLE IF NOT EXISTS d.s.t (id NUMBER(38,0) NOT NULL, name VARCHAR(10) DEFAULT 'x')")
    ).toBe("CREATE TABLE IF NOT EXISTS D.S.T (ID NUMBER(38,0) NOT NULL, NAME VARCHAR(10) DEFAULT 'x')");
  });

  it('prints native MERGE with unqualified SET targets', () => {
    expect(
      roundTrip(
        'MERGE INTO t USING s ON t.id = s.id WHEN MATCHED THEN UPDATE SET t.v = s.v WHEN NOT MATCHED THEN INSERT (id, v) VALUES (s.id, s.v)'
      )
    ).toBe(
      'MERGE INTO T USING S ON T.ID = S.ID WHEN MATCHED THEN UPDATE SET V = S.V WHEN NOT MATCHED THEN INSERT (ID, V) VALUES (S.ID, S.V)'
    );
  });

  it('parses its own output back to the same text', () => {
    const once = roundTrip("SELECT CASE WHEN a > 0 THEN 'p' ELSE 'n' END AS k, count(DISTINCT b) FROM t GROUP BY ALL");
    expect(roundTrip(once)).toBe(once);
  });

  it('refuses nodes that have no DuckDB form', () => {
    expect(() => roundTrip('SELECT $x')).toThrow(UnsupportedSyntaxError);
    expect(() => roundTrip('SELECT TOP 5 a FROM t')).toThrow('TOP has no DuckDB form and must be rewritten before emission');
  });
});
