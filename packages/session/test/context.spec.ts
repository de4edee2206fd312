// packages/session/test/context.spec.ts
import { describe, it, expect } from 'vitest';
import { UndefinedVariableError, UnresolvedContextError } from '@frostbridge/core';
import { parseStatement } from '@frostbridge/sql';
import { SessionContext } from '../src';

const id = (name: string, quoted = false) => ({ name, quoted });

describe('SessionContext identifiers', () => {
  it('folds foo, FOO and "FOO" to one name but keeps "foo" apart', () => {
    const s = new SessionContext();
    const names = ['foo', 'FOO', '"FOO"', '"foo"'].map((r) => s.resolveIdentifier(r).name);
    expect(names).toEqual(['FOO', 'FOO', 'FOO', 'foo']);
  });

  it('keeps names as written under AS_WRITTEN', () => {
    const s = new SessionContext({ casePolicy: 'AS_WRITTEN' });
    expect(s.resolveIdentifier('Foo')).toEqual({ name: 'Foo', quoted: true });
  });

  it('qualifies one- and two-part table references', () => {
    const s = new SessionContext({ database: 'd', schema: 's' });
    expect(s.resolveTable([id('t')]).map((p) => p.name)).toEqual(['D', 'S', 'T']);
    expect(s.resolveTable([id('x'), id('t')]).map((p) => p.name)).toEqual(['D', 'X', 'T']);
    expect(s.resolveTable([id('a'), id('b'), id('c', true)]).map((p) => p.name)).toEqual(['A', 'B', 'c']);
  });

  it('fails when no namespace is current', () => {
    const s = new SessionContext();
    expect(() => s.resolveTable([id('t')])).toThrow(UnresolvedContextError);
    s.applySessionStatement('USE DATABASE d');
    s.applySessionStatement('DROP SCHEMA public');
    expect(() => s.resolveTable([id('t')])).toThrow(
      "Cannot resolve t: this session does not have a current schema. Call 'USE SCHEMA', or use a qualified name."
    );
  });

  it('leaves temporary tables unqualified until dropped', () => {
    const s = new SessionContext({ database: 'd', schema: 's' });
    s.applySessionStatement('CREATE TEMPORARY TABLE tmp (a INT)');
    expect(s.resolveTable([id('tmp')])).toEqual([{ name: 'TMP', quoted: true }]);
    s.applySessionStatement('DROP TABLE tmp');
    expect(s.resolveTable([id('tmp')]).map((p) => p.name)).toEqual(['D', 'S', 'TMP']);
  });
});

describe('SessionContext deltas', () => {
  it('USE DATABASE resets the schema to PUBLIC', () => {
    const s = new SessionContext({ database: 'a', schema: 'x' });
    expect(s.applySessionStatement('USE DATABASE b')).toEqual({ kind: 'use', database: 'B', schema: 'PUBLIC' });
    expect([s.database, s.schema]).toEqual(['B', 'PUBLIC']);
    s.applySessionStatement('USE SCHEMA c');
    expect([s.database, s.schema]).toEqual(['B', 'C']);
    s.applySessionStatement('USE e.f');
    expect([s.database, s.schema]).toEqual(['E', 'F']);
  });

  it('CREATE DATABASE makes the new database current', () => {
    const s = new SessionContext();
    s.applySessionStatement('CREATE DATABASE IF NOT EXISTS analytics');
    expect(s.snapshot()).toMatchObject({ database: 'ANALYTICS', schema: 'PUBLIC' });
  });

  it('DROP DATABASE clears the namespace only when it is current', () => {
    const s = new SessionContext({ database: 'd', schema: 's' });
    s.applySessionStatement('DROP DATABASE other');
    expect(s.database).toBe('D');
    s.applySessionStatement('DROP DATABASE d');
    expect([s.database, s.schema]).toEqual([undefined, undefined]);
  });

  it('SET and UNSET manage variables', () => {
    const s = new SessionContext();
    s.applySessionStatement("SET x = 'hello'");
    s.applySessionStatement('SET (n, f) = (-2, TRUE)');
    expect(s.substituteVariable('X')).toBe('hello');
    expect(s.snapshot().variables).toEqual({ F: true, N: { kind: 'number', text: '-2' }, X: 'hello' });
    s.applySessionStatement('UNSET x');
    expect(() => s.substituteVariable('x')).toThrow(UndefinedVariableError);
    expect(() => s.substituteVariable('x')).toThrow("Session variable '$X' does not exist");
  });

  it('keeps numeric values as the literal text', () => {
    const s = new SessionContext();
    s.applySessionStatement('SET (big, huge, neg) = (12345678901234567890, 1e400, -(-0.10))');
    expect(s.substituteVariable('big')).toEqual({ kind: 'number', text: '12345678901234567890' });
    expect(s.substituteVariable('huge')).toEqual({ kind: 'number', text: '1e400' });
    expect(s.substituteVariable('neg')).toEqual({ kind: 'number', text: '0.10' });
  });

  it('stores initial numbers as text and refuses non-finite ones', () => {
    expect(new SessionContext({ variables: { n: 42 } }).substituteVariable('N')).toEqual({ kind: 'number', text: '42' });
    expect(() => new SessionContext({ variables: { n: Number.POSITIVE_INFINITY } })).toThrow('Variable N must be a finite number');
  });

  it('rejects SET with a non-literal value', () => {
    const s = new SessionContext();
    expect(() => s.applySessionStatement('SET x = a + 1')).toThrow('SET only accepts literal values');
  });

  it('other statements produce no delta', () => {
    const s = new SessionContext({ database: 'd', schema: 's' });
    expect(s.deltaFor(parseStatement('SELECT 1'))).toEqual({ kind: 'none' });
    expect(s.cacheKey()).toBe('["UPPERCASE_UNQUOTED","D","S",null,null,[]]');
  });

  it('USE ROLE and USE WAREHOUSE set their fields', () => {
    const s = new SessionContext();
    s.applySessionStatement('USE ROLE analyst');
    s.applySessionStatement('USE WAREHOUSE wh');
    expect([s.role, s.warehouse]).toEqual(['ANALYST', 'WH']);
  });
});
