// apps/http/test/app.spec.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { loadConfig } from '@frostbridge/core';
import { buildApp } from '../src';

type App = Awaited<ReturnType<typeof buildApp>>;

const quiet = pino({ level: 'silent' });

describe('diagnostic translation service', () => {
  let app: App;

  beforeEach(async () => {
    app = await buildApp(loadConfig({}), { logger: quiet });
  });

  afterEach(async () => {
    await app.close();
  });

  const createSession = async (body: Record<string, unknown> = { database: 'd', schema: 's' }): Promise<string> => {
    const res = await app.inject({ method: 'POST', url: '/sessions', payload: body });
    expect(res.statusCode).toBe(201);
    return res.json().id;
  };

  describe('health and headers', () => {
    it('answers /healthz with an x-request-id', async () => {
      const res = await app.inject({ method: 'GET', url: '/healthz' });
      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ ok: true, cache: { size: 0, hits: 0, misses: 0 }, sessions: 0 });
      expect(res.headers['x-request-id']).toMatch(/^req-[a-z0-9]+$/);
    });

    it('sends x-request-id on errors too, matching the body', async () => {
      const res = await app.inject({ method: 'GET', url: '/sessions/nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json().requestId).toBe(res.headers['x-request-id']);
    });
  });

  describe('sessions', () => {
    it('creates a session with folded names', async () => {
      const res = await app.inject({ method: 'POST', url: '/sessions', payload: { database: 'd', schema: 's' } });
      expect(res.statusCode).toBe(201);
      expect(res.json().session).toEqual({
        casePolicy: 'UPPERCASE_UNQUOTED',
        database: 'D',
        schema: 'S',
        variables: {},
        tempTables: []
      });
    });

    it('accepts an empty body', async () => {
      const res = await app.inject({ method: 'POST', url: '/sessions' });
      expect(res.statusCode).toBe(201);
      expect(res.json().session).toEqual({ casePolicy: 'UPPERCASE_UNQUOTED', variables: {}, tempTables: [] });
    });

    it('rejects an unknown case policy', async () => {
      const res = await app.inject({ method: 'POST', url: '/sessions', payload: { casePolicy: 'lower' } });
      expect(res.statusCode).toBe(400);
      expect(res.json().code).toBe('VALIDATION');
      expect(res.json().details[0]).toMatchObject({ path: 'casePolicy', code: 'invalid_enum_value' });
    });

    it('deletes a session', async () => {
      const id = await createSession();
      expect((await app.inject({ method: 'DELETE', url: `/sessions/${id}` })).statusCode).toBe(204);
      const res = await app.inject({ method: 'GET', url: `/sessions/${id}` });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toMatchObject({ code: 'SESSION_NOT_FOUND', message: `Session ${id} does not exist` });
    });
  });

  describe('POST /sessions/:id/translate', () => {
    it('translates a script and applies its session changes in order', async () => {
      const id = await createSession();
      const res = await app.inject({
        method: 'POST',
        url: `/sessions/${id}/translate`,
        payload: { sql: 'USE SCHEMA other; SELECT * FROM t' }
      });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body.statements).toHaveLength(2);
      expect(body.statements[0]).toMatchObject({
        statementKind: 'session',
        mutatedSession: { kind: 'use', database: 'D', schema: 'OTHER' }
      });
      expect(body.statements[1]).toMatchObject({
        text: 'SELECT * FROM t',
        emittedSql: 'SELECT * FROM D.OTHER.T',
        statementKind: 'query',
        consumedVariables: []
      });
      expect(body.session.schema).toBe('OTHER');

      const again = await app.inject({ method: 'GET', url: `/sessions/${id}` });
      expect(again.json().session.schema).toBe('OTHER');
    });

    it('reports variables a statement consumed', async () => {
      const id = await createSession();
      const res = await app.inject({
        method: 'POST',
        url: `/sessions/${id}/translate`,
        payload: { sql: "SET x = 'hello'; SELECT $x" }
      });
      expect(res.json().statements[1]).toMatchObject({ emittedSql: "SELECT 'hello'", consumedVariables: ['X'] });
    });

    it('maps unknown functions to 422 with the name and arity', async () => {
      const id = await createSession();
      const res = await app.inject({ method: 'POST', url: `/sessions/${id}/translate`, payload: { sql: 'SELECT frobnicate(1)' } });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toMatchObject({
        code: 'UNSUPPORTED_FUNCTION',
        message: 'Unsupported function FROBNICATE with 1 argument',
        details: { name: 'FROBNICATE', arity: 1 }
      });
    });

    it('maps missing context to 422', async () => {
      const id = await createSession({});
      const res = await app.inject({ method: 'POST', url: `/sessions/${id}/translate`, payload: { sql: 'SELECT * FROM t' } });
      expect(res.statusCode).toBe(422);
      expect(res.json().code).toBe('UNRESOLVED_CONTEXT');
    });

    it('validates the body', async () => {
      const id = await createSession();
      const res = await app.inject({ method: 'POST', url: `/sessions/${id}/translate`, payload: {} });
      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({
        code: 'VALIDATION',
        details: [{ path: 'sql', msg: 'Required', code: 'invalid_type' }]
      });
    });

    it('returns 404 for an unknown session', async () => {
      const res = await app.inject({ method: 'POST', url: '/sessions/nope/translate', payload: { sql: 'SELECT 1' } });
      expect(res.statusCode).toBe(404);
      expect(res.json().code).toBe('SESSION_NOT_FOUND');
    });
  });

  describe('POST /shape', () => {
    it('shapes native columns with declared lengths', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/shape',
        payload: {
          database: 'd',
          schema: 's',
          columns: [{ name: 'NAME', type: 'VARCHAR', nullable: true, table: 'T' }],
          lengths: { NAME: 10 }
        }
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().columns[0]).toMatchObject({
        name: 'NAME',
        database: 'D',
        schema: 'S',
        table: 'T',
        displayType: 'VARCHAR(10)',
        length: 10,
        byteLength: 40
      });
    });

    it('refuses target types with no source form', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/shape',
        payload: { columns: [{ name: 'G', type: 'GEOMETRY', nullable: true }] }
      });
      expect(res.statusCode).toBe(422);
      expect(res.json().code).toBe('TYPE_MAPPING');
    });
  });

  it('lists the function catalog', async () => {
    const res = await app.inject({ method: 'GET', url: '/functions' });
    expect(res.statusCode).toBe(200);
    expect(res.json().functions).toContainEqual({ name: 'NVL', arity: '2', strategy: 'rename', target: 'coalesce' });
  });
});

describe('rate limiting', () => {
  it('rejects requests over the configured limit', async () => {
    const app = await buildApp(loadConfig({ RATE_LIMIT_MAX: '2' }), { logger: quiet });
    try {
      for (let i = 0; i < 2; i++) expect((await app.inject({ method: 'GET', url: '/healthz' })).statusCode).toBe(200);
      const res = await app.inject({ method: 'GET', url: '/healthz' });
      expect(res.statusCode).toBe(429);
    } finally {
      await app.close();
    }
  });
});
