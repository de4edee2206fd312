// apps/http/src/app.ts
import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { z, ZodError } from 'zod';
import { CasePolicySchema, createLogger, isTranslationError, type FrostConfig, type Logger } from '@frostbridge/core';
import { listFunctions } from '@frostbridge/catalog';
import { Translator, type Translation } from '@frostbridge/rewriter';
import { SessionContext } from '@frostbridge/session';
import { shape } from '@frostbridge/shaper';
import { SessionNotFoundError, SessionRegistry } from './sessions';

const NumericTextSchema = z.object({
  kind: z.literal('number'),
  text: z.string().regex(/^-?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/)
});

// JSON numbers are accepted too; digits past double precision need the text form
const Scalar = z.union([z.string(), z.number().finite(), z.boolean(), z.null(), NumericTextSchema]);

const CreateSessionBody = z.object({
  database: z.string().min(1).optional(),
  schema: z.string().min(1).optional(),
  casePolicy: CasePolicySchema.optional(),
  variables: z.record(Scalar).optional()
});

const TranslateBody = z.object({ sql: z.string().min(1) });

const NativeColumnSchema = z.object({
  name: z.string(),
  type: z.string().min(1),
  nullable: z.boolean(),
  precision: z.number().int().nullable().optional(),
  scale: z.number().int().nullable().optional(),
  database: z.string().optional(),
  schema: z.string().optional(),
  table: z.string().optional()
});

const ShapeBody = z.object({
  columns: z.array(NativeColumnSchema),
  database: z.string().min(1).optional(),
  schema: z.string().min(1).optional(),
  /** declared VARCHAR/BINARY lengths by column name */
  lengths: z.record(z.number().int().positive()).optional()
});

const SessionParams = z.object({ id: z.string().min(1) });

interface ErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

const statusCodeOf = (e: unknown): number | undefined =>
  typeof e === 'object' && e !== null && 'statusCode' in e && typeof e.statusCode === 'number' ? e.statusCode : undefined;

const messageOf = (e: unknown): string =>
  e instanceof Error ? e.message
    : typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string' ? e.message
    : String(e);

export function classifyError(e: unknown): { status: number; body: ErrorBody } {
  if (e instanceof ZodError) {
    const details = e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
    return { status: 400, body: { code: 'VALIDATION', message: 'Invalid request', details } };
  }
  if (isTranslationError(e)) {
    return { status: 422, body: { code: e.code, message: e.message, ...(e.details ? { details: e.details } : {}) } };
  }
  if (e instanceof SessionNotFoundError) {
    return { status: 404, body: { code: e.code, message: e.message } };
  }
  // fastify's own rejections (bad JSON, oversized body, rate limit)
  const status = statusCodeOf(e);
  if (status !== undefined && status >= 400 && status < 500) {
    return { status, body: { code: status === 429 ? 'RATE_LIMITED' : 'BAD_REQUEST', message: messageOf(e) } };
  }
  return { status: 500, body: { code: 'INTERNAL', message: 'Request failed' } };
}

const translationView = (t: Translation) => ({
  text: t.text,
  emittedSql: t.emittedSql,
  statementKind: t.statementKind,
  consumedVariables: [...t.consumedVariables].sort(),
  ...(t.mutatedSession ? { mutatedSession: t.mutatedSession } : {}),
  metadataEffects: t.metadataEffects,
  ...(t.describe ? { describe: t.describe } : {}),
  trace: t.trace
});

export interface AppDeps {
  logger?: Logger;
  translator?: Translator;
}

/** Builds the diagnostic translation service without listening. */
export async function buildApp(config: FrostConfig, deps: AppDeps = {}) {
  const logger = deps.logger ?? createLogger('http');
  const translator = deps.translator ?? Translator.fromConfig(config, logger);
  const sessions = new SessionRegistry();

  const app = Fastify({ logger, bodyLimit: 1_000_000 });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.http.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.http.rateLimitMax,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { status, body } = classifyError(err);
    if (status >= 500) req.log.error({ err }, 'request-error');
    else req.log.info({ code: body.code }, 'request-rejected');
    return reply.status(status).send({ ...body, requestId: req.id });
  });

  app.post('/sessions', async (req, reply) => {
    const init = CreateSessionBody.parse(req.body ?? {});
    const { id, session } = sessions.create(init);
    return reply.status(201).send({ id, session: session.snapshot() });
  });

  app.get('/sessions/:id', async (req) => {
    const { id } = SessionParams.parse(req.params);
    return { id, session: sessions.get(id).snapshot() };
  });

  app.delete('/sessions/:id', async (req, reply) => {
    const { id } = SessionParams.parse(req.params);
    sessions.delete(id);
    return reply.status(204).send();
  });

  app.post('/sessions/:id/translate', async (req) => {
    const { id } = SessionParams.parse(req.params);
    const session = sessions.get(id);
    const { sql } = TranslateBody.parse(req.body);
    const statements = translator.translateScript(sql, session).map(translationView);
    return { statements, session: session.snapshot() };
  });

  app.post('/shape', async (req) => {
    const body = ShapeBody.parse(req.body);
    const session = new SessionContext({
      ...(body.database ? { database: body.database } : {}),
      ...(body.schema ? { schema: body.schema } : {})
    });
    const lengths = new Map(Object.entries(body.lengths ?? {}));
    return { columns: shape(body.columns, session, lengths) };
  });

  app.get('/functions', async () => ({ functions: listFunctions() }));

  app.get('/healthz', async () => ({ ok: true, cache: translator.cacheStats(), sessions: sessions.size }));

  return app;
}
