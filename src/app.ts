import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { HttpError } from './errors.js';
import type { GoogleIdentityVerifier } from './identity.js';
import { describeError, type Logger } from './logger.js';
import type { VideoAnalysisPipeline } from './orchestrator.js';
import type { RateLimiter } from './rate-limit.js';
import type { SessionTokens } from './session.js';

export const SERVICE_NAME = 'Lesson Analysis API';
export const SERVICE_VERSION = '1.0.0';

export type AppDeps = {
  sessions: Pick<SessionTokens, 'verify' | 'issue' | 'refresh'>;
  identity: Pick<GoogleIdentityVerifier, 'verify'>;
  rateLimiter: RateLimiter;
  pipeline: Pick<VideoAnalysisPipeline, 'run'>;
  videoRateLimitPerHour: number;
  logger: Logger;
};

type AppEnv = { Variables: { correlationId: string } };

const ValidateBodySchema = z.object({ id_token: z.string().min(1) });
const RefreshBodySchema = z.object({ refresh_token: z.string().min(1) });

async function parseBody<T>(readBody: () => Promise<unknown>, schema: z.ZodType<T>, missing: string): Promise<T> {
  let raw: unknown;
  try {
    raw = await readBody();
  } catch {
    throw new HttpError(400, 'Invalid JSON body');
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new HttpError(400, missing);
  }
  return parsed.data;
}

export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const logger = deps.logger;

  app.use('*', cors({
    origin: '*',
    allowHeaders: ['Content-Type', 'Authorization'],
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    exposeHeaders: ['X-Correlation-Id'],
  }));

  app.use('*', async (c, next) => {
    const correlationId = randomUUID();
    c.set('correlationId', correlationId);
    await next();
    c.header('X-Correlation-Id', correlationId);
  });

  app.get('/', (c) => c.json({
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: 'healthy',
    runtime: 'node',
  }));

  app.post('/auth/validate', async (c) => {
    const { id_token } = await parseBody(() => c.req.json(), ValidateBodySchema, 'Missing id_token');
    const identity = await deps.identity.verify(id_token);
    if (!identity.ok) {
      logger.warn('Identity rejected', {
        correlationId: c.get('correlationId'),
        status: identity.status,
        reason: identity.error,
      });
      return c.json({ error: identity.error, message: identity.message }, identity.status);
    }
    const tokens = await deps.sessions.issue(identity.user);
    return c.json({ ...tokens, user: identity.user });
  });

  app.post('/auth/refresh', async (c) => {
    const { refresh_token } = await parseBody(() => c.req.json(), RefreshBodySchema, 'Missing refresh_token');
    const tokens = await deps.sessions.refresh(refresh_token);
    if (!tokens) {
      return c.json({ error: 'Invalid or expired refresh token' }, 401);
    }
    return c.json(tokens);
  });

  app.post('/analyze/video', async (c) => {
    const outcome = await deps.pipeline.run({
      authorization: c.req.header('Authorization'),
      readBody: () => c.req.json(),
      correlationId: c.get('correlationId'),
      signal: c.req.raw.signal,
    });
    return c.json(outcome.body, outcome.status);
  });

  app.get('/analyze/video/rate-limit', async (c) => {
    const auth = await deps.sessions.verify(c.req.header('Authorization'));
    if (!auth.valid) {
      return c.json({ error: auth.error }, 401);
    }
    const status = await deps.rateLimiter.status(auth.principal.id, 'video', deps.videoRateLimitPerHour);
    return c.json(status);
  });

  app.notFound((c) => c.json({ error: 'Not found', path: c.req.path }, 404));

  app.onError((err, c) => {
    if (err instanceof HttpError) {
      return c.json({ error: err.message, ...err.details }, err.status);
    }
    logger.error('Unhandled request error', {
      correlationId: c.get('correlationId'),
      path: c.req.path,
      error: describeError(err),
    });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
