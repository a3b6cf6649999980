import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import { createApp } from './app.js';
import { MemoryCounterStore } from './counter-store.js';
import type { IdentityCheck } from './identity.js';
import type { Logger } from './logger.js';
import type { PipelineInput, PipelineOutcome } from './orchestrator.js';
import { RateLimiter } from './rate-limit.js';
import { SessionTokens } from './session.js';

const user = { id: 'google-123', email: 'teacher@example.edu', displayName: 'Test Teacher', photoURL: null };

const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

function setup(identityResult: IdentityCheck = { ok: true, user }) {
  const sessions = new SessionTokens({ jwtSecret: 'test-secret', allowedDomain: 'example.edu' });
  const rateLimiter = new RateLimiter(new MemoryCounterStore(), () => new Date('2024-05-01T14:20:00Z'));
  const pipelineInputs: PipelineInput[] = [];
  const bodies: unknown[] = [];
  const app = createApp({
    sessions,
    identity: { verify: async () => identityResult },
    rateLimiter,
    pipeline: {
      async run(input): Promise<PipelineOutcome> {
        pipelineInputs.push(input);
        bodies.push(await input.readBody());
        return { status: 429, body: { error: 'Rate limit exceeded', retry_after: 2400 }, state: 'RATE_LIMITED' };
      },
    },
    videoRateLimitPerHour: 5,
    logger: silentLogger,
  });
  return { app, sessions, rateLimiter, pipelineInputs, bodies };
}

const TokensBody = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expires_in: z.number(),
  user: z.unknown().optional(),
});

function postJson(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return { method: 'POST', headers: { 'Content-Type': 'application/json', ...headers }, body: JSON.stringify(body) };
}

test('health check reports the service and a correlation id', async () => {
  const { app } = setup();
  const res = await app.request('/');
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), {
    name: 'Lesson Analysis API',
    version: '1.0.0',
    status: 'healthy',
    runtime: 'node',
  });
  assert.match(res.headers.get('X-Correlation-Id') ?? '', /^[0-9a-f-]{36}$/);
});

test('unknown routes return 404 with the path', async () => {
  const { app } = setup();
  const res = await app.request('/nope');
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: 'Not found', path: '/nope' });
});

test('sign-in requires an id token', async () => {
  const { app } = setup();
  const res = await app.request('/auth/validate', postJson({}));
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), { error: 'Missing id_token' });
});

test('sign-in rejects bodies that are not JSON', async () => {
  const { app } = setup();
  const res = await app.request('/auth/validate', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: '{not json',
  });
  assert.equal(res.status, 400);
  assert.deepEqual(await res.json(), { error: 'Invalid JSON body' });
});

test('sign-in exchanges a Google identity for session tokens', async () => {
  const { app, sessions } = setup();
  const res = await app.request('/auth/validate', postJson({ id_token: 'google-id-token' }));
  assert.equal(res.status, 200);
  const body = TokensBody.parse(await res.json());
  assert.deepEqual(body.user, user);
  assert.equal(body.expires_in, 7 * 24 * 60 * 60);

  const check = await sessions.verify(`Bearer ${body.access_token}`);
  assert.equal(check.valid, true);
});

test('sign-in passes identity rejections through', async () => {
  const { app } = setup({ ok: false, status: 403, error: 'Access denied', message: 'Only @example.edu accounts are allowed' });
  const res = await app.request('/auth/validate', postJson({ id_token: 'google-id-token' }));
  assert.equal(res.status, 403);
  assert.deepEqual(await res.json(), { error: 'Access denied', message: 'Only @example.edu accounts are allowed' });
});

test('refresh issues a new access token for a valid refresh token', async () => {
  const { app, sessions } = setup();
  const issued = await sessions.issue(user);
  const res = await app.request('/auth/refresh', postJson({ refresh_token: issued.refresh_token }));
  assert.equal(res.status, 200);
  const body = TokensBody.parse(await res.json());
  assert.equal(body.refresh_token, issued.refresh_token);
  assert.equal((await sessions.verify(`Bearer ${body.access_token}`)).valid, true);
});

test('refresh rejects access tokens and garbage', async () => {
  const { app, sessions } = setup();
  const issued = await sessions.issue(user);
  for (const token of [issued.access_token, 'not-a-token']) {
    const res = await app.request('/auth/refresh', postJson({ refresh_token: token }));
    assert.equal(res.status, 401);
    assert.deepEqual(await res.json(), { error: 'Invalid or expired refresh token' });
  }
});

test('rate limit status requires a session', async () => {
  const { app } = setup();
  const res = await app.request('/analyze/video/rate-limit');
  assert.equal(res.status, 401);
  assert.deepEqual(await res.json(), { error: 'Missing or invalid Authorization header' });
});

test('rate limit status reports usage for the current hour', async () => {
  const { app, sessions, rateLimiter } = setup();
  const { access_token } = await sessions.issue(user);
  await rateLimiter.commit('google-123', 'video');
  await rateLimiter.commit('google-123', 'video');

  const res = await app.request('/analyze/video/rate-limit', {
    headers: { Authorization: `Bearer ${access_token}` },
  });
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), { used: 2, limit: 5, remaining: 3, resets_in: 2400 });
});

test('video analysis responses come from the pipeline', async () => {
  const { app, pipelineInputs, bodies } = setup();
  const request = { geminiFileName: 'files/abc123', techniques: [] };
  const res = await app.request('/analyze/video', postJson(request, { Authorization: 'Bearer some-token' }));

  assert.equal(res.status, 429);
  assert.deepEqual(await res.json(), { error: 'Rate limit exceeded', retry_after: 2400 });
  assert.equal(pipelineInputs.length, 1);
  assert.equal(pipelineInputs[0].authorization, 'Bearer some-token');
  assert.equal(pipelineInputs[0].correlationId, res.headers.get('X-Correlation-Id'));
  assert.deepEqual(bodies, [request]);
});
