import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createClient } from '@supabase/supabase-js';
import { createApp } from './app.js';
import { getRuntimeConfig, type RuntimeConfig } from './config.js';
import { MemoryCounterStore, SupabaseCounterStore, type CounterStore } from './counter-store.js';
import { GeminiFileClient, GeminiGenerationClient } from './gemini.js';
import { GoogleIdentityVerifier } from './identity.js';
import { createLogger } from './logger.js';
import { VideoAnalysisPipeline } from './orchestrator.js';
import { RateLimiter } from './rate-limit.js';
import { ReadinessPoller } from './readiness.js';
import { SessionTokens } from './session.js';

const COUNTER_RPC_TIMEOUT_MS = 5000;

const config = getRuntimeConfig();
const logger = createLogger('analysis-gateway');

function createCounterStore(runtime: RuntimeConfig): CounterStore {
  if (runtime.counterStore === 'memory' || !runtime.supabaseUrl || !runtime.serviceRoleKey) {
    logger.warn('Using in-memory rate counters; quotas reset on restart and are not shared between instances');
    return new MemoryCounterStore();
  }
  const supabase = createClient(runtime.supabaseUrl, runtime.serviceRoleKey, {
    auth: { autoRefreshToken: false, persistSession: false },
    global: {
      headers: { 'X-Client-Info': 'lesson-analysis-gateway/1.0.0' },
      fetch: (input, init) => fetch(input, { ...init, signal: AbortSignal.timeout(COUNTER_RPC_TIMEOUT_MS) }),
    },
  });
  return new SupabaseCounterStore(supabase);
}

const sessions = new SessionTokens(config);
const rateLimiter = new RateLimiter(createCounterStore(config));
const files = new GeminiFileClient(config.geminiApiKey, config.fileStatusTimeoutMs);
const generator = new GeminiGenerationClient(config.geminiApiKey, config.geminiModel, config.generationTimeoutMs);
const pollerLogger = createLogger('readiness-poller');
const poller = new ReadinessPoller(files, {
  intervalMs: config.filePollIntervalMs,
  timeoutMs: config.fileProcessingTimeoutMs,
  onTransition: (state) => pollerLogger.debug('Readiness transition', { status: state.status, polls: state.polls }),
});

const pipeline = new VideoAnalysisPipeline({
  sessions,
  rateLimiter,
  poller,
  files,
  generator,
  videoRateLimitPerHour: config.videoRateLimitPerHour,
  logger: createLogger('analyze-video'),
});

const app = createApp({
  sessions,
  identity: new GoogleIdentityVerifier(config),
  rateLimiter,
  pipeline,
  videoRateLimitPerHour: config.videoRateLimitPerHour,
  logger,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info('Server listening', { port: info.port, model: config.geminiModel });
});
