export type CounterStoreKind = 'supabase' | 'memory';

export type RuntimeConfig = {
  port: number;
  jwtSecret: string;
  allowedDomain: string;
  googleClientId?: string;
  geminiApiKey: string;
  geminiModel: string;
  counterStore: CounterStoreKind;
  supabaseUrl?: string;
  serviceRoleKey?: string;
  videoRateLimitPerHour: number;
  filePollIntervalMs: number;
  fileProcessingTimeoutMs: number;
  fileStatusTimeoutMs: number;
  generationTimeoutMs: number;
};

type Env = Record<string, string | undefined>;

let cachedConfig: RuntimeConfig | null = null;

const intFromEnv = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export function loadRuntimeConfig(env: Env): RuntimeConfig {
  const counterStore = parseCounterStore(env.RATE_LIMIT_STORE);
  return {
    port: intFromEnv(env, 'PORT', 8080),
    jwtSecret: mustGetEnv(env, 'JWT_SECRET'),
    allowedDomain: mustGetEnv(env, 'ALLOWED_DOMAIN').toLowerCase(),
    googleClientId: env.GOOGLE_CLIENT_ID || undefined,
    geminiApiKey: mustGetEnv(env, 'GEMINI_API_KEY'),
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    counterStore,
    supabaseUrl: counterStore === 'supabase' ? mustGetEnv(env, 'SUPABASE_URL') : env.SUPABASE_URL,
    serviceRoleKey: counterStore === 'supabase'
      ? mustGetEnv(env, 'SUPABASE_SERVICE_ROLE_KEY')
      : env.SUPABASE_SERVICE_ROLE_KEY,
    videoRateLimitPerHour: intFromEnv(env, 'VIDEO_RATE_LIMIT_PER_HOUR', 5),
    filePollIntervalMs: intFromEnv(env, 'FILE_POLL_INTERVAL_MS', 5000),
    fileProcessingTimeoutMs: intFromEnv(env, 'FILE_PROCESSING_TIMEOUT_MS', 5 * 60 * 1000),
    fileStatusTimeoutMs: intFromEnv(env, 'FILE_STATUS_TIMEOUT_MS', 15000),
    generationTimeoutMs: intFromEnv(env, 'GENERATION_TIMEOUT_MS', 120000),
  };
}

export function getRuntimeConfig(): RuntimeConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = loadRuntimeConfig(process.env);
  return cachedConfig;
}

function parseCounterStore(raw: string | undefined): CounterStoreKind {
  if (!raw) return 'supabase';
  if (raw === 'supabase' || raw === 'memory') return raw;
  throw new Error(`Unsupported RATE_LIMIT_STORE ${raw}`);
}

function mustGetEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable ${key}`);
  }
  return value;
}
