import type { SupabaseClient } from '@supabase/supabase-js';

/** Shared key/value counters that expire `ttlSeconds` after their last write. */
export interface CounterStore {
  get(key: string): Promise<number>;
  /** Atomically adds one and returns the new count. */
  increment(key: string, ttlSeconds: number): Promise<number>;
}

type RpcResult<T> = {
  data: T | null;
  error: { message: string } | null;
};

export class SupabaseCounterStore implements CounterStore {
  constructor(private readonly client: SupabaseClient) {}

  async get(key: string): Promise<number> {
    const { data, error } = await this.client.rpc('get_rate_counter', {
      p_key: key,
    }) as RpcResult<number | string>;

    if (error) {
      throw new Error(`get_rate_counter rpc failed: ${error.message}`);
    }
    return toCount(data);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const { data, error } = await this.client.rpc('increment_rate_counter', {
      p_key: key,
      p_ttl_seconds: ttlSeconds,
    }) as RpcResult<number | string>;

    if (error) {
      throw new Error(`increment_rate_counter rpc failed: ${error.message}`);
    }
    return toCount(data);
  }
}

export class MemoryCounterStore implements CounterStore {
  private readonly entries = new Map<string, { count: number; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<number> {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.now()) return 0;
    return entry.count;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const count = (await this.get(key)) + 1;
    this.entries.set(key, { count, expiresAt: this.now() + ttlSeconds * 1000 });
    return count;
  }
}

function toCount(value: number | string | null): number {
  const count = typeof value === 'number' ? value : Number(value ?? 0);
  return Number.isFinite(count) ? count : 0;
}
