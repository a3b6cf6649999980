import type { CounterStore } from './counter-store.js';
import type { RateLimitStatus } from './types.js';

export type ResourceClass = 'text' | 'video';

export type RateDecision =
  | { allowed: true; current: number; checkedAt: Date }
  | { allowed: false; current: number; retryAfterSeconds: number };

const HOUR_MS = 60 * 60 * 1000;
const COUNTER_TTL_SECONDS = 60 * 60;

/** UTC hour bucket, e.g. `2024-05-01T14`. */
export function hourBucket(at: Date): string {
  return at.toISOString().slice(0, 13);
}

/** Whole seconds until the next UTC hour boundary, in [0, 3600). */
export function secondsUntilNextHour(at: Date): number {
  const intoHour = ((at.getTime() % HOUR_MS) + HOUR_MS) % HOUR_MS;
  return Math.floor(((HOUR_MS - intoHour) % HOUR_MS) / 1000);
}

export function rateLimitKey(principalId: string, resource: ResourceClass, at: Date): string {
  return `rate:${resource}:${principalId}:${hourBucket(at)}`;
}

/**
 * Hour-bucketed quota per principal and resource class.
 *
 * `check` and `commit` are separate round trips: a request only consumes quota
 * once its downstream work succeeded, at the cost of letting concurrent
 * requests from one user slip past the ceiling together.
 */
export class RateLimiter {
  constructor(
    private readonly store: CounterStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async check(principalId: string, resource: ResourceClass, limit: number): Promise<RateDecision> {
    const at = this.now();
    const current = await this.store.get(rateLimitKey(principalId, resource, at));
    if (current >= limit) {
      return { allowed: false, current, retryAfterSeconds: secondsUntilNextHour(at) };
    }
    return { allowed: true, current, checkedAt: at };
  }

  /** Charges the bucket of `checkedAt`, so a request admitted before an hour boundary is not billed to the next hour. */
  async commit(principalId: string, resource: ResourceClass, checkedAt: Date = this.now()): Promise<number> {
    return this.store.increment(rateLimitKey(principalId, resource, checkedAt), COUNTER_TTL_SECONDS);
  }

  async status(principalId: string, resource: ResourceClass, limit: number): Promise<RateLimitStatus> {
    const at = this.now();
    const used = await this.store.get(rateLimitKey(principalId, resource, at));
    return {
      used,
      limit,
      remaining: Math.max(0, limit - used),
      resets_in: secondsUntilNextHour(at),
    };
  }
}
