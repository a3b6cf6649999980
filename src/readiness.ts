import { setTimeout as delay } from 'node:timers/promises';
import {
  ProcessingCancelledError,
  ProcessingFailedError,
  ProcessingTimedOutError,
} from './errors.js';
import type { ArtifactMetadata } from './types.js';

export type ReadinessState =
  | { status: 'PENDING'; polls: number; startedAt?: number }
  | { status: 'PROCESSING'; polls: number; startedAt: number }
  | { status: 'ACTIVE'; polls: number; file: ArtifactMetadata }
  | { status: 'FAILED'; polls: number; file: ArtifactMetadata }
  | { status: 'TIMED_OUT'; polls: number; elapsedMs: number }
  | { status: 'CANCELLED'; polls: number };

export type ReadinessEvent =
  | { type: 'STATUS_RECEIVED'; file: ArtifactMetadata; at: number }
  | { type: 'INTERVAL_ELAPSED'; at: number }
  | { type: 'CANCELLED' };

export const INITIAL_READINESS_STATE: ReadinessState = { status: 'PENDING', polls: 0 };

/**
 * PENDING means a status query is due, PROCESSING means the last query said
 * "not yet" and the poll interval is running. The deadline is measured from the
 * first query and checked once each interval has elapsed, so no query is ever
 * issued after it.
 */
export function transitionReadiness(
  current: ReadinessState,
  event: ReadinessEvent,
  timeoutMs: number,
): ReadinessState {
  switch (current.status) {
    case 'PENDING':
      if (event.type === 'CANCELLED') return { status: 'CANCELLED', polls: current.polls };
      if (event.type === 'STATUS_RECEIVED') {
        const polls = current.polls + 1;
        const startedAt = current.startedAt ?? event.at;
        if (event.file.state === 'ACTIVE') return { status: 'ACTIVE', polls, file: event.file };
        if (event.file.state === 'FAILED') return { status: 'FAILED', polls, file: event.file };
        return { status: 'PROCESSING', polls, startedAt };
      }
      break;
    case 'PROCESSING':
      if (event.type === 'CANCELLED') return { status: 'CANCELLED', polls: current.polls };
      if (event.type === 'INTERVAL_ELAPSED') {
        const elapsedMs = event.at - current.startedAt;
        if (elapsedMs >= timeoutMs) {
          return { status: 'TIMED_OUT', polls: current.polls, elapsedMs };
        }
        return { status: 'PENDING', polls: current.polls, startedAt: current.startedAt };
      }
      break;
    case 'ACTIVE':
    case 'FAILED':
    case 'TIMED_OUT':
    case 'CANCELLED':
      return current;
  }
  return current;
}

export interface FileStatusSource {
  getFile(name: string, signal?: AbortSignal): Promise<ArtifactMetadata>;
}

export type PollerOptions = {
  intervalMs: number;
  timeoutMs: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onTransition?: (state: ReadinessState) => void;
};

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal });
};

export class ReadinessPoller {
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(
    private readonly files: FileStatusSource,
    private readonly options: PollerOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Resolves with the artifact once it is ACTIVE; status query errors propagate as-is. */
  async awaitReady(name: string, signal?: AbortSignal): Promise<ArtifactMetadata> {
    let state = INITIAL_READINESS_STATE;

    for (;;) {
      if (signal?.aborted) {
        state = this.advance(state, { type: 'CANCELLED' });
      }

      switch (state.status) {
        case 'ACTIVE':
          return state.file;
        case 'FAILED':
          throw new ProcessingFailedError(name);
        case 'TIMED_OUT':
          throw new ProcessingTimedOutError(name, state.elapsedMs);
        case 'CANCELLED':
          throw new ProcessingCancelledError(name);
        case 'PENDING': {
          const at = this.now();
          let file: ArtifactMetadata;
          try {
            file = await this.files.getFile(name, signal);
          } catch (error) {
            if (signal?.aborted) continue;
            throw error;
          }
          state = this.advance(state, { type: 'STATUS_RECEIVED', file, at });
          break;
        }
        case 'PROCESSING':
          try {
            await this.sleep(this.options.intervalMs, signal);
          } catch (error) {
            if (signal?.aborted) continue;
            throw error;
          }
          state = this.advance(state, { type: 'INTERVAL_ELAPSED', at: this.now() });
          break;
      }
    }
  }

  private advance(state: ReadinessState, event: ReadinessEvent): ReadinessState {
    const next = transitionReadiness(state, event, this.options.timeoutMs);
    if (next !== state) this.options.onTransition?.(next);
    return next;
  }
}
