import { config } from '../config.js';
import {
  isRetryable,
  type RetryableError,
  ValidationError,
  WaitTimeoutError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Upper bound on the pause between attempts. */
export const MAX_POLL_INTERVAL_MS = 1_000;

export type AttemptOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'retryable'; error: RetryableError }
  | { status: 'fatal'; error: unknown };

export type SyncState<T> =
  | { phase: 'polling'; attempts: number; lastError?: RetryableError }
  | { phase: 'succeeded'; attempts: number; value: T }
  | { phase: 'failed'; attempts: number; error: unknown };

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export interface SynchronizerOptions {
  defaultWaitMs?: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((r) => setTimeout(r, ms)),
};

async function attempt<T>(fn: () => Promise<T>): Promise<AttemptOutcome<T>> {
  try {
    return { status: 'success', value: await fn() };
  } catch (err) {
    if (isRetryable(err)) return { status: 'retryable', error: err };
    return { status: 'fatal', error: err };
  }
}

/**
 * Single decision point of the retry loop. Only a `polling` state can move;
 * terminal states are returned unchanged.
 */
export function nextState<T>(
  state: SyncState<T>,
  outcome: AttemptOutcome<T>,
  now: number,
  deadline: number,
  timeoutMs: number,
): SyncState<T> {
  if (state.phase !== 'polling') return state;
  const attempts = state.attempts + 1;

  switch (outcome.status) {
    case 'success':
      return { phase: 'succeeded', attempts, value: outcome.value };
    case 'fatal':
      return { phase: 'failed', attempts, error: outcome.error };
    case 'retryable':
      if (now >= deadline) {
        return {
          phase: 'failed',
          attempts,
          error: new WaitTimeoutError(timeoutMs, attempts, outcome.error),
        };
      }
      return { phase: 'polling', attempts, lastError: outcome.error };
  }
}

export class Synchronizer {
  readonly defaultWaitMs: number;
  readonly pollIntervalMs: number;
  private readonly clock: Clock;

  constructor(options: SynchronizerOptions = {}) {
    const defaultWaitMs = options.defaultWaitMs ?? config.defaultWaitMs;
    const pollIntervalMs = options.pollIntervalMs ?? config.pollIntervalMs;

    if (!Number.isFinite(defaultWaitMs) || defaultWaitMs < 0) {
      throw new ValidationError(`Default wait must be a non-negative number, got ${defaultWaitMs}`);
    }
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0 || pollIntervalMs > MAX_POLL_INTERVAL_MS) {
      throw new ValidationError(
        `Poll interval must be within (0, ${MAX_POLL_INTERVAL_MS}]ms, got ${pollIntervalMs}`,
      );
    }

    this.defaultWaitMs = defaultWaitMs;
    this.pollIntervalMs = pollIntervalMs;
    this.clock = options.clock ?? systemClock;
  }

  /** An absent or zero wait falls back to the default. */
  resolveWait(wait?: number): number {
    return wait === undefined || wait === 0 ? this.defaultWaitMs : wait;
  }

  /**
   * Invoke `fn` until it resolves, a non-retryable error is thrown, or
   * `timeoutMs` has elapsed. `fn` always runs at least once.
   */
  async synchronize<T>(timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new ValidationError(`Wait time must be a non-negative number, got ${timeoutMs}`);
    }

    const deadline = this.clock.now() + timeoutMs;
    let state: SyncState<T> = { phase: 'polling', attempts: 0 };

    for (;;) {
      const outcome = await attempt(fn);
      const now = this.clock.now();
      state = nextState(state, outcome, now, deadline, timeoutMs);

      switch (state.phase) {
        case 'succeeded':
          return state.value;
        case 'failed':
          if (state.error instanceof WaitTimeoutError) {
            logger.debug(
              { timeoutMs, attempts: state.attempts, error: state.error.lastError.message },
              'Gave up waiting',
            );
          }
          throw state.error;
        case 'polling':
          logger.debug(
            { attempt: state.attempts, error: state.lastError?.message },
            'Retrying after transient failure',
          );
          await this.clock.sleep(Math.min(this.pollIntervalMs, deadline - now));
      }
    }
  }
}
