import {
  ConversionToolsError,
  RateLimitError,
  RetryExhaustedError,
  ServerError,
  TransportError,
} from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { sleep as defaultSleep } from "./utils.js";

const MAX_JITTER_MS = 150;

export type RetryPolicyOptions = {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Whether a non-hard 429 may be retried. */
  retryRateLimited?: boolean;
  random?: () => number;
};

export type RetryDecision =
  | { action: "retry"; delayMs: number }
  | { action: "fail" }
  | { action: "exhausted" };

/**
 * Exponential backoff over classified errors: attempt `n` failing with a
 * transient error waits `baseDelayMs * 2^(n-1)` plus up to 150ms of jitter
 * (never more than the backoff itself), raised to any Retry-After the server
 * sent and capped at `maxDelayMs`.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly retryRateLimited: boolean;
  private readonly random: () => number;

  constructor(opts: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));
    this.baseDelayMs = Math.max(0, opts.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, opts.maxDelayMs);
    this.retryRateLimited = opts.retryRateLimited ?? true;
    this.random = opts.random ?? Math.random;
  }

  with(overrides: Partial<RetryPolicyOptions>): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      retryRateLimited: this.retryRateLimited,
      random: this.random,
      ...overrides,
    });
  }

  isRetryable(error: ConversionToolsError): boolean {
    if (error instanceof TransportError) return true;
    if (error instanceof ServerError) return true;
    if (error instanceof RateLimitError) {
      return this.retryRateLimited && !error.hard;
    }
    return false;
  }

  /** The deterministic part of the delay after failed attempt `attempt`. */
  backoffMs(attempt: number): number {
    return this.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  }

  delayMs(attempt: number, retryAfterMs?: number): number {
    const base = this.backoffMs(attempt);
    const jitter = Math.floor(this.random() * Math.min(base, MAX_JITTER_MS));
    return Math.min(this.maxDelayMs, Math.max(base + jitter, retryAfterMs ?? 0));
  }

  decide(error: ConversionToolsError, attempt: number): RetryDecision {
    if (!this.isRetryable(error)) return { action: "fail" };
    if (attempt >= this.maxAttempts) return { action: "exhausted" };

    const retryAfterMs =
      error instanceof RateLimitError ? error.retryAfterMs : undefined;
    return { action: "retry", delayMs: this.delayMs(attempt, retryAfterMs) };
  }
}

export type RetryState = {
  attempt: number;
  nextDelayMs: number;
  startedAt: number;
};

export type WithRetryOptions = {
  signal?: AbortSignal;
  logger?: Logger;
  label?: string;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: WithRetryOptions = {}
): Promise<T> {
  const logger = opts.logger ?? silentLogger;
  const sleep = opts.sleep ?? defaultSleep;
  const state: RetryState = {
    attempt: 0,
    nextDelayMs: 0,
    startedAt: performance.now(),
  };

  for (;;) {
    state.attempt += 1;

    try {
      return await operation(state.attempt);
    } catch (err) {
      if (!(err instanceof ConversionToolsError)) throw err;

      const decision = policy.decide(err, state.attempt);

      if (decision.action === "fail") throw err;

      if (decision.action === "exhausted") {
        throw new RetryExhaustedError({
          attempts: state.attempt,
          elapsedMs: performance.now() - state.startedAt,
          lastError: err,
        });
      }

      state.nextDelayMs = decision.delayMs;
      logger.warn("retrying request", {
        label: opts.label,
        attempt: state.attempt,
        delayMs: state.nextDelayMs,
        code: err.code,
        status: err.status,
      });

      await sleep(state.nextDelayMs, opts.signal);
    }
  }
}
