import { setTimeout as sleep } from "timers/promises";
import { ConfigurationError } from "../domain/errors/BrokerError.js";
import { throwIfCancelled } from "../domain/errors/cancellation.js";
import { isRetryableError } from "../domain/errors/classification.js";
import type { ILogger } from "../domain/ports/ILogger.js";

/** Returns a number in [0, 1) */
export type RandomSource = () => number;

export type RetryablePredicate = (error: unknown) => boolean;

export interface RetryAttempt {
  /** 1-indexed number of the attempt that just failed */
  attempt: number;
  maxRetries: number;
  /** Backoff before the next attempt */
  delayMs: number;
  error: unknown;
}

export interface RetryPolicyOptions {
  /** Extra attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Growth factor applied per attempt */
  multiplier: number;
  /** Defaults to isRetryableError */
  isRetryable?: RetryablePredicate;
  /** Called before every backoff sleep */
  onRetry?: (attempt: RetryAttempt) => void;
}

export const DEFAULT_RETRY_POLICY_OPTIONS: Readonly<RetryPolicyOptions> = Object.freeze({
  maxRetries: 3,
  baseDelayMs: 100,
  maxDelayMs: 10_000,
  multiplier: 2,
});

/** Jitter band applied to every computed delay: ±25% */
const JITTER_MIN = 0.75;
const JITTER_SPAN = 0.5;

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ConfigurationError for any invalid combination.
 */
export function createRetryPolicyOptions(
  overrides: Partial<RetryPolicyOptions> = {}
): Readonly<RetryPolicyOptions> {
  const options: RetryPolicyOptions = { ...DEFAULT_RETRY_POLICY_OPTIONS, ...overrides };

  if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
    throw new ConfigurationError("maxRetries must be a non-negative integer");
  }
  if (!Number.isFinite(options.baseDelayMs) || options.baseDelayMs < 0) {
    throw new ConfigurationError("baseDelayMs must be a non-negative number");
  }
  if (!Number.isFinite(options.maxDelayMs) || options.maxDelayMs < options.baseDelayMs) {
    throw new ConfigurationError("maxDelayMs must be >= baseDelayMs");
  }
  if (!Number.isFinite(options.multiplier) || options.multiplier < 1) {
    throw new ConfigurationError("multiplier must be >= 1");
  }

  return Object.freeze(options);
}

/**
 * Retries async operations with exponential backoff and jitter.
 *
 * Holds no per-call state, so one instance can serve any number of concurrent
 * operations. The last error is rethrown unchanged once retries run out or the
 * predicate rejects it; cancellation always wins over retrying.
 */
export class RetryPolicy {
  readonly options: Readonly<RetryPolicyOptions>;
  private readonly logger: ILogger;
  private readonly isRetryable: RetryablePredicate;

  constructor(
    options: Partial<RetryPolicyOptions>,
    logger: ILogger,
    private readonly random: RandomSource = Math.random
  ) {
    this.options = createRetryPolicyOptions(options);
    this.logger = logger.child({ component: "RetryPolicy" });
    this.isRetryable = this.options.isRetryable ?? isRetryableError;
  }

  async execute<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (typeof operation !== "function") {
      throw new TypeError("operation must be a function");
    }

    let attempt = 0;
    for (;;) {
      signal?.throwIfAborted();

      try {
        return await operation();
      } catch (error) {
        throwIfCancelled(error, signal);
        attempt++;

        const message = error instanceof Error ? error.message : String(error);
        if (!this.isRetryable(error) || attempt > this.options.maxRetries) {
          this.logger.warn("Operation failed, not retrying", {
            attempt,
            maxRetries: this.options.maxRetries,
            error: message,
          });
          throw error;
        }

        const delayMs = this.computeDelay(attempt);
        this.logger.warn("Operation failed, retrying", {
          attempt,
          maxRetries: this.options.maxRetries,
          delayMs,
          error: message,
        });
        this.options.onRetry?.({
          attempt,
          maxRetries: this.options.maxRetries,
          delayMs,
          error,
        });

        try {
          await sleep(delayMs, undefined, { signal });
        } catch (sleepError) {
          // surface signal.reason, same as an abort between attempts
          signal?.throwIfAborted();
          throw sleepError;
        }
      }
    }
  }

  /**
   * execute() for operations without a meaningful result
   */
  async executeVoid(operation: () => Promise<void>, signal?: AbortSignal): Promise<void> {
    if (typeof operation !== "function") {
      throw new TypeError("operation must be a function");
    }
    await this.execute(async () => {
      await operation();
      return true;
    }, signal);
  }

  /**
   * Backoff before retrying attempt `attempt` (1-indexed):
   * min(base * multiplier^(attempt-1), max), scaled by a factor in [0.75, 1.25).
   */
  computeDelay(attempt: number): number {
    const { baseDelayMs, maxDelayMs, multiplier } = this.options;
    if (baseDelayMs === 0) {
      return 0;
    }
    const exponential = baseDelayMs * Math.pow(multiplier, attempt - 1);
    // multiplier^n overflows to Infinity for large attempts
    const capped = Number.isFinite(exponential)
      ? Math.min(exponential, maxDelayMs)
      : maxDelayMs;
    const jittered = capped * (JITTER_MIN + this.random() * JITTER_SPAN);
    return Math.max(0, jittered);
  }
}
