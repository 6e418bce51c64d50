/**
 * Request throttling and retry for the WeChat client.
 *
 * A token bucket caps outgoing calls (5 per second by default); `withRetry`
 * backs off on quota errors and on "system busy" / 5xx answers, which the
 * caller tells apart through a classifier.
 */

/**
 * Token bucket. The bucket is topped up to `maxTokens` once per
 * `refillIntervalMs`; every API call takes one token first.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillIntervalMs: number;

  constructor(maxTokens = 5, refillIntervalMs = 1000) {
    this.maxTokens = maxTokens;
    this.refillIntervalMs = refillIntervalMs;
    this.tokens = maxTokens;
    this.lastRefill = Date.now();
  }

  /**
   * Acquire a single token, waiting if the bucket is empty.
   * After the wait the bucket is refilled and one token is consumed.
   */
  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens > 0) {
      this.tokens--;
      return;
    }
    const waitMs = this.refillIntervalMs - (Date.now() - this.lastRefill);
    if (waitMs > 0) {
      await sleep(waitMs);
    }
    this.refill();
    // Timer jitter can wake us just before the interval has elapsed.
    if (this.tokens <= 0) {
      await sleep(this.refillIntervalMs);
      this.refill();
    }
    this.tokens--;
  }

  /** Number of tokens currently available without waiting. */
  get availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();
    if (now - this.lastRefill >= this.refillIntervalMs) {
      this.tokens = this.maxTokens;
      this.lastRefill = now;
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// --- Exponential Backoff Retry ---

/** How a failed attempt should be treated. `undefined` means "do not retry". */
export type RetryClass = 'rate-limit' | 'transient' | undefined;

/** Retry limits and base delays, per error class. */
export interface RetryOptions {
  /** Maximum retries for rate-limit errors. Default: 4. */
  maxRateLimitRetries?: number;
  /** Maximum retries for transient errors (system busy, HTTP 5xx). Default: 3. */
  maxTransientRetries?: number;
  /** Base delay in ms before the first rate-limit retry. Default: 1000. */
  baseRateLimitDelayMs?: number;
  /** Base delay in ms before the first transient retry. Default: 2000. */
  baseTransientDelayMs?: number;
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRateLimitRetries: 4,
  maxTransientRetries: 3,
  baseRateLimitDelayMs: 1000,
  baseTransientDelayMs: 2000,
};

/** Exponential delay with 50–100% jitter. */
function backoffDelay(baseMs: number, attempt: number): number {
  return baseMs * Math.pow(2, attempt) * (0.5 + Math.random() * 0.5);
}

/**
 * Execute `fn` with exponential-backoff retry for retryable errors.
 *
 * - **rate-limit**: retries up to `maxRateLimitRetries` times with delays 1s, 2s, 4s, 8s ...
 * - **transient**: retries up to `maxTransientRetries` times with delays 2s, 4s, 8s ...
 * - anything else: rethrown immediately.
 *
 * @param fn - The async operation to execute.
 * @param classify - Decide whether a caught error is retryable.
 * @param options - Override default retry parameters.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  classify: (error: unknown) => RetryClass,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let rateLimitAttempts = 0;
  let transientAttempts = 0;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const kind = classify(error);

      if (kind === 'rate-limit' && rateLimitAttempts < opts.maxRateLimitRetries) {
        await sleep(backoffDelay(opts.baseRateLimitDelayMs, rateLimitAttempts));
        rateLimitAttempts++;
        continue;
      }

      if (kind === 'transient' && transientAttempts < opts.maxTransientRetries) {
        await sleep(backoffDelay(opts.baseTransientDelayMs, transientAttempts));
        transientAttempts++;
        continue;
      }

      throw error;
    }
  }
}
