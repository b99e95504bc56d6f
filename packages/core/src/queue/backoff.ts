/**
 * Exponential backoff with jitter for queue retries.
 */

/**
 * Backoff policy options
 */
export interface BackoffOptions {
  /** Delay before the first retry in ms (default: 1000) */
  baseDelayMs?: number;
  /** Growth factor per attempt (default: 2) */
  factor?: number;
  /** Delay ceiling in ms (default: 60000) */
  maxDelayMs?: number;
  /** Failed attempts before an item is dead-lettered (default: 8) */
  maxAttempts?: number;
  /** Fraction of the delay removed at random, 0-1 (default: 0.2) */
  jitter?: number;
  /** Random source in [0, 1) (default: Math.random) */
  random?: () => number;
}

/**
 * Retry schedule injected into the Sync Queue
 *
 * @example
 * ```typescript
 * const policy = new BackoffPolicy({ baseDelayMs: 500, maxAttempts: 5, jitter: 0 });
 * policy.delayFor(3); // 2000
 * ```
 */
export class BackoffPolicy {
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly maxDelayMs: number;
  readonly maxAttempts: number;
  readonly jitter: number;
  private readonly random: () => number;

  constructor(options: BackoffOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.factor = options.factor ?? 2;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.maxAttempts = options.maxAttempts ?? 8;
    this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0.2));
    this.random = options.random ?? Math.random;
  }

  /**
   * Delay before retrying after the `attempt`-th failure (1-based)
   */
  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const raw = Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(this.factor, exponent));
    return Math.round(raw * (1 - this.jitter * this.random()));
  }

  /**
   * Whether an item with this many failed attempts is out of retries
   */
  isExhausted(attemptCount: number): boolean {
    return attemptCount >= this.maxAttempts;
  }
}

/**
 * Build a policy from options, or pass an existing policy through
 */
export function createBackoffPolicy(options?: BackoffOptions | BackoffPolicy): BackoffPolicy {
  return options instanceof BackoffPolicy ? options : new BackoffPolicy(options);
}
