/**
 * Retry policy shared by the provider client, the renewal path and the dispatcher.
 *
 * Delay before retry n (1-based) is `baseDelayMs * 2^(n-1)`, capped at `maxDelayMs`,
 * then reduced by up to `jitter` (a fraction in [0, 1]) at random.
 */

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
  isRetryable: (error: unknown) => boolean;
  random?: () => number;
}

export interface RetryInfo {
  attempt: number;
  error: unknown;
  delayMs: number;
}

export interface RetryExecuteOptions {
  /** No retry is scheduled to start at or after this instant */
  deadline?: Date;
  signal?: AbortSignal;
  onRetry?: (info: RetryInfo) => void;
  /** Provider-supplied wait (e.g. Retry-After) that overrides the computed delay */
  delayHint?: (error: unknown) => number | undefined;
  now?: () => number;
}

export class RetryAbortedError extends Error {
  constructor(message: string = 'Retry aborted') {
    super(message);
    this.name = 'RetryAbortedError';
  }
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    if (options.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be at least 1');
    }
    if (options.jitter < 0 || options.jitter > 1) {
      throw new RangeError('jitter must be between 0 and 1');
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs;
    this.jitter = options.jitter;
    this.isRetryable = options.isRetryable;
    this.random = options.random ?? Math.random;
  }

  /**
   * Same policy with a different retryable predicate or attempt ceiling
   */
  with(overrides: Partial<RetryPolicyOptions>): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.baseDelayMs,
      maxDelayMs: this.maxDelayMs,
      jitter: this.jitter,
      isRetryable: this.isRetryable,
      random: this.random,
      ...overrides
    });
  }

  shouldRetry(error: unknown): boolean {
    return this.isRetryable(error);
  }

  delayFor(attempt: number): number {
    const exponential = this.baseDelayMs * 2 ** Math.max(0, attempt - 1);
    const capped = Math.min(exponential, this.maxDelayMs);
    return Math.round(capped * (1 - this.jitter * this.random()));
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryExecuteOptions = {}
  ): Promise<T> {
    const now = options.now ?? Date.now;

    for (let attempt = 1; ; attempt++) {
      if (options.signal?.aborted) {
        throw new RetryAbortedError();
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.isRetryable(error)) {
          throw error;
        }

        const hinted = options.delayHint?.(error);
        const delayMs = hinted !== undefined ? Math.min(hinted, this.maxDelayMs) : this.delayFor(attempt);

        if (options.deadline && now() + delayMs >= options.deadline.getTime()) {
          throw error;
        }

        options.onRetry?.({ attempt, error, delayMs });
        await sleep(delayMs, options.signal);
      }
    }
  }
}

/**
 * Promise-based delay that rejects with RetryAbortedError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new RetryAbortedError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new RetryAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
