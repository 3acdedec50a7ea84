import { RetryOptions } from '../types';
import { isRetryableError } from '../errors';

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
  label?: string;
}

export interface RetryPolicyOptions extends Partial<RetryOptions> {
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30_000
};

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retry policy applied at every scan and delete call site.
 * Backoff doubles from baseDelayMs per attempt and is capped at maxDelayMs.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = Math.max(1, Math.round(options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs);
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Delay before the retry that follows the given (1-based) attempt
   */
  delayFor(attempt: number): number {
    return Math.min(this.baseDelayMs * Math.pow(2, attempt - 1), this.maxDelayMs);
  }

  /**
   * Run the call, retrying retryable errors until attempts are exhausted.
   * The last error is rethrown unchanged.
   */
  async execute<T>(
    call: () => Promise<T>,
    label?: string,
    onRetry?: (info: RetryAttemptInfo) => void
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        return await call();
      } catch (error) {
        lastError = error;

        if (attempt === this.maxAttempts || !this.isRetryable(error)) {
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error, label });
        await this.sleep(delayMs);
      }
    }

    throw lastError;
  }
}
