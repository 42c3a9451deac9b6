import { createLogger, type Logger } from './logger';
import { PermanentError, TransientError, errorMessage } from './errors';

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  factor?: number;
  jitter?: boolean;
  onRetry?: (error: TransientError, attempt: number, delay: number) => void;
  logger?: Logger;
}

/**
 * Retries an operation while it fails with a TransientError.
 *
 * Delay for retry n (0-based) is min(initialDelay * factor^n, maxDelay) plus
 * up to 10% jitter. A TransientError carrying retryAfterMs replaces the
 * computed delay. Any other error is rethrown untouched on the first attempt.
 */
export class RetryPolicy {
  private readonly maxRetries: number;
  private readonly initialDelay: number;
  private readonly maxDelay: number;
  private readonly factor: number;
  private readonly jitter: boolean;
  private readonly onRetry?: (error: TransientError, attempt: number, delay: number) => void;
  private readonly logger: Logger;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.initialDelay = options.initialDelay ?? 1000; // 1 second
    this.maxDelay = options.maxDelay ?? 30000; // 30 seconds
    this.factor = options.factor ?? 2;
    this.jitter = options.jitter !== false;
    this.onRetry = options.onRetry;
    this.logger = options.logger ?? createLogger('retry-policy');

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${options.maxRetries}`);
    }
  }

  calculateDelay(retryIndex: number, error?: TransientError): number {
    if (error?.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }

    const delay = Math.min(this.initialDelay * Math.pow(this.factor, retryIndex), this.maxDelay);
    const jitterAmount = this.jitter ? Math.random() * delay * 0.1 : 0;

    return Math.round(delay + jitterAmount);
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, context?: string): Promise<T> {
    let lastError: TransientError | undefined;

    for (let attempt = 1; attempt <= this.maxRetries + 1; attempt++) {
      try {
        const result = await fn(attempt);

        if (attempt > 1) {
          this.logger.info({ context, attempt }, 'Retry succeeded');
        }

        return result;
      } catch (error) {
        if (!(error instanceof TransientError)) {
          throw error;
        }
        lastError = error;

        if (attempt <= this.maxRetries) {
          const delay = this.calculateDelay(attempt - 1, error);

          this.logger.warn(
            { context, attempt, nextAttempt: attempt + 1, delay, status: error.status, error: error.message },
            'Operation failed, retrying'
          );

          this.onRetry?.(error, attempt, delay);
          await this.sleep(delay);
        }
      }
    }

    this.logger.error(
      { context, maxRetries: this.maxRetries, error: errorMessage(lastError) },
      'All retry attempts exhausted'
    );

    throw new PermanentError(
      `${context ?? 'operation'} failed after ${this.maxRetries + 1} attempts: ${errorMessage(lastError)}`,
      { cause: lastError, status: lastError?.status, code: 'RETRIES_EXHAUSTED' }
    );
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
