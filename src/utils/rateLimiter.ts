import { createLogger, type Logger } from './logger';

/**
 * Paces callers so that consecutive slots are at least 1/requestsPerSecond
 * apart. Callers queue on a promise chain, so the read-sleep-update sequence
 * runs for one caller at a time.
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly logger: Logger;
  private lastSlotAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(requestsPerSecond: number, logger?: Logger) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new RangeError(`requestsPerSecond must be a positive number, got ${requestsPerSecond}`);
    }

    this.minIntervalMs = 1000 / requestsPerSecond;
    this.logger = logger ?? createLogger('rate-limiter');
  }

  /**
   * Resolves once the caller may issue its request.
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForSlot());
    this.queue = turn;
    return turn;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastSlotAt !== null) {
      const elapsed = Date.now() - this.lastSlotAt;

      if (elapsed < this.minIntervalMs) {
        const waitMs = Math.ceil(this.minIntervalMs - elapsed);
        this.logger.debug({ waitMs }, 'Rate limiting: sleeping');
        await new Promise(resolve => setTimeout(resolve, waitMs));
      }
    }

    this.lastSlotAt = Date.now();
  }
}
