import type { LogService } from "../log/types.mjs";

export interface IRequestRateLimiter {
  execute<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * Spaces outbound provider requests to a maximum number of calls per minute.
 * Callers queue and wait for their turn rather than being rejected.
 */
export class RequestRateLimiter implements IRequestRateLimiter {
  private readonly logService: LogService;
  private readonly minDelayMs: number;
  private lastExecutionTime: number | undefined;
  private readonly queue: (() => void)[] = [];
  private isProcessing = false;

  constructor({ logService, maxCallsPerMinute }: { logService: LogService; maxCallsPerMinute: number }) {
    this.logService = logService;
    this.minDelayMs = 60_000 / maxCallsPerMinute;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForTurn();
    return fn();
  }

  get pending(): number {
    return this.queue.length;
  }

  private async waitForTurn(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);

      if (!this.isProcessing) {
        void this.processQueue();
      }
    });
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessing || this.queue.length === 0) {
      return;
    }

    this.isProcessing = true;

    while (this.queue.length > 0) {
      const resolve = this.queue.shift();

      if (resolve) {
        const delayNeeded =
          this.lastExecutionTime === undefined
            ? 0
            : Math.max(0, this.minDelayMs - (Date.now() - this.lastExecutionTime));

        if (delayNeeded > 0) {
          this.logService.debug(
            `Delaying provider request by ${delayNeeded.toString()}ms`,
            new Map([["queued", this.queue.length]]),
          );
          await this.sleep(delayNeeded);
        }

        resolve();

        this.lastExecutionTime = Date.now();
      }
    }

    this.isProcessing = false;
  }

  private async sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
