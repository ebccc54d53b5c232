import type { LogService } from "../services/log/types.mjs";

/**
 * Runs deferred interaction work after the HTTP response has been sent. Failures are logged; `drain`
 * waits for everything still in flight.
 */
export class JobRunner {
  private readonly logService: LogService;
  private readonly pending = new Set<Promise<void>>();

  constructor({ logService }: { logService: LogService }) {
    this.logService = logService;
  }

  get size(): number {
    return this.pending.size;
  }

  run(name: string, job: () => Promise<void>): void {
    const promise = Promise.resolve()
      .then(job)
      .catch((error: unknown) => {
        this.logService.error(error instanceof Error ? error : String(error), new Map([["job", name]]));
      })
      .finally(() => {
        this.pending.delete(promise);
      });

    this.pending.add(promise);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
