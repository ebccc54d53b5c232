import { differenceInMilliseconds } from "date-fns";

/**
 * Named one-shot timers. Scheduling an existing key replaces its timer, so a debounce window is
 * extended by scheduling it again.
 */
export class Scheduler {
  private readonly timeouts = new Map<string, NodeJS.Timeout>();

  schedule(key: string, runAt: Date, task: () => void): void {
    this.cancel(key);

    const delay = Math.max(0, differenceInMilliseconds(runAt, new Date()));
    const timeout = setTimeout(() => {
      this.timeouts.delete(key);
      task();
    }, delay);

    this.timeouts.set(key, timeout);
  }

  cancel(key: string): boolean {
    const timeout = this.timeouts.get(key);
    if (timeout === undefined) {
      return false;
    }

    clearTimeout(timeout);
    this.timeouts.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const timeout of this.timeouts.values()) {
      clearTimeout(timeout);
    }

    this.timeouts.clear();
  }
}
