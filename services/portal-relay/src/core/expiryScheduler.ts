import { errorMessage } from './errors.js';

export type ExpiryAction = () => void | Promise<void>;

/** Longest delay a single Node timer honours; longer ones fire immediately. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface ScheduledTask {
  timer?: NodeJS.Timeout;
}

/**
 * Deferred, fire-and-forget cleanup.
 *
 * Actions must be idempotent: lazy expiry in the registry may already have
 * done the work by the time a timer fires. Delays beyond a single timer's
 * range are covered by chaining timers.
 */
export class ExpiryScheduler {
  private readonly tasks = new Set<ScheduledTask>();

  schedule(afterMs: number, action: ExpiryAction, label = 'expiry'): void {
    const task: ScheduledTask = {};
    this.tasks.add(task);
    this.arm(task, Math.max(0, afterMs), action, label);
  }

  pending(): number {
    return this.tasks.size;
  }

  stop(): void {
    for (const task of this.tasks) {
      clearTimeout(task.timer);
    }
    this.tasks.clear();
  }

  private arm(task: ScheduledTask, remainingMs: number, action: ExpiryAction, label: string): void {
    const delayMs = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    task.timer = setTimeout(() => {
      if (!this.tasks.has(task)) return;
      if (remainingMs > delayMs) {
        this.arm(task, remainingMs - delayMs, action, label);
        return;
      }
      this.tasks.delete(task);
      void this.fire(action, label);
    }, delayMs);
    task.timer.unref();
  }

  private async fire(action: ExpiryAction, label: string): Promise<void> {
    try {
      await action();
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(`[portal-relay] scheduled ${label} failed error=${errorMessage(error)}`);
    }
  }
}
