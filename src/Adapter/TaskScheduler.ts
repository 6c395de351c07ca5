import { logError } from '@utils/logger';

export interface IScheduledTask {
  /** Stops the task from starting. A task body that is already running is left alone. */
  cancel(): void;
}

export interface ITaskScheduler {
  schedule(task: () => Promise<void>, delayMs: number): IScheduledTask;
}

/**
 * One-shot delayed tasks on top of setTimeout.
 */
export class TimerTaskScheduler implements ITaskScheduler {
  schedule(task: () => Promise<void>, delayMs: number): IScheduledTask {
    const timer = setTimeout(() => {
      task().catch((error: unknown) => logError('[Scheduler] Scheduled task failed', error));
    }, delayMs);
    return {
      cancel: () => clearTimeout(timer),
    };
  }
}
