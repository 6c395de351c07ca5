import { logDebug, logError } from '@utils/logger';
import type { IScheduledTask, ITaskScheduler } from './TaskScheduler';

export const DEFAULT_RECOVERY_INTERVAL = 10_000;

export type ReconnectState = 'idle' | 'scheduled' | 'firing';

/**
 * Keeps at most one reconnect attempt pending.
 *
 * `attempt` resolves true when nothing more needs doing (connected, or the adapter stopped) and
 * false when the attempt failed, in which case the next attempt is armed one `recoveryInterval`
 * later. The interval never grows and there is no attempt limit; only `cancel()` ends the loop.
 */
export class ReconnectScheduler {
  private pending?: IScheduledTask;
  private inFlight = 0;
  // Bumped on every schedule/cancel; a task from an older generation is stale.
  private generation = 0;

  constructor(
    private readonly taskScheduler: ITaskScheduler,
    private readonly recoveryInterval: number,
    private readonly attempt: () => Promise<boolean>
  ) {}

  schedule(): void {
    this.cancel();
    const generation = this.generation;
    try {
      this.pending = this.taskScheduler.schedule(() => this.fire(generation), this.recoveryInterval);
      logDebug(`[Reconnect] Next attempt in ${this.recoveryInterval}ms`);
    } catch (error) {
      logError('[Reconnect] Failed to schedule reconnect', error);
    }
  }

  cancel(): void {
    this.generation++;
    if (this.pending) {
      this.pending.cancel();
      this.pending = undefined;
    }
  }

  hasPending(): boolean {
    return this.pending !== undefined;
  }

  getState(): ReconnectState {
    if (this.pending) return 'scheduled';
    return this.inFlight > 0 ? 'firing' : 'idle';
  }

  private async fire(generation: number): Promise<void> {
    if (generation !== this.generation) return;
    this.pending = undefined;
    this.inFlight++;

    let done = false;
    try {
      logDebug('[Reconnect] Attempting reconnect');
      done = await this.attempt();
    } catch (error) {
      logError('[Reconnect] Reconnect attempt failed unexpectedly', error);
    } finally {
      this.inFlight--;
    }

    // Cancelled or superseded while the attempt was running.
    if (generation !== this.generation) return;
    if (!done) this.schedule();
  }
}
