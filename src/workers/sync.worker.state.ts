import { logger } from '../core/logger';
import type { RunState } from './sync.worker.types';

interface LoopState {
  intervalMs: number;
  timer?: NodeJS.Timeout;
}

/**
 * Run guard and recurring loop for the sync worker.
 *
 * The guard is a plain Idle/Running flag flipped synchronously, so two
 * callers racing for a cycle can never both see Idle. The loop is a
 * setTimeout chain re-armed only after each tick settles, which keeps a
 * slow cycle from stacking ticks behind it.
 */
export class SyncWorkerState {
  private state: RunState = 'Idle';
  private loop: LoopState | null = null;
  private cyclesCompleted = 0;
  private cyclesSkipped = 0;
  private cyclesFailed = 0;
  private lastStartedAt?: string;
  private lastFinishedAt?: string;
  private lastError?: string;

  getRunState(): RunState {
    return this.state;
  }

  /**
   * Idle → Running. Returns false, changing nothing, when already Running.
   */
  tryBeginCycle(now: Date): boolean {
    if (this.state === 'Running') {
      this.cyclesSkipped++;
      return false;
    }
    this.state = 'Running';
    this.lastStartedAt = now.toISOString();
    return true;
  }

  /**
   * Running → Idle, recording the failure reason if there was one
   */
  endCycle(now: Date, error?: string): void {
    this.state = 'Idle';
    this.lastFinishedAt = now.toISOString();
    if (error === undefined) {
      this.cyclesCompleted++;
      this.lastError = undefined;
    } else {
      this.cyclesFailed++;
      this.lastError = error;
    }
  }

  /**
   * Record a problem that did not fail the cycle (e.g. a storage error)
   */
  noteError(error: string): void {
    this.lastError = error;
  }

  isLooping(): boolean {
    return this.loop !== null;
  }

  startLoop(intervalMs: number, tick: () => Promise<void>): boolean {
    if (this.loop) {
      logger.warn({ intervalMs: this.loop.intervalMs }, 'Sync loop is already running');
      return false;
    }

    const loop: LoopState = { intervalMs };
    this.loop = loop;

    const schedule = (): void => {
      loop.timer = setTimeout(() => {
        void tick().finally(() => {
          if (this.loop === loop) {
            schedule();
          }
        });
      }, intervalMs);
    };

    schedule();
    logger.info({ intervalMs }, 'Sync loop started');
    return true;
  }

  /**
   * Cancel the next tick. A tick already running is left to finish.
   */
  stopLoop(): boolean {
    if (!this.loop) {
      logger.debug('Sync loop is not running');
      return false;
    }

    clearTimeout(this.loop.timer);
    this.loop = null;
    logger.info('Sync loop stopped');
    return true;
  }

  snapshot() {
    return {
      state: this.state,
      looping: this.loop !== null,
      intervalMs: this.loop?.intervalMs,
      cyclesCompleted: this.cyclesCompleted,
      cyclesSkipped: this.cyclesSkipped,
      cyclesFailed: this.cyclesFailed,
      lastStartedAt: this.lastStartedAt,
      lastFinishedAt: this.lastFinishedAt,
      lastError: this.lastError,
    };
  }
}
