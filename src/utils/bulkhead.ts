import { logger } from '../core/logger';

export interface BulkheadOptions {
  name: string;
  limit: number;
  queueSize?: number;
}

export interface BulkheadStats {
  name: string;
  active: number;
  queued: number;
  completed: number;
  rejected: number;
  limit: number;
  queueSize: number;
}

export class BulkheadRejectedError extends Error {
  constructor(public readonly bulkheadName: string) {
    super(`Bulkhead ${bulkheadName} is at capacity`);
    this.name = 'BulkheadRejectedError';
  }
}

/**
 * Caps concurrent executions of one resource class, queueing a bounded
 * number of callers and rejecting the rest.
 */
export class Bulkhead {
  private active = 0;
  private completed = 0;
  private rejected = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly options: BulkheadOptions) {
    logger.debug({
      name: options.name,
      limit: options.limit,
      queueSize: options.queueSize ?? 0,
    }, 'Bulkhead created');
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const execute = async (): Promise<void> => {
        this.active++;
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        } finally {
          this.completed++;
          this.active--;
          this.processQueue();
        }
      };

      if (this.active < this.options.limit) {
        void execute();
      } else if (this.queue.length < (this.options.queueSize ?? 0)) {
        this.queue.push(() => void execute());
        logger.debug({
          name: this.options.name,
          queued: this.queue.length,
          active: this.active,
        }, 'Request queued in bulkhead');
      } else {
        this.rejected++;
        logger.warn({
          name: this.options.name,
          rejected: this.rejected,
          active: this.active,
          queued: this.queue.length,
        }, 'Request rejected by bulkhead');
        reject(new BulkheadRejectedError(this.options.name));
      }
    });
  }

  private processQueue(): void {
    if (this.active >= this.options.limit) {
      return;
    }

    const next = this.queue.shift();
    if (next) {
      next();
    }
  }

  getStats(): BulkheadStats {
    return {
      name: this.options.name,
      active: this.active,
      queued: this.queue.length,
      completed: this.completed,
      rejected: this.rejected,
      limit: this.options.limit,
      queueSize: this.options.queueSize ?? 0,
    };
  }

  /**
   * Whether any work is running or waiting
   */
  isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }
}

export const fileSystemBulkhead = new Bulkhead({
  name: 'filesystem',
  limit: 8,
  queueSize: 200,
});

export function getBulkheadMetrics(): Record<string, BulkheadStats> {
  return {
    filesystem: fileSystemBulkhead.getStats(),
  };
}
