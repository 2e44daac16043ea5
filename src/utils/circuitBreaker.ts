import { logger } from '../core/logger';
import { config } from '../core/config';

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerOptions {
  name: string;
  failureThreshold: number;
  cooldownMs: number;
  timeoutMs?: number;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitBreakerState;
  failures: number;
  successes: number;
  lastFailureTime?: number;
  lastSuccessTime?: number;
}

export class CircuitOpenError extends Error {
  constructor(public readonly breakerName: string) {
    super(`Circuit breaker ${breakerName} is open`);
    this.name = 'CircuitOpenError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly breakerName: string, public readonly timeoutMs: number) {
    super(`Circuit breaker ${breakerName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CircuitBreaker {
  private state: CircuitBreakerState = 'closed';
  private failures = 0;
  private successes = 0;
  private lastFailureTime?: number;
  private lastSuccessTime?: number;
  private halfOpenProbe?: Promise<unknown>;

  constructor(private readonly options: CircuitBreakerOptions) {
    logger.debug({
      name: options.name,
      failureThreshold: options.failureThreshold,
      cooldownMs: options.cooldownMs,
      timeoutMs: options.timeoutMs,
    }, 'Circuit breaker created');
  }

  get name(): string {
    return this.options.name;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  /**
   * Execute a function through the circuit breaker
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'open') {
      if (this.shouldAttemptReset()) {
        this.state = 'half-open';
        logger.info({ name: this.options.name }, 'Circuit breaker transitioning to half-open');
      } else {
        throw new CircuitOpenError(this.options.name);
      }
    }

    if (this.state === 'half-open') {
      if (this.halfOpenProbe) {
        // Only one probe at a time; wait for it and re-evaluate
        await this.halfOpenProbe.catch(() => undefined);
        return this.execute(fn);
      }
      const probe = this.executeWithTimeout(fn);
      this.halfOpenProbe = probe;
      try {
        const result = await probe;
        this.onSuccess();
        return result;
      } catch (error) {
        this.onFailure();
        throw error;
      } finally {
        this.halfOpenProbe = undefined;
      }
    }

    try {
      const result = await this.executeWithTimeout(fn);
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  /**
   * Execute function with optional timeout
   */
  private executeWithTimeout<T>(fn: () => Promise<T>): Promise<T> {
    const timeoutMs = this.options.timeoutMs;
    if (!timeoutMs) {
      return fn();
    }

    return new Promise<T>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new TimeoutError(this.options.name, timeoutMs));
      }, timeoutMs);

      fn()
        .then(result => {
          clearTimeout(timeout);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeout);
          reject(error);
        });
    });
  }

  private onSuccess(): void {
    this.successes++;
    this.lastSuccessTime = Date.now();

    if (this.state === 'half-open') {
      logger.info({ name: this.options.name }, 'Circuit breaker closed after successful probe');
    }
    this.state = 'closed';
    this.failures = 0;
  }

  private onFailure(): void {
    this.failures++;
    this.lastFailureTime = Date.now();

    if (this.state === 'half-open') {
      this.state = 'open';
      logger.warn({
        name: this.options.name,
        failures: this.failures,
      }, 'Circuit breaker opened after failed probe');
    } else if (this.failures >= this.options.failureThreshold) {
      this.state = 'open';
      logger.warn({
        name: this.options.name,
        failures: this.failures,
        threshold: this.options.failureThreshold,
      }, 'Circuit breaker opened due to failure threshold');
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === undefined) {
      return false;
    }

    const timeSinceLastFailure = Date.now() - this.lastFailureTime;
    return timeSinceLastFailure >= this.options.cooldownMs;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.options.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
    };
  }
}

export const fileSystemBreaker = new CircuitBreaker({
  name: 'filesystem',
  failureThreshold: config.BREAKER_THRESHOLD,
  cooldownMs: config.BREAKER_COOLDOWN_MS,
  timeoutMs: 5000,
});
