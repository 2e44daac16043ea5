/**
 * Engine configuration
 *
 * Environment-driven settings with typed defaults. Invalid values are logged
 * and replaced by the default so a typo never prevents startup.
 */
import { join } from 'path';
import type { EngineConfig } from './config.types';
import {
  parseEnum,
  parseNonNegativeInt,
  parsePort,
  parsePositiveInt,
  parseString,
} from './config.utils';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const dataDir = parseString('DATA_DIR', 'data');

export const config: Readonly<EngineConfig> = Object.freeze({
  PORT: parsePort('PORT', 3000),

  DATA_DIR: dataDir,
  CATALOG_FILE: parseString('CATALOG_FILE', join(dataDir, 'catalog.json')),
  PLATFORM_A_FILE: parseString('PLATFORM_A_FILE', join(dataDir, 'platforms', 'platform-a.json')),
  PLATFORM_B_FILE: parseString('PLATFORM_B_FILE', join(dataDir, 'platforms', 'platform-b.json')),

  SYNC_INTERVAL_MS: parsePositiveInt('SYNC_INTERVAL_MS', 300000), // 5 minutes

  PUSH_CONCURRENCY: parsePositiveInt('PUSH_CONCURRENCY', 4),

  PLATFORM_TIMEOUT_MS: parsePositiveInt('PLATFORM_TIMEOUT_MS', 10000),

  // Consecutive failures before a breaker opens
  BREAKER_THRESHOLD: parsePositiveInt('BREAKER_THRESHOLD', 5),
  BREAKER_COOLDOWN_MS: parsePositiveInt('BREAKER_COOLDOWN_MS', 30000),

  RETRY_BASE_MS: parsePositiveInt('RETRY_BASE_MS', 200),
  RETRY_TIMES: parseNonNegativeInt('RETRY_TIMES', 3),
  RETRY_JITTER_MS: parseNonNegativeInt('RETRY_JITTER_MS', 100),

  LOW_STOCK_THRESHOLD: parseNonNegativeInt('LOW_STOCK_THRESHOLD', 10),

  LOG_LEVEL: parseEnum('LOG_LEVEL', 'info', LOG_LEVELS),
});

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(): Record<string, unknown> {
  return {
    storage: {
      dataDir: config.DATA_DIR,
      catalogFile: config.CATALOG_FILE,
    },
    scheduling: {
      intervalMs: config.SYNC_INTERVAL_MS,
    },
    push: {
      concurrency: config.PUSH_CONCURRENCY,
    },
    platforms: {
      timeoutMs: config.PLATFORM_TIMEOUT_MS,
      breakerThreshold: config.BREAKER_THRESHOLD,
      breakerCooldownMs: config.BREAKER_COOLDOWN_MS,
    },
    retry: {
      baseMs: config.RETRY_BASE_MS,
      times: config.RETRY_TIMES,
      jitterMs: config.RETRY_JITTER_MS,
    },
    analytics: {
      lowStockThreshold: config.LOW_STOCK_THRESHOLD,
    },
    logLevel: config.LOG_LEVEL,
  };
}
