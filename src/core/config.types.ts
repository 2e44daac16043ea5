export interface EngineConfig {
  // HTTP surface
  PORT: number;

  // Storage
  DATA_DIR: string;
  CATALOG_FILE: string;
  PLATFORM_A_FILE: string;
  PLATFORM_B_FILE: string;

  // Scheduling
  SYNC_INTERVAL_MS: number;

  // Push dispatch
  PUSH_CONCURRENCY: number;

  // Platform calls
  PLATFORM_TIMEOUT_MS: number;

  // Circuit breaker
  BREAKER_THRESHOLD: number;
  BREAKER_COOLDOWN_MS: number;

  // Retry configuration
  RETRY_BASE_MS: number;
  RETRY_TIMES: number;
  RETRY_JITTER_MS: number;

  // Analytics
  LOW_STOCK_THRESHOLD: number;

  // Logging
  LOG_LEVEL: string;
}
