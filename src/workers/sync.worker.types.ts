import type { CatalogSnapshot, SyncCycleResult } from '../core/types';
import type { CircuitBreakerStats } from '../utils/circuitBreaker';

export type RunState = 'Idle' | 'Running';

export type RunOutcome =
  | { status: 'completed'; result: SyncCycleResult }
  | { status: 'skipped'; reason: 'already-running' }
  | { status: 'failed'; error: string };

// Published catalog plus the cycle that produced it
export interface PublishedState {
  snapshot: CatalogSnapshot;
  lastResult: SyncCycleResult | null;
}

export interface SyncWorkerStatus {
  state: RunState;
  looping: boolean;
  intervalMs?: number;
  cyclesCompleted: number;
  cyclesSkipped: number;
  cyclesFailed: number;
  lastStartedAt?: string;
  lastFinishedAt?: string;
  lastError?: string;
  itemCount: number;
  breakers: CircuitBreakerStats[];
}
