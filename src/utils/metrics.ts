// Lightweight metrics collection system
export interface Metrics {
  requests: number;
  errors: number;
  cyclesCompleted: number;
  cyclesSkipped: number;
  cyclesFailed: number;
  fetchFailures: number;
  normalizationErrors: number;
  conflicts: number;
  pushSuccesses: number;
  pushFailures: number;
  storageFailures: number;
  fileSystemRetries: number;
}

function emptyMetrics(): Metrics {
  return {
    requests: 0,
    errors: 0,
    cyclesCompleted: 0,
    cyclesSkipped: 0,
    cyclesFailed: 0,
    fetchFailures: 0,
    normalizationErrors: 0,
    conflicts: 0,
    pushSuccesses: 0,
    pushFailures: 0,
    storageFailures: 0,
    fileSystemRetries: 0,
  };
}

class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  increment(metric: keyof Metrics, count: number = 1): void {
    this.metrics[metric] += count;
  }

  getMetrics(): Metrics {
    return { ...this.metrics };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.metrics = emptyMetrics();
  }
}

// Global metrics instance
export const metrics = new MetricsCollector();

// Helper functions for common metric increments
export const incrementRequests = () => metrics.increment('requests');
export const incrementErrors = () => metrics.increment('errors');
export const incrementCyclesSkipped = () => metrics.increment('cyclesSkipped');
export const incrementFsRetries = () => metrics.increment('fileSystemRetries');
