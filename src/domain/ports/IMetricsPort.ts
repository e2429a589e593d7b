/**
 * Metrics Port Interface
 *
 * Observability contract for the pipeline and its resilience layer.
 * Implementations: Prometheus, Console, No-op.
 */

export interface MetricTags {
    [key: string]: string | number | boolean;
}

export interface IMetricsPort {
    /**
     * Increment a counter metric.
     * @param name - Metric name (e.g., 'pipeline.runs_completed')
     * @param value - Increment amount (default: 1)
     */
    incrementCounter(name: string, tags?: MetricTags, value?: number): void;

    /**
     * Record a duration/timing metric in milliseconds.
     */
    recordDuration(name: string, durationMs: number, tags?: MetricTags): void;

    /**
     * Record a gauge metric (current value at a point in time).
     */
    recordGauge(name: string, value: number, tags?: MetricTags): void;

    /**
     * Start a timer and return a function to stop it.
     */
    startTimer(name: string, tags?: MetricTags): () => void;
}

/**
 * Metric names emitted by the pipeline.
 */
export const METRICS = {
    // Counters
    RUNS_STARTED: 'pipeline.runs_started',
    RUNS_COMPLETED: 'pipeline.runs_completed',
    RUNS_FAILED: 'pipeline.runs_failed',
    RUNS_CANCELLED: 'pipeline.runs_cancelled',
    CACHE_HITS: 'pipeline.cache_hits',
    CACHE_MISSES: 'pipeline.cache_misses',
    CACHE_WRITE_FAILURES: 'pipeline.cache_write_failures',
    RETRIES_TOTAL: 'pipeline.retries_total',
    BREAKER_TRANSITIONS: 'pipeline.breaker_transitions',

    // Durations
    STAGE_DURATION: 'pipeline.stage_duration_ms',
    RUN_DURATION: 'pipeline.run_duration_ms',

    // Gauges
    PENDING_REFRESHES: 'pipeline.pending_refreshes',
    BREAKER_STATE: 'pipeline.breaker_state',
} as const;
