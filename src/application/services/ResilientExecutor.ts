import { RateLimiter } from '../../infrastructure/resilience/RateLimiter';
import { CircuitBreakerRegistry } from '../../infrastructure/resilience/CircuitBreaker';
import { RetryPolicy, withTimeout } from '../../infrastructure/resilience/RetryPolicy';
import { isRetryableError, errorMessage } from '../../domain/errors/PipelineErrors';
import { RemoteStage } from '../../domain/entities/PipelineRun';
import { IMetricsPort, METRICS } from '../../domain/ports/IMetricsPort';

export interface RemoteCall {
    stage: RemoteStage;
    /** Rate-limit bucket, usually the remote host */
    resourceKey: string;
    /** Circuit breaker identity */
    operationKey: string;
    timeoutMs: number;
    /** Run cancellation; aborts the in-flight attempt and stops further retries */
    signal?: AbortSignal;
}

export interface ResilientExecutorDependencies {
    rateLimiter: RateLimiter;
    breakers: CircuitBreakerRegistry;
    retryPolicy: RetryPolicy;
    metrics: IMetricsPort;
}

/**
 * Wraps one remote stage call in the resilience stack:
 * rate limit, then retry around circuit breaker around a per-attempt timeout.
 *
 * The token is taken once per stage call. Retries of that call reuse it, so a flapping host
 * is throttled by the retry backoff rather than by the bucket.
 *
 * One token covers the whole call, whatever the collaborator does inside it. The fetch stage
 * requests the homepage and up to six subpages in one call, so a host can see up to seven
 * requests per token; set its rate with that in mind.
 */
export class ResilientExecutor {
    constructor(private readonly deps: ResilientExecutorDependencies) { }

    async execute<T>(call: RemoteCall, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
        const { rateLimiter, breakers, retryPolicy, metrics } = this.deps;
        const label = `${call.stage.toLowerCase()} ${call.operationKey}`;

        await rateLimiter.acquire(call.resourceKey);

        const breaker = breakers.get(call.operationKey);
        const policy = retryPolicy.with({
            isRetryable: error => !call.signal?.aborted && isRetryableError(error),
            onAttemptFailed: (attempt, error, nextDelayMs) => {
                if (nextDelayMs === null) {
                    console.warn(`[Pipeline] ${label} failed on attempt ${attempt}: ${errorMessage(error)}`);
                    return;
                }
                metrics.incrementCounter(METRICS.RETRIES_TOTAL, { stage: call.stage });
                console.warn(
                    `[Pipeline] ${label} attempt ${attempt} failed, retrying in ${Math.round(nextDelayMs)}ms: ${errorMessage(error)}`
                );
            },
        });

        // Errors raised after the run was cancelled do not count against the breaker
        return policy.execute(() =>
            breaker.call(
                () => withTimeout(operation, call.timeoutMs, label, call.signal),
                () => !call.signal?.aborted
            )
        );
    }
}
