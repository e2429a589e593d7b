import axios from 'axios';

/**
 * Error taxonomy for pipeline stages.
 *
 * - transient: worth retrying (timeouts, 429, 5xx, dropped connections)
 * - permanent: retrying cannot help (4xx, malformed input, schema violations)
 * - breaker_open: synthetic rejection from an open circuit, never retried
 * - cache: persistence I/O failure, degraded to a cache miss by callers
 */
export type ErrorKind = 'transient' | 'permanent' | 'breaker_open' | 'cache';

export class PipelineError extends Error {
    constructor(
        public readonly kind: ErrorKind,
        message: string,
        public readonly code: string = 'PIPELINE_ERROR',
        public readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

export class TransientError extends PipelineError {
    constructor(message: string, code: string = 'TRANSIENT', details?: Record<string, unknown>) {
        super('transient', message, code, details);
        this.name = 'TransientError';
    }
}

export class PermanentError extends PipelineError {
    constructor(message: string, code: string = 'PERMANENT', details?: Record<string, unknown>) {
        super('permanent', message, code, details);
        this.name = 'PermanentError';
    }
}

/**
 * Raised by a CircuitBreaker instead of attempting the call.
 */
export class BreakerOpenError extends PipelineError {
    constructor(
        public readonly operationKey: string,
        public readonly retryAfterMs: number
    ) {
        super(
            'breaker_open',
            `Circuit breaker is OPEN for ${operationKey}`,
            'CIRCUIT_BREAKER_OPEN',
            { operationKey, retryAfterMs }
        );
        this.name = 'BreakerOpenError';
    }
}

export class CacheError extends PipelineError {
    constructor(
        message: string,
        public readonly key: string | null,
        public readonly cause?: unknown
    ) {
        super('cache', message, 'CACHE_ERROR', key ? { key } : {});
        this.name = 'CacheError';
    }
}

/**
 * Maps any thrown value onto the taxonomy.
 * Errors without an HTTP status (network failures, unknown errors) count as transient.
 */
export function classifyError(error: unknown): ErrorKind {
    if (error instanceof PipelineError) {
        return error.kind;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (!status) {
            return 'transient';
        }
        return isRetryableStatus(status) ? 'transient' : 'permanent';
    }

    return 'transient';
}

/**
 * Default retry predicate. Only transient errors qualify, so BreakerOpenError never does.
 * Callers composing RetryPolicy around a CircuitBreaker with their own predicate must
 * exclude it the same way.
 */
export function isRetryableError(error: unknown): boolean {
    return classifyError(error) === 'transient';
}

export function isRetryableStatus(status: number): boolean {
    return status === 408 || status === 429 || (status >= 500 && status < 600);
}

/**
 * Converts an HTTP client failure into a TransientError or PermanentError.
 */
export function fromHttpError(error: unknown, context: string): PipelineError {
    if (error instanceof PipelineError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new TransientError(`${context} timed out`, 'TIMEOUT');
        }
        if (!status) {
            return new TransientError(`${context} failed: ${error.message}`, 'NETWORK_ERROR');
        }
        if (isRetryableStatus(status)) {
            return new TransientError(`${context} failed with status ${status}`, `HTTP_${status}`, { status });
        }
        return new PermanentError(`${context} failed with status ${status}`, `HTTP_${status}`, { status });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new TransientError(`${context} failed: ${message}`);
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
