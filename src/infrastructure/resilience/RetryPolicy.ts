/**
 * Retry Policy
 *
 * Bounded retries with exponential backoff and jitter, for wrapping remote calls.
 *
 * When the wrapped call goes through a CircuitBreaker, the `isRetryable` predicate must treat
 * BreakerOpenError as non-retryable: retrying into an open circuit only burns attempts and
 * delay. The default predicate (isRetryableError) does this; custom predicates must do the
 * same. Nothing here inspects the breaker automatically.
 */

import { isRetryableError, TransientError } from '../../domain/errors/PipelineErrors';

export interface RetryOptions {
    /** Maximum number of attempts, including the first (default: 3) */
    maxAttempts?: number;
    /** Delay before the first retry in milliseconds (default: 1000) */
    baseDelayMs?: number;
    /** Upper bound for the un-jittered delay in milliseconds (default: 60000) */
    maxDelayMs?: number;
    /** Which errors may be retried (default: transient errors only) */
    isRetryable?: (error: unknown) => boolean;
    /**
     * Called after every failed attempt, before any delay.
     * `nextDelayMs` is null when no retry follows.
     */
    onAttemptFailed?: (attempt: number, error: unknown, nextDelayMs: number | null) => void;
    /** Uniform [0, 1) source for jitter, injectable for tests */
    random?: () => number;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 60000,
    isRetryable: isRetryableError,
    onAttemptFailed: () => { },
    random: Math.random,
};

/**
 * Backoff before retrying after the given 0-indexed attempt:
 * min(base * 2^attempt, max), scaled by a jitter factor in [0.75, 1.25].
 */
export function computeBackoffDelay(
    attempt: number,
    baseDelayMs: number,
    maxDelayMs: number,
    random: () => number = Math.random
): number {
    const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
    return delay * (0.75 + random() * 0.5);
}

export class RetryPolicy {
    private readonly options: Required<RetryOptions>;

    constructor(options?: RetryOptions) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
        if (this.options.maxAttempts < 1) {
            throw new RangeError('maxAttempts must be at least 1');
        }
    }

    get maxAttempts(): number {
        return this.options.maxAttempts;
    }

    /**
     * Returns a policy with some options replaced.
     */
    with(overrides: RetryOptions): RetryPolicy {
        return new RetryPolicy({ ...this.options, ...overrides });
    }

    /**
     * Runs the operation, retrying retryable failures. The final error is rethrown unchanged.
     */
    async execute<T>(operation: () => Promise<T>): Promise<T> {
        const { maxAttempts, baseDelayMs, maxDelayMs, isRetryable, onAttemptFailed, random } = this.options;

        for (let attempt = 0; ; attempt++) {
            try {
                return await operation();
            } catch (error) {
                const isLastAttempt = attempt + 1 >= maxAttempts;

                if (isLastAttempt || !isRetryable(error)) {
                    onAttemptFailed(attempt + 1, error, null);
                    throw error;
                }

                const delay = computeBackoffDelay(attempt, baseDelayMs, maxDelayMs, random);
                onAttemptFailed(attempt + 1, error, delay);
                await sleep(delay);
            }
        }
    }
}

/**
 * Execute a function with the retry policy described by `options`.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
    return new RetryPolicy(options).execute(fn);
}

/**
 * Create a retryable version of a function.
 */
export function makeRetryable<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options?: RetryOptions
): (...args: A) => Promise<R> {
    const policy = new RetryPolicy(options);
    return (...args: A) => policy.execute(() => fn(...args));
}

/**
 * Runs an abortable operation with a deadline. On expiry the operation's signal is aborted
 * and the returned promise rejects with a retryable TransientError.
 * An already-aborted parent signal aborts the operation too.
 */
export async function withTimeout<T>(
    operation: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parentSignal?: AbortSignal
): Promise<T> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parentSignal?.reason);
    if (parentSignal?.aborted) {
        controller.abort(parentSignal.reason);
    } else {
        parentSignal?.addEventListener('abort', onParentAbort, { once: true });
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TransientError(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', { timeoutMs });
            // Settle first so the timeout wins over any rejection the abort triggers
            reject(error);
            controller.abort(error);
        }, timeoutMs);
    });

    try {
        return await Promise.race([operation(controller.signal), deadline]);
    } finally {
        clearTimeout(timer);
        parentSignal?.removeEventListener('abort', onParentAbort);
    }
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
