import {
    RetryPolicy,
    computeBackoffDelay,
    makeRetryable,
    withRetry,
    withTimeout,
} from '../../../../src/infrastructure/resilience/RetryPolicy';
import { BreakerOpenError, PermanentError, TransientError } from '../../../../src/domain/errors/PipelineErrors';

describe('RetryPolicy', () => {
    const fast = { baseDelayMs: 1, maxDelayMs: 10, random: () => 0.5 };

    describe('execute', () => {
        it('should succeed after transient failures', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new TransientError('reset'))
                .mockRejectedValueOnce(new TransientError('reset'))
                .mockResolvedValue('success');

            const result = await new RetryPolicy({ maxAttempts: 3, ...fast }).execute(fn);

            expect(result).toBe('success');
            expect(fn).toHaveBeenCalledTimes(3);
        });

        it('should rethrow the final error unchanged after max attempts', async () => {
            const error = new TransientError('still down');
            const fn = jest.fn().mockRejectedValue(error);

            await expect(new RetryPolicy({ maxAttempts: 3, ...fast }).execute(fn)).rejects.toBe(error);
            expect(fn).toHaveBeenCalledTimes(3);
        });

        it('should not retry permanent errors', async () => {
            const onAttemptFailed = jest.fn();
            const error = new PermanentError('bad request', 'HTTP_400');
            const fn = jest.fn().mockRejectedValue(error);

            await expect(
                new RetryPolicy({ maxAttempts: 3, ...fast, onAttemptFailed }).execute(fn)
            ).rejects.toBe(error);

            expect(fn).toHaveBeenCalledTimes(1);
            expect(onAttemptFailed).toHaveBeenCalledWith(1, error, null);
        });

        it('should not retry into an open circuit', async () => {
            const fn = jest.fn().mockRejectedValue(new BreakerOpenError('fetch:acme.example.com', 5000));

            await expect(new RetryPolicy({ maxAttempts: 3, ...fast }).execute(fn))
                .rejects.toBeInstanceOf(BreakerOpenError);
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('should retry errors of unknown origin', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new Error('socket hang up'))
                .mockResolvedValue('ok');

            await expect(new RetryPolicy({ maxAttempts: 2, ...fast }).execute(fn)).resolves.toBe('ok');
            expect(fn).toHaveBeenCalledTimes(2);
        });

        it('should report each failed attempt with the upcoming delay', async () => {
            const onAttemptFailed = jest.fn();
            const error = new TransientError('timeout');
            const fn = jest.fn().mockRejectedValue(error);

            await expect(
                new RetryPolicy({ maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, random: () => 0.5, onAttemptFailed })
                    .execute(fn)
            ).rejects.toBe(error);

            expect(onAttemptFailed.mock.calls).toEqual([
                [1, error, 10],
                [2, error, 20],
                [3, error, null],
            ]);
        });

        it('should honour a custom retry predicate', async () => {
            const fn = jest.fn().mockRejectedValue(new TransientError('busy'));
            const policy = new RetryPolicy({ maxAttempts: 3, ...fast }).with({ isRetryable: () => false });

            await expect(policy.execute(fn)).rejects.toThrow('busy');
            expect(fn).toHaveBeenCalledTimes(1);
            expect(policy.maxAttempts).toBe(3);
        });

        it('should reject maxAttempts below one', () => {
            expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
        });
    });

    describe('computeBackoffDelay', () => {
        it('should double per attempt before jitter', () => {
            expect(computeBackoffDelay(0, 1000, 60000, () => 0.5)).toBe(1000);
            expect(computeBackoffDelay(1, 1000, 60000, () => 0.5)).toBe(2000);
            expect(computeBackoffDelay(2, 1000, 60000, () => 0.5)).toBe(4000);
        });

        it('should keep jitter within 75% to 125% of the delay', () => {
            expect(computeBackoffDelay(1, 1000, 60000, () => 0)).toBe(1500);
            expect(computeBackoffDelay(1, 1000, 60000, () => 1)).toBe(2500);
        });

        it('should cap the delay before applying jitter', () => {
            expect(computeBackoffDelay(10, 1000, 60000, () => 0)).toBe(45000);
        });
    });

    describe('withRetry and makeRetryable', () => {
        it('should wrap a one-off call', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new TransientError('blip'))
                .mockResolvedValue(42);

            await expect(withRetry(fn, { maxAttempts: 2, ...fast })).resolves.toBe(42);
        });

        it('should produce a retrying function with the same arguments', async () => {
            const fn = jest.fn(async (a: number, b: number) => a + b);
            fn.mockRejectedValueOnce(new TransientError('blip'));

            const add = makeRetryable(fn, { maxAttempts: 2, ...fast });

            await expect(add(2, 3)).resolves.toBe(5);
            expect(fn).toHaveBeenLastCalledWith(2, 3);
        });
    });
});

describe('withTimeout', () => {
    it('should return the result of a fast operation', async () => {
        await expect(withTimeout(async () => 'done', 1000, 'fetch acme')).resolves.toBe('done');
    });

    it('should reject with a retryable timeout and abort the operation', async () => {
        let observed: AbortSignal | undefined;
        const operation = (signal: AbortSignal) => {
            observed = signal;
            return new Promise<string>((_, reject) => {
                signal.addEventListener('abort', () => reject(new Error('aborted')));
            });
        };

        await expect(withTimeout(operation, 20, 'fetch acme')).rejects.toMatchObject({
            kind: 'transient',
            code: 'TIMEOUT',
            message: 'fetch acme timed out after 20ms',
        });
        expect(observed?.aborted).toBe(true);
    });

    it('should propagate a parent abort to the operation', async () => {
        const parent = new AbortController();
        let observed: AbortSignal | undefined;
        const operation = (signal: AbortSignal) => {
            observed = signal;
            return new Promise<string>((_, reject) => {
                signal.addEventListener('abort', () => reject(new Error('cancelled upstream')));
            });
        };

        const pending = withTimeout(operation, 1000, 'extract acme', parent.signal);
        parent.abort('cancelled by caller');

        await expect(pending).rejects.toThrow('cancelled upstream');
        expect(observed?.reason).toBe('cancelled by caller');
    });

    it('should start already aborted when the parent is aborted', async () => {
        const parent = new AbortController();
        parent.abort('stop');

        await expect(withTimeout(async signal => signal.aborted, 1000, 'render', parent.signal)).resolves.toBe(true);
    });
});
