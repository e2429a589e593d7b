import { AxiosError, AxiosHeaders } from 'axios';
import {
    BreakerOpenError,
    CacheError,
    PermanentError,
    TransientError,
    classifyError,
    errorMessage,
    fromHttpError,
    isRetryableError,
    isRetryableStatus,
} from '../../../src/domain/errors/PipelineErrors';

function axiosErrorWithStatus(status: number): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, {
        status,
        statusText: '',
        headers: {},
        config,
        data: {},
    });
}

describe('PipelineErrors', () => {
    describe('classifyError', () => {
        it('should use the kind carried by pipeline errors', () => {
            expect(classifyError(new TransientError('x'))).toBe('transient');
            expect(classifyError(new PermanentError('x'))).toBe('permanent');
            expect(classifyError(new BreakerOpenError('fetch:a', 10))).toBe('breaker_open');
            expect(classifyError(new CacheError('disk full', 'k'))).toBe('cache');
        });

        it('should classify HTTP failures by status', () => {
            expect(classifyError(axiosErrorWithStatus(503))).toBe('transient');
            expect(classifyError(axiosErrorWithStatus(429))).toBe('transient');
            expect(classifyError(axiosErrorWithStatus(404))).toBe('permanent');
        });

        it('should treat unknown errors as transient', () => {
            expect(classifyError(new Error('socket hang up'))).toBe('transient');
            expect(classifyError('weird')).toBe('transient');
        });
    });

    describe('isRetryableError', () => {
        it('should only retry transient errors', () => {
            expect(isRetryableError(new TransientError('x'))).toBe(true);
            expect(isRetryableError(new PermanentError('x'))).toBe(false);
            expect(isRetryableError(new BreakerOpenError('fetch:a', 10))).toBe(false);
        });
    });

    describe('isRetryableStatus', () => {
        it('should accept 408, 429 and 5xx', () => {
            expect([408, 429, 500, 502, 599].every(isRetryableStatus)).toBe(true);
            expect([400, 401, 404, 422, 600].some(isRetryableStatus)).toBe(false);
        });
    });

    describe('fromHttpError', () => {
        it('should map retryable statuses to TransientError', () => {
            const error = fromHttpError(axiosErrorWithStatus(502), 'Fetching https://acme.example.com');

            expect(error).toBeInstanceOf(TransientError);
            expect(error.code).toBe('HTTP_502');
            expect(error.message).toBe('Fetching https://acme.example.com failed with status 502');
            expect(error.details).toEqual({ status: 502 });
        });

        it('should map client errors to PermanentError', () => {
            const error = fromHttpError(axiosErrorWithStatus(403), 'OpenAI chat completion');

            expect(error).toBeInstanceOf(PermanentError);
            expect(error.code).toBe('HTTP_403');
        });

        it('should map client timeouts to TIMEOUT', () => {
            const error = fromHttpError(new AxiosError('timeout of 10ms exceeded', 'ECONNABORTED'), 'Fetching x');

            expect(error).toBeInstanceOf(TransientError);
            expect(error.code).toBe('TIMEOUT');
        });

        it('should pass pipeline errors through unchanged', () => {
            const original = new PermanentError('nope', 'UNKNOWN_SUBJECT');

            expect(fromHttpError(original, 'ctx')).toBe(original);
        });

        it('should wrap unknown errors as transient', () => {
            const error = fromHttpError(new Error('boom'), 'Rendering');

            expect(error).toBeInstanceOf(TransientError);
            expect(error.message).toBe('Rendering failed: boom');
        });
    });

    describe('BreakerOpenError', () => {
        it('should carry the operation and retry hint', () => {
            const error = new BreakerOpenError('extract:api.openai.com', 1500);

            expect(error.code).toBe('CIRCUIT_BREAKER_OPEN');
            expect(error.message).toBe('Circuit breaker is OPEN for extract:api.openai.com');
            expect(error.details).toEqual({ operationKey: 'extract:api.openai.com', retryAfterMs: 1500 });
        });
    });

    describe('errorMessage', () => {
        it('should stringify non-errors', () => {
            expect(errorMessage(new Error('x'))).toBe('x');
            expect(errorMessage(42)).toBe('42');
        });
    });
});
