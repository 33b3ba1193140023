import { AxiosError, AxiosHeaders } from 'axios';
import { isRetryableHttpError, withRetry } from '../../../../src/infrastructure/resilience/RetryUtils';

function httpError(status?: number, code?: string): AxiosError {
    const config = { headers: new AxiosHeaders() };
    const response = status === undefined
        ? undefined
        : { status, statusText: '', headers: {}, config, data: {} };
    return new AxiosError('request failed', code, config, undefined, response);
}

describe('RetryUtils', () => {
    describe('withRetry', () => {
        it('returns the first successful result', async () => {
            const fn = jest.fn()
                .mockRejectedValueOnce(new Error('transient'))
                .mockResolvedValueOnce('done');

            const result = await withRetry(fn, { maxAttempts: 3, initialBackoffMs: 1 });

            expect(result).toBe('done');
            expect(fn).toHaveBeenCalledTimes(2);
        });

        it('rethrows the last error once attempts are exhausted', async () => {
            const fn = jest.fn().mockRejectedValue(new Error('still down'));
            const onRetry = jest.fn();

            await expect(withRetry(fn, { maxAttempts: 3, initialBackoffMs: 1, onRetry })).rejects.toThrow('still down');
            expect(fn).toHaveBeenCalledTimes(3);
            expect(onRetry).toHaveBeenCalledTimes(2);
        });

        it('does not retry non-retryable errors', async () => {
            const fn = jest.fn().mockRejectedValue(new Error('bad request'));

            await expect(withRetry(fn, { maxAttempts: 5, initialBackoffMs: 1, isRetryable: () => false }))
                .rejects.toThrow('bad request');
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('stops once the signal is aborted', async () => {
            const controller = new AbortController();
            const fn = jest.fn().mockImplementation(async () => {
                controller.abort();
                throw new Error('aborted meanwhile');
            });

            await expect(withRetry(fn, { maxAttempts: 5, initialBackoffMs: 1, signal: controller.signal }))
                .rejects.toThrow('aborted meanwhile');
            expect(fn).toHaveBeenCalledTimes(1);
        });

        it('grows the backoff up to the cap', async () => {
            const delays: number[] = [];
            const fn = jest.fn().mockRejectedValue(new Error('x'));

            await expect(withRetry(fn, {
                maxAttempts: 4,
                initialBackoffMs: 2,
                backoffMultiplier: 3,
                maxBackoffMs: 10,
                onRetry: (_attempt, _error, delay) => delays.push(delay),
            })).rejects.toThrow('x');

            expect(delays).toEqual([2, 6, 10]);
        });
    });

    describe('isRetryableHttpError', () => {
        it('retries rate limits and server errors', () => {
            expect(isRetryableHttpError(httpError(429))).toBe(true);
            expect(isRetryableHttpError(httpError(503))).toBe(true);
        });

        it('does not retry other client errors', () => {
            expect(isRetryableHttpError(httpError(400))).toBe(false);
            expect(isRetryableHttpError(httpError(401))).toBe(false);
        });

        it('retries network errors but not cancellations', () => {
            expect(isRetryableHttpError(httpError(undefined, 'ECONNRESET'))).toBe(true);
            expect(isRetryableHttpError(httpError(undefined, 'ERR_CANCELED'))).toBe(false);
        });

        it('does not retry plain errors', () => {
            expect(isRetryableHttpError(new Error('parse'))).toBe(false);
        });
    });
});
