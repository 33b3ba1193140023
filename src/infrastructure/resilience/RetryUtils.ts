/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures of outbound HTTP calls.
 */

import axios from 'axios';

export interface RetryOptions {
    /** Maximum number of attempts (default: 3) */
    maxAttempts?: number;
    /** Initial backoff delay in milliseconds (default: 1000) */
    initialBackoffMs?: number;
    /** Maximum backoff delay in milliseconds (default: 30000) */
    maxBackoffMs?: number;
    /** Backoff multiplier (default: 2) */
    backoffMultiplier?: number;
    /** Function to determine if error is retryable (default: all errors) */
    isRetryable?: (error: unknown) => boolean;
    /** Callback for each retry attempt */
    onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;
    /** Stops retrying once aborted */
    signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
    maxAttempts: 3,
    initialBackoffMs: 1000,
    maxBackoffMs: 30000,
    backoffMultiplier: 2,
    isRetryable: () => true,
    onRetry: () => { },
};

/**
 * Execute a function with exponential backoff retry logic.
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    options?: RetryOptions
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };
    let currentBackoff = opts.initialBackoffMs;

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (attempt >= opts.maxAttempts || !opts.isRetryable(error) || opts.signal?.aborted) {
                throw error;
            }

            const delay = Math.min(currentBackoff, opts.maxBackoffMs);
            opts.onRetry(attempt, error, delay);
            await sleep(delay);

            currentBackoff = Math.min(currentBackoff * opts.backoffMultiplier, opts.maxBackoffMs);
        }
    }
}

/**
 * Rate limits (429), server errors (5xx) and network errors are retryable.
 * Cancellations and other 4xx are not.
 */
export function isRetryableHttpError(error: unknown): boolean {
    if (axios.isCancel(error)) {
        return false;
    }
    if (!axios.isAxiosError(error)) {
        return false;
    }

    const status = error.response?.status;
    if (status === undefined) {
        return error.code !== 'ERR_CANCELED';
    }

    return status === 429 || (status >= 500 && status < 600);
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
