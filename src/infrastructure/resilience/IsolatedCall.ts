/**
 * Isolated sub-calls
 *
 * Every best-effort integration point of the pipeline goes through `isolate`:
 * the call gets its own timeout and abort signal, and any failure comes back
 * as a value instead of a rejection.
 */

import { errorMessage } from '../../domain/errors/PipelineErrors';

export type Isolated<T> =
    | { ok: true; value: T }
    | { ok: false; error: Error; timedOut: boolean };

export class SubCallTimeoutError extends Error {
    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'SubCallTimeoutError';
    }
}

/**
 * Runs `fn` with a timeout. On timeout the signal is aborted and whatever `fn`
 * later produces is discarded. Never rejects.
 */
export async function isolate<T>(
    label: string,
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number
): Promise<Isolated<T>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new SubCallTimeoutError(label, timeoutMs);
            controller.abort(error);
            reject(error);
        }, timeoutMs);
    });

    try {
        const value = await Promise.race([fn(controller.signal), timeout]);
        return { ok: true, value };
    } catch (caught) {
        const error = caught instanceof Error ? caught : new Error(errorMessage(caught));
        const timedOut = error instanceof SubCallTimeoutError;
        console.warn(`[Isolated] ${label} failed${timedOut ? ' (timeout)' : ''}: ${error.message}`);
        return { ok: false, error, timedOut };
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Maps over `items` running at most `limit` calls at once. Output order
 * matches input order regardless of completion order.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
        while (next < items.length) {
            const index = next++;
            results[index] = await fn(items[index], index);
        }
    };

    const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
    await Promise.all(workers);
    return results;
}
