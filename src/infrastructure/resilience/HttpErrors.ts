import axios from 'axios';

/**
 * Pulls `error.message` or `message` out of an unknown provider error body.
 */
export function extractErrorMessage(data: unknown): string | undefined {
    if (typeof data === 'string' && data.length > 0) return data;
    if (typeof data !== 'object' || data === null) return undefined;
    if ('error' in data) {
        const nested = data.error;
        if (typeof nested === 'string') return nested;
        if (typeof nested === 'object' && nested !== null && 'message' in nested && typeof nested.message === 'string') {
            return nested.message;
        }
    }
    if ('message' in data && typeof data.message === 'string') return data.message;
    return undefined;
}

/**
 * One-line description of a failed outbound call: status (or error code) and
 * the provider's own message when it sent one.
 */
export function describeHttpError(error: unknown): { status?: number; message: string } {
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = extractErrorMessage(error.response?.data) ?? error.message;
        return { status, message: status ? `(${status}) ${message}` : `(${error.code ?? 'network'}) ${message}` };
    }
    return { message: error instanceof Error ? error.message : String(error) };
}
