/**
 * src/utils/timeout.ts
 *
 * Bounded waits for fetches.
 */

import { FetchError } from './errors.js';

/**
 * Races `task` against a timer. On expiry the returned promise rejects with a
 * retryable FetchError (statusCode null) and `onTimeout` is called so the
 * caller can abort the underlying request.
 */
export async function withTimeout<T>(
    task: Promise<T>,
    timeoutMs: number,
    url: string,
    onTimeout?: () => void,
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            onTimeout?.();
            reject(new FetchError(`Timed out after ${timeoutMs}ms: ${url}`, url));
        }, timeoutMs);
    });

    try {
        return await Promise.race([task, expired]);
    } finally {
        clearTimeout(timer);
    }
}
