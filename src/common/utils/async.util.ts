import { OperationTimeoutError } from '../errors/rag.errors';

/**
 * Sleep for `ms`. Resolves early (never rejects) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            resolve();
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Execute function with timeout. `onTimeout` runs before the rejection so callers can
 * cancel the underlying work.
 */
export async function withTimeout<T>(
    fn: () => Promise<T>,
    timeoutMs: number,
    operationName: string = 'Operation',
    onTimeout?: () => void,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            onTimeout?.();
            reject(new OperationTimeoutError(operationName, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Settle with `promise`, or reject with `onAbort()` as soon as the signal aborts.
 */
export async function raceWithSignal<T>(
    promise: Promise<T>,
    signal: AbortSignal,
    onAbort: () => Error,
): Promise<T> {
    if (signal.aborted) {
        throw onAbort();
    }

    let listener: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
        listener = () => reject(onAbort());
        signal.addEventListener('abort', listener, { once: true });
    });

    try {
        return await Promise.race([promise, aborted]);
    } finally {
        if (listener) {
            signal.removeEventListener('abort', listener);
        }
    }
}
