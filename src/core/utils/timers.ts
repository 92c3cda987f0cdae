/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
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
 * Waits for `promise` up to `ms`. Resolves true if it settled in time.
 */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>(resolve => {
        timer = setTimeout(() => resolve(false), ms);
    });

    try {
        return await Promise.race([
            promise.then(() => true, () => true),
            timeout
        ]);
    } finally {
        clearTimeout(timer);
    }
}
