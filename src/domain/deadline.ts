import { DeadlineExceededError } from './errors';

/**
 * Race a pending lookup against an abort signal
 *
 * The underlying promise keeps running when the signal fires, but its result
 * is discarded; callers must not write anything after a rejection.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) return Promise.reject(new DeadlineExceededError('Operation deadline exceeded'));

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new DeadlineExceededError('Operation deadline exceeded'));
        signal.addEventListener('abort', onAbort, { once: true });
        void promise.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new DeadlineExceededError('Operation deadline exceeded');
    }
}
