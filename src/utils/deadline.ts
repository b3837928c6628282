// src/utils/deadline.ts

export type Deadlined<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Wait for `promise` at most `ms` milliseconds. On timeout the promise is
 * abandoned, not cancelled: it may still settle later and its result (or
 * rejection) is dropped.
 */
export function withDeadline<T>(promise: Promise<T>, ms: number): Promise<Deadlined<T>> {
    return new Promise<Deadlined<T>>((resolve, reject) => {
        const timer = setTimeout(() => resolve({ timedOut: true }), Math.max(0, ms));
        promise.then(
            (value) => {
                clearTimeout(timer);
                resolve({ timedOut: false, value });
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            }
        );
    });
}
