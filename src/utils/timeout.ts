import { CallTimeoutError } from '../types/errors.js';

/**
 * Runs `fn` with an `AbortSignal` that fires after `timeoutMs` or when `parentSignal`
 * aborts, whichever comes first. A timeout rejects with {@link CallTimeoutError}; a
 * parent abort rejects with the parent's reason. The signal is aborted in both cases
 * so the underlying request stops.
 */
export function withTimeout<T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
    parentSignal?: AbortSignal,
): Promise<T> {
    const controller = new AbortController();

    if (parentSignal?.aborted) {
        controller.abort(parentSignal.reason);
        return Promise.reject(parentSignal.reason);
    }

    return new Promise<T>((resolve, reject) => {
        let settled = false;

        const cleanup = (): void => {
            settled = true;
            clearTimeout(timer);
            parentSignal?.removeEventListener('abort', onParentAbort);
        };

        const fail = (reason: unknown): void => {
            if (settled) return;
            cleanup();
            controller.abort(reason);
            reject(reason);
        };

        const onParentAbort = (): void => fail(parentSignal?.reason);
        const timer = setTimeout(() => fail(new CallTimeoutError(label, timeoutMs)), timeoutMs);
        parentSignal?.addEventListener('abort', onParentAbort, { once: true });

        fn(controller.signal).then(
            (value) => {
                if (settled) return;
                cleanup();
                resolve(value);
            },
            (err: unknown) => {
                if (settled) return;
                cleanup();
                reject(err);
            },
        );
    });
}
