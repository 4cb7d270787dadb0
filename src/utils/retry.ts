import { errorMessage } from '../types/errors.js';
import { logEvent } from './logger.js';

/** Configuration for the retry helper. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 2 */
    maxAttempts?: number;
    /** Delay in ms before the first retry. @default 250 */
    baseDelayMs?: number;
    /** Maximum delay cap in ms. @default 4000 */
    maxDelayMs?: number;
    /** Label used in log events. */
    label?: string;
    /** Aborting stops further attempts and cuts the current backoff short. */
    signal?: AbortSignal;
    /** Return false to stop retrying after this error. */
    shouldRetry?: (err: unknown, attempt: number) => boolean;
    /** Called after every failed attempt, before any backoff. */
    onAttemptFailed?: (err: unknown, attempt: number) => void;
}

/** Result of a retried operation. */
export interface RetryResult<T> {
    ok: boolean;
    value?: T;
    error?: string;
    /** The last thrown value, unwrapped. */
    lastError?: unknown;
    attempts: number;
    totalDurationMs: number;
}

const DEFAULTS = {
    maxAttempts: 2,
    baseDelayMs: 250,
    maxDelayMs: 4_000,
};

/** `min(base × 2^retryIndex, max)`; `retryIndex` is 0 for the wait after the first failure. */
export function computeBackoffMs(retryIndex: number, baseDelayMs: number, maxDelayMs: number): number {
    return Math.max(0, Math.min(baseDelayMs * 2 ** retryIndex, maxDelayMs));
}

/**
 * Execute an async function with bounded exponential backoff retry.
 *
 * Never throws: the outcome, the attempt count and the last error come back in the
 * {@link RetryResult}.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   () => provider.generate(prompt),
 *   { maxAttempts: 2, label: 'ollama:generate' },
 * );
 * ```
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<RetryResult<T>> {
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULTS.maxAttempts));
    const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
    const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
    const label = options.label ?? 'unnamed';
    const signal = options.signal;

    const start = Date.now();
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (signal?.aborted) {
            lastError = lastError ?? signal.reason;
            break;
        }

        attempts = attempt;
        try {
            const value = await fn(attempt);
            const totalDurationMs = Date.now() - start;
            if (attempt > 1) {
                logEvent('retry_succeeded', { label, attempt, maxAttempts, totalDurationMs });
            }
            return { ok: true, value, attempts: attempt, totalDurationMs };
        } catch (err) {
            lastError = err;
            options.onAttemptFailed?.(err, attempt);

            const retryable = options.shouldRetry ? options.shouldRetry(err, attempt) : true;
            if (!retryable || attempt >= maxAttempts) {
                logEvent('retry_exhausted', {
                    label,
                    attempt,
                    maxAttempts,
                    retryable,
                    error: errorMessage(err),
                }, 'warn');
                break;
            }

            const delay = computeBackoffMs(attempt - 1, baseDelayMs, maxDelayMs);
            logEvent('retry_scheduled', { label, attempt, maxAttempts, delayMs: delay, error: errorMessage(err) }, 'warn');
            await sleep(delay, signal);
        }
    }

    return {
        ok: false,
        error: errorMessage(lastError),
        lastError,
        attempts,
        totalDurationMs: Date.now() - start,
    };
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
        return Promise.resolve();
    }
    return new Promise((resolve) => {
        const finish = (): void => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', finish);
            resolve();
        };
        const timer = setTimeout(finish, ms);
        signal?.addEventListener('abort', finish, { once: true });
    });
}
