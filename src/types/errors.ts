/**
 * Typed failures shared by the breaker, router, orchestrator and API layers.
 *
 * Operational conditions (open circuits, unhealthy providers, low confidence) are
 * absorbed by the orchestrator. `ConfigurationError`, `InputValidationError` and
 * `NotFoundError` reach the caller and map to 4xx responses.
 */

export class CircuitOpenError extends Error {
    readonly breakerName: string;
    readonly remainingMs: number;

    constructor(breakerName: string, remainingMs: number) {
        super(
            `Circuit breaker '${breakerName}' is OPEN. Recovery in ${(remainingMs / 1000).toFixed(1)}s`,
        );
        this.name = 'CircuitOpenError';
        this.breakerName = breakerName;
        this.remainingMs = remainingMs;
    }
}

/** Network, 429 and 5xx-class failures from a backend call. Retried, then absorbed. */
export class TransientBackendError extends Error {
    readonly provider: string;
    readonly status: number | null;

    constructor(provider: string, message: string, status: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'TransientBackendError';
        this.provider = provider;
        this.status = status;
    }
}

export class CallTimeoutError extends Error {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'CallTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/** The backend cannot be used at all (missing credential, unreachable host). */
export class ProviderUnavailableError extends Error {
    readonly provider: string;

    constructor(provider: string, message: string) {
        super(message);
        this.name = 'ProviderUnavailableError';
        this.provider = provider;
    }
}

export class LaneCallFailedError extends Error {
    readonly attempts: number;

    constructor(attempts: number, cause: unknown) {
        super('LLM call failed after retries', { cause });
        this.name = 'LaneCallFailedError';
        this.attempts = attempts;
    }
}

/** Operator or programmer error with no safe default. Propagates past the orchestrator. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** Caller input was rejected. Never counted against a circuit breaker. */
export class InputValidationError extends Error {
    readonly hints: string[];

    constructor(message: string, hints: string[] = []) {
        super(message);
        this.name = 'InputValidationError';
        this.hints = hints;
    }
}

export class NotFoundError extends Error {
    readonly resource: string;
    readonly key: string;

    constructor(resource: string, key: string) {
        super(`${resource} '${key}' not found`);
        this.name = 'NotFoundError';
        this.resource = resource;
        this.key = key;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
