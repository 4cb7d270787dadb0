import type {
    CircuitBreakerConfig,
    CircuitBreakerConfigInput,
    CircuitBreakerEvent,
    CircuitBreakerEventType,
    CircuitBreakerSnapshot,
    CircuitBreakerStats,
    CircuitBreakerStatsEntry,
    CircuitState,
} from '../types/circuit-breaker.js';
import { CircuitOpenError, ConfigurationError, InputValidationError, NotFoundError, errorMessage } from '../types/errors.js';
import { logEvent } from '../utils/logger.js';

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_SUCCESS_THRESHOLD = 2;
export const DEFAULT_RECOVERY_TIMEOUT_MS = 30_000;

/** Caller input errors never say anything about the health of the dependency. */
export function countsAsFailure(error: unknown): boolean {
    return !(error instanceof InputValidationError);
}

function assertPositiveInteger(name: string, field: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`Circuit breaker '${name}': ${field} must be an integer >= 1 (got ${value}).`);
    }
}

export function createCircuitBreakerConfig(name: string, input: CircuitBreakerConfigInput = {}): CircuitBreakerConfig {
    const config: CircuitBreakerConfig = {
        name,
        failureThreshold: input.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD,
        successThreshold: input.successThreshold ?? DEFAULT_SUCCESS_THRESHOLD,
        recoveryTimeoutMs: input.recoveryTimeoutMs ?? DEFAULT_RECOVERY_TIMEOUT_MS,
        isFailure: input.isFailure ?? countsAsFailure,
    };

    assertPositiveInteger(name, 'failureThreshold', config.failureThreshold);
    assertPositiveInteger(name, 'successThreshold', config.successThreshold);
    if (!Number.isFinite(config.recoveryTimeoutMs) || config.recoveryTimeoutMs < 0) {
        throw new ConfigurationError(
            `Circuit breaker '${name}': recoveryTimeoutMs must be a non-negative number (got ${config.recoveryTimeoutMs}).`,
        );
    }

    return Object.freeze(config);
}

/** Model backends: trip quickly, wait longer before probing. */
export function forLlmProvider(name = 'llm'): CircuitBreakerConfig {
    return createCircuitBreakerConfig(name, {
        failureThreshold: 3,
        successThreshold: 2,
        recoveryTimeoutMs: 60_000,
    });
}

export function forExternalApi(name = 'api'): CircuitBreakerConfig {
    return createCircuitBreakerConfig(name, {
        failureThreshold: 5,
        successThreshold: 3,
        recoveryTimeoutMs: 30_000,
    });
}

export type CircuitBreakerEventSink = (event: CircuitBreakerEvent) => void;

export interface CircuitBreakerOptions {
    now?: () => number;
    /** Receives every automatic transition and every manual reset. */
    onEvent?: CircuitBreakerEventSink;
}

function emptyStats(): CircuitBreakerStats {
    return {
        totalCalls: 0,
        successfulCalls: 0,
        failedCalls: 0,
        rejectedCalls: 0,
        stateTransitions: 0,
        consecutiveFailures: 0,
        consecutiveSuccesses: 0,
        lastFailureAt: null,
        lastSuccessAt: null,
    };
}

/**
 * Per-dependency failure tracker and fast-fail gate.
 *
 * CLOSED counts consecutive failures and opens at `failureThreshold`. OPEN rejects
 * every call with {@link CircuitOpenError} until `recoveryTimeoutMs` has elapsed, at
 * which point the next state query moves it to HALF_OPEN. HALF_OPEN reopens on any
 * counted failure and closes after `successThreshold` consecutive successes.
 *
 * Every read-modify-write below runs without an intervening `await`, so concurrent
 * requests on the event loop never observe a half-applied transition.
 */
export class CircuitBreaker {
    readonly config: CircuitBreakerConfig;

    #state: CircuitState = 'closed';
    #lastStateChange: number;
    #stats: CircuitBreakerStats = emptyStats();
    readonly #now: () => number;
    readonly #onEvent: CircuitBreakerEventSink | undefined;

    constructor(config: CircuitBreakerConfig, options: CircuitBreakerOptions = {}) {
        this.config = config;
        this.#now = options.now ?? Date.now;
        this.#onEvent = options.onEvent;
        this.#lastStateChange = this.#now();
    }

    get name(): string {
        return this.config.name;
    }

    /** Current state; may move OPEN to HALF_OPEN when the recovery timeout has elapsed. */
    get state(): CircuitState {
        if (this.#state === 'open' && this.#now() - this.#lastStateChange >= this.config.recoveryTimeoutMs) {
            this.#transitionTo('half_open', 'recovery timeout elapsed');
        }
        return this.#state;
    }

    get stats(): CircuitBreakerStats {
        return { ...this.#stats };
    }

    get isClosed(): boolean {
        return this.state === 'closed';
    }

    get isOpen(): boolean {
        return this.state === 'open';
    }

    get isHalfOpen(): boolean {
        return this.state === 'half_open';
    }

    /** Milliseconds until an OPEN circuit admits a trial call; 0 in any other state. */
    get remainingMs(): number {
        if (this.state !== 'open') return 0;
        return Math.max(0, this.config.recoveryTimeoutMs - (this.#now() - this.#lastStateChange));
    }

    async execute<T>(operation: () => Promise<T>): Promise<T> {
        this.#admit();
        let result: T;
        try {
            result = await operation();
        } catch (err) {
            this.#onError(err);
            throw err;
        }
        this.#recordSuccess();
        return result;
    }

    executeSync<T>(operation: () => T): T {
        this.#admit();
        let result: T;
        try {
            result = operation();
        } catch (err) {
            this.#onError(err);
            throw err;
        }
        this.#recordSuccess();
        return result;
    }

    /** Bind an async function to this breaker; each call goes through {@link execute} once. */
    wrap<A extends unknown[], R>(fn: (...args: A) => Promise<R>): (...args: A) => Promise<R> {
        return (...args: A) => this.execute(() => fn(...args));
    }

    /** Operator escape hatch: force CLOSED from any state and clear both streaks. */
    reset(): void {
        const previous = this.#state;
        if (previous !== 'closed') {
            this.#state = 'closed';
            this.#lastStateChange = this.#now();
            this.#stats.stateTransitions++;
        }
        this.#stats.consecutiveFailures = 0;
        this.#stats.consecutiveSuccesses = 0;

        logEvent('circuit_breaker_reset', { name: this.name, fromState: previous });
        this.#emit('reset', previous, 'closed', 'manual reset');
    }

    snapshot(): CircuitBreakerSnapshot {
        const state = this.state;
        return {
            name: this.name,
            state,
            stats: this.stats,
            lastStateChangeAt: new Date(this.#lastStateChange).toISOString(),
            remainingMs: this.remainingMs,
            config: {
                failureThreshold: this.config.failureThreshold,
                successThreshold: this.config.successThreshold,
                recoveryTimeoutMs: this.config.recoveryTimeoutMs,
            },
        };
    }

    #admit(): void {
        if (this.state === 'open') {
            this.#stats.rejectedCalls++;
            const remaining = this.config.recoveryTimeoutMs - (this.#now() - this.#lastStateChange);
            throw new CircuitOpenError(this.name, Math.max(0, remaining));
        }
    }

    #onError(err: unknown): void {
        if (this.config.isFailure(err)) {
            this.#recordFailure(err);
        }
    }

    #recordSuccess(): void {
        const stats = this.#stats;
        stats.totalCalls++;
        stats.successfulCalls++;
        stats.consecutiveSuccesses++;
        stats.consecutiveFailures = 0;
        stats.lastSuccessAt = new Date(this.#now()).toISOString();

        if (this.#state === 'half_open' && stats.consecutiveSuccesses >= this.config.successThreshold) {
            this.#transitionTo('closed', 'success threshold reached');
            stats.consecutiveSuccesses = 0;
            stats.consecutiveFailures = 0;
        }
    }

    #recordFailure(err: unknown): void {
        const stats = this.#stats;
        stats.totalCalls++;
        stats.failedCalls++;
        stats.consecutiveFailures++;
        stats.consecutiveSuccesses = 0;
        stats.lastFailureAt = new Date(this.#now()).toISOString();

        logEvent('circuit_breaker_failure', {
            name: this.name,
            state: this.#state,
            consecutiveFailures: stats.consecutiveFailures,
            error: errorMessage(err),
        }, 'warn');

        if (this.#state === 'half_open') {
            this.#transitionTo('open', 'failure while half-open');
        } else if (this.#state === 'closed' && stats.consecutiveFailures >= this.config.failureThreshold) {
            this.#transitionTo('open', `failure threshold ${this.config.failureThreshold} reached`);
        }
    }

    #transitionTo(next: CircuitState, reason: string): void {
        const previous = this.#state;
        if (previous === next) return;

        this.#state = next;
        this.#lastStateChange = this.#now();
        this.#stats.stateTransitions++;

        logEvent('circuit_breaker_transition', {
            name: this.name,
            fromState: previous,
            toState: next,
            reason,
            consecutiveFailures: this.#stats.consecutiveFailures,
            consecutiveSuccesses: this.#stats.consecutiveSuccesses,
        }, next === 'open' ? 'warn' : 'info');
        this.#emit('transition', previous, next, reason);
    }

    #emit(type: CircuitBreakerEventType, fromState: CircuitState, toState: CircuitState, reason: string): void {
        if (!this.#onEvent) return;
        try {
            this.#onEvent({
                type,
                breaker: this.name,
                fromState,
                toState,
                reason,
                stats: this.stats,
                at: new Date(this.#now()).toISOString(),
            });
        } catch (err) {
            logEvent('circuit_breaker_event_sink_failed', { name: this.name, error: errorMessage(err) }, 'warn');
        }
    }
}

/**
 * Named breakers, created on first lookup and kept for the life of the process.
 * One instance is built at startup and passed to every consumer.
 */
export class CircuitBreakerRegistry {
    readonly #breakers = new Map<string, CircuitBreaker>();
    readonly #options: CircuitBreakerOptions;

    constructor(options: CircuitBreakerOptions = {}) {
        this.#options = options;
    }

    /** Returns the breaker for `name`, creating it with `config` on first use. The key wins over any config name. */
    get(name: string, config: CircuitBreakerConfigInput = {}): CircuitBreaker {
        const existing = this.#breakers.get(name);
        if (existing) return existing;

        const breaker = new CircuitBreaker(createCircuitBreakerConfig(name, config), this.#options);
        this.#breakers.set(name, breaker);
        return breaker;
    }

    find(name: string): CircuitBreaker | undefined {
        return this.#breakers.get(name);
    }

    has(name: string): boolean {
        return this.#breakers.has(name);
    }

    /** Like {@link find} but throws {@link NotFoundError} for unknown names. */
    require(name: string): CircuitBreaker {
        const breaker = this.#breakers.get(name);
        if (!breaker) {
            throw new NotFoundError('Circuit breaker', name);
        }
        return breaker;
    }

    names(): string[] {
        return [...this.#breakers.keys()];
    }

    getAllStats(): Record<string, CircuitBreakerStatsEntry> {
        const result: Record<string, CircuitBreakerStatsEntry> = {};
        for (const [name, breaker] of this.#breakers) {
            result[name] = { state: breaker.state, stats: breaker.stats };
        }
        return result;
    }

    reset(name: string): CircuitBreakerSnapshot {
        const breaker = this.require(name);
        breaker.reset();
        return breaker.snapshot();
    }

    resetAll(): void {
        for (const breaker of this.#breakers.values()) {
            breaker.reset();
        }
    }

    remove(name: string): boolean {
        const removed = this.#breakers.delete(name);
        if (removed) {
            logEvent('circuit_breaker_removed', { name });
        }
        return removed;
    }
}
