export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerConfig {
    name: string;
    /** Consecutive counted failures in CLOSED before the circuit opens. */
    failureThreshold: number;
    /** Consecutive successes in HALF_OPEN before the circuit closes. */
    successThreshold: number;
    recoveryTimeoutMs: number;
    /** Decides whether an error moves the counters. Excluded errors pass straight through. */
    isFailure: (error: unknown) => boolean;
}

export type CircuitBreakerConfigInput = Partial<Omit<CircuitBreakerConfig, 'name'>> & { name?: string };

export interface CircuitBreakerStats {
    totalCalls: number;
    successfulCalls: number;
    failedCalls: number;
    rejectedCalls: number;
    stateTransitions: number;
    consecutiveFailures: number;
    consecutiveSuccesses: number;
    lastFailureAt: string | null;
    lastSuccessAt: string | null;
}

export interface CircuitBreakerStatsEntry {
    state: CircuitState;
    stats: CircuitBreakerStats;
}

export interface CircuitBreakerSnapshot extends CircuitBreakerStatsEntry {
    name: string;
    lastStateChangeAt: string;
    remainingMs: number;
    config: {
        failureThreshold: number;
        successThreshold: number;
        recoveryTimeoutMs: number;
    };
}

export type CircuitBreakerEventType = 'transition' | 'reset';

export interface CircuitBreakerEvent {
    type: CircuitBreakerEventType;
    breaker: string;
    fromState: CircuitState;
    toState: CircuitState;
    reason: string;
    stats: CircuitBreakerStats;
    at: string;
}
