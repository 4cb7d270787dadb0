import { randomUUID } from 'node:crypto';
import type { CircuitBreakerEvent } from '../types/circuit-breaker.js';
import type { RoutingDecision } from '../types/routing.js';
import type { RoutingTelemetrySink } from './dynamic-router.js';
import type { CircuitBreakerEventSink } from './circuit-breaker.js';
import { saveCircuitBreakerEvent, saveRoutingEvent, saveRoutingUsage } from './db.js';

/** Persists breaker transitions and resets to `circuit_breaker_events`. */
export const persistCircuitBreakerEvent: CircuitBreakerEventSink = (event: CircuitBreakerEvent) => {
    saveCircuitBreakerEvent({
        id: randomUUID(),
        breaker: event.breaker,
        eventType: event.type,
        prevState: event.fromState,
        newState: event.toState,
        reason: event.reason,
        stats: event.stats,
        createdAt: event.at,
    });
};

function toStoredScore(decision: RoutingDecision): number | null {
    return Number.isFinite(decision.score) ? decision.score : null;
}

/** Routing decisions go to `routing_events`, completed calls to `routing_usage`. */
export function createSqliteRoutingTelemetry(maxDecisionRows = 500): RoutingTelemetrySink {
    return {
        decision(decision) {
            saveRoutingEvent({
                id: randomUUID(),
                correlationId: decision.correlationId,
                provider: decision.provider.name,
                strategy: decision.strategy,
                score: toStoredScore(decision),
                alternatives: decision.alternatives,
                reason: decision.reason,
                createdAt: decision.decidedAt,
            }, maxDecisionRows);
        },
        result(result) {
            saveRoutingUsage({
                provider: result.providerName,
                success: result.success,
                latencyMs: result.latencyMs,
                tokens: result.tokensUsed,
                cost: result.cost,
            });
        },
    };
}
