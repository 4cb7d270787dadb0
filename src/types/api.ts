import type { CircuitBreakerStatsEntry } from './circuit-breaker.js';
import type { OrchestratorMetrics } from './orchestration.js';
import type { CostSummary, ProviderHealth, RoutingMetrics, RoutingStrategy } from './routing.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    openCircuits: string[];
    circuitBreakers: Record<string, CircuitBreakerStatsEntry>;
    providers: ProviderHealth[];
}

// ── Circuit Breakers ────────────────────────────────────────────────────────

export interface CircuitBreakerResetData {
    message: string;
    previousState: string;
    currentState: string;
}

export interface CircuitBreakerResetAllData {
    message: string;
    before: Record<string, string>;
    after: Record<string, string>;
}

// ── Routing ─────────────────────────────────────────────────────────────────

export interface RoutingDecisionData {
    provider: string;
    model: string;
    strategy: RoutingStrategy;
    /** `null` when the decision fell back to the first registered provider. */
    score: number | null;
    alternatives: string[];
    reason: string;
    correlationId: string | null;
    decidedAt: string;
}

export interface RoutingMetricsData {
    routing: RoutingMetrics;
    orchestrator: OrchestratorMetrics;
    defaultStrategy: RoutingStrategy;
}

// ── Runbooks ────────────────────────────────────────────────────────────────

export interface RunbookIngestData {
    source: string;
    chunkIds: number[];
}

// ── Cost ────────────────────────────────────────────────────────────────────

/** Usage rows persisted by the routing telemetry sink, grouped per provider. */
export interface PersistedUsageEntry {
    provider: string;
    requests: number;
    failures: number;
    tokens: number;
    cost: number;
}

export interface CostSummaryData extends CostSummary {
    /** Survives restarts, unlike the in-memory ledger behind the other fields. */
    persistedUsage: PersistedUsageEntry[];
}
