import type { CircuitState } from './circuit-breaker.js';

export type RoutingStrategy =
    | 'cost_optimized'
    | 'latency_optimized'
    | 'quality_optimized'
    | 'balanced'
    | 'failover'
    | 'round_robin';

export const ROUTING_STRATEGIES: readonly RoutingStrategy[] = [
    'cost_optimized',
    'latency_optimized',
    'quality_optimized',
    'balanced',
    'failover',
    'round_robin',
];

export type ProviderKind =
    | 'ollama'
    | 'bedrock'
    | 'openai'
    | 'azure_openai'
    | 'anthropic'
    | 'vertex_ai'
    | 'openai_compatible';

export const PROVIDER_KINDS: readonly ProviderKind[] = [
    'ollama',
    'bedrock',
    'openai',
    'azure_openai',
    'anthropic',
    'vertex_ai',
    'openai_compatible',
];

export interface ProviderConfig {
    name: string;
    kind: ProviderKind;
    model: string;
    /** Lower is preferred. */
    priority: number;
    weight: number;
    costPer1kTokens: number;
    avgLatencyMs: number;
    maxTokens: number;
    capabilities: string[];
    enabled: boolean;
    rateLimitRpm: number;
    /** Requests started in the current minute window. */
    currentRpm: number;
    circuitBreakerName: string | null;
    /** Exponential moving average of call outcomes, 1 = always succeeds. */
    successRate: number;
    lastUsedAt: string | null;
}

export type ProviderConfigInput = Pick<ProviderConfig, 'name' | 'kind' | 'model'> &
    Partial<Omit<ProviderConfig, 'name' | 'kind' | 'model'>>;

export interface RoutingRequest {
    inputText: string;
    strategy?: RoutingStrategy;
    requiredCapabilities?: string[];
    excludedProviders?: string[];
    correlationId?: string;
}

export interface RoutingDecision {
    provider: ProviderConfig;
    strategy: RoutingStrategy;
    /** Lower is better; `Infinity` marks the no-candidate fallback. */
    score: number;
    alternatives: string[];
    reason: string;
    correlationId: string | null;
    decidedAt: string;
}

export interface RequestResultInput {
    providerName: string;
    success: boolean;
    latencyMs: number;
    tokensUsed?: number;
    cost?: number;
}

export interface ProviderHealth {
    name: string;
    isHealthy: boolean;
    circuitState: CircuitState | null;
    successRate: number;
    avgLatencyMs: number;
    lastCheckAt: string;
}

export interface RoutingMetrics {
    totalRequests: number;
    requestsByProvider: Record<string, number>;
    requestsByStrategy: Record<string, number>;
    avgRoutingTimeMs: number;
    fallbackCount: number;
}

// ── Cost ────────────────────────────────────────────────────────────────────

export interface CostEstimate {
    provider: string;
    estimatedTokens: number;
    costPer1kTokens: number;
    estimatedCost: number;
    currency: 'USD';
}

export interface CostBudgetLimits {
    dailyLimit: number;
    monthlyLimit: number;
    /** Fraction of either limit at which a budget alert is raised. */
    alertThreshold: number;
}

export interface CostBudgetStatus extends CostBudgetLimits {
    dailySpent: number;
    monthlySpent: number;
    dailyRemaining: number;
    monthlyRemaining: number;
    dailyUsagePercent: number;
    monthlyUsagePercent: number;
    lastDailyReset: string;
    lastMonthlyReset: string;
}

export interface UsageRecord {
    provider: string;
    tokens: number;
    cost: number;
    at: string;
}

export interface ProviderCostBreakdown {
    cost: number;
    tokens: number;
    requests: number;
}

export interface CostSummary {
    periodHours: number;
    totalCost: number;
    totalTokens: number;
    totalRequests: number;
    byProvider: Record<string, ProviderCostBreakdown>;
    budget: CostBudgetStatus;
}

// ── Load ────────────────────────────────────────────────────────────────────

export interface ProviderLoadStats {
    activeRequests: number;
    sampleCount: number;
    avgResponseTimeMs: number;
    minResponseTimeMs: number;
    maxResponseTimeMs: number;
}
