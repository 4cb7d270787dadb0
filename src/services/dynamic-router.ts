import type {
    CostSummary,
    ProviderConfig,
    ProviderConfigInput,
    ProviderHealth,
    ProviderLoadStats,
    RequestResultInput,
    RoutingDecision,
    RoutingMetrics,
    RoutingRequest,
    RoutingStrategy,
} from '../types/routing.js';
import { ROUTING_STRATEGIES } from '../types/routing.js';
import type { CircuitState } from '../types/circuit-breaker.js';
import { ConfigurationError, errorMessage } from '../types/errors.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { CostOptimizer } from './cost-optimizer.js';
import { LoadBalancer } from './load-balancer.js';
import { ProviderRegistry } from './provider-registry.js';
import { logEvent } from '../utils/logger.js';

const EMA_ALPHA = 0.1;
const MAX_ALTERNATIVES = 3;
export const NO_PROVIDER_REASON = 'No available providers, using fallback';

export function isRoutingStrategy(value: unknown): value is RoutingStrategy {
    return typeof value === 'string' && ROUTING_STRATEGIES.some((strategy) => strategy === value);
}

export function parseRoutingStrategy(raw: string): RoutingStrategy {
    const normalized = raw.trim().toLowerCase();
    if (!isRoutingStrategy(normalized)) {
        throw new ConfigurationError(
            `Invalid routing strategy '${raw}'. Expected one of: ${ROUTING_STRATEGIES.join(', ')}.`,
        );
    }
    return normalized;
}

/** Receives decisions and completed-call reports, e.g. to persist them. */
export interface RoutingTelemetrySink {
    decision?(decision: RoutingDecision): void;
    result?(result: Required<RequestResultInput>): void;
}

export interface DynamicRouterOptions {
    breakers: CircuitBreakerRegistry;
    providers?: ProviderRegistry;
    costOptimizer?: CostOptimizer;
    loadBalancer?: LoadBalancer;
    defaultStrategy?: RoutingStrategy;
    telemetry?: RoutingTelemetrySink;
    now?: () => number;
}

function emptyMetrics(): RoutingMetrics {
    return {
        totalRequests: 0,
        requestsByProvider: {},
        requestsByStrategy: {},
        avgRoutingTimeMs: 0,
        fallbackCount: 0,
    };
}

function normalizeAgainstMax(value: number, max: number): number {
    return max > 0 ? value / max : 0;
}

/**
 * Scores and selects among registered providers.
 *
 * Filtering runs in a fixed order (excluded, disabled, missing capability, open
 * circuit, rate limited) and the surviving candidates are ranked by the chosen
 * strategy; lower scores win. When nothing survives, the first registered provider
 * is returned with an infinite score and the anomaly is logged.
 */
export class DynamicRouter {
    readonly providers: ProviderRegistry;
    readonly costOptimizer: CostOptimizer;
    readonly loadBalancer: LoadBalancer;

    readonly #breakers: CircuitBreakerRegistry;
    readonly #telemetry: RoutingTelemetrySink | undefined;
    readonly #now: () => number;
    #defaultStrategy: RoutingStrategy;
    #metrics: RoutingMetrics = emptyMetrics();

    constructor(options: DynamicRouterOptions) {
        this.#breakers = options.breakers;
        this.#now = options.now ?? Date.now;
        this.providers = options.providers ?? new ProviderRegistry({ now: this.#now });
        this.costOptimizer = options.costOptimizer ?? new CostOptimizer({ now: this.#now });
        this.loadBalancer = options.loadBalancer ?? new LoadBalancer();
        this.#defaultStrategy = options.defaultStrategy ?? 'balanced';
        this.#telemetry = options.telemetry;
    }

    // ── Provider administration ──────────────────────────────────────────────

    registerProvider(input: ProviderConfigInput): ProviderConfig {
        return this.providers.register(input);
    }

    unregisterProvider(name: string): boolean {
        return this.providers.unregister(name);
    }

    getProvider(name: string): ProviderConfig | undefined {
        return this.providers.get(name);
    }

    /** Throws {@link NotFoundError} for unknown names. */
    describeProvider(name: string): ProviderConfig {
        return this.providers.require(name);
    }

    listProviders(): ProviderConfig[] {
        return this.providers.list();
    }

    setProviderEnabled(name: string, enabled: boolean): ProviderConfig {
        const provider = this.providers.setEnabled(name, enabled);
        logEvent('provider_enabled_changed', { name, enabled });
        return provider;
    }

    getDefaultStrategy(): RoutingStrategy {
        return this.#defaultStrategy;
    }

    setDefaultStrategy(strategy: string): RoutingStrategy {
        const parsed = parseRoutingStrategy(strategy);
        this.#defaultStrategy = parsed;
        logEvent('routing_strategy_changed', { strategy: parsed });
        return parsed;
    }

    // ── Routing ──────────────────────────────────────────────────────────────

    route(request: RoutingRequest): RoutingDecision {
        const startedAt = performance.now();
        const strategy = request.strategy ?? this.#defaultStrategy;
        const correlationId = request.correlationId ?? null;

        const all = this.providers.list();
        const first = all[0];
        if (!first) {
            throw new ConfigurationError('No LLM providers configured');
        }

        const candidates = this.#filterCandidates(all, request);
        if (candidates.length === 0) {
            this.#metrics.fallbackCount++;
            logEvent('no_providers_available', {
                strategy,
                requiredCapabilities: request.requiredCapabilities ?? [],
                excludedProviders: request.excludedProviders ?? [],
                fallbackProvider: first.name,
                correlationId,
            }, 'warn');
            const decision = this.#decision(first, strategy, Infinity, [], NO_PROVIDER_REASON, correlationId);
            this.#publishDecision(decision);
            return decision;
        }

        const decision = this.#select(candidates, request.inputText, strategy, correlationId);
        const routingTimeMs = performance.now() - startedAt;
        this.#recordRouting(decision, routingTimeMs);

        logEvent('routing_decision', {
            provider: decision.provider.name,
            strategy,
            score: decision.score,
            candidates: candidates.length,
            routingTimeMs: Math.round(routingTimeMs * 1000) / 1000,
            correlationId,
        });
        this.#publishDecision(decision);
        return decision;
    }

    // ── Feedback ─────────────────────────────────────────────────────────────

    recordRequestStart(providerName: string): void {
        this.loadBalancer.recordRequestStart(providerName);
        this.providers.recordRequestStart(providerName);
    }

    /** Call once per completed backend call, successful or not. */
    recordRequestResult(input: RequestResultInput): void {
        const result: Required<RequestResultInput> = {
            providerName: input.providerName,
            success: input.success,
            latencyMs: input.latencyMs,
            tokensUsed: input.tokensUsed ?? 0,
            cost: input.cost ?? 0,
        };

        this.loadBalancer.recordRequestEnd(result.providerName, result.latencyMs);
        if (result.cost > 0) {
            this.costOptimizer.recordUsage(result.providerName, result.tokensUsed, result.cost);
        }
        this.providers.recordOutcome(result.providerName, result.success, result.latencyMs, EMA_ALPHA);

        if (this.#telemetry?.result) {
            try {
                this.#telemetry.result(result);
            } catch (err) {
                logEvent('routing_telemetry_failed', { kind: 'result', error: errorMessage(err) }, 'warn');
            }
        }
    }

    // ── Reporting ────────────────────────────────────────────────────────────

    getProviderHealth(): ProviderHealth[] {
        const checkedAt = new Date(this.#now()).toISOString();
        return this.providers.list().map((provider) => {
            const circuitState = this.#circuitState(provider);
            return {
                name: provider.name,
                isHealthy: this.providers.isAvailable(provider) && circuitState !== 'open',
                circuitState,
                successRate: provider.successRate,
                avgLatencyMs: provider.avgLatencyMs,
                lastCheckAt: checkedAt,
            };
        });
    }

    getMetrics(): RoutingMetrics {
        return {
            ...this.#metrics,
            requestsByProvider: { ...this.#metrics.requestsByProvider },
            requestsByStrategy: { ...this.#metrics.requestsByStrategy },
        };
    }

    getCostSummary(hours = 24): CostSummary {
        return this.costOptimizer.getCostSummary(hours);
    }

    getLoadStats(): Record<string, ProviderLoadStats> {
        return this.loadBalancer.getStats();
    }

    // ── Internals ────────────────────────────────────────────────────────────

    #circuitState(provider: ProviderConfig): CircuitState | null {
        if (!provider.circuitBreakerName) return null;
        return this.#breakers.find(provider.circuitBreakerName)?.state ?? null;
    }

    #filterCandidates(providers: ProviderConfig[], request: RoutingRequest): ProviderConfig[] {
        const excluded = new Set(request.excludedProviders ?? []);
        const required = request.requiredCapabilities ?? [];

        return providers.filter((provider) => {
            if (excluded.has(provider.name)) return false;
            if (!provider.enabled) return false;
            if (!required.every((capability) => provider.capabilities.includes(capability))) return false;
            if (this.#circuitState(provider) === 'open') return false;
            return this.providers.isAvailable(provider);
        });
    }

    #select(
        candidates: ProviderConfig[],
        inputText: string,
        strategy: RoutingStrategy,
        correlationId: string | null,
    ): RoutingDecision {
        switch (strategy) {
            case 'cost_optimized':
                return this.#selectByCost(candidates, inputText, correlationId);
            case 'latency_optimized':
                return this.#selectByLatency(candidates, correlationId);
            case 'quality_optimized':
                return this.#selectByPriority(candidates, strategy, correlationId);
            case 'failover':
                return this.#selectByPriority(candidates, strategy, correlationId);
            case 'round_robin':
                return this.#selectRoundRobin(candidates, correlationId);
            case 'balanced':
                return this.#selectBalanced(candidates, correlationId);
        }
    }

    #selectByCost(candidates: ProviderConfig[], inputText: string, correlationId: string | null): RoutingDecision {
        const ranked = this.costOptimizer.rankByCost(candidates, inputText);
        const [best, ...rest] = ranked;
        if (!best) return this.#never();
        return this.#decision(
            best.provider,
            'cost_optimized',
            best.estimate.estimatedCost,
            rest.slice(0, MAX_ALTERNATIVES).map((entry) => entry.provider.name),
            `Lowest cost: $${best.estimate.estimatedCost.toFixed(6)}`,
            correlationId,
        );
    }

    #selectByLatency(candidates: ProviderConfig[], correlationId: string | null): RoutingDecision {
        const provider = this.loadBalancer.selectFastest(candidates) ?? candidates[0] ?? this.#never();
        const latency = this.loadBalancer.expectedLatencyMs(provider);
        return this.#decision(
            provider,
            'latency_optimized',
            latency,
            this.#others(candidates, provider).slice(0, MAX_ALTERNATIVES),
            `Lowest latency: ${Math.round(latency)}ms`,
            correlationId,
        );
    }

    #selectByPriority(
        candidates: ProviderConfig[],
        strategy: 'quality_optimized' | 'failover',
        correlationId: string | null,
    ): RoutingDecision {
        const sorted = [...candidates].sort((left, right) => left.priority - right.priority);
        const [provider, ...rest] = sorted;
        if (!provider) return this.#never();

        if (strategy === 'failover') {
            return this.#decision(
                provider,
                strategy,
                provider.priority,
                rest.map((entry) => entry.name),
                `Primary: ${provider.name}, failovers: ${rest.length}`,
                correlationId,
            );
        }
        return this.#decision(
            provider,
            strategy,
            provider.priority,
            rest.slice(0, MAX_ALTERNATIVES).map((entry) => entry.name),
            `Highest quality (priority ${provider.priority})`,
            correlationId,
        );
    }

    #selectRoundRobin(candidates: ProviderConfig[], correlationId: string | null): RoutingDecision {
        const provider = this.loadBalancer.selectRoundRobin(candidates) ?? candidates[0] ?? this.#never();
        return this.#decision(
            provider,
            'round_robin',
            0,
            this.#others(candidates, provider).slice(0, MAX_ALTERNATIVES),
            'Round robin selection',
            correlationId,
        );
    }

    /** 0.3 cost + 0.3 latency + 0.4 priority, each normalised against the candidate maximum. */
    #selectBalanced(candidates: ProviderConfig[], correlationId: string | null): RoutingDecision {
        const costs = candidates.map((provider) => this.costOptimizer.getCostPer1k(provider));
        const maxCost = Math.max(...costs);
        const maxLatency = Math.max(...candidates.map((provider) => provider.avgLatencyMs));
        const maxPriority = Math.max(...candidates.map((provider) => provider.priority));

        const scored = candidates.map((provider, index) => ({
            provider,
            score:
                0.3 * normalizeAgainstMax(costs[index] ?? 0, maxCost) +
                0.3 * normalizeAgainstMax(provider.avgLatencyMs, maxLatency) +
                0.4 * normalizeAgainstMax(provider.priority, maxPriority),
        }));
        scored.sort((left, right) => left.score - right.score);

        const [best, ...rest] = scored;
        if (!best) return this.#never();
        return this.#decision(
            best.provider,
            'balanced',
            best.score,
            rest.slice(0, MAX_ALTERNATIVES).map((entry) => entry.provider.name),
            `Balanced score: ${best.score.toFixed(3)}`,
            correlationId,
        );
    }

    #others(candidates: ProviderConfig[], selected: ProviderConfig): string[] {
        return candidates.filter((provider) => provider.name !== selected.name).map((provider) => provider.name);
    }

    #decision(
        provider: ProviderConfig,
        strategy: RoutingStrategy,
        score: number,
        alternatives: string[],
        reason: string,
        correlationId: string | null,
    ): RoutingDecision {
        return Object.freeze({
            provider,
            strategy,
            score,
            alternatives,
            reason,
            correlationId,
            decidedAt: new Date(this.#now()).toISOString(),
        });
    }

    #recordRouting(decision: RoutingDecision, routingTimeMs: number): void {
        const metrics = this.#metrics;
        metrics.totalRequests++;
        const providerName = decision.provider.name;
        metrics.requestsByProvider[providerName] = (metrics.requestsByProvider[providerName] ?? 0) + 1;
        metrics.requestsByStrategy[decision.strategy] = (metrics.requestsByStrategy[decision.strategy] ?? 0) + 1;
        const n = metrics.totalRequests;
        metrics.avgRoutingTimeMs = (metrics.avgRoutingTimeMs * (n - 1) + routingTimeMs) / n;
    }

    #publishDecision(decision: RoutingDecision): void {
        if (!this.#telemetry?.decision) return;
        try {
            this.#telemetry.decision(decision);
        } catch (err) {
            logEvent('routing_telemetry_failed', { kind: 'decision', error: errorMessage(err) }, 'warn');
        }
    }

    /** Strategy helpers only run with at least one candidate. */
    #never(): never {
        throw new Error('Routing invariant violated: strategy invoked without candidates');
    }
}
