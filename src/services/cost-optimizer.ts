import type {
    CostBudgetLimits,
    CostBudgetStatus,
    CostEstimate,
    CostSummary,
    ProviderConfig,
    ProviderCostBreakdown,
    ProviderKind,
    UsageRecord,
} from '../types/routing.js';
import { logEvent } from '../utils/logger.js';

/** Approximate USD per 1K tokens, used when a provider is registered without a cost. */
export const DEFAULT_COSTS_PER_1K: Record<ProviderKind, number> = {
    ollama: 0,
    bedrock: 0.002,
    openai: 0.01,
    azure_openai: 0.01,
    anthropic: 0.008,
    vertex_ai: 0.005,
    openai_compatible: 0.01,
};

export const DEFAULT_OUTPUT_TOKENS = 500;
const MAX_USAGE_RECORDS = 1000;
const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_BUDGET_LIMITS: CostBudgetLimits = {
    dailyLimit: 10,
    monthlyLimit: 100,
    alertThreshold: 0.8,
};

// Hiragana/Katakana, CJK unified ideographs, Hangul syllables.
const CJK_PATTERN = /[\u3040-\u30ff\u4e00-\u9fff\uac00-\ud7a3]/g;

/** ~1.5 characters per token for CJK text, ~4 for everything else. */
export function estimateTokens(text: string): number {
    if (!text) return 0;
    const cjkCount = text.match(CJK_PATTERN)?.length ?? 0;
    const otherCount = text.length - cjkCount;
    return Math.floor(cjkCount / 1.5 + otherCount / 4);
}

function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

function utcDay(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
}

function utcMonth(ms: number): string {
    return new Date(ms).toISOString().slice(0, 7);
}

export interface CostOptimizerOptions {
    limits?: Partial<CostBudgetLimits>;
    /** Per-provider cost overrides, keyed by provider name. */
    customCosts?: Record<string, number>;
    now?: () => number;
}

/**
 * Token and cost estimation plus the daily/monthly spend ledger.
 *
 * Ledger updates are synchronous read-modify-writes, so concurrent completions
 * never lose an increment.
 */
export class CostOptimizer {
    readonly limits: CostBudgetLimits;
    readonly #customCosts: Map<string, number>;
    readonly #now: () => number;

    #dailySpent = 0;
    #monthlySpent = 0;
    #lastDailyReset: number;
    #lastMonthlyReset: number;
    #records: UsageRecord[] = [];

    constructor(options: CostOptimizerOptions = {}) {
        this.limits = { ...DEFAULT_BUDGET_LIMITS, ...options.limits };
        this.#customCosts = new Map(Object.entries(options.customCosts ?? {}));
        this.#now = options.now ?? Date.now;
        this.#lastDailyReset = this.#now();
        this.#lastMonthlyReset = this.#lastDailyReset;
    }

    getCostPer1k(provider: ProviderConfig): number {
        return this.#customCosts.get(provider.name) ?? provider.costPer1kTokens;
    }

    estimateCost(provider: ProviderConfig, inputText: string, expectedOutputTokens = DEFAULT_OUTPUT_TOKENS): CostEstimate {
        const totalTokens = estimateTokens(inputText) + expectedOutputTokens;
        const costPer1k = this.getCostPer1k(provider);
        return {
            provider: provider.name,
            estimatedTokens: totalTokens,
            costPer1kTokens: costPer1k,
            estimatedCost: (totalTokens / 1000) * costPer1k,
            currency: 'USD',
        };
    }

    /** Cheapest first; equal costs keep the input order. */
    rankByCost(
        providers: ProviderConfig[],
        inputText: string,
        expectedOutputTokens = DEFAULT_OUTPUT_TOKENS,
    ): Array<{ provider: ProviderConfig; estimate: CostEstimate }> {
        return providers
            .map((provider) => ({ provider, estimate: this.estimateCost(provider, inputText, expectedOutputTokens) }))
            .sort((left, right) => left.estimate.estimatedCost - right.estimate.estimatedCost);
    }

    recordUsage(providerName: string, tokens: number, cost: number): void {
        const now = this.#now();

        if (utcDay(now) !== utcDay(this.#lastDailyReset)) {
            this.#dailySpent = 0;
            this.#lastDailyReset = now;
        }
        if (utcMonth(now) !== utcMonth(this.#lastMonthlyReset)) {
            this.#monthlySpent = 0;
            this.#lastMonthlyReset = now;
        }

        this.#dailySpent += cost;
        this.#monthlySpent += cost;

        this.#records.push({ provider: providerName, tokens, cost, at: new Date(now).toISOString() });
        if (this.#records.length > MAX_USAGE_RECORDS) {
            this.#records = this.#records.slice(-MAX_USAGE_RECORDS);
        }

        if (this.shouldAlert()) {
            logEvent('cost_budget_alert', {
                dailySpent: round(this.#dailySpent, 4),
                dailyLimit: this.limits.dailyLimit,
                monthlySpent: round(this.#monthlySpent, 4),
                monthlyLimit: this.limits.monthlyLimit,
            }, 'warn');
        }
    }

    isWithinBudget(additionalCost = 0): boolean {
        if (this.#dailySpent + additionalCost > this.limits.dailyLimit) return false;
        return this.#monthlySpent + additionalCost <= this.limits.monthlyLimit;
    }

    shouldAlert(): boolean {
        const { dailyLimit, monthlyLimit, alertThreshold } = this.limits;
        const dailyUsage = dailyLimit > 0 ? this.#dailySpent / dailyLimit : 0;
        const monthlyUsage = monthlyLimit > 0 ? this.#monthlySpent / monthlyLimit : 0;
        return dailyUsage >= alertThreshold || monthlyUsage >= alertThreshold;
    }

    getBudgetStatus(): CostBudgetStatus {
        const { dailyLimit, monthlyLimit } = this.limits;
        return {
            ...this.limits,
            dailySpent: round(this.#dailySpent, 4),
            monthlySpent: round(this.#monthlySpent, 4),
            dailyRemaining: round(dailyLimit - this.#dailySpent, 4),
            monthlyRemaining: round(monthlyLimit - this.#monthlySpent, 4),
            dailyUsagePercent: dailyLimit > 0 ? round((this.#dailySpent / dailyLimit) * 100, 1) : 0,
            monthlyUsagePercent: monthlyLimit > 0 ? round((this.#monthlySpent / monthlyLimit) * 100, 1) : 0,
            lastDailyReset: new Date(this.#lastDailyReset).toISOString(),
            lastMonthlyReset: new Date(this.#lastMonthlyReset).toISOString(),
        };
    }

    getCostSummary(hours = 24): CostSummary {
        const cutoff = this.#now() - hours * HOUR_MS;
        const recent = this.#records.filter((record) => Date.parse(record.at) >= cutoff);

        const byProvider: Record<string, ProviderCostBreakdown> = {};
        let totalCost = 0;
        let totalTokens = 0;
        for (const record of recent) {
            totalCost += record.cost;
            totalTokens += record.tokens;
            const entry = byProvider[record.provider] ?? { cost: 0, tokens: 0, requests: 0 };
            entry.cost += record.cost;
            entry.tokens += record.tokens;
            entry.requests += 1;
            byProvider[record.provider] = entry;
        }
        for (const entry of Object.values(byProvider)) {
            entry.cost = round(entry.cost, 4);
        }

        return {
            periodHours: hours,
            totalCost: round(totalCost, 4),
            totalTokens,
            totalRequests: recent.length,
            byProvider,
            budget: this.getBudgetStatus(),
        };
    }
}
