import { afterEach, describe, expect, it, vi } from 'vitest';
import { CostOptimizer, estimateTokens } from '../../src/services/cost-optimizer.js';
import { createProviderConfig } from '../../src/services/provider-registry.js';
import { logger } from '../../src/utils/logger.js';

function createClock(start: number) {
    let current = start;
    return {
        now: () => current,
        set: (value: number) => {
            current = value;
        },
    };
}

describe('estimateTokens', () => {
    it('counts about four Latin characters per token', () => {
        expect(estimateTokens('')).toBe(0);
        expect(estimateTokens('abcdefgh')).toBe(2);
        expect(estimateTokens('abcdefghij')).toBe(2);
    });

    it('weights CJK characters at about one and a half characters per token', () => {
        expect(estimateTokens('디스크가 가득')).toBe(4);
        expect(estimateTokens('ディスク')).toBe(2);
        expect(estimateTokens('磁盘已满')).toBe(2);
    });
});

describe('CostOptimizer', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('estimates cost from input tokens plus a 500 token output budget', () => {
        const optimizer = new CostOptimizer();
        const provider = createProviderConfig({ name: 'cloud', kind: 'openai', model: 'm', costPer1kTokens: 0.02 });

        const estimate = optimizer.estimateCost(provider, 'a'.repeat(400));

        expect(estimate.provider).toBe('cloud');
        expect(estimate.estimatedTokens).toBe(600);
        expect(estimate.costPer1kTokens).toBe(0.02);
        expect(estimate.estimatedCost).toBeCloseTo(0.012, 10);
        expect(estimate.currency).toBe('USD');
    });

    it('prefers a custom cost over the configured one', () => {
        const optimizer = new CostOptimizer({ customCosts: { cloud: 0.5 } });
        const provider = createProviderConfig({ name: 'cloud', kind: 'openai', model: 'm', costPer1kTokens: 0.02 });
        expect(optimizer.getCostPer1k(provider)).toBe(0.5);
    });

    it('rolls the daily ledger over at the UTC day boundary and the monthly one at the month boundary', () => {
        const clock = createClock(Date.UTC(2026, 0, 31, 23, 0, 0));
        const optimizer = new CostOptimizer({ now: clock.now });

        optimizer.recordUsage('cloud', 100, 1);
        clock.set(Date.UTC(2026, 0, 31, 23, 30, 0));
        optimizer.recordUsage('cloud', 100, 1);
        expect(optimizer.getBudgetStatus()).toMatchObject({ dailySpent: 2, monthlySpent: 2 });

        clock.set(Date.UTC(2026, 1, 1, 0, 5, 0));
        optimizer.recordUsage('cloud', 100, 0.5);
        expect(optimizer.getBudgetStatus()).toMatchObject({
            dailySpent: 0.5,
            monthlySpent: 0.5,
            lastDailyReset: '2026-02-01T00:05:00.000Z',
        });
    });

    it('raises a budget alert once spend crosses the alert fraction', () => {
        const warn = vi.spyOn(logger, 'log').mockImplementation(() => logger);
        const optimizer = new CostOptimizer({ limits: { dailyLimit: 1, monthlyLimit: 100, alertThreshold: 0.8 } });

        optimizer.recordUsage('cloud', 10, 0.5);
        expect(warn).not.toHaveBeenCalled();

        optimizer.recordUsage('cloud', 10, 0.3);
        expect(warn).toHaveBeenCalledWith('warn', 'cost_budget_alert', expect.objectContaining({
            dailySpent: 0.8,
            dailyLimit: 1,
        }));
        expect(optimizer.shouldAlert()).toBe(true);
    });

    it('checks additional spend against both limits', () => {
        const optimizer = new CostOptimizer({ limits: { dailyLimit: 1, monthlyLimit: 1.5 } });
        optimizer.recordUsage('cloud', 10, 0.9);

        expect(optimizer.isWithinBudget(0.05)).toBe(true);
        expect(optimizer.isWithinBudget(0.2)).toBe(false);

        expect(optimizer.getBudgetStatus()).toMatchObject({
            dailyRemaining: 0.1,
            monthlyRemaining: 0.6,
            dailyUsagePercent: 90,
            monthlyUsagePercent: 60,
        });
    });

    it('summarises only records inside the requested window', () => {
        const clock = createClock(Date.UTC(2026, 4, 1, 0, 0, 0));
        const optimizer = new CostOptimizer({ now: clock.now });

        optimizer.recordUsage('old', 50, 0.25);
        clock.set(Date.UTC(2026, 4, 1, 3, 0, 0));
        optimizer.recordUsage('cloud', 120, 0.1);
        optimizer.recordUsage('cloud', 80, 0.2);

        const summary = optimizer.getCostSummary(2);

        expect(summary.periodHours).toBe(2);
        expect(summary.totalRequests).toBe(2);
        expect(summary.totalTokens).toBe(200);
        expect(summary.totalCost).toBe(0.3);
        expect(summary.byProvider).toEqual({ cloud: { cost: 0.3, tokens: 200, requests: 2 } });
    });
});
