import { describe, expect, it } from 'vitest';
import { LoadBalancer } from '../../src/services/load-balancer.js';
import { createProviderConfig } from '../../src/services/provider-registry.js';

const alpha = createProviderConfig({ name: 'alpha', kind: 'ollama', model: 'm', weight: 1, avgLatencyMs: 900 });
const beta = createProviderConfig({ name: 'beta', kind: 'ollama', model: 'm', weight: 3, avgLatencyMs: 400 });

describe('LoadBalancer', () => {
    it('advances the round-robin cursor before selecting', () => {
        const balancer = new LoadBalancer();
        const picks = [1, 2, 3, 4].map(() => balancer.selectRoundRobin([alpha, beta])?.name);
        expect(picks).toEqual(['beta', 'alpha', 'beta', 'alpha']);
        expect(balancer.selectRoundRobin([])).toBeNull();
    });

    it('selects by cumulative weight', () => {
        expect(new LoadBalancer({ random: () => 0.2 }).selectWeighted([alpha, beta])?.name).toBe('alpha');
        expect(new LoadBalancer({ random: () => 0.5 }).selectWeighted([alpha, beta])?.name).toBe('beta');
    });

    it('routes to the provider with the fewest active requests', () => {
        const balancer = new LoadBalancer();
        balancer.recordRequestStart('alpha');
        expect(balancer.selectLeastConnections([alpha, beta])?.name).toBe('beta');
        balancer.recordRequestEnd('alpha', 100);
        expect(balancer.selectLeastConnections([alpha, beta])?.name).toBe('alpha');
    });

    it('keeps only the last 100 latency samples', () => {
        const balancer = new LoadBalancer();
        for (let i = 1; i <= 150; i++) {
            balancer.recordRequestEnd('alpha', i);
        }

        expect(balancer.getStats().alpha).toEqual({
            activeRequests: 0,
            sampleCount: 100,
            avgResponseTimeMs: 100.5,
            minResponseTimeMs: 51,
            maxResponseTimeMs: 150,
        });
        expect(balancer.expectedLatencyMs(alpha)).toBe(100.5);
        expect(balancer.expectedLatencyMs(beta)).toBe(400);
        expect(balancer.selectFastest([alpha, beta])?.name).toBe('alpha');
    });

    it('clears counters, samples and the cursor on reset', () => {
        const balancer = new LoadBalancer();
        balancer.recordRequestStart('alpha');
        balancer.selectRoundRobin([alpha, beta]);

        balancer.resetStats();

        expect(balancer.getStats()).toEqual({});
        expect(balancer.selectRoundRobin([alpha, beta])?.name).toBe('beta');
    });
});
