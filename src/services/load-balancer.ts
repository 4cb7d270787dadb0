import type { ProviderConfig, ProviderLoadStats } from '../types/routing.js';

const LATENCY_WINDOW = 100;

function round1(value: number): number {
    return Math.round(value * 10) / 10;
}

function mean(values: number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export interface LoadBalancerOptions {
    /** Uniform source in [0, 1). */
    random?: () => number;
}

/**
 * Active-request counters, rolling latency windows and the persistent round-robin
 * cursor. Callers pass the already-filtered candidate list.
 */
export class LoadBalancer {
    #roundRobinIndex = 0;
    readonly #active = new Map<string, number>();
    readonly #latencies = new Map<string, number[]>();
    readonly #random: () => number;

    constructor(options: LoadBalancerOptions = {}) {
        this.#random = options.random ?? Math.random;
    }

    /** Advances the cursor before picking, so k calls over k candidates visit each once. */
    selectRoundRobin(candidates: ProviderConfig[]): ProviderConfig | null {
        if (candidates.length === 0) return null;
        this.#roundRobinIndex = (this.#roundRobinIndex + 1) % candidates.length;
        return candidates[this.#roundRobinIndex] ?? null;
    }

    selectWeighted(candidates: ProviderConfig[]): ProviderConfig | null {
        if (candidates.length === 0) return null;
        const totalWeight = candidates.reduce((sum, provider) => sum + Math.max(0, provider.weight), 0);
        if (totalWeight <= 0) return this.selectRandom(candidates);

        const target = this.#random() * totalWeight;
        let cumulative = 0;
        for (const provider of candidates) {
            cumulative += Math.max(0, provider.weight);
            if (target < cumulative) return provider;
        }
        return candidates[candidates.length - 1] ?? null;
    }

    selectLeastConnections(candidates: ProviderConfig[]): ProviderConfig | null {
        let selected: ProviderConfig | null = null;
        let fewest = Infinity;
        for (const provider of candidates) {
            const active = this.#active.get(provider.name) ?? 0;
            if (active < fewest) {
                fewest = active;
                selected = provider;
            }
        }
        return selected;
    }

    selectRandom(candidates: ProviderConfig[]): ProviderConfig | null {
        if (candidates.length === 0) return null;
        return candidates[Math.floor(this.#random() * candidates.length)] ?? null;
    }

    /** Mean of the recent latency window, or the configured average when there are no samples. */
    expectedLatencyMs(provider: ProviderConfig): number {
        const samples = this.#latencies.get(provider.name);
        return samples && samples.length > 0 ? mean(samples) : provider.avgLatencyMs;
    }

    selectFastest(candidates: ProviderConfig[]): ProviderConfig | null {
        let selected: ProviderConfig | null = null;
        let best = Infinity;
        for (const provider of candidates) {
            const latency = this.expectedLatencyMs(provider);
            if (latency < best) {
                best = latency;
                selected = provider;
            }
        }
        return selected;
    }

    recordRequestStart(providerName: string): void {
        this.#active.set(providerName, (this.#active.get(providerName) ?? 0) + 1);
    }

    recordRequestEnd(providerName: string, responseTimeMs: number): void {
        const active = this.#active.get(providerName);
        if (active !== undefined) {
            this.#active.set(providerName, Math.max(0, active - 1));
        }

        const samples = this.#latencies.get(providerName) ?? [];
        samples.push(responseTimeMs);
        if (samples.length > LATENCY_WINDOW) {
            samples.splice(0, samples.length - LATENCY_WINDOW);
        }
        this.#latencies.set(providerName, samples);
    }

    getStats(): Record<string, ProviderLoadStats> {
        const names = new Set([...this.#active.keys(), ...this.#latencies.keys()]);
        const stats: Record<string, ProviderLoadStats> = {};
        for (const name of names) {
            const samples = this.#latencies.get(name) ?? [];
            stats[name] = {
                activeRequests: this.#active.get(name) ?? 0,
                sampleCount: samples.length,
                avgResponseTimeMs: samples.length ? round1(mean(samples)) : 0,
                minResponseTimeMs: samples.length ? round1(Math.min(...samples)) : 0,
                maxResponseTimeMs: samples.length ? round1(Math.max(...samples)) : 0,
            };
        }
        return stats;
    }

    resetStats(): void {
        this.#active.clear();
        this.#latencies.clear();
        this.#roundRobinIndex = 0;
    }
}
