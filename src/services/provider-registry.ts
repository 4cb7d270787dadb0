import type { ProviderConfig, ProviderConfigInput } from '../types/routing.js';
import { PROVIDER_KINDS } from '../types/routing.js';
import { ConfigurationError, NotFoundError } from '../types/errors.js';
import { DEFAULT_COSTS_PER_1K } from './cost-optimizer.js';
import { logEvent } from '../utils/logger.js';

const RATE_WINDOW_MS = 60_000;

function isNonNegative(value: number): boolean {
    return Number.isFinite(value) && value >= 0;
}

/**
 * Fill defaults for a provider definition. A cost left unset takes the default for
 * the provider kind; an explicit cost (including 0) is kept as configured.
 */
export function createProviderConfig(input: ProviderConfigInput): ProviderConfig {
    if (!input.name.trim()) {
        throw new ConfigurationError('Provider name must not be empty.');
    }
    if (!PROVIDER_KINDS.includes(input.kind)) {
        throw new ConfigurationError(`Provider '${input.name}' has unknown kind '${String(input.kind)}'.`);
    }

    const config: ProviderConfig = {
        name: input.name,
        kind: input.kind,
        model: input.model,
        priority: input.priority ?? 10,
        weight: input.weight ?? 1,
        costPer1kTokens: input.costPer1kTokens ?? DEFAULT_COSTS_PER_1K[input.kind],
        avgLatencyMs: input.avgLatencyMs ?? 1000,
        maxTokens: input.maxTokens ?? 4096,
        capabilities: [...(input.capabilities ?? ['chat'])],
        enabled: input.enabled ?? true,
        rateLimitRpm: input.rateLimitRpm ?? 60,
        currentRpm: input.currentRpm ?? 0,
        circuitBreakerName: input.circuitBreakerName ?? null,
        successRate: input.successRate ?? 1,
        lastUsedAt: input.lastUsedAt ?? null,
    };

    for (const field of ['priority', 'weight', 'costPer1kTokens', 'avgLatencyMs', 'rateLimitRpm'] as const) {
        if (!isNonNegative(config[field])) {
            throw new ConfigurationError(`Provider '${config.name}': ${field} must be a non-negative number.`);
        }
    }

    return config;
}

function copyProvider(provider: ProviderConfig): ProviderConfig {
    return { ...provider, capabilities: [...provider.capabilities] };
}

export interface ProviderRegistryOptions {
    now?: () => number;
}

/**
 * Owns every {@link ProviderConfig}. Reads hand out copies; all mutation goes
 * through the methods below.
 */
export class ProviderRegistry {
    readonly #providers = new Map<string, ProviderConfig>();
    readonly #windowStart = new Map<string, number>();
    readonly #now: () => number;

    constructor(options: ProviderRegistryOptions = {}) {
        this.#now = options.now ?? Date.now;
    }

    get size(): number {
        return this.#providers.size;
    }

    register(input: ProviderConfigInput): ProviderConfig {
        const provider = createProviderConfig(input);
        const replaced = this.#providers.has(provider.name);
        this.#providers.set(provider.name, provider);
        this.#windowStart.set(provider.name, this.#now());
        logEvent('provider_registered', {
            name: provider.name,
            kind: provider.kind,
            model: provider.model,
            replaced,
        });
        return copyProvider(provider);
    }

    unregister(name: string): boolean {
        this.#windowStart.delete(name);
        const removed = this.#providers.delete(name);
        if (removed) {
            logEvent('provider_unregistered', { name });
        }
        return removed;
    }

    has(name: string): boolean {
        return this.#providers.has(name);
    }

    get(name: string): ProviderConfig | undefined {
        const provider = this.#live(name);
        return provider ? copyProvider(provider) : undefined;
    }

    require(name: string): ProviderConfig {
        const provider = this.get(name);
        if (!provider) {
            throw new NotFoundError('Provider', name);
        }
        return provider;
    }

    /** Registration order. */
    list(): ProviderConfig[] {
        return [...this.#providers.keys()].flatMap((name) => {
            const provider = this.#live(name);
            return provider ? [copyProvider(provider)] : [];
        });
    }

    setEnabled(name: string, enabled: boolean): ProviderConfig {
        const provider = this.#require(name);
        provider.enabled = enabled;
        return copyProvider(provider);
    }

    /** Enabled and below its per-minute request limit. */
    isAvailable(provider: ProviderConfig): boolean {
        const live = this.#live(provider.name);
        const current = live ?? provider;
        return current.enabled && current.currentRpm < current.rateLimitRpm;
    }

    /** Counts a request against the provider's current minute window. */
    recordRequestStart(name: string): void {
        const provider = this.#live(name);
        if (provider) {
            provider.currentRpm++;
        }
    }

    /** Folds one completed call into the latency and success-rate moving averages. */
    recordOutcome(name: string, success: boolean, latencyMs: number, alpha: number): void {
        const provider = this.#live(name);
        if (!provider) return;
        provider.successRate = (1 - alpha) * provider.successRate + alpha * (success ? 1 : 0);
        provider.avgLatencyMs = (1 - alpha) * provider.avgLatencyMs + alpha * latencyMs;
        provider.lastUsedAt = new Date(this.#now()).toISOString();
    }

    #require(name: string): ProviderConfig {
        const provider = this.#live(name);
        if (!provider) {
            throw new NotFoundError('Provider', name);
        }
        return provider;
    }

    /** The stored record, with its request counter rolled over when a new minute has started. */
    #live(name: string): ProviderConfig | undefined {
        const provider = this.#providers.get(name);
        if (!provider) return undefined;
        const now = this.#now();
        const windowStart = this.#windowStart.get(name) ?? now;
        if (now - windowStart >= RATE_WINDOW_MS) {
            provider.currentRpm = 0;
            this.#windowStart.set(name, now);
        }
        return provider;
    }
}
