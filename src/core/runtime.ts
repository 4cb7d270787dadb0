import { CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import { CostOptimizer } from '../services/cost-optimizer.js';
import { DynamicRouter, parseRoutingStrategy } from '../services/dynamic-router.js';
import { ProviderRegistry } from '../services/provider-registry.js';
import { Orchestrator } from '../services/orchestrator-service.js';
import { RunbookStore } from '../services/grounding/runbook-store.js';
import { RunbookRetriever } from '../services/grounding/runbook-retriever.js';
import {
    OllamaProvider,
    OpenAiCompatibleProvider,
    StubProvider,
    type LlmProvider,
} from '../services/llm-providers.js';
import { createSqliteRoutingTelemetry, persistCircuitBreakerEvent } from '../services/telemetry-sinks.js';
import {
    DEFAULT_CONFIG,
    getBooleanConfigValue,
    getConfigValue,
    getOnDeviceMode,
    loadBudgetLimits,
    loadOrchestratorConfig,
} from '../config/json-config.js';
import type { ProviderConfigInput } from '../types/routing.js';
import { ContextBuilder } from './context-builder.js';
import { LanePolicy } from './lane-policy.js';
import { CloudDirectAnswerer, OnDeviceRagAnswerer } from './lane-answerers.js';
import { ConfidencePolicy } from './confidence.js';
import { logEvent } from '../utils/logger.js';

export const ON_DEVICE_PROVIDER = 'ollama_local';
export const CLOUD_PROVIDER = 'cloud_openai';

export interface Runtime {
    breakers: CircuitBreakerRegistry;
    router: DynamicRouter;
    orchestrator: Orchestrator;
    runbooks: RunbookStore;
}

export interface RuntimeOptions {
    /** Write breaker events, routing decisions and usage to SQLite. @default true */
    persistTelemetry?: boolean;
    /** Replaces the configured on-device backend. */
    onDeviceProvider?: LlmProvider;
    /** Replaces the configured cloud backend. */
    cloudProvider?: LlmProvider;
}

function configured(key: string, fallback: string): string {
    return getConfigValue(key) ?? fallback;
}

/** Routing entries for the two lane backends; the cloud one only when a key is configured. */
export function defaultProviderConfigs(): ProviderConfigInput[] {
    const providers: ProviderConfigInput[] = [
        {
            name: ON_DEVICE_PROVIDER,
            kind: 'ollama',
            model: configured('OLLAMA_MODEL', DEFAULT_CONFIG.providers.ollamaModel),
            priority: 1,
            weight: 2,
            costPer1kTokens: 0,
            avgLatencyMs: 500,
            capabilities: ['chat', 'code', 'analysis'],
            circuitBreakerName: 'on_device_rag',
        },
    ];

    if (getConfigValue('CLOUD_API_KEY')) {
        providers.push({
            name: CLOUD_PROVIDER,
            kind: 'openai_compatible',
            model: configured('CLOUD_MODEL', DEFAULT_CONFIG.providers.cloudModel),
            priority: 5,
            weight: 1,
            costPer1kTokens: 0.002,
            avgLatencyMs: 1500,
            capabilities: ['chat', 'code', 'analysis', 'long_context'],
            circuitBreakerName: 'cloud_direct',
        });
    }
    return providers;
}

function createOnDeviceProvider(): LlmProvider {
    if (getOnDeviceMode() === 'stub') {
        return new StubProvider();
    }
    return new OllamaProvider({
        name: ON_DEVICE_PROVIDER,
        baseUrl: configured('OLLAMA_BASE_URL', DEFAULT_CONFIG.providers.ollamaBaseUrl),
        model: configured('OLLAMA_MODEL', DEFAULT_CONFIG.providers.ollamaModel),
    });
}

function createCloudProvider(): LlmProvider {
    return new OpenAiCompatibleProvider({
        name: CLOUD_PROVIDER,
        baseUrl: configured('CLOUD_API_BASE_URL', DEFAULT_CONFIG.providers.cloudApiBaseUrl),
        apiKey: getConfigValue('CLOUD_API_KEY') ?? '',
        model: configured('CLOUD_MODEL', DEFAULT_CONFIG.providers.cloudModel),
    });
}

/** Wires the breaker registry, router, lanes and orchestrator from configuration. */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
    const persist = options.persistTelemetry ?? true;
    const orchestratorConfig = loadOrchestratorConfig();
    const enableCloudLane = getBooleanConfigValue('ENABLE_CLOUD_LANE', DEFAULT_CONFIG.lanes.enableCloudLane);

    const breakers = new CircuitBreakerRegistry(persist ? { onEvent: persistCircuitBreakerEvent } : {});
    const router = new DynamicRouter({
        breakers,
        providers: new ProviderRegistry(),
        costOptimizer: new CostOptimizer({ limits: loadBudgetLimits() }),
        defaultStrategy: parseRoutingStrategy(configured('ROUTING_STRATEGY', DEFAULT_CONFIG.routing.defaultStrategy)),
        telemetry: persist ? createSqliteRoutingTelemetry() : undefined,
    });
    for (const provider of defaultProviderConfigs()) {
        router.registerProvider(provider);
    }

    const runbooks = new RunbookStore();
    const onDevice = new OnDeviceRagAnswerer({
        provider: options.onDeviceProvider ?? createOnDeviceProvider(),
        retriever: new RunbookRetriever(runbooks),
        builder: new ContextBuilder(),
        topK: orchestratorConfig.topK,
    });
    const cloud = enableCloudLane
        ? new CloudDirectAnswerer(options.cloudProvider ?? createCloudProvider())
        : undefined;

    const orchestrator = new Orchestrator({
        breakers,
        policy: new LanePolicy({
            enableCloudLane,
            onDeviceProvider: ON_DEVICE_PROVIDER,
            cloudProvider: CLOUD_PROVIDER,
        }),
        answerers: cloud ? { on_device_rag: onDevice, cloud_direct: cloud } : { on_device_rag: onDevice },
        grounding: onDevice,
        router,
        config: orchestratorConfig,
        confidence: new ConfidencePolicy(orchestratorConfig.minAnswerChars),
    });

    logEvent('runtime_ready', {
        onDeviceMode: getOnDeviceMode(),
        enableCloudLane,
        providers: router.listProviders().map((provider) => provider.name),
        defaultStrategy: router.getDefaultStrategy(),
    });

    return { breakers, router, orchestrator, runbooks };
}
