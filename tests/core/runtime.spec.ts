import { afterEach, describe, expect, it, vi } from 'vitest';
import { createRuntime, defaultProviderConfigs } from '../../src/core/runtime.js';
import type { LlmProvider } from '../../src/services/llm-providers.js';

const cloudAnswer = 'Scale the consumer group to six replicas and watch the lag metric for ten minutes.';

const cloudProvider: LlmProvider = {
  name: 'cloud_openai',
  generate: async () => ({ text: cloudAnswer, provider: 'cloud_openai', tokenEstimate: 30 }),
};

describe('createRuntime', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('registers only the on-device provider without a cloud key', () => {
    vi.stubEnv('CLOUD_API_KEY', '');

    expect(defaultProviderConfigs().map((provider) => provider.name)).toEqual(['ollama_local']);

    const runtime = createRuntime({ persistTelemetry: false });
    expect(runtime.router.listProviders().map((provider) => provider.name)).toEqual(['ollama_local']);
    expect(Object.keys(runtime.breakers.getAllStats())).toEqual(['on_device_rag']);
  });

  it('wires the cloud lane when it is enabled and keyed', async () => {
    vi.stubEnv('CLOUD_API_KEY', 'test-secret');
    vi.stubEnv('ENABLE_CLOUD_LANE', 'true');

    const runtime = createRuntime({ persistTelemetry: false, cloudProvider });

    expect(runtime.router.listProviders().map((provider) => provider.name)).toEqual(['ollama_local', 'cloud_openai']);
    const response = await runtime.orchestrator.ask({ question: 'kafka lag?', source: 'cloud' });
    expect(response.answer).toBe(cloudAnswer);
    expect(response.route).toEqual({ lane: 'cloud_direct', provider: 'cloud_openai', fallbackUsed: false });
  });

  it('picks the default strategy from configuration', () => {
    vi.stubEnv('ROUTING_STRATEGY', 'latency_optimized');

    expect(createRuntime({ persistTelemetry: false }).router.getDefaultStrategy()).toBe('latency_optimized');
  });
});
