import { beforeEach, describe, expect, it } from 'vitest';
import { CircuitBreakerRegistry } from '../../src/services/circuit-breaker.js';
import { DynamicRouter } from '../../src/services/dynamic-router.js';
import { db, listCircuitBreakerEvents, listRoutingEvents, aggregateRoutingUsageSince } from '../../src/services/db.js';
import { createSqliteRoutingTelemetry, persistCircuitBreakerEvent } from '../../src/services/telemetry-sinks.js';

describe('telemetry sinks', () => {
  beforeEach(() => {
    db.exec('DELETE FROM circuit_breaker_events; DELETE FROM routing_events; DELETE FROM routing_usage;');
  });

  it('stores breaker transitions and resets', async () => {
    const registry = new CircuitBreakerRegistry({ onEvent: persistCircuitBreakerEvent });
    const breaker = registry.get('cloud_direct', { failureThreshold: 1 });

    await expect(breaker.execute(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    registry.reset('cloud_direct');

    const rows = listCircuitBreakerEvents('cloud_direct');
    expect(rows).toHaveLength(2);
    const types = rows.map((row) => row.event_type).sort();
    expect(types).toEqual(['reset', 'transition']);
    const opened = rows.find((row) => row.event_type === 'transition');
    expect(opened?.prev_state).toBe('closed');
    expect(opened?.new_state).toBe('open');
  });

  it('stores routing decisions with a null score for the fallback decision', () => {
    const router = new DynamicRouter({
      breakers: new CircuitBreakerRegistry(),
      telemetry: createSqliteRoutingTelemetry(),
    });
    router.registerProvider({ name: 'local', kind: 'ollama', model: 'm', capabilities: ['chat'] });

    router.route({ inputText: 'hello', strategy: 'failover', correlationId: 'corr-1' });
    router.route({ inputText: 'hello', requiredCapabilities: ['vision'] });

    const rows = listRoutingEvents();
    expect(rows).toHaveLength(2);
    const fallback = rows.find((row) => row.score === null);
    expect(fallback?.provider).toBe('local');
    const routed = rows.find((row) => row.correlation_id === 'corr-1');
    expect(routed?.strategy).toBe('failover');
    expect(JSON.parse(routed?.alternatives_json ?? 'null')).toEqual([]);
  });

  it('stores completed calls as usage rows', () => {
    const router = new DynamicRouter({
      breakers: new CircuitBreakerRegistry(),
      telemetry: createSqliteRoutingTelemetry(),
    });
    router.registerProvider({ name: 'local', kind: 'ollama', model: 'm' });

    router.recordRequestResult({ providerName: 'local', success: true, latencyMs: 120, tokensUsed: 40 });
    router.recordRequestResult({ providerName: 'local', success: false, latencyMs: 900 });

    expect(aggregateRoutingUsageSince('1970-01-01T00:00:00.000Z')).toEqual([
      { provider: 'local', requests: 2, failures: 1, tokens: 40, cost: 0 },
    ]);
  });
});
