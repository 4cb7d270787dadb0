import { describe, expect, it, vi } from 'vitest';
import {
    CircuitBreaker,
    CircuitBreakerRegistry,
    createCircuitBreakerConfig,
    forExternalApi,
    forLlmProvider,
} from '../../src/services/circuit-breaker.js';
import type { CircuitBreakerEvent } from '../../src/types/circuit-breaker.js';
import {
    CircuitOpenError,
    ConfigurationError,
    InputValidationError,
    NotFoundError,
} from '../../src/types/errors.js';

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function createClock(start = 1_700_000_000_000) {
    let current = start;
    return {
        now: () => current,
        advance: (ms: number) => {
            current += ms;
        },
    };
}

const fail = async (): Promise<string> => {
    throw new Error('backend down');
};
const succeed = async (): Promise<string> => 'ok';

function createBreaker(
    input: Parameters<typeof createCircuitBreakerConfig>[1],
    clock = createClock(),
    events: CircuitBreakerEvent[] = [],
) {
    const breaker = new CircuitBreaker(createCircuitBreakerConfig('ollama', input), {
        now: clock.now,
        onEvent: (event) => events.push(event),
    });
    return { breaker, clock, events };
}

describe('CircuitBreaker', () => {
    it('walks CLOSED -> OPEN -> HALF_OPEN -> CLOSED with threshold 2 and a 100ms recovery', async () => {
        const breaker = new CircuitBreaker(
            createCircuitBreakerConfig('scenario', { failureThreshold: 2, successThreshold: 2, recoveryTimeoutMs: 100 }),
        );

        await expect(breaker.execute(fail)).rejects.toThrow('backend down');
        expect(breaker.state).toBe('closed');
        await expect(breaker.execute(fail)).rejects.toThrow('backend down');
        expect(breaker.state).toBe('open');

        const rejected = await breaker.execute(succeed).catch((err: unknown) => err);
        expect(rejected).toBeInstanceOf(CircuitOpenError);
        if (rejected instanceof CircuitOpenError) {
            expect(rejected.remainingMs).toBeGreaterThan(0);
            expect(rejected.breakerName).toBe('scenario');
        }

        await sleep(150);
        expect(breaker.state).toBe('half_open');

        await expect(breaker.execute(succeed)).resolves.toBe('ok');
        expect(breaker.state).toBe('half_open');
        await expect(breaker.execute(succeed)).resolves.toBe('ok');
        expect(breaker.state).toBe('closed');
        expect(breaker.stats).toMatchObject({ consecutiveSuccesses: 0, consecutiveFailures: 0 });
    });

    it('opens exactly once after the failure threshold and rejects without running the operation', async () => {
        const { breaker, events } = createBreaker({ failureThreshold: 3, recoveryTimeoutMs: 1_000 });

        for (let i = 0; i < 3; i++) {
            await expect(breaker.execute(fail)).rejects.toThrow('backend down');
        }

        const operation = vi.fn(succeed);
        for (let i = 0; i < 4; i++) {
            await expect(breaker.execute(operation)).rejects.toBeInstanceOf(CircuitOpenError);
        }

        expect(operation).not.toHaveBeenCalled();
        expect(events.filter((event) => event.toState === 'open')).toHaveLength(1);
        expect(breaker.stats).toMatchObject({
            totalCalls: 3,
            failedCalls: 3,
            rejectedCalls: 4,
            stateTransitions: 1,
            consecutiveFailures: 3,
        });
    });

    it('reports HALF_OPEN on the first state check after the recovery timeout', async () => {
        const { breaker, clock } = createBreaker({ failureThreshold: 1, recoveryTimeoutMs: 500 });
        await expect(breaker.execute(fail)).rejects.toThrow();

        clock.advance(499);
        expect(breaker.state).toBe('open');
        expect(breaker.remainingMs).toBe(1);

        clock.advance(1);
        expect(breaker.state).toBe('half_open');
        expect(breaker.remainingMs).toBe(0);
    });

    it('reopens on a single half-open failure regardless of earlier successes', async () => {
        const { breaker, clock } = createBreaker({ failureThreshold: 1, successThreshold: 3, recoveryTimeoutMs: 100 });
        await expect(breaker.execute(fail)).rejects.toThrow();
        clock.advance(100);

        await breaker.execute(succeed);
        await breaker.execute(succeed);
        expect(breaker.state).toBe('half_open');

        await expect(breaker.execute(fail)).rejects.toThrow();
        expect(breaker.state).toBe('open');
        expect(breaker.remainingMs).toBe(100);
        expect(breaker.stats.consecutiveSuccesses).toBe(0);
    });

    it('keeps the failure and success streaks mutually exclusive', async () => {
        const { breaker } = createBreaker({ failureThreshold: 5 });

        await expect(breaker.execute(fail)).rejects.toThrow();
        await expect(breaker.execute(fail)).rejects.toThrow();
        expect(breaker.stats.consecutiveFailures).toBe(2);

        await breaker.execute(succeed);
        expect(breaker.stats.consecutiveFailures).toBe(0);
        expect(breaker.stats.consecutiveSuccesses).toBe(1);

        await expect(breaker.execute(fail)).rejects.toThrow();
        expect(breaker.stats.consecutiveSuccesses).toBe(0);
        expect(breaker.stats.consecutiveFailures).toBe(1);
    });

    it('lets excluded errors pass through without moving any counter', async () => {
        const { breaker } = createBreaker({ failureThreshold: 1 });

        await expect(
            breaker.execute(async () => {
                throw new InputValidationError('question is required');
            }),
        ).rejects.toBeInstanceOf(InputValidationError);

        expect(breaker.state).toBe('closed');
        expect(breaker.stats.totalCalls).toBe(0);
        expect(breaker.stats.failedCalls).toBe(0);
    });

    it('honours a custom failure predicate', async () => {
        const { breaker } = createBreaker({
            failureThreshold: 1,
            isFailure: (err) => err instanceof Error && err.message.includes('503'),
        });

        await expect(breaker.execute(async () => { throw new Error('404 missing'); })).rejects.toThrow();
        expect(breaker.state).toBe('closed');

        await expect(breaker.execute(async () => { throw new Error('503 unavailable'); })).rejects.toThrow();
        expect(breaker.state).toBe('open');
    });

    it('shares transition logic between the sync and async variants', async () => {
        const { breaker } = createBreaker({ failureThreshold: 2 });

        expect(() => breaker.executeSync(() => { throw new Error('sync failure'); })).toThrow('sync failure');
        await expect(breaker.execute(fail)).rejects.toThrow();
        expect(breaker.state).toBe('open');
        expect(() => breaker.executeSync(() => 42)).toThrow(CircuitOpenError);

        breaker.reset();
        expect(breaker.executeSync(() => 42)).toBe(42);
    });

    it('records exactly once per call through a wrapped function', async () => {
        const { breaker } = createBreaker({});
        const lookup = breaker.wrap(async (id: number, suffix: string) => `${id}-${suffix}`);

        await expect(lookup(7, 'a')).resolves.toBe('7-a');

        expect(breaker.stats.totalCalls).toBe(1);
        expect(breaker.stats.successfulCalls).toBe(1);
    });

    it('resets to CLOSED from OPEN and emits a reset event distinct from transitions', async () => {
        const { breaker, events } = createBreaker({ failureThreshold: 1 });
        await expect(breaker.execute(fail)).rejects.toThrow();

        breaker.reset();

        expect(breaker.state).toBe('closed');
        expect(breaker.stats.consecutiveFailures).toBe(0);
        expect(events.map((event) => `${event.type}:${event.fromState}->${event.toState}`)).toEqual([
            'transition:closed->open',
            'reset:open->closed',
        ]);
    });

    it('keeps running when the event sink throws', async () => {
        const breaker = new CircuitBreaker(createCircuitBreakerConfig('sink', { failureThreshold: 1 }), {
            onEvent: () => {
                throw new Error('sink unavailable');
            },
        });

        await expect(breaker.execute(fail)).rejects.toThrow('backend down');
        expect(breaker.state).toBe('open');
    });

    it('rejects invalid thresholds', () => {
        expect(() => createCircuitBreakerConfig('bad', { failureThreshold: 0 })).toThrow(ConfigurationError);
        expect(() => createCircuitBreakerConfig('bad', { successThreshold: 1.5 })).toThrow(ConfigurationError);
        expect(() => createCircuitBreakerConfig('bad', { recoveryTimeoutMs: -1 })).toThrow(ConfigurationError);
    });

    it('provides presets for model providers and external APIs', () => {
        expect(forLlmProvider('ollama')).toMatchObject({ name: 'ollama', failureThreshold: 3, successThreshold: 2, recoveryTimeoutMs: 60_000 });
        expect(forExternalApi()).toMatchObject({ name: 'api', failureThreshold: 5, successThreshold: 3, recoveryTimeoutMs: 30_000 });
    });
});

describe('CircuitBreakerRegistry', () => {
    it('creates a breaker on first lookup and returns the same instance afterwards', () => {
        const registry = new CircuitBreakerRegistry();

        const first = registry.get('cloud_direct', { failureThreshold: 2 });
        const second = registry.get('cloud_direct', { failureThreshold: 9 });

        expect(second).toBe(first);
        expect(second.config.failureThreshold).toBe(2);
        expect(first.name).toBe('cloud_direct');
    });

    it('uses the lookup key even when the config carries another name', () => {
        const registry = new CircuitBreakerRegistry();
        const breaker = registry.get('on_device_rag', { name: 'something-else' });
        expect(breaker.name).toBe('on_device_rag');
    });

    it('reports per-name stats and resets every entry', async () => {
        const clock = createClock();
        const registry = new CircuitBreakerRegistry({ now: clock.now });
        const a = registry.get('a', { failureThreshold: 1 });
        registry.get('b');
        await expect(a.execute(fail)).rejects.toThrow();

        expect(registry.getAllStats().a?.state).toBe('open');
        expect(registry.getAllStats().b?.state).toBe('closed');

        registry.resetAll();

        expect(registry.getAllStats().a?.state).toBe('closed');
        expect(registry.getAllStats().a?.stats.failedCalls).toBe(1);
    });

    it('throws NotFoundError when resetting an unknown breaker', () => {
        const registry = new CircuitBreakerRegistry();
        expect(() => registry.reset('missing')).toThrow(NotFoundError);
        expect(registry.find('missing')).toBeUndefined();
        expect(registry.has('missing')).toBe(false);
    });

    it('removes entries only on request', () => {
        const registry = new CircuitBreakerRegistry();
        registry.get('a');
        expect(registry.remove('a')).toBe(true);
        expect(registry.remove('a')).toBe(false);
        expect(registry.names()).toEqual([]);
    });
});
