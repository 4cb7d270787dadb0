import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { CircuitBreakerRegistry } from '../../services/circuit-breaker.js';
import type { DynamicRouter } from '../../services/dynamic-router.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    breakers: CircuitBreakerRegistry;
    router: DynamicRouter;
}

/** GET /health: breaker and provider health; `degraded` while any breaker is open. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const circuitBreakers = deps.breakers.getAllStats();
        const openCircuits = Object.entries(circuitBreakers)
            .filter(([, entry]) => entry.state === 'open')
            .map(([name]) => name);

        const data: HealthData = {
            status: openCircuits.length > 0 ? 'degraded' : 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            openCircuits,
            circuitBreakers,
            providers: deps.router.getProviderHealth(),
        };
        sendOk(res, data);
    };
}
