import type { Request, Response } from 'express';
import type { CircuitBreakerResetAllData, CircuitBreakerResetData } from '../../types/api.js';
import type { CircuitBreakerRegistry } from '../../services/circuit-breaker.js';
import { logEvent } from '../../utils/logger.js';
import { sendMappedError, sendOk } from '../shared.js';

export interface CircuitBreakerDeps {
    breakers: CircuitBreakerRegistry;
}

function statesOf(breakers: CircuitBreakerRegistry): Record<string, string> {
    const states: Record<string, string> = {};
    for (const [name, entry] of Object.entries(breakers.getAllStats())) {
        states[name] = entry.state;
    }
    return states;
}

/** GET /circuit-breakers */
export function handleListCircuitBreakers(deps: CircuitBreakerDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, deps.breakers.getAllStats());
    };
}

/** GET /circuit-breakers/:name */
export function handleGetCircuitBreaker(deps: CircuitBreakerDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendOk(res, deps.breakers.require(req.params.name ?? '').snapshot());
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /circuit-breakers/:name/reset */
export function handleResetCircuitBreaker(deps: CircuitBreakerDeps) {
    return (req: Request, res: Response): void => {
        const name = req.params.name ?? '';
        try {
            const previousState = deps.breakers.require(name).state;
            const snapshot = deps.breakers.reset(name);
            const data: CircuitBreakerResetData = {
                message: `Circuit breaker '${name}' reset to CLOSED.`,
                previousState,
                currentState: snapshot.state,
            };
            sendOk(res, data);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** POST /circuit-breakers/reset-all */
export function handleResetAllCircuitBreakers(deps: CircuitBreakerDeps) {
    return (_req: Request, res: Response): void => {
        const before = statesOf(deps.breakers);
        deps.breakers.resetAll();
        const after = statesOf(deps.breakers);
        logEvent('circuit_breaker_manual_reset_all', { count: Object.keys(before).length });
        const data: CircuitBreakerResetAllData = {
            message: `Reset ${Object.keys(before).length} circuit breaker(s).`,
            before,
            after,
        };
        sendOk(res, data);
    };
}
