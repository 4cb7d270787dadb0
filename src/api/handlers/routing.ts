import type { Request, Response } from 'express';
import type { CostSummaryData, RoutingDecisionData, RoutingMetricsData } from '../../types/api.js';
import type { RoutingDecision } from '../../types/routing.js';
import type { DynamicRouter } from '../../services/dynamic-router.js';
import { parseRoutingStrategy } from '../../services/dynamic-router.js';
import type { Orchestrator } from '../../services/orchestrator-service.js';
import { aggregateRoutingUsageSince } from '../../services/db.js';
import {
    correlationIdFor,
    optionalStringField,
    optionalStringListField,
    readObjectBody,
    requireStringField,
    sendMappedError,
    sendOk,
} from '../shared.js';

export interface RoutingDeps {
    router: DynamicRouter;
    orchestrator: Orchestrator;
}

const DEFAULT_COST_WINDOW_HOURS = 24;
const MAX_COST_WINDOW_HOURS = 24 * 31;

function toDecisionData(decision: RoutingDecision): RoutingDecisionData {
    return {
        provider: decision.provider.name,
        model: decision.provider.model,
        strategy: decision.strategy,
        score: Number.isFinite(decision.score) ? decision.score : null,
        alternatives: [...decision.alternatives],
        reason: decision.reason,
        correlationId: decision.correlationId,
        decidedAt: decision.decidedAt,
    };
}

/** POST /routing/decide */
export function handleRoutingDecide(deps: RoutingDeps) {
    return (req: Request, res: Response): void => {
        try {
            const body = readObjectBody(req);
            const rawStrategy = optionalStringField(body, 'strategy');

            const decision = deps.router.route({
                inputText: requireStringField(body, 'inputText'),
                strategy: rawStrategy === undefined ? undefined : parseRoutingStrategy(rawStrategy),
                requiredCapabilities: optionalStringListField(body, 'requiredCapabilities'),
                excludedProviders: optionalStringListField(body, 'excludedProviders'),
                correlationId: correlationIdFor(res),
            });
            sendOk(res, toDecisionData(decision));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /routing/providers */
export function handleListProviders(deps: RoutingDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, { providers: deps.router.listProviders(), defaultStrategy: deps.router.getDefaultStrategy() });
    };
}

/** GET /routing/providers/:name */
export function handleDescribeProvider(deps: RoutingDeps) {
    return (req: Request, res: Response): void => {
        try {
            sendOk(res, deps.router.describeProvider(req.params.name ?? ''));
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}

/** GET /routing/health */
export function handleProviderHealth(deps: RoutingDeps) {
    return (_req: Request, res: Response): void => {
        sendOk(res, { providers: deps.router.getProviderHealth() });
    };
}

/** GET /routing/metrics */
export function handleRoutingMetrics(deps: RoutingDeps) {
    return (_req: Request, res: Response): void => {
        const data: RoutingMetricsData = {
            routing: deps.router.getMetrics(),
            orchestrator: deps.orchestrator.getMetrics(),
            defaultStrategy: deps.router.getDefaultStrategy(),
        };
        sendOk(res, data);
    };
}

/** GET /routing/cost?hours=N */
export function handleCostSummary(deps: RoutingDeps) {
    return (req: Request, res: Response): void => {
        const requested = Number(req.query.hours ?? DEFAULT_COST_WINDOW_HOURS);
        const hours = Number.isFinite(requested) && requested > 0
            ? Math.min(MAX_COST_WINDOW_HOURS, requested)
            : DEFAULT_COST_WINDOW_HOURS;
        const since = new Date(Date.now() - hours * 3_600_000).toISOString();
        const data: CostSummaryData = {
            ...deps.router.getCostSummary(hours),
            persistedUsage: aggregateRoutingUsageSince(since),
        };
        sendOk(res, data);
    };
}

/** PUT /routing/strategy */
export function handleSetStrategy(deps: RoutingDeps) {
    return (req: Request, res: Response): void => {
        try {
            const strategy = requireStringField(readObjectBody(req), 'strategy');
            const applied = deps.router.setDefaultStrategy(strategy);
            sendOk(res, { message: `Default routing strategy set to '${applied}'.`, defaultStrategy: applied });
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
