import { createServer, type Server } from 'node:http';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { handleHealth } from './handlers/health.js';
import { handleAsk } from './handlers/ask.js';
import {
    handleGetCircuitBreaker,
    handleListCircuitBreakers,
    handleResetAllCircuitBreakers,
    handleResetCircuitBreaker,
} from './handlers/circuit-breakers.js';
import {
    handleCostSummary,
    handleDescribeProvider,
    handleListProviders,
    handleProviderHealth,
    handleRoutingDecide,
    handleRoutingMetrics,
    handleSetStrategy,
} from './handlers/routing.js';
import { handleRunbookIngest } from './handlers/runbooks.js';
import { requestLogger, requireSignature, sendError, setRawRequestBody } from './shared.js';
import type { CircuitBreakerRegistry } from '../services/circuit-breaker.js';
import type { DynamicRouter } from '../services/dynamic-router.js';
import type { Orchestrator } from '../services/orchestrator-service.js';
import type { RunbookStore } from '../services/grounding/runbook-store.js';
import { getConfigValue } from '../config/json-config.js';
import { logEvent } from '../utils/logger.js';
import { errorMessage } from '../types/errors.js';

export interface ApiServerDeps {
    breakers: CircuitBreakerRegistry;
    router: DynamicRouter;
    orchestrator: Orchestrator;
    runbooks: RunbookStore;
}

const DEFAULT_PORT = 3100;

/**
 * Build the control-plane Express app.
 *
 * Endpoints:
 *   GET  /health                          Breaker and provider health (unsigned)
 *   POST /ask                             Orchestrated answer with fallback
 *   GET  /circuit-breakers                All breaker stats
 *   GET  /circuit-breakers/:name          One breaker snapshot
 *   POST /circuit-breakers/reset-all      Reset every breaker
 *   POST /circuit-breakers/:name/reset    Reset one breaker
 *   POST /routing/decide                  Routing decision for an input
 *   GET  /routing/providers               Registered providers
 *   GET  /routing/providers/:name         One provider
 *   GET  /routing/health                  Provider health
 *   GET  /routing/metrics                 Routing and orchestrator metrics
 *   GET  /routing/cost                    Cost summary (?hours=N)
 *   PUT  /routing/strategy                Set the default strategy
 *   POST /runbooks/ingest                 Add grounding passages
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const breakerDeps = { breakers: deps.breakers };
    const routingDeps = { router: deps.router, orchestrator: deps.orchestrator };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth({ breakers: deps.breakers, router: deps.router }));

    // Protected endpoints
    app.post('/ask', requireSignature, handleAsk({ orchestrator: deps.orchestrator }));

    app.get('/circuit-breakers', requireSignature, handleListCircuitBreakers(breakerDeps));
    app.post('/circuit-breakers/reset-all', requireSignature, handleResetAllCircuitBreakers(breakerDeps));
    app.get('/circuit-breakers/:name', requireSignature, handleGetCircuitBreaker(breakerDeps));
    app.post('/circuit-breakers/:name/reset', requireSignature, handleResetCircuitBreaker(breakerDeps));

    app.post('/routing/decide', requireSignature, handleRoutingDecide(routingDeps));
    app.get('/routing/providers', requireSignature, handleListProviders(routingDeps));
    app.get('/routing/providers/:name', requireSignature, handleDescribeProvider(routingDeps));
    app.get('/routing/health', requireSignature, handleProviderHealth(routingDeps));
    app.get('/routing/metrics', requireSignature, handleRoutingMetrics(routingDeps));
    app.get('/routing/cost', requireSignature, handleCostSummary(routingDeps));
    app.put('/routing/strategy', requireSignature, handleSetStrategy(routingDeps));

    app.post('/runbooks/ingest', requireSignature, handleRunbookIngest({ store: deps.runbooks }));

    // ── Catch-all 404 ──────────────────────────────────────────────────────────
    app.use((_req, res) => {
        sendError(res, 'Not found.', 404);
    });

    // Body-parser failures arrive here before any handler runs.
    const handleMalformedBody: ErrorRequestHandler = (err, _req, res, _next) => {
        logEvent('api_body_rejected', { error: errorMessage(err) }, 'warn');
        sendError(res, 'Malformed JSON request body.', 400);
    };
    app.use(handleMalformedBody);

    return app;
}

/** Create and start the control-plane HTTP server. */
export function startApiServer(deps: ApiServerDeps): Server {
    const app = createApiApp(deps);
    const port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT;
    const server = createServer(app);

    server.listen(port, () => {
        logEvent('api_server_started', { port, url: `http://localhost:${port}` });
    });
    return server;
}
