import { createRuntime, type Runtime } from './core/runtime.js';
import { startApiServer } from './api/router.js';
import { activeConfigConditions, getConfigValue } from './config/json-config.js';
import { validateRuntimeConfig } from './config/env-schema.js';
import { errorMessage } from './types/errors.js';
import { logEvent } from './utils/logger.js';

function bootstrap(): Runtime {
    try {
        return createRuntime();
    } catch (err) {
        logEvent('startup_failed', { error: errorMessage(err) }, 'error');
        process.exit(1);
    }
}

const runtime = bootstrap();

for (const issue of validateRuntimeConfig(getConfigValue, activeConfigConditions())) {
    logEvent('config_key_missing', {
        key: issue.key,
        class: issue.class,
        condition: issue.condition,
        remediation: issue.remediation,
    }, 'warn');
}

const server = startApiServer(runtime);

// ── Signal Handlers ──────────────────────────────────────────────────────────

function shutdown(signal: NodeJS.Signals): void {
    logEvent('shutdown', { signal });
    server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
