import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import type { CircuitBreakerConfigInput } from '../types/circuit-breaker.js';
import type { OrchestratorConfig } from '../types/orchestration.js';
import type { CostBudgetLimits } from '../types/routing.js';
import { findConfigKey, type ConfigCondition } from './env-schema.js';

export type OnDeviceMode = 'ollama' | 'stub';

export interface SwitchyardConfig {
    runtime: {
        apiSecret: string;
        apiPort: number;
        dbPath: string;
    };
    orchestrator: {
        timeoutMs: number;
        maxRetries: number;
        backoffBaseMs: number;
        backoffMaxMs: number;
        requestDeadlineMs: number | null;
        topK: number;
        minAnswerChars: number;
    };
    breakers: {
        failureThreshold: number;
        successThreshold: number;
        recoveryTimeoutMs: number;
    };
    lanes: {
        enableCloudLane: boolean;
        onDeviceMode: OnDeviceMode;
    };
    providers: {
        ollamaBaseUrl: string;
        ollamaModel: string;
        cloudApiBaseUrl: string;
        cloudApiKey: string;
        cloudModel: string;
    };
    routing: {
        defaultStrategy: string;
    };
    budget: {
        dailyLimitUsd: number;
        monthlyLimitUsd: number;
        alertThreshold: number;
    };
}

export const DEFAULT_CONFIG: SwitchyardConfig = {
    runtime: {
        apiSecret: '',
        apiPort: 3100,
        dbPath: 'memory/switchyard.db',
    },
    orchestrator: {
        timeoutMs: 12_000,
        maxRetries: 1,
        backoffBaseMs: 250,
        backoffMaxMs: 4_000,
        requestDeadlineMs: null,
        topK: 5,
        minAnswerChars: 60,
    },
    breakers: {
        failureThreshold: 3,
        successThreshold: 2,
        recoveryTimeoutMs: 60_000,
    },
    lanes: {
        enableCloudLane: false,
        onDeviceMode: 'ollama',
    },
    providers: {
        ollamaBaseUrl: 'http://localhost:11434',
        ollamaModel: 'llama3.1:8b',
        cloudApiBaseUrl: 'https://api.openai.com/v1',
        cloudApiKey: '',
        cloudModel: 'gpt-4o-mini',
    },
    routing: {
        defaultStrategy: 'balanced',
    },
    budget: {
        dailyLimitUsd: 10,
        monthlyLimitUsd: 100,
        alertThreshold: 0.8,
    },
};

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.SWITCHYARD_CONFIG_PATH) {
        return path.resolve(process.env.SWITCHYARD_CONFIG_PATH);
    }
    return path.resolve('switchyard.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(record: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = record[key];
    return isRecord(value) ? value : {};
}

function str(record: Record<string, unknown>, key: string, fallback: string): string {
    const value = record[key];
    return typeof value === 'string' ? value : fallback;
}

function num(record: Record<string, unknown>, key: string, fallback: number): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function bool(record: Record<string, unknown>, key: string, fallback: boolean): boolean {
    const value = record[key];
    return typeof value === 'boolean' ? value : fallback;
}

export function mergeWithDefaults(loaded: unknown): SwitchyardConfig {
    const root = isRecord(loaded) ? loaded : {};
    const d = DEFAULT_CONFIG;

    const runtime = section(root, 'runtime');
    const orchestrator = section(root, 'orchestrator');
    const breakers = section(root, 'breakers');
    const lanes = section(root, 'lanes');
    const providers = section(root, 'providers');
    const routing = section(root, 'routing');
    const budget = section(root, 'budget');

    const deadline = orchestrator.requestDeadlineMs;
    const onDeviceMode = lanes.onDeviceMode;

    return {
        runtime: {
            apiSecret: str(runtime, 'apiSecret', d.runtime.apiSecret),
            apiPort: num(runtime, 'apiPort', d.runtime.apiPort),
            dbPath: str(runtime, 'dbPath', d.runtime.dbPath),
        },
        orchestrator: {
            timeoutMs: num(orchestrator, 'timeoutMs', d.orchestrator.timeoutMs),
            maxRetries: num(orchestrator, 'maxRetries', d.orchestrator.maxRetries),
            backoffBaseMs: num(orchestrator, 'backoffBaseMs', d.orchestrator.backoffBaseMs),
            backoffMaxMs: num(orchestrator, 'backoffMaxMs', d.orchestrator.backoffMaxMs),
            requestDeadlineMs: typeof deadline === 'number' && Number.isFinite(deadline)
                ? deadline
                : d.orchestrator.requestDeadlineMs,
            topK: num(orchestrator, 'topK', d.orchestrator.topK),
            minAnswerChars: num(orchestrator, 'minAnswerChars', d.orchestrator.minAnswerChars),
        },
        breakers: {
            failureThreshold: num(breakers, 'failureThreshold', d.breakers.failureThreshold),
            successThreshold: num(breakers, 'successThreshold', d.breakers.successThreshold),
            recoveryTimeoutMs: num(breakers, 'recoveryTimeoutMs', d.breakers.recoveryTimeoutMs),
        },
        lanes: {
            enableCloudLane: bool(lanes, 'enableCloudLane', d.lanes.enableCloudLane),
            onDeviceMode: onDeviceMode === 'ollama' || onDeviceMode === 'stub'
                ? onDeviceMode
                : d.lanes.onDeviceMode,
        },
        providers: {
            ollamaBaseUrl: str(providers, 'ollamaBaseUrl', d.providers.ollamaBaseUrl),
            ollamaModel: str(providers, 'ollamaModel', d.providers.ollamaModel),
            cloudApiBaseUrl: str(providers, 'cloudApiBaseUrl', d.providers.cloudApiBaseUrl),
            cloudApiKey: str(providers, 'cloudApiKey', d.providers.cloudApiKey),
            cloudModel: str(providers, 'cloudModel', d.providers.cloudModel),
        },
        routing: {
            defaultStrategy: str(routing, 'defaultStrategy', d.routing.defaultStrategy),
        },
        budget: {
            dailyLimitUsd: num(budget, 'dailyLimitUsd', d.budget.dailyLimitUsd),
            monthlyLimitUsd: num(budget, 'monthlyLimitUsd', d.budget.monthlyLimitUsd),
            alertThreshold: num(budget, 'alertThreshold', d.budget.alertThreshold),
        },
    };
}

// ── Flat Key Adapter ────────────────────────────────────────────────────────

let cachedConfig: SwitchyardConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): SwitchyardConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            const content = readFileSync(configPath, 'utf8');
            cachedConfig = mergeWithDefaults(JSON.parse(content));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[Config] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

function jsonValueFor(config: SwitchyardConfig, key: string): unknown {
    switch (key) {
        case 'API_SECRET': return config.runtime.apiSecret;
        case 'API_PORT': return config.runtime.apiPort;
        case 'SWITCHYARD_DB_PATH': return config.runtime.dbPath;

        case 'ASK_TIMEOUT_MS': return config.orchestrator.timeoutMs;
        case 'ASK_MAX_RETRIES': return config.orchestrator.maxRetries;
        case 'ASK_BACKOFF_BASE_MS': return config.orchestrator.backoffBaseMs;
        case 'ASK_BACKOFF_MAX_MS': return config.orchestrator.backoffMaxMs;
        case 'ASK_REQUEST_DEADLINE_MS': return config.orchestrator.requestDeadlineMs;
        case 'RAG_TOP_K': return config.orchestrator.topK;
        case 'MIN_ANSWER_CHARS': return config.orchestrator.minAnswerChars;

        case 'BREAKER_FAILURE_THRESHOLD': return config.breakers.failureThreshold;
        case 'BREAKER_SUCCESS_THRESHOLD': return config.breakers.successThreshold;
        case 'BREAKER_RECOVERY_TIMEOUT_MS': return config.breakers.recoveryTimeoutMs;

        case 'ENABLE_CLOUD_LANE': return config.lanes.enableCloudLane;
        case 'ON_DEVICE_MODE': return config.lanes.onDeviceMode;

        case 'OLLAMA_BASE_URL': return config.providers.ollamaBaseUrl;
        case 'OLLAMA_MODEL': return config.providers.ollamaModel;
        case 'CLOUD_API_BASE_URL': return config.providers.cloudApiBaseUrl;
        case 'CLOUD_API_KEY': return config.providers.cloudApiKey;
        case 'CLOUD_MODEL': return config.providers.cloudModel;

        case 'ROUTING_STRATEGY': return config.routing.defaultStrategy;

        case 'DAILY_COST_LIMIT_USD': return config.budget.dailyLimitUsd;
        case 'MONTHLY_COST_LIMIT_USD': return config.budget.monthlyLimitUsd;
        case 'COST_ALERT_THRESHOLD': return config.budget.alertThreshold;
        default: return undefined;
    }
}

function isAllowedOverride(key: string): boolean {
    return key === 'NODE_ENV' || key === 'LOG_LEVEL' || findConfigKey(key) !== undefined;
}

/**
 * Gets a configured value: an environment override first, then `switchyard.json`
 * merged with defaults. Empty strings count as unset.
 */
export function getConfigValue(key: string): string | undefined {
    const config = cachedConfig ?? reloadConfigSync();

    const envValue = process.env[key];
    if (isAllowedOverride(key) && envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const jsonValue = jsonValueFor(config, key);
    if (jsonValue !== undefined && jsonValue !== null && String(jsonValue).trim() !== '') {
        return String(jsonValue);
    }

    return undefined;
}

export function getNumberConfigValue(key: string, fallback: number): number {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export function getBooleanConfigValue(key: string, fallback: boolean): boolean {
    const raw = getConfigValue(key);
    if (raw === undefined) return fallback;
    return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

// ── Typed Readers ───────────────────────────────────────────────────────────

export function loadOrchestratorConfig(): OrchestratorConfig {
    const d = DEFAULT_CONFIG;
    const deadline = getConfigValue('ASK_REQUEST_DEADLINE_MS');
    const parsedDeadline = deadline === undefined ? NaN : Number(deadline);
    return {
        timeoutMs: getNumberConfigValue('ASK_TIMEOUT_MS', d.orchestrator.timeoutMs),
        maxRetries: Math.max(0, Math.floor(getNumberConfigValue('ASK_MAX_RETRIES', d.orchestrator.maxRetries))),
        backoffBaseMs: getNumberConfigValue('ASK_BACKOFF_BASE_MS', d.orchestrator.backoffBaseMs),
        backoffMaxMs: getNumberConfigValue('ASK_BACKOFF_MAX_MS', d.orchestrator.backoffMaxMs),
        requestDeadlineMs: Number.isFinite(parsedDeadline) && parsedDeadline > 0 ? parsedDeadline : null,
        failureThreshold: getNumberConfigValue('BREAKER_FAILURE_THRESHOLD', d.breakers.failureThreshold),
        successThreshold: getNumberConfigValue('BREAKER_SUCCESS_THRESHOLD', d.breakers.successThreshold),
        recoveryTimeoutMs: getNumberConfigValue('BREAKER_RECOVERY_TIMEOUT_MS', d.breakers.recoveryTimeoutMs),
        topK: getNumberConfigValue('RAG_TOP_K', d.orchestrator.topK),
        minAnswerChars: getNumberConfigValue('MIN_ANSWER_CHARS', d.orchestrator.minAnswerChars),
    };
}

export function laneBreakerConfig(config: OrchestratorConfig): CircuitBreakerConfigInput {
    return {
        failureThreshold: config.failureThreshold,
        successThreshold: config.successThreshold,
        recoveryTimeoutMs: config.recoveryTimeoutMs,
    };
}

export function loadBudgetLimits(): CostBudgetLimits {
    const d = DEFAULT_CONFIG.budget;
    return {
        dailyLimit: getNumberConfigValue('DAILY_COST_LIMIT_USD', d.dailyLimitUsd),
        monthlyLimit: getNumberConfigValue('MONTHLY_COST_LIMIT_USD', d.monthlyLimitUsd),
        alertThreshold: getNumberConfigValue('COST_ALERT_THRESHOLD', d.alertThreshold),
    };
}

export function getOnDeviceMode(): OnDeviceMode {
    return getConfigValue('ON_DEVICE_MODE') === 'stub' ? 'stub' : 'ollama';
}

/** Feature gates switched on by the current configuration. */
export function activeConfigConditions(): Set<ConfigCondition> {
    const active = new Set<ConfigCondition>(['api:signed']);
    if (getBooleanConfigValue('ENABLE_CLOUD_LANE', DEFAULT_CONFIG.lanes.enableCloudLane)) {
        active.add('lane:cloud');
    }
    if (getOnDeviceMode() === 'ollama') {
        active.add('lane:on_device_ollama');
    }
    return active;
}
