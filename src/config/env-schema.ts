/**
 * Centralized registry of all environment and secret keys consumed by Switchyard.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `condition`   Feature gate that makes a conditional key applicable.
 *   - `description` Human-readable purpose.
 *   - `remediation` Actionable hint when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope =
  | 'runtime'
  | 'orchestrator'
  | 'breaker'
  | 'lane'
  | 'provider'
  | 'routing'
  | 'budget';

/**
 * Stable feature gate identifiers used by `condition`.
 * Format: `<subsystem>:<feature>`.
 */
export type ConfigCondition =
  | 'lane:cloud'
  | 'lane:on_device_ollama'
  | 'api:signed';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  /** Applies only when class === 'conditional'. Identifies the feature gate. */
  condition?: ConfigCondition;
  description: string;
  remediation: string;
}

/**
 * Complete inventory of environment and secret keys.
 * Every key listed here may be overridden from the environment.
 */
export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime Core ────────────────────────────────────────────────────────────
  {
    key: 'API_SECRET',
    type: 'secret',
    class: 'conditional',
    condition: 'api:signed',
    scope: 'runtime',
    description: 'HMAC secret used to verify the X-Signature header on control plane requests.',
    remediation: 'Set API_SECRET before starting; signed endpoints answer 503 without it.',
  },
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Listening port for the HTTP control plane API (default: 3100).',
    remediation: 'Set API_PORT to change the control plane port, e.g. API_PORT=8080.',
  },
  {
    key: 'SWITCHYARD_CONFIG_PATH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Location of the JSON configuration file (default: ./switchyard.json).',
    remediation: 'Point SWITCHYARD_CONFIG_PATH at a readable JSON file.',
  },
  {
    key: 'SWITCHYARD_DB_PATH',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'SQLite database for routing telemetry, breaker events and runbook chunks. `:memory:` keeps it in process.',
    remediation: 'Set SWITCHYARD_DB_PATH to a writable file path.',
  },

  // ── Orchestrator ────────────────────────────────────────────────────────────
  {
    key: 'ASK_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Wall-clock limit for one lane answerer attempt (default: 12000).',
    remediation: 'Use a positive integer number of milliseconds.',
  },
  {
    key: 'ASK_MAX_RETRIES',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Retries after the first failed attempt (default: 1).',
    remediation: 'Use a non-negative integer.',
  },
  {
    key: 'ASK_BACKOFF_BASE_MS',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Base delay for exponential backoff between attempts (default: 250).',
    remediation: 'Use a non-negative integer number of milliseconds.',
  },
  {
    key: 'ASK_BACKOFF_MAX_MS',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Upper bound on a single backoff wait (default: 4000).',
    remediation: 'Use a non-negative integer number of milliseconds.',
  },
  {
    key: 'ASK_REQUEST_DEADLINE_MS',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Overall deadline for one request, backoff included. Unset means no overall deadline.',
    remediation: 'Use a positive integer number of milliseconds, or leave unset.',
  },
  {
    key: 'RAG_TOP_K',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Number of runbook passages used for grounding and fallback answers (default: 5).',
    remediation: 'Use a positive integer.',
  },
  {
    key: 'MIN_ANSWER_CHARS',
    type: 'env',
    class: 'optional',
    scope: 'orchestrator',
    description: 'Answers shorter than this are treated as low confidence (default: 60).',
    remediation: 'Use a non-negative integer.',
  },

  // ── Circuit Breakers ────────────────────────────────────────────────────────
  {
    key: 'BREAKER_FAILURE_THRESHOLD',
    type: 'env',
    class: 'optional',
    scope: 'breaker',
    description: 'Consecutive failures that open a lane breaker (default: 3).',
    remediation: 'Use an integer of at least 1.',
  },
  {
    key: 'BREAKER_SUCCESS_THRESHOLD',
    type: 'env',
    class: 'optional',
    scope: 'breaker',
    description: 'Consecutive half-open successes that close a lane breaker (default: 2).',
    remediation: 'Use an integer of at least 1.',
  },
  {
    key: 'BREAKER_RECOVERY_TIMEOUT_MS',
    type: 'env',
    class: 'optional',
    scope: 'breaker',
    description: 'Time an open lane breaker waits before admitting a trial call (default: 60000).',
    remediation: 'Use a non-negative integer number of milliseconds.',
  },

  // ── Lanes ───────────────────────────────────────────────────────────────────
  {
    key: 'ENABLE_CLOUD_LANE',
    type: 'env',
    class: 'optional',
    scope: 'lane',
    description: 'Allow callers to request the cloud lane with a `cloud` source hint (default: false).',
    remediation: 'Set ENABLE_CLOUD_LANE=true and configure CLOUD_API_KEY.',
  },
  {
    key: 'ON_DEVICE_MODE',
    type: 'env',
    class: 'optional',
    scope: 'lane',
    description: '`ollama` calls the local model server; `stub` answers deterministically without a model.',
    remediation: 'Use ON_DEVICE_MODE=ollama or ON_DEVICE_MODE=stub.',
  },

  // ── Providers ───────────────────────────────────────────────────────────────
  {
    key: 'OLLAMA_BASE_URL',
    type: 'env',
    class: 'conditional',
    condition: 'lane:on_device_ollama',
    scope: 'provider',
    description: 'Base URL of the local Ollama server (default: http://localhost:11434).',
    remediation: 'Start Ollama or point OLLAMA_BASE_URL at a reachable host.',
  },
  {
    key: 'OLLAMA_MODEL',
    type: 'env',
    class: 'optional',
    scope: 'provider',
    description: 'Model used by the on-device lane.',
    remediation: 'Pull the model with `ollama pull <model>` before starting.',
  },
  {
    key: 'CLOUD_API_BASE_URL',
    type: 'env',
    class: 'optional',
    scope: 'provider',
    description: 'Base URL of the OpenAI-compatible chat completions API used by the cloud lane.',
    remediation: 'Set CLOUD_API_BASE_URL to the provider endpoint, ending before `/chat/completions`.',
  },
  {
    key: 'CLOUD_API_KEY',
    type: 'secret',
    class: 'conditional',
    condition: 'lane:cloud',
    scope: 'provider',
    description: 'Bearer credential for the cloud lane provider.',
    remediation: 'Set CLOUD_API_KEY when ENABLE_CLOUD_LANE is on; without it the cloud lane falls back.',
  },
  {
    key: 'CLOUD_MODEL',
    type: 'env',
    class: 'optional',
    scope: 'provider',
    description: 'Model used by the cloud lane.',
    remediation: 'Use a model identifier the cloud provider accepts.',
  },

  // ── Routing & Budget ────────────────────────────────────────────────────────
  {
    key: 'ROUTING_STRATEGY',
    type: 'env',
    class: 'optional',
    scope: 'routing',
    description: 'Default provider selection strategy (default: balanced).',
    remediation:
      'Use one of cost_optimized, latency_optimized, quality_optimized, balanced, failover, round_robin.',
  },
  {
    key: 'DAILY_COST_LIMIT_USD',
    type: 'env',
    class: 'optional',
    scope: 'budget',
    description: 'Daily spend limit tracked by the cost ledger (default: 10).',
    remediation: 'Use a positive number.',
  },
  {
    key: 'MONTHLY_COST_LIMIT_USD',
    type: 'env',
    class: 'optional',
    scope: 'budget',
    description: 'Monthly spend limit tracked by the cost ledger (default: 100).',
    remediation: 'Use a positive number.',
  },
  {
    key: 'COST_ALERT_THRESHOLD',
    type: 'env',
    class: 'optional',
    scope: 'budget',
    description: 'Fraction of either limit at which a budget alert is logged (default: 0.8).',
    remediation: 'Use a number between 0 and 1.',
  },
];

export function findConfigKey(key: string): ConfigKeySpec | undefined {
  return CONFIG_SCHEMA.find((spec) => spec.key === key);
}

/** Keys whose values must never appear in logs or responses. */
export function secretConfigKeys(): string[] {
  return CONFIG_SCHEMA.filter((spec) => spec.type === 'secret').map((spec) => spec.key);
}

export type ConfigIssueClass = 'missing_required' | 'missing_conditional';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  condition: ConfigCondition | null;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

/**
 * Lists required keys without a value, and conditional keys without a value
 * whose feature gate is active.
 */
export function validateRuntimeConfig(
  read: (key: string) => string | undefined,
  activeConditions: ReadonlySet<ConfigCondition>,
): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  for (const spec of CONFIG_SCHEMA) {
    if (read(spec.key) !== undefined) continue;

    if (spec.class === 'required') {
      issues.push({ key: spec.key, class: 'missing_required', condition: null, remediation: spec.remediation });
    } else if (spec.class === 'conditional' && spec.condition && activeConditions.has(spec.condition)) {
      issues.push({
        key: spec.key,
        class: 'missing_conditional',
        condition: spec.condition,
        remediation: spec.remediation,
      });
    }
  }
  return issues;
}
