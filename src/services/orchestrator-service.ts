import { randomUUID } from 'node:crypto';
import type {
    AnswerAttempt,
    AnswerRequest,
    AnswerResponse,
    AskOutcome,
    Citation,
    GroundedPrompt,
    Lane,
    LaneDecision,
    OrchestratorConfig,
    OrchestratorMetrics,
} from '../types/orchestration.js';
import { LANES } from '../types/orchestration.js';
import {
    CallTimeoutError,
    CircuitOpenError,
    ConfigurationError,
    InputValidationError,
    LaneCallFailedError,
    errorMessage,
} from '../types/errors.js';
import { DEFAULT_CONFIG, laneBreakerConfig } from '../config/json-config.js';
import type { CircuitBreaker, CircuitBreakerRegistry } from './circuit-breaker.js';
import type { DynamicRouter } from './dynamic-router.js';
import type { LanePolicy } from '../core/lane-policy.js';
import type { LaneAnswerer } from '../core/lane-answerers.js';
import { ConfidencePolicy } from '../core/confidence.js';
import { withRetry } from '../utils/retry.js';
import { withTimeout } from '../utils/timeout.js';
import { logEvent } from '../utils/logger.js';

export const FALLBACK_PROVIDER = 'fallback';

const FALLBACK_HEADER = [
    "I can't confidently answer based on the runbook evidence.",
    '',
    'Most relevant runbook snippets:',
    '',
].join('\n');

/** Retrieval without a model call; feeds the deterministic fallback. */
export interface GroundingSource {
    retrieveAndBuildPrompt(question: string, topK: number): GroundedPrompt;
}

export interface OrchestratorOptions {
    breakers: CircuitBreakerRegistry;
    policy: LanePolicy;
    answerers: Partial<Record<Lane, LaneAnswerer>>;
    grounding?: GroundingSource;
    router?: DynamicRouter;
    config?: Partial<OrchestratorConfig>;
    confidence?: ConfidencePolicy;
    now?: () => number;
}

export function defaultOrchestratorConfig(): OrchestratorConfig {
    const d = DEFAULT_CONFIG;
    return {
        timeoutMs: d.orchestrator.timeoutMs,
        maxRetries: d.orchestrator.maxRetries,
        backoffBaseMs: d.orchestrator.backoffBaseMs,
        backoffMaxMs: d.orchestrator.backoffMaxMs,
        requestDeadlineMs: d.orchestrator.requestDeadlineMs,
        failureThreshold: d.breakers.failureThreshold,
        successThreshold: d.breakers.successThreshold,
        recoveryTimeoutMs: d.breakers.recoveryTimeoutMs,
        topK: d.orchestrator.topK,
        minAnswerChars: d.orchestrator.minAnswerChars,
    };
}

/** Renders the fixed low-confidence answer from the retrieved citations. */
export function renderFallbackAnswer(citations: readonly Citation[]): string {
    const lines = citations.map((citation) => `- [chunk:${citation.chunkId} source:${citation.source}] ${citation.preview}\n`);
    return FALLBACK_HEADER + lines.join('');
}

function emptyMetrics(): OrchestratorMetrics {
    return {
        totalRequests: 0,
        outcomes: { ok: 0, fallback: 0, error: 0, circuit_open: 0 },
        byLane: { on_device_rag: 0, cloud_direct: 0 },
        avgLatencyMs: 0,
    };
}

interface LaneCallResult {
    attempt: AnswerAttempt | null;
    error: unknown;
}

/**
 * Drives one question through lane selection, breaker-guarded attempts with
 * timeout and backoff, the confidence gate and, when needed, the retrieval-only
 * fallback. Only {@link ConfigurationError} and {@link InputValidationError} leave
 * {@link ask}; every backend failure becomes a fallback answer.
 */
export class Orchestrator {
    readonly config: OrchestratorConfig;
    readonly #breakers: CircuitBreakerRegistry;
    readonly #policy: LanePolicy;
    readonly #answerers: Partial<Record<Lane, LaneAnswerer>>;
    readonly #grounding: GroundingSource | undefined;
    readonly #router: DynamicRouter | undefined;
    readonly #confidence: ConfidencePolicy;
    readonly #now: () => number;
    #metrics: OrchestratorMetrics = emptyMetrics();

    constructor(options: OrchestratorOptions) {
        this.config = { ...defaultOrchestratorConfig(), ...options.config };
        this.#breakers = options.breakers;
        this.#policy = options.policy;
        this.#answerers = { ...options.answerers };
        this.#grounding = options.grounding;
        this.#router = options.router;
        this.#confidence = options.confidence ?? new ConfidencePolicy(this.config.minAnswerChars);
        this.#now = options.now ?? Date.now;

        for (const lane of LANES) {
            if (this.#answerers[lane]) {
                this.#laneBreaker(lane);
            }
        }
    }

    async ask(request: AnswerRequest, requestId: string = randomUUID()): Promise<AnswerResponse> {
        const question = request.question.trim();
        if (!question) {
            throw new InputValidationError('question must not be empty', ['Send a non-empty "question" string.']);
        }

        const startedAt = this.#now();
        const decision = this.#policy.decide(question, request.source);
        const answerer = this.#answerers[decision.lane];
        if (!answerer) {
            throw new ConfigurationError(`No answerer configured for lane '${decision.lane}'`);
        }

        logEvent('ask_start', {
            requestId,
            lane: decision.lane,
            provider: decision.provider,
            reason: decision.reason,
            sessionId: request.sessionId ?? null,
        });

        const { attempt: modelAttempt, error } = await this.#callLane(decision, answerer, question, requestId);

        let outcome: AskOutcome;
        let attempt: AnswerAttempt;
        if (modelAttempt) {
            const verdict = this.#confidence.evaluate(modelAttempt, decision.lane);
            if (verdict.lowConfidence) {
                outcome = 'fallback';
                attempt = this.#fallback(question, requestId);
                logEvent('ask_low_confidence', { requestId, lane: decision.lane, reason: verdict.reason });
            } else {
                outcome = 'ok';
                attempt = modelAttempt;
            }
        } else {
            outcome = error instanceof CircuitOpenError ? 'circuit_open' : 'error';
            attempt = this.#fallback(question, requestId);
            logEvent('ask_error', {
                requestId,
                lane: decision.lane,
                provider: decision.provider,
                outcome,
                error: errorMessage(error),
            }, 'error');
        }

        const latencyMs = Math.max(0, this.#now() - startedAt);
        const fallbackUsed = outcome !== 'ok';
        this.#recordOutcome(decision.lane, outcome, latencyMs);

        logEvent('ask_end', {
            requestId,
            lane: decision.lane,
            provider: attempt.provider,
            retrievedChunkIds: attempt.citations.map((citation) => citation.chunkId),
            latencyMs,
            outcome,
            fallbackUsed,
        });

        return {
            answer: attempt.answer,
            citations: attempt.citations,
            route: { lane: decision.lane, provider: attempt.provider, fallbackUsed },
            telemetry: {
                latencyMs,
                tokenEstimate: attempt.tokenEstimate,
                charEstimate: attempt.charEstimate,
            },
        };
    }

    getMetrics(): OrchestratorMetrics {
        const metrics = this.#metrics;
        return {
            totalRequests: metrics.totalRequests,
            outcomes: { ...metrics.outcomes },
            byLane: { ...metrics.byLane },
            avgLatencyMs: metrics.avgLatencyMs,
        };
    }

    // ── Lane call ────────────────────────────────────────────────────────────

    async #callLane(
        decision: LaneDecision,
        answerer: LaneAnswerer,
        question: string,
        requestId: string,
    ): Promise<LaneCallResult> {
        const breaker = this.#laneBreaker(decision.lane);
        const deadline = this.#startDeadline();

        try {
            const result = await withRetry(
                () => breaker.execute(() => this.#timedAttempt(decision, answerer, question, deadline.signal)),
                {
                    maxAttempts: this.config.maxRetries + 1,
                    baseDelayMs: this.config.backoffBaseMs,
                    maxDelayMs: this.config.backoffMaxMs,
                    label: `${decision.lane}:${requestId}`,
                    signal: deadline.signal,
                    shouldRetry: (err) => !(err instanceof CircuitOpenError) && !(err instanceof ConfigurationError),
                },
            );

            if (result.ok && result.value) {
                return { attempt: result.value, error: null };
            }
            if (result.lastError instanceof ConfigurationError) {
                throw result.lastError;
            }
            if (result.lastError instanceof CircuitOpenError) {
                return { attempt: null, error: result.lastError };
            }
            return { attempt: null, error: new LaneCallFailedError(result.attempts, result.lastError) };
        } finally {
            deadline.clear();
        }
    }

    async #timedAttempt(
        decision: LaneDecision,
        answerer: LaneAnswerer,
        question: string,
        parentSignal: AbortSignal | undefined,
    ): Promise<AnswerAttempt> {
        const routed = this.#router?.getProvider(decision.provider);
        if (routed) {
            this.#router?.recordRequestStart(routed.name);
        }

        const startedAt = this.#now();
        try {
            const attempt = await withTimeout(
                (signal) => answerer.answer(question, { signal }),
                this.config.timeoutMs,
                `${decision.lane} answer`,
                parentSignal,
            );
            if (routed && this.#router) {
                const tokens = attempt.tokenEstimate ?? 0;
                this.#router.recordRequestResult({
                    providerName: routed.name,
                    success: true,
                    latencyMs: this.#now() - startedAt,
                    tokensUsed: tokens,
                    cost: (tokens / 1000) * this.#router.costOptimizer.getCostPer1k(routed),
                });
            }
            return attempt;
        } catch (err) {
            if (routed) {
                this.#router?.recordRequestResult({
                    providerName: routed.name,
                    success: false,
                    latencyMs: this.#now() - startedAt,
                });
            }
            throw err;
        }
    }

    #startDeadline(): { signal: AbortSignal | undefined; clear: () => void } {
        const deadlineMs = this.config.requestDeadlineMs;
        if (deadlineMs === null || deadlineMs <= 0) {
            return { signal: undefined, clear: () => undefined };
        }
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(new CallTimeoutError('request', deadlineMs)), deadlineMs);
        return { signal: controller.signal, clear: () => clearTimeout(timer) };
    }

    #laneBreaker(lane: Lane): CircuitBreaker {
        return this.#breakers.get(lane, laneBreakerConfig(this.config));
    }

    // ── Fallback ─────────────────────────────────────────────────────────────

    #fallback(question: string, requestId: string): AnswerAttempt {
        let built: GroundedPrompt = { prompt: '', citations: [], charEstimate: 0 };
        if (this.#grounding) {
            try {
                built = this.#grounding.retrieveAndBuildPrompt(question, this.config.topK);
            } catch (err) {
                logEvent('fallback_retrieval_failed', { requestId, error: errorMessage(err) }, 'warn');
            }
        }

        return {
            answer: renderFallbackAnswer(built.citations),
            citations: built.citations,
            provider: FALLBACK_PROVIDER,
            tokenEstimate: null,
            charEstimate: built.charEstimate,
        };
    }

    #recordOutcome(lane: Lane, outcome: AskOutcome, latencyMs: number): void {
        const metrics = this.#metrics;
        metrics.totalRequests++;
        metrics.outcomes[outcome]++;
        metrics.byLane[lane]++;
        const n = metrics.totalRequests;
        metrics.avgLatencyMs = (metrics.avgLatencyMs * (n - 1) + latencyMs) / n;
    }
}
