export type Lane = 'on_device_rag' | 'cloud_direct';

export const LANES: readonly Lane[] = ['on_device_rag', 'cloud_direct'];

export type AskOutcome = 'ok' | 'fallback' | 'error' | 'circuit_open';

export interface Citation {
    chunkId: number;
    source: string;
    preview: string;
}

/** What a lane answerer hands back to the orchestrator. */
export interface AnswerAttempt {
    answer: string;
    citations: Citation[];
    provider: string;
    tokenEstimate: number | null;
    charEstimate: number;
}

export interface AnswerRequest {
    question: string;
    tags?: string[];
    /** Lane hint, e.g. `cloud`. Honoured only when the cloud lane is enabled. */
    source?: string;
    sessionId?: string;
}

export interface RouteInfo {
    lane: Lane;
    provider: string;
    fallbackUsed: boolean;
}

export interface AnswerTelemetry {
    latencyMs: number;
    tokenEstimate: number | null;
    charEstimate: number;
}

export interface AnswerResponse {
    answer: string;
    citations: Citation[];
    route: RouteInfo;
    telemetry: AnswerTelemetry;
}

export interface LaneDecision {
    lane: Lane;
    provider: string;
    reason: string;
}

export interface OrchestratorConfig {
    /** Wall-clock limit for a single answerer attempt. */
    timeoutMs: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    /** Overall limit for the whole request, including backoff waits. */
    requestDeadlineMs: number | null;
    failureThreshold: number;
    successThreshold: number;
    recoveryTimeoutMs: number;
    topK: number;
    minAnswerChars: number;
}

export interface OrchestratorMetrics {
    totalRequests: number;
    outcomes: Record<AskOutcome, number>;
    byLane: Record<Lane, number>;
    avgLatencyMs: number;
}

export interface GroundedPrompt {
    prompt: string;
    citations: Citation[];
    charEstimate: number;
}
