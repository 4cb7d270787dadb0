import type { AnswerAttempt, GroundedPrompt, Lane } from '../types/orchestration.js';
import type { LlmProvider } from '../services/llm-providers.js';
import type { RunbookRetriever } from '../services/grounding/runbook-retriever.js';
import type { ContextBuilder } from './context-builder.js';

export interface AnswerOptions {
    signal?: AbortSignal;
}

/** One lane's way of turning a question into an {@link AnswerAttempt}. */
export interface LaneAnswerer {
    readonly lane: Lane;
    /** Name reported to the router for this lane's backend. */
    readonly providerName: string;
    answer(question: string, options?: AnswerOptions): Promise<AnswerAttempt>;
}

export interface OnDeviceRagAnswererOptions {
    provider: LlmProvider;
    retriever: RunbookRetriever;
    builder: ContextBuilder;
    topK?: number;
}

/** Grounded lane: retrieve runbook passages, build a cited prompt, generate locally. */
export class OnDeviceRagAnswerer implements LaneAnswerer {
    readonly lane = 'on_device_rag' as const;
    readonly topK: number;
    readonly #provider: LlmProvider;
    readonly #retriever: RunbookRetriever;
    readonly #builder: ContextBuilder;

    constructor(options: OnDeviceRagAnswererOptions) {
        this.#provider = options.provider;
        this.#retriever = options.retriever;
        this.#builder = options.builder;
        this.topK = options.topK ?? 5;
    }

    get providerName(): string {
        return this.#provider.name;
    }

    /** Retrieval and prompt assembly only; no model call. */
    retrieveAndBuildPrompt(question: string, topK = this.topK): GroundedPrompt {
        const chunks = this.#retriever.retrieve(question, topK);
        return this.#builder.build(question, chunks);
    }

    async answer(question: string, options: AnswerOptions = {}): Promise<AnswerAttempt> {
        const built = this.retrieveAndBuildPrompt(question);
        const result = await this.#provider.generate(built.prompt, { signal: options.signal });
        return {
            answer: result.text,
            citations: built.citations,
            provider: result.provider,
            tokenEstimate: result.tokenEstimate,
            charEstimate: built.charEstimate,
        };
    }
}

export function buildCloudPrompt(question: string): string {
    return (
        'You are an incident assistant. Provide a safe, operational answer. If unsure, say so.\n\n'
        + `QUESTION:\n${question.trim()}\n`
    );
}

/** Cloud lane: the question goes straight to the remote model, without grounding. */
export class CloudDirectAnswerer implements LaneAnswerer {
    readonly lane = 'cloud_direct' as const;
    readonly #provider: LlmProvider;

    constructor(provider: LlmProvider) {
        this.#provider = provider;
    }

    get providerName(): string {
        return this.#provider.name;
    }

    async answer(question: string, options: AnswerOptions = {}): Promise<AnswerAttempt> {
        const prompt = buildCloudPrompt(question);
        const result = await this.#provider.generate(prompt, { signal: options.signal });
        return {
            answer: result.text,
            citations: [],
            provider: result.provider,
            tokenEstimate: result.tokenEstimate,
            charEstimate: prompt.length,
        };
    }
}
