import { ProviderUnavailableError, TransientBackendError, errorMessage } from '../types/errors.js';
import { scrubSensitiveText } from '../utils/logger.js';
import { estimateTokens } from './cost-optimizer.js';

export interface GenerateOptions {
    signal?: AbortSignal;
}

export interface LlmResult {
    text: string;
    provider: string;
    tokenEstimate: number | null;
}

/** A backend that turns a prompt into text. */
export interface LlmProvider {
    readonly name: string;
    generate(prompt: string, options?: GenerateOptions): Promise<LlmResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function trimTrailingSlash(url: string): string {
    return url.replace(/\/+$/, '');
}

function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

async function postJson(
    provider: string,
    url: string,
    body: unknown,
    headers: Record<string, string>,
    signal: AbortSignal | undefined,
): Promise<unknown> {
    let response: Response;
    try {
        response = await fetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            signal,
        });
    } catch (err) {
        if (signal?.aborted) {
            throw signal.reason ?? err;
        }
        throw new TransientBackendError(provider, `${provider} request failed: ${errorMessage(err)}`, null, { cause: err });
    }

    if (!response.ok) {
        const detail = scrubSensitiveText(await response.text()).slice(0, 300);
        const message = `${provider} returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`;
        if (isRetryableStatus(response.status)) {
            throw new TransientBackendError(provider, message, response.status);
        }
        throw new ProviderUnavailableError(provider, message);
    }

    return response.json();
}

// ── Ollama ──────────────────────────────────────────────────────────────────

export interface OllamaProviderOptions {
    baseUrl: string;
    model: string;
    name?: string;
}

/** Local Ollama server, `POST /api/generate` without streaming. */
export class OllamaProvider implements LlmProvider {
    readonly name: string;
    readonly #baseUrl: string;
    readonly #model: string;

    constructor(options: OllamaProviderOptions) {
        this.name = options.name ?? 'ollama';
        this.#baseUrl = trimTrailingSlash(options.baseUrl);
        this.#model = options.model;
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<LlmResult> {
        const payload = await postJson(
            this.name,
            `${this.#baseUrl}/api/generate`,
            { model: this.#model, prompt, stream: false },
            {},
            options.signal,
        );
        const text = isRecord(payload) && typeof payload.response === 'string' ? payload.response : '';
        const evalCount = isRecord(payload) && typeof payload.eval_count === 'number' ? payload.eval_count : null;
        return { text, provider: this.name, tokenEstimate: evalCount };
    }
}

// ── OpenAI-compatible ───────────────────────────────────────────────────────

export interface OpenAiCompatibleProviderOptions {
    baseUrl: string;
    apiKey: string;
    model: string;
    name?: string;
    maxTokens?: number;
}

function firstChoiceContent(payload: unknown): string {
    if (!isRecord(payload) || !Array.isArray(payload.choices)) return '';
    const first: unknown = payload.choices[0];
    if (!isRecord(first) || !isRecord(first.message)) return '';
    const content = first.message.content;
    return typeof content === 'string' ? content : '';
}

function totalTokens(payload: unknown): number | null {
    if (!isRecord(payload) || !isRecord(payload.usage)) return null;
    const total = payload.usage.total_tokens;
    return typeof total === 'number' ? total : null;
}

/** Any `/chat/completions` endpoint with bearer auth. */
export class OpenAiCompatibleProvider implements LlmProvider {
    readonly name: string;
    readonly #baseUrl: string;
    readonly #apiKey: string;
    readonly #model: string;
    readonly #maxTokens: number;

    constructor(options: OpenAiCompatibleProviderOptions) {
        this.name = options.name ?? 'openai_compatible';
        this.#baseUrl = trimTrailingSlash(options.baseUrl);
        this.#apiKey = options.apiKey;
        this.#model = options.model;
        this.#maxTokens = options.maxTokens ?? 1024;
    }

    async generate(prompt: string, options: GenerateOptions = {}): Promise<LlmResult> {
        if (!this.#apiKey) {
            throw new ProviderUnavailableError(this.name, `${this.name} has no API key configured`);
        }
        const payload = await postJson(
            this.name,
            `${this.#baseUrl}/chat/completions`,
            {
                model: this.#model,
                messages: [{ role: 'user', content: prompt }],
                max_tokens: this.#maxTokens,
            },
            { Authorization: `Bearer ${this.#apiKey}` },
            options.signal,
        );
        return { text: firstChoiceContent(payload), provider: this.name, tokenEstimate: totalTokens(payload) };
    }
}

// ── Stub ────────────────────────────────────────────────────────────────────

export const DEFAULT_STUB_ANSWER = '(stub) The local model is disabled; returning a placeholder answer.';

/** Deterministic provider for demos and tests; never touches the network. */
export class StubProvider implements LlmProvider {
    readonly name: string;
    readonly #answer: string;

    constructor(answer = DEFAULT_STUB_ANSWER, name = 'on_device_stub') {
        this.#answer = answer;
        this.name = name;
    }

    async generate(_prompt: string, options: GenerateOptions = {}): Promise<LlmResult> {
        if (options.signal?.aborted) {
            throw options.signal.reason;
        }
        return { text: this.#answer, provider: this.name, tokenEstimate: estimateTokens(this.#answer) };
    }
}
