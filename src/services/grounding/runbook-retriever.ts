import type { RunbookStore, StoredChunk } from './runbook-store.js';

const WORD_PATTERN = /[A-Za-z0-9_-]+/g;
const DEFAULT_SCAN_LIMIT = 400;

export interface RetrievedChunk extends StoredChunk {
    score: number;
}

export interface ScoredChunk {
    id: number;
    score: number;
}

/** Lower-cased ASCII word tokens of at least two characters. */
export function tokenize(text: string): string[] {
    return (text.toLowerCase().match(WORD_PATTERN) ?? []).filter((token) => token.length >= 2);
}

function countTokens(tokens: string[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}

/**
 * Keyword relevance: for each query token, `tf / sqrt(length) × ln((N + 1) / (n + 0.5))`,
 * with document frequencies taken over the candidate set only. Chunks scoring 0 are
 * dropped; ties keep candidate order.
 */
export function scoreChunks(queryTokens: string[], chunks: ReadonlyArray<{ id: number; content: string }>): ScoredChunk[] {
    if (queryTokens.length === 0) return [];

    const documentFrequency = new Map<string, number>();
    const docs = chunks.map((chunk) => {
        const tokens = tokenize(chunk.content);
        const counts = countTokens(tokens);
        for (const token of counts.keys()) {
            documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
        }
        return { id: chunk.id, counts, length: tokens.length || 1 };
    });

    const total = docs.length || 1;
    const idf = (token: string): number => Math.log((total + 1) / ((documentFrequency.get(token) ?? 0) + 0.5));

    const scored: ScoredChunk[] = [];
    for (const doc of docs) {
        let score = 0;
        for (const token of queryTokens) {
            const tf = doc.counts.get(token) ?? 0;
            if (tf > 0) {
                score += (tf / Math.sqrt(doc.length)) * idf(token);
            }
        }
        if (score > 0) {
            scored.push({ id: doc.id, score });
        }
    }

    return scored.sort((left, right) => right.score - left.score);
}

export class RunbookRetriever {
    readonly #store: RunbookStore;
    readonly #scanLimit: number;

    constructor(store: RunbookStore, scanLimit = DEFAULT_SCAN_LIMIT) {
        this.#store = store;
        this.#scanLimit = scanLimit;
    }

    /** Top `topK` chunks among the most recent `scanLimit`, best first. */
    retrieve(question: string, topK = 5): RetrievedChunk[] {
        const queryTokens = tokenize(question.trim());
        const candidates = this.#store.listRecent(this.#scanLimit);
        const byId = new Map(candidates.map((chunk) => [chunk.id, chunk]));

        return scoreChunks(queryTokens, candidates)
            .slice(0, Math.max(0, topK))
            .flatMap((scored) => {
                const chunk = byId.get(scored.id);
                return chunk ? [{ ...chunk, score: scored.score }] : [];
            });
    }
}
