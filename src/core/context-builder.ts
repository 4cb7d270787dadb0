import type { Citation, GroundedPrompt } from '../types/orchestration.js';

export const SYSTEM_INSTRUCTION = [
    'You are an incident/runbook assistant.',
    'Use ONLY the provided runbook snippets when possible.',
    'If the runbooks do not contain enough information, say you are not confident.',
    'Do not invent commands, credentials, or unsafe actions.',
    'Prefer step-by-step, operationally safe guidance with verification steps.',
].join(' ');

const ANSWER_INSTRUCTIONS = [
    'INSTRUCTIONS:',
    '- Answer using the snippets, cite chunk ids like [chunk:123].',
    '- If not enough info, say you cannot answer confidently and summarize the closest snippets.',
    '',
].join('\n');

export const DEFAULT_MAX_PROMPT_CHARS = 6500;
const PREVIEW_CHARS = 160;

export interface GroundingChunk {
    id: number;
    source: string;
    content: string;
}

/** Collapses whitespace and cuts to `limit` characters, ending in an ellipsis when cut. */
export function previewText(text: string, limit = PREVIEW_CHARS): string {
    const collapsed = text.split(/\s+/).filter(Boolean).join(' ');
    if (collapsed.length <= limit) return collapsed;
    return `${collapsed.slice(0, limit - 1)}…`;
}

/**
 * Assembles the grounded prompt: system instruction, question, cited snippets and
 * answer instructions. Over the budget, the snippet tail is cut first; the head
 * (system, question, snippet heading) is always kept whole.
 */
export class ContextBuilder {
    readonly #maxChars: number;

    constructor(maxChars = DEFAULT_MAX_PROMPT_CHARS) {
        this.#maxChars = maxChars;
    }

    build(question: string, chunks: readonly GroundingChunk[]): GroundedPrompt {
        const citations: Citation[] = chunks.map((chunk) => ({
            chunkId: chunk.id,
            source: chunk.source,
            preview: previewText(chunk.content),
        }));

        const head = [
            `SYSTEM:\n${SYSTEM_INSTRUCTION}\n`,
            `QUESTION:\n${question.trim()}\n`,
            chunks.length > 0 ? 'RUNBOOK SNIPPETS (with citations):\n' : 'RUNBOOK SNIPPETS: (none available)\n',
        ];
        const tail = [
            ...chunks.map((chunk) => `[chunk:${chunk.id} source:${chunk.source}]\n${chunk.content.trim()}\n`),
            ANSWER_INSTRUCTIONS,
        ];

        let prompt = [...head, ...tail].join('\n');
        if (prompt.length > this.#maxChars) {
            const headText = head.join('\n');
            const tailBudget = Math.max(this.#maxChars - headText.length - 20, 0);
            prompt = `${headText}\n${tail.join('\n').slice(0, tailBudget)}`;
        }

        return { prompt, citations, charEstimate: prompt.length };
    }
}
