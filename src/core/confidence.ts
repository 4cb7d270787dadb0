import type { AnswerAttempt, Lane } from '../types/orchestration.js';

export const UNCERTAINTY_MARKERS: readonly string[] = [
    "i don't know",
    'not sure',
    "can't",
    'cannot',
    'unknown',
    '모르',
    '확신',
    '알 수 없',
    '불확실',
    'わかりません',
    '不确定',
    '不知道',
];

export const DEFAULT_MIN_ANSWER_CHARS = 60;

export type LowConfidenceReason = 'empty' | 'too_short' | 'uncertainty_marker' | 'no_citations';

export interface ConfidenceVerdict {
    lowConfidence: boolean;
    reason: LowConfidenceReason | null;
}

/** Deterministic answer-quality gate applied before a model answer is returned. */
export class ConfidencePolicy {
    readonly #minAnswerChars: number;
    readonly #markers: readonly string[];

    constructor(minAnswerChars = DEFAULT_MIN_ANSWER_CHARS, markers: readonly string[] = UNCERTAINTY_MARKERS) {
        this.#minAnswerChars = minAnswerChars;
        this.#markers = markers.map((marker) => marker.toLowerCase());
    }

    evaluate(attempt: Pick<AnswerAttempt, 'answer' | 'citations'>, lane: Lane): ConfidenceVerdict {
        const text = attempt.answer.trim().toLowerCase();
        if (!text) return { lowConfidence: true, reason: 'empty' };
        if (text.length < this.#minAnswerChars) return { lowConfidence: true, reason: 'too_short' };
        if (this.#markers.some((marker) => text.includes(marker))) {
            return { lowConfidence: true, reason: 'uncertainty_marker' };
        }
        // Grounded answers must cite at least one passage.
        if (lane === 'on_device_rag' && attempt.citations.length === 0) {
            return { lowConfidence: true, reason: 'no_citations' };
        }
        return { lowConfidence: false, reason: null };
    }
}
