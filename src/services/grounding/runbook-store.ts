import {
    getRunbookChunksByIds,
    insertRunbookChunk,
    listRecentRunbookChunks,
    type RunbookChunkRow,
} from '../db.js';
import { InputValidationError } from '../../types/errors.js';

export interface StoredChunk {
    id: number;
    source: string;
    content: string;
    createdAt: string;
}

function toStoredChunk(row: RunbookChunkRow): StoredChunk {
    return { id: row.id, source: row.source, content: row.content, createdAt: row.created_at };
}

/** Grounding passages kept in the `runbook_chunks` table. */
export class RunbookStore {
    /** Stores each non-blank passage and returns the new ids in input order. */
    ingest(source: string, contents: readonly string[]): number[] {
        const trimmedSource = source.trim();
        if (!trimmedSource) {
            throw new InputValidationError('Runbook source must not be empty.');
        }
        const passages = contents.map((content) => content.trim()).filter((content) => content.length > 0);
        if (passages.length === 0) {
            throw new InputValidationError('At least one non-empty runbook chunk is required.');
        }
        return passages.map((content) => insertRunbookChunk(trimmedSource, content));
    }

    /** Newest first. */
    listRecent(limit = 400): StoredChunk[] {
        return listRecentRunbookChunks(limit).map(toStoredChunk);
    }

    /** Unknown ids are skipped; the result follows the order of `ids`. */
    getByIds(ids: readonly number[]): StoredChunk[] {
        const byId = new Map(getRunbookChunksByIds([...ids]).map((row) => [row.id, toStoredChunk(row)]));
        return ids.flatMap((id) => {
            const chunk = byId.get(id);
            return chunk ? [chunk] : [];
        });
    }
}
