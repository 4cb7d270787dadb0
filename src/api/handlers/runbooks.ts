import type { Request, Response } from 'express';
import type { RunbookIngestData } from '../../types/api.js';
import type { RunbookStore } from '../../services/grounding/runbook-store.js';
import { InputValidationError } from '../../types/errors.js';
import { logEvent } from '../../utils/logger.js';
import {
    optionalStringListField,
    readObjectBody,
    requireStringField,
    sendMappedError,
    sendOk,
} from '../shared.js';

export interface RunbookDeps {
    store: RunbookStore;
}

/** POST /runbooks/ingest: `{ source, chunks: string[] }` */
export function handleRunbookIngest(deps: RunbookDeps) {
    return (req: Request, res: Response): void => {
        try {
            const body = readObjectBody(req);
            const source = requireStringField(body, 'source');
            const chunks = optionalStringListField(body, 'chunks');
            if (chunks === undefined) {
                throw new InputValidationError("'chunks' must be an array of strings.");
            }

            const chunkIds = deps.store.ingest(source, chunks);
            logEvent('runbook_ingested', { source: source.trim(), chunks: chunkIds.length });
            const data: RunbookIngestData = { source: source.trim(), chunkIds };
            sendOk(res, data, 201);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
