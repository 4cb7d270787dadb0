import type { Request, Response } from 'express';
import type { AnswerRequest } from '../../types/orchestration.js';
import type { Orchestrator } from '../../services/orchestrator-service.js';
import { InputValidationError } from '../../types/errors.js';
import {
    correlationIdFor,
    optionalStringField,
    optionalStringListField,
    readObjectBody,
    sendMappedError,
    sendOk,
} from '../shared.js';

export interface AskDeps {
    orchestrator: Orchestrator;
}

function parseAskBody(req: Request): AnswerRequest {
    const body = readObjectBody(req);
    const question = optionalStringField(body, 'question');
    if (question === undefined || !question.trim()) {
        throw new InputValidationError("'question' must be a non-empty string.");
    }
    return {
        question,
        tags: optionalStringListField(body, 'tags'),
        source: optionalStringField(body, 'source'),
        sessionId: optionalStringField(body, 'sessionId'),
    };
}

/** POST /ask: orchestrated answer with fallback. */
export function handleAsk(deps: AskDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            const response = await deps.orchestrator.ask(parseAskBody(req), correlationIdFor(res));
            sendOk(res, response);
        } catch (err) {
            sendMappedError(res, err);
        }
    };
}
