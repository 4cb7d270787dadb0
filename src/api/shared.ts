import type { Request, Response, NextFunction } from 'express';
import type { IncomingMessage } from 'node:http';
import { createHmac, timingSafeEqual, randomUUID } from 'node:crypto';
import type { ApiEnvelope } from '../types/api.js';
import { logEvent, scrubSensitiveText } from '../utils/logger.js';
import { getConfigValue } from '../config/json-config.js';
import { ConfigurationError, InputValidationError, NotFoundError } from '../types/errors.js';

const rawBodies = new WeakMap<IncomingMessage, string>();

function stableStringify(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        const serialized = JSON.stringify(value);
        return serialized ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map((item) => stableStringify(item)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([key, item]) => `${JSON.stringify(key)}:${stableStringify(item)}`);
    return `{${entries.join(',')}}`;
}

function getSignaturePayloadCandidates(req: Request): string[] {
    const payloads = new Set<string>();
    const rawBody = rawBodies.get(req);
    if (rawBody === undefined) {
        // Nothing was parsed from the wire: sign the empty string.
        payloads.add('');
    } else {
        payloads.add(rawBody);
    }

    if (req.body === undefined) {
        return [...payloads];
    }

    const stringified: unknown = JSON.stringify(req.body);
    if (typeof stringified === 'string') {
        payloads.add(stringified);
    }
    payloads.add(stableStringify(req.body));

    return [...payloads];
}

/** `verify` hook for `express.json` that keeps the exact bytes for signature checks. */
export function setRawRequestBody(req: IncomingMessage, _res: unknown, buffer: Buffer): void {
    rawBodies.set(req, buffer.toString('utf8'));
}

// ── Response Helpers ────────────────────────────────────────────────────────

export function correlationIdFor(res: Response): string | undefined {
    const value: unknown = res.locals.correlationId;
    return typeof value === 'string' ? value : undefined;
}

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, data: T, status = 200): void {
    const correlationId = correlationIdFor(res);
    const body: ApiEnvelope<T> = {
        ok: true,
        data,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400): void {
    const correlationId = correlationIdFor(res);
    const redactedMessage = scrubSensitiveText(message);
    const body: ApiEnvelope = {
        ok: false,
        error: redactedMessage,
        correlationId,
        timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
}

// ── Auth Middleware ──────────────────────────────────────────────────────────

/**
 * Validate the `X-Signature` header on incoming signed API requests.
 *
 * Expected format: `sha256=<hex digest of HMAC-SHA256(body, API_SECRET)>`
 *
 * If API_SECRET is not configured, all signed API requests are rejected.
 */
export function requireSignature(req: Request, res: Response, next: NextFunction): void {
    const apiSecret = getConfigValue('API_SECRET') ?? '';

    if (!apiSecret) {
        logEvent('api_signature_rejected', { path: req.path, reason: 'API_SECRET not configured' }, 'warn');
        sendError(res, 'Signed API endpoints are unavailable (missing API_SECRET).', 503);
        return;
    }

    const signatureHeader = req.headers['x-signature'];
    if (typeof signatureHeader !== 'string' || !signatureHeader.startsWith('sha256=')) {
        logEvent('api_signature_rejected', { path: req.path, reason: 'missing or malformed header' }, 'warn');
        sendError(res, 'Missing or malformed X-Signature header.', 401);
        return;
    }

    const providedHex = signatureHeader.slice('sha256='.length);
    if (!/^[a-f0-9]{64}$/i.test(providedHex)) {
        logEvent('api_signature_rejected', { path: req.path, reason: 'malformed digest' }, 'warn');
        sendError(res, 'Malformed signature digest.', 401);
        return;
    }
    const provided = Buffer.from(providedHex, 'hex');
    const payloadCandidates = getSignaturePayloadCandidates(req);
    const signatureMatches = payloadCandidates.some((payload) => {
        const expectedHex = createHmac('sha256', apiSecret).update(payload).digest('hex');
        const expected = Buffer.from(expectedHex, 'hex');
        return provided.length === expected.length && timingSafeEqual(provided, expected);
    });

    if (!signatureMatches) {
        logEvent('api_signature_rejected', { path: req.path, reason: 'signature mismatch' }, 'warn');
        sendError(res, 'Invalid signature.', 403);
        return;
    }

    next();
}

// ── Error Mapping ───────────────────────────────────────────────────────────

/** Map a caught error to a status code and message. */
export function mapError(err: unknown): { status: number; message: string } {
    if (err instanceof NotFoundError) {
        return { status: 404, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof InputValidationError) {
        const hints = err.hints.length > 0 ? ` ${err.hints.join(' ')}` : '';
        return { status: 400, message: scrubSensitiveText(`${err.message}${hints}`) };
    }
    if (err instanceof ConfigurationError) {
        return { status: 400, message: scrubSensitiveText(err.message) };
    }
    if (err instanceof Error) {
        return { status: 500, message: scrubSensitiveText(err.message) };
    }
    return { status: 500, message: scrubSensitiveText(String(err)) };
}

/** Log and answer with the mapped status. */
export function sendMappedError(res: Response, err: unknown): void {
    const { status, message } = mapError(err);
    if (status >= 500) {
        logEvent('api_request_failed', { correlationId: correlationIdFor(res) ?? null, error: message }, 'error');
    }
    sendError(res, message, status);
}

// ── Logging Middleware ───────────────────────────────────────────────────────

/** Log every incoming request and inject a correlation ID. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const correlationId = randomUUID();
    res.locals.correlationId = correlationId;
    logEvent('api_request', { correlationId, method: req.method, path: req.path }, 'debug');
    next();
}

// ── Body Readers ────────────────────────────────────────────────────────────

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/** The parsed JSON body as a plain record; anything else is an {@link InputValidationError}. */
export function readObjectBody(req: Request): Record<string, unknown> {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        throw new InputValidationError('Request body must be a JSON object.');
    }
    const record: Record<string, unknown> = Object.fromEntries(Object.entries(body));
    return record;
}

export function requireStringField(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    if (typeof value !== 'string') {
        throw new InputValidationError(`'${field}' must be a string.`);
    }
    return value;
}

export function optionalStringField(body: Record<string, unknown>, field: string): string | undefined {
    const value = body[field];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new InputValidationError(`'${field}' must be a string.`);
    }
    return value;
}

export function optionalStringListField(body: Record<string, unknown>, field: string): string[] | undefined {
    const value = body[field];
    if (value === undefined) return undefined;
    if (!isStringArray(value)) {
        throw new InputValidationError(`'${field}' must be an array of strings.`);
    }
    return value;
}
