import winston from 'winston';
import { secretConfigKeys } from '../config/env-schema.js';

const { combine, timestamp, printf, colorize, json } = winston.format;

const REDACTED = '[REDACTED]';
const MIN_SECRET_LENGTH = 8;

const KEY_VALUE_SECRET =
    /\b([A-Za-z0-9_-]*(?:api[_-]?key|secret|token|password)[A-Za-z0-9_-]*)(\s*[=:]\s*)("?)[^\s"',;]+\3/gi;
const BEARER_TOKEN = /\b(Bearer)\s+[A-Za-z0-9._~+/=-]{8,}/g;

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sensitiveEnvValues(): string[] {
    const values: string[] = [];
    for (const key of secretConfigKeys()) {
        const value = process.env[key];
        if (value && value.length >= MIN_SECRET_LENGTH) values.push(value);
    }
    // Longest first so a secret that contains another is replaced whole.
    return values.sort((left, right) => right.length - left.length);
}

/**
 * Redact secret-looking material before it is logged or returned to a caller:
 * raw values of the secret configuration keys, `key=value` secrets and bearer tokens.
 */
export function scrubSensitiveText(text: string): string {
    let scrubbed = text;
    for (const value of sensitiveEnvValues()) {
        scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
    }
    scrubbed = scrubbed.replace(KEY_VALUE_SECRET, (_match, key: string, separator: string, quote: string) =>
        `${key}${separator}${quote}${REDACTED}${quote}`,
    );
    return scrubbed.replace(BEARER_TOKEN, `$1 ${REDACTED}`);
}

const devFormat = combine(
    colorize(),
    timestamp({ format: 'HH:mm:ss' }),
    printf(({ level, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta) : '';
        return `${String(timestamp)} ${level}: ${String(message)} ${metaStr}`;
    }),
);

const prodFormat = combine(
    timestamp(),
    json(),
);

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
    silent: process.env.NODE_ENV === 'test',
    transports: [
        new winston.transports.Console(),
    ],
});

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined | string[] | number[]>;

/**
 * Emit a structured event (`circuit_breaker_transition`, `routing_decision`, ...).
 * String fields are scrubbed so error messages never leak credentials.
 */
export function logEvent(event: string, fields: LogFields = {}, level: LogLevel = 'info'): void {
    const safeFields: LogFields = {};
    for (const [key, value] of Object.entries(fields)) {
        safeFields[key] = typeof value === 'string' ? scrubSensitiveText(value) : value;
    }
    logger.log(level, event, { event, ...safeFields });
}
