import * as winston from 'winston';
import type { Logform } from 'winston';
import util from 'util';

export const OVERSIZE_THRESHOLD = 100_000; // bytes
export const CONSOLE_TRUNCATE_LENGTH = 1_000; // characters
export const OVERSIZE_MESSAGE = 'an oversized/invalid log message was received.';

const LOG_FILE = process.env.LOG_FILE;
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

winston.addColors({
    info: 'cyan',
    debug: 'gray',
    error: 'red',
    warn: 'yellow'
});

/**
 * Type-aware serialization of the `data` attached to a log line.
 * Objects that cannot be JSON encoded (cycles, bigints) go through util.inspect.
 */
export function serializeLogData(data: unknown): string {
    if (typeof data === 'string') return data;
    if (data === null) return 'null';
    if (data === undefined) return '';
    if (typeof data === 'number' || typeof data === 'boolean' || typeof data === 'bigint') return String(data);
    if (typeof data === 'symbol') return data.toString();
    if (typeof data === 'function') return `<function:${data.name || 'anonymous'}>`;
    if (Buffer.isBuffer(data)) return `<Buffer base64:${data.toString('base64')}>`;

    try {
        return JSON.stringify(data);
    } catch {
        return util.inspect(data, { depth: 2, breakLength: Infinity });
    }
}

function hasData(info: Logform.TransformableInfo): boolean {
    return Object.prototype.hasOwnProperty.call(info, 'data') && info.data !== undefined;
}

// Replaces payloads above OVERSIZE_THRESHOLD with an error line carrying the byte count
export const overflowGuard = winston.format((info) => {
    if (!hasData(info)) {
        return info;
    }

    const serialized = serializeLogData(info.data);
    info.__serializedData = serialized;

    const bytes = Buffer.byteLength(serialized, 'utf8');
    if (bytes > OVERSIZE_THRESHOLD) {
        info.zone = 'logger';
        info.message = OVERSIZE_MESSAGE;
        info.data = { stack: new Error('Oversized log message').stack, bytes };
        info.__serializedData = undefined;
        info.level = 'error';
    }

    return info;
});

export function formatDataForConsole(data: unknown): string {
    if (data === undefined) return '';

    const s = typeof data === 'string' ? data : serializeLogData(data);
    if (s.length > CONSOLE_TRUNCATE_LENGTH) {
        const bytes = Buffer.byteLength(s, 'utf8');
        return s.slice(0, CONSOLE_TRUNCATE_LENGTH) + ` ... <truncated ${bytes} bytes>`;
    }
    return s;
}

function zoneOf(info: Logform.TransformableInfo): string {
    return typeof info.zone === 'string' ? info.zone : 'core';
}

function dataOf(info: Logform.TransformableInfo): string {
    if (typeof info.__serializedData === 'string') return info.__serializedData;
    return hasData(info) ? serializeLogData(info.data) : '';
}

export const consoleFormat = winston.format.combine(
    overflowGuard(),
    winston.format.colorize({ all: false }),
    winston.format.printf((info) => {
        const data = dataOf(info);
        const dataPart = data ? ' ' + formatDataForConsole(data) : '';
        return `[${info.level}][${zoneOf(info)}] ${String(info.message)}${dataPart}`;
    })
);

export const fileFormat = winston.format.combine(
    overflowGuard(),
    winston.format.timestamp(),
    winston.format.printf((info) => {
        const ts = typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString();
        const data = dataOf(info);
        // TIMESTAMP ZONE LEVEL: MESSAGE DATA
        return `${ts} ${zoneOf(info)} ${info.level.toUpperCase()}: ${String(info.message)}${data ? ' ' + data : ''}`;
    })
);

const isTestEnv = process.env.NODE_ENV === 'test';

export const baseLogger = winston.createLogger({
    level: LOG_LEVEL,
    transports: [
        // stdout carries the synthesized configurations, so every level goes to stderr
        new winston.transports.Console({
            format: consoleFormat,
            silent: isTestEnv,
            stderrLevels: ['error', 'warn', 'info', 'debug']
        })
    ]
});

if (LOG_FILE) {
    baseLogger.add(new winston.transports.File({ filename: LOG_FILE, format: fileFormat }));
}
