import * as functionsLogger from 'firebase-functions/logger';
import type { LogEntry, LogSeverity } from 'firebase-functions/logger';
import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

/**
 * Leveled logger handed to every component. Output goes through the
 * firebase-functions structured logger so each line is one JSON entry.
 */
export interface Logger {
    debug(message: string, fields?: LogFields): void;
    info(message: string, fields?: LogFields): void;
    warn(message: string, fields?: LogFields): void;
    error(message: string, fields?: LogFields): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    auditFile?: string; // every emitted entry is also appended here as a JSON line
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SEVERITY: Record<LogLevel, LogSeverity> = {
    debug: 'DEBUG',
    info: 'INFO',
    warn: 'WARNING',
    error: 'ERROR',
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_RANK;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const threshold = LEVEL_RANK[options.level ?? 'info'];
    const auditFile = options.auditFile;

    if (auditFile) {
        mkdirSync(path.dirname(auditFile), { recursive: true });
    }

    const emit = (level: LogLevel, message: string, fields?: LogFields) => {
        if (LEVEL_RANK[level] < threshold) return;

        const entry: LogEntry = { ...fields, severity: SEVERITY[level], message };
        functionsLogger.write(entry);

        if (auditFile) {
            // synchronous append keeps entries in emit order
            appendFileSync(auditFile, JSON.stringify({ time: new Date().toISOString(), ...entry }) + '\n', 'utf8');
        }
    };

    return {
        debug: (message, fields) => emit('debug', message, fields),
        info: (message, fields) => emit('info', message, fields),
        warn: (message, fields) => emit('warn', message, fields),
        error: (message, fields) => emit('error', message, fields),
    };
}

export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
