/**
 * Logger
 *
 * Leveled logger shared by every server module.
 *
 * Messages follow the `[Component] Event: key=value` convention. Optional
 * metadata is appended as JSON (text format) or merged into the record
 * (json format, one object per line). A `headers` entry in metadata is
 * always passed through header redaction before it is written.
 *
 * Environment:
 * - LOG_LEVEL: error | warn | info | verbose | debug (default: info)
 * - LOG_FORMAT: text | json (default: text)
 */

import { redactHeaders } from './redact';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export type LogMeta = Record<string, unknown>;

type LogFormat = 'text' | 'json';

const LEVEL_ORDER: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    verbose: 3,
    debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

/**
 * Parse a level name. Accepts upper-case and the `warning` alias.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    if (!value) return fallback;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'warning') return 'warn';
    return isLogLevel(normalized) ? normalized : fallback;
}

function sanitizeMeta(meta: LogMeta): LogMeta {
    const headers = meta.headers;
    if (headers && typeof headers === 'object' && !Array.isArray(headers)) {
        const stringHeaders: Record<string, string> = {};
        for (const [key, value] of Object.entries(headers)) {
            stringHeaders[key] = String(value);
        }
        return { ...meta, headers: redactHeaders(stringHeaders) };
    }
    return meta;
}

// ============================================================================
// Logger
// ============================================================================

class Logger {
    constructor(
        private level: LogLevel,
        private readonly format: LogFormat
    ) { }

    setLevel(level: string): void {
        this.level = parseLogLevel(level, this.level);
    }

    getLevel(): LogLevel {
        return this.level;
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
    }

    error(message: string, meta?: LogMeta): void {
        this.write('error', message, meta);
    }

    warn(message: string, meta?: LogMeta): void {
        this.write('warn', message, meta);
    }

    info(message: string, meta?: LogMeta): void {
        this.write('info', message, meta);
    }

    verbose(message: string, meta?: LogMeta): void {
        this.write('verbose', message, meta);
    }

    debug(message: string, meta?: LogMeta): void {
        this.write('debug', message, meta);
    }

    /**
     * Startup banner. Written regardless of level so the effective
     * configuration is always visible in the first lines of output.
     */
    startup(name: string, details: Record<string, string | number | boolean>): void {
        const lines = [
            `${name}`,
            ...Object.entries(details).map(([key, value]) => `  ${key}: ${value}`),
        ];
        if (this.format === 'json') {
            this.emit('info', { level: 'info', message: `[Startup] ${name}`, time: new Date().toISOString(), ...details });
            return;
        }
        for (const line of lines) {
            process.stdout.write(`${line}\n`);
        }
    }

    private write(level: LogLevel, message: string, meta?: LogMeta): void {
        if (!this.isEnabled(level)) return;

        const time = new Date().toISOString();
        const safeMeta = meta ? sanitizeMeta(meta) : undefined;

        if (this.format === 'json') {
            this.emit(level, { level, message, time, ...safeMeta });
            return;
        }

        const suffix = safeMeta && Object.keys(safeMeta).length > 0 ? ` ${JSON.stringify(safeMeta)}` : '';
        const line = `${time} ${level.toUpperCase().padEnd(7)} ${message}${suffix}`;
        if (level === 'error' || level === 'warn') {
            process.stderr.write(`${line}\n`);
        } else {
            process.stdout.write(`${line}\n`);
        }
    }

    private emit(level: LogLevel, record: Record<string, unknown>): void {
        const line = `${JSON.stringify(record)}\n`;
        if (level === 'error' || level === 'warn') {
            process.stderr.write(line);
        } else {
            process.stdout.write(line);
        }
    }
}

const logger = new Logger(
    parseLogLevel(process.env.LOG_LEVEL),
    process.env.LOG_FORMAT === 'json' ? 'json' : 'text'
);

export default logger;
