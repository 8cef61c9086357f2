import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * Before `initLogger()` runs this is a plain JSON logger whose level comes
 * from COCITE_LOG_LEVEL (default info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: envLogLevel() ?? 'info' });
    }
    return loggerInstance;
}

/**
 * Parse a log level name, returning undefined for anything unknown.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}

function envLogLevel(): LogLevel | undefined {
    return parseLogLevel(process.env['COCITE_LOG_LEVEL']);
}
