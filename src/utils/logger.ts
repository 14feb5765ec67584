import pino from 'pino';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

export function isLogLevel(value: string | undefined): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
    logFile?: string;
}): pino.Logger {
    const { level = 'info', jsonLogs = false, logFile } = options;

    if (level === 'silent') {
        loggerInstance = pino({ level });
        return loggerInstance;
    }

    const targets: pino.TransportTargetOptions[] = [];

    if (jsonLogs) {
        targets.push({ target: 'pino/file', level, options: { destination: 1 } });
    } else {
        targets.push({
            target: 'pino-pretty',
            level,
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
            },
        });
    }

    if (logFile) {
        targets.push({ target: 'pino/file', level, options: { destination: logFile, mkdir: true } });
    }

    loggerInstance = pino({ level }, pino.transport({ targets }));
    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at `LOG_LEVEL` (or info).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        const envLevel = process.env['LOG_LEVEL'];
        loggerInstance = initLogger({ level: isLogLevel(envLevel) ? envLevel : 'info' });
    }
    return loggerInstance;
}
