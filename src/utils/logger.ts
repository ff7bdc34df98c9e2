// src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string, err?: unknown): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Console logger with ISO timestamps
 *
 * Lines look like: [2026-01-01T00:00:00.000Z] INFO scheduler: 36 slots filled
 *
 * @param scope Short component name printed after the level
 * @param level Minimum level written; defaults to LOG_LEVEL or "info"
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
    const envLevel = process.env.LOG_LEVEL;
    const threshold = LEVEL_RANK[level ?? (isLogLevel(envLevel) ? envLevel : 'info')];

    const write = (lineLevel: Exclude<LogLevel, 'silent'>, message: string): void => {
        if (LEVEL_RANK[lineLevel] < threshold) {
            return;
        }
        const line = `[${new Date().toISOString()}] ${lineLevel.toUpperCase()} ${scope}: ${message}`;
        if (lineLevel === 'error') {
            console.error(line);
        } else if (lineLevel === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    };

    return {
        debug: message => write('debug', message),
        info: message => write('info', message),
        warn: message => write('warn', message),
        error: (message, err) => {
            const detail = err instanceof Error ? ` (${err.message})` : err !== undefined ? ` (${String(err)})` : '';
            write('error', message + detail);
        }
    };
}
