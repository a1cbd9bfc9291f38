import { env } from '../config/env';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const MIN_LEVEL: LogLevel = env.LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 'silent' : 'info');

export interface Logger {
    debug(message: string, data?: unknown): void;
    info(message: string, data?: unknown): void;
    warn(message: string, data?: unknown): void;
    error(message: string, data?: unknown): void;
}

/**
 * Scoped console logger. Lines read `[scope] message`, with any structured
 * data appended as the console's second argument.
 *
 *   const log = createLogger('Transport');
 *   log.warn('Timed out, backing off', { attempt, delayMs });
 */
export function createLogger(scope: string): Logger {
    function write(level: Exclude<LogLevel, 'silent'>, message: string, data?: unknown) {
        if (LEVELS[level] < LEVELS[MIN_LEVEL]) return;

        const line = `[${scope}] ${message}`;
        const args: unknown[] = data === undefined ? [line] : [line, data];

        switch (level) {
            case 'error':
                console.error(...args);
                break;
            case 'warn':
                console.warn(...args);
                break;
            case 'debug':
                console.debug(...args);
                break;
            default:
                console.log(...args);
        }
    }

    return {
        debug: (message, data) => write('debug', message, data),
        info: (message, data) => write('info', message, data),
        warn: (message, data) => write('warn', message, data),
        error: (message, data) => write('error', message, data),
    };
}
