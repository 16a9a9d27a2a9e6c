/**
 * Leveled logger. Everything goes to stderr so log lines never interleave
 * with an answer being streamed to stdout.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    silent: 6,
};

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHTS, value);
}

// Default to 'error' in test environment, 'warn' otherwise
function resolveLevel(): LogLevel {
    const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
    return process.env.NODE_ENV === 'test' ? 'error' : 'warn';
}

let currentLevel: LogLevel = resolveLevel();

const getTimestamp = (): string => new Date().toISOString();

function write(level: Exclude<LogLevel, 'silent'>, args: unknown[]): void {
    if (LEVEL_WEIGHTS[currentLevel] > LEVEL_WEIGHTS[level]) return;
    console.error(`[${getTimestamp()}] [${level.toUpperCase()}]`, ...args);
}

export const logger = {
    trace: (...args: unknown[]): void => write('trace', args),
    debug: (...args: unknown[]): void => write('debug', args),
    info: (...args: unknown[]): void => write('info', args),
    warn: (...args: unknown[]): void => write('warn', args),
    error: (...args: unknown[]): void => write('error', args),
    setLevel: (level: LogLevel): void => {
        currentLevel = level;
    },
    getLevel: (): LogLevel => currentLevel,
};
