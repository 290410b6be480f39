/**
 * Leveled console logger.
 *
 * Everything goes to stderr so the assembled context can be piped from stdout.
 * Level comes from the -v count unless CTXPICK_LOG_LEVEL names a level.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVEL_ENV = 'CTXPICK_LOG_LEVEL';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
    return LEVELS.some(level => level === value);
}

export function levelFromVerbosity(verbosity: number): LogLevel {
    const index = Math.max(0, Math.min(Math.floor(verbosity), LEVELS.length - 1));
    return LEVELS[index] ?? 'error';
}

export function resolveLogLevel(verbosity: number, env: NodeJS.ProcessEnv = process.env): LogLevel {
    const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
    if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
    return levelFromVerbosity(verbosity);
}

export class Logger {
    private level: LogLevel = 'error';

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    isEnabled(level: LogLevel): boolean {
        return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
    }

    error(message: string): void {
        if (this.isEnabled('error')) console.error(`[error] ${message}`);
    }

    warn(message: string): void {
        if (this.isEnabled('warn')) console.warn(`[warn] ${message}`);
    }

    info(message: string): void {
        if (this.isEnabled('info')) console.error(`[info] ${message}`);
    }

    debug(message: string): void {
        if (this.isEnabled('debug')) console.error(`[debug] ${message}`);
    }
}

export const logger = new Logger();

/** Configure the shared logger once at startup. Returns the level in effect. */
export function setupLogger(verbosity: number, env: NodeJS.ProcessEnv = process.env): LogLevel {
    const level = resolveLogLevel(verbosity, env);
    logger.setLevel(level);
    return level;
}
