/**
 * Logger Interface
 *
 * Simple logging interface that protocol services use.
 * Implementations can use any logging system; ConsoleLogger is the default.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface ILogger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
    child?(additionalContext: string): ILogger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Console Logger - Default implementation
 */
export class ConsoleLogger implements ILogger {
    constructor(
        private context: string = 'Protocol',
        private minLevel: LogLevel = 'info'
    ) { }

    debug(message: string, meta?: LogMeta): void {
        if (this.enabled('debug')) {
            console.debug(`[DEBUG] [${this.context}] ${message}`, meta || '');
        }
    }

    info(message: string, meta?: LogMeta): void {
        if (this.enabled('info')) {
            console.log(`[INFO] [${this.context}] ${message}`, meta || '');
        }
    }

    warn(message: string, meta?: LogMeta): void {
        if (this.enabled('warn')) {
            console.warn(`[WARN] [${this.context}] ${message}`, meta || '');
        }
    }

    error(message: string, meta?: LogMeta): void {
        if (this.enabled('error')) {
            console.error(`[ERROR] [${this.context}] ${message}`, meta || '');
        }
    }

    child(additionalContext: string): ILogger {
        return new ConsoleLogger(`${this.context}:${additionalContext}`, this.minLevel);
    }

    private enabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
    }
}

/**
 * Derive a scoped logger, falling back to the parent when it cannot nest
 */
export function childLogger(logger: ILogger, context: string): ILogger {
    return logger.child ? logger.child(context) : logger;
}
