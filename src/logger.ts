/**
 * Logger for the texpub server.
 *
 * Writes to stderr: stdout carries the MCP stdio transport.
 */

export enum LogLevel {
    DEBUG = 'debug',
    INFO = 'info',
    WARN = 'warn',
    ERROR = 'error',
}

export interface LoggerOptions {
    level?: LogLevel;
    timestamp?: boolean;
    prefix?: string;
}

/**
 * Structured context appended to a log line.
 */
export interface LoggerContext {
    operation?: string | undefined;
    state?: string | undefined;
    filePath?: string | undefined;
    duration?: number | undefined;
    [key: string]: unknown;
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export class Logger {
    private options: Required<LoggerOptions>;

    constructor(options: LoggerOptions = {}) {
        this.options = {
            level: options.level ?? LogLevel.INFO,
            timestamp: options.timestamp ?? true,
            prefix: options.prefix ?? 'texpub',
        };
    }

    get level(): LogLevel {
        return this.options.level;
    }

    setLevel(level: LogLevel): void {
        this.options.level = level;
    }

    /**
     * Returns a logger sharing this one's settings with a longer prefix.
     */
    child(prefix: string): Logger {
        return new Logger({ ...this.options, prefix: `${this.options.prefix}:${prefix}` });
    }

    debug(message: string, context?: LoggerContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    info(message: string, context?: LoggerContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    warn(message: string, context?: LoggerContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    error(message: string, context?: LoggerContext): void {
        this.log(LogLevel.ERROR, message, context);
    }

    /**
     * Runs `fn`, logging its duration and outcome.
     */
    async withTiming<T>(operation: string, fn: () => Promise<T>, context?: LoggerContext): Promise<T> {
        const start = Date.now();
        this.debug(`Starting operation: ${operation}`, { operation, ...context });
        try {
            const result = await fn();
            this.info(`Completed operation: ${operation}`, { operation, duration: Date.now() - start, ...context });
            return result;
        } catch (error) {
            this.warn(`Failed operation: ${operation}`, {
                operation,
                duration: Date.now() - start,
                error: error instanceof Error ? error.message : String(error),
                ...context,
            });
            throw error;
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.options.level);
    }

    private log(level: LogLevel, message: string, context?: LoggerContext): void {
        if (!this.shouldLog(level)) return;

        const time = this.options.timestamp ? ` @ ${new Date().toISOString()}` : '';
        const line = `${this.options.prefix} [${level.toUpperCase()}]${time} ${message}`;

        if (context !== undefined && Object.keys(context).length > 0) {
            console.error(line, JSON.stringify(context));
        } else {
            console.error(line);
        }
    }
}

/**
 * Parses a level name such as the value of TEXPUB_LOG_LEVEL.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) return undefined;
    const normalized = value.trim().toLowerCase();
    return LEVEL_ORDER.find(level => level === normalized);
}

/**
 * Default logger instance
 */
export const logger = new Logger({
    level: parseLogLevel(process.env.TEXPUB_LOG_LEVEL) ?? LogLevel.INFO,
    prefix: 'texpub',
});
