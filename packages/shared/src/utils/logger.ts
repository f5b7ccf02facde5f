/**
 * Structured Logger
 * JSON lines in production, coloured single lines everywhere else
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LogEntry {
    timestamp: string;
    level: Exclude<LogLevel, 'silent'>;
    service: string;
    message: string;
    [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LOG_LEVELS;
}

/** Anything the core can log through: a Logger or one of its children */
export interface LoggerLike {
    debug(message: string, context?: Record<string, unknown>): void;
    info(message: string, context?: Record<string, unknown>): void;
    warn(message: string, context?: Record<string, unknown>): void;
    error(message: string, context?: Record<string, unknown>): void;
    child(context: Record<string, unknown>): LoggerLike;
}

export interface LoggerOptions {
    service: string;
    level?: LogLevel;
    pretty?: boolean;
}

export class Logger implements LoggerLike {
    private service: string;
    private minLevel: number;
    private pretty: boolean;

    constructor(options: LoggerOptions) {
        this.service = options.service;
        this.minLevel = LOG_LEVELS[options.level ?? 'info'];
        this.pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
    }

    private log(level: LogEntry['level'], message: string, context?: Record<string, unknown>): void {
        if (LOG_LEVELS[level] < this.minLevel) return;

        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level,
            service: this.service,
            message,
            ...context,
        };

        const output = this.pretty
            ? this.formatPretty(entry)
            : JSON.stringify(entry);

        if (level === 'error') {
            console.error(output);
        } else if (level === 'warn') {
            console.warn(output);
        } else {
            console.log(output);
        }
    }

    private formatPretty(entry: LogEntry): string {
        const levelColors: Record<LogEntry['level'], string> = {
            debug: '\x1b[90m',
            info: '\x1b[36m',
            warn: '\x1b[33m',
            error: '\x1b[31m',
        };
        const reset = '\x1b[0m';
        const color = levelColors[entry.level];

        const time = entry.timestamp.substring(11, 23);
        const ctx = Object.entries(entry)
            .filter(([k]) => !['timestamp', 'level', 'service', 'message'].includes(k))
            .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
            .join(' ');

        return `${color}[${time}]${reset} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} [${entry.service}] ${entry.message}${ctx ? ' ' + ctx : ''}`;
    }

    debug(message: string, context?: Record<string, unknown>): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: Record<string, unknown>): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: Record<string, unknown>): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: Record<string, unknown>): void {
        this.log('error', message, context);
    }

    child(context: Record<string, unknown>): ChildLogger {
        return new ChildLogger(this, context);
    }
}

export class ChildLogger implements LoggerLike {
    constructor(
        private parent: LoggerLike,
        private context: Record<string, unknown>
    ) { }

    debug(message: string, ctx?: Record<string, unknown>): void {
        this.parent.debug(message, { ...this.context, ...ctx });
    }

    info(message: string, ctx?: Record<string, unknown>): void {
        this.parent.info(message, { ...this.context, ...ctx });
    }

    warn(message: string, ctx?: Record<string, unknown>): void {
        this.parent.warn(message, { ...this.context, ...ctx });
    }

    error(message: string, ctx?: Record<string, unknown>): void {
        this.parent.error(message, { ...this.context, ...ctx });
    }

    child(context: Record<string, unknown>): ChildLogger {
        return new ChildLogger(this, context);
    }
}

// Factory function
export function createLogger(service: string, level?: LogLevel): Logger {
    const envLevel = process.env.LOG_LEVEL;
    return new Logger({
        service,
        level: level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
        pretty: process.env.NODE_ENV !== 'production',
    });
}
