export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export interface Logger {
    error(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
    trace(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
    trace: 4
};

export function toLogLine(level: LogLevel, scope: string, message: string, meta?: Record<string, unknown>, timestamp = new Date()): string {
    const prefix = `[${timestamp.toISOString()}] [${level}] [${scope}] ${message}`;
    if (!meta || Object.keys(meta).length === 0) {
        return prefix;
    }

    let serialized = '';
    try {
        serialized = JSON.stringify(meta);
    } catch {
        serialized = '{"meta":"unserializable"}';
    }
    return `${prefix} ${serialized}`;
}

export class NoopLogger implements Logger {
    public error(_message: string, _meta?: Record<string, unknown>): void {}
    public warn(_message: string, _meta?: Record<string, unknown>): void {}
    public info(_message: string, _meta?: Record<string, unknown>): void {}
    public debug(_message: string, _meta?: Record<string, unknown>): void {}
    public trace(_message: string, _meta?: Record<string, unknown>): void {}
}

/**
 * Writes one line per record through console; errors and warnings go to stderr.
 */
export class ConsoleLogger implements Logger {
    private readonly minLevel: number;
    private readonly scope: string;

    constructor(scope: string, level: LogLevel = 'info') {
        this.scope = scope;
        this.minLevel = LEVEL_ORDER[level];
    }

    public child(scope: string): ConsoleLogger {
        const level = LOG_LEVELS[this.minLevel] ?? 'info';
        return new ConsoleLogger(`${this.scope}:${scope}`, level);
    }

    public error(message: string, meta?: Record<string, unknown>): void {
        this.log('error', message, meta);
    }

    public warn(message: string, meta?: Record<string, unknown>): void {
        this.log('warn', message, meta);
    }

    public info(message: string, meta?: Record<string, unknown>): void {
        this.log('info', message, meta);
    }

    public debug(message: string, meta?: Record<string, unknown>): void {
        this.log('debug', message, meta);
    }

    public trace(message: string, meta?: Record<string, unknown>): void {
        this.log('trace', message, meta);
    }

    private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
        if (LEVEL_ORDER[level] > this.minLevel) {
            return;
        }
        const line = toLogLine(level, this.scope, message, meta);
        if (level === 'error') {
            console.error(line);
        } else if (level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }
}
