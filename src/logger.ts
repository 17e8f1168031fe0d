// ——————————————————————————————————————————————————————————————————————————————————————————
// Logger – bracketed component prefixes over the console, gated by the logLevel setting
// ——————————————————————————————————————————————————————————————————————————————————————————

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export interface Logger {
    debug(...args: unknown[]): void;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export function createLogger(tag: string): Logger {
    const prefix = `[${tag}]`;
    return {
        debug: (...args) => { if (enabled('debug')) { console.debug(prefix, ...args); } },
        info: (...args) => { if (enabled('info')) { console.log(prefix, ...args); } },
        warn: (...args) => { if (enabled('warn')) { console.warn(prefix, ...args); } },
        error: (...args) => { if (enabled('error')) { console.error(prefix, ...args); } }
    };
}

/** Error message for logging, whatever was thrown */
export function describeError(err: unknown): string {
    if (err instanceof Error) { return err.message; }
    return String(err);
}
