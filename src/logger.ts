export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    child(tag: string): Logger;
}

let globalLevel: LogLevel = 'warn';

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function setLogLevel(level: LogLevel): void {
    globalLevel = level;
}

/**
 * Tagged console logger: `[Mapping] Resolved 12 headers`
 */
export function createLogger(tag: string): Logger {
    const enabled = (level: LogLevel) => LEVEL_RANK[level] <= LEVEL_RANK[globalLevel];
    const format = (message: string) => `[${tag}] ${message}`;

    return {
        debug: (message) => {
            if (enabled('debug')) console.debug(format(message));
        },
        info: (message) => {
            if (enabled('info')) console.log(format(message));
        },
        warn: (message) => {
            if (enabled('warn')) console.warn(format(message));
        },
        error: (message) => {
            if (enabled('error')) console.error(format(message));
        },
        child: (childTag) => createLogger(`${tag}:${childTag}`),
    };
}
