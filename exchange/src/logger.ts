/**
 * Bondline: Logger
 *
 * Scoped console logging. Every line carries the component prefix
 * ("[Engine]", "[Burner]", ...) so interleaved output stays readable.
 * Data is printed as JSON with bigints rendered as strings.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export interface Logger {
    debug(msg: string, data?: unknown): void;
    info(msg: string, data?: unknown): void;
    warn(msg: string, data?: unknown): void;
    error(msg: string, data?: unknown): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(LOG_LEVELS, value);
}

/** Level from BONDLINE_LOG_LEVEL, falling back to "info" */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const raw = env.BONDLINE_LOG_LEVEL?.toLowerCase();
    return raw && isLogLevel(raw) ? raw : 'info';
}

function formatData(data: unknown): string {
    if (typeof data !== 'object' || data === null) return String(data);
    return JSON.stringify(data, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value,
    );
}

/**
 * Create a logger scoped to one component.
 *
 * @example
 * const log = createLogger('Engine');
 * log.info('Buy settled', { output: 1_000n });
 * // [Engine] Buy settled {"output":"1000"}
 */
export function createLogger(scope: string, level: LogLevel = resolveLogLevel()): Logger {
    const minLevel = LOG_LEVELS[level];

    function log(levelName: Exclude<LogLevel, 'silent'>, msg: string, data?: unknown): void {
        if (LOG_LEVELS[levelName] < minLevel) return;

        const line = data !== undefined
            ? `[${scope}] ${msg} ${formatData(data)}`
            : `[${scope}] ${msg}`;

        if (levelName === 'error') console.error(line);
        else if (levelName === 'warn') console.warn(line);
        else console.log(line);
    }

    return {
        debug: (msg, data) => log('debug', msg, data),
        info: (msg, data) => log('info', msg, data),
        warn: (msg, data) => log('warn', msg, data),
        error: (msg, data) => log('error', msg, data),
    };
}
