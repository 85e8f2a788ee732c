/**
 * Tagged console logging.
 *
 * Every line is prefixed with the component tag, e.g. `[jointlink:endpoint]`.
 * The threshold comes from the `level` option, then `JOINTLINK_LOG_LEVEL`,
 * then "info".
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.hasOwn(RANK, value);
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const raw = env.JOINTLINK_LOG_LEVEL?.toLowerCase();
    return isLogLevel(raw) ? raw : "info";
}

export interface LoggerOptions {
    level?: LogLevel;
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
    const threshold = RANK[options.level ?? levelFromEnv()];
    const prefix = `[${tag}]`;
    const enabled = (level: LogLevel) => RANK[level] >= threshold;

    return {
        debug(message, ...args) {
            if (enabled("debug")) console.debug(`${prefix} ${message}`, ...args);
        },
        info(message, ...args) {
            if (enabled("info")) console.info(`${prefix} ${message}`, ...args);
        },
        warn(message, ...args) {
            if (enabled("warn")) console.warn(`${prefix} ${message}`, ...args);
        },
        error(message, ...args) {
            if (enabled("error")) console.error(`${prefix} ${message}`, ...args);
        },
    };
}

/** Discards everything. */
export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};

/** Format the first few positions of a vector for a log line. */
export function formatPositions(values: readonly number[], count = 3): string {
    const shown = values.slice(0, count).map((v) => (v >= 0 ? "+" : "") + v.toFixed(3));
    return values.length > count ? `${shown.join(", ")} …` : shown.join(", ");
}
