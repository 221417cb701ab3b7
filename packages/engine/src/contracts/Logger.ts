/**
 * @fileoverview Logger Contract
 *
 * The engine never writes to the console directly; it logs through an
 * injected `EngineLogger`. A console-backed default is provided.
 *
 * @module @switchyard/engine/contracts/Logger
 */

/**
 * Log severity, lowest first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Severity order used for level filtering.
 */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Logger interface for the engine, its components and plugins.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Options for {@link createConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
    /** Minimum level written (default: "debug") */
    readonly level?: LogLevel;

    /** Tag written before every message, e.g. "Bot" → "[INFO] [Bot] started" */
    readonly prefix?: string;
}

/**
 * Type guard for log level strings coming from configuration.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a console logger.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: "info", prefix: "Bot" });
 * logger.info("Adapter started", { adapterId: "console" });
 * // [INFO] [Bot] Adapter started { adapterId: 'console' }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): EngineLogger {
    const threshold = LOG_LEVELS.indexOf(options.level ?? "debug");
    const tag = options.prefix ? ` [${options.prefix}]` : "";
    const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

    return {
        debug: (msg, data) => {
            if (enabled("debug")) console.debug(`[DEBUG]${tag} ${msg}`, data ?? "");
        },
        info: (msg, data) => {
            if (enabled("info")) console.info(`[INFO]${tag} ${msg}`, data ?? "");
        },
        warn: (msg, data) => {
            if (enabled("warn")) console.warn(`[WARN]${tag} ${msg}`, data ?? "");
        },
        error: (msg, data) => {
            if (enabled("error")) console.error(`[ERROR]${tag} ${msg}`, data ?? "");
        },
    };
}

/**
 * Wrap a logger so every message carries a `[scope]` prefix and, when
 * given, extra fields such as a trace id.
 *
 * Used to hand plugins a logger tagged with their plugin and node id.
 */
export function createScopedLogger(
    base: EngineLogger,
    scope: string,
    context?: Record<string, unknown>
): EngineLogger {
    const merge = (data?: Record<string, unknown>): Record<string, unknown> | undefined =>
        context ? { ...data, ...context } : data;

    return {
        debug: (msg, data) => base.debug(`[${scope}] ${msg}`, merge(data)),
        info : (msg, data) => base.info(`[${scope}] ${msg}`, merge(data)),
        warn : (msg, data) => base.warn(`[${scope}] ${msg}`, merge(data)),
        error: (msg, data) => base.error(`[${scope}] ${msg}`, merge(data)),
    };
}

/**
 * Default console logger used when none is injected.
 */
export const defaultLogger: EngineLogger = createConsoleLogger();
