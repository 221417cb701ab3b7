/**
 * @fileoverview Bot Configuration Loader
 *
 * Loads the console bot settings from a YAML file and applies environment
 * overrides on top:
 * - OPENAI_API_KEY enables the assistant plugin
 * - SWITCHYARD_LOG_LEVEL replaces `logLevel`
 * - SWITCHYARD_HISTORY_DB replaces `history.dbPath`
 *
 * Keys left out of the file keep their defaults. Relative paths are kept
 * as written; the entry point resolves them against the app directory.
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isLogLevel, LOG_LEVELS, type LogLevel, type TierMode } from "@switchyard/engine";

/**
 * Dispatch settings.
 */
export interface DispatchConfig {
    readonly tierMode: TierMode;

    /** Default handler timeout; 0 disables it */
    readonly nodeTimeoutMs: number;

    /** How long stop() waits for in-flight work */
    readonly stopGraceMs: number;
}

/**
 * Restart policy for adapters.
 */
export interface AdapterRetryConfig {
    readonly maxRetries: number;
    readonly initialBackoffMs: number;
    readonly maxBackoffMs: number;
    readonly backoffFactor: number;
}

/**
 * Identity of the person typing into the console.
 */
export interface ConsoleConfig {
    readonly userId: string;
    readonly sessionId: string;
}

export interface HeartbeatConfig {
    readonly enabled: boolean;
    readonly intervalMs: number;
}

/**
 * Message history storage.
 */
export interface HistoryConfig {
    /** SQLite file, or ":memory:" */
    readonly dbPath: string;

    /** Entries shown by /history when no count is given */
    readonly limit: number;
}

/**
 * Chat completion settings for the assistant plugin.
 */
export interface AssistantConfig {
    /** Without a key the assistant plugin is not loaded */
    readonly apiKey?: string;
    readonly model: string;
    readonly temperature: number;
    readonly maxTokens: number;

    /** History entries sent along with each question */
    readonly contextMessages: number;
    readonly systemPrompt: string;
}

export interface PluginDirectoryConfig {
    readonly dir: string;

    /** Reload plugins when files in `dir` change */
    readonly watch: boolean;
}

/**
 * Complete bot configuration.
 */
export interface BotConfig {
    /** Name users mention to address the bot, e.g. "@switchyard" */
    readonly botName: string;
    readonly superusers: readonly string[];
    readonly logLevel: LogLevel;
    readonly dispatch: DispatchConfig;
    readonly adapters: AdapterRetryConfig;
    readonly console: ConsoleConfig;
    readonly heartbeat: HeartbeatConfig;
    readonly history: HistoryConfig;
    readonly assistant: AssistantConfig;
    readonly plugins: PluginDirectoryConfig;
}

/**
 * Environment variables read by {@link loadConfig}.
 */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;

const TIER_MODES: readonly TierMode[] = ["concurrent", "sequential"];

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): BotConfig {
    return {
        botName   : "switchyard",
        superusers: [],
        logLevel  : "info",
        dispatch  : {
            tierMode     : "concurrent",
            nodeTimeoutMs: 30000,
            stopGraceMs  : 5000,
        },
        adapters: {
            maxRetries      : 3,
            initialBackoffMs: 500,
            maxBackoffMs    : 10000,
            backoffFactor   : 2,
        },
        console: {
            userId   : "console",
            sessionId: "console",
        },
        heartbeat: {
            enabled   : true,
            intervalMs: 60000,
        },
        history: {
            dbPath: "data/history.db",
            limit : 10,
        },
        assistant: {
            model          : "gpt-4o-mini",
            temperature    : 0.7,
            maxTokens      : 512,
            contextMessages: 10,
            systemPrompt   : "You are a helpful assistant chatting in a terminal. Keep answers short.",
        },
        plugins: {
            dir  : "user/plugins",
            watch: true,
        },
    };
}

// ============================================================================
// Field readers
// ============================================================================

/**
 * Reads typed fields out of one mapping, collecting problems instead of
 * throwing so that every issue in a file is reported at once.
 */
class SectionReader {
    constructor(
        private readonly source: object,
        private readonly path: string,
        private readonly issues: string[]
    ) {}

    private raw(key: string): unknown {
        return Reflect.get(this.source, key);
    }

    private fail(key: string, expected: string): void {
        this.issues.push(`${this.path}${key} must be ${expected}`);
    }

    section(key: string): SectionReader {
        const value = this.raw(key);
        if (value === undefined || value === null) {
            return new SectionReader({}, `${this.path}${key}.`, this.issues);
        }
        if (typeof value !== "object" || Array.isArray(value)) {
            this.fail(key, "a mapping");
            return new SectionReader({}, `${this.path}${key}.`, this.issues);
        }
        return new SectionReader(value, `${this.path}${key}.`, this.issues);
    }

    string(key: string, fallback: string): string {
        const value = this.raw(key);
        if (value === undefined) return fallback;
        if (typeof value === "string" && value.trim() !== "") return value.trim();
        this.fail(key, "a non-empty string");
        return fallback;
    }

    number(key: string, fallback: number, options: { integer?: boolean; min?: number } = {}): number {
        const value = this.raw(key);
        if (value === undefined) return fallback;

        const min = options.min ?? 0;
        const valid = typeof value === "number" &&
            Number.isFinite(value) &&
            value >= min &&
            (!options.integer || Number.isInteger(value));

        if (typeof value === "number" && valid) return value;

        this.fail(key, `${options.integer ? "an integer" : "a number"} >= ${min}`);
        return fallback;
    }

    boolean(key: string, fallback: boolean): boolean {
        const value = this.raw(key);
        if (value === undefined) return fallback;
        if (typeof value === "boolean") return value;
        this.fail(key, "true or false");
        return fallback;
    }

    stringList(key: string, fallback: readonly string[]): readonly string[] {
        const value = this.raw(key);
        if (value === undefined || value === null) return fallback;
        if (Array.isArray(value) && value.every((item) => typeof item === "string")) {
            return value.map((item: string) => item.trim()).filter((item) => item !== "");
        }
        this.fail(key, "a list of strings");
        return fallback;
    }

    oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
        const value = this.raw(key);
        if (value === undefined) return fallback;
        const found = allowed.find((candidate) => candidate === value);
        if (found !== undefined) return found;
        this.fail(key, `one of ${allowed.join(", ")}`);
        return fallback;
    }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build a configuration from a parsed YAML mapping.
 *
 * @param issues - Receives one entry per invalid field
 */
export function parseConfig(source: object, issues: string[]): BotConfig {
    const defaults = getDefaultConfig();
    const root = new SectionReader(source, "", issues);

    const dispatch = root.section("dispatch");
    const adapters = root.section("adapters");
    const consoleSection = root.section("console");
    const heartbeat = root.section("heartbeat");
    const history = root.section("history");
    const assistant = root.section("assistant");
    const plugins = root.section("plugins");

    return {
        botName   : root.string("botName", defaults.botName),
        superusers: root.stringList("superusers", defaults.superusers),
        logLevel  : root.oneOf("logLevel", LOG_LEVELS, defaults.logLevel),
        dispatch  : {
            tierMode     : dispatch.oneOf("tierMode", TIER_MODES, defaults.dispatch.tierMode),
            nodeTimeoutMs: dispatch.number("nodeTimeoutMs", defaults.dispatch.nodeTimeoutMs, { integer: true }),
            stopGraceMs  : dispatch.number("stopGraceMs", defaults.dispatch.stopGraceMs, { integer: true }),
        },
        adapters: {
            maxRetries      : adapters.number("maxRetries", defaults.adapters.maxRetries, { integer: true }),
            initialBackoffMs: adapters.number("initialBackoffMs", defaults.adapters.initialBackoffMs, { integer: true }),
            maxBackoffMs    : adapters.number("maxBackoffMs", defaults.adapters.maxBackoffMs, { integer: true }),
            backoffFactor   : adapters.number("backoffFactor", defaults.adapters.backoffFactor, { min: 1 }),
        },
        console: {
            userId   : consoleSection.string("userId", defaults.console.userId),
            sessionId: consoleSection.string("sessionId", defaults.console.sessionId),
        },
        heartbeat: {
            enabled   : heartbeat.boolean("enabled", defaults.heartbeat.enabled),
            intervalMs: heartbeat.number("intervalMs", defaults.heartbeat.intervalMs, { integer: true, min: 1 }),
        },
        history: {
            dbPath: history.string("dbPath", defaults.history.dbPath),
            limit : history.number("limit", defaults.history.limit, { integer: true, min: 1 }),
        },
        assistant: {
            model          : assistant.string("model", defaults.assistant.model),
            temperature    : assistant.number("temperature", defaults.assistant.temperature),
            maxTokens      : assistant.number("maxTokens", defaults.assistant.maxTokens, { integer: true, min: 1 }),
            contextMessages: assistant.number("contextMessages", defaults.assistant.contextMessages, { integer: true }),
            systemPrompt   : assistant.string("systemPrompt", defaults.assistant.systemPrompt),
        },
        plugins: {
            dir  : plugins.string("dir", defaults.plugins.dir),
            watch: plugins.boolean("watch", defaults.plugins.watch),
        },
    };
}

/**
 * Apply environment overrides. Empty variables are ignored.
 *
 * @param issues - Receives one entry per invalid variable
 */
export function applyEnvOverrides(config: BotConfig, env: ConfigEnv, issues: string[]): BotConfig {
    const apiKey = env.OPENAI_API_KEY?.trim() || undefined;
    const historyDb = env.SWITCHYARD_HISTORY_DB?.trim() || undefined;
    const level = env.SWITCHYARD_LOG_LEVEL?.trim().toLowerCase() || undefined;

    let logLevel = config.logLevel;
    if (level !== undefined) {
        if (isLogLevel(level)) {
            logLevel = level;
        }
        else {
            issues.push(`SWITCHYARD_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
        }
    }

    return {
        ...config,
        logLevel,
        history  : historyDb ? { ...config.history, dbPath: historyDb } : config.history,
        assistant: apiKey ? { ...config.assistant, apiKey } : config.assistant,
    };
}

/**
 * Load the bot configuration.
 *
 * A missing file yields the defaults (plus environment overrides).
 *
 * @param filePath - Path to bot.yml
 * @param env - Environment to read overrides from (default: process.env)
 * @throws Error listing every invalid field
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/bot.yml");
 * console.log(config.dispatch.tierMode);
 * // "concurrent"
 * ```
 */
export function loadConfig(filePath: string, env: ConfigEnv = process.env): BotConfig {
    const issues: string[] = [];
    let config = getDefaultConfig();

    if (existsSync(filePath)) {
        const parsed: unknown = parseYaml(readFileSync(filePath, "utf-8"));

        if (parsed !== null && parsed !== undefined) {
            if (typeof parsed !== "object" || Array.isArray(parsed)) {
                throw new Error(`Invalid configuration in ${filePath}: expected a mapping`);
            }
            config = parseConfig(parsed, issues);
        }
    }

    config = applyEnvOverrides(config, env, issues);

    if (issues.length > 0) {
        throw new Error(`Invalid configuration in ${filePath}: ${issues.join("; ")}`);
    }

    return config;
}

/**
 * Load the bot configuration, falling back to the defaults (plus whatever
 * environment overrides are valid) when the file cannot be used.
 */
export function loadConfigWithFallback(filePath: string, env: ConfigEnv = process.env): BotConfig {
    try {
        return loadConfig(filePath, env);
    }
    catch (error) {
        console.warn(`Failed to load configuration from ${filePath}:`, error);
        const ignored: string[] = [];
        return applyEnvOverrides(getDefaultConfig(), env, ignored);
    }
}
