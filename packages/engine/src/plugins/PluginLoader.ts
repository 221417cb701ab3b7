/**
 * @fileoverview Plugin Loader
 *
 * Loads plugin definitions from:
 * - YAML files (reply nodes built from the built-in message rules)
 * - Code files (modules exporting a PluginDefinition); `.ts` files load only
 *   when the process runs under a TypeScript loader such as tsx
 *
 * Every loader method can be wrapped in a {@link PluginSource} factory (see
 * {@link PluginLoader.sourceFor}), so that `registry.reload(id)` re-reads
 * the file. Code modules are re-imported with a cache-busting query.
 *
 * @module @switchyard/engine/plugins/PluginLoader
 */

import { readFileSync, readdirSync, existsSync, statSync } from "fs";
import { join, extname, basename } from "path";
import { pathToFileURL } from "url";
import { parse as parseYaml } from "yaml";
import { getUserId, getPlainText } from "../contracts/BotEvent.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import type { NodeDefinition } from "../contracts/Node.js";
import { defineNode } from "../contracts/Node.js";
import type { PluginDefinition } from "../contracts/Plugin.js";
import { isPluginDefinition } from "../contracts/Plugin.js";
import type { Predicate } from "../contracts/Predicate.js";
import { Reply } from "../dependencies/builtins.js";
import { describeError } from "../errors/EngineErrors.js";
import { rule } from "../predicates/combinators.js";
import {
    command,
    endsWith,
    fullMatch,
    keywords,
    parseCommand,
    regex,
    startsWith,
    toMe,
} from "../predicates/messageRules.js";
import { user } from "../predicates/permissions.js";

/**
 * Match criteria of a YAML reply node. All given criteria must hold.
 */
export interface YamlMatchDefinition {
    startsWith?: string | string[];
    endsWith?: string | string[];
    fullMatch?: string | string[];
    keywords?: string | string[];

    /** Regex pattern tested against the message text */
    regex?: string;

    /** Command name(s), e.g. "weather" for "/weather" */
    command?: string | string[];

    /** Compare text case-insensitively */
    ignoreCase?: boolean;

    /** Only messages addressed to the bot */
    toMe?: boolean;
}

/**
 * YAML definition of a reply node.
 *
 * `reply` may contain `{user}` (sender id) and `{args}` (text after the
 * command, or the whole text when no command is matched).
 */
export interface YamlReplyDefinition {
    /** Unique node id */
    id: string;

    /** Human-readable description */
    description?: string;

    match: YamlMatchDefinition;

    /** Reply text */
    reply: string;

    /** Restrict to these sender ids */
    users?: string[];

    priority?: number;
    block?: boolean;
}

/**
 * Top-level shape of a YAML plugin file.
 */
export interface YamlPluginFile {
    /** Plugin id (default: the file name without extension) */
    id?: string;
    name?: string;
    description?: string;
    nodes: YamlReplyDefinition[];
}

/**
 * Plugin loader configuration.
 */
export interface PluginLoaderConfig {
    /** Logger for plugin loading */
    logger?: EngineLogger;
}

const YAML_EXTENSIONS = [".yml", ".yaml"];
const CODE_EXTENSIONS = [".js", ".mjs", ".ts"];

const MATCH_KEYS: readonly (keyof YamlMatchDefinition)[] = [
    "startsWith",
    "endsWith",
    "fullMatch",
    "keywords",
    "regex",
    "command",
    "toMe",
];

function isStringOrStrings(value: unknown): value is string | string[] {
    return typeof value === "string" ||
        (Array.isArray(value) && value.every((item) => typeof item === "string"));
}

function stringField(obj: object, key: string): string | undefined {
    const value: unknown = Reflect.get(obj, key);
    return typeof value === "string" ? value : undefined;
}

/**
 * Problems with a YAML reply definition; empty when it is valid.
 */
export function validateYamlReply(obj: unknown): string[] {
    if (typeof obj !== "object" || obj === null) {
        return ["must be a mapping"];
    }

    const issues: string[] = [];

    if (!("id" in obj) || typeof obj.id !== "string" || obj.id === "") {
        issues.push("id must be a non-empty string");
    }
    if (!("reply" in obj) || typeof obj.reply !== "string") {
        issues.push("reply must be a string");
    }
    if ("priority" in obj && !Number.isInteger(obj.priority)) {
        issues.push("priority must be an integer");
    }
    if ("block" in obj && typeof obj.block !== "boolean") {
        issues.push("block must be a boolean");
    }
    if ("users" in obj && !(Array.isArray(obj.users) && obj.users.every((id) => typeof id === "string"))) {
        issues.push("users must be a list of strings");
    }

    if (!("match" in obj) || typeof obj.match !== "object" || obj.match === null) {
        issues.push("match must be a mapping");
        return issues;
    }

    const match = obj.match;
    if (!MATCH_KEYS.some((key) => key in match)) {
        issues.push(`match needs one of: ${MATCH_KEYS.join(", ")}`);
    }
    for (const key of ["startsWith", "endsWith", "fullMatch", "keywords", "command"]) {
        if (key in match && !isStringOrStrings(Reflect.get(match, key))) {
            issues.push(`match.${key} must be a string or a list of strings`);
        }
    }
    if ("regex" in match && typeof match.regex !== "string") {
        issues.push("match.regex must be a string");
    }

    return issues;
}

/**
 * Type guard for YAML reply definitions.
 */
export function isYamlReplyDefinition(obj: unknown): obj is YamlReplyDefinition {
    return validateYamlReply(obj).length === 0;
}

/**
 * Create a reply node from a YAML definition.
 *
 * @example
 * ```typescript
 * const node = createNodeFromYaml({
 *     id   : "greet",
 *     match: { startsWith: "hello", ignoreCase: true },
 *     reply: "Hi {user}!",
 * });
 * ```
 */
export function createNodeFromYaml(def: YamlReplyDefinition): NodeDefinition {
    const { match } = def;
    const textOptions = { ignoreCase: match.ignoreCase };
    const checks: Predicate[] = [];

    if (match.startsWith !== undefined) checks.push(startsWith(match.startsWith, textOptions));
    if (match.endsWith !== undefined) checks.push(endsWith(match.endsWith, textOptions));
    if (match.fullMatch !== undefined) checks.push(fullMatch(match.fullMatch, textOptions));
    if (match.keywords !== undefined) checks.push(keywords(match.keywords, textOptions));
    if (match.regex !== undefined) checks.push(regex(match.regex, match.ignoreCase ? "i" : undefined));
    if (match.command !== undefined) checks.push(command(match.command));
    if (match.toMe) checks.push(toMe());

    const hasCommand = match.command !== undefined;

    return defineNode({
        id         : def.id,
        description: def.description,
        priority   : def.priority,
        block      : def.block,
        eventTypes : ["message"],
        rule       : rule(...checks),
        permission : def.users ? user(...def.users) : undefined,
        needs      : { reply: Reply },
        async handle({ reply }, control) {
            const text = getPlainText(control.event);
            const args = hasCommand ? parseCommand(text)?.args ?? "" : text;

            await reply(def.reply
                .replaceAll("{user}", getUserId(control.event) ?? "")
                .replaceAll("{args}", args));
        },
    });
}

/**
 * Plugin Loader
 *
 * @example
 * ```typescript
 * const loader = new PluginLoader();
 *
 * // One file, reloadable
 * await registry.load(loader.sourceFor("./plugins/replies.yml"));
 * await registry.reload("replies");
 *
 * // A whole directory, once
 * for (const plugin of await loader.loadFromDirectory("./plugins")) {
 *     await registry.load(plugin);
 * }
 * ```
 */
export class PluginLoader {
    private readonly logger: EngineLogger;

    /** Bumped for every fresh import so each one gets its own module URL */
    private revision = 0;

    constructor(config: PluginLoaderConfig = {}) {
        this.logger = config.logger ?? createConsoleLogger({ prefix: "PluginLoader" });
    }

    /**
     * Whether `filePath` names a file this loader understands. Names
     * starting with "_" and declaration files are ignored.
     */
    isPluginFile(filePath: string): boolean {
        const name = basename(filePath);
        const ext = extname(name).toLowerCase();
        if (name.startsWith("_") || name.endsWith(".d.ts")) {
            return false;
        }
        return YAML_EXTENSIONS.includes(ext) || CODE_EXTENSIONS.includes(ext);
    }

    /**
     * Plugin files in a directory, sorted by name.
     */
    listPluginFiles(dirPath: string): string[] {
        if (!existsSync(dirPath)) {
            this.logger.warn("Plugin directory does not exist", { dirPath });
            return [];
        }

        if (!statSync(dirPath).isDirectory()) {
            this.logger.warn("Plugin path is not a directory", { dirPath });
            return [];
        }

        return readdirSync(dirPath)
            .filter((file) => this.isPluginFile(file))
            .sort()
            .map((file) => join(dirPath, file));
    }

    /**
     * Load every plugin in a directory. Files that fail to load are logged
     * and skipped.
     */
    async loadFromDirectory(dirPath: string): Promise<PluginDefinition[]> {
        const plugins: PluginDefinition[] = [];

        for (const filePath of this.listPluginFiles(dirPath)) {
            try {
                plugins.push(await this.loadFile(filePath));
            }
            catch (error) {
                this.logger.error("Failed to load plugin file", {
                    filePath,
                    error: describeError(error),
                });
            }
        }

        this.logger.info("Plugins loaded from directory", {
            dirPath,
            plugins: plugins.length,
        });

        return plugins;
    }

    /**
     * A reloadable source for one file: every call re-reads it.
     */
    sourceFor(filePath: string): () => Promise<PluginDefinition> {
        let calls = 0;
        return () => {
            calls += 1;
            return this.loadFile(filePath, { fresh: calls > 1 });
        };
    }

    /**
     * Load one YAML or code plugin file.
     */
    async loadFile(filePath: string, options: { fresh?: boolean } = {}): Promise<PluginDefinition> {
        const ext = extname(filePath).toLowerCase();

        if (YAML_EXTENSIONS.includes(ext)) {
            return this.loadYamlFile(filePath);
        }
        if (CODE_EXTENSIONS.includes(ext)) {
            return this.loadCodeFile(filePath, options);
        }

        throw new Error(`Unsupported plugin file: ${filePath}`);
    }

    /**
     * Load a plugin from a YAML file.
     *
     * The file is either a mapping with a `nodes` list or a bare list of
     * reply definitions. The plugin id defaults to the file name.
     *
     * @throws Error if any definition is invalid
     */
    loadYamlFile(filePath: string): PluginDefinition {
        const content = readFileSync(filePath, "utf-8");
        const parsed: unknown = parseYaml(content);
        const fileId = basename(filePath, extname(filePath));

        let meta: object = {};
        let definitions: unknown[] = [];

        if (Array.isArray(parsed)) {
            definitions = parsed;
        }
        else if (typeof parsed === "object" && parsed !== null) {
            if (!("nodes" in parsed) || !Array.isArray(parsed.nodes)) {
                throw new Error(`${filePath}: expected a "nodes" list`);
            }
            meta = parsed;
            definitions = parsed.nodes;
        }
        else if (parsed !== null && parsed !== undefined) {
            throw new Error(`${filePath}: expected a mapping or a list`);
        }

        const nodes = definitions.map((def, index) => {
            if (!isYamlReplyDefinition(def)) {
                throw new Error(`${filePath}: node ${index + 1}: ${validateYamlReply(def).join("; ")}`);
            }
            return createNodeFromYaml(def);
        });

        const plugin: PluginDefinition = {
            id         : stringField(meta, "id") ?? fileId,
            name       : stringField(meta, "name"),
            description: stringField(meta, "description"),
            nodes,
        };

        this.logger.debug("Loaded YAML plugin", { id: plugin.id, nodes: nodes.length, filePath });
        return plugin;
    }

    /**
     * Load a plugin from a code file.
     *
     * Uses the default export when it is a PluginDefinition, otherwise the
     * single named export that is one.
     *
     * @param options.fresh - Bypass the module cache (for reloads)
     * @throws Error if the module exports no plugin, or several
     */
    async loadCodeFile(filePath: string, options: { fresh?: boolean } = {}): Promise<PluginDefinition> {
        const url = pathToFileURL(filePath);
        if (options.fresh) {
            this.revision += 1;
            url.searchParams.set("v", String(this.revision));
        }

        const module: Record<string, unknown> = await import(url.href);

        if (isPluginDefinition(module.default)) {
            this.logger.debug("Loaded code plugin", { id: module.default.id, export: "default" });
            return module.default;
        }

        const entries: Array<[string, unknown]> = Object.entries(module);
        const found = entries.filter(([, exported]) => isPluginDefinition(exported));

        if (found.length !== 1) {
            throw new Error(found.length === 0
                ? `${filePath}: no plugin definition exported`
                : `${filePath}: several plugin definitions exported (${found.map(([key]) => key).join(", ")})`);
        }

        const [key, plugin] = found[0];
        if (!isPluginDefinition(plugin)) {
            throw new Error(`${filePath}: export "${key}" is not a plugin definition`);
        }

        this.logger.debug("Loaded code plugin", { id: plugin.id, export: key });
        return plugin;
    }
}
