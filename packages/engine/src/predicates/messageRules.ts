/**
 * @fileoverview Built-in message rules
 *
 * Checkers over the plain text of message events. Non-message events have
 * empty text and therefore fail every text checker.
 *
 * `regex()` and `command()` also expose the parsed match as a dependency.
 * Because it is the same dependency object the rule evaluated, a handler
 * that declares it receives the memoized value instead of parsing again.
 *
 * @module @switchyard/engine/predicates/messageRules
 */

import type { BotEvent } from "../contracts/BotEvent.js";
import { getSessionId, isToMe } from "../contracts/BotEvent.js";
import type { Dependency } from "../contracts/Dependency.js";
import { defineDependency } from "../contracts/Dependency.js";
import type { Predicate } from "../contracts/Predicate.js";
import { definePredicate } from "../contracts/Predicate.js";
import { CurrentEvent, PlainText } from "../dependencies/builtins.js";

/**
 * Options shared by the text checkers.
 */
export interface TextMatchOptions {
    /** Compare case-insensitively (default: false) */
    readonly ignoreCase?: boolean;
}

function toList(value: string | readonly string[]): readonly string[] {
    return typeof value === "string" ? [value] : value;
}

function textChecker(
    name: string,
    values: string | readonly string[],
    options: TextMatchOptions,
    matches: (text: string, value: string) => boolean
): Predicate {
    const fold = (text: string): string => (options.ignoreCase ? text.toLowerCase() : text);
    const expected = toList(values).map(fold);

    return definePredicate({
        name : `${name}(${expected.join("|")})`,
        needs: { text: PlainText },
        test : ({ text }) => {
            const folded = fold(text);
            return expected.some((value) => matches(folded, value));
        },
    });
}

/**
 * Text starts with one of `prefixes`.
 */
export function startsWith(prefixes: string | readonly string[], options: TextMatchOptions = {}): Predicate {
    return textChecker("startsWith", prefixes, options, (text, prefix) => text.startsWith(prefix));
}

/**
 * Text ends with one of `suffixes`.
 */
export function endsWith(suffixes: string | readonly string[], options: TextMatchOptions = {}): Predicate {
    return textChecker("endsWith", suffixes, options, (text, suffix) => text.endsWith(suffix));
}

/**
 * Trimmed text equals one of `texts`.
 */
export function fullMatch(texts: string | readonly string[], options: TextMatchOptions = {}): Predicate {
    return textChecker("fullMatch", texts, options, (text, candidate) => text.trim() === candidate);
}

/**
 * Text contains one of `words`.
 */
export function keywords(words: string | readonly string[], options: TextMatchOptions = {}): Predicate {
    return textChecker("keywords", words, options, (text, word) => text.includes(word));
}

/**
 * A regex rule plus the dependency holding its match.
 */
export interface RegexRule extends Predicate {
    readonly match: Dependency<RegExpMatchArray | null>;
}

/**
 * Text matches `pattern`.
 *
 * @example
 * ```typescript
 * const dice = regex(/^roll (\d+)d(\d+)$/);
 *
 * defineNode({
 *     id   : "dice",
 *     rule : dice,
 *     needs: { match: dice.match, reply: Reply },
 *     handle: ({ match, reply }) => reply(`rolling ${match?.[1]} dice`),
 * });
 * ```
 */
export function regex(pattern: string | RegExp, flags?: string): RegexRule {
    const expression = typeof pattern === "string" ? new RegExp(pattern, flags) : pattern;

    const match = defineDependency({
        name   : `regexMatch(${expression.source})`,
        needs  : { text: PlainText },
        provide: ({ text }): RegExpMatchArray | null => text.match(expression),
    });

    const predicate = definePredicate({
        name : `regex(${expression.source})`,
        needs: { match },
        test : ({ match: result }) => result !== null,
    });

    return Object.freeze({ ...predicate, match });
}

/**
 * Command syntax.
 */
export interface CommandOptions {
    /** Accepted command prefixes (default: ["/"]) */
    readonly prefixes?: readonly string[];

    /** Separators between command segments (default: ["."]) */
    readonly separators?: readonly string[];
}

/**
 * A parsed command line.
 */
export interface CommandMatch {
    /** Prefix that introduced the command */
    readonly prefix: string;

    /** Command segments, e.g. ["plugin", "reload"] */
    readonly command: readonly string[];

    /** Segments joined with ".", e.g. "plugin.reload" */
    readonly name: string;

    /** Everything after the command word, trimmed */
    readonly args: string;
}

/**
 * A command rule plus the dependency holding the parsed command.
 */
export interface CommandRule extends Predicate {
    readonly match: Dependency<CommandMatch | null>;
}

export const DEFAULT_COMMAND_PREFIXES: readonly string[] = ["/"];
export const DEFAULT_COMMAND_SEPARATORS: readonly string[] = ["."];

function splitSegments(word: string, separators: readonly string[]): string[] {
    let parts = [word];
    for (const separator of separators) {
        if (separator !== "") {
            parts = parts.flatMap((part) => part.split(separator));
        }
    }
    return parts.filter((part) => part.length > 0);
}

/**
 * Parse `text` as a command line.
 *
 * @returns The parsed command, or null when no prefix matches
 *
 * @example
 * ```typescript
 * parseCommand("/plugin.reload replies");
 * // { prefix: "/", command: ["plugin", "reload"], name: "plugin.reload", args: "replies" }
 * ```
 */
export function parseCommand(text: string, options: CommandOptions = {}): CommandMatch | null {
    const prefixes = options.prefixes ?? DEFAULT_COMMAND_PREFIXES;
    const separators = options.separators ?? DEFAULT_COMMAND_SEPARATORS;
    const line = text.trimStart();

    // Longest prefix first, so "//" wins over "/"
    const prefix = [...prefixes]
        .sort((a, b) => b.length - a.length)
        .find((candidate) => line.startsWith(candidate));
    if (prefix === undefined) {
        return null;
    }

    const body = line.slice(prefix.length);
    const word = body.split(/\s/, 1)[0];
    const command = splitSegments(word, separators);
    if (command.length === 0) {
        return null;
    }

    return {
        prefix,
        command,
        name: command.join("."),
        args: body.slice(word.length).trim(),
    };
}

/**
 * Text is one of the given commands.
 *
 * Names may use any configured separator: with the defaults,
 * `command("plugin.reload")` matches "/plugin.reload".
 */
export function command(names: string | readonly string[], options: CommandOptions = {}): CommandRule {
    const separators = options.separators ?? DEFAULT_COMMAND_SEPARATORS;
    const wanted = new Set(toList(names).map((name) => splitSegments(name, separators).join(".")));

    const match = defineDependency({
        name   : `commandMatch(${[...wanted].join("|")})`,
        needs  : { text: PlainText },
        provide: ({ text }) => parseCommand(text, options),
    });

    const predicate = definePredicate({
        name : `command(${[...wanted].join("|")})`,
        needs: { match },
        test : ({ match: parsed }) => parsed !== null && wanted.has(parsed.name),
    });

    return Object.freeze({ ...predicate, match });
}

/**
 * The message addresses the bot directly.
 */
export function toMe(): Predicate {
    return definePredicate({
        name : "toMe",
        needs: { event: CurrentEvent },
        test : ({ event }) => isToMe(event),
    });
}

/**
 * Options for {@link countTrigger}.
 */
export interface CountTriggerOptions {
    /** Events needed to fire */
    readonly count: number;

    /** Sliding window in milliseconds */
    readonly windowMs: number;

    /** Bucket key (default: session id, else adapter id) */
    readonly key?: (event: BotEvent) => string;

    /** Clock (default: Date.now) */
    readonly now?: () => number;
}

/**
 * Predicate returned by {@link countTrigger}.
 */
export interface CountTrigger extends Predicate {
    /** Keys currently holding hits */
    trackedKeys(): number;
}

/**
 * Fires once `count` evaluations for the same key fall within `windowMs`,
 * then starts counting again. Place it last in a rule so that only events
 * passing the other checkers are counted.
 *
 * Keys whose hits have all expired are dropped at most once per window.
 */
export function countTrigger(options: CountTriggerOptions): CountTrigger {
    const hits = new Map<string, number[]>();
    const now = options.now ?? Date.now;
    let lastSweep = -Infinity;

    const inWindow = (at: number) => (time: number): boolean => at - time < options.windowMs;

    const sweep = (at: number): void => {
        for (const [key, times] of hits) {
            const recent = times.filter(inWindow(at));
            if (recent.length === 0) {
                hits.delete(key);
            }
            else {
                hits.set(key, recent);
            }
        }
        lastSweep = at;
    };

    const predicate = definePredicate({
        name : `countTrigger(${options.count}/${options.windowMs}ms)`,
        needs: { event: CurrentEvent },
        test : ({ event }) => {
            const key = options.key?.(event) ?? getSessionId(event) ?? event.adapterId;
            const at = now();
            if (at - lastSweep >= options.windowMs) {
                sweep(at);
            }

            const recent = (hits.get(key) ?? []).filter(inWindow(at));
            recent.push(at);

            if (recent.length >= options.count) {
                hits.delete(key);
                return true;
            }

            hits.set(key, recent);
            return false;
        },
    });

    return Object.freeze({
        ...predicate,
        trackedKeys: () => hits.size,
    });
}
