/**
 * @fileoverview Predicate barrel exports
 *
 * @module @switchyard/engine/predicates
 */

export {
    always,
    never,
    and,
    or,
    not,
    rule,
    permission,
} from "./combinators.js";
export {
    startsWith,
    endsWith,
    fullMatch,
    keywords,
    regex,
    command,
    parseCommand,
    toMe,
    countTrigger,
    DEFAULT_COMMAND_PREFIXES,
    DEFAULT_COMMAND_SEPARATORS,
    type TextMatchOptions,
    type RegexRule,
    type CommandOptions,
    type CommandMatch,
    type CommandRule,
    type CountTriggerOptions,
} from "./messageRules.js";
export { user, superuser } from "./permissions.js";
