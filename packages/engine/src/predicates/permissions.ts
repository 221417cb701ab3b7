/**
 * @fileoverview Built-in permission checkers
 *
 * @module @switchyard/engine/predicates/permissions
 */

import { getUserId } from "../contracts/BotEvent.js";
import type { Predicate } from "../contracts/Predicate.js";
import { definePredicate } from "../contracts/Predicate.js";
import { CurrentEvent, Superusers } from "../dependencies/builtins.js";

/**
 * Sender is one of `userIds`.
 */
export function user(...userIds: string[]): Predicate {
    const allowed = new Set(userIds);

    return definePredicate({
        name : `user(${userIds.join("|")})`,
        needs: { event: CurrentEvent },
        test : ({ event }) => {
            const sender = getUserId(event);
            return sender !== undefined && allowed.has(sender);
        },
    });
}

/**
 * Sender is a configured superuser.
 */
export function superuser(): Predicate {
    return definePredicate({
        name : "superuser",
        needs: { event: CurrentEvent, superusers: Superusers },
        test : ({ event, superusers }) => {
            const sender = getUserId(event);
            return sender !== undefined && superusers.has(sender);
        },
    });
}
