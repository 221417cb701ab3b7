/**
 * Example User Plugin
 * ===================
 *
 * A code plugin you can use as a template for your own.
 *
 * To create your own plugin:
 * 1. Copy this file and rename it (e.g., my-plugin.ts)
 * 2. Change the plugin id and the node ids (they must be unique)
 * 3. Write your rules and handlers
 *
 * Files in user/plugins/ are loaded on startup and reloaded when they
 * change while the bot runs. Files starting with "_" are ignored.
 *
 * @example
 * ```
 * > /roll 2d6
 * [bot] 2d6: 3 + 5 = 8
 * ```
 */

import {
    Reply,
    defineNode,
    definePlugin,
    regex,
} from "@switchyard/engine";

const MAX_DICE = 20;
const MAX_SIDES = 1000;

const rollCommand = regex(/^\/roll\s+(\d+)d(\d+)$/i);

/**
 * Roll `count` dice with `sides` sides each.
 */
export function roll(count: number, sides: number, random: () => number = Math.random): number[] {
    return Array.from({ length: count }, () => 1 + Math.floor(random() * sides));
}

const dice = defineNode({
    id         : "user.dice",
    description: "/roll <n>d<sides> - roll some dice",
    priority   : 20,
    block      : true,
    rule       : rollCommand,
    needs      : { match: rollCommand.match, reply: Reply },
    async handle({ match, reply }) {
        const count = Number(match?.[1]);
        const sides = Number(match?.[2]);

        if (count < 1 || count > MAX_DICE || sides < 2 || sides > MAX_SIDES) {
            await reply(`Between 1 and ${MAX_DICE} dice with 2 to ${MAX_SIDES} sides, please.`);
            return;
        }

        const results = roll(count, sides);
        const total = results.reduce((sum, value) => sum + value, 0);
        await reply(`${count}d${sides}: ${results.join(" + ")} = ${total}`);
    },
});

export default definePlugin({
    id         : "dice",
    name       : "Dice",
    description: "Example code plugin",
    nodes      : [dice],
});
