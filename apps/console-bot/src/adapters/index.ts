/**
 * @fileoverview Adapter barrel exports
 *
 * @module adapters
 */

export {
    ConsoleAdapter,
    stripMention,
    type ConsoleAdapterOptions,
} from "./ConsoleAdapter.js";
export {
    HeartbeatAdapter,
    isHeartbeatPayload,
    type HeartbeatAdapterOptions,
    type HeartbeatPayload,
} from "./HeartbeatAdapter.js";
