/**
 * Services
 *
 * Storage and model clients used by the bot's plugins.
 */

export {
    HistoryStore,
    type HistoryEntry,
    type NewHistoryEntry,
    type RecentOptions,
} from "./HistoryStore.js";
export {
    OpenAIChatModel,
    type ChatMessage,
    type ChatModel,
    type ChatRole,
    type CompleteOptions,
    type OpenAIChatModelConfig,
} from "./OpenAIChatModel.js";
