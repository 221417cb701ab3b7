/**
 * @fileoverview Console bot assembly
 *
 * Wires configuration into a {@link Bot}: adapters, the history store,
 * the built-in plugins, the optional assistant and the user plugin
 * directory. Kept apart from the entry point so tests can build the same
 * bot with stand-in adapters and models.
 *
 * @module createConsoleBot
 */

import { isAbsolute, resolve } from "path";
import {
    Bot,
    createConsoleLogger,
    createScopedLogger,
    type AdapterLike,
    type EngineLogger,
} from "@switchyard/engine";
import { ConsoleAdapter } from "./adapters/ConsoleAdapter.js";
import { HeartbeatAdapter } from "./adapters/HeartbeatAdapter.js";
import type { BotConfig } from "./config/loadConfig.js";
import { createAdminPlugin } from "./plugins/admin.js";
import { createAssistantPlugin } from "./plugins/assistant.js";
import { createCorePlugin } from "./plugins/core.js";
import { createHistoryPlugin } from "./plugins/history.js";
import { PluginDirectory } from "./plugins/PluginDirectory.js";
import { HistoryStore } from "./services/HistoryStore.js";
import { OpenAIChatModel, type ChatModel } from "./services/OpenAIChatModel.js";

export interface ConsoleBotOptions {
    /** Directory relative config paths are resolved against */
    readonly appRoot: string;

    readonly logger?: EngineLogger;

    /** Replaces the console and heartbeat adapters */
    readonly adapters?: readonly AdapterLike[];

    /** Replaces the OpenAI model; enables the assistant without an API key */
    readonly chatModel?: ChatModel;

    /** Replaces the configured history database */
    readonly history?: HistoryStore;
}

/**
 * The assembled bot and the parts the entry point manages.
 */
export interface ConsoleBot {
    readonly bot: Bot;
    readonly history: HistoryStore;
    readonly directory: PluginDirectory;

    /** Whether the assistant plugin was loaded */
    readonly assistant: boolean;
}

/**
 * Resolve a configured path against the app root. ":memory:" stays as is.
 */
export function resolveAppPath(appRoot: string, path: string): string {
    return path === ":memory:" || isAbsolute(path) ? path : resolve(appRoot, path);
}

function defaultAdapters(config: BotConfig): AdapterLike[] {
    const adapters: AdapterLike[] = [
        new ConsoleAdapter({
            botName  : config.botName,
            userId   : config.console.userId,
            sessionId: config.console.sessionId,
        }),
    ];

    if (config.heartbeat.enabled) {
        adapters.push(new HeartbeatAdapter({ intervalMs: config.heartbeat.intervalMs }));
    }

    return adapters;
}

/**
 * Build the console bot from its configuration.
 *
 * Built-in plugins are loaded immediately; user plugins are synced (and
 * watched, when configured) on startup.
 */
export async function createConsoleBot(config: BotConfig, options: ConsoleBotOptions): Promise<ConsoleBot> {
    const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });

    const bot = new Bot({
        logger       : createScopedLogger(logger, "Bot"),
        tierMode     : config.dispatch.tierMode,
        nodeTimeoutMs: config.dispatch.nodeTimeoutMs,
        stopGraceMs  : config.dispatch.stopGraceMs,
        superusers   : config.superusers,
        adapters     : config.adapters,
    });

    for (const adapter of options.adapters ?? defaultAdapters(config)) {
        bot.addAdapter(adapter);
    }

    const history = options.history ?? new HistoryStore(resolveAppPath(options.appRoot, config.history.dbPath));
    const directory = new PluginDirectory({
        dir   : resolveAppPath(options.appRoot, config.plugins.dir),
        host  : bot,
        logger: createScopedLogger(logger, "Plugins"),
    });

    await bot.load(createCorePlugin({ registry: bot.registry, adapters: () => bot.adapterHandles() }));
    await bot.load(createHistoryPlugin({ store: history, limit: config.history.limit }));
    await bot.load(createAdminPlugin({ registry: bot.registry, directory }));

    const model = options.chatModel ?? (config.assistant.apiKey
        ? new OpenAIChatModel("openai", {
            apiKey     : config.assistant.apiKey,
            model      : config.assistant.model,
            temperature: config.assistant.temperature,
            maxTokens  : config.assistant.maxTokens,
        })
        : undefined);

    if (model) {
        await bot.load(createAssistantPlugin({
            model,
            history,
            botName        : config.botName,
            systemPrompt   : config.assistant.systemPrompt,
            contextMessages: config.assistant.contextMessages,
        }));
    }
    else {
        logger.info("Assistant disabled: OPENAI_API_KEY is not set");
    }

    bot.onStartup(async () => {
        await directory.sync();
        if (config.plugins.watch) {
            directory.watch();
        }
    });

    bot.onShutdown(() => {
        directory.close();
        history.close();
    });

    return { bot, history, directory, assistant: model !== undefined };
}
