/**
 * @fileoverview Console Bot - Main Entry Point
 *
 * Chat with a Switchyard bot from the terminal.
 *
 * Plugin loading order:
 * 1. Built-in plugins (core, history, admin)
 * 2. Assistant plugin, when OPENAI_API_KEY is set
 * 3. User plugins (./user/plugins), synced on startup and watched
 *
 * @module console-bot
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { BusEvent } from "@switchyard/engine";
import { loadConfigWithFallback } from "./config/index.js";
import { createConsoleBot } from "./createConsoleBot.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const APP_ROOT = join(__dirname, "..");
const CONFIG_PATH = join(APP_ROOT, "config", "bot.yml");

function field(event: BusEvent, key: string): string {
    const value = event.data?.[key];
    return value === undefined ? "?" : String(value);
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    console.log("=".repeat(60));
    console.log("Switchyard Console Bot");
    console.log("=".repeat(60));

    const config = loadConfigWithFallback(CONFIG_PATH);
    const { bot, directory, assistant } = await createConsoleBot(config, { appRoot: APP_ROOT });

    console.log(`[INFO] Tier mode: ${config.dispatch.tierMode}`);
    console.log(`[INFO] Assistant: ${assistant ? config.assistant.model : "disabled"}`);
    console.log(`[INFO] User plugins: ${directory.dir}`);

    // Subscribe to bot events for logging
    bot.eventBus.subscribe("bot:started", (event) => {
        console.log(`[BOT] Started with plugins: ${field(event, "plugins")}`);
    });

    bot.eventBus.subscribe("bot:stopped", () => {
        console.log("[BOT] Stopped");
    });

    bot.eventBus.subscribe("registry:swapped", (event) => {
        console.log(`[PLUGINS] ${field(event, "operation")} ${field(event, "pluginId")} -> snapshot v${field(event, "version")}`);
    });

    bot.eventBus.subscribe("adapter:restarting", (event) => {
        console.log(`[ADAPTER] ${field(event, "adapterId")} restarting in ${field(event, "delayMs")}ms: ${field(event, "error")}`);
    });

    bot.eventBus.subscribe("adapter:failed", (event) => {
        console.error(`[ADAPTER] ${field(event, "adapterId")} failed: ${field(event, "error")}`);
    });

    bot.eventBus.subscribe("node:failed", (event) => {
        console.error(`[NODE] ${field(event, "nodeId")} failed: ${field(event, "error")}`);
    });

    // Handle graceful shutdown
    const shutdown = async (reason: string): Promise<void> => {
        console.log(`\nShutting down (${reason})...`);
        const report = await bot.stop();
        if (report.cancelled > 0 || report.forcedAdapters.length > 0) {
            console.warn(`[WARN] Cancelled ${report.cancelled} events; forced adapters: ${report.forcedAdapters.join(", ") || "none"}`);
        }
        process.exit(0);
    };

    const fatal = (error: unknown): void => {
        console.error("[FATAL] Shutdown failed:", error);
        process.exit(1);
    };

    process.on("SIGINT", () => {
        shutdown("SIGINT").catch(fatal);
    });

    process.on("SIGTERM", () => {
        shutdown("SIGTERM").catch(fatal);
    });

    process.stdin.once("end", () => {
        shutdown("end of input").catch(fatal);
    });

    try {
        await bot.start();

        console.log(`\n[INFO] Ready. Type /help, or @${config.botName} to talk to the assistant. Ctrl+C to stop.\n`);
    }
    catch (error) {
        console.error("[FATAL] Failed to start application:", error);
        process.exit(1);
    }
}

// Run if this is the main module
main().catch(console.error);
