/**
 * @fileoverview Plugin directory
 *
 * Keeps the plugins of one directory in sync with a registry:
 * - new files are loaded
 * - changed files are reloaded (the registry re-reads them); a file edited
 *   to declare another plugin id replaces the plugin it used to declare
 * - removed files are unloaded
 *
 * `watch()` syncs automatically, debounced, whenever the directory changes.
 * Syncs are serialized; a file that fails is reported and retried once it
 * changes again.
 *
 * @module plugins/PluginDirectory
 */

import { statSync, watch, type FSWatcher } from "fs";
import { basename } from "path";
import {
    PluginLoader,
    createConsoleLogger,
    describeError,
    type EngineLogger,
    type PluginSource,
} from "@switchyard/engine";

/**
 * What a directory syncs into: a NodeRegistry or a Bot.
 */
export interface PluginHost {
    load(source: PluginSource): Promise<unknown>;
    reload(pluginId: string, source?: PluginSource): Promise<unknown>;
    unload(pluginId: string): Promise<boolean>;
}

/**
 * A file that could not be loaded, reloaded or unloaded.
 */
export interface SyncFailure {
    readonly file: string;
    readonly error: string;
}

/**
 * Result of {@link PluginDirectory.sync}; plugin ids per outcome.
 */
export interface SyncReport {
    readonly loaded: readonly string[];
    readonly reloaded: readonly string[];
    readonly unloaded: readonly string[];
    readonly failed: readonly SyncFailure[];
}

export interface SyncOptions {
    /** Reload tracked files even when unchanged */
    readonly force?: boolean;
}

export interface PluginDirectoryOptions {
    readonly dir: string;
    readonly host: PluginHost;
    readonly loader?: PluginLoader;
    readonly logger?: EngineLogger;

    /** Quiet period before a watched change triggers a sync (default: 200) */
    readonly debounceMs?: number;
}

interface TrackedFile {
    readonly pluginId: string;
    mtimeMs: number;
}

/**
 * One line per non-empty outcome, for chat replies.
 */
export function formatSyncReport(report: SyncReport): string {
    const lines: string[] = [];

    if (report.loaded.length > 0) lines.push(`Loaded: ${report.loaded.join(", ")}`);
    if (report.reloaded.length > 0) lines.push(`Reloaded: ${report.reloaded.join(", ")}`);
    if (report.unloaded.length > 0) lines.push(`Unloaded: ${report.unloaded.join(", ")}`);
    if (report.failed.length > 0) {
        lines.push(`Failed: ${report.failed.map((failure) => `${basename(failure.file)} (${failure.error})`).join(", ")}`);
    }

    return lines.length === 0 ? "No plugin changes." : lines.join("\n");
}

/**
 * PluginDirectory
 *
 * @example
 * ```typescript
 * const directory = new PluginDirectory({ dir: "./user/plugins", host: bot });
 * await directory.sync();
 * directory.watch();
 * bot.onShutdown(() => directory.close());
 * ```
 */
export class PluginDirectory {
    readonly dir: string;

    private readonly host: PluginHost;
    private readonly loader: PluginLoader;
    private readonly logger: EngineLogger;
    private readonly debounceMs: number;

    private readonly tracked = new Map<string, TrackedFile>();
    private readonly failedAt = new Map<string, number>();
    private queue: Promise<unknown> = Promise.resolve();
    private watcher: FSWatcher | null = null;
    private timer: NodeJS.Timeout | null = null;

    constructor(options: PluginDirectoryOptions) {
        this.dir = options.dir;
        this.host = options.host;
        this.logger = options.logger ?? createConsoleLogger({ prefix: "PluginDirectory" });
        this.loader = options.loader ?? new PluginLoader({ logger: this.logger });
        this.debounceMs = options.debounceMs ?? 200;
    }

    /**
     * Plugin ids currently loaded from this directory, by file.
     */
    plugins(): ReadonlyMap<string, string> {
        return new Map([...this.tracked].map(([file, tracked]) => [file, tracked.pluginId]));
    }

    get isWatching(): boolean {
        return this.watcher !== null;
    }

    /**
     * Bring the host in line with the directory.
     */
    sync(options: SyncOptions = {}): Promise<SyncReport> {
        const run = this.queue.then(() => this.runSync(options.force ?? false));
        this.queue = run.catch(() => undefined);
        return run;
    }

    /**
     * Start watching the directory.
     *
     * @returns false when the directory cannot be watched
     */
    watch(): boolean {
        if (this.watcher) {
            return true;
        }

        try {
            this.watcher = watch(this.dir, () => this.scheduleSync());
        }
        catch (error) {
            this.logger.warn("Cannot watch plugin directory", { dir: this.dir, error: describeError(error) });
            return false;
        }

        this.watcher.on("error", (error) => {
            this.logger.error("Plugin directory watch failed", { dir: this.dir, error: describeError(error) });
        });
        this.logger.info("Watching plugin directory", { dir: this.dir });
        return true;
    }

    /**
     * Stop watching. Plugins stay loaded.
     */
    close(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
        if (this.watcher) {
            this.watcher.close();
            this.watcher = null;
        }
    }

    private scheduleSync(): void {
        if (this.timer) {
            clearTimeout(this.timer);
        }

        this.timer = setTimeout(() => {
            this.timer = null;
            this.sync().catch((error: unknown) => {
                this.logger.error("Plugin directory sync failed", { dir: this.dir, error: describeError(error) });
            });
        }, this.debounceMs);
    }

    private async runSync(force: boolean): Promise<SyncReport> {
        const files = this.loader.listPluginFiles(this.dir);
        const present = new Set(files);
        const loaded: string[] = [];
        const reloaded: string[] = [];
        const unloaded: string[] = [];
        const failed: SyncFailure[] = [];

        const fail = (file: string, error: unknown): void => {
            const message = describeError(error);
            failed.push({ file, error: message });
            this.logger.error("Plugin file failed", { file, error: message });
        };

        for (const [file, tracked] of [...this.tracked]) {
            if (present.has(file)) {
                continue;
            }
            this.tracked.delete(file);
            try {
                await this.host.unload(tracked.pluginId);
                unloaded.push(tracked.pluginId);
            }
            catch (error) {
                fail(file, error);
            }
        }

        for (const file of [...this.failedAt.keys()]) {
            if (!present.has(file)) {
                this.failedAt.delete(file);
            }
        }

        for (const file of files) {
            let mtimeMs: number;
            try {
                mtimeMs = statSync(file).mtimeMs;
            }
            catch (error) {
                fail(file, error);
                continue;
            }

            const tracked = this.tracked.get(file);

            if (tracked) {
                if (!force && tracked.mtimeMs === mtimeMs) {
                    continue;
                }
                tracked.mtimeMs = mtimeMs;
                const { source, seen } = this.recordingSource(file);
                try {
                    await this.host.reload(tracked.pluginId, source);
                    reloaded.push(tracked.pluginId);
                }
                catch (error) {
                    if (seen.pluginId === undefined || seen.pluginId === tracked.pluginId) {
                        fail(file, error);
                        continue;
                    }

                    // The file now declares another plugin: replace the old one
                    this.logger.info("Plugin file changed its plugin id", {
                        file,
                        from: tracked.pluginId,
                        to  : seen.pluginId,
                    });
                    this.tracked.delete(file);
                    try {
                        await this.host.unload(tracked.pluginId);
                        unloaded.push(tracked.pluginId);
                        const pluginId = await this.loadFile(file);
                        this.tracked.set(file, { pluginId, mtimeMs });
                        loaded.push(pluginId);
                    }
                    catch (replaceError) {
                        this.failedAt.set(file, mtimeMs);
                        fail(file, replaceError);
                    }
                }
                continue;
            }

            if (!force && this.failedAt.get(file) === mtimeMs) {
                continue;
            }

            const pluginId = await this.loadFile(file).catch((error: unknown) => {
                fail(file, error);
                return null;
            });

            if (pluginId === null) {
                this.failedAt.set(file, mtimeMs);
            }
            else {
                this.failedAt.delete(file);
                this.tracked.set(file, { pluginId, mtimeMs });
                loaded.push(pluginId);
            }
        }

        const report: SyncReport = { loaded, reloaded, unloaded, failed };

        if (loaded.length + reloaded.length + unloaded.length + failed.length > 0) {
            this.logger.info("Plugin directory synced", {
                dir     : this.dir,
                loaded,
                reloaded,
                unloaded,
                failed  : failed.length,
            });
        }

        return report;
    }

    /**
     * Load one file through a source that remembers the plugin id it
     * produced, so later reloads re-read the file.
     */
    private async loadFile(file: string): Promise<string> {
        const { source, seen } = this.recordingSource(file);

        await this.host.load(source);

        if (seen.pluginId === undefined) {
            throw new Error(`${file}: plugin source was never read`);
        }
        return seen.pluginId;
    }

    /**
     * Source for `file` that notes the id of the last definition it read.
     */
    private recordingSource(file: string): { source: PluginSource; seen: { pluginId?: string } } {
        const read = this.loader.sourceFor(file);
        const seen: { pluginId?: string } = {};

        const source: PluginSource = async () => {
            const definition = await read();
            seen.pluginId = definition.id;
            return definition;
        };

        return { source, seen };
    }
}
