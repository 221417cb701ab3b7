/**
 * @fileoverview Message history store
 *
 * SQLite-backed log of the messages the bot saw and sent, per session.
 * Used by the history plugin (/history) and as conversation context by
 * the assistant plugin.
 *
 * @module services/HistoryStore
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

/**
 * One stored message.
 */
export interface HistoryEntry {
    readonly id: number;

    /** Sequence of the event the message arrived in, or that a bot reply answers */
    readonly sequence: number;
    readonly adapterId: string;
    readonly sessionId: string;
    readonly userId: string;
    readonly text: string;

    /** Whether the bot sent this message */
    readonly fromBot: boolean;
    readonly createdAt: Date;
}

/**
 * Fields accepted by {@link HistoryStore.append}.
 */
export interface NewHistoryEntry {
    readonly sequence?: number;
    readonly adapterId: string;
    readonly sessionId: string;
    readonly userId: string;
    readonly text: string;
    readonly fromBot?: boolean;
    readonly createdAt?: Date;
}

/**
 * Options for {@link HistoryStore.recent}.
 */
export interface RecentOptions {
    readonly sessionId: string;

    /** Maximum number of entries */
    readonly limit: number;

    /** Only entries recorded before the event with this sequence */
    readonly beforeSequence?: number;
}

/**
 * Raw row from the messages table.
 */
interface MessageRow {
    id: number;
    sequence: number;
    adapter_id: string;
    session_id: string;
    user_id: string;
    text: string;
    from_bot: number;
    created_at: string;
}

function isMessageRow(value: unknown): value is MessageRow {
    return (
        typeof value === "object" &&
        value !== null &&
        "id" in value &&
        typeof value.id === "number" &&
        "sequence" in value &&
        typeof value.sequence === "number" &&
        "adapter_id" in value &&
        typeof value.adapter_id === "string" &&
        "session_id" in value &&
        typeof value.session_id === "string" &&
        "user_id" in value &&
        typeof value.user_id === "string" &&
        "text" in value &&
        typeof value.text === "string" &&
        "from_bot" in value &&
        typeof value.from_bot === "number" &&
        "created_at" in value &&
        typeof value.created_at === "string"
    );
}

function toEntry(row: MessageRow): HistoryEntry {
    return {
        id       : row.id,
        sequence : row.sequence,
        adapterId: row.adapter_id,
        sessionId: row.session_id,
        userId   : row.user_id,
        text     : row.text,
        fromBot  : row.from_bot === 1,
        createdAt: new Date(row.created_at),
    };
}

/**
 * Message history database.
 *
 * @example
 * ```typescript
 * const history = new HistoryStore("./data/history.db");
 * history.append({ adapterId: "console", sessionId: "console", userId: "alice", text: "hi" });
 * history.recent({ sessionId: "console", limit: 10 });
 * history.close();
 * ```
 */
export class HistoryStore {
    private db: Database.Database | null;

    /**
     * @param dbPath - SQLite file (created with its directory when missing),
     *                 or ":memory:"
     */
    constructor(readonly dbPath: string = ":memory:") {
        if (dbPath !== ":memory:") {
            mkdirSync(dirname(dbPath), { recursive: true });
        }

        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS messages (
                id         INTEGER PRIMARY KEY AUTOINCREMENT,
                sequence   INTEGER NOT NULL,
                adapter_id TEXT    NOT NULL,
                session_id TEXT    NOT NULL,
                user_id    TEXT    NOT NULL,
                text       TEXT    NOT NULL,
                from_bot   INTEGER NOT NULL DEFAULT 0,
                created_at TEXT    NOT NULL
            );
            CREATE INDEX IF NOT EXISTS messages_by_session ON messages (session_id, id);
        `);
    }

    /**
     * Ensure database is open
     */
    private ensureOpen(): Database.Database {
        if (!this.db) {
            throw new Error(`History store is closed: ${this.dbPath}`);
        }
        return this.db;
    }

    /**
     * Store a message.
     *
     * @returns The new entry's id
     */
    append(entry: NewHistoryEntry): number {
        const db = this.ensureOpen();
        const result = db.prepare(`
            INSERT INTO messages (sequence, adapter_id, session_id, user_id, text, from_bot, created_at)
            VALUES (?, ?, ?, ?, ?, ?, ?)
        `).run(
            entry.sequence ?? 0,
            entry.adapterId,
            entry.sessionId,
            entry.userId,
            entry.text,
            entry.fromBot ? 1 : 0,
            (entry.createdAt ?? new Date()).toISOString()
        );

        return Number(result.lastInsertRowid);
    }

    /**
     * The latest messages of a session, oldest first.
     */
    recent(options: RecentOptions): HistoryEntry[] {
        const db = this.ensureOpen();

        const conditions = ["session_id = ?"];
        const params: (string | number)[] = [options.sessionId];

        if (options.beforeSequence !== undefined) {
            conditions.push("sequence < ?");
            params.push(options.beforeSequence);
        }

        const rows: unknown[] = db.prepare(`
            SELECT id, sequence, adapter_id, session_id, user_id, text, from_bot, created_at
            FROM messages
            WHERE ${conditions.join(" AND ")}
            ORDER BY id DESC
            LIMIT ?
        `).all(...params, options.limit);

        return rows.filter(isMessageRow).map(toEntry).reverse();
    }

    /**
     * Number of stored messages, optionally for one session.
     */
    count(sessionId?: string): number {
        const db = this.ensureOpen();
        const row: unknown = sessionId === undefined
            ? db.prepare("SELECT COUNT(*) AS total FROM messages").get()
            : db.prepare("SELECT COUNT(*) AS total FROM messages WHERE session_id = ?").get(sessionId);

        return typeof row === "object" && row !== null && "total" in row && typeof row.total === "number"
            ? row.total
            : 0;
    }

    /**
     * Delete a session's messages.
     *
     * @returns Number of deleted messages
     */
    clear(sessionId: string): number {
        const db = this.ensureOpen();
        return db.prepare("DELETE FROM messages WHERE session_id = ?").run(sessionId).changes;
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }
}
