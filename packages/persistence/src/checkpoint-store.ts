import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import type { ConversationState, ConversationStore, ThreadId } from "@colloquy/types";
import { ColloquyError, silentLogger, type Logger } from "@colloquy/core";
import { StoredStateSchema, decodeState, encodeState } from "./state-codec.js";

const CheckpointRowSchema = z.object({ id: z.string(), state_json: z.string() });
const ThreadRowSchema = z.object({ thread_id: z.string() });

export interface SQLiteConversationStoreOptions {
  logger?: Logger;
}

/**
 * SQLite-backed implementation of ConversationStore.
 *
 * Every save appends a checkpoint row; the latest row per thread is the
 * current state. Rows are never updated in place.
 */
export class SQLiteConversationStore implements ConversationStore {
  private db: Database.Database;
  private readonly log: Logger;

  constructor(dbPath: string, opts: SQLiteConversationStoreOptions = {}) {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.log = opts.logger ?? silentLogger;
    this.migrate();
  }

  /** Run schema migrations. Idempotent. */
  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        seq         INTEGER PRIMARY KEY AUTOINCREMENT,
        id          TEXT NOT NULL UNIQUE,
        thread_id   TEXT NOT NULL,
        state_json  TEXT NOT NULL,
        created_at  TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_checkpoints_thread
        ON checkpoints(thread_id, seq);
    `);
  }

  async load(threadId: ThreadId): Promise<ConversationState | undefined> {
    const row: unknown = this.db
      .prepare("SELECT id, state_json FROM checkpoints WHERE thread_id = ? ORDER BY seq DESC LIMIT 1")
      .get(threadId);
    if (row === undefined) return undefined;

    const checkpoint = CheckpointRowSchema.safeParse(row);
    if (!checkpoint.success) {
      throw new ColloquyError("PERSISTENCE_ERROR", `Unreadable checkpoint row for ${threadId}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(checkpoint.data.state_json);
    } catch (err) {
      throw new ColloquyError(
        "PERSISTENCE_ERROR",
        `Checkpoint ${checkpoint.data.id} for ${threadId} is not valid JSON`,
        { cause: err }
      );
    }

    const stored = StoredStateSchema.safeParse(json);
    if (!stored.success) {
      throw new ColloquyError(
        "PERSISTENCE_ERROR",
        `Checkpoint ${checkpoint.data.id} for ${threadId} is malformed: ${stored.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`
      );
    }
    return decodeState(stored.data);
  }

  async save(threadId: ThreadId, state: ConversationState): Promise<void> {
    const id = uuidv7();
    try {
      this.db
        .prepare(
          "INSERT INTO checkpoints (id, thread_id, state_json, created_at) VALUES (?, ?, ?, ?)"
        )
        .run(id, threadId, JSON.stringify(encodeState(state)), new Date().toISOString());
    } catch (err) {
      throw new ColloquyError("PERSISTENCE_ERROR", `Cannot save checkpoint for ${threadId}`, {
        cause: err,
      });
    }
    this.log.debug("Checkpoint saved", { threadId, checkpointId: id, messages: state.messages.length });
  }

  async listAllThreadIds(): Promise<string[]> {
    const rows: unknown[] = this.db
      .prepare("SELECT DISTINCT thread_id FROM checkpoints ORDER BY thread_id")
      .all();
    return rows.flatMap((row) => {
      const parsed = ThreadRowSchema.safeParse(row);
      return parsed.success ? [parsed.data.thread_id] : [];
    });
  }

  /** Number of checkpoints kept for a thread. */
  countCheckpoints(threadId: ThreadId): number {
    const row: unknown = this.db
      .prepare("SELECT COUNT(*) AS cnt FROM checkpoints WHERE thread_id = ?")
      .get(threadId);
    const parsed = z.object({ cnt: z.number() }).safeParse(row);
    return parsed.success ? parsed.data.cnt : 0;
  }

  /** Close the database connection. */
  close(): void {
    this.db.close();
  }
}
