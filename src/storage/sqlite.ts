import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StoreError } from "../errors.js";
import type {
  Checkpoint,
  MessageKey,
  MessageKind,
  MessageStatistics,
  NewMessage,
  NewSummary,
  StoredMessage,
  SummaryRecord
} from "../types.js";
import { EPOCH_ISO, nowIso } from "../util/time.js";
import { listAppliedMigrations, runMigrations, type AppliedMigration } from "./migrations.js";

type MessageRow = {
  message_id: number;
  chat_id: number;
  sender: string | null;
  kind: string;
  text: string | null;
  timestamp: string;
  processed: number;
};

type CheckpointRow = {
  last_timestamp: string;
  last_message_id: number;
  last_chat_id: number;
  updated_at: string;
};

type SummaryRow = {
  id: number;
  created_at: string;
  message_count: number;
  chat_count: number;
  first_timestamp: string;
  last_timestamp: string;
  content: string;
};

type CountRow = { count: number };

type HighWaterRow = { highWater: string | null };

const toKind = (value: string): MessageKind => (value === "Channel" ? "Channel" : "Chat");

const toMessage = (row: MessageRow): StoredMessage => ({
  messageId: row.message_id,
  chatId: row.chat_id,
  sender: row.sender,
  kind: toKind(row.kind),
  text: row.text,
  timestamp: row.timestamp,
  processed: row.processed === 1
});

const toCheckpoint = (row: CheckpointRow): Checkpoint => ({
  lastTimestamp: row.last_timestamp,
  lastMessageId: row.last_message_id,
  lastChatId: row.last_chat_id,
  updatedAt: row.updated_at
});

const toSummary = (row: SummaryRow): SummaryRecord => ({
  id: row.id,
  createdAt: row.created_at,
  messageCount: row.message_count,
  chatCount: row.chat_count,
  firstTimestamp: row.first_timestamp,
  lastTimestamp: row.last_timestamp,
  content: row.content
});

const MESSAGE_COLUMNS = "message_id, chat_id, sender, kind, text, timestamp, processed";

export type CommitBatchInput = {
  keys: MessageKey[];
  last: MessageKey & { timestamp: string };
  summary: NewSummary;
};

export type CommitBatchResult = {
  marked: number;
  checkpoint: Checkpoint;
  summaryId: number;
};

export class SqliteStorage {
  private db: Database.Database;
  readonly migrationsApplied: AppliedMigration[];

  constructor(readonly dbPath: string) {
    try {
      if (dbPath !== ":memory:") {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
      }
      this.db = new Database(dbPath);
      if (dbPath !== ":memory:") {
        this.db.pragma("journal_mode = WAL");
      }
      this.db.pragma("busy_timeout = 5000");
      this.migrationsApplied = runMigrations(this.db);
    } catch (error) {
      throw new StoreError("open", error);
    }
  }

  close() {
    if (this.db.open) {
      this.db.close();
    }
  }

  insertMessage(message: NewMessage): boolean {
    return this.guard("insertMessage", () => {
      const info = this.db
        .prepare(
          `INSERT INTO messages (message_id, chat_id, sender, kind, text, timestamp)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT (message_id, chat_id) DO NOTHING`
        )
        .run(
          message.messageId,
          message.chatId,
          message.sender,
          message.kind,
          message.text,
          message.timestamp
        );
      return info.changes > 0;
    });
  }

  countMessages(chatId?: number): number {
    return this.guard("countMessages", () => {
      const row =
        chatId === undefined
          ? this.db.prepare<[], CountRow>("SELECT COUNT(*) AS count FROM messages").get()
          : this.db
              .prepare<[number], CountRow>(
                "SELECT COUNT(*) AS count FROM messages WHERE chat_id = ?"
              )
              .get(chatId);
      return row?.count ?? 0;
    });
  }

  fetchUnprocessed(): StoredMessage[] {
    return this.guard("fetchUnprocessed", () =>
      this.db
        .prepare<[], MessageRow>(
          `SELECT ${MESSAGE_COLUMNS} FROM messages
           WHERE processed = 0
           ORDER BY timestamp ASC, message_id ASC, chat_id ASC`
        )
        .all()
        .map(toMessage)
    );
  }

  getMessage(key: MessageKey): StoredMessage | null {
    return this.guard("getMessage", () => {
      const row = this.db
        .prepare<[number, number], MessageRow>(
          `SELECT ${MESSAGE_COLUMNS} FROM messages WHERE message_id = ? AND chat_id = ?`
        )
        .get(key.messageId, key.chatId);
      return row ? toMessage(row) : null;
    });
  }

  markProcessed(keys: MessageKey[]): number {
    return this.guard("markProcessed", () => this.db.transaction(() => this.markKeys(keys))());
  }

  getCheckpoint(): Checkpoint {
    return this.guard("getCheckpoint", () => {
      const row = this.db
        .prepare<[], CheckpointRow>(
          `SELECT last_timestamp, last_message_id, last_chat_id, updated_at
           FROM checkpoint WHERE id = 1`
        )
        .get();
      if (!row) {
        throw new Error("checkpoint row is missing");
      }
      return toCheckpoint(row);
    });
  }

  commitBatch(input: CommitBatchInput): CommitBatchResult {
    return this.guard("commitBatch", () =>
      this.db.transaction(() => {
        const marked = this.markKeys(input.keys);
        const updatedAt = nowIso();
        this.db
          .prepare(
            `UPDATE checkpoint
             SET last_timestamp = ?, last_message_id = ?, last_chat_id = ?, updated_at = ?
             WHERE id = 1`
          )
          .run(input.last.timestamp, input.last.messageId, input.last.chatId, updatedAt);
        const summary = this.db
          .prepare(
            `INSERT INTO summaries
               (created_at, message_count, chat_count, first_timestamp, last_timestamp, content)
             VALUES (?, ?, ?, ?, ?, ?)`
          )
          .run(
            updatedAt,
            input.summary.messageCount,
            input.summary.chatCount,
            input.summary.firstTimestamp,
            input.summary.lastTimestamp,
            input.summary.content
          );
        return {
          marked,
          checkpoint: {
            lastTimestamp: input.last.timestamp,
            lastMessageId: input.last.messageId,
            lastChatId: input.last.chatId,
            updatedAt
          },
          summaryId: Number(summary.lastInsertRowid)
        };
      })()
    );
  }

  checkpointDivergence(): string | null {
    const checkpoint = this.getCheckpoint();
    const processed = this.getStatistics().processed;
    const isInitial =
      checkpoint.lastTimestamp === EPOCH_ISO &&
      checkpoint.lastMessageId === 0 &&
      checkpoint.lastChatId === 0;

    if (isInitial) {
      return processed > 0
        ? `checkpoint is unset but ${processed} messages are processed`
        : null;
    }

    const anchor = this.getMessage({
      messageId: checkpoint.lastMessageId,
      chatId: checkpoint.lastChatId
    });
    if (!anchor) {
      return `checkpoint references missing message ${checkpoint.lastMessageId}@${checkpoint.lastChatId}`;
    }
    if (!anchor.processed) {
      return `checkpoint references unprocessed message ${checkpoint.lastMessageId}@${checkpoint.lastChatId}`;
    }

    // Late arrivals move the checkpoint back in time, so the bound is the newest message of
    // any committed batch. Databases upgraded without a summary log fall back to the checkpoint.
    const newerCount = this.guard("checkpointDivergence", () => {
      const row = this.db
        .prepare<[], HighWaterRow>("SELECT MAX(last_timestamp) AS highWater FROM summaries")
        .get();
      const bound = row?.highWater ?? checkpoint.lastTimestamp;
      return (
        this.db
          .prepare<[string], CountRow>(
            "SELECT COUNT(*) AS count FROM messages WHERE processed = 1 AND timestamp > ?"
          )
          .get(bound)?.count ?? 0
      );
    });
    return newerCount > 0
      ? `${newerCount} processed messages are newer than any summarized batch`
      : null;
  }

  listMessages(limit?: number): StoredMessage[] {
    return this.guard("listMessages", () => {
      const order = "ORDER BY timestamp DESC, message_id DESC, chat_id DESC";
      const rows =
        limit === undefined
          ? this.db
              .prepare<[], MessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM messages ${order}`)
              .all()
          : this.db
              .prepare<[number], MessageRow>(
                `SELECT ${MESSAGE_COLUMNS} FROM messages ${order} LIMIT ?`
              )
              .all(limit);
      return rows.map(toMessage);
    });
  }

  getStatistics(): MessageStatistics {
    return this.guard("getStatistics", () => {
      const row = this.db
        .prepare<[], { channels: number; chats: number; processed: number; not_processed: number }>(
          `SELECT
             COUNT(DISTINCT CASE WHEN kind = 'Channel' THEN chat_id END) AS channels,
             COUNT(DISTINCT CASE WHEN kind = 'Chat' THEN chat_id END) AS chats,
             COALESCE(SUM(CASE WHEN processed = 1 THEN 1 ELSE 0 END), 0) AS processed,
             COALESCE(SUM(CASE WHEN processed = 0 THEN 1 ELSE 0 END), 0) AS not_processed
           FROM messages`
        )
        .get();
      return {
        channels: row?.channels ?? 0,
        chats: row?.chats ?? 0,
        processed: row?.processed ?? 0,
        notProcessed: row?.not_processed ?? 0
      };
    });
  }

  lastSummaryTimestamp(): string | null {
    return this.guard("lastSummaryTimestamp", () => {
      const row = this.db
        .prepare<[], { timestamp: string }>(
          "SELECT timestamp FROM messages WHERE processed = 1 ORDER BY timestamp DESC LIMIT 1"
        )
        .get();
      return row?.timestamp ?? null;
    });
  }

  listSummaries(limit = 20): SummaryRecord[] {
    return this.guard("listSummaries", () =>
      this.db
        .prepare<[number], SummaryRow>(
          `SELECT id, created_at, message_count, chat_count, first_timestamp, last_timestamp, content
           FROM summaries ORDER BY id DESC LIMIT ?`
        )
        .all(limit)
        .map(toSummary)
    );
  }

  listMigrationHistory(): AppliedMigration[] {
    return this.guard("listMigrationHistory", () => listAppliedMigrations(this.db));
  }

  private markKeys(keys: MessageKey[]) {
    const update = this.db.prepare(
      "UPDATE messages SET processed = 1 WHERE message_id = ? AND chat_id = ? AND processed = 0"
    );
    let marked = 0;
    for (const key of keys) {
      marked += update.run(key.messageId, key.chatId).changes;
    }
    return marked;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(operation, error);
    }
  }
}
