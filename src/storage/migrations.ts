import type Database from "better-sqlite3";
import { EPOCH_ISO, nowIso, parseTimestamp } from "../util/time.js";

export type Migration = {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
};

export type AppliedMigration = {
  version: number;
  name: string;
  appliedAt: string;
};

type ColumnInfo = { name: string; pk: number };

type LegacyMessageRow = {
  id: number;
  chat_id: number;
  sender: string | null;
  kind: string | null;
  text: string | null;
  date: unknown;
  summarised: number | null;
};

type LegacyStateRow = {
  last_processed_date: unknown;
  last_processed_id: number | null;
  last_processed_chat_id: number | null;
};

export const tableExists = (db: Database.Database, table: string) =>
  db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
    )
    .get(table) !== undefined;

export const tableColumns = (db: Database.Database, table: string) =>
  db.prepare<[], ColumnInfo>(`PRAGMA table_info(${table})`).all();

const hasColumn = (db: Database.Database, table: string, column: string) =>
  tableColumns(db, table).some((info) => info.name === column);

const normalizeLegacyTimestamp = (value: unknown) => {
  if (typeof value !== "string" && typeof value !== "number") {
    return EPOCH_ISO;
  }
  try {
    return parseTimestamp(value);
  } catch {
    return EPOCH_ISO;
  }
};

const CREATE_MESSAGES = (table: string) => `
  CREATE TABLE ${table} (
    message_id INTEGER NOT NULL,
    chat_id INTEGER NOT NULL,
    sender TEXT,
    kind TEXT NOT NULL DEFAULT 'Chat' CHECK (kind IN ('Channel', 'Chat')),
    text TEXT,
    timestamp TEXT NOT NULL,
    PRIMARY KEY (message_id, chat_id)
  )
`;

// Tables written by the first collector used `id`/`date`/`type` columns, sometimes with
// `id` as the sole primary key. They are rebuilt into the composite-key layout.
const rebuildLegacyMessages = (db: Database.Database) => {
  const legacyColumns = new Set(tableColumns(db, "messages").map((info) => info.name));
  const kindColumn = legacyColumns.has("type") ? "type" : "NULL";
  const dateColumn = legacyColumns.has("date") ? "date" : "NULL";
  const summarisedColumn = legacyColumns.has("is_summarised") ? "is_summarised" : "NULL";

  db.exec(CREATE_MESSAGES("messages_rebuild"));
  if (summarisedColumn !== "NULL") {
    db.exec("ALTER TABLE messages_rebuild ADD COLUMN processed INTEGER NOT NULL DEFAULT 0");
  }

  const rows = db
    .prepare<[], LegacyMessageRow>(
      `SELECT id, chat_id, sender, ${kindColumn} AS kind, text, ${dateColumn} AS date,
              ${summarisedColumn} AS summarised
       FROM messages ORDER BY rowid ASC`
    )
    .all();
  const insert = db.prepare(
    summarisedColumn !== "NULL"
      ? `INSERT INTO messages_rebuild (message_id, chat_id, sender, kind, text, timestamp, processed)
         VALUES (?, ?, ?, ?, ?, ?, ?) ON CONFLICT (message_id, chat_id) DO NOTHING`
      : `INSERT INTO messages_rebuild (message_id, chat_id, sender, kind, text, timestamp)
         VALUES (?, ?, ?, ?, ?, ?) ON CONFLICT (message_id, chat_id) DO NOTHING`
  );
  for (const row of rows) {
    const values = [
      row.id,
      row.chat_id,
      row.sender,
      row.kind === "Channel" ? "Channel" : "Chat",
      row.text,
      normalizeLegacyTimestamp(row.date)
    ];
    insert.run(...(summarisedColumn !== "NULL" ? [...values, row.summarised === 1 ? 1 : 0] : values));
  }

  db.exec("DROP TABLE messages");
  db.exec("ALTER TABLE messages_rebuild RENAME TO messages");
};

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: "messages",
    up: (db) => {
      if (!tableExists(db, "messages")) {
        db.exec(CREATE_MESSAGES("messages"));
        return;
      }
      if (!hasColumn(db, "messages", "message_id")) {
        rebuildLegacyMessages(db);
      }
    }
  },
  {
    version: 2,
    name: "processed_flag",
    up: (db) => {
      if (hasColumn(db, "messages", "processed")) {
        return;
      }
      db.exec("ALTER TABLE messages ADD COLUMN processed INTEGER NOT NULL DEFAULT 0");
    }
  },
  {
    version: 3,
    name: "message_indexes",
    up: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_messages_chat_id ON messages(chat_id);
        CREATE INDEX IF NOT EXISTS idx_messages_timestamp ON messages(timestamp);
        CREATE INDEX IF NOT EXISTS idx_messages_backlog
          ON messages(processed, timestamp, message_id, chat_id);
      `);
    }
  },
  {
    version: 4,
    name: "checkpoint",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS checkpoint (
          id INTEGER PRIMARY KEY CHECK (id = 1),
          last_timestamp TEXT NOT NULL,
          last_message_id INTEGER NOT NULL,
          last_chat_id INTEGER NOT NULL,
          updated_at TEXT NOT NULL
        )
      `);
      let seed = { timestamp: EPOCH_ISO, messageId: 0, chatId: 0 };
      if (tableExists(db, "summary_state")) {
        const legacy = db
          .prepare<[], LegacyStateRow>(
            `SELECT last_processed_date, last_processed_id, last_processed_chat_id
             FROM summary_state ORDER BY id DESC LIMIT 1`
          )
          .get();
        if (legacy) {
          seed = {
            timestamp: normalizeLegacyTimestamp(legacy.last_processed_date),
            messageId: legacy.last_processed_id ?? 0,
            chatId: legacy.last_processed_chat_id ?? 0
          };
        }
      }
      db.prepare(
        `INSERT OR IGNORE INTO checkpoint (id, last_timestamp, last_message_id, last_chat_id, updated_at)
         VALUES (1, ?, ?, ?, ?)`
      ).run(seed.timestamp, seed.messageId, seed.chatId, nowIso());
    }
  },
  {
    version: 5,
    name: "summaries",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS summaries (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          created_at TEXT NOT NULL,
          message_count INTEGER NOT NULL,
          chat_count INTEGER NOT NULL,
          first_timestamp TEXT NOT NULL,
          last_timestamp TEXT NOT NULL,
          content TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_summaries_created_at ON summaries(created_at);
      `);
    }
  }
];

const ensureHistoryTable = (db: Database.Database) => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);
};

export const listAppliedMigrations = (db: Database.Database): AppliedMigration[] => {
  ensureHistoryTable(db);
  return db
    .prepare<[], AppliedMigration>(
      `SELECT version, name, applied_at AS appliedAt
       FROM schema_migrations ORDER BY version ASC`
    )
    .all();
};

export const runMigrations = (
  db: Database.Database,
  migrations: Migration[] = MIGRATIONS
): AppliedMigration[] => {
  const applied = new Set(listAppliedMigrations(db).map((entry) => entry.version));
  const record = db.prepare(
    "INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)"
  );
  const ran: AppliedMigration[] = [];

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (applied.has(migration.version)) {
      continue;
    }
    const appliedAt = nowIso();
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name, appliedAt);
    })();
    ran.push({ version: migration.version, name: migration.name, appliedAt });
  }

  return ran;
};
