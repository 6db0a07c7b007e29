import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {
  MIGRATIONS,
  listAppliedMigrations,
  runMigrations,
  tableColumns
} from "../src/storage/migrations.js";
import { SqliteStorage } from "../src/storage/sqlite.js";
import { createTempDir } from "./test-utils.js";

const withLegacyDatabase = (
  seed: (db: Database.Database) => void,
  check: (storage: SqliteStorage, dbPath: string) => void
) => {
  const dir = createTempDir();
  const dbPath = path.join(dir, "legacy.db");
  const legacy = new Database(dbPath);
  seed(legacy);
  legacy.close();

  const storage = new SqliteStorage(dbPath);
  try {
    check(storage, dbPath);
  } finally {
    storage.close();
    fs.rmSync(dir, { recursive: true, force: true });
  }
};

test("runMigrations applies every migration once and is a no-op afterwards", () => {
  const db = new Database(":memory:");
  try {
    const first = runMigrations(db);
    assert.deepEqual(
      first.map((entry) => entry.name),
      MIGRATIONS.map((migration) => migration.name)
    );
    assert.deepEqual(runMigrations(db), []);
    assert.equal(listAppliedMigrations(db).length, MIGRATIONS.length);
  } finally {
    db.close();
  }
});

test("a failing migration is rolled back together with its history entry", () => {
  const db = new Database(":memory:");
  try {
    assert.throws(() =>
      runMigrations(db, [
        {
          version: 1,
          name: "broken",
          up: (target) => {
            target.exec("CREATE TABLE partial (id INTEGER)");
            throw new Error("boom");
          }
        }
      ])
    );
    assert.deepEqual(listAppliedMigrations(db), []);
    assert.equal(
      db.prepare("SELECT name FROM sqlite_master WHERE name = 'partial'").get(),
      undefined
    );
  } finally {
    db.close();
  }
});

test("a legacy table without the processed flag is upgraded with rows back-filled 0", () => {
  withLegacyDatabase(
    (db) => {
      db.exec(`
        CREATE TABLE messages (
          message_id INTEGER NOT NULL,
          chat_id INTEGER NOT NULL,
          sender TEXT,
          kind TEXT,
          text TEXT,
          timestamp TEXT NOT NULL,
          PRIMARY KEY (message_id, chat_id)
        )
      `);
      const insert = db.prepare(
        "INSERT INTO messages (message_id, chat_id, sender, kind, text, timestamp) VALUES (?, ?, ?, ?, ?, ?)"
      );
      insert.run(1, 10, "Alice", "Chat", "hello", "2024-01-15T09:00:00.000Z");
      insert.run(2, 10, "Bob", "Chat", "hi", "2024-01-15T09:01:00.000Z");
    },
    (storage) => {
      assert.equal(storage.migrationsApplied.length, MIGRATIONS.length);
      const backlog = storage.fetchUnprocessed();
      assert.deepEqual(
        backlog.map((row) => [row.messageId, row.processed]),
        [
          [1, false],
          [2, false]
        ]
      );
    }
  );
});

test("an id-keyed legacy table is rebuilt into composite keys", () => {
  withLegacyDatabase(
    (db) => {
      db.exec(`
        CREATE TABLE messages (
          id INTEGER PRIMARY KEY,
          chat_id INTEGER,
          sender TEXT,
          type TEXT,
          text TEXT,
          date TEXT,
          is_summarised INTEGER DEFAULT 0
        )
      `);
      const insert = db.prepare(
        "INSERT INTO messages (id, chat_id, sender, type, text, date, is_summarised) VALUES (?, ?, ?, ?, ?, ?, ?)"
      );
      insert.run(1, 10, "News", "Channel", "release notes", "2024-01-15 09:00:00", 1);
      insert.run(2, 20, "Carol", "Chat", "lunch?", "2024-01-15T10:00:00+03:00", 0);
    },
    (storage, dbPath) => {
      const first = storage.getMessage({ messageId: 1, chatId: 10 });
      assert.equal(first?.kind, "Channel");
      assert.equal(first?.timestamp, "2024-01-15T09:00:00.000Z");
      assert.equal(first?.processed, true);

      const second = storage.getMessage({ messageId: 2, chatId: 20 });
      assert.equal(second?.kind, "Chat");
      assert.equal(second?.timestamp, "2024-01-15T07:00:00.000Z");
      assert.equal(second?.processed, false);

      assert.equal(storage.insertMessage({
        messageId: 1,
        chatId: 20,
        sender: null,
        kind: "Chat",
        text: "same id, other chat",
        timestamp: "2024-01-15T11:00:00.000Z"
      }), true);

      const inspect = new Database(dbPath, { readonly: true });
      try {
        const primaryKey = tableColumns(inspect, "messages")
          .filter((column) => column.pk > 0)
          .map((column) => column.name);
        assert.deepEqual(primaryKey, ["message_id", "chat_id"]);
      } finally {
        inspect.close();
      }
    }
  );
});

test("the checkpoint is seeded from a legacy summary_state row", () => {
  withLegacyDatabase(
    (db) => {
      db.exec(`
        CREATE TABLE summary_state (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          last_processed_date TEXT,
          last_processed_id INTEGER,
          last_processed_chat_id INTEGER
        )
      `);
      db.prepare(
        "INSERT INTO summary_state (last_processed_date, last_processed_id, last_processed_chat_id) VALUES (?, ?, ?)"
      ).run("2024-01-15 09:00:00", 7, 10);
    },
    (storage) => {
      const checkpoint = storage.getCheckpoint();
      assert.equal(checkpoint.lastTimestamp, "2024-01-15T09:00:00.000Z");
      assert.equal(checkpoint.lastMessageId, 7);
      assert.equal(checkpoint.lastChatId, 10);
    }
  );
});

test("reopening a migrated database applies nothing new", () => {
  withLegacyDatabase(
    () => {},
    (storage, dbPath) => {
      assert.equal(storage.migrationsApplied.length, MIGRATIONS.length);
      const reopened = new SqliteStorage(dbPath);
      try {
        assert.deepEqual(reopened.migrationsApplied, []);
        assert.deepEqual(
          reopened.listMigrationHistory().map((entry) => entry.version),
          [1, 2, 3, 4, 5]
        );
      } finally {
        reopened.close();
      }
    }
  );
});
