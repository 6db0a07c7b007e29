import test from "node:test";
import assert from "node:assert/strict";
import { StoreError } from "../src/errors.js";
import { EPOCH_ISO } from "../src/util/time.js";
import { createStorageFixture, message } from "./test-utils.js";

test("insertMessage is idempotent per (messageId, chatId)", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    assert.equal(storage.insertMessage(message({ messageId: 1, text: "first" })), true);
    assert.equal(storage.insertMessage(message({ messageId: 1, text: "second" })), false);
    assert.equal(storage.insertMessage(message({ messageId: 1, chatId: 200 })), true);

    assert.equal(storage.countMessages(), 2);
    assert.equal(storage.countMessages(100), 1);
    assert.equal(storage.getMessage({ messageId: 1, chatId: 100 })?.text, "first");
  } finally {
    fixture.cleanup();
  }
});

test("fetchUnprocessed orders by timestamp, then message id, then chat id", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    storage.insertMessage(message({ messageId: 5, chatId: 2, timestamp: "2024-01-15T10:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 5, chatId: 1, timestamp: "2024-01-15T10:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 3, chatId: 9, timestamp: "2024-01-15T10:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 9, chatId: 9, timestamp: "2024-01-15T08:00:00.000Z" }));

    const order = storage.fetchUnprocessed().map((row) => `${row.messageId}@${row.chatId}`);
    assert.deepEqual(order, ["9@9", "3@9", "5@1", "5@2"]);
  } finally {
    fixture.cleanup();
  }
});

test("markProcessed counts only rows that flip", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    storage.insertMessage(message({ messageId: 1 }));
    storage.insertMessage(message({ messageId: 2 }));

    assert.equal(storage.markProcessed([{ messageId: 1, chatId: 100 }]), 1);
    assert.equal(
      storage.markProcessed([
        { messageId: 1, chatId: 100 },
        { messageId: 2, chatId: 100 },
        { messageId: 3, chatId: 100 }
      ]),
      1
    );
    assert.equal(storage.fetchUnprocessed().length, 0);
  } finally {
    fixture.cleanup();
  }
});

test("checkpoint starts at epoch defaults", () => {
  const fixture = createStorageFixture();
  try {
    const checkpoint = fixture.storage.getCheckpoint();
    assert.equal(checkpoint.lastTimestamp, EPOCH_ISO);
    assert.equal(checkpoint.lastMessageId, 0);
    assert.equal(checkpoint.lastChatId, 0);
    assert.equal(fixture.storage.checkpointDivergence(), null);
  } finally {
    fixture.cleanup();
  }
});

test("commitBatch marks keys, advances the checkpoint and records the summary together", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    storage.insertMessage(message({ messageId: 1, timestamp: "2024-01-15T09:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 2, timestamp: "2024-01-15T09:05:00.000Z" }));
    storage.insertMessage(message({ messageId: 3, timestamp: "2024-01-15T09:10:00.000Z" }));

    const result = storage.commitBatch({
      keys: [
        { messageId: 1, chatId: 100 },
        { messageId: 2, chatId: 100 }
      ],
      last: { messageId: 2, chatId: 100, timestamp: "2024-01-15T09:05:00.000Z" },
      summary: {
        messageCount: 2,
        chatCount: 1,
        firstTimestamp: "2024-01-15T09:00:00.000Z",
        lastTimestamp: "2024-01-15T09:05:00.000Z",
        content: "two messages"
      }
    });

    assert.equal(result.marked, 2);
    assert.equal(result.checkpoint.lastMessageId, 2);
    assert.deepEqual(
      storage.fetchUnprocessed().map((row) => row.messageId),
      [3]
    );

    const checkpoint = storage.getCheckpoint();
    assert.equal(checkpoint.lastTimestamp, "2024-01-15T09:05:00.000Z");
    assert.equal(checkpoint.lastChatId, 100);

    const summaries = storage.listSummaries();
    assert.equal(summaries.length, 1);
    assert.equal(summaries[0]?.id, result.summaryId);
    assert.equal(summaries[0]?.content, "two messages");
    assert.equal(summaries[0]?.messageCount, 2);

    assert.equal(storage.lastSummaryTimestamp(), "2024-01-15T09:05:00.000Z");
    assert.equal(storage.checkpointDivergence(), null);
  } finally {
    fixture.cleanup();
  }
});

test("checkpointDivergence flags processed rows newer than any summarized batch", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    storage.insertMessage(message({ messageId: 1, timestamp: "2024-01-15T09:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 2, timestamp: "2024-01-15T09:30:00.000Z" }));

    storage.markProcessed([{ messageId: 1, chatId: 100 }]);
    assert.equal(
      storage.checkpointDivergence(),
      "checkpoint is unset but 1 messages are processed"
    );

    storage.commitBatch({
      keys: [{ messageId: 1, chatId: 100 }],
      last: { messageId: 1, chatId: 100, timestamp: "2024-01-15T09:00:00.000Z" },
      summary: {
        messageCount: 1,
        chatCount: 1,
        firstTimestamp: "2024-01-15T09:00:00.000Z",
        lastTimestamp: "2024-01-15T09:00:00.000Z",
        content: "one"
      }
    });
    storage.markProcessed([{ messageId: 2, chatId: 100 }]);
    assert.equal(
      storage.checkpointDivergence(),
      "1 processed messages are newer than any summarized batch"
    );
  } finally {
    fixture.cleanup();
  }
});

test("checkpointDivergence accepts a late message summarized after newer ones", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    const commitOne = (messageId: number, timestamp: string) =>
      storage.commitBatch({
        keys: [{ messageId, chatId: 100 }],
        last: { messageId, chatId: 100, timestamp },
        summary: {
          messageCount: 1,
          chatCount: 1,
          firstTimestamp: timestamp,
          lastTimestamp: timestamp,
          content: `batch ${messageId}`
        }
      });

    storage.insertMessage(message({ messageId: 1, timestamp: "2024-01-15T10:00:00.000Z" }));
    commitOne(1, "2024-01-15T10:00:00.000Z");
    storage.insertMessage(message({ messageId: 2, timestamp: "2024-01-15T09:00:00.000Z" }));
    commitOne(2, "2024-01-15T09:00:00.000Z");

    assert.equal(storage.getCheckpoint().lastTimestamp, "2024-01-15T09:00:00.000Z");
    assert.equal(storage.checkpointDivergence(), null);
  } finally {
    fixture.cleanup();
  }
});

test("getStatistics counts distinct channels and chats separately", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    storage.insertMessage(message({ messageId: 1, chatId: 10, kind: "Channel" }));
    storage.insertMessage(message({ messageId: 2, chatId: 10, kind: "Channel" }));
    storage.insertMessage(message({ messageId: 1, chatId: 20, kind: "Chat" }));
    storage.insertMessage(message({ messageId: 1, chatId: 30, kind: "Chat" }));
    storage.markProcessed([{ messageId: 1, chatId: 10 }]);

    assert.deepEqual(storage.getStatistics(), {
      channels: 1,
      chats: 2,
      processed: 1,
      notProcessed: 3
    });
  } finally {
    fixture.cleanup();
  }
});

test("listMessages returns newest first and honours the limit", () => {
  const fixture = createStorageFixture();
  try {
    const { storage } = fixture;
    storage.insertMessage(message({ messageId: 1, timestamp: "2024-01-15T09:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 2, timestamp: "2024-01-15T11:00:00.000Z" }));
    storage.insertMessage(message({ messageId: 3, timestamp: "2024-01-15T10:00:00.000Z" }));

    assert.deepEqual(
      storage.listMessages().map((row) => row.messageId),
      [2, 3, 1]
    );
    assert.deepEqual(
      storage.listMessages(2).map((row) => row.messageId),
      [2, 3]
    );
  } finally {
    fixture.cleanup();
  }
});

test("lastSummaryTimestamp is null until something is processed", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.insertMessage(message({ messageId: 1 }));
    assert.equal(fixture.storage.lastSummaryTimestamp(), null);
  } finally {
    fixture.cleanup();
  }
});

test("operations on a closed store raise StoreError with the operation name", () => {
  const fixture = createStorageFixture();
  try {
    fixture.storage.close();
    assert.throws(
      () => fixture.storage.countMessages(),
      (error: unknown) => error instanceof StoreError && error.operation === "countMessages"
    );
  } finally {
    fixture.cleanup();
  }
});
