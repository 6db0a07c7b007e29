import type { SqliteStorage } from "../storage/sqlite.js";
import type { MessageKey, StoredMessage } from "../types.js";

export type BacklogSource = Pick<SqliteStorage, "fetchUnprocessed">;

export type BacklogOverview = {
  count: number;
  chatCount: number;
  perChat: Record<string, number>;
  first: StoredMessage | null;
  last: StoredMessage | null;
};

/**
 * Unprocessed messages, oldest first by (timestamp, messageId, chatId).
 * The result is read in a single statement and is the snapshot for one run.
 */
export const selectBacklog = (source: BacklogSource): StoredMessage[] =>
  source.fetchUnprocessed();

export const backlogKeys = (messages: StoredMessage[]): MessageKey[] =>
  messages.map((message) => ({ messageId: message.messageId, chatId: message.chatId }));

export const describeBacklog = (messages: StoredMessage[]): BacklogOverview => {
  const perChat: Record<string, number> = {};
  for (const message of messages) {
    const key = String(message.chatId);
    perChat[key] = (perChat[key] ?? 0) + 1;
  }
  return {
    count: messages.length,
    chatCount: Object.keys(perChat).length,
    perChat,
    first: messages[0] ?? null,
    last: messages.at(-1) ?? null
  };
};
