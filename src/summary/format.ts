import type { StoredMessage } from "../types.js";

export const DEFAULT_MAX_PROMPT_CHARS = 10_000;
export const DEFAULT_MAX_MESSAGE_CHARS = 300;
export const MESSAGE_ELLIPSIS = "...";
export const PROMPT_TRUNCATED_MARKER = "\n\n[... content truncated ...]";

export type FormatOptions = {
  maxPromptChars?: number;
  maxMessageChars?: number;
};

type ChatGroup = {
  chatId: number;
  messages: StoredMessage[];
};

const groupByChat = (messages: StoredMessage[]): ChatGroup[] => {
  const groups = new Map<number, ChatGroup>();
  for (const message of messages) {
    const group = groups.get(message.chatId) ?? { chatId: message.chatId, messages: [] };
    group.messages.push(message);
    groups.set(message.chatId, group);
  }
  return [...groups.values()];
};

const chatLabel = (group: ChatGroup) => {
  const named = group.messages.find((message) => message.sender?.trim());
  return named?.sender?.trim() || `Chat ${group.chatId}`;
};

// Limits count code points so astral characters are never split into lone surrogates.
const takeCodePoints = (text: string, maxChars: number) => {
  if (text.length <= maxChars) {
    return null;
  }
  const points = Array.from(text);
  return points.length > maxChars ? points.slice(0, maxChars).join("") : null;
};

const clip = (text: string, maxChars: number) => {
  const head = takeCodePoints(text, maxChars);
  return head === null ? text : `${head}${MESSAGE_ELLIPSIS}`;
};

export const renderChatSection = (group: ChatGroup, maxMessageChars: number) => {
  const lines = [`\n--- ${chatLabel(group)} (chat ID: ${group.chatId}) ---`];
  for (const message of group.messages) {
    const text = message.text?.trim() ?? "";
    if (!text) {
      continue;
    }
    const sender = message.sender?.trim() || "Unknown";
    lines.push(`${sender}: ${clip(text, maxMessageChars)}`);
  }
  return lines;
};

/**
 * Renders a backlog into one prompt body.
 *
 * Returns "" when no message carries text; callers treat that as nothing to summarize.
 * Output longer than `maxPromptChars` is cut and always ends with
 * {@link PROMPT_TRUNCATED_MARKER}.
 */
export const formatBatch = (messages: StoredMessage[], options: FormatOptions = {}) => {
  const maxPromptChars = options.maxPromptChars ?? DEFAULT_MAX_PROMPT_CHARS;
  const maxMessageChars = options.maxMessageChars ?? DEFAULT_MAX_MESSAGE_CHARS;

  if (!messages.some((message) => message.text?.trim())) {
    return "";
  }

  const groups = groupByChat(messages);
  const lines = [`Messages from ${groups.length} chats:`];
  for (const group of groups) {
    lines.push(...renderChatSection(group, maxMessageChars));
  }

  const text = lines.join("\n");
  const head = takeCodePoints(text, maxPromptChars);
  return head === null ? text : `${head}${PROMPT_TRUNCATED_MARKER}`;
};
