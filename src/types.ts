export type MessageKind = "Channel" | "Chat";

export type PeerKind = "channel" | "chat" | "user";

export type Peer = {
  type: PeerKind;
  id: number;
};

export type MessageKey = {
  messageId: number;
  chatId: number;
};

export type NewMessage = MessageKey & {
  sender: string | null;
  kind: MessageKind;
  text: string | null;
  timestamp: string;
};

export type StoredMessage = NewMessage & {
  processed: boolean;
};

export type Checkpoint = {
  lastTimestamp: string;
  lastMessageId: number;
  lastChatId: number;
  updatedAt: string;
};

export type MessageStatistics = {
  channels: number;
  chats: number;
  processed: number;
  notProcessed: number;
};

export type SummaryRecord = {
  id: number;
  createdAt: string;
  messageCount: number;
  chatCount: number;
  firstTimestamp: string;
  lastTimestamp: string;
  content: string;
};

export type NewSummary = Omit<SummaryRecord, "id" | "createdAt">;

export type OutboundMessage = {
  id: string;
  chatId: string;
  content: string;
  createdAt: string;
};

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};
