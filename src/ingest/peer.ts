import { z } from "zod";
import { IngestError } from "../errors.js";
import type { MessageKind, Peer } from "../types.js";

const PeerId = z.number().int();

// Accepts the tagged form `{ type, id }` and the untagged client shapes
// `{ channelId }`, `{ chatId }` and `{ userId }`.
const RawPeerSchema = z.object({
  type: z.enum(["channel", "chat", "user"]).optional(),
  id: PeerId.optional(),
  channelId: PeerId.optional(),
  chatId: PeerId.optional(),
  userId: PeerId.optional()
});

export const resolvePeer = (raw: unknown): Peer => {
  const parsed = RawPeerSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IngestError(`Invalid peer: ${parsed.error.message}`);
  }
  const peer = parsed.data;
  if (peer.type && peer.id !== undefined) {
    return { type: peer.type, id: peer.id };
  }
  if (peer.channelId !== undefined) {
    return { type: "channel", id: peer.channelId };
  }
  if (peer.chatId !== undefined) {
    return { type: "chat", id: peer.chatId };
  }
  if (peer.userId !== undefined) {
    return { type: "user", id: peer.userId };
  }
  throw new IngestError("Invalid peer: expected { type, id }, channelId, chatId or userId");
};

export const peerMessageKind = (peer: Peer): MessageKind =>
  peer.type === "channel" ? "Channel" : "Chat";
