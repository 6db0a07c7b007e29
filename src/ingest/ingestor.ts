import { z } from "zod";
import type { Logger } from "pino";
import { IngestError, errorMessage } from "../errors.js";
import type { DigestTelemetry } from "../observability/telemetry.js";
import type { SqliteStorage } from "../storage/sqlite.js";
import type { MessageKey, NewMessage } from "../types.js";
import { parseTimestamp } from "../util/time.js";
import { peerMessageKind, resolvePeer } from "./peer.js";

export const IngestPayloadSchema = z.object({
  messageId: z.number().int().nonnegative(),
  chatId: z.number().int().optional(),
  sender: z.string().nullish(),
  peer: z.unknown(),
  text: z.string().nullish(),
  timestamp: z.union([z.string().min(1), z.number()])
});

export type IngestPayload = z.infer<typeof IngestPayloadSchema>;

/**
 * Validates one ingestion payload and resolves its peer kind and timestamp.
 * Everything downstream sees only the normalized {@link NewMessage}.
 */
export const normalizeIngestPayload = (raw: unknown): NewMessage => {
  const parsed = IngestPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IngestError(`Invalid message payload: ${parsed.error.message}`);
  }
  const payload = parsed.data;
  const peer = resolvePeer(payload.peer);

  let timestamp: string;
  try {
    timestamp = parseTimestamp(payload.timestamp);
  } catch (error) {
    throw new IngestError(errorMessage(error));
  }

  return {
    messageId: payload.messageId,
    chatId: payload.chatId ?? peer.id,
    sender: payload.sender?.trim() || null,
    kind: peerMessageKind(peer),
    text: payload.text ?? null,
    timestamp
  };
};

export const normalizeIngestBody = (body: unknown): NewMessage[] => {
  const items = Array.isArray(body) ? body : [body];
  return items.map((item, index) => {
    try {
      return normalizeIngestPayload(item);
    } catch (error) {
      throw new IngestError(
        items.length > 1 ? `Item ${index}: ${errorMessage(error)}` : errorMessage(error)
      );
    }
  });
};

export type IngestResult = {
  key: MessageKey;
  inserted: boolean;
};

export class MessageIngestor {
  constructor(
    private store: Pick<SqliteStorage, "insertMessage">,
    private logger: Logger,
    private telemetry?: DigestTelemetry
  ) {}

  ingest(message: NewMessage): IngestResult {
    const key = { messageId: message.messageId, chatId: message.chatId };
    const inserted = this.store.insertMessage(message);
    this.telemetry?.recordIngest(inserted ? "inserted" : "duplicate");
    if (inserted) {
      this.logger.debug({ ...key, kind: message.kind }, "message stored");
    } else {
      this.logger.debug(key, "duplicate message ignored");
    }
    return { key, inserted };
  }

  ingestRaw(raw: unknown): IngestResult {
    try {
      return this.ingest(normalizeIngestPayload(raw));
    } catch (error) {
      if (error instanceof IngestError) {
        this.telemetry?.recordIngest("rejected");
      }
      throw error;
    }
  }

  ingestMany(raws: unknown[]) {
    const rejected: Array<{ index: number; error: string }> = [];
    const summary = { inserted: 0, duplicates: 0, rejected };
    raws.forEach((raw, index) => {
      try {
        const result = this.ingestRaw(raw);
        if (result.inserted) {
          summary.inserted += 1;
        } else {
          summary.duplicates += 1;
        }
      } catch (error) {
        if (!(error instanceof IngestError)) {
          throw error;
        }
        summary.rejected.push({ index, error: error.message });
      }
    });
    return summary;
  }

  /**
   * Stores an already validated batch before returning, so a caller that acknowledges the
   * result never acknowledges a message the store did not take. A `StoreError` propagates.
   */
  ingestBatch(messages: NewMessage[]) {
    let inserted = 0;
    for (const message of messages) {
      if (this.ingest(message).inserted) {
        inserted += 1;
      }
    }
    return { inserted, duplicates: messages.length - inserted };
  }
}
