import http from "node:http";
import type { Logger } from "pino";
import type { Config } from "../config/schema.js";
import { IngestError, StoreError, errorMessage } from "../errors.js";
import { normalizeIngestBody, type MessageIngestor } from "../ingest/ingestor.js";
import { newId } from "../util/ids.js";
import {
  bearerToken,
  closeServer,
  json,
  listen,
  readJsonBody,
  sendJson,
  toRouteRequest,
  type JsonResponse,
  type RouteRequest
} from "../util/http.js";
import type { Channel } from "./base.js";

type OutboundEnvelope = {
  id: string;
  chatId: string;
  content: string;
  createdAt: string;
};

export type InboundSink = Pick<MessageIngestor, "ingestBatch">;

/**
 * HTTP entry point for chat collectors. `POST {path}` accepts one message payload or an
 * array of them and answers only after the store has taken them;
 * `GET {path}/outbound?chatId=` drains delivered summaries.
 */
export class WebhookChannel implements Channel {
  readonly name = "webhook";
  private logger: Logger | null = null;
  private server: http.Server | null = null;
  private outbox = new Map<string, OutboundEnvelope[]>();
  private outboxTouchedAtMs = new Map<string, number>();

  constructor(
    private config: Pick<Config, "webhook">,
    private sink: InboundSink,
    private now: () => number = Date.now
  ) {}

  get address() {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  async start(logger: Logger) {
    this.logger = logger;
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      void this.handle(req, res);
    });
    this.server = server;
    await listen(server, this.config.webhook.port, this.config.webhook.host);
    logger.info(
      {
        host: this.config.webhook.host,
        port: this.address?.port ?? this.config.webhook.port,
        path: this.inboundPath()
      },
      "webhook channel listening"
    );
  }

  async stop() {
    if (!this.server) {
      return;
    }
    const server = this.server;
    this.server = null;
    await closeServer(server);
    this.outbox.clear();
    this.outboxTouchedAtMs.clear();
  }

  async send(payload: { chatId: string; content: string }) {
    const nowMs = this.now();
    this.pruneOutbox(nowMs);

    const queue = this.outbox.get(payload.chatId) ?? [];
    queue.push({
      id: newId(),
      chatId: payload.chatId,
      content: payload.content,
      createdAt: new Date(nowMs).toISOString()
    });
    if (queue.length > this.config.webhook.outboxMaxPerChat) {
      queue.splice(0, queue.length - this.config.webhook.outboxMaxPerChat);
    }
    this.outbox.set(payload.chatId, queue);
    this.outboxTouchedAtMs.set(payload.chatId, nowMs);
    this.pruneOutbox(nowMs);
  }

  route(request: RouteRequest): JsonResponse {
    if (!this.authorized(request)) {
      return json(401, { error: "Unauthorized" });
    }

    const inboundPath = this.inboundPath();
    const outboundPath = `${inboundPath.replace(/\/$/, "")}/outbound`;
    const { method, url } = request;

    if (method === "POST" && url.pathname === inboundPath) {
      return this.handleInbound(request.body);
    }
    if (method === "GET" && url.pathname === outboundPath) {
      return this.handleOutboundPull(url);
    }
    if (method === "GET" && url.pathname === inboundPath) {
      return json(200, { status: "ok", channel: this.name });
    }
    return json(404, { error: "Not found" });
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse) {
    const request = toRouteRequest(req);
    try {
      if (request.method === "POST" && this.authorized(request)) {
        const body = await readJsonBody(req, this.config.webhook.maxBodyBytes);
        if (!body.ok) {
          sendJson(res, body.response);
          return;
        }
        request.body = body.body;
      }
      sendJson(res, this.route(request));
    } catch (error) {
      this.logger?.error({ error: errorMessage(error) }, "webhook request failed");
      sendJson(res, json(500, { error: "Internal error" }));
    }
  }

  private inboundPath() {
    const pathValue = this.config.webhook.path;
    const withPrefix = pathValue.startsWith("/") ? pathValue : `/${pathValue}`;
    return withPrefix.length > 1 && withPrefix.endsWith("/")
      ? withPrefix.slice(0, -1)
      : withPrefix;
  }

  private authorized(request: RouteRequest) {
    const expected = this.config.webhook.authToken;
    if (!expected) {
      return true;
    }
    return bearerToken(request.headers, "x-digest-token") === expected;
  }

  private handleInbound(body: unknown): JsonResponse {
    let messages;
    try {
      messages = normalizeIngestBody(body);
    } catch (error) {
      if (error instanceof IngestError) {
        return json(400, { error: error.message });
      }
      throw error;
    }

    let stored: { inserted: number; duplicates: number };
    try {
      stored = this.sink.ingestBatch(messages);
    } catch (error) {
      if (error instanceof StoreError) {
        this.logger?.error(
          { operation: error.operation, count: messages.length, error: error.message },
          "webhook messages not stored"
        );
        return json(503, { error: "Message store unavailable." });
      }
      throw error;
    }
    this.logger?.debug({ count: messages.length, ...stored }, "webhook messages stored");
    return json(202, { ok: true, accepted: messages.length, ...stored });
  }

  private handleOutboundPull(url: URL): JsonResponse {
    const nowMs = this.now();
    this.pruneOutbox(nowMs);

    const chatId = url.searchParams.get("chatId")?.trim() ?? "";
    if (!chatId) {
      return json(400, { error: "chatId query is required." });
    }
    const limitRaw = Number(url.searchParams.get("limit") ?? "50");
    const limit = Number.isFinite(limitRaw)
      ? Math.min(Math.max(Math.floor(limitRaw), 1), 200)
      : 50;
    const queue = this.outbox.get(chatId) ?? [];
    const batch = queue.splice(0, limit);
    if (queue.length === 0) {
      this.outbox.delete(chatId);
      this.outboxTouchedAtMs.delete(chatId);
    } else {
      this.outboxTouchedAtMs.set(chatId, nowMs);
    }

    return json(200, { chatId, messages: batch });
  }

  private pruneOutbox(nowMs: number) {
    if (this.outbox.size === 0) {
      return;
    }

    const ttlMs = this.config.webhook.outboxChatTtlMs;
    for (const chatId of [...this.outbox.keys()]) {
      const touchedAt = this.outboxTouchedAtMs.get(chatId) ?? 0;
      if (nowMs - touchedAt > ttlMs) {
        this.outbox.delete(chatId);
        this.outboxTouchedAtMs.delete(chatId);
      }
    }

    const maxChats = this.config.webhook.outboxMaxChats;
    if (this.outbox.size <= maxChats) {
      return;
    }

    const byLeastRecent = [...this.outbox.keys()]
      .map((chatId) => ({ chatId, touchedAt: this.outboxTouchedAtMs.get(chatId) ?? 0 }))
      .sort((a, b) => a.touchedAt - b.touchedAt);

    for (const item of byLeastRecent) {
      if (this.outbox.size <= maxChats) {
        break;
      }
      this.outbox.delete(item.chatId);
      this.outboxTouchedAtMs.delete(item.chatId);
    }
  }
}
