import http from "node:http";
import type { Logger } from "pino";
import type { MessageBus } from "../bus/bus.js";
import type { Config } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import type { DigestTelemetry } from "../observability/telemetry.js";
import type { SqliteStorage } from "../storage/sqlite.js";
import type { SummaryPipeline } from "../summary/pipeline.js";
import type { StoredMessage } from "../types.js";
import { formatForDisplay } from "../util/time.js";
import {
  bearerToken,
  closeServer,
  json,
  listen,
  sendJson,
  toRouteRequest,
  type JsonResponse,
  type RouteRequest
} from "../util/http.js";

export type DashboardStore = Pick<
  SqliteStorage,
  | "countMessages"
  | "getStatistics"
  | "getCheckpoint"
  | "checkpointDivergence"
  | "lastSummaryTimestamp"
  | "listMessages"
  | "listSummaries"
>;

export type DashboardDeps = {
  store: DashboardStore;
  config: Pick<Config, "dashboard">;
  logger: Logger;
  telemetry?: DigestTelemetry;
  pipeline?: Pick<SummaryPipeline, "getState" | "isRunning">;
  bus?: Pick<MessageBus, "pending">;
};

const DEFAULT_SUMMARY_LIMIT = 20;

const parseLimit = (raw: string | null, fallback: number, max: number) => {
  if (raw === null || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    return null;
  }
  return Math.min(value, max);
};

/** Read-only JSON view over the message store. */
export class DashboardServer {
  private server: http.Server | null = null;

  constructor(private deps: DashboardDeps) {}

  get address() {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  async start() {
    if (this.server) {
      return;
    }
    const { config, logger } = this.deps;
    const server = http.createServer((req, res) => {
      this.handle(req, res);
    });
    this.server = server;
    await listen(server, config.dashboard.port, config.dashboard.host);
    logger.info(
      { host: config.dashboard.host, port: this.address?.port ?? config.dashboard.port },
      "dashboard listening"
    );
  }

  async stop() {
    if (!this.server) {
      return;
    }
    const server = this.server;
    this.server = null;
    await closeServer(server);
  }

  route(request: RouteRequest): JsonResponse {
    const expected = this.deps.config.dashboard.authToken;
    if (expected && bearerToken(request.headers, "x-digest-token") !== expected) {
      return json(401, { error: "Unauthorized" });
    }
    if (request.method !== "GET") {
      return json(405, { error: "Method not allowed" });
    }

    switch (request.url.pathname) {
      case "/api/stats":
        return json(200, this.stats());
      case "/api/messages":
        return this.messages(request.url);
      case "/api/summaries":
        return this.summaries(request.url);
      case "/api/health":
        return json(200, this.health());
      default:
        return json(404, { error: "Not found" });
    }
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse) {
    try {
      sendJson(res, this.route(toRouteRequest(req)));
    } catch (error) {
      this.deps.logger.error({ error: errorMessage(error), url: req.url }, "dashboard request failed");
      sendJson(res, json(500, { error: "Internal error" }));
    }
  }

  private display(iso: string) {
    return formatForDisplay(iso, this.deps.config.dashboard.timeZone);
  }

  private stats() {
    const { store } = this.deps;
    const statistics = store.getStatistics();
    const lastSummaryAt = store.lastSummaryTimestamp();
    return {
      total: store.countMessages(),
      ...statistics,
      lastSummaryAt,
      lastSummaryAtDisplay: lastSummaryAt ? this.display(lastSummaryAt) : null,
      checkpoint: store.getCheckpoint(),
      checkpointDivergence: store.checkpointDivergence()
    };
  }

  private messages(url: URL): JsonResponse {
    const max = this.deps.config.dashboard.maxMessages;
    const limit = parseLimit(url.searchParams.get("limit"), max, max);
    if (limit === null) {
      return json(400, { error: "limit must be a positive integer." });
    }
    const messages = this.deps.store.listMessages(limit).map((message: StoredMessage) => ({
      ...message,
      timestampDisplay: this.display(message.timestamp)
    }));
    return json(200, { count: messages.length, messages });
  }

  private summaries(url: URL): JsonResponse {
    const limit = parseLimit(url.searchParams.get("limit"), DEFAULT_SUMMARY_LIMIT, 200);
    if (limit === null) {
      return json(400, { error: "limit must be a positive integer." });
    }
    const summaries = this.deps.store.listSummaries(limit).map((summary) => ({
      ...summary,
      createdAtDisplay: this.display(summary.createdAt)
    }));
    return json(200, { count: summaries.length, summaries });
  }

  private health() {
    const { pipeline, bus, telemetry } = this.deps;
    return {
      status: "ok",
      pipeline: pipeline
        ? { state: pipeline.getState(), running: pipeline.isRunning() }
        : null,
      bus: bus ? bus.pending() : null,
      telemetry: telemetry ? telemetry.snapshot() : null
    };
  }
}
