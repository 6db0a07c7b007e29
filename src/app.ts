import type { Logger } from "pino";
import { MessageBus } from "./bus/bus.js";
import type { Channel } from "./channels/base.js";
import { WebhookChannel } from "./channels/webhook.js";
import { loadConfig } from "./config/load.js";
import type { Config } from "./config/schema.js";
import { DashboardServer } from "./dashboard/server.js";
import { errorMessage } from "./errors.js";
import { MessageIngestor } from "./ingest/ingestor.js";
import { createLogger } from "./observability/logger.js";
import { DigestTelemetry } from "./observability/telemetry.js";
import { OpenAICompatibleProvider } from "./provider/openai.js";
import { createTokenSource } from "./provider/token.js";
import { SummaryScheduler } from "./scheduler/scheduler.js";
import { SqliteStorage } from "./storage/sqlite.js";
import { SummaryPipeline } from "./summary/pipeline.js";
import { ProviderSummarizer, type Summarizer } from "./summary/summarizer.js";
import { newId } from "./util/ids.js";
import { nowIso } from "./util/time.js";

export type DigestAppOptions = {
  config?: Config;
  logger?: Logger;
  summarizer?: Summarizer;
  fetchImpl?: typeof fetch;
};

export const createSummarizer = (config: Config, fetchImpl: typeof fetch = fetch): Summarizer =>
  new ProviderSummarizer(
    new OpenAICompatibleProvider(config, createTokenSource(config, fetchImpl), fetchImpl),
    {
      model: config.provider.model,
      temperature: config.provider.temperature,
      systemPrompt: config.summary.systemPrompt
    }
  );

export const createDigestApp = (options: DigestAppOptions = {}) => {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config);
  const storage = new SqliteStorage(config.sqlitePath);
  if (storage.migrationsApplied.length > 0) {
    logger.info(
      { migrations: storage.migrationsApplied.map((migration) => migration.name) },
      "schema migrations applied"
    );
  }

  const telemetry = new DigestTelemetry();
  const bus = new MessageBus(logger);
  const ingestor = new MessageIngestor(storage, logger.child({ component: "ingest" }), telemetry);

  const channels: Channel[] = [];
  const webhook = config.webhook.enabled ? new WebhookChannel(config, ingestor) : null;
  if (webhook) {
    channels.push(webhook);
  }

  bus.onOutbound(async (message) => {
    for (const channel of channels) {
      await channel.send({ chatId: message.chatId, content: message.content });
    }
  });

  const pipeline = new SummaryPipeline({
    store: storage,
    summarizer: options.summarizer ?? createSummarizer(config, options.fetchImpl),
    logger: logger.child({ component: "pipeline" }),
    telemetry,
    format: {
      maxPromptChars: config.summary.maxPromptChars,
      maxMessageChars: config.summary.maxMessageChars
    },
    onSummary: (run) => {
      bus.publishOutbound({
        id: newId(),
        chatId: config.summary.deliveryChatId,
        content: run.summary,
        createdAt: nowIso()
      });
    }
  });

  const scheduler = new SummaryScheduler(pipeline, logger.child({ component: "scheduler" }), config);
  const dashboard = config.dashboard.enabled
    ? new DashboardServer({
        store: storage,
        config,
        logger: logger.child({ component: "dashboard" }),
        telemetry,
        pipeline,
        bus
      })
    : null;

  let started = false;

  const start = async () => {
    if (started) {
      return;
    }
    started = true;
    bus.start();
    for (const channel of channels) {
      await channel.start(logger.child({ channel: channel.name }));
    }
    await dashboard?.start();
    scheduler.start();
    logger.info({ sqlitePath: config.sqlitePath }, "chat digest started");
  };

  const stop = async () => {
    await scheduler.stop();
    for (const channel of channels) {
      try {
        await channel.stop();
      } catch (error) {
        logger.warn({ channel: channel.name, error: errorMessage(error) }, "channel stop failed");
      }
    }
    await dashboard?.stop();
    await bus.stop();
    storage.close();
    started = false;
    logger.info("chat digest stopped");
  };

  return {
    config,
    logger,
    storage,
    telemetry,
    bus,
    ingestor,
    webhook,
    pipeline,
    scheduler,
    dashboard,
    start,
    stop
  };
};

export type DigestApp = ReturnType<typeof createDigestApp>;
