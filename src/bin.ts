#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import type { DestinationStream } from "pino";
import { createDigestApp } from "./app.js";
import { loadConfig } from "./config/load.js";
import type { Config } from "./config/schema.js";
import { IngestError } from "./errors.js";
import { MessageIngestor } from "./ingest/ingestor.js";
import { createLogger, stderrDestination } from "./observability/logger.js";
import { runPreflightChecks } from "./preflight.js";
import { SqliteStorage } from "./storage/sqlite.js";
import type { RunOutcome } from "./summary/pipeline.js";
import { main } from "./main.js";

export type CliContext = {
  write: (text: string) => void;
  setExitCode: (code: number) => void;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Where one-shot commands log; stderr unless given. */
  logDestination?: DestinationStream;
};

const processContext: CliContext = {
  write: (text) => {
    process.stdout.write(text);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  }
};

const printJson = (ctx: CliContext, value: unknown) => {
  ctx.write(`${JSON.stringify(value, null, 2)}\n`);
};

export const describeOutcome = (outcome: RunOutcome) => {
  switch (outcome.status) {
    case "failed":
      return {
        status: outcome.status,
        stage: outcome.stage,
        pending: outcome.pending,
        error: outcome.error.message
      };
    case "succeeded":
      return {
        status: outcome.status,
        processed: outcome.processed,
        marked: outcome.marked,
        chatCount: outcome.chatCount,
        summaryId: outcome.summaryId,
        checkpoint: outcome.checkpoint,
        summary: outcome.summary
      };
    default:
      return outcome;
  }
};

const withStorage = <T>(config: Config, fn: (storage: SqliteStorage) => T): T => {
  const storage = new SqliteStorage(config.sqlitePath);
  try {
    return fn(storage);
  } finally {
    storage.close();
  }
};

const readIngestFile = (file: string): unknown[] => {
  const raw = fs.readFileSync(file, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new IngestError(`${file} is not valid JSON`);
  }
  return Array.isArray(parsed) ? parsed : [parsed];
};

export const buildCli = (ctx: CliContext = processContext) => {
  const config = () => loadConfig({ cwd: ctx.cwd, env: ctx.env });
  const commandLogger = (loaded: Config) =>
    createLogger(loaded, ctx.logDestination ?? stderrDestination());
  const program = new Command();
  program
    .name("chat-digest")
    .description("Collects chat messages and summarizes the unprocessed backlog.");

  program
    .command("start")
    .description("Run ingestion, the scheduler and the dashboard until interrupted.")
    .action(async () => {
      await main();
    });

  program
    .command("summarize")
    .description("Summarize the current backlog once and print the outcome.")
    .action(async () => {
      const loaded = config();
      const app = createDigestApp({ config: loaded, logger: commandLogger(loaded) });
      try {
        const outcome = await app.pipeline.run();
        printJson(ctx, describeOutcome(outcome));
        if (outcome.status === "failed") {
          ctx.setExitCode(1);
        }
      } finally {
        await app.stop();
      }
    });

  program
    .command("stats")
    .description("Print message statistics and the checkpoint.")
    .action(() => {
      withStorage(config(), (storage) => {
        printJson(ctx, {
          total: storage.countMessages(),
          ...storage.getStatistics(),
          lastSummaryAt: storage.lastSummaryTimestamp(),
          checkpoint: storage.getCheckpoint(),
          checkpointDivergence: storage.checkpointDivergence()
        });
      });
    });

  program
    .command("migrate")
    .description("Apply pending schema migrations and print the history.")
    .action(() => {
      withStorage(config(), (storage) => {
        printJson(ctx, {
          applied: storage.migrationsApplied.map((migration) => migration.name),
          history: storage.listMigrationHistory()
        });
      });
    });

  program
    .command("ingest")
    .argument("<file>", "JSON file holding one payload or an array of payloads")
    .description("Store messages from a JSON file.")
    .action((file: string) => {
      const payloads = readIngestFile(path.resolve(ctx.cwd ?? process.cwd(), file));
      const loaded = config();
      withStorage(loaded, (storage) => {
        const ingestor = new MessageIngestor(storage, commandLogger(loaded));
        const result = ingestor.ingestMany(payloads);
        printJson(ctx, result);
        if (result.rejected.length > 0) {
          ctx.setExitCode(1);
        }
      });
    });

  program
    .command("preflight")
    .description("Check configuration before starting.")
    .action(() => {
      printJson(ctx, runPreflightChecks({ config: config() }));
    });

  return program;
};

export const runCli = async (args: string[] = process.argv.slice(2), ctx?: CliContext) => {
  await buildCli(ctx).parseAsync(args, { from: "user" });
};

const isDirectExecution = () => {
  if (!process.argv[1]) {
    return false;
  }
  try {
    // npm links the bin, so compare real paths.
    return fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
};

if (isDirectExecution()) {
  runCli().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
