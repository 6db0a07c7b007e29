import type { Logger } from "pino";
import { errorMessage } from "../errors.js";
import type { DigestTelemetry } from "../observability/telemetry.js";
import type { CommitBatchResult, SqliteStorage } from "../storage/sqlite.js";
import type { Checkpoint, StoredMessage } from "../types.js";
import { backlogKeys, describeBacklog, selectBacklog } from "./backlog.js";
import { formatBatch, type FormatOptions } from "./format.js";
import type { Summarizer } from "./summarizer.js";

export type PipelineState =
  | "idle"
  | "selecting"
  | "formatting"
  | "calling"
  | "committing"
  | "failed";

export type FailedStage = "selecting" | "calling" | "committing";

export type SucceededRun = {
  status: "succeeded";
  processed: number;
  marked: number;
  chatCount: number;
  summary: string;
  summaryId: number;
  checkpoint: Checkpoint;
};

export type RunOutcome =
  | { status: "idle"; processed: 0 }
  | { status: "empty"; processed: 0; pending: number }
  | SucceededRun
  | { status: "failed"; stage: FailedStage; pending: number; error: Error }
  | { status: "cancelled"; pending: number }
  | { status: "busy" };

export type PipelineStore = Pick<
  SqliteStorage,
  "fetchUnprocessed" | "commitBatch" | "checkpointDivergence"
>;

export type SummaryPipelineDeps = {
  store: PipelineStore;
  summarizer: Summarizer;
  logger: Logger;
  format?: FormatOptions;
  telemetry?: DigestTelemetry;
  onSummary?: (run: SucceededRun) => void | Promise<void>;
};

/**
 * Summarizes the unprocessed backlog.
 *
 * idle → selecting → formatting → calling → committing → idle, with `failed` as the
 * per-run terminal state. Only the keys read while selecting are marked, and only after
 * the summarizer returns. One run at a time: a concurrent call returns `busy`.
 */
export class SummaryPipeline {
  private state: PipelineState = "idle";
  private active: Promise<RunOutcome> | null = null;

  constructor(private deps: SummaryPipelineDeps) {}

  getState(): PipelineState {
    return this.state;
  }

  isRunning() {
    return this.active !== null;
  }

  async run(options: { signal?: AbortSignal } = {}): Promise<RunOutcome> {
    if (this.active) {
      this.deps.logger.debug("summary run already in progress");
      return { status: "busy" };
    }
    const startedAt = Date.now();
    this.active = this.execute(options.signal);
    try {
      const outcome = await this.active;
      this.deps.telemetry?.recordRun(
        outcome.status,
        Date.now() - startedAt,
        outcome.status === "succeeded" ? outcome.processed : 0
      );
      return outcome;
    } finally {
      this.active = null;
    }
  }

  private async execute(signal?: AbortSignal): Promise<RunOutcome> {
    const { store, logger } = this.deps;

    this.transition("selecting");
    let snapshot: StoredMessage[];
    try {
      snapshot = selectBacklog(store);
    } catch (error) {
      return this.fail("selecting", 0, error);
    }
    this.reportDivergence();

    if (snapshot.length === 0) {
      this.transition("idle");
      logger.info({ processed: 0 }, "no new messages to summarize");
      return { status: "idle", processed: 0 };
    }

    const overview = describeBacklog(snapshot);
    logger.info(
      { count: overview.count, chatCount: overview.chatCount, perChat: overview.perChat },
      "backlog selected"
    );

    this.transition("formatting");
    const prompt = formatBatch(snapshot, this.deps.format);
    if (!prompt) {
      this.transition("idle");
      logger.warn({ pending: snapshot.length }, "backlog has no text to summarize");
      return { status: "empty", processed: 0, pending: snapshot.length };
    }
    if (signal?.aborted) {
      return this.cancel(snapshot.length);
    }

    this.transition("calling");
    const callStartedAt = Date.now();
    let summary: string;
    try {
      summary = await this.deps.summarizer.summarize(prompt, { signal });
      this.deps.telemetry?.recordSummarizerCall(Date.now() - callStartedAt, true);
    } catch (error) {
      this.deps.telemetry?.recordSummarizerCall(Date.now() - callStartedAt, false);
      if (signal?.aborted) {
        return this.cancel(snapshot.length);
      }
      return this.fail("calling", snapshot.length, error);
    }
    if (signal?.aborted) {
      return this.cancel(snapshot.length);
    }

    this.transition("committing");
    const first = snapshot[0];
    const last = snapshot[snapshot.length - 1];
    let committed: CommitBatchResult;
    try {
      committed = store.commitBatch({
        keys: backlogKeys(snapshot),
        last: { messageId: last.messageId, chatId: last.chatId, timestamp: last.timestamp },
        summary: {
          messageCount: snapshot.length,
          chatCount: overview.chatCount,
          firstTimestamp: first.timestamp,
          lastTimestamp: last.timestamp,
          content: summary
        }
      });
    } catch (error) {
      return this.fail("committing", snapshot.length, error);
    }
    if (committed.marked !== snapshot.length) {
      logger.warn(
        { expected: snapshot.length, marked: committed.marked },
        "some batch messages were already processed"
      );
    }

    this.transition("idle");
    const outcome: SucceededRun = {
      status: "succeeded",
      processed: snapshot.length,
      marked: committed.marked,
      chatCount: overview.chatCount,
      summary,
      summaryId: committed.summaryId,
      checkpoint: committed.checkpoint
    };
    logger.info(
      {
        processed: outcome.processed,
        marked: outcome.marked,
        summaryId: outcome.summaryId,
        checkpoint: outcome.checkpoint
      },
      "summary run committed"
    );

    if (this.deps.onSummary) {
      try {
        await this.deps.onSummary(outcome);
      } catch (error) {
        logger.error({ error: errorMessage(error), summaryId: outcome.summaryId }, "summary delivery failed");
      }
    }
    return outcome;
  }

  private reportDivergence() {
    try {
      const divergence = this.deps.store.checkpointDivergence();
      if (divergence) {
        this.deps.logger.warn({ divergence }, "checkpoint diverges from processed flags");
      }
    } catch (error) {
      this.deps.logger.warn({ error: errorMessage(error) }, "checkpoint check failed");
    }
  }

  private transition(next: PipelineState) {
    this.deps.logger.debug({ from: this.state, to: next }, "pipeline state");
    this.state = next;
  }

  private cancel(pending: number): RunOutcome {
    this.transition("idle");
    this.deps.logger.warn({ pending }, "summary run cancelled before commit");
    return { status: "cancelled", pending };
  }

  private fail(stage: FailedStage, pending: number, cause: unknown): RunOutcome {
    this.transition("failed");
    const error = cause instanceof Error ? cause : new Error(String(cause));
    this.deps.logger.error({ stage, pending, error: error.message }, "summary run failed");
    return { status: "failed", stage, pending, error };
  }
}
