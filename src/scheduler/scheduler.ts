import type { Logger } from "pino";
import type { Config } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import type { RunOutcome, SummaryPipeline } from "../summary/pipeline.js";

export type SchedulablePipeline = Pick<SummaryPipeline, "run" | "isRunning">;

/**
 * Fires a summary run every `summary.intervalMs`. A tick that lands while a run is still
 * in flight is skipped rather than queued.
 */
export class SummaryScheduler {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<RunOutcome | null> | null = null;
  private controller = new AbortController();

  constructor(
    private pipeline: SchedulablePipeline,
    private logger: Logger,
    private config: Pick<Config, "summary">
  ) {}

  get running() {
    return this.timer !== null;
  }

  start() {
    if (this.timer) {
      return;
    }
    this.controller = new AbortController();
    this.timer = setInterval(() => {
      void this.tick();
    }, this.config.summary.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.config.summary.intervalMs }, "summary scheduler started");
    if (this.config.summary.runOnStart) {
      void this.tick();
    }
  }

  async stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async tick(): Promise<RunOutcome | null> {
    if (this.inFlight || this.pipeline.isRunning()) {
      this.logger.debug("summary tick skipped; run in progress");
      return null;
    }
    this.inFlight = this.runOnce();
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async runOnce(): Promise<RunOutcome | null> {
    try {
      const outcome = await this.pipeline.run({ signal: this.controller.signal });
      this.logger.debug({ status: outcome.status }, "scheduled summary run finished");
      return outcome;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, "scheduled summary run threw");
      return null;
    }
  }
}
