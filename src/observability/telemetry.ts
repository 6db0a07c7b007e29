type LatencyMetric = {
  calls: number;
  failures: number;
  totalLatencyMs: number;
  maxLatencyMs: number;
};

const emptyLatency = (): LatencyMetric => ({
  calls: 0,
  failures: 0,
  totalLatencyMs: 0,
  maxLatencyMs: 0
});

const summarizeLatency = (metric: LatencyMetric) => ({
  calls: metric.calls,
  failures: metric.failures,
  failureRate: metric.calls > 0 ? metric.failures / metric.calls : 0,
  avgLatencyMs: metric.calls > 0 ? metric.totalLatencyMs / metric.calls : 0,
  maxLatencyMs: metric.maxLatencyMs
});

export class DigestTelemetry {
  private runsByStatus = new Map<string, number>();
  private runLatency = emptyLatency();
  private summarizerLatency = emptyLatency();
  private messagesSummarized = 0;
  private ingest = { inserted: 0, duplicates: 0, rejected: 0 };
  private lastRun: { status: string; finishedAt: string } | null = null;

  recordRun(status: string, durationMs: number, summarized = 0) {
    this.runsByStatus.set(status, (this.runsByStatus.get(status) ?? 0) + 1);
    this.record(this.runLatency, durationMs, status !== "failed");
    this.messagesSummarized += summarized;
    this.lastRun = { status, finishedAt: new Date().toISOString() };
  }

  recordSummarizerCall(durationMs: number, success: boolean) {
    this.record(this.summarizerLatency, durationMs, success);
  }

  recordIngest(result: "inserted" | "duplicate" | "rejected") {
    if (result === "inserted") {
      this.ingest.inserted += 1;
    } else if (result === "duplicate") {
      this.ingest.duplicates += 1;
    } else {
      this.ingest.rejected += 1;
    }
  }

  snapshot() {
    return {
      runs: {
        byStatus: Object.fromEntries(this.runsByStatus),
        latency: summarizeLatency(this.runLatency),
        messagesSummarized: this.messagesSummarized,
        last: this.lastRun
      },
      summarizer: summarizeLatency(this.summarizerLatency),
      ingest: { ...this.ingest }
    };
  }

  private record(metric: LatencyMetric, durationMs: number, success: boolean) {
    metric.calls += 1;
    if (!success) {
      metric.failures += 1;
    }
    metric.totalLatencyMs += durationMs;
    metric.maxLatencyMs = Math.max(metric.maxLatencyMs, durationMs);
  }
}
