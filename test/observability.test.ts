import test from "node:test";
import assert from "node:assert/strict";
import { MessageBus } from "../src/bus/bus.js";
import { AsyncQueue } from "../src/bus/queue.js";
import { createSilentLogger } from "../src/observability/logger.js";
import { DigestTelemetry } from "../src/observability/telemetry.js";
import type { OutboundMessage } from "../src/types.js";

test("DigestTelemetry aggregates runs, summarizer calls and ingestion", () => {
  const telemetry = new DigestTelemetry();
  telemetry.recordRun("succeeded", 40, 3);
  telemetry.recordRun("failed", 20);
  telemetry.recordRun("idle", 0);
  telemetry.recordSummarizerCall(30, true);
  telemetry.recordSummarizerCall(10, false);
  telemetry.recordIngest("inserted");
  telemetry.recordIngest("duplicate");
  telemetry.recordIngest("inserted");

  const snapshot = telemetry.snapshot();
  assert.deepEqual(snapshot.runs.byStatus, { succeeded: 1, failed: 1, idle: 1 });
  assert.equal(snapshot.runs.latency.calls, 3);
  assert.equal(snapshot.runs.latency.failures, 1);
  assert.equal(snapshot.runs.latency.failureRate, 1 / 3);
  assert.equal(snapshot.runs.latency.avgLatencyMs, 20);
  assert.equal(snapshot.runs.latency.maxLatencyMs, 40);
  assert.equal(snapshot.runs.messagesSummarized, 3);
  assert.equal(snapshot.runs.last?.status, "idle");
  assert.deepEqual(snapshot.summarizer, {
    calls: 2,
    failures: 1,
    failureRate: 0.5,
    avgLatencyMs: 20,
    maxLatencyMs: 30
  });
  assert.deepEqual(snapshot.ingest, { inserted: 2, duplicates: 1, rejected: 0 });
});

test("AsyncQueue hands items to waiting readers and drains before closing", async () => {
  const queue = new AsyncQueue<number>();
  const waiting = queue.next();
  queue.push(1);
  assert.equal(await waiting, 1);

  queue.push(2);
  queue.close();
  queue.push(3);
  assert.equal(queue.size, 1);
  assert.equal(await queue.next(), 2);
  assert.equal(await queue.next(), undefined);
});

test("MessageBus keeps delivering after a handler throws", async () => {
  const bus = new MessageBus(createSilentLogger());
  const delivered: string[] = [];
  bus.onOutbound(async (message) => {
    if (message.content === "bad") {
      throw new Error("handler failed");
    }
    delivered.push(message.content);
  });
  bus.start();

  const outbound = (content: string): OutboundMessage => ({
    id: content,
    chatId: "digest",
    content,
    createdAt: "2024-01-15T09:00:00.000Z"
  });
  bus.publishOutbound(outbound("bad"));
  bus.publishOutbound(outbound("good"));
  await bus.stop();

  assert.deepEqual(delivered, ["good"]);
  assert.deepEqual(bus.pending(), { outbound: 0 });
});
