import { describe, it, expect, vi, beforeEach } from "vitest";
import type { AggregatedStatus, FlowDefinition, ProbeResult, ProbeStatus } from "../types.js";
import { FlowReplayEngine, estimateQps, normalizeFlowEvent } from "./flow-replay.js";

vi.mock("@statusboard/shared/utils", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

let uuidCounter = 0;
vi.mock("node:crypto", () => ({
  randomUUID: () => `flow-${++uuidCounter}`,
}));

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const CHECKED_AT = "2026-03-01T12:00:00.000Z";

const FLOWS: FlowDefinition[] = [
  {
    key: "checkout",
    name: "Checkout",
    nodes: ["browser", "web", "api", "payments"],
    services: ["web", "api"],
    providerLatencyMs: 100,
  },
  {
    key: "assistant",
    name: "Assistant",
    nodes: ["browser", "llm"],
    services: ["llm"],
    providerLatencyMs: 0,
  },
];

function result(name: string, status: ProbeStatus, latencyMs: number): ProbeResult {
  return {
    name,
    url: `https://${name}.example.test`,
    category: "core",
    type: "api",
    description: name,
    status,
    httpCode: status === "operational" ? 200 : 0,
    latencyMs,
    checkedAt: CHECKED_AT,
  };
}

function statusOf(services: ProbeResult[]): AggregatedStatus {
  return {
    overall: "operational",
    summary: { operational: services.length, degraded: 0, timeout: 0, down: 0, total: services.length },
    avgLatencyMs: 0,
    categories: [],
    services,
    checkedAt: CHECKED_AT,
    cacheTtlSeconds: 30,
    version: "1.0.0",
  };
}

// ---------------------------------------------------------------------------
// estimateQps
// ---------------------------------------------------------------------------

describe("estimateQps", () => {
  it("divides the budget by the latency", () => {
    expect(estimateQps(2200, false)).toBe(1);
    expect(estimateQps(400, false)).toBe(5.5);
  });

  it("scales down failing flows", () => {
    expect(estimateQps(2200, true)).toBe(0.45);
  });

  it("clamps to the configured range", () => {
    expect(estimateQps(10, false)).toBe(12);
    expect(estimateQps(100_000, false)).toBe(0.2);
    expect(estimateQps(100_000, true)).toBe(0.09);
  });
});

// ---------------------------------------------------------------------------
// normalizeFlowEvent
// ---------------------------------------------------------------------------

describe("normalizeFlowEvent", () => {
  const now = new Date(CHECKED_AT);

  beforeEach(() => {
    uuidCounter = 0;
  });

  it("fills defaults and drops blank hops", () => {
    const outcome = normalizeFlowEvent({ nodes: [" web ", "", "api", 7] }, now);

    expect(outcome).toEqual({
      ok: true,
      event: {
        id: "flow-1",
        flowKey: "web>api",
        flowName: "web → api",
        nodes: ["web", "api"],
        latencyMs: 0,
        qps: 0,
        status: "operational",
        timestamp: CHECKED_AT,
        source: "external",
      },
    });
  });

  it("keeps caller-supplied fields", () => {
    const outcome = normalizeFlowEvent(
      {
        id: " evt-9 ",
        flowKey: "search",
        flowName: "Search",
        nodes: ["web", "api", "index"],
        latencyMs: 12.6,
        qps: 3.456,
        status: "DOWN ",
        timestamp: "2026-02-01T00:00:00Z",
        metadata: { region: "eu" },
      },
      now,
    );

    expect(outcome.ok && outcome.event).toEqual({
      id: "evt-9",
      flowKey: "search",
      flowName: "Search",
      nodes: ["web", "api", "index"],
      latencyMs: 13,
      qps: 3.46,
      status: "down",
      timestamp: "2026-02-01T00:00:00.000Z",
      metadata: { region: "eu" },
      source: "external",
    });
  });

  it("defaults unknown statuses, bad numbers and bad timestamps", () => {
    const outcome = normalizeFlowEvent(
      { nodes: ["a", "b"], status: "bogus", latencyMs: -5, qps: "fast", timestamp: "yesterday" },
      now,
    );

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.event.status).toBe("operational");
    expect(outcome.event.latencyMs).toBe(0);
    expect(outcome.event.qps).toBe(0);
    expect(outcome.event.timestamp).toBe(CHECKED_AT);
  });

  it("accepts epoch-millisecond timestamps", () => {
    const outcome = normalizeFlowEvent({ nodes: ["a", "b"], timestamp: Date.UTC(2026, 1, 1) }, now);

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.event.timestamp).toBe("2026-02-01T00:00:00.000Z");
  });

  it("replaces non-finite or out-of-range numeric timestamps", () => {
    for (const timestamp of [Number.POSITIVE_INFINITY, Number.NaN, 1e20]) {
      const outcome = normalizeFlowEvent({ nodes: ["a", "b"], timestamp }, now);
      expect(outcome.ok && outcome.event.timestamp).toBe(CHECKED_AT);
    }
  });

  it("rejects fewer than two hops", () => {
    expect(normalizeFlowEvent({ nodes: ["only"] }, now)).toEqual({
      ok: false,
      reason: "nodes must contain at least 2 hops",
    });
    expect(normalizeFlowEvent({ flowKey: "x" }, now)).toEqual({
      ok: false,
      reason: "nodes must contain at least 2 hops",
    });
  });

  it("rejects non-objects", () => {
    expect(normalizeFlowEvent("web>api", now)).toEqual({ ok: false, reason: "event must be a JSON object" });
    expect(normalizeFlowEvent(["web", "api"], now)).toEqual({ ok: false, reason: "event must be a JSON object" });
    expect(normalizeFlowEvent(null, now)).toEqual({ ok: false, reason: "event must be a JSON object" });
  });
});

// ---------------------------------------------------------------------------
// FlowReplayEngine
// ---------------------------------------------------------------------------

describe("FlowReplayEngine", () => {
  beforeEach(() => {
    uuidCounter = 0;
  });

  describe("recordCycle", () => {
    it("derives one synthetic event per flow", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS, random: () => 0 });

      const events = engine.recordCycle(
        statusOf([result("web", "operational", 100), result("api", "operational", 200), result("llm", "down", 300)]),
      );

      expect(events).toEqual([
        {
          id: "flow-1",
          flowKey: "checkout",
          flowName: "Checkout",
          nodes: ["browser", "web", "api", "payments"],
          latencyMs: 265,
          qps: 12,
          status: "operational",
          timestamp: CHECKED_AT,
          metadata: { services: ["web", "api"], providerLatencyMs: 100, jitterMs: 15 },
          source: "synthetic",
        },
        {
          id: "flow-2",
          flowKey: "assistant",
          flowName: "Assistant",
          nodes: ["browser", "llm"],
          latencyMs: 315,
          qps: 3.3,
          status: "degraded",
          timestamp: CHECKED_AT,
          metadata: { services: ["llm"], providerLatencyMs: 0, jitterMs: 15 },
          source: "synthetic",
        },
      ]);
      expect(engine.replay(10, false).count).toBe(2);
    });

    it("keeps jitter below sixty milliseconds", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS, random: () => 0.999 });
      const [checkout] = engine.recordCycle(statusOf([result("web", "operational", 100), result("api", "operational", 200)]));
      expect(checkout?.metadata).toMatchObject({ jitterMs: 60 });
      expect(checkout?.latencyMs).toBe(310);
    });

    it("skips flows with no backing results", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS, random: () => 0 });
      const events = engine.recordCycle(statusOf([result("llm", "operational", 50)]));
      expect(events.map((e) => e.flowKey)).toEqual(["assistant"]);
    });
  });

  describe("ingest", () => {
    it("stores accepted events in the real buffer", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      const outcome = engine.ingest({ nodes: ["web", "api"], latencyMs: 40 });

      expect(outcome.ok).toBe(true);
      expect(engine.latest()?.latencyMs).toBe(40);
      expect(engine.replay().source).toBe("external");
    });

    it("does not store rejected events", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      engine.ingest({ nodes: ["web"] });
      expect(engine.latest()).toBeUndefined();
    });

    it("reports batch rejections by index", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      const result = engine.ingestBatch([{ nodes: ["a", "b"] }, { nodes: ["a"] }, null]);

      expect(result.accepted).toHaveLength(1);
      expect(result.rejected).toEqual([
        { index: 1, reason: "nodes must contain at least 2 hops" },
        { index: 2, reason: "event must be a JSON object" },
      ]);
    });
  });

  describe("replay", () => {
    it("averages over the returned slice", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      engine.ingest({ nodes: ["a", "b"], latencyMs: 100, qps: 1 });
      engine.ingest({ nodes: ["a", "b"], latencyMs: 200, qps: 2 });
      engine.ingest({ nodes: ["a", "b"], latencyMs: 300, qps: 4 });

      const replay = engine.replay(2);

      expect(replay.source).toBe("external");
      expect(replay.count).toBe(2);
      expect(replay.avgQps).toBe(3);
      expect(replay.avgLatencyMs).toBe(250);
      expect(replay.events.map((e) => e.latencyMs)).toEqual([200, 300]);
    });

    it("falls back to synthetic events when no real ones exist", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS, random: () => 0 });
      engine.recordCycle(statusOf([result("llm", "operational", 50)]));
      expect(engine.replay(10, true).source).toBe("synthetic");
    });

    it("uses synthetic events when real ones are not preferred", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      engine.ingest({ nodes: ["a", "b"] });

      expect(engine.replay(10, false)).toEqual({
        source: "synthetic",
        count: 0,
        avgQps: 0,
        avgLatencyMs: 0,
        events: [],
      });
    });

    it("evicts the oldest events past capacity", () => {
      const engine = new FlowReplayEngine({ flows: FLOWS, realCapacity: 2 });
      engine.ingest({ nodes: ["a", "b"], latencyMs: 1 });
      engine.ingest({ nodes: ["a", "b"], latencyMs: 2 });
      engine.ingest({ nodes: ["a", "b"], latencyMs: 3 });

      expect(engine.replay(10).events.map((e) => e.latencyMs)).toEqual([2, 3]);
    });
  });

  describe("watch", () => {
    it("yields only when the latest event changes", async () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      const controller = new AbortController();
      engine.ingest({ id: "first", nodes: ["a", "b"] });

      const feed = engine.watch(true, { intervalMs: 5, signal: controller.signal });
      expect((await feed.next()).value).toMatchObject({ id: "first" });

      engine.ingest({ id: "second", nodes: ["a", "b"] });
      expect((await feed.next()).value).toMatchObject({ id: "second" });

      const pending = feed.next();
      setTimeout(() => controller.abort(), 30);
      expect(await pending).toEqual({ done: true, value: undefined });
    });

    it("ends immediately when already aborted", async () => {
      const engine = new FlowReplayEngine({ flows: FLOWS });
      engine.ingest({ nodes: ["a", "b"] });
      const controller = new AbortController();
      controller.abort();

      const feed = engine.watch(true, { intervalMs: 5, signal: controller.signal });
      expect(await feed.next()).toEqual({ done: true, value: undefined });
    });
  });
});
