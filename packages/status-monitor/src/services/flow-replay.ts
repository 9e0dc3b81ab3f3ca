import { randomUUID } from "node:crypto";
import { createLogger } from "@statusboard/shared/utils";

import { delay } from "./delay.js";
import { RingBuffer } from "./ring-buffer.js";
import type {
  AggregatedStatus,
  AnyStatus,
  FlowDefinition,
  FlowEvent,
  FlowReplay,
  ProbeResult,
} from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("status-monitor:flows");

export const DEFAULT_REPLAY_CAPACITY = 240;
export const DEFAULT_REPLAY_LIMIT = 50;
export const DEFAULT_WATCH_INTERVAL_MS = 1_000;

/** Synthetic jitter stands in for the unmeasured provider leg: uniform in [15, 60) ms. */
export const JITTER_MIN_MS = 15;
export const JITTER_SPAN_MS = 45;

const QPS_BUDGET = 2200;
const QPS_LATENCY_FLOOR_MS = 60;
const QPS_MIN = 0.2;
const QPS_MAX = 12;
const QPS_FAILURE_FACTOR = 0.45;

const FAILURE_STATUSES: ReadonlySet<AnyStatus> = new Set<AnyStatus>([
  "degraded",
  "down",
  "timeout",
  "partial_outage",
]);

const KNOWN_STATUSES: ReadonlySet<string> = new Set<AnyStatus>([
  "operational",
  "degraded",
  "timeout",
  "down",
  "partial_outage",
]);

export type IngestOutcome = { ok: true; event: FlowEvent } | { ok: false; reason: string };

export interface IngestBatchResult {
  accepted: FlowEvent[];
  rejected: Array<{ index: number; reason: string }>;
}

export interface FlowReplayOptions {
  flows: FlowDefinition[];
  syntheticCapacity?: number;
  realCapacity?: number;
  /** Source of jitter in [0, 1). Default: Math.random */
  random?: () => number;
}

export interface WatchOptions {
  intervalMs?: number;
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function trimmed(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const out = value.trim();
  return out.length > 0 ? out : undefined;
}

/** Epoch milliseconds from an ISO string or a finite number, or NaN. */
function parseTimestamp(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value).getTime() : NaN;
  }
  const text = trimmed(value);
  return text !== undefined ? Date.parse(text) : NaN;
}

function nonNegative(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : undefined;
}

function isKnownStatus(value: string): value is AnyStatus {
  return KNOWN_STATUSES.has(value);
}

/** Throughput estimate for a flow: clamp(2200 / max(latency, 60), 0.2, 12), × 0.45 on failure. */
export function estimateQps(avgLatencyMs: number, failed: boolean): number {
  const base = Math.min(QPS_MAX, Math.max(QPS_MIN, QPS_BUDGET / Math.max(avgLatencyMs, QPS_LATENCY_FLOOR_MS)));
  return round2(failed ? base * QPS_FAILURE_FACTOR : base);
}

/**
 * Normalize an externally reported flow event. Strings are trimmed, missing
 * fields are defaulted, and events with fewer than two hops are rejected.
 */
export function normalizeFlowEvent(raw: unknown, now: Date = new Date()): IngestOutcome {
  if (!isRecord(raw)) {
    return { ok: false, reason: "event must be a JSON object" };
  }

  const nodes = Array.isArray(raw["nodes"])
    ? raw["nodes"].map(trimmed).filter((n): n is string => n !== undefined)
    : [];
  if (nodes.length < 2) {
    return { ok: false, reason: "nodes must contain at least 2 hops" };
  }

  const rawStatus = trimmed(raw["status"])?.toLowerCase();
  const parsedTimestamp = parseTimestamp(raw["timestamp"]);
  const metadata = raw["metadata"];

  const event: FlowEvent = {
    id: trimmed(raw["id"]) ?? randomUUID(),
    flowKey: trimmed(raw["flowKey"]) ?? nodes.join(">"),
    flowName: trimmed(raw["flowName"]) ?? nodes.join(" → "),
    nodes,
    latencyMs: Math.round(nonNegative(raw["latencyMs"]) ?? 0),
    qps: round2(nonNegative(raw["qps"]) ?? 0),
    status: rawStatus !== undefined && isKnownStatus(rawStatus) ? rawStatus : "operational",
    timestamp: Number.isNaN(parsedTimestamp) ? now.toISOString() : new Date(parsedTimestamp).toISOString(),
    source: "external",
  };
  if (isRecord(metadata)) {
    event.metadata = metadata;
  }

  return { ok: true, event };
}

// ---------------------------------------------------------------------------
// FlowReplayEngine
// ---------------------------------------------------------------------------

/**
 * Holds two bounded replay buffers: synthetic events derived from each
 * aggregation cycle, and "real" events reported by external callers.
 */
export class FlowReplayEngine {
  private readonly flows: readonly FlowDefinition[];
  private readonly synthetic: RingBuffer<FlowEvent>;
  private readonly real: RingBuffer<FlowEvent>;
  private readonly random: () => number;

  constructor(options: FlowReplayOptions) {
    this.flows = [...options.flows];
    this.synthetic = new RingBuffer<FlowEvent>(options.syntheticCapacity ?? DEFAULT_REPLAY_CAPACITY);
    this.real = new RingBuffer<FlowEvent>(options.realCapacity ?? DEFAULT_REPLAY_CAPACITY);
    this.random = options.random ?? Math.random;
  }

  getFlows(): readonly FlowDefinition[] {
    return this.flows;
  }

  /** Derive one synthetic event per flow from a freshly published status. */
  recordCycle(status: AggregatedStatus): FlowEvent[] {
    const byName = new Map<string, ProbeResult>(status.services.map((s) => [s.name, s]));
    const events: FlowEvent[] = [];

    for (const flow of this.flows) {
      const backing = flow.services
        .map((name) => byName.get(name))
        .filter((r): r is ProbeResult => r !== undefined);
      if (backing.length === 0) {
        logger.debug({ flow: flow.key }, "No probe results back this flow; skipping");
        continue;
      }

      const avgLatency = backing.reduce((sum, r) => sum + r.latencyMs, 0) / backing.length;
      const jitterMs = JITTER_MIN_MS + this.random() * JITTER_SPAN_MS;
      const failed = backing.some((r) => FAILURE_STATUSES.has(r.status));

      const event: FlowEvent = {
        id: randomUUID(),
        flowKey: flow.key,
        flowName: flow.name,
        nodes: [...flow.nodes],
        latencyMs: Math.round(avgLatency + flow.providerLatencyMs + jitterMs),
        qps: estimateQps(avgLatency, failed),
        status: failed ? "degraded" : "operational",
        timestamp: status.checkedAt,
        metadata: {
          services: backing.map((r) => r.name),
          providerLatencyMs: flow.providerLatencyMs,
          jitterMs: Math.round(jitterMs),
        },
        source: "synthetic",
      };
      this.synthetic.push(event);
      events.push(event);
    }

    return events;
  }

  ingest(raw: unknown): IngestOutcome {
    const outcome = normalizeFlowEvent(raw);
    if (outcome.ok) {
      this.real.push(outcome.event);
      logger.debug({ flowKey: outcome.event.flowKey, id: outcome.event.id }, "Flow event ingested");
    } else {
      logger.warn({ reason: outcome.reason }, "Flow event rejected");
    }
    return outcome;
  }

  ingestBatch(raws: readonly unknown[]): IngestBatchResult {
    const result: IngestBatchResult = { accepted: [], rejected: [] };
    raws.forEach((raw, index) => {
      const outcome = this.ingest(raw);
      if (outcome.ok) {
        result.accepted.push(outcome.event);
      } else {
        result.rejected.push({ index, reason: outcome.reason });
      }
    });
    return result;
  }

  /** The most recent `limit` events, oldest first, from the preferred buffer. */
  replay(limit = DEFAULT_REPLAY_LIMIT, preferReal = true): FlowReplay {
    const useReal = preferReal && this.real.size > 0;
    const events = (useReal ? this.real : this.synthetic).last(limit);
    const count = events.length;

    return {
      source: useReal ? "external" : "synthetic",
      count,
      avgQps: count > 0 ? round2(events.reduce((sum, e) => sum + e.qps, 0) / count) : 0,
      avgLatencyMs: count > 0 ? Math.round(events.reduce((sum, e) => sum + e.latencyMs, 0) / count) : 0,
      events,
    };
  }

  latest(preferReal = true): FlowEvent | undefined {
    if (preferReal && this.real.size > 0) return this.real.latest();
    return this.synthetic.latest();
  }

  /**
   * Level-triggered live feed: polls the latest slot and yields only when its
   * id changes. A slow consumer sees the newest event, not every one in
   * between. Ends when the signal aborts.
   */
  async *watch(preferReal = true, options: WatchOptions = {}): AsyncGenerator<FlowEvent, void, undefined> {
    const intervalMs = options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS;
    const { signal } = options;
    let lastId: string | undefined;

    while (!signal?.aborted) {
      const event = this.latest(preferReal);
      if (event && event.id !== lastId) {
        lastId = event.id;
        yield event;
      }
      await delay(intervalMs, signal);
    }
  }
}
