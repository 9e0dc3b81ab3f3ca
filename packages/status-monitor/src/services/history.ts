import { RingBuffer } from "./ring-buffer.js";
import type { AnyStatus, HistorySample, NodeMetrics, UptimeEntry } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Roughly one hour of samples at a 30 s cadence. */
export const DEFAULT_HISTORY_CAPACITY = 120;
export const DEFAULT_SLO_TARGET = 99.9;
/** Trailing window used for the /api/metrics uptime table. */
export const UPTIME_WINDOW = 60;

const ERROR_STATUSES: ReadonlySet<AnyStatus> = new Set<AnyStatus>([
  "degraded",
  "down",
  "timeout",
  "partial_outage",
]);

const MIN_ERROR_BUDGET = 0.1;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Percentile by linear interpolation between the closest ranks
 * (rank = p/100 × (n − 1) over the sorted values). Returns 0 for no values.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (Math.min(100, Math.max(0, p)) / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const lo = sorted[lower] ?? 0;
  const hi = sorted[upper] ?? lo;
  return lo + (hi - lo) * (rank - lower);
}

export function isErrorSample(sample: Pick<HistorySample, "status" | "httpCode">): boolean {
  return sample.httpCode >= 400 || ERROR_STATUSES.has(sample.status);
}

export function computeMetrics(
  samples: readonly HistorySample[],
  sloTarget = DEFAULT_SLO_TARGET,
): NodeMetrics {
  if (samples.length === 0) {
    return {
      samples: 0,
      availability: 100,
      errorRate: 0,
      p50: 0,
      p95: 0,
      p99: 0,
      transitions: 0,
      sloTarget,
      sloGap: 0,
      burnRate: 0,
    };
  }

  const errors = samples.filter(isErrorSample).length;
  const availability = ((samples.length - errors) / samples.length) * 100;
  const errorRate = 100 - availability;
  const latencies = samples.map((s) => s.latencyMs);

  let transitions = 0;
  for (let i = 1; i < samples.length; i++) {
    if (samples[i]?.status !== samples[i - 1]?.status) transitions++;
  }

  return {
    samples: samples.length,
    availability: round(availability, 3),
    errorRate: round(errorRate, 3),
    p50: round(percentile(latencies, 50), 2),
    p95: round(percentile(latencies, 95), 2),
    p99: round(percentile(latencies, 99), 2),
    transitions,
    sloTarget,
    sloGap: round(Math.max(0, sloTarget - availability), 3),
    burnRate: round(errorRate / Math.max(100 - sloTarget, MIN_ERROR_BUDGET), 3),
  };
}

// ---------------------------------------------------------------------------
// HistoryStore
// ---------------------------------------------------------------------------

/** Per-target ring buffers of recent probe outcomes. */
export class HistoryStore {
  private readonly buffers = new Map<string, RingBuffer<HistorySample>>();

  constructor(readonly capacity = DEFAULT_HISTORY_CAPACITY) {}

  record(name: string, sample: HistorySample): void {
    let buffer = this.buffers.get(name);
    if (!buffer) {
      buffer = new RingBuffer<HistorySample>(this.capacity);
      this.buffers.set(name, buffer);
    }
    buffer.push(sample);
  }

  /** The last `limit` samples for one target, oldest first. */
  recent(name: string, limit = this.capacity): HistorySample[] {
    return this.buffers.get(name)?.last(limit) ?? [];
  }

  /** The last `limit` samples for each of the given targets. */
  snapshot(names: readonly string[], limit: number): Record<string, HistorySample[]> {
    const out: Record<string, HistorySample[]> = {};
    for (const name of names) {
      out[name] = this.recent(name, limit);
    }
    return out;
  }

  metrics(name: string, window = this.capacity, sloTarget = DEFAULT_SLO_TARGET): NodeMetrics {
    return computeMetrics(this.recent(name, window), sloTarget);
  }

  /** Uptime and mean latency for each target over the trailing window. */
  uptime(names: readonly string[], window = UPTIME_WINDOW): UptimeEntry[] {
    return names.map((name) => {
      const samples = this.recent(name, window);
      if (samples.length === 0) {
        return { name, samples: 0, uptimePercent: null, avgLatencyMs: 0 };
      }
      const up = samples.filter((s) => s.status === "operational").length;
      const totalLatency = samples.reduce((sum, s) => sum + s.latencyMs, 0);
      return {
        name,
        samples: samples.length,
        uptimePercent: round((up / samples.length) * 100, 1),
        avgLatencyMs: Math.round(totalLatency / samples.length),
      };
    });
  }
}
