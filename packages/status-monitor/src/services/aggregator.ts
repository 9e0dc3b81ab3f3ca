import { createLogger } from "@statusboard/shared/utils";

import { HistoryStore } from "./history.js";
import { IncidentLog } from "./incidents.js";
import type { TargetProber } from "./prober.js";
import type {
  AggregatedStatus,
  CategorySummary,
  OverallStatus,
  ProbeResult,
  ProbeStatus,
  StatusSummary,
  Target,
} from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("status-monitor:aggregator");

export const DEFAULT_CACHE_TTL_SECONDS = 30;

export interface AggregatorOptions {
  targets: Target[];
  prober: TargetProber;
  version: string;
  cacheTtlSeconds?: number;
  history?: HistoryStore;
  incidents?: IncidentLog;
}

export type RefreshListener = (status: AggregatedStatus) => void;

interface CacheEntry {
  payload: AggregatedStatus;
  expiresAt: number;
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

export function computeOverall(results: readonly Pick<ProbeResult, "status">[]): OverallStatus {
  if (results.some((r) => r.status === "down" || r.status === "timeout")) return "partial_outage";
  if (results.some((r) => r.status === "degraded")) return "degraded";
  return "operational";
}

export function summarize(results: readonly Pick<ProbeResult, "status">[]): StatusSummary {
  const summary: StatusSummary = { operational: 0, degraded: 0, timeout: 0, down: 0, total: 0 };
  for (const result of results) {
    summary[result.status]++;
    summary.total++;
  }
  return summary;
}

export function summarizeCategories(results: readonly ProbeResult[]): CategorySummary[] {
  const groups = new Map<string, ProbeResult[]>();
  for (const result of results) {
    const group = groups.get(result.category);
    if (group) {
      group.push(result);
    } else {
      groups.set(result.category, [result]);
    }
  }

  return Array.from(groups, ([category, members]) => ({
    category,
    total: members.length,
    operational: members.filter((m) => m.status === "operational").length,
    status: computeOverall(members),
  }));
}

// ---------------------------------------------------------------------------
// StatusAggregator
// ---------------------------------------------------------------------------

/**
 * Process-scoped owner of the status cache, history and incident log.
 *
 * Refreshes fan out one probe per target and fan back in by registration
 * order. The published payload is swapped in as a single reference, and
 * concurrent callers share one in-flight refresh.
 */
export class StatusAggregator {
  readonly history: HistoryStore;
  readonly incidents: IncidentLog;

  private readonly targets: readonly Target[];
  private readonly prober: TargetProber;
  private readonly version: string;
  private readonly cacheTtlSeconds: number;

  private cache: CacheEntry | null = null;
  private inFlight: Promise<AggregatedStatus> | null = null;
  private readonly lastStatus = new Map<string, ProbeStatus>();
  private readonly lastResults = new Map<string, ProbeResult>();
  private readonly refreshListeners = new Set<RefreshListener>();

  constructor(options: AggregatorOptions) {
    this.targets = [...options.targets];
    this.prober = options.prober;
    this.version = options.version;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.history = options.history ?? new HistoryStore();
    this.incidents = options.incidents ?? new IncidentLog();
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /** Cached status while fresh, otherwise a new probe round. */
  async checkAll(force = false): Promise<AggregatedStatus> {
    if (!force && this.cache && Date.now() < this.cache.expiresAt) {
      return this.cache.payload;
    }

    if (this.inFlight) return this.inFlight;

    this.inFlight = this.refresh().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Whether the next non-forced checkAll would be served from cache. */
  isFresh(): boolean {
    return this.cache !== null && Date.now() < this.cache.expiresAt;
  }

  getTargetNames(): string[] {
    return this.targets.map((t) => t.name);
  }

  findTarget(name: string): Target | undefined {
    return this.targets.find((t) => t.name === name);
  }

  getLastResult(name: string): ProbeResult | undefined {
    return this.lastResults.get(name);
  }

  addRefreshListener(listener: RefreshListener): () => void {
    this.refreshListeners.add(listener);
    return () => {
      this.refreshListeners.delete(listener);
    };
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async refresh(): Promise<AggregatedStatus> {
    const started = Date.now();
    const settled = await Promise.allSettled(this.targets.map((target) => this.prober.probe(target)));

    const services: ProbeResult[] = settled.map((outcome, i) => {
      if (outcome.status === "fulfilled") return outcome.value;

      const target = this.targets[i];
      if (!target) throw new Error(`Probe outcome ${i} has no matching target`);
      logger.error({ err: outcome.reason, target: target.name }, "Prober rejected; recording target as down");
      return {
        name: target.name,
        url: target.url,
        category: target.category,
        type: target.type,
        description: target.description,
        status: "down",
        httpCode: 0,
        latencyMs: Date.now() - started,
        checkedAt: new Date().toISOString(),
      };
    });

    for (const result of services) {
      this.history.record(result.name, {
        status: result.status,
        latencyMs: result.latencyMs,
        httpCode: result.httpCode,
        timestamp: result.checkedAt,
      });
      const previous = this.lastStatus.get(result.name) ?? "operational";
      this.incidents.transitionCheck(result.name, previous, result.status, result.checkedAt);
      this.lastStatus.set(result.name, result.status);
      this.lastResults.set(result.name, result);
    }

    const totalLatency = services.reduce((sum, s) => sum + s.latencyMs, 0);
    const payload: AggregatedStatus = {
      overall: computeOverall(services),
      summary: summarize(services),
      avgLatencyMs: services.length > 0 ? Math.round(totalLatency / services.length) : 0,
      categories: summarizeCategories(services),
      services,
      checkedAt: new Date().toISOString(),
      cacheTtlSeconds: this.cacheTtlSeconds,
      version: this.version,
    };

    this.cache = { payload, expiresAt: Date.now() + this.cacheTtlSeconds * 1000 };

    logger.info(
      {
        overall: payload.overall,
        summary: payload.summary,
        avgLatencyMs: payload.avgLatencyMs,
        durationMs: Date.now() - started,
      },
      "Status refreshed",
    );

    for (const listener of this.refreshListeners) {
      try {
        listener(payload);
      } catch (err) {
        logger.error({ err }, "Refresh listener failed");
      }
    }

    return payload;
  }
}
