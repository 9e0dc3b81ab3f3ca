// ---------------------------------------------------------------------------
// Status Monitor Types
// ---------------------------------------------------------------------------

/** Outcome of a single probe. */
export type ProbeStatus = "operational" | "degraded" | "timeout" | "down";

/** Roll-up across every target of one aggregation cycle. */
export type OverallStatus = "operational" | "degraded" | "partial_outage";

/** Any status value that may appear in history or flow events. */
export type AnyStatus = ProbeStatus | OverallStatus;

export type TargetType = "web" | "api" | "internal";

export interface Target {
  name: string;
  /** Public URL shown on the dashboard. */
  url: string;
  /** URL the prober issues its GET against. */
  healthUrl: string;
  category: string;
  type: TargetType;
  description: string;
}

export interface ProbeResult {
  name: string;
  url: string;
  category: string;
  type: TargetType;
  description: string;
  status: ProbeStatus;
  /** 0 when no HTTP response was received. */
  httpCode: number;
  latencyMs: number;
  checkedAt: string;
}

export interface StatusSummary {
  operational: number;
  degraded: number;
  timeout: number;
  down: number;
  total: number;
}

export interface CategorySummary {
  category: string;
  total: number;
  operational: number;
  status: OverallStatus;
}

export interface AggregatedStatus {
  overall: OverallStatus;
  summary: StatusSummary;
  avgLatencyMs: number;
  categories: CategorySummary[];
  /** One entry per registered target, in registration order. */
  services: ProbeResult[];
  checkedAt: string;
  cacheTtlSeconds: number;
  version: string;
}

export interface HistorySample {
  status: AnyStatus;
  latencyMs: number;
  httpCode: number;
  timestamp: string;
}

export interface NodeMetrics {
  samples: number;
  availability: number;
  errorRate: number;
  p50: number;
  p95: number;
  p99: number;
  transitions: number;
  sloTarget: number;
  sloGap: number;
  burnRate: number;
}

export interface UptimeEntry {
  name: string;
  samples: number;
  /** null until the target has at least one sample. */
  uptimePercent: number | null;
  avgLatencyMs: number;
}

export interface Incident {
  id: string;
  target: string;
  kind: "down_transition";
  oldStatus: AnyStatus;
  newStatus: AnyStatus;
  openedAt: string;
  resolved: boolean;
  resolvedAt: string | null;
}

export type IncidentChange = "opened" | "resolved";

export type FlowSource = "synthetic" | "external";

export interface FlowEvent {
  id: string;
  flowKey: string;
  flowName: string;
  /** Ordered hop names, at least two. */
  nodes: string[];
  latencyMs: number;
  qps: number;
  status: AnyStatus;
  timestamp: string;
  metadata?: Record<string, unknown>;
  source: FlowSource;
}

export interface FlowDefinition {
  key: string;
  name: string;
  nodes: string[];
  /** Target names whose probe results back this flow. */
  services: string[];
  /** Latency of the external leg that is not probed directly. */
  providerLatencyMs: number;
}

export interface FlowReplay {
  source: FlowSource;
  count: number;
  avgQps: number;
  avgLatencyMs: number;
  events: FlowEvent[];
}

export type DependencyEdges = Record<string, string[]>;

export interface ImpactEntry {
  score: number;
  reason: string;
  upstream: string;
}

export interface TopologyView {
  key: string;
  title: string;
  description: string;
  nodes: string[];
  edges: Array<[string, string]>;
}

export interface Catalog {
  targets: Target[];
  /** Display label per category key; unknown categories render their key. */
  categoryLabels: Record<string, string>;
  flows: FlowDefinition[];
  dependencies: DependencyEdges;
  topology: TopologyView[];
}

export interface StatusMonitorConfig {
  port: number;
  host: string;
  version: string;
  probeTimeoutMs: number;
  cacheTtlSeconds: number;
  statusStreamIntervalMs: number;
  flowStreamIntervalMs: number;
  backgroundRefreshMs: number;
  catalogPath: string;
  ingestToken: string | undefined;
  redisUrl: string | undefined;
  sso: SsoConfig;
}

export interface SsoConfig {
  enabled: boolean;
  issuer: string;
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
}
