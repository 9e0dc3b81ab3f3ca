import type {
  AggregatedStatus,
  AnyStatus,
  FlowDefinition,
  FlowReplay,
  ImpactEntry,
  Incident,
  TopologyView,
  UptimeEntry,
} from "../types.js";
import type { SsoUser } from "../services/sso-client.js";

// ---------------------------------------------------------------------------
// Shared helpers
// ---------------------------------------------------------------------------

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: unknown): string {
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const STATUS_LABELS: Record<AnyStatus, string> = {
  operational: "Operational",
  degraded: "Degraded",
  timeout: "Timeout",
  down: "Down",
  partial_outage: "Partial outage",
};

const STATUS_COLORS: Record<AnyStatus, string> = {
  operational: "#22c55e",
  degraded: "#eab308",
  timeout: "#f97316",
  down: "#ef4444",
  partial_outage: "#ef4444",
};

function badge(status: AnyStatus): string {
  return `<span class="badge" style="background:${STATUS_COLORS[status]}">${escapeHtml(STATUS_LABELS[status])}</span>`;
}

/** Display name from the verified claims, falling back through the usual OIDC fields. */
export function displayName(user: SsoUser | undefined): string | undefined {
  if (!user) return undefined;
  for (const key of ["name", "preferred_username", "email"]) {
    const value = user[key];
    if (typeof value === "string" && value !== "") return value;
  }
  return "User";
}

function layout(title: string, body: string, user?: SsoUser): string {
  const name = displayName(user);
  const account = name
    ? `<div class="account">${escapeHtml(name)} · <a href="/auth/logout">Sign out</a></div>`
    : "";

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>
body{font-family:system-ui,sans-serif;margin:0 auto;max-width:960px;padding:24px;background:#0f172a;color:#e2e8f0}
a{color:#93c5fd}
table{width:100%;border-collapse:collapse;margin:12px 0 24px}
th,td{text-align:left;padding:6px 8px;border-bottom:1px solid #1e293b}
.badge{display:inline-block;padding:2px 8px;border-radius:999px;color:#0f172a;font-size:.8rem;font-weight:600}
.account{float:right;font-size:.9rem}
.muted{color:#94a3b8;font-size:.85rem}
nav a{margin-right:12px}
</style>
</head>
<body>
${account}
${body}
</body>
</html>`;
}

// ---------------------------------------------------------------------------
// Status page
// ---------------------------------------------------------------------------

export interface StatusPageModel {
  status: AggregatedStatus;
  categoryLabels: Record<string, string>;
  uptime: readonly UptimeEntry[];
  openIncidents: readonly Incident[];
  user?: SsoUser;
}

function formatUptime(entry: UptimeEntry | undefined): string {
  return entry?.uptimePercent == null ? "—" : `${entry.uptimePercent.toFixed(1)}%`;
}

export function renderStatusPage(model: StatusPageModel): string {
  const { status, categoryLabels } = model;
  const uptimeByName = new Map(model.uptime.map((u) => [u.name, u]));

  const headline =
    status.overall === "operational"
      ? "All systems operational"
      : `${status.summary.operational} of ${status.summary.total} services operational`;

  const sections = status.categories
    .map((category) => {
      const rows = status.services
        .filter((s) => s.category === category.category)
        .map(
          (s) => `<tr>
<td><a href="${escapeHtml(s.url)}">${escapeHtml(s.name)}</a><div class="muted">${escapeHtml(s.description)}</div></td>
<td>${escapeHtml(s.type)}</td>
<td>${badge(s.status)}</td>
<td>${s.latencyMs} ms</td>
<td>${formatUptime(uptimeByName.get(s.name))}</td>
</tr>`,
        )
        .join("\n");

      return `<h2>${escapeHtml(categoryLabels[category.category] ?? category.category)} ${badge(category.status)}</h2>
<table>
<thead><tr><th>Service</th><th>Type</th><th>Status</th><th>Latency</th><th>Uptime</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>`;
    })
    .join("\n");

  const incidents =
    model.openIncidents.length === 0
      ? `<p class="muted">No open incidents.</p>`
      : `<ul>${model.openIncidents
          .map(
            (i) =>
              `<li>${escapeHtml(i.target)}: ${badge(i.newStatus)} since ${escapeHtml(i.openedAt)}</li>`,
          )
          .join("")}</ul>`;

  const body = `<nav><a href="/">Status</a><a href="/fc">Flow console</a></nav>
<h1>${escapeHtml(headline)} ${badge(status.overall)}</h1>
<p class="muted">Checked ${escapeHtml(status.checkedAt)} · mean latency ${status.avgLatencyMs} ms · v${escapeHtml(status.version)}</p>
${sections}
<h2>Open incidents</h2>
${incidents}`;

  return layout("Service status", body, model.user);
}

// ---------------------------------------------------------------------------
// Flow console
// ---------------------------------------------------------------------------

export interface FlowConsoleModel {
  flows: readonly FlowDefinition[];
  views: readonly TopologyView[];
  view: TopologyView;
  replay: FlowReplay;
  impact: Record<string, ImpactEntry>;
  user?: SsoUser;
}

export function renderFlowConsole(model: FlowConsoleModel): string {
  const { view, replay } = model;

  const tabs = model.views
    .map((v) =>
      v.key === view.key
        ? `<strong>${escapeHtml(v.title)}</strong>`
        : `<a href="/fc/${encodeURIComponent(v.key)}">${escapeHtml(v.title)}</a>`,
    )
    .join(" · ");

  const nodes = view.nodes
    .map((node) => {
      const hit = model.impact[node];
      const note = hit ? ` <span class="muted">impact ${hit.score} (${escapeHtml(hit.reason)})</span>` : "";
      return `<li>${escapeHtml(node)}${note}</li>`;
    })
    .join("");

  const edges = view.edges.map(([from, to]) => `<li>${escapeHtml(from)} → ${escapeHtml(to)}</li>`).join("");

  const flows = model.flows
    .map((f) => `<tr><td>${escapeHtml(f.name)}</td><td>${f.nodes.map(escapeHtml).join(" → ")}</td></tr>`)
    .join("\n");

  const events = [...replay.events]
    .reverse()
    .map(
      (e) => `<tr>
<td>${escapeHtml(e.timestamp)}</td>
<td>${escapeHtml(e.flowName)}</td>
<td>${badge(e.status)}</td>
<td>${e.latencyMs} ms</td>
<td>${e.qps}</td>
</tr>`,
    )
    .join("\n");

  const body = `<nav><a href="/">Status</a><a href="/fc">Flow console</a></nav>
<h1>Flow console</h1>
<p>${tabs}</p>
<h2>${escapeHtml(view.title)}</h2>
<p class="muted">${escapeHtml(view.description)}</p>
<h3>Nodes</h3><ul>${nodes}</ul>
<h3>Edges</h3><ul>${edges}</ul>
<h2>Flows</h2>
<table><thead><tr><th>Flow</th><th>Path</th></tr></thead><tbody>
${flows}
</tbody></table>
<h2>Recent events <span class="muted">(${escapeHtml(replay.source)}, ${replay.count} events, mean ${replay.avgLatencyMs} ms, ${replay.avgQps} qps)</span></h2>
<table><thead><tr><th>Time</th><th>Flow</th><th>Status</th><th>Latency</th><th>QPS</th></tr></thead><tbody>
${events}
</tbody></table>`;

  return layout(`Flow console · ${view.title}`, body, model.user);
}
