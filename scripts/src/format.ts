/**
 * Console formatting for the status-check CLI.
 */

export interface ServiceRow {
  name: string;
  category: string;
  status: string;
  /** 0 when no HTTP response was received. */
  httpCode: number;
  latencyMs: number;
}

export interface StatusReport {
  overall: string;
  checkedAt: string;
  avgLatencyMs: number;
  services: ServiceRow[];
}

const WIDTH = 70;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRow(raw: unknown): ServiceRow | null {
  if (!isRecord(raw)) return null;
  const { name, category, status, httpCode, latencyMs } = raw;
  if (typeof name !== "string" || typeof status !== "string") return null;
  return {
    name,
    category: typeof category === "string" ? category : "",
    status,
    httpCode: typeof httpCode === "number" ? httpCode : 0,
    latencyMs: typeof latencyMs === "number" ? latencyMs : 0,
  };
}

/** Narrow a `/api/status` body, or return null when it is not one. */
export function parseStatusReport(body: unknown): StatusReport | null {
  if (!isRecord(body)) return null;
  const { overall, checkedAt, avgLatencyMs, services } = body;
  if (typeof overall !== "string" || !Array.isArray(services)) return null;

  const rows: ServiceRow[] = [];
  for (const entry of services) {
    const row = parseRow(entry);
    if (row) rows.push(row);
  }

  return {
    overall,
    checkedAt: typeof checkedAt === "string" ? checkedAt : "",
    avgLatencyMs: typeof avgLatencyMs === "number" ? avgLatencyMs : 0,
    services: rows,
  };
}

function pad(str: string, len: number): string {
  return str.padEnd(len);
}

export function formatReport(report: StatusReport): string[] {
  const lines: string[] = [];
  lines.push(`Status: ${report.overall} (checked ${report.checkedAt})`);
  lines.push("=".repeat(WIDTH));
  lines.push(`${pad("Service", 16)} ${pad("Category", 10)} ${pad("Status", 12)} ${pad("Time", 10)} Details`);
  lines.push("-".repeat(WIDTH));

  for (const row of report.services) {
    const detail = row.httpCode > 0 ? `HTTP ${row.httpCode}` : "no response";
    lines.push(
      `${pad(row.name, 16)} ${pad(row.category, 10)} ${pad(row.status.toUpperCase(), 12)} ${pad(`${row.latencyMs}ms`, 10)} ${detail}`.trimEnd(),
    );
  }

  const healthy = report.services.filter((r) => r.status === "operational").length;
  lines.push("-".repeat(WIDTH));
  lines.push(`${healthy}/${report.services.length} operational, average ${report.avgLatencyMs}ms`);
  return lines;
}

/** Exit code for a report: 1 on a partial outage, 0 otherwise. */
export function exitCodeFor(report: StatusReport): number {
  return report.overall === "partial_outage" ? 1 : 0;
}
