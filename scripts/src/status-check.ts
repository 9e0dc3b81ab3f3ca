/**
 * Operator CLI for a running status monitor.
 *
 * Usage:
 *   tsx src/status-check.ts check [--url http://localhost:3009] [--force]
 *   tsx src/status-check.ts ingest events.json [--token <token>]
 */

import { readFileSync } from "node:fs";
import { Command } from "commander";
import { request } from "undici";
import { exitCodeFor, formatReport, parseStatusReport } from "./format.js";

const DEFAULT_URL = process.env["STATUS_MONITOR_URL"] ?? "http://localhost:3009";

interface CheckOptions {
  url: string;
  force?: boolean;
}

interface IngestOptions {
  url: string;
  token?: string;
}

async function check(opts: CheckOptions): Promise<number> {
  const target = new URL("/api/status", opts.url);
  if (opts.force) target.searchParams.set("force", "true");

  const res = await request(target, { method: "GET", headersTimeout: 30_000 });
  const body: unknown = await res.body.json();
  if (res.statusCode !== 200) {
    console.error(`Status request failed: HTTP ${res.statusCode}`);
    return 2;
  }

  const report = parseStatusReport(body);
  if (!report) {
    console.error("Unexpected response from /api/status");
    return 2;
  }

  for (const line of formatReport(report)) console.log(line);
  return exitCodeFor(report);
}

async function ingest(file: string, opts: IngestOptions): Promise<number> {
  const parsed: unknown = JSON.parse(readFileSync(file, "utf-8"));
  const events = Array.isArray(parsed) ? parsed : [parsed];

  const headers: Record<string, string> = { "content-type": "application/json" };
  if (opts.token) headers["authorization"] = `Bearer ${opts.token}`;

  const res = await request(new URL("/api/flows/ingest", opts.url), {
    method: "POST",
    headers,
    body: JSON.stringify({ events }),
  });
  const body: unknown = await res.body.json();

  if (res.statusCode !== 202) {
    console.error(`Ingest failed: HTTP ${res.statusCode}`);
    console.error(JSON.stringify(body, null, 2));
    return 1;
  }

  console.log(JSON.stringify(body, null, 2));
  return 0;
}

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("status-check")
  .description("Query and feed a running status monitor");

program
  .command("check")
  .description("Print the current status of every monitored service")
  .option("--url <url>", "Base URL of the status monitor", DEFAULT_URL)
  .option("--force", "Bypass the status cache", false)
  .action(async (opts: CheckOptions) => {
    process.exitCode = await check(opts);
  });

program
  .command("ingest")
  .description("Send externally observed flow events from a JSON file")
  .argument("<file>", "JSON file holding one event or an array of events")
  .option("--url <url>", "Base URL of the status monitor", DEFAULT_URL)
  .option("--token <token>", "Ingest token", process.env["FLOW_INGEST_TOKEN"])
  .action(async (file: string, opts: IngestOptions) => {
    process.exitCode = await ingest(file, opts);
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
