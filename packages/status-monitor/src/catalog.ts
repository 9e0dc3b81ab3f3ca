import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { Catalog, DependencyEdges, FlowDefinition, Target, TargetType, TopologyView } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Bundled catalog, used unless STATUS_CATALOG_PATH points elsewhere. */
export const DEFAULT_CATALOG_PATH = join(__dirname, "..", "config", "catalog.json");

const TARGET_TYPES: readonly TargetType[] = ["web", "api", "internal"];

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(obj: Record<string, unknown>, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new CatalogError(`${where}.${key} must be a non-empty string`);
  }
  return value.trim();
}

function readStringArray(obj: Record<string, unknown>, key: string, where: string): string[] {
  const value = obj[key];
  if (!Array.isArray(value)) {
    throw new CatalogError(`${where}.${key} must be an array of strings`);
  }
  return value.map((item, i) => {
    if (typeof item !== "string" || item.trim() === "") {
      throw new CatalogError(`${where}.${key}[${i}] must be a non-empty string`);
    }
    return item.trim();
  });
}

function readArray(obj: Record<string, unknown>, key: string): unknown[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new CatalogError(`catalog.${key} must be an array`);
  return value;
}

function isTargetType(value: string): value is TargetType {
  return TARGET_TYPES.some((t) => t === value);
}

// ---------------------------------------------------------------------------
// Section parsers
// ---------------------------------------------------------------------------

function parseTarget(raw: unknown, i: number): Target {
  const where = `targets[${i}]`;
  if (!isRecord(raw)) throw new CatalogError(`${where} must be an object`);

  const type = readString(raw, "type", where);
  if (!isTargetType(type)) {
    throw new CatalogError(`${where}.type must be one of ${TARGET_TYPES.join(", ")}, got "${type}"`);
  }

  const url = readString(raw, "url", where);
  return {
    name: readString(raw, "name", where),
    url,
    healthUrl: typeof raw["healthUrl"] === "string" && raw["healthUrl"].trim() !== "" ? raw["healthUrl"].trim() : url,
    category: typeof raw["category"] === "string" && raw["category"].trim() !== "" ? raw["category"].trim() : "core",
    type,
    description: typeof raw["description"] === "string" ? raw["description"] : "",
  };
}

function parseFlow(raw: unknown, i: number): FlowDefinition {
  const where = `flows[${i}]`;
  if (!isRecord(raw)) throw new CatalogError(`${where} must be an object`);

  const nodes = readStringArray(raw, "nodes", where);
  if (nodes.length < 2) {
    throw new CatalogError(`${where}.nodes must contain at least 2 hops`);
  }

  const provider = raw["providerLatencyMs"] ?? 0;
  if (typeof provider !== "number" || !Number.isFinite(provider) || provider < 0) {
    throw new CatalogError(`${where}.providerLatencyMs must be a non-negative number`);
  }

  return {
    key: readString(raw, "key", where),
    name: readString(raw, "name", where),
    nodes,
    services: readStringArray(raw, "services", where),
    providerLatencyMs: provider,
  };
}

function parseTopologyView(raw: unknown, i: number): TopologyView {
  const where = `topology[${i}]`;
  if (!isRecord(raw)) throw new CatalogError(`${where} must be an object`);

  const rawEdges = raw["edges"] ?? [];
  if (!Array.isArray(rawEdges)) throw new CatalogError(`${where}.edges must be an array`);

  const edges = rawEdges.map((edge: unknown, j): [string, string] => {
    const pair: unknown[] = Array.isArray(edge) ? edge : [];
    const [from, to] = pair;
    if (pair.length !== 2 || typeof from !== "string" || typeof to !== "string") {
      throw new CatalogError(`${where}.edges[${j}] must be a [from, to] pair of strings`);
    }
    return [from, to];
  });

  return {
    key: readString(raw, "key", where),
    title: readString(raw, "title", where),
    description: typeof raw["description"] === "string" ? raw["description"] : "",
    nodes: readStringArray(raw, "nodes", where),
    edges,
  };
}

function parseDependencies(raw: unknown): DependencyEdges {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new CatalogError("catalog.dependencies must be an object");

  const edges: DependencyEdges = {};
  for (const upstream of Object.keys(raw)) {
    edges[upstream] = readStringArray(raw, upstream, "dependencies");
  }
  return edges;
}

function parseCategoryLabels(raw: unknown): Record<string, string> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new CatalogError("catalog.categoryLabels must be an object");

  const labels: Record<string, string> = {};
  for (const key of Object.keys(raw)) {
    labels[key] = readString(raw, key, "categoryLabels");
  }
  return labels;
}

// ---------------------------------------------------------------------------
// Cross-reference checks
// ---------------------------------------------------------------------------

function findDuplicate(values: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

function checkReferences(catalog: Catalog): void {
  if (catalog.targets.length === 0) {
    throw new CatalogError("catalog.targets must list at least one target");
  }

  const duplicateTarget = findDuplicate(catalog.targets.map((t) => t.name));
  if (duplicateTarget) throw new CatalogError(`Duplicate target name "${duplicateTarget}"`);

  const duplicateFlow = findDuplicate(catalog.flows.map((f) => f.key));
  if (duplicateFlow) throw new CatalogError(`Duplicate flow key "${duplicateFlow}"`);

  const duplicateView = findDuplicate(catalog.topology.map((v) => v.key));
  if (duplicateView) throw new CatalogError(`Duplicate topology view "${duplicateView}"`);

  const known = new Set(catalog.targets.map((t) => t.name));

  for (const flow of catalog.flows) {
    const unknown = flow.services.find((name) => !known.has(name));
    if (unknown) throw new CatalogError(`Flow "${flow.key}" references unknown target "${unknown}"`);
  }

  for (const [upstream, downstreams] of Object.entries(catalog.dependencies)) {
    if (!known.has(upstream)) {
      throw new CatalogError(`Dependency upstream "${upstream}" is not a registered target`);
    }
    const unknown = downstreams.find((name) => !known.has(name));
    if (unknown) {
      throw new CatalogError(`Dependency "${upstream}" references unknown target "${unknown}"`);
    }
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Validate a decoded catalog document. Throws CatalogError on the first problem. */
export function parseCatalog(raw: unknown): Catalog {
  if (!isRecord(raw)) throw new CatalogError("catalog must be a JSON object");

  const catalog: Catalog = {
    targets: readArray(raw, "targets").map(parseTarget),
    categoryLabels: parseCategoryLabels(raw["categoryLabels"]),
    flows: readArray(raw, "flows").map(parseFlow),
    dependencies: parseDependencies(raw["dependencies"]),
    topology: readArray(raw, "topology").map(parseTopologyView),
  };

  checkReferences(catalog);
  return catalog;
}

export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): Catalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new CatalogError(`Failed to read catalog at ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseCatalog(raw);
}
