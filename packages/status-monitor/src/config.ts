import { envBool, envInt, validateEnvironment } from "@statusboard/shared/utils";
import type { EnvRequirement } from "@statusboard/shared/utils";

import { DEFAULT_CATALOG_PATH } from "./catalog.js";
import type { StatusMonitorConfig } from "./types.js";

export const SERVICE_NAME = "status-monitor";
export const SERVICE_VERSION = "1.0.0";

export const ENV_REQUIREMENTS: EnvRequirement[] = [
  { name: "STATUS_MONITOR_PORT", required: false, default: "3009", type: "integer", min: 1 },
  { name: "STATUS_MONITOR_HOST", required: false, default: "0.0.0.0" },
  { name: "PROBE_TIMEOUT_MS", required: false, default: "10000", type: "integer", min: 1 },
  { name: "CACHE_TTL_SECONDS", required: false, default: "30", type: "integer", min: 0 },
  { name: "STATUS_STREAM_INTERVAL_MS", required: false, default: "8000", type: "integer", min: 1 },
  { name: "FLOW_STREAM_INTERVAL_MS", required: false, default: "1000", type: "integer", min: 1 },
  {
    name: "BACKGROUND_REFRESH_MS",
    required: false,
    default: "30000",
    type: "integer",
    min: 0,
    description: "0 disables the background refresh",
  },
  { name: "STATUS_CATALOG_PATH", required: false, description: "targets, flows and topology JSON" },
  { name: "FLOW_INGEST_TOKEN", required: false, description: "shared secret for flow ingestion" },
  { name: "REDIS_URL", required: false, description: "incident pub/sub" },
  { name: "SSO_ENABLED", required: false, default: "false", type: "boolean" },
  { name: "SSO_ISSUER", required: false, default: "https://login.example.com" },
  { name: "SSO_CLIENT_ID", required: false, default: "status" },
  { name: "SSO_CLIENT_SECRET", required: false, default: "" },
  { name: "SSO_CALLBACK_URL", required: false, default: "http://localhost:3009/auth/callback" },
];

/**
 * Resolve the typed service configuration from the environment.
 * Invalid values exit the process unless `exitOnError` is false, in which
 * case the defaults stand in for them.
 */
export function loadConfig(exitOnError = true): StatusMonitorConfig {
  const { values } = validateEnvironment(ENV_REQUIREMENTS, exitOnError);

  return {
    port: envInt(values, "STATUS_MONITOR_PORT", 3009),
    host: values["STATUS_MONITOR_HOST"] ?? "0.0.0.0",
    version: SERVICE_VERSION,
    probeTimeoutMs: envInt(values, "PROBE_TIMEOUT_MS", 10_000),
    cacheTtlSeconds: envInt(values, "CACHE_TTL_SECONDS", 30),
    statusStreamIntervalMs: envInt(values, "STATUS_STREAM_INTERVAL_MS", 8_000),
    flowStreamIntervalMs: envInt(values, "FLOW_STREAM_INTERVAL_MS", 1_000),
    backgroundRefreshMs: envInt(values, "BACKGROUND_REFRESH_MS", 30_000),
    catalogPath: values["STATUS_CATALOG_PATH"] ?? DEFAULT_CATALOG_PATH,
    ingestToken: values["FLOW_INGEST_TOKEN"],
    redisUrl: values["REDIS_URL"],
    sso: {
      enabled: envBool(values, "SSO_ENABLED", false),
      issuer: (values["SSO_ISSUER"] ?? "https://login.example.com").replace(/\/+$/, ""),
      clientId: values["SSO_CLIENT_ID"] ?? "status",
      clientSecret: values["SSO_CLIENT_SECRET"] ?? "",
      callbackUrl: values["SSO_CALLBACK_URL"] ?? "http://localhost:3009/auth/callback",
    },
  };
}
