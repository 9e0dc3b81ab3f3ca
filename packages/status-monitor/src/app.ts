import Fastify from "fastify";
import type { FastifyInstance, FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import cookie from "@fastify/cookie";
import { statusErrorHandler } from "@statusboard/shared/middleware";
import { LOG_REDACT_PATHS } from "@statusboard/shared/utils";

import type { StatusAggregator } from "./services/aggregator.js";
import type { FlowReplayEngine } from "./services/flow-replay.js";
import { SsoClient } from "./services/sso-client.js";
import type { SsoProvider } from "./services/sso-client.js";
import { createSsoGate } from "./middleware/sso-gate.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerStatusRoutes } from "./routes/status.js";
import { registerTopologyRoutes } from "./routes/topology.js";
import { registerFlowRoutes } from "./routes/flows.js";
import { registerAuthRoutes } from "./routes/auth.js";
import { registerPageRoutes } from "./routes/pages.js";
import type { Catalog, StatusMonitorConfig } from "./types.js";

export interface AppDependencies {
  config: StatusMonitorConfig;
  catalog: Catalog;
  aggregator: StatusAggregator;
  engine: FlowReplayEngine;
  /** Identity issuer client. Default: an SsoClient built from config.sso */
  sso?: SsoProvider;
  /** Fastify logger options. Default: LOG_LEVEL with timestamps and credential redaction */
  logger?: FastifyServerOptions["logger"];
}

/**
 * Assemble the Fastify application: plugins, the SSO gate when enabled, the
 * shared error handler and every route. Does not listen.
 */
export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config, catalog, aggregator, engine } = deps;
  const sso = deps.sso ?? new SsoClient(config.sso);

  const fastify = Fastify({
    logger: deps.logger ?? {
      level: process.env["LOG_LEVEL"] ?? "info",
      timestamp: true,
      redact: LOG_REDACT_PATHS,
    },
  });

  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });
  await fastify.register(cookie);

  fastify.setErrorHandler(statusErrorHandler);

  if (config.sso.enabled) {
    fastify.addHook("onRequest", createSsoGate(sso));
  }

  registerHealthRoute(fastify, config.version);
  registerStatusRoutes(fastify, { aggregator, streamIntervalMs: config.statusStreamIntervalMs });
  registerTopologyRoutes(fastify, {
    aggregator,
    topology: catalog.topology,
    dependencies: catalog.dependencies,
  });
  registerFlowRoutes(fastify, {
    engine,
    ingestToken: config.ingestToken,
    streamIntervalMs: config.flowStreamIntervalMs,
  });
  registerAuthRoutes(fastify, sso);
  registerPageRoutes(fastify, { aggregator, engine, catalog });

  return fastify;
}
