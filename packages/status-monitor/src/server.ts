import "dotenv/config";
import { Redis } from "ioredis";
import { createLogger } from "@statusboard/shared/utils";

import { buildApp } from "./app.js";
import { loadCatalog } from "./catalog.js";
import { loadConfig } from "./config.js";
import { StatusAggregator } from "./services/aggregator.js";
import { FlowReplayEngine } from "./services/flow-replay.js";
import { createIncidentPublisher } from "./services/incidents.js";
import { Prober } from "./services/prober.js";

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

const logger = createLogger("status-monitor");

// ---------------------------------------------------------------------------
// Main startup
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const config = loadConfig();
  const catalog = loadCatalog(config.catalogPath);
  logger.info(
    { targets: catalog.targets.length, flows: catalog.flows.length, catalogPath: config.catalogPath },
    "Catalog loaded",
  );

  // -------------------------------------------------------------------------
  // Core services
  // -------------------------------------------------------------------------
  const aggregator = new StatusAggregator({
    targets: catalog.targets,
    prober: new Prober({ timeoutMs: config.probeTimeoutMs }),
    version: config.version,
    cacheTtlSeconds: config.cacheTtlSeconds,
  });

  const engine = new FlowReplayEngine({ flows: catalog.flows });
  aggregator.addRefreshListener((status) => {
    engine.recordCycle(status);
  });

  if (!config.ingestToken) {
    logger.warn("FLOW_INGEST_TOKEN is not set; flow ingestion is open to anyone");
  }

  // -------------------------------------------------------------------------
  // Optional Redis incident pub/sub
  // -------------------------------------------------------------------------
  let redis: Redis | undefined;
  if (config.redisUrl) {
    logger.info("Connecting to Redis...");
    redis = new Redis(config.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        return Math.min(times * 200, 5000);
      },
      lazyConnect: true,
    });

    try {
      await redis.connect();
      aggregator.incidents.addListener(createIncidentPublisher(redis));
      logger.info("Redis connected; publishing incidents");
    } catch (err) {
      logger.error({ err }, "Failed to connect to Redis; incidents will not be published");
      redis.disconnect();
      redis = undefined;
    }
  }

  // -------------------------------------------------------------------------
  // HTTP server
  // -------------------------------------------------------------------------
  const fastify = await buildApp({ config, catalog, aggregator, engine });

  // -------------------------------------------------------------------------
  // Background refresh loop
  // -------------------------------------------------------------------------
  const refresh = (): void => {
    aggregator.checkAll(true).catch((err: unknown) => {
      logger.error({ err }, "Background refresh failed");
    });
  };

  let refreshTimer: NodeJS.Timeout | undefined;
  if (config.backgroundRefreshMs > 0) {
    refresh();
    refreshTimer = setInterval(refresh, config.backgroundRefreshMs);
    logger.info({ intervalMs: config.backgroundRefreshMs }, "Background refresh started");
  }

  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host, sso: config.sso.enabled }, "Status monitor server started");

  // -------------------------------------------------------------------------
  // Graceful shutdown
  // -------------------------------------------------------------------------
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down status monitor...");

    if (refreshTimer) clearInterval(refreshTimer);

    try {
      await fastify.close();
      logger.info("Fastify server closed");
    } catch (err) {
      logger.error({ err }, "Error closing Fastify");
    }

    if (redis) {
      try {
        await redis.quit();
        logger.info("Redis disconnected");
      } catch (err) {
        logger.error({ err }, "Error disconnecting Redis");
      }
    }

    logger.info("Status monitor shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Status monitor failed to start");
  process.exit(1);
});
