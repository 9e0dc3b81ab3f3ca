import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { createLogger } from "@statusboard/shared/utils";
import { ApiError } from "@statusboard/shared/middleware";

import type { StatusAggregator } from "../services/aggregator.js";
import { delay } from "../services/delay.js";
import { DEFAULT_HISTORY_CAPACITY, UPTIME_WINDOW } from "../services/history.js";
import { parseBool, parseLimit } from "./query.js";
import { openEventStream } from "./sse.js";

const logger = createLogger("status-monitor:status-routes");

const DEFAULT_HISTORY_LIMIT = 20;

// ---------------------------------------------------------------------------
// Route parameter / query types
// ---------------------------------------------------------------------------

interface StatusQuery {
  force?: string;
}

interface LimitQuery {
  limit?: string;
}

interface NodeParams {
  name: string;
}

export interface StatusRoutesConfig {
  aggregator: StatusAggregator;
  streamIntervalMs: number;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

/**
 * Register the status, history, metrics and incident routes.
 */
export function registerStatusRoutes(fastify: FastifyInstance, config: StatusRoutesConfig): void {
  const { aggregator, streamIntervalMs } = config;

  // -------------------------------------------------------------------------
  // GET /api/status - Aggregated status, served from cache while fresh
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: StatusQuery }>(
    "/api/status",
    async (request: FastifyRequest<{ Querystring: StatusQuery }>, reply: FastifyReply) => {
      const force = parseBool(request.query.force, false, "force");
      const cacheHit = !force && aggregator.isFresh();

      const status = await aggregator.checkAll(force);
      return reply.code(200).header("X-Cache", cacheHit ? "HIT" : "MISS").send(status);
    },
  );

  // -------------------------------------------------------------------------
  // GET /api/status/stream - SSE, one forced refresh per interval
  // -------------------------------------------------------------------------
  fastify.get("/api/status/stream", async (_request: FastifyRequest, reply: FastifyReply) => {
    const stream = openEventStream(reply);
    logger.debug("Status stream opened");

    while (!stream.signal.aborted) {
      try {
        stream.send(await aggregator.checkAll(true));
      } catch (err) {
        logger.error({ err }, "Status stream refresh failed");
      }
      await delay(streamIntervalMs, stream.signal);
    }

    logger.debug("Status stream closed");
    stream.close();
  });

  // -------------------------------------------------------------------------
  // GET /api/status/history - Last N samples per target
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: LimitQuery }>(
    "/api/status/history",
    async (request: FastifyRequest<{ Querystring: LimitQuery }>, reply: FastifyReply) => {
      const limit = parseLimit(request.query.limit, DEFAULT_HISTORY_LIMIT, DEFAULT_HISTORY_CAPACITY);
      return reply.code(200).send({
        limit,
        history: aggregator.history.snapshot(aggregator.getTargetNames(), limit),
      });
    },
  );

  // -------------------------------------------------------------------------
  // GET /api/status/node/:name - One target's latest result, history and metrics
  // -------------------------------------------------------------------------
  fastify.get<{ Params: NodeParams; Querystring: LimitQuery }>(
    "/api/status/node/:name",
    async (
      request: FastifyRequest<{ Params: NodeParams; Querystring: LimitQuery }>,
      reply: FastifyReply,
    ) => {
      const { name } = request.params;
      const target = aggregator.findTarget(name);
      if (!target) {
        throw new ApiError(404, "UNKNOWN_TARGET", `No target registered with name: ${name}`, {
          validTargets: aggregator.getTargetNames(),
        });
      }

      const limit = parseLimit(request.query.limit, DEFAULT_HISTORY_LIMIT, DEFAULT_HISTORY_CAPACITY);
      if (!aggregator.getLastResult(name)) {
        await aggregator.checkAll();
      }

      return reply.code(200).send({
        service: aggregator.getLastResult(name) ?? target,
        history: aggregator.history.recent(name, limit),
        metrics: aggregator.history.metrics(name, limit),
      });
    },
  );

  // -------------------------------------------------------------------------
  // GET /api/metrics - Uptime and mean latency over the trailing window
  // -------------------------------------------------------------------------
  fastify.get("/api/metrics", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      timestamp: new Date().toISOString(),
      window: UPTIME_WINDOW,
      metrics: aggregator.history.uptime(aggregator.getTargetNames()),
    });
  });

  // -------------------------------------------------------------------------
  // GET /api/incidents - Incident log, newest first
  // -------------------------------------------------------------------------
  fastify.get("/api/incidents", async (_request: FastifyRequest, reply: FastifyReply) => {
    const incidents = aggregator.incidents.list();
    return reply.code(200).send({
      count: incidents.length,
      open: incidents.filter((i) => !i.resolved).length,
      incidents,
    });
  });
}
