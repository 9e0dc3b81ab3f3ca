import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { createLogger } from "@statusboard/shared/utils";
import { ApiError } from "@statusboard/shared/middleware";

import { DEFAULT_REPLAY_CAPACITY, DEFAULT_REPLAY_LIMIT } from "../services/flow-replay.js";
import type { FlowReplayEngine } from "../services/flow-replay.js";
import { createIngestAuthGuard } from "../middleware/ingest-auth.js";
import { parseBool, parseLimit } from "./query.js";
import { openEventStream } from "./sse.js";

const logger = createLogger("status-monitor:flow-routes");

// ---------------------------------------------------------------------------
// Request body / query types
// ---------------------------------------------------------------------------

interface ReplayQuery {
  limit?: string;
  prefer_real?: string;
}

interface StreamQuery {
  prefer_real?: string;
}

interface IngestBatchBody {
  events?: unknown;
}

export interface FlowRoutesConfig {
  engine: FlowReplayEngine;
  ingestToken: string | undefined;
  streamIntervalMs: number;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

/**
 * Register the flow replay, live feed and ingest routes.
 */
export function registerFlowRoutes(fastify: FastifyInstance, config: FlowRoutesConfig): void {
  const { engine, streamIntervalMs } = config;
  const ingestAuth = createIngestAuthGuard(config.ingestToken);

  // -------------------------------------------------------------------------
  // GET /api/flows - Declared flow definitions
  // -------------------------------------------------------------------------
  fastify.get("/api/flows", async (_request: FastifyRequest, reply: FastifyReply) => {
    const flows = engine.getFlows();
    return reply.code(200).send({ count: flows.length, flows });
  });

  // -------------------------------------------------------------------------
  // GET /api/flows/replay - Most recent events, real ones preferred
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: ReplayQuery }>(
    "/api/flows/replay",
    async (request: FastifyRequest<{ Querystring: ReplayQuery }>, reply: FastifyReply) => {
      const limit = parseLimit(request.query.limit, DEFAULT_REPLAY_LIMIT, DEFAULT_REPLAY_CAPACITY);
      const preferReal = parseBool(request.query.prefer_real, true, "prefer_real");
      return reply.code(200).send(engine.replay(limit, preferReal));
    },
  );

  // -------------------------------------------------------------------------
  // GET /api/flows/stream - SSE live feed of the latest event
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: StreamQuery }>(
    "/api/flows/stream",
    async (request: FastifyRequest<{ Querystring: StreamQuery }>, reply: FastifyReply) => {
      const preferReal = parseBool(request.query.prefer_real, true, "prefer_real");
      const stream = openEventStream(reply);

      for await (const event of engine.watch(preferReal, {
        intervalMs: streamIntervalMs,
        signal: stream.signal,
      })) {
        stream.send(event);
      }

      logger.debug("Flow stream closed");
      stream.close();
    },
  );

  // -------------------------------------------------------------------------
  // POST /api/flows/ingest - Batch of externally observed events
  // -------------------------------------------------------------------------
  fastify.post<{ Body: IngestBatchBody | undefined }>(
    "/api/flows/ingest",
    { preHandler: ingestAuth },
    async (request: FastifyRequest<{ Body: IngestBatchBody | undefined }>, reply: FastifyReply) => {
      const events = request.body?.events;
      if (!Array.isArray(events) || events.length === 0) {
        throw new ApiError(400, "INVALID_FLOW", "Body must be { events: [...] } with at least one event");
      }

      const result = engine.ingestBatch(events);
      if (result.accepted.length === 0) {
        throw new ApiError(400, "INVALID_FLOW", "No flow event was accepted", { rejected: result.rejected });
      }

      return reply.code(202).send({
        accepted: result.accepted.length,
        rejected: result.rejected,
        ids: result.accepted.map((e) => e.id),
      });
    },
  );

  // -------------------------------------------------------------------------
  // POST /api/flows/ingest/single - One externally observed event
  // -------------------------------------------------------------------------
  fastify.post<{ Body: unknown }>(
    "/api/flows/ingest/single",
    { preHandler: ingestAuth },
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const outcome = engine.ingest(request.body);
      if (!outcome.ok) {
        throw new ApiError(400, "INVALID_FLOW", outcome.reason);
      }
      return reply.code(202).send({ accepted: true, event: outcome.event });
    },
  );
}
