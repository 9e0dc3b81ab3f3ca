import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { ApiError } from "@statusboard/shared/middleware";

import type { StatusAggregator } from "../services/aggregator.js";
import { computeImpact } from "../services/impact.js";
import type { DependencyEdges, TopologyView } from "../types.js";

interface ViewParams {
  view: string;
}

export interface TopologyRoutesConfig {
  aggregator: StatusAggregator;
  topology: readonly TopologyView[];
  dependencies: DependencyEdges;
}

/** Look up a topology view, or fail with UNKNOWN_VIEW and the valid keys. */
export function requireView(topology: readonly TopologyView[], key: string): TopologyView {
  const view = topology.find((v) => v.key === key);
  if (!view) {
    throw new ApiError(404, "UNKNOWN_VIEW", `No topology view named: ${key}`, {
      validViews: topology.map((v) => v.key),
    });
  }
  return view;
}

/**
 * Register the static topology routes and the live dependency impact route.
 */
export function registerTopologyRoutes(fastify: FastifyInstance, config: TopologyRoutesConfig): void {
  const { aggregator, topology, dependencies } = config;

  fastify.get("/api/topology", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ count: topology.length, views: topology });
  });

  // Static segment: takes precedence over /api/topology/:view.
  fastify.get("/api/topology/impact", async (_request: FastifyRequest, reply: FastifyReply) => {
    const status = await aggregator.checkAll();
    return reply.code(200).send({
      overall: status.overall,
      checkedAt: status.checkedAt,
      impact: computeImpact(status, dependencies),
    });
  });

  fastify.get<{ Params: ViewParams }>(
    "/api/topology/:view",
    async (request: FastifyRequest<{ Params: ViewParams }>, reply: FastifyReply) => {
      return reply.code(200).send(requireView(topology, request.params.view));
    },
  );
}
