import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { ApiError } from "@statusboard/shared/middleware";

import type { StatusAggregator } from "../services/aggregator.js";
import type { FlowReplayEngine } from "../services/flow-replay.js";
import { computeImpact } from "../services/impact.js";
import { renderFlowConsole, renderStatusPage } from "../render/dashboard.js";
import type { Catalog } from "../types.js";
import { requireView } from "./topology.js";

const CONSOLE_EVENT_LIMIT = 25;

interface ViewParams {
  view: string;
}

export interface PageRoutesConfig {
  aggregator: StatusAggregator;
  engine: FlowReplayEngine;
  catalog: Catalog;
}

/**
 * Register the HTML status page and flow console.
 */
export function registerPageRoutes(fastify: FastifyInstance, config: PageRoutesConfig): void {
  const { aggregator, engine, catalog } = config;

  const renderConsole = async (request: FastifyRequest, reply: FastifyReply, key: string | undefined) => {
    const viewKey = key ?? catalog.topology[0]?.key;
    if (viewKey === undefined) {
      throw new ApiError(404, "UNKNOWN_VIEW", "No topology views are configured", { validViews: [] });
    }
    const view = requireView(catalog.topology, viewKey);
    const status = await aggregator.checkAll();

    const html = renderFlowConsole({
      flows: engine.getFlows(),
      views: catalog.topology,
      view,
      replay: engine.replay(CONSOLE_EVENT_LIMIT),
      impact: computeImpact(status, catalog.dependencies),
      user: request.ssoUser,
    });
    return reply.code(200).type("text/html; charset=utf-8").send(html);
  };

  fastify.get("/", async (request: FastifyRequest, reply: FastifyReply) => {
    const status = await aggregator.checkAll();
    const html = renderStatusPage({
      status,
      categoryLabels: catalog.categoryLabels,
      uptime: aggregator.history.uptime(aggregator.getTargetNames()),
      openIncidents: aggregator.incidents.open(),
      user: request.ssoUser,
    });
    return reply.code(200).type("text/html; charset=utf-8").send(html);
  });

  fastify.get("/fc", async (request: FastifyRequest, reply: FastifyReply) => {
    return renderConsole(request, reply, undefined);
  });

  fastify.get<{ Params: ViewParams }>(
    "/fc/:view",
    async (request: FastifyRequest<{ Params: ViewParams }>, reply: FastifyReply) => {
      return renderConsole(request, reply, request.params.view);
    },
  );
}
