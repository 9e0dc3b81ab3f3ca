import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

import { SERVICE_NAME } from "../config.js";

/**
 * Register the public GET /health liveness route.
 */
export function registerHealthRoute(fastify: FastifyInstance, version: string): void {
  fastify.get("/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({
      status: "healthy",
      service: SERVICE_NAME,
      version,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });
}
