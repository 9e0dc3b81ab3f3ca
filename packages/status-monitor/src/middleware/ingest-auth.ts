import { createHash, timingSafeEqual } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";
import { createLogger } from "@statusboard/shared/utils";
import { ApiError } from "@statusboard/shared/middleware";

const logger = createLogger("status-monitor:ingest-auth");

export const INGEST_TOKEN_HEADER = "x-ingest-token";

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Token from `Authorization: Bearer …`, else from the `x-ingest-token` header. */
export function extractIngestToken(request: FastifyRequest): string | undefined {
  const authorization = request.headers.authorization;
  if (authorization) {
    const match = /^Bearer\s+(.+)$/i.exec(authorization.trim());
    if (match?.[1]) return match[1].trim();
  }
  return firstHeader(request.headers[INGEST_TOKEN_HEADER])?.trim() || undefined;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

export function tokensMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Create a preHandler guarding the flow ingest routes with a shared secret.
 * With no secret configured the guard lets every request through.
 */
export function createIngestAuthGuard(secret: string | undefined) {
  return async function ingestAuthGuard(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    if (!secret) return;

    const token = extractIngestToken(request);
    if (token && tokensMatch(token, secret)) return;

    logger.warn({ ip: request.ip, url: request.url, hasToken: token !== undefined }, "Rejected flow ingest");
    const error = new ApiError(
      401,
      "INGEST_UNAUTHORIZED",
      `Provide the ingest token as "Authorization: Bearer <token>" or "${INGEST_TOKEN_HEADER}: <token>"`,
    );
    reply.code(error.statusCode).send(error.toBody());
  };
}
