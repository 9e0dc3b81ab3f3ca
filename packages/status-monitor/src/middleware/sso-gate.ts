import type { FastifyReply, FastifyRequest } from "fastify";
import { createLogger } from "@statusboard/shared/utils";

import type { SsoClient, SsoUser } from "../services/sso-client.js";

const logger = createLogger("status-monitor:sso-gate");

export const SSO_COOKIE = "sso_token";

const PUBLIC_PATHS = new Set(["/health", "/auth"]);
const PUBLIC_PREFIXES = ["/auth/", "/api/flows/ingest"];

// ---------------------------------------------------------------------------
// Extend FastifyRequest to carry the verified user
// ---------------------------------------------------------------------------

declare module "fastify" {
  interface FastifyRequest {
    ssoUser?: SsoUser;
  }
}

export type SsoVerifier = Pick<SsoClient, "verifyToken" | "loginUrl">;

export function isPublicPath(url: string): boolean {
  const path = url.split("?", 1)[0] ?? url;
  return PUBLIC_PATHS.has(path) || PUBLIC_PREFIXES.some((prefix) => path.startsWith(prefix));
}

/** Token from the `sso_token` cookie, else from `Authorization: Bearer …`. */
export function extractSsoToken(request: FastifyRequest): string | undefined {
  const cookie = request.cookies[SSO_COOKIE];
  if (cookie) return cookie;

  const authorization = request.headers.authorization;
  if (authorization?.startsWith("Bearer ")) {
    return authorization.slice("Bearer ".length).trim() || undefined;
  }
  return undefined;
}

/**
 * Create an onRequest hook that sends unauthenticated visitors of non-public
 * paths to the issuer's login page. Requires @fastify/cookie.
 */
export function createSsoGate(sso: SsoVerifier) {
  return async function ssoGate(request: FastifyRequest, reply: FastifyReply): Promise<void> {
    if (isPublicPath(request.url)) return;

    const token = extractSsoToken(request);
    if (!token) {
      reply.redirect(sso.loginUrl());
      return;
    }

    const user = await sso.verifyToken(token);
    if (!user) {
      logger.info({ url: request.url, ip: request.ip }, "SSO token not accepted; redirecting to login");
      reply.redirect(sso.loginUrl());
      return;
    }

    request.ssoUser = user;
  };
}
