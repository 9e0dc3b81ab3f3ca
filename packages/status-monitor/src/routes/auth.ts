import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { createLogger } from "@statusboard/shared/utils";
import { ApiError } from "@statusboard/shared/middleware";

import type { SsoProvider } from "../services/sso-client.js";
import { SSO_COOKIE } from "../middleware/sso-gate.js";

const logger = createLogger("status-monitor:auth-routes");

interface CallbackQuery {
  code?: string;
}

/**
 * Register the SSO callback, logout and current-user routes.
 */
export function registerAuthRoutes(fastify: FastifyInstance, sso: SsoProvider): void {
  // -------------------------------------------------------------------------
  // GET /auth/callback - Exchange the authorization code, set the cookie
  // -------------------------------------------------------------------------
  fastify.get<{ Querystring: CallbackQuery }>(
    "/auth/callback",
    async (request: FastifyRequest<{ Querystring: CallbackQuery }>, reply: FastifyReply) => {
      const code = request.query.code?.trim();
      if (!code) {
        return reply.redirect(sso.loginUrl());
      }

      const grant = await sso.exchangeCode(code);
      if (!grant) {
        return reply.redirect(sso.loginUrl());
      }

      logger.info({ ip: request.ip }, "SSO login completed");
      return reply
        .setCookie(SSO_COOKIE, grant.accessToken, {
          path: "/",
          httpOnly: true,
          secure: true,
          sameSite: "lax",
          maxAge: grant.expiresInSeconds,
        })
        .redirect("/");
    },
  );

  // -------------------------------------------------------------------------
  // GET /auth/logout - Clear the cookie and hand over to the issuer
  // -------------------------------------------------------------------------
  fastify.get("/auth/logout", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.clearCookie(SSO_COOKIE, { path: "/" }).redirect(sso.logoutUrl());
  });

  // -------------------------------------------------------------------------
  // GET /api/me - The verified user
  // -------------------------------------------------------------------------
  fastify.get("/api/me", async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.ssoUser) {
      throw new ApiError(401, "NOT_AUTHENTICATED", "Not authenticated");
    }
    return reply.code(200).send(request.ssoUser);
  });
}
