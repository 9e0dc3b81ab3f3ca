import { request as httpRequest } from "undici";
import { createLogger } from "@statusboard/shared/utils";

import type { SsoConfig } from "../types.js";

const logger = createLogger("status-monitor:sso");

const SSO_TIMEOUT_MS = 10_000;
const DEFAULT_TOKEN_TTL_SECONDS = 3600;

/** Profile claims returned by the issuer's verify endpoint. */
export type SsoUser = Record<string, unknown>;

export interface TokenGrant {
  accessToken: string;
  expiresInSeconds: number;
}

/** The issuer operations the HTTP layer depends on. */
export type SsoProvider = Pick<SsoClient, "loginUrl" | "logoutUrl" | "verifyToken" | "exchangeCode">;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * HTTP client for the external identity issuer: token verification,
 * authorization code exchange and the login/logout URLs.
 *
 * An unreachable or failing issuer is reported as `null`, never thrown.
 */
export class SsoClient {
  private readonly issuer: string;

  constructor(private readonly config: SsoConfig) {
    this.issuer = config.issuer.replace(/\/+$/, "");
  }

  loginUrl(): string {
    const clientId = encodeURIComponent(this.config.clientId);
    const redirectUri = encodeURIComponent(this.config.callbackUrl);
    return `${this.issuer}/authorize?response_type=code&client_id=${clientId}&redirect_uri=${redirectUri}&scope=openid+profile+email`;
  }

  logoutUrl(): string {
    return `${this.issuer}/logout?redirect_uri=${encodeURIComponent(this.config.callbackUrl)}`;
  }

  /**
   * Verify an access token.
   *
   * @returns The user's claims, or null when the token is rejected or the issuer cannot be reached.
   */
  async verifyToken(token: string): Promise<SsoUser | null> {
    try {
      const { statusCode, body } = await httpRequest(`${this.issuer}/api/token/verify`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ token }),
        headersTimeout: SSO_TIMEOUT_MS,
        bodyTimeout: SSO_TIMEOUT_MS,
      });

      if (statusCode !== 200) {
        await body.dump();
        logger.debug({ statusCode }, "SSO token verification rejected");
        return null;
      }

      const data: unknown = await body.json();
      return isRecord(data) ? data : null;
    } catch (err) {
      logger.warn({ err }, "SSO token verification failed");
      return null;
    }
  }

  /** Exchange an authorization code for an access token. */
  async exchangeCode(code: string): Promise<TokenGrant | null> {
    try {
      const form = new URLSearchParams({
        grant_type: "authorization_code",
        code,
        redirect_uri: this.config.callbackUrl,
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
      });

      const { statusCode, body } = await httpRequest(`${this.issuer}/api/token`, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: form.toString(),
        headersTimeout: SSO_TIMEOUT_MS,
        bodyTimeout: SSO_TIMEOUT_MS,
      });

      if (statusCode !== 200) {
        await body.dump();
        logger.warn({ statusCode }, "SSO code exchange rejected");
        return null;
      }

      const data: unknown = await body.json();
      const accessToken = isRecord(data) ? data["access_token"] : undefined;
      if (typeof accessToken !== "string" || accessToken === "" || !isRecord(data)) {
        logger.warn("SSO code exchange returned no access_token");
        return null;
      }

      const expiresIn = data["expires_in"];
      return {
        accessToken,
        expiresInSeconds:
          typeof expiresIn === "number" && Number.isFinite(expiresIn) && expiresIn > 0
            ? Math.floor(expiresIn)
            : DEFAULT_TOKEN_TTL_SECONDS,
      };
    } catch (err) {
      logger.error({ err }, "SSO code exchange failed");
      return null;
    }
  }
}
