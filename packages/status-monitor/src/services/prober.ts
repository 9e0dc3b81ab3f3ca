import { request } from "undici";
import { createLogger } from "@statusboard/shared/utils";

import type { ProbeResult, ProbeStatus, Target } from "../types.js";

const logger = createLogger("status-monitor:prober");

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;
const MAX_REDIRECTIONS = 5;

const TIMEOUT_CODES = new Set([
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export interface ProberOptions {
  timeoutMs?: number;
}

/** Anything that can turn a Target into a ProbeResult. */
export interface TargetProber {
  probe(target: Target): Promise<ProbeResult>;
}

/** undici timeouts carry a UND_ERR_*_TIMEOUT code; AbortSignal.timeout() rejects with a TimeoutError. */
export function isTimeoutError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("name" in err && err.name === "TimeoutError") return true;
  return "code" in err && typeof err.code === "string" && TIMEOUT_CODES.has(err.code);
}

export function classifyHttpCode(statusCode: number): ProbeStatus {
  return statusCode < 400 ? "operational" : "degraded";
}

/**
 * One GET per probe against the target's health URL. Never throws and never
 * retries: every failure is folded into the returned status.
 */
export class Prober implements TargetProber {
  private readonly timeoutMs: number;

  constructor(options: ProberOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  }

  async probe(target: Target): Promise<ProbeResult> {
    const start = performance.now();
    let status: ProbeStatus;
    let httpCode = 0;

    try {
      const response = await request(target.healthUrl, {
        method: "GET",
        maxRedirections: MAX_REDIRECTIONS,
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      httpCode = response.statusCode;
      status = classifyHttpCode(response.statusCode);

      // Release the socket; the body itself is irrelevant.
      await response.body.dump().catch((err: unknown) => {
        logger.debug({ err, target: target.name }, "Failed to drain probe response body");
      });
    } catch (err) {
      status = isTimeoutError(err) ? "timeout" : "down";
      logger.debug({ err, target: target.name, status }, "Probe failed");
    }

    const latencyMs = Math.round(performance.now() - start);

    return {
      name: target.name,
      url: target.url,
      category: target.category,
      type: target.type,
      description: target.description,
      status,
      httpCode,
      latencyMs,
      checkedAt: new Date().toISOString(),
    };
  }
}
