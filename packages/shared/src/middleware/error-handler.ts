import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("status-error-handler");

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    [detail: string]: unknown;
  };
}

/**
 * An expected, client-facing failure. Carries an explicit error code and any
 * details the caller needs to correct the request (e.g. the valid choices).
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details: Record<string, unknown>;

  constructor(statusCode: number, code: string, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }

  toBody(): ApiErrorBody {
    return { error: { ...this.details, code: this.code, message: this.message } };
  }
}

function mapStatusToCode(statusCode: number): string {
  if (statusCode >= 400 && statusCode < 500) {
    switch (statusCode) {
      case 401:
        return "UNAUTHORIZED";
      case 403:
        return "FORBIDDEN";
      case 404:
        return "NOT_FOUND";
      case 413:
        return "PAYLOAD_TOO_LARGE";
      case 415:
        return "UNSUPPORTED_MEDIA_TYPE";
      default:
        return "BAD_REQUEST";
    }
  }

  return "INTERNAL_ERROR";
}

/**
 * Fastify error handler producing `{ error: { code, message, ... } }` bodies.
 *
 * ApiErrors are rendered as-is and logged at warn. Anything else is mapped by
 * status code; 5xx messages are replaced with a generic one.
 *
 * Usage:
 *   fastify.setErrorHandler(statusErrorHandler);
 */
export function statusErrorHandler(
  error: FastifyError | ApiError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  if (error instanceof ApiError) {
    logger.warn(
      { url: request.url, method: request.method, statusCode: error.statusCode, code: error.code },
      error.message,
    );
    reply.code(error.statusCode).send(error.toBody());
    return;
  }

  const statusCode = error.statusCode ?? 500;

  logger.error(
    {
      err: error,
      url: request.url,
      method: request.method,
      statusCode,
    },
    "Request error",
  );

  const message =
    statusCode >= 500
      ? "Internal server error. Please try again later."
      : error.message || "An error occurred processing the request.";

  const body: ApiErrorBody = { error: { code: mapStatusToCode(statusCode), message } };
  reply.code(statusCode).send(body);
}
