import { describe, it, expect, vi, beforeEach } from "vitest";
import { request } from "undici";
import type { Target } from "../types.js";
import { Prober, classifyHttpCode, isTimeoutError } from "./prober.js";

// ---------------------------------------------------------------------------
// Mocks
// ---------------------------------------------------------------------------

vi.mock("undici", () => ({
  request: vi.fn(),
}));

vi.mock("@statusboard/shared/utils", () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const requestMock = vi.mocked(request);

function mockUndiciResponse(statusCode: number) {
  return {
    statusCode,
    body: { dump: vi.fn().mockResolvedValue(undefined) },
  };
}

function errorWithCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

const TARGET: Target = {
  name: "api-gateway",
  url: "https://api.example.test",
  healthUrl: "https://api.example.test/health",
  category: "core",
  type: "api",
  description: "Public API gateway",
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("classifyHttpCode", () => {
  it("treats codes below 400 as operational", () => {
    expect(classifyHttpCode(200)).toBe("operational");
    expect(classifyHttpCode(304)).toBe("operational");
    expect(classifyHttpCode(399)).toBe("operational");
  });

  it("treats 400 and above as degraded", () => {
    expect(classifyHttpCode(400)).toBe("degraded");
    expect(classifyHttpCode(503)).toBe("degraded");
  });
});

describe("isTimeoutError", () => {
  it("recognizes undici timeout codes and TimeoutError", () => {
    expect(isTimeoutError(errorWithCode("headers", "UND_ERR_HEADERS_TIMEOUT"))).toBe(true);
    expect(isTimeoutError(errorWithCode("connect", "UND_ERR_CONNECT_TIMEOUT"))).toBe(true);
    expect(isTimeoutError(new DOMException("The operation timed out", "TimeoutError"))).toBe(true);
  });

  it("rejects other failures", () => {
    expect(isTimeoutError(errorWithCode("refused", "ECONNREFUSED"))).toBe(false);
    expect(isTimeoutError("timeout")).toBe(false);
    expect(isTimeoutError(null)).toBe(false);
  });
});

describe("Prober", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("issues one GET against the health URL, following redirects", async () => {
    requestMock.mockResolvedValue(mockUndiciResponse(200) as never);
    await new Prober({ timeoutMs: 2_000 }).probe(TARGET);

    expect(requestMock).toHaveBeenCalledTimes(1);
    const [url, options] = requestMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.example.test/health");
    expect(options).toMatchObject({
      method: "GET",
      maxRedirections: 5,
      headersTimeout: 2_000,
      bodyTimeout: 2_000,
    });
  });

  it("returns an operational result combining target fields and outcome", async () => {
    const response = mockUndiciResponse(204);
    requestMock.mockResolvedValue(response as never);

    const result = await new Prober().probe(TARGET);

    expect(result).toMatchObject({
      name: "api-gateway",
      url: "https://api.example.test",
      category: "core",
      type: "api",
      description: "Public API gateway",
      status: "operational",
      httpCode: 204,
    });
    expect(Number.isInteger(result.latencyMs)).toBe(true);
    expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    expect(Number.isNaN(Date.parse(result.checkedAt))).toBe(false);
    expect(response.body.dump).toHaveBeenCalledTimes(1);
  });

  it("marks HTTP errors as degraded", async () => {
    requestMock.mockResolvedValue(mockUndiciResponse(502) as never);
    const result = await new Prober().probe(TARGET);
    expect(result.status).toBe("degraded");
    expect(result.httpCode).toBe(502);
  });

  it("marks timeouts as timeout with no HTTP code", async () => {
    requestMock.mockRejectedValue(errorWithCode("Headers Timeout Error", "UND_ERR_HEADERS_TIMEOUT"));
    const result = await new Prober().probe(TARGET);
    expect(result.status).toBe("timeout");
    expect(result.httpCode).toBe(0);
  });

  it("marks connection failures as down without throwing", async () => {
    requestMock.mockRejectedValue(errorWithCode("connect ECONNREFUSED", "ECONNREFUSED"));
    const result = await new Prober().probe(TARGET);
    expect(result.status).toBe("down");
    expect(result.httpCode).toBe(0);
    expect(requestMock).toHaveBeenCalledTimes(1);
  });

  it("keeps the HTTP status when draining the body fails", async () => {
    requestMock.mockResolvedValue({
      statusCode: 200,
      body: { dump: vi.fn().mockRejectedValue(new Error("aborted")) },
    } as never);
    const result = await new Prober().probe(TARGET);
    expect(result.status).toBe("operational");
    expect(result.httpCode).toBe(200);
  });
});
