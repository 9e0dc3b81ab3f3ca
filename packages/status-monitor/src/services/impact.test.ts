import { describe, it, expect } from "vitest";
import type { ProbeStatus } from "../types.js";
import { computeImpact } from "./impact.js";

function statusOf(entries: Record<string, ProbeStatus>) {
  return {
    services: Object.entries(entries).map(([name, status]) => ({
      name,
      url: `https://${name}.example.test`,
      category: "core",
      type: "api" as const,
      description: name,
      status,
      httpCode: 0,
      latencyMs: 10,
      checkedAt: "2026-01-01T00:00:00.000Z",
    })),
  };
}

describe("computeImpact", () => {
  it("is empty when every upstream is operational", () => {
    expect(computeImpact(statusOf({ db: "operational" }), { db: ["api", "web"] })).toEqual({});
  });

  it("decays the score by downstream position", () => {
    const impact = computeImpact(statusOf({ db: "down" }), {
      db: ["api", "web", "worker", "a", "b", "c", "d"],
    });

    expect(impact["api"]).toEqual({ score: 1, reason: "db is down", upstream: "db" });
    expect(impact["web"]?.score).toBe(0.88);
    expect(impact["worker"]?.score).toBe(0.76);
    expect(impact["d"]?.score).toBe(0.35);
  });

  it("scores degraded upstreams lower than hard failures", () => {
    const impact = computeImpact(statusOf({ cache: "degraded" }), { cache: ["api", "web"] });
    expect(impact["api"]).toEqual({ score: 0.65, reason: "cache is degraded", upstream: "cache" });
    expect(impact["web"]?.score).toBe(0.572);
  });

  it("keeps the highest score across upstreams", () => {
    const impact = computeImpact(statusOf({ cache: "degraded", db: "timeout" }), {
      cache: ["api"],
      db: ["worker", "api"],
    });

    expect(impact["api"]).toEqual({ score: 0.88, reason: "db is timeout", upstream: "db" });
    expect(impact["worker"]?.upstream).toBe("db");
  });

  it("does not propagate beyond one hop", () => {
    const impact = computeImpact(statusOf({ db: "down", api: "operational" }), {
      db: ["api"],
      api: ["web"],
    });
    expect(Object.keys(impact)).toEqual(["api"]);
  });

  it("ignores upstreams that are not probed", () => {
    expect(computeImpact(statusOf({}), { ghost: ["api"] })).toEqual({});
  });
});
