/**
 * Shared test fixtures for the integration suites.
 */

import type {
  ProbeResult,
  ProbeStatus,
  Target,
} from "../../packages/status-monitor/src/types.js";
import type { TargetProber } from "../../packages/status-monitor/src/services/prober.js";

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

export function createTarget(name: string, overrides: Partial<Target> = {}): Target {
  return {
    name,
    url: `https://${name}.example.test`,
    healthUrl: `https://${name}.example.test/health`,
    category: "core",
    type: "api",
    description: `${name} service`,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Scripted prober
// ---------------------------------------------------------------------------

export interface ScriptedStep {
  status: ProbeStatus;
  latencyMs: number;
}

const HTTP_CODES: Record<ProbeStatus, number> = {
  operational: 200,
  degraded: 503,
  timeout: 0,
  down: 0,
};

/**
 * Prober that replays a fixed script per target, one step per probe. The last
 * step repeats once the script runs out.
 */
export class ScriptedProber implements TargetProber {
  private readonly calls = new Map<string, number>();

  constructor(private readonly script: Record<string, ScriptedStep[]>) {}

  async probe(target: Target): Promise<ProbeResult> {
    const steps = this.script[target.name] ?? [];
    const call = this.calls.get(target.name) ?? 0;
    this.calls.set(target.name, call + 1);

    const step = steps[Math.min(call, steps.length - 1)] ?? { status: "operational", latencyMs: 0 };
    return {
      name: target.name,
      url: target.url,
      category: target.category,
      type: target.type,
      description: target.description,
      status: step.status,
      httpCode: HTTP_CODES[step.status],
      latencyMs: step.latencyMs,
      checkedAt: new Date().toISOString(),
    };
  }

  callCount(name: string): number {
    return this.calls.get(name) ?? 0;
  }
}

export const up = (latencyMs = 100): ScriptedStep => ({ status: "operational", latencyMs });
export const down = (latencyMs = 100): ScriptedStep => ({ status: "down", latencyMs });
export const slow = (latencyMs = 100): ScriptedStep => ({ status: "degraded", latencyMs });
