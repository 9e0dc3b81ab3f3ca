import type { AggregatedStatus, DependencyEdges, ImpactEntry } from "../types.js";

const HARD_FAILURE_BASE = 1.0;
const SOFT_FAILURE_BASE = 0.65;
const DECAY_PER_POSITION = 0.12;
const DECAY_FLOOR = 0.35;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Single-hop blast radius. Every unhealthy upstream scores its downstreams by
 * list position; the highest score per downstream wins.
 */
export function computeImpact(
  status: Pick<AggregatedStatus, "services">,
  edges: DependencyEdges,
): Record<string, ImpactEntry> {
  const current = new Map(status.services.map((s) => [s.name, s.status]));
  const impact: Record<string, ImpactEntry> = {};

  for (const [upstream, downstreams] of Object.entries(edges)) {
    const upstreamStatus = current.get(upstream);
    if (upstreamStatus === undefined || upstreamStatus === "operational") continue;

    const base = upstreamStatus === "down" || upstreamStatus === "timeout" ? HARD_FAILURE_BASE : SOFT_FAILURE_BASE;

    downstreams.forEach((downstream, i) => {
      const score = round3(base * Math.max(DECAY_FLOOR, 1 - DECAY_PER_POSITION * i));
      const existing = impact[downstream];
      if (existing && existing.score >= score) return;

      impact[downstream] = {
        score,
        reason: `${upstream} is ${upstreamStatus}`,
        upstream,
      };
    });
  }

  return impact;
}
