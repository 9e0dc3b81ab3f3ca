import { randomUUID } from "node:crypto";
import type { Redis } from "ioredis";
import { createLogger } from "@statusboard/shared/utils";

import { RingBuffer } from "./ring-buffer.js";
import type { AnyStatus, Incident, IncidentChange } from "../types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const logger = createLogger("status-monitor:incidents");

export const DEFAULT_INCIDENT_CAPACITY = 200;
export const INCIDENT_CHANNEL = "status:incidents";

export type IncidentListener = (change: IncidentChange, incident: Incident) => void;

// ---------------------------------------------------------------------------
// IncidentLog
// ---------------------------------------------------------------------------

/**
 * Bounded, recency-ordered log of down-transition incidents. At most one
 * unresolved incident exists per target.
 */
export class IncidentLog {
  private readonly entries: RingBuffer<Incident>;
  private readonly listeners = new Set<IncidentListener>();

  constructor(capacity = DEFAULT_INCIDENT_CAPACITY) {
    this.entries = new RingBuffer<Incident>(capacity);
  }

  /**
   * Open an incident on operational → non-operational, resolve the newest
   * open one on non-operational → operational. Returns the incident that
   * changed, or null.
   */
  transitionCheck(
    target: string,
    oldStatus: AnyStatus,
    newStatus: AnyStatus,
    at: string = new Date().toISOString(),
  ): Incident | null {
    if (oldStatus === "operational" && newStatus !== "operational") {
      if (this.findOpen(target)) return null;

      const incident: Incident = {
        id: randomUUID(),
        target,
        kind: "down_transition",
        oldStatus,
        newStatus,
        openedAt: at,
        resolved: false,
        resolvedAt: null,
      };
      this.entries.push(incident);
      logger.error({ incident }, `Incident opened: ${target} is ${newStatus}`);
      this.notify("opened", incident);
      return incident;
    }

    if (oldStatus !== "operational" && newStatus === "operational") {
      const incident = this.findOpen(target);
      if (!incident) return null;

      incident.resolved = true;
      incident.resolvedAt = at;
      logger.info({ incident }, `Incident resolved: ${target} is operational again`);
      this.notify("resolved", incident);
      return incident;
    }

    return null;
  }

  /** All incidents, newest first. */
  list(): Incident[] {
    return this.entries
      .toArray()
      .reverse()
      .map((incident) => ({ ...incident }));
  }

  /** Unresolved incidents, newest first. */
  open(): Incident[] {
    return this.list().filter((incident) => !incident.resolved);
  }

  addListener(listener: IncidentListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private findOpen(target: string): Incident | undefined {
    return this.entries.findLast((incident) => incident.target === target && !incident.resolved);
  }

  private notify(change: IncidentChange, incident: Incident): void {
    const snapshot = { ...incident };
    for (const listener of this.listeners) {
      try {
        listener(change, snapshot);
      } catch (err) {
        logger.error({ err, incidentId: incident.id }, "Incident listener failed");
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Redis pub/sub
// ---------------------------------------------------------------------------

/** Publish incident changes on a Redis channel; failures are logged only. */
export function createIncidentPublisher(
  redis: Pick<Redis, "publish">,
  channel = INCIDENT_CHANNEL,
): IncidentListener {
  return (change, incident) => {
    void redis
      .publish(channel, JSON.stringify({ change, incident }))
      .catch((err: unknown) => logger.error({ err, incidentId: incident.id }, "Failed to publish incident to Redis"));
  };
}
