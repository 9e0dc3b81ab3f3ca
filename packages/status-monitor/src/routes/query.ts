import { ApiError } from "@statusboard/shared/middleware";

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

/** Positive integer query value, capped at `max`. */
export function parseLimit(raw: string | undefined, fallback: number, max: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;

  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || value < 1) {
    throw new ApiError(400, "BAD_REQUEST", `limit must be a positive integer, got "${raw}"`);
  }
  return Math.min(value, max);
}

export function parseBool(raw: string | undefined, fallback: boolean, name: string): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new ApiError(400, "BAD_REQUEST", `${name} must be a boolean, got "${raw}"`);
}
