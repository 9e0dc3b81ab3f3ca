/**
 * Environment Variable Validator
 *
 * Validates that required environment variables are present at service startup
 * and that typed ones parse, before any configuration object is built from them.
 */

import { createLogger } from "./logger.js";

const logger = createLogger("env-validator");

export type EnvValueType = "string" | "integer" | "boolean";

export interface EnvRequirement {
  /** Environment variable name */
  name: string;
  /** Whether the variable is required (service won't start without it) */
  required: boolean;
  /** Default value if not set (only for optional vars) */
  default?: string;
  /** Description for error messages */
  description?: string;
  /** Expected shape of the value. Default: "string" */
  type?: EnvValueType;
  /** Smallest accepted value for "integer" vars */
  min?: number;
}

export interface EnvValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  values: Record<string, string>;
}

const BOOLEAN_VALUES = new Set(["true", "false", "1", "0", "yes", "no"]);

function checkType(value: string, type: EnvValueType): boolean {
  switch (type) {
    case "integer":
      return /^-?\d+$/.test(value.trim());
    case "boolean":
      return BOOLEAN_VALUES.has(value.trim().toLowerCase());
    default:
      return true;
  }
}

/**
 * Validate environment variables against a set of requirements.
 *
 * @param requirements - Array of environment variable requirements
 * @param exitOnError - If true, process.exit(1) on validation failure. Default: true
 * @returns Validation result with resolved values
 */
export function validateEnvironment(
  requirements: EnvRequirement[],
  exitOnError = true,
): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const values: Record<string, string> = {};

  for (const req of requirements) {
    const value = process.env[req.name];

    if (value === undefined || value === "") {
      if (req.required) {
        errors.push(
          `Missing required env var: ${req.name}${req.description ? ` (${req.description})` : ""}`,
        );
      } else if (req.default !== undefined) {
        values[req.name] = req.default;
        warnings.push(
          `${req.name} not set, using default: "${req.default}"`,
        );
      } else {
        warnings.push(
          `Optional env var ${req.name} not set${req.description ? ` (${req.description})` : ""}`,
        );
      }
      continue;
    }

    if (req.type && !checkType(value, req.type)) {
      errors.push(`Env var ${req.name} must be a valid ${req.type}, got "${value}"`);
      continue;
    }

    if (req.type === "integer" && req.min !== undefined && parseInt(value, 10) < req.min) {
      errors.push(`Env var ${req.name} must be at least ${req.min}, got "${value}"`);
      continue;
    }

    values[req.name] = value;
  }

  if (warnings.length > 0) {
    logger.warn({ warnings }, "Environment variable warnings");
  }

  if (errors.length > 0) {
    logger.error({ errors }, "Environment variable validation failed");
    if (exitOnError) {
      process.exit(1);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    values,
  };
}

/** Read an integer from validated values, falling back when absent. */
export function envInt(values: Record<string, string>, name: string, fallback: number): number {
  const raw = values[name];
  if (raw === undefined) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Read a boolean from validated values ("true", "1", "yes" are truthy). */
export function envBool(values: Record<string, string>, name: string, fallback: boolean): boolean {
  const raw = values[name];
  if (raw === undefined) return fallback;
  return ["true", "1", "yes"].includes(raw.trim().toLowerCase());
}
