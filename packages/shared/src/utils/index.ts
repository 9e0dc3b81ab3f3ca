export { createLogger, LOG_REDACT_PATHS } from "./logger.js";
export {
  validateEnvironment,
  envInt,
  envBool,
  type EnvRequirement,
  type EnvValidationResult,
  type EnvValueType,
} from "./env-validator.js";
