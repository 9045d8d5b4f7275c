export * from "./core/color";
export {
  DEFAULT_EXPONENT,
  DEFAULT_SUBDIVISIONS,
  ENV_KEYS,
  configure,
  getConfig,
  loadConfig,
  resetConfig,
} from "./core/config";
export type { GradientConfig } from "./core/config";
export { Logger, LogLevel, logger } from "./core/monitoring/logger";
export type { LogContext } from "./core/monitoring/logger";
