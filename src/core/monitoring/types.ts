/**
 * Monitoring Types
 */

export enum LogLevel {
  ERROR = "error",
  WARN = "warn",
  INFO = "info",
  DEBUG = "debug",
  VERBOSE = "verbose",
}

export interface LogContext {
  component?: string;
  action?: string;
  [key: string]: unknown;
}
