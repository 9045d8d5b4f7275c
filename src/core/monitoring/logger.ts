/**
 * Logging utility for the exponential gradient library
 * Provides structured, leveled console logging with persistent context
 */

import { getConfig } from "../config";
import { LogLevel, type LogContext } from "./types";

export { LogLevel };
export type { LogContext };

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.INFO]: 2,
  [LogLevel.DEBUG]: 3,
  [LogLevel.VERBOSE]: 4,
};

export class Logger {
  private context: LogContext = {};
  private level: LogLevel | null = null;

  /**
   * Set persistent context for all log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Clear the persistent context
   */
  clearContext(): void {
    this.context = {};
  }

  /**
   * Pin the threshold for this logger; null follows the configured level
   */
  setLevel(level: LogLevel | null): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    const threshold = this.level ?? getConfig().logLevel;
    return SEVERITY[level] <= SEVERITY[threshold];
  }

  /**
   * Log an error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, { ...context, error: this.serializeError(error) });
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: LogContext): void {
    this.log(LogLevel.INFO, message, context);
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * Log a verbose message
   */
  verbose(message: string, context?: LogContext): void {
    this.log(LogLevel.VERBOSE, message, context);
  }

  /**
   * Core logging method (non-blocking via setTimeout)
   */
  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const fullContext = { ...this.context, ...context };
    const timestamp = new Date().toISOString();

    setTimeout(() => {
      switch (level) {
        case LogLevel.ERROR:
          console.error(`[${timestamp}] ERROR:`, message, fullContext);
          break;
        case LogLevel.WARN:
          console.warn(`[${timestamp}] WARN:`, message, fullContext);
          break;
        case LogLevel.INFO:
          console.info(`[${timestamp}] INFO:`, message, fullContext);
          break;
        case LogLevel.DEBUG:
          console.debug(`[${timestamp}] DEBUG:`, message, fullContext);
          break;
        case LogLevel.VERBOSE:
          console.log(`[${timestamp}] VERBOSE:`, message, fullContext);
          break;
      }
    }, 0);
  }

  /**
   * Serialize error objects for logging
   */
  private serializeError(error: unknown): unknown {
    if (!error) return undefined;

    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return { error: String(error) };
  }

  /**
   * Create a child logger with specific context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger();
    childLogger.setContext({ ...this.context, ...context });
    childLogger.setLevel(this.level);
    return childLogger;
  }
}

// Export singleton instance
export const logger = new Logger();

export default logger;
