/**
 * Console logging utility
 *
 * - Verbose (FORCEPLATE_LOG=debug or NODE_ENV=development): all logs visible
 * - Otherwise: only warnings and errors
 *
 * Usage:
 *   import { log } from './logger';
 *   log.debug('Detailed info', data);  // Silent unless verbose
 *   log.info('Important info');        // Silent unless verbose
 *   log.warn('Warning');               // Always visible
 *   log.error('Error', err);           // Always visible, timestamped
 */

export function isVerboseLogging(
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  return env.FORCEPLATE_LOG === "debug" || env.NODE_ENV === "development";
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(subPrefix: string): Logger;
}

function createLogger(prefix: string): Logger {
  return {
    /**
     * Debug-level logging (verbose only)
     */
    debug(message: string, ...args: unknown[]) {
      if (isVerboseLogging()) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    /**
     * Info-level logging (verbose only)
     */
    info(message: string, ...args: unknown[]) {
      if (isVerboseLogging()) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },

    /**
     * Create a sub-logger with extended prefix
     */
    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// Pre-configured loggers for common modules
export const log = createLogger("App");
export const parserLog = createLogger("Parser");
export const detectLog = createLogger("Detect");
export const sessionLog = createLogger("Session");
export const exportLog = createLogger("Export");

// Factory for custom loggers
export { createLogger };

// Default export
export default log;
