/**
 * Logging utilities for the KennelCast network layer
 *
 * Provides environment-aware logging to reduce console noise in production
 * while keeping helpful debug output in development.
 *
 * Features:
 * - Debug logs only visible when debug logging is enabled
 * - Warn/error logs always visible
 * - Automatic Sentry integration for error tracking
 */

import * as Sentry from "@sentry/node";

export interface LoggingOptions {
  /** Emit debug-level output */
  debug: boolean;
}

const loggingOptions: LoggingOptions = {
  debug: process.env.NODE_ENV !== "production",
};

/**
 * Override logging behaviour at runtime (e.g. from loaded config)
 */
export function configureLogging(options: Partial<LoggingOptions>): void {
  Object.assign(loggingOptions, options);
}

export function isDebugLoggingEnabled(): boolean {
  return loggingOptions.debug;
}

const stringify = (args: unknown[]): string =>
  args
    .map((a) => {
      if (typeof a === "string") return a;
      if (a instanceof Error) return a.message;
      return JSON.stringify(a);
    })
    .join(" ");

/**
 * Log debug messages (only when debug logging is enabled)
 */
export function debugLog(prefix: string, ...args: unknown[]): void {
  if (loggingOptions.debug) {
    // eslint-disable-next-line no-console
    console.debug(`[${prefix}]`, ...args);
  }
}

/**
 * Log warning messages (always visible)
 * Records a Sentry breadcrumb so the warning shows up next to later errors
 */
export function warnLog(prefix: string, ...args: unknown[]): void {
  console.warn(`[${prefix}]`, ...args);

  Sentry.addBreadcrumb({
    category: prefix.toLowerCase(),
    message: stringify(args),
    level: "warning",
  });
}

/**
 * Log error messages (always visible)
 * Captures the first Error argument to Sentry, or the message when there is none
 */
export function errorLog(prefix: string, ...args: unknown[]): void {
  console.error(`[${prefix}]`, ...args);

  const errorArg = args.find((a) => a instanceof Error);
  if (errorArg instanceof Error) {
    Sentry.captureException(errorArg, {
      tags: { module: prefix.toLowerCase() },
      extra: {
        args: stringify(args.filter((a) => !(a instanceof Error))),
      },
    });
  } else {
    Sentry.captureMessage(`[${prefix}] ${stringify(args)}`, {
      level: "error",
      tags: { module: prefix.toLowerCase() },
    });
  }
}

export function infoLog(prefix: string, ...args: unknown[]): void {
  // eslint-disable-next-line no-console
  console.info(`[${prefix}]`, ...args);
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a scoped logger for a specific module
 *
 * @example
 * const log = createLogger('ResponseCache');
 * log.debug('Hit', key); // [ResponseCache] Hit content (debug only)
 * log.error('Write failed', err); // [ResponseCache] Write failed ... (always)
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (...args) => debugLog(prefix, ...args),
    info: (...args) => infoLog(prefix, ...args),
    warn: (...args) => warnLog(prefix, ...args),
    error: (...args) => errorLog(prefix, ...args),
  };
}

export interface CaptureContext {
  module?: string;
  extra?: Record<string, unknown>;
}

/**
 * Capture an error to Sentry without console output
 */
export function captureError(error: unknown, context?: CaptureContext): void {
  const tags = context?.module ? { module: context.module } : undefined;
  if (error instanceof Error) {
    Sentry.captureException(error, { tags, extra: context?.extra });
  } else {
    Sentry.captureMessage(String(error), {
      level: "error",
      tags,
      extra: context?.extra,
    });
  }
}

/**
 * Capture a warning to Sentry without console output
 */
export function captureWarning(message: string, context?: CaptureContext): void {
  Sentry.captureMessage(message, {
    level: "warning",
    tags: context?.module ? { module: context.module } : undefined,
    extra: context?.extra,
  });
}
