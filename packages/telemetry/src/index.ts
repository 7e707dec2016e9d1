import * as Sentry from "@sentry/node";
import type { SeverityLevel } from "@sentry/node";

export {
  createLogger,
  configureLogging,
  isDebugLoggingEnabled,
  debugLog,
  infoLog,
  warnLog,
  errorLog,
  captureError,
  captureWarning,
  type Logger,
  type LoggingOptions,
  type CaptureContext,
} from "./logger";

export interface TelemetryOptions {
  sentryDsn?: string;
  release?: string;
  environment?: string;
  /**
   * Additional context shared with all events
   */
  context?: Record<string, unknown>;
}

export interface TelemetryClient {
  captureError: (error: unknown, context?: Record<string, unknown>) => void;
  captureMessage: (message: string, level?: SeverityLevel) => void;
  flush: () => Promise<boolean>;
}

export function createTelemetryClient(options: TelemetryOptions): TelemetryClient {
  if (options.sentryDsn) {
    Sentry.init({
      dsn: options.sentryDsn,
      release: options.release,
      environment: options.environment,
      tracesSampleRate: 0.2,
      initialScope: options.context ? { extra: options.context } : undefined,
    });
  }

  const captureError = (error: unknown, context?: Record<string, unknown>) => {
    if (!options.sentryDsn) return;
    Sentry.captureException(error, { extra: { ...options.context, ...context } });
  };

  const captureMessage = (message: string, level: SeverityLevel = "info") => {
    if (!options.sentryDsn) return;
    Sentry.captureMessage(message, level);
  };

  const flush = async () => {
    if (!Sentry.getClient()) return true;
    return Sentry.flush(3000);
  };

  return { captureError, captureMessage, flush };
}
