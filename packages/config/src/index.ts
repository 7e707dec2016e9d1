/**
 * Network Layer Configuration
 *
 * Reads KENNELCAST_* environment variables, applies defaults and
 * validates the result before any component is constructed.
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: "must be an http(s) URL",
  });

const envSchema = z.object({
  KENNELCAST_API_BASE_URL: httpUrl.default("https://api.kennelcast.example"),
  KENNELCAST_API_TOKEN: z.string().min(1).default("dev-token"),
  KENNELCAST_CLIENT_ID: z.string().min(1).default("KennelCast/1.0"),
  KENNELCAST_CACHE_DIR: z.string().min(1).optional(),
  KENNELCAST_CACHE_COMPRESS: booleanFlag.default("false"),
  KENNELCAST_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  KENNELCAST_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  KENNELCAST_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  KENNELCAST_CONNECTIVITY_POLL_MS: z.coerce.number().int().positive().default(5000),
  KENNELCAST_SENTRY_DSN: httpUrl.optional(),
  NODE_ENV: z.string().min(1).default("development"),
});

export interface RetrySettings {
  maxAttempts: number;
  delayMs: number;
}

export interface NetworkConfig {
  baseURL: string;
  apiToken: string;
  clientId: string;
  cacheDirectory: string;
  compressCache: boolean;
  requestTimeoutMs: number;
  retry: RetrySettings;
  connectivityPollMs: number;
  sentryDsn?: string;
  environment: string;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid network configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const DEFAULT_CACHE_DIRECTORY = join(homedir(), ".kennelcast", "cache");

/**
 * Build the network configuration from environment variables.
 * Empty strings are treated as unset.
 */
export function loadNetworkConfig(
  env: Record<string, string | undefined> = process.env,
): NetworkConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const vars = parsed.data;
  return {
    baseURL: vars.KENNELCAST_API_BASE_URL,
    apiToken: vars.KENNELCAST_API_TOKEN,
    clientId: vars.KENNELCAST_CLIENT_ID,
    cacheDirectory: vars.KENNELCAST_CACHE_DIR ?? DEFAULT_CACHE_DIRECTORY,
    compressCache: vars.KENNELCAST_CACHE_COMPRESS,
    requestTimeoutMs: vars.KENNELCAST_REQUEST_TIMEOUT_MS,
    retry: {
      maxAttempts: vars.KENNELCAST_RETRY_MAX_ATTEMPTS,
      delayMs: vars.KENNELCAST_RETRY_DELAY_MS,
    },
    connectivityPollMs: vars.KENNELCAST_CONNECTIVITY_POLL_MS,
    sentryDsn: vars.KENNELCAST_SENTRY_DSN,
    environment: vars.NODE_ENV,
  };
}
