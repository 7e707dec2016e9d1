/**
 * KennelCast API Client
 * Resilient HTTP access to the streaming backend
 */

export {
  StreamingApiClient,
  createStreamingApiClient,
  type CallOptions,
  type ContentCache,
  type ContentResult,
  type DownloadableContent,
  type StreamingApiClientOptions,
  type StreamingApiClientOverrides,
} from "./client";

export { ENDPOINTS } from "./endpoints";

export { NetworkError, isNetworkError, type NetworkErrorCode } from "./errors";

export {
  RequestBuilder,
  cacheKeyFor,
  type BuildOptions,
  type RequestBuilderConfig,
} from "./requestBuilder";

export {
  RequestExecutor,
  decodeBody,
  type ExecuteOptions,
  type RequestExecutorConfig,
  type ResponseSchema,
} from "./requestExecutor";

export {
  RetryHandler,
  withRetry,
  sleep,
  fixedDelayPolicy,
  exponentialBackoffPolicy,
  isRetryableError,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_DELAY_MS,
  type RetryPolicy,
  type RetryOptions,
  type ExponentialBackoffOptions,
} from "./retry";

export * from "./schemas";
