/**
 * Streaming API Client
 *
 * Facade over the request pipeline (build -> retry(execute + decode)) with
 * the response cache as fallback. Collaborators are passed in.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import type {
  AnalyticsEvent,
  CacheEntry,
  ConnectivitySource,
  EndpointDescriptor,
  RequestEnvelope,
  RetryContext,
  UpdateInfo,
  UserDataSnapshot,
  VideoContent,
} from "@kennelcast/types";
import type { NetworkConfig } from "@kennelcast/config";
import {
  configureLogging,
  createLogger,
  createTelemetryClient,
  type TelemetryClient,
} from "@kennelcast/telemetry";
import {
  ConnectivityMonitor,
  OfflineModeHandler,
  ResponseCache,
  StorageError,
} from "@kennelcast/utils";
import type { AxiosInstance } from "axios";
import { ENDPOINTS } from "./endpoints";
import { NetworkError, isNetworkError } from "./errors";
import { RequestBuilder, cacheKeyFor, type BuildOptions } from "./requestBuilder";
import {
  RequestExecutor,
  decodeBody,
  type ResponseSchema,
} from "./requestExecutor";
import { RetryHandler, fixedDelayPolicy } from "./retry";
import {
  analyticsEventSchema,
  updateInfoSchema,
  userDataSnapshotSchema,
  videoContentSchema,
} from "./schemas";

const log = createLogger("StreamingApiClient");

const analyticsBatchSchema = z.array(analyticsEventSchema);

// ============================================================================
// Types
// ============================================================================

/** Cache operations the client depends on */
export interface ContentCache {
  put(key: string, payload: Uint8Array): Promise<unknown>;
  get(key: string): Promise<Uint8Array | null>;
  list(): Promise<CacheEntry[]>;
}

export interface StreamingApiClientOptions<TContent> {
  connectivity: ConnectivitySource;
  cache: ContentCache;
  builder: RequestBuilder;
  executor: RequestExecutor;
  retry?: RetryHandler;
  /** Shape of one content item in the content listing */
  contentSchema: ResponseSchema<TContent>;
  /** Called when the client is closed; releases owned resources */
  onClose?: () => Promise<void> | void;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ContentResult<TContent> {
  source: "network" | "cache";
  items: TContent[];
}

export interface DownloadableContent {
  id: string;
  videoURL: string;
}

// ============================================================================
// Streaming API Client
// ============================================================================

export class StreamingApiClient<TContent> {
  readonly connectivity: ConnectivitySource;
  readonly cache: ContentCache;
  private builder: RequestBuilder;
  private executor: RequestExecutor;
  private retryHandler: RetryHandler;
  private listSchema: ResponseSchema<TContent[]>;
  private onClose?: () => Promise<void> | void;

  constructor(options: StreamingApiClientOptions<TContent>) {
    this.connectivity = options.connectivity;
    this.cache = options.cache;
    this.builder = options.builder;
    this.executor = options.executor;
    this.retryHandler = options.retry ?? new RetryHandler();
    this.listSchema = z.array(options.contentSchema);
    this.onClose = options.onClose;
  }

  // ==========================================================================
  // Content
  // ==========================================================================

  /**
   * Fetch the content listing and store the raw body in the cache.
   * A cache write failure is logged; the fetched items are still returned.
   */
  async fetchContent(options: CallOptions = {}): Promise<TContent[]> {
    const descriptor = ENDPOINTS.content;
    const envelope = this.builder.build(descriptor);

    const { body, items } = await this.send(envelope, options, (response) => ({
      body: response,
      items: decodeBody(response, this.listSchema),
    }));

    try {
      await this.cache.put(cacheKeyFor(descriptor), body);
    } catch (error) {
      log.error("Failed to cache content listing", error);
    }

    return items;
  }

  /**
   * Content from the network, or from the cache when the network fails
   */
  async fetchContentOrCached(options: CallOptions = {}): Promise<ContentResult<TContent>> {
    try {
      return { source: "network", items: await this.fetchContent(options) };
    } catch (error) {
      if (isNetworkError(error, "CANCELLED")) throw error;

      const cached = await this.readCachedContent();
      if (!cached) throw error;

      log.info("Serving cached content after network failure", error);
      return { source: "cache", items: cached };
    }
  }

  /**
   * Offline handler that decodes the cached content listing
   */
  createOfflineModeHandler(): OfflineModeHandler<TContent> {
    const contentKey = cacheKeyFor(ENDPOINTS.content);
    return new OfflineModeHandler<TContent>({
      connectivity: this.connectivity,
      cache: this.cache,
      decodeEntry: (entry) =>
        entry.key === contentKey ? decodeBody(entry.payload, this.listSchema) : [],
    });
  }

  /**
   * Raw bytes of a media URL, fetched without credentials and with retries
   */
  async streamContent(url: string, options: CallOptions = {}): Promise<Uint8Array> {
    const envelope = this.builder.buildForUrl(url);
    return this.send(envelope, options, (response) => response);
  }

  /**
   * Download a content item's video into a directory for offline viewing.
   * Ids that would place the file outside `directory` are rejected before
   * any request is made.
   *
   * @returns Path of the written file
   */
  async downloadContent(
    item: DownloadableContent,
    directory: string,
    options: CallOptions = {},
  ): Promise<string> {
    const path = downloadPathFor(directory, item.id);
    const body = await this.streamContent(item.videoURL, options);

    try {
      await mkdir(directory, { recursive: true });
      await writeFile(path, body);
    } catch (error) {
      throw new StorageError("write", `Failed to save download for "${item.id}"`, {
        key: item.id,
        cause: error,
      });
    }

    log.debug("Downloaded", item.id, `${body.byteLength} bytes`);
    return path;
  }

  // ==========================================================================
  // Analytics / Sync / Updates
  // ==========================================================================

  async uploadAnalytics(events: AnalyticsEvent[], options: CallOptions = {}): Promise<void> {
    const checked = analyticsBatchSchema.safeParse(events);
    if (!checked.success) {
      throw NetworkError.invalidRequest("analytics events", checked.error);
    }
    await this.sendTo(ENDPOINTS.analytics, { body: { events } }, options);
  }

  async syncUserData(snapshot: UserDataSnapshot, options: CallOptions = {}): Promise<void> {
    const checked = userDataSnapshotSchema.safeParse(snapshot);
    if (!checked.success) {
      throw NetworkError.invalidRequest("user data snapshot", checked.error);
    }
    await this.sendTo(ENDPOINTS.sync, { body: snapshot }, options);
  }

  async checkForUpdates(options: CallOptions = {}): Promise<UpdateInfo> {
    const envelope = this.builder.build(ENDPOINTS.updates);
    return this.send(envelope, options, (response) =>
      decodeBody(response, updateInfoSchema),
    );
  }

  /**
   * Release owned resources. Resolves once pending telemetry is flushed.
   */
  async close(): Promise<void> {
    const onClose = this.onClose;
    this.onClose = undefined;
    await onClose?.();
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async sendTo(
    descriptor: EndpointDescriptor,
    build: BuildOptions,
    options: CallOptions,
  ): Promise<void> {
    const envelope = this.builder.build(descriptor, build);
    await this.send(envelope, options, () => undefined);
  }

  /**
   * Execute with retries; `read` runs inside each attempt so decoding
   * failures surface from the attempt that produced them
   */
  private send<T>(
    envelope: RequestEnvelope,
    options: CallOptions,
    read: (body: Uint8Array) => T,
  ): Promise<T> {
    return this.retryHandler.retry(
      async () => {
        const response = await this.executor.execute(envelope, options);
        return read(response.body);
      },
      undefined,
      undefined,
      {
        signal: options.signal,
        onRetry: (context: RetryContext, error: unknown) => {
          log.warn(
            `${envelope.method} ${envelope.url} attempt ${context.attempt}/${context.maxAttempts} failed, retrying in ${context.delay}ms`,
            error,
          );
        },
      },
    );
  }

  private async readCachedContent(): Promise<TContent[] | null> {
    let payload: Uint8Array | null;
    try {
      payload = await this.cache.get(cacheKeyFor(ENDPOINTS.content));
    } catch (error) {
      log.error("Failed to read cached content", error);
      return null;
    }
    if (!payload) return null;

    try {
      return decodeBody(payload, this.listSchema);
    } catch (error) {
      log.warn("Cached content listing is unreadable", error);
      return null;
    }
  }
}

function downloadPathFor(directory: string, id: string): string {
  const name = `${id}.mp4`;
  if (/[\\/]/.test(id) || dirname(resolve(directory, name)) !== resolve(directory)) {
    throw new StorageError("write", `Invalid download id "${id}"`, { key: id });
  }
  return join(directory, name);
}

// ============================================================================
// Factory Function
// ============================================================================

export interface StreamingApiClientOverrides {
  connectivity?: ConnectivitySource;
  cache?: ContentCache;
  http?: AxiosInstance;
  retry?: RetryHandler;
  telemetry?: TelemetryClient;
}

/**
 * Wire the full network layer for video content from a NetworkConfig.
 * Debug logging is off in production. A connectivity monitor created here
 * is started; `close()` stops it and flushes telemetry.
 */
export function createStreamingApiClient(
  config: NetworkConfig,
  overrides: StreamingApiClientOverrides = {},
): StreamingApiClient<VideoContent> {
  configureLogging({ debug: config.environment !== "production" });

  const telemetry =
    overrides.telemetry ??
    createTelemetryClient({
      sentryDsn: config.sentryDsn,
      environment: config.environment,
    });

  let ownedMonitor: ConnectivityMonitor | null = null;
  let connectivity = overrides.connectivity;
  if (!connectivity) {
    ownedMonitor = new ConnectivityMonitor({ pollIntervalMs: config.connectivityPollMs });
    ownedMonitor.start();
    connectivity = ownedMonitor;
  }

  const cache =
    overrides.cache ??
    new ResponseCache({
      directory: config.cacheDirectory,
      compress: config.compressCache,
    });

  return new StreamingApiClient<VideoContent>({
    connectivity,
    cache,
    builder: new RequestBuilder({
      baseURL: config.baseURL,
      clientId: config.clientId,
      getAccessToken: () => config.apiToken,
    }),
    executor: new RequestExecutor({
      connectivity,
      http: overrides.http,
      timeoutMs: config.requestTimeoutMs,
    }),
    retry:
      overrides.retry ??
      new RetryHandler(
        fixedDelayPolicy({
          maxAttempts: config.retry.maxAttempts,
          delayMs: config.retry.delayMs,
        }),
      ),
    contentSchema: videoContentSchema,
    onClose: async () => {
      ownedMonitor?.stop();
      if (!(await telemetry.flush())) {
        log.warn("Telemetry flush timed out");
      }
    },
  });
}
