/**
 * Offline Mode Handler
 *
 * Switches the application's content source between the network and the
 * response cache as connectivity comes and goes.
 *
 *   online  --connectivity lost-->      offline (load every cached entry)
 *   offline --connectivity restored-->  online  (no forced refetch)
 */

import type {
  CacheEntry,
  ConnectionState,
  ConnectivitySource,
} from "@kennelcast/types";
import { createLogger } from "@kennelcast/telemetry";
import type {
  CachedContentSource,
  ContentMode,
  OfflineEvent,
  OfflineEventCallback,
  OfflineModeOptions,
} from "./types";

const log = createLogger("OfflineMode");

const modeFor = (state: ConnectionState): ContentMode =>
  state.isConnected ? "online" : "offline";

// ============================================================================
// Offline Mode Handler
// ============================================================================

export class OfflineModeHandler<T> {
  private connectivity: ConnectivitySource;
  private cache: CachedContentSource;
  private decodeEntry: (entry: CacheEntry) => T[];

  private mode: ContentMode;
  private cachedEntries: CacheEntry[] = [];
  private cachedContent: T[] = [];

  /** Incremented on every mode change; stale cache loads compare against it */
  private generation = 0;
  private pendingLoad: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;
  private eventCallbacks: Set<OfflineEventCallback> = new Set();

  constructor(options: OfflineModeOptions<T>) {
    this.connectivity = options.connectivity;
    this.cache = options.cache;
    this.decodeEntry = options.decodeEntry;
    this.mode = modeFor(this.connectivity.currentState());
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Subscribe to connectivity changes. Re-reads the current state, so a
   * change since construction is applied as a normal transition; loads the
   * cache right away when the handler starts out offline.
   */
  start(): void {
    if (this.unsubscribe) return;

    this.unsubscribe = this.connectivity.onChange((state) =>
      this.handleConnectivity(state),
    );

    const current = this.connectivity.currentState();
    if (modeFor(current) !== this.mode) {
      this.handleConnectivity(current);
    } else if (this.mode === "offline") {
      this.enterOffline();
    }
  }

  dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.eventCallbacks.clear();
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  private handleConnectivity(state: ConnectionState): void {
    const newMode = modeFor(state);
    if (newMode === this.mode) return;

    const previousMode = this.mode;
    this.mode = newMode;
    this.generation++;

    this.emitEvent({
      type: "mode_change",
      timestamp: Date.now(),
      data: { previousMode, newMode },
    });
    log.info(`Switched to ${newMode} mode`);

    if (newMode === "offline") {
      this.enterOffline();
    }
  }

  private enterOffline(): void {
    const generation = this.generation;
    this.pendingLoad = this.loadCachedContent(generation);
  }

  private async loadCachedContent(generation: number): Promise<void> {
    let entries: CacheEntry[];
    try {
      entries = await this.cache.list();
    } catch (error) {
      if (generation !== this.generation) return;
      log.error("Failed to load cached content", error);
      this.cachedEntries = [];
      this.cachedContent = [];
      this.emitEvent({
        type: "cache_load_failed",
        timestamp: Date.now(),
        data: { error },
      });
      return;
    }

    // Connectivity returned while the cache was being read
    if (generation !== this.generation) return;

    this.cachedEntries = entries;
    this.cachedContent = entries.flatMap((entry) => this.decode(entry));
    this.emitEvent({
      type: "cache_loaded",
      timestamp: Date.now(),
      data: { entryCount: entries.length },
    });
    log.debug("Loaded cached content", entries.length);
  }

  private decode(entry: CacheEntry): T[] {
    try {
      return this.decodeEntry(entry);
    } catch (error) {
      log.warn("Skipping undecodable cache entry", entry.key, error);
      return [];
    }
  }

  // ==========================================================================
  // State Access
  // ==========================================================================

  getMode(): ContentMode {
    return this.mode;
  }

  isOfflineMode(): boolean {
    return this.mode === "offline";
  }

  /**
   * Cache entries exactly as listed when offline mode was entered
   */
  getCachedEntries(): CacheEntry[] {
    return [...this.cachedEntries];
  }

  /**
   * Decoded content items from the cached entries
   */
  getCachedContent(): T[] {
    return [...this.cachedContent];
  }

  /**
   * Resolves once the most recent cache load has settled
   */
  whenIdle(): Promise<void> {
    return this.pendingLoad;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  onEvent(callback: OfflineEventCallback): () => void {
    this.eventCallbacks.add(callback);
    return () => this.eventCallbacks.delete(callback);
  }

  private emitEvent(event: OfflineEvent): void {
    this.eventCallbacks.forEach((callback) => {
      try {
        callback(event);
      } catch (error) {
        log.error("Error in event callback:", error);
      }
    });
  }
}

// ============================================================================
// Factory Function
// ============================================================================

/**
 * Offline handler exposing raw cache entries as its content
 */
export function createOfflineModeHandler(
  connectivity: ConnectivitySource,
  cache: CachedContentSource,
): OfflineModeHandler<CacheEntry> {
  return new OfflineModeHandler<CacheEntry>({
    connectivity,
    cache,
    decodeEntry: (entry) => [entry],
  });
}
