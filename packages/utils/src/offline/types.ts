/**
 * Offline Mode Types
 */

import type { CacheEntry, ConnectivitySource } from "@kennelcast/types";

/**
 * Where the application currently takes its content from
 */
export type ContentMode = "online" | "offline";

/**
 * Read side of the response cache needed for offline mode
 */
export interface CachedContentSource {
  list(): Promise<CacheEntry[]>;
}

export interface OfflineModeOptions<T> {
  connectivity: ConnectivitySource;
  cache: CachedContentSource;
  /** Turn one cache entry into content items; return [] to skip it */
  decodeEntry: (entry: CacheEntry) => T[];
}

export type OfflineEvent =
  | {
      type: "mode_change";
      timestamp: number;
      data: { previousMode: ContentMode; newMode: ContentMode };
    }
  | {
      type: "cache_loaded";
      timestamp: number;
      data: { entryCount: number };
    }
  | {
      type: "cache_load_failed";
      timestamp: number;
      data: { error: unknown };
    };

export type OfflineEventType = OfflineEvent["type"];

export type OfflineEventCallback = (event: OfflineEvent) => void;
