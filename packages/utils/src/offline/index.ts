export { OfflineModeHandler, createOfflineModeHandler } from "./offlineModeHandler";
export type {
  CachedContentSource,
  ContentMode,
  OfflineEvent,
  OfflineEventCallback,
  OfflineEventType,
  OfflineModeOptions,
} from "./types";
