/**
 * KennelCast Shared Types
 * Common TypeScript types used across the network layer packages
 */

// ============================================================================
// Connectivity Types
// ============================================================================

export type ConnectionType = "wifi" | "cellular" | "ethernet" | "unknown";

export interface ConnectionState {
  type: ConnectionType;
  isConnected: boolean;
  /** Epoch milliseconds of the sample that produced this state */
  observedAt: number;
}

export type ConnectionStateListener = (state: ConnectionState) => void;

/**
 * Anything that can report the latest connection state.
 * Implemented by ConnectivityMonitor; tests substitute a plain object.
 */
export interface ConnectivitySource {
  currentState(): ConnectionState;
  onChange(listener: ConnectionStateListener): () => void;
}

// ============================================================================
// Request / Response Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD";

export interface EndpointDescriptor {
  readonly path: string;
  readonly method: HttpMethod;
  readonly requiresAuth: boolean;
}

export type EndpointName = "content" | "analytics" | "sync" | "updates";

export interface RequestEnvelope {
  url: string;
  method: HttpMethod;
  /** Insertion order is the order headers are sent in */
  headers: Readonly<Record<string, string>>;
  body?: Uint8Array;
}

export interface ResponseEnvelope {
  statusCode: number;
  body: Uint8Array;
  headers: Readonly<Record<string, string>>;
}

export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Readonly<Record<string, QueryValue>>;

// ============================================================================
// Cache Types
// ============================================================================

export interface CacheEntry {
  key: string;
  payload: Uint8Array;
  /** Epoch milliseconds */
  storedAt: number;
}

// ============================================================================
// Retry Types
// ============================================================================

export interface RetryContext {
  /** 1-based attempt number */
  attempt: number;
  maxAttempts: number;
  /** Delay in ms applied before the next attempt */
  delay: number;
}

// ============================================================================
// Content Types
// ============================================================================

export type ContentCategory =
  | "relaxation"
  | "stimulation"
  | "exposure"
  | "training";

export interface VideoContent {
  id: string;
  title: string;
  description: string;
  category: ContentCategory;
  videoURL: string;
  thumbnailURL?: string;
  durationSeconds: number;
  createdAt: string;
  updatedAt: string;
}

export interface AnalyticsEvent {
  userId: string;
  sessionId: string;
  eventType: string;
  eventData: Record<string, string>;
  timestamp: string;
}

export interface DogProfile {
  id: string;
  name: string;
  breed?: string;
  ageYears?: number;
}

export interface UserPreferences {
  preferredCategories: ContentCategory[];
  autoplay: boolean;
  volume: number;
}

export interface UserDataSnapshot {
  user: {
    id: string;
    email: string;
    name: string;
  };
  dogs: DogProfile[];
  preferences: UserPreferences;
  lastSync: string;
}

export interface UpdateInfo {
  hasUpdates: boolean;
  lastUpdate: string;
  version: string;
  changelog: string;
}
