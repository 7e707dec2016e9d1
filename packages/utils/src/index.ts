/**
 * KennelCast Utilities
 * Connectivity, response caching and offline mode for the network layer
 */

// ============================================================================
// Network Module (Connectivity Monitoring)
// ============================================================================
export * from "./network";

// ============================================================================
// Cache Module (Persistent Response Storage)
// ============================================================================
export * from "./cache";

// ============================================================================
// Offline Module (Online/Offline Content Switching)
// ============================================================================
export * from "./offline";
