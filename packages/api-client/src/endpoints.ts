/**
 * Endpoint Catalogue
 * One descriptor per logical API operation
 */

import type { EndpointDescriptor, EndpointName } from "@kennelcast/types";

export const ENDPOINTS = {
  content: { path: "/api/v1/content", method: "GET", requiresAuth: true },
  analytics: { path: "/api/v1/analytics", method: "POST", requiresAuth: true },
  sync: { path: "/api/v1/sync", method: "POST", requiresAuth: true },
  updates: { path: "/api/v1/updates", method: "GET", requiresAuth: true },
} as const satisfies Record<EndpointName, EndpointDescriptor>;
