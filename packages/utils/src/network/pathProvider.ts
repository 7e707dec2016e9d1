/**
 * Network Path Providers
 *
 * A path provider reports which interfaces currently carry traffic.
 * The default implementation samples the operating system's interface
 * table; platforms with push notifications can implement `subscribe`.
 */

import { networkInterfaces, type NetworkInterfaceInfo } from "node:os";
import type { ConnectionState, ConnectionType } from "@kennelcast/types";

// ============================================================================
// Types
// ============================================================================

export type NetworkPathStatus = "satisfied" | "unsatisfied";

export interface NetworkPath {
  status: NetworkPathStatus;
  /** Types of the interfaces the path uses, in any order */
  interfaces: ConnectionType[];
}

export interface NetworkPathProvider {
  /**
   * Read the current path. Throwing means the platform cannot report
   * network state.
   */
  readPath(): NetworkPath;

  /**
   * Optional push notifications for path changes.
   *
   * @returns Unsubscribe function
   */
  subscribe?(listener: (path: NetworkPath) => void): () => void;
}

// ============================================================================
// Classification
// ============================================================================

const IGNORED_INTERFACE = /^(docker|veth|br-|virbr|vmnet|vboxnet)/i;
const WIFI_INTERFACE = /^(wl|wifi|ath|ra\d)/i;
const CELLULAR_INTERFACE = /^(wwan|rmnet|ppp|pdp_ip|ccmni)/i;
const ETHERNET_INTERFACE = /^(eth|en|em)/i;

/**
 * Map an OS interface name to a connection type
 */
export function classifyInterface(name: string): ConnectionType {
  if (WIFI_INTERFACE.test(name)) return "wifi";
  if (CELLULAR_INTERFACE.test(name)) return "cellular";
  if (ETHERNET_INTERFACE.test(name)) return "ethernet";
  return "unknown";
}

/**
 * Pick the connection type for a path: wifi, then cellular, then ethernet
 */
export function resolveConnectionType(path: NetworkPath): ConnectionType {
  for (const candidate of ["wifi", "cellular", "ethernet"] as const) {
    if (path.interfaces.includes(candidate)) return candidate;
  }
  return "unknown";
}

export function toConnectionState(
  path: NetworkPath,
  observedAt: number,
): ConnectionState {
  const isConnected = path.status === "satisfied";
  return {
    type: isConnected ? resolveConnectionType(path) : "unknown",
    isConnected,
    observedAt,
  };
}

export const UNREPORTABLE_PATH: NetworkPath = {
  status: "unsatisfied",
  interfaces: [],
};

// ============================================================================
// OS Provider
// ============================================================================

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

/**
 * Build a NetworkPath from an `os.networkInterfaces()` style table
 */
export function pathFromInterfaceTable(table: InterfaceTable): NetworkPath {
  const interfaces: ConnectionType[] = [];

  for (const [name, addresses] of Object.entries(table)) {
    if (!addresses || IGNORED_INTERFACE.test(name)) continue;
    const active = addresses.some((address) => !address.internal);
    if (active) interfaces.push(classifyInterface(name));
  }

  return {
    status: interfaces.length > 0 ? "satisfied" : "unsatisfied",
    interfaces,
  };
}

/**
 * Samples the host's interface table on every read
 */
export const osNetworkPathProvider: NetworkPathProvider = {
  readPath: () => pathFromInterfaceTable(networkInterfaces()),
};
