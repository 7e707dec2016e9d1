/**
 * Connectivity Monitor
 *
 * Observes the device's active network path and publishes a
 * ConnectionState whenever the connection type or reachability changes.
 * Sampling runs on a background timer; push-capable path providers are
 * listened to as well.
 */

import type {
  ConnectionState,
  ConnectionStateListener,
  ConnectivitySource,
} from "@kennelcast/types";
import { createLogger } from "@kennelcast/telemetry";
import {
  osNetworkPathProvider,
  toConnectionState,
  UNREPORTABLE_PATH,
  type NetworkPath,
  type NetworkPathProvider,
} from "./pathProvider";
import { createStateChannel, type StateChannel } from "./stateChannel";

const log = createLogger("ConnectivityMonitor");

// ============================================================================
// Configuration
// ============================================================================

export interface ConnectivityMonitorConfig {
  /** Path sampling interval in ms */
  pollIntervalMs: number;
  /** Source of network path information */
  provider: NetworkPathProvider;
  /** Clock used for `observedAt` */
  now: () => number;
}

const DEFAULT_CONFIG: ConnectivityMonitorConfig = {
  pollIntervalMs: 5000,
  provider: osNetworkPathProvider,
  now: Date.now,
};

// ============================================================================
// Connectivity Monitor Class
// ============================================================================

export class ConnectivityMonitor implements ConnectivitySource {
  private config: ConnectivityMonitorConfig;
  private state: ConnectionState;
  private listeners: Set<ConnectionStateListener> = new Set();
  private channels: Set<StateChannel<ConnectionState>> = new Set();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private unsubscribeProvider: (() => void) | null = null;
  private isRunning = false;

  constructor(config: Partial<ConnectivityMonitorConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.state = toConnectionState(this.readPath(), this.config.now());
  }

  /**
   * Begin observing path changes
   */
  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;

    this.pollTimer = setInterval(() => this.refresh(), this.config.pollIntervalMs);
    this.pollTimer.unref?.();

    if (this.config.provider.subscribe) {
      this.unsubscribeProvider = this.config.provider.subscribe((path) =>
        this.applyPath(path),
      );
    }

    this.refresh();
    log.debug("Started", this.state);
  }

  /**
   * Stop observing and release the timer and provider subscription
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    this.unsubscribeProvider?.();
    this.unsubscribeProvider = null;

    for (const channel of this.channels) {
      channel.close();
    }
  }

  isStarted(): boolean {
    return this.isRunning;
  }

  currentState(): ConnectionState {
    return { ...this.state };
  }

  /**
   * Register a listener invoked on every transition
   *
   * @returns Unsubscribe function
   */
  onChange(listener: ConnectionStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stream of transitions for a single consumer, buffered in order.
   * Calling `return()` on the iterator detaches it.
   */
  changes(): AsyncIterableIterator<ConnectionState> {
    const channel = createStateChannel<ConnectionState>(() => {
      this.channels.delete(channel);
    });
    this.channels.add(channel);
    return channel.iterator;
  }

  /**
   * Sample the path immediately
   */
  refresh(): ConnectionState {
    this.applyPath(this.readPath());
    return this.currentState();
  }

  private readPath(): NetworkPath {
    try {
      return this.config.provider.readPath();
    } catch (error) {
      log.warn("Network path unavailable", error);
      return UNREPORTABLE_PATH;
    }
  }

  private applyPath(path: NetworkPath): void {
    const next = toConnectionState(path, this.config.now());
    if (next.type === this.state.type && next.isConnected === this.state.isConnected) {
      return;
    }

    this.state = next;
    log.info(
      next.isConnected ? `Connected via ${next.type}` : "Connection lost",
    );
    this.notify(next);
  }

  private notify(state: ConnectionState): void {
    for (const listener of this.listeners) {
      try {
        listener({ ...state });
      } catch (error) {
        log.error("Error in listener:", error);
      }
    }

    for (const channel of this.channels) {
      channel.push({ ...state });
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConnectivityMonitor(
  config?: Partial<ConnectivityMonitorConfig>,
): ConnectivityMonitor {
  return new ConnectivityMonitor(config);
}
