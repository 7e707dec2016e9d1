/**
 * Network Utilities
 *
 * Connectivity observation and network path classification.
 */

export {
  ConnectivityMonitor,
  createConnectivityMonitor,
  type ConnectivityMonitorConfig,
} from "./connectivityMonitor";

export {
  osNetworkPathProvider,
  classifyInterface,
  resolveConnectionType,
  pathFromInterfaceTable,
  toConnectionState,
  UNREPORTABLE_PATH,
  type NetworkPath,
  type NetworkPathStatus,
  type NetworkPathProvider,
} from "./pathProvider";

export { createStateChannel, type StateChannel } from "./stateChannel";
