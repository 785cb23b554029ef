/**
 * @boardlink/core: board-side domain logic barrel export.
 *
 * The Board holds identity and endpoint selection. The SessionManager owns
 * the control-plane session; the CapabilityRegistrar advertises manager
 * capabilities on it and re-advertises them on every reconnect. The device,
 * service and webservice managers implement the capabilities themselves.
 * Nothing here reads configuration or builds loggers: every dependency is
 * passed in at construction.
 */

// Board identity, status, endpoint selection
export { Board } from "./board.js";
export {
  FileSettingsStore,
  SETTINGS_FILENAME,
  type SettingsStore,
} from "./settings-store.js";

// Control-plane session
export {
  SessionManager,
  type SessionManagerOptions,
  type SessionState,
} from "./session/session-manager.js";
export { AutobahnTransport } from "./session/autobahn-transport.js";
export type {
  ControlPlaneTransport,
  TransportSession,
  TransportOpenOptions,
  Registration,
  ProcedureHandler,
  TopicHandler,
} from "./session/transport.js";

// Capability naming and (re-)registration
export { CapabilityRegistrar, type CapabilityTable } from "./registrar.js";

// Device manager and profiles
export { DeviceManager } from "./device/device-manager.js";
export {
  DeviceProfileRegistry,
  GenericDeviceProfile,
  RaspberryDeviceProfile,
  createDeviceProfileRegistry,
  type DeviceProfile,
  type DeviceProfileFactory,
} from "./device/profiles.js";

// Tunnels
export {
  ServiceManager,
  deriveTunnelUrl,
  type ServiceManagerOptions,
  type ReconcileReport,
} from "./service/service-manager.js";
export { NodeProcessSpawner, type ProcessSpawner } from "./service/process-spawner.js";

// Reverse-proxy routes
export {
  WebServiceManager,
  type WebServiceManagerOptions,
  type ProxyStatus,
  type ArtifactReconcileReport,
} from "./webservice/webservice-manager.js";
export {
  NginxProxyController,
  type NginxProxyControllerOptions,
  type ProxyController,
} from "./webservice/proxy-controller.js";
export { renderNginxConf, artifactPath } from "./webservice/nginx-template.js";

// Utilities
export { RwLock } from "./lib/rw-lock.js";
export { formatTimestamp } from "./lib/timestamp.js";
export { isErrnoException } from "./lib/json-file.js";
export { delay } from "./lib/delay.js";
