/**
 * Registry record types for the two reconciliation managers.
 *
 * Field names are snake_case because these records are written verbatim to
 * the registry documents and returned verbatim to the orchestrator.
 */

/** Lifecycle of a tunnel process */
export type ServiceStatus = "running" | "stopped";

/** A point-to-point tunnel exposing a local port */
export interface ServiceInfo {
  /** Unique key */
  name: string;
  local_port: number;
  /** Where the orchestrator reaches the tunnel */
  public_url: string;
  /** PID of the spawned tunnel process */
  pid: number;
  status: ServiceStatus;
}

/** Lifecycle of a reverse-proxy route */
export type WebServiceStatus = "enabled" | "disabled";

/** A reverse-proxy route mapping a public port to a local one */
export interface WebServiceInfo {
  /** Unique key, also names the proxy configuration artifact */
  name: string;
  local_port: number;
  public_port: number;
  /** server_name of the route; empty means catch-all */
  domain: string;
  status: WebServiceStatus;
}
