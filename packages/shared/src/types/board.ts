/**
 * Board type definitions.
 *
 * A Board is the device this agent runs on. Its identity (uuid, code) is
 * assigned by the orchestrator at registration and only ever read here; its
 * status moves through the values below as the orchestrator drives it.
 */

/**
 * Board status. The empty string is what a freshly provisioned settings file
 * carries before the orchestrator has seen the board.
 */
export type BoardStatus = "" | "first_boot" | "registered" | "online" | "error";

/** All board status values, in lifecycle order */
export const BOARD_STATUSES: readonly BoardStatus[] = [
  "",
  "first_boot",
  "registered",
  "online",
  "error",
];

/** Code a board carries until the orchestrator has registered it */
export const REGISTRATION_TOKEN_CODE = "<REGISTRATION-TOKEN>";

/** A control-plane router address */
export interface ControlPlaneEndpoint {
  /** WebSocket URL of the router (ws:// or wss://) */
  url: string;
  /** Realm to join on that router */
  realm: string;
}

/** Which endpoint variant the board selected */
export type EndpointKind = "main-agent" | "registration-agent";

/** The endpoint the session manager must use */
export interface SelectedEndpoint extends ControlPlaneEndpoint {
  kind: EndpointKind;
}

/** Read-only view of the board served to the status API */
export interface BoardSnapshot {
  uuid: string;
  code: string;
  name: string;
  status: BoardStatus;
  type: string;
  mobile: boolean;
  agent: string;
  created_at: string;
  updated_at: string;
  location: Record<string, unknown>;
  extra: Record<string, unknown>;
  session_id: string | null;
  endpoint: SelectedEndpoint | null;
}
