/**
 * Transport abstraction over the control-plane client.
 *
 * The session manager only ever talks to these interfaces; the autobahn
 * implementation lives in autobahn-transport.ts and tests substitute an
 * in-process fake.
 */

/** Handler for an inbound invocation; the resolved value is the call result */
export type ProcedureHandler = (args: unknown[]) => Promise<unknown> | unknown;

/** Handler for an inbound event on a subscribed topic */
export type TopicHandler = (args: unknown[]) => void;

/** A live procedure registration */
export interface Registration {
  readonly procedure: string;
  unregister(): Promise<void>;
}

/** An open control-plane session */
export interface TransportSession {
  /** Router-assigned session id, rendered as a decimal string */
  readonly id: string;
  register(procedure: string, handler: ProcedureHandler): Promise<Registration>;
  subscribe(topic: string, handler: TopicHandler): Promise<void>;
  publish(topic: string, args: unknown[]): Promise<void>;
  call(procedure: string, args: unknown[]): Promise<unknown>;
  close(): Promise<void>;
}

export interface TransportOpenOptions {
  url: string;
  realm: string;
  /** Accept any server certificate on wss:// */
  skipCertVerify: boolean;
  /** Called once when an open session is lost or closed by the router */
  onClose: (reason: string) => void;
}

/** Opens control-plane sessions */
export interface ControlPlaneTransport {
  open(options: TransportOpenOptions): Promise<TransportSession>;
}
