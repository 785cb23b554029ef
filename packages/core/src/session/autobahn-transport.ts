/**
 * ControlPlaneTransport backed by the autobahn WAMP client.
 *
 * autobahn's own retry loop is disabled (max_retries 0): reconnection is
 * owned by the session manager's health check.
 */

import autobahn from "autobahn";
import { NetworkError } from "@boardlink/shared";
import type {
  ControlPlaneTransport,
  ProcedureHandler,
  Registration,
  TopicHandler,
  TransportOpenOptions,
  TransportSession,
} from "./transport.js";

export class AutobahnTransport implements ControlPlaneTransport {
  open(options: TransportOpenOptions): Promise<TransportSession> {
    const transport = {
      type: "websocket",
      url: options.url,
      tlsConfiguration: { rejectUnauthorized: !options.skipCertVerify },
    };

    const connection = new autobahn.Connection({
      realm: options.realm,
      transports: [transport],
      max_retries: 0,
      retry_if_unreachable: false,
    });

    return new Promise<TransportSession>((resolve, reject) => {
      let opened = false;

      connection.onopen = (session) => {
        opened = true;
        resolve(new AutobahnSession(connection, session));
      };

      connection.onclose = (reason) => {
        if (opened) {
          opened = false;
          options.onClose(reason);
        } else {
          reject(
            new NetworkError(
              `Failed to open control-plane session: ${reason}`,
              "NETWORK_CONNECT_FAILED",
              { url: options.url, realm: options.realm },
            ),
          );
        }
        // Stop autobahn from scheduling its own retry
        return true;
      };

      connection.open();
    });
  }
}

class AutobahnSession implements TransportSession {
  readonly id: string;

  constructor(
    private readonly connection: autobahn.Connection,
    private readonly session: autobahn.Session,
  ) {
    this.id = String(session.id);
  }

  async register(procedure: string, handler: ProcedureHandler): Promise<Registration> {
    const registration = await this.session.register(procedure, (args) =>
      handler(args ?? []),
    );
    const session = this.session;
    return {
      procedure,
      async unregister() {
        await session.unregister(registration);
      },
    };
  }

  async subscribe(topic: string, handler: TopicHandler): Promise<void> {
    await this.session.subscribe(topic, (args) => handler(args ?? []));
  }

  async publish(topic: string, args: unknown[]): Promise<void> {
    await this.session.publish(topic, args, {}, { acknowledge: true });
  }

  async call(procedure: string, args: unknown[]): Promise<unknown> {
    return await this.session.call(procedure, args);
  }

  async close(): Promise<void> {
    this.connection.close("wamp.close.normal", "agent shutdown");
  }
}
