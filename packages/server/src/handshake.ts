/**
 * Handshake Negotiator
 *
 * Creates sessions. Registration and the close subscription both happen before
 * the session is given a transport, and a session cannot close before it has one,
 * so removal never runs ahead of insertion.
 */

import { Logger } from "@switchback/kernel";
import type { Exchange, Session } from "./types.js";
import type { Transport } from "./transports/transport.js";
import type { SessionRegistry } from "./session-registry.js";

const log = Logger.for("HandshakeNegotiator");

export interface HandshakeNegotiatorConfig {
  generateId: () => string;
  createSession: (id: string) => Session;
  /** Host notification for each established session */
  onConnection: (session: Session) => void;
}

function once(fn: () => void): () => void {
  let called = false;
  return () => {
    if (called) return;
    called = true;
    fn();
  };
}

export class HandshakeNegotiator {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly config: HandshakeNegotiatorConfig,
  ) {}

  /**
   * Open a session on `transport`. `exchange` is the initiating polling request,
   * absent for WebSocket handshakes.
   */
  async handshake(transport: Transport, exchange?: Exchange): Promise<Session> {
    const id = this.config.generateId();
    const session = this.config.createSession(id);

    this.registry.put(id, session);
    session.onClose(
      once(() => {
        this.registry.remove(id);
        log.debug({ sid: id, clients: this.registry.size }, "session removed");
      }),
    );

    try {
      await session.initialize(transport, exchange);
    } catch (error) {
      session.close("transport error");
      throw error;
    }

    log.debug({ sid: id, transport: transport.kind }, "handshake");
    if (session.readyState === "open") {
      this.config.onConnection(session);
    }
    return session;
  }
}
