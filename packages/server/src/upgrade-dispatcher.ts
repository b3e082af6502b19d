/**
 * Upgrade Dispatcher
 *
 * Entry point for accepted WebSocket connections. Rejections close the
 * connection without a payload: there is no response channel to carry one.
 */

import { QueryParams, TransportKinds } from "@switchback/shared";
import { Logger } from "@switchback/kernel";
import type { HandshakeRequest, PersistentConnection, Session } from "./types.js";
import type { SessionRegistry } from "./session-registry.js";
import type { HandshakeNegotiator } from "./handshake.js";
import { WebSocketTransport } from "./transports/websocket.js";

const log = Logger.for("UpgradeDispatcher");

export type UpgradeRejection = "unknown-sid" | "upgrade-refused" | "forbidden";

export type UpgradeOutcome =
  | { type: "rejected"; reason: UpgradeRejection }
  | { type: "upgraded"; session: Session }
  | { type: "handshake"; session: Session };

export interface UpgradeDispatcherConfig {
  allowRequest?: (request: HandshakeRequest) => boolean;
}

export class UpgradeDispatcher {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly negotiator: HandshakeNegotiator,
    private readonly config: UpgradeDispatcherConfig = {},
  ) {}

  async dispatch(connection: PersistentConnection): Promise<UpgradeOutcome> {
    const sid = connection.query[QueryParams.SESSION_ID];

    if (sid !== undefined) {
      const session = this.registry.get(sid);
      if (!session) {
        return this.reject(connection, "unknown-sid", sid);
      }
      if (!session.canAcceptUpgrade(TransportKinds.WEBSOCKET)) {
        return this.reject(connection, "upgrade-refused", sid);
      }
      session.upgrade(new WebSocketTransport(connection));
      return { type: "upgraded", session };
    }

    const request: HandshakeRequest = {
      transport: TransportKinds.WEBSOCKET,
      query: connection.query,
      header: (name) => connection.header(name),
    };
    if (this.config.allowRequest && !this.config.allowRequest(request)) {
      return this.reject(connection, "forbidden");
    }

    const session = await this.negotiator.handshake(new WebSocketTransport(connection));
    return { type: "handshake", session };
  }

  private reject(
    connection: PersistentConnection,
    reason: UpgradeRejection,
    sid?: string,
  ): UpgradeOutcome {
    log.debug({ sid, reason }, "upgrade rejected");
    connection.close();
    return { type: "rejected", reason };
  }
}
