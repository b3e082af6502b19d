/**
 * Connection Dispatcher
 *
 * Entry point for plain HTTP requests. Classifies each request as a handshake or
 * a continuation of a live session and applies the transport checks. The
 * polling identifier is required even to address a session that has since
 * upgraded; such requests get BAD_REQUEST.
 */

import {
  HANDSHAKE_METHOD,
  QueryParams,
  TransportKinds,
  type ServerErrorKind,
} from "@switchback/shared";
import { Logger } from "@switchback/kernel";
import type { Exchange, HandshakeRequest, Session } from "./types.js";
import type { SessionRegistry } from "./session-registry.js";
import type { HandshakeNegotiator } from "./handshake.js";
import { sendErrorMessage } from "./error-responder.js";
import { PollingTransport } from "./transports/polling.js";

const log = Logger.for("ConnectionDispatcher");

export type ConnectionOutcome =
  | { type: "rejected"; error: ServerErrorKind }
  | { type: "forwarded"; session: Session }
  | { type: "handshake"; session: Session };

type Route =
  | { type: "reject"; error: ServerErrorKind }
  | { type: "forward"; session: Session }
  | { type: "handshake" };

export interface ConnectionDispatcherConfig {
  allowRequest?: (request: HandshakeRequest) => boolean;
}

export class ConnectionDispatcher {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly negotiator: HandshakeNegotiator,
    private readonly config: ConnectionDispatcherConfig = {},
  ) {}

  async dispatch(exchange: Exchange): Promise<ConnectionOutcome> {
    const route = this.route(exchange);

    switch (route.type) {
      case "reject":
        log.debug({ error: route.error, query: exchange.query }, "rejected request");
        sendErrorMessage(exchange, route.error);
        return { type: "rejected", error: route.error };

      case "forward":
        await route.session.handleRequest(exchange);
        return { type: "forwarded", session: route.session };

      case "handshake": {
        const session = await this.negotiator.handshake(new PollingTransport(), exchange);
        return { type: "handshake", session };
      }
    }
  }

  private route(exchange: Exchange): Route {
    const transport = exchange.query[QueryParams.TRANSPORT];
    if (transport !== TransportKinds.POLLING) {
      return { type: "reject", error: "UNKNOWN_TRANSPORT" };
    }

    const sid = exchange.query[QueryParams.SESSION_ID];
    if (sid !== undefined) {
      const session = this.registry.get(sid);
      if (!session) {
        return { type: "reject", error: "UNKNOWN_SID" };
      }
      if (session.transportKind !== transport) {
        return { type: "reject", error: "BAD_REQUEST" };
      }
      return { type: "forward", session };
    }

    if (exchange.method.toUpperCase() !== HANDSHAKE_METHOD) {
      return { type: "reject", error: "BAD_HANDSHAKE_METHOD" };
    }

    const request: HandshakeRequest = {
      transport,
      query: exchange.query,
      header: (name) => exchange.header(name),
    };
    if (this.config.allowRequest && !this.config.allowRequest(request)) {
      return { type: "reject", error: "FORBIDDEN" };
    }

    return { type: "handshake" };
  }
}
