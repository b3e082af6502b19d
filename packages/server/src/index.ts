/**
 * @switchback/server
 *
 * Session negotiation and routing for a realtime server that starts clients on
 * HTTP long-polling and lets them upgrade to WebSocket without losing their session.
 */

// Main exports
export {
  EngineServer,
  DEFAULT_PING_TIMEOUT,
  DEFAULT_PING_INTERVAL,
  DEFAULT_MAX_HTTP_BUFFER_SIZE,
} from "./server.js";
export { EngineSocket, type EngineSocketEvents } from "./socket.js";
export { attach, DEFAULT_PATH, type AttachOptions, type AttachedEngine } from "./attach.js";

// Core
export { SessionRegistry } from "./session-registry.js";
export { HandshakeNegotiator, type HandshakeNegotiatorConfig } from "./handshake.js";
export {
  ConnectionDispatcher,
  type ConnectionOutcome,
  type ConnectionDispatcherConfig,
} from "./connection-dispatcher.js";
export {
  UpgradeDispatcher,
  type UpgradeOutcome,
  type UpgradeRejection,
  type UpgradeDispatcherConfig,
} from "./upgrade-dispatcher.js";
export {
  buildErrorResponse,
  sendErrorMessage,
  corsHeaders,
  JSON_CONTENT_TYPE,
} from "./error-responder.js";
export { createIdGenerator, encodeTime, type IdGeneratorOptions } from "./session-id.js";

// Transport layer
export { type Transport, type TransportEvents, BaseTransport } from "./transports/transport.js";
export { PollingTransport } from "./transports/polling.js";
export { WebSocketTransport } from "./transports/websocket.js";

// Node.js bindings
export {
  createNodeExchange,
  parseQuery,
  parseRequestUrl,
  type NodeExchangeOptions,
} from "./node-exchange.js";
export { createWsConnection } from "./ws-connection.js";

// Testing utilities: import from "@switchback/server/testing".

// Errors
export {
  DuplicateSessionError,
  ServerConfigError,
  PayloadTooLargeError,
  TransportError,
  SessionStateError,
} from "./errors.js";

// Types
export type {
  Exchange,
  ExchangeResponse,
  PersistentConnection,
  Session,
  SessionState,
  SessionOptions,
  SessionFactory,
  CloseReason,
  HandshakeRequest,
  ServerOptions,
} from "./types.js";
