/**
 * Server Types for @switchback/server
 *
 * The core routes requests between three collaborators it does not own:
 * the request/response exchange, the persistent connection, and the session.
 * Each is described here at the boundary the core consumes.
 *
 * @module @switchback/server/types
 */

import type { Query, TransportKind } from "@switchback/shared";
import type { Transport } from "./transports/transport.js";

// ============================================================================
// Request/Response Exchange
// ============================================================================

export interface ExchangeResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * One plain HTTP request and the response that answers it.
 *
 * A polling exchange may be answered long after it arrived; `respond()` is
 * called exactly once.
 */
export interface Exchange {
  /** Upper-cased request method */
  readonly method: string;

  /** Decoded query string */
  readonly query: Query;

  /** Request header by case-insensitive name */
  header(name: string): string | undefined;

  /** Full request body. May reject with PayloadTooLargeError. */
  body(): Promise<string>;

  /** Write the response. A failed write throws. */
  respond(response: ExchangeResponse): void;
}

// ============================================================================
// Persistent Connection
// ============================================================================

/**
 * An accepted WebSocket, seen from the core.
 */
export interface PersistentConnection {
  /** Query string of the upgrade request */
  readonly query: Query;

  /** Whether frames can still be sent */
  readonly isOpen: boolean;

  /** Upgrade request header by case-insensitive name */
  header(name: string): string | undefined;

  /** Send one text frame */
  send(data: string): void;

  /** Close the connection */
  close(): void;

  onMessage(listener: (data: string) => void): void;
  onClose(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
}

// ============================================================================
// Session
// ============================================================================

export type SessionState = "opening" | "open" | "closing" | "closed";

export type CloseReason =
  | "forced close"
  | "client close"
  | "server close"
  | "transport close"
  | "transport error";

/**
 * A logical client session, independent of the transport carrying it.
 */
export interface Session {
  /** Unique, immutable session id */
  readonly id: string;

  /** Kind of the transport currently bound; undefined until initialized */
  readonly transportKind: TransportKind | undefined;

  readonly readyState: SessionState;

  /**
   * Bind the first transport and emit the handshake. For polling handshakes the
   * initiating exchange is answered with the `open` packet.
   */
  initialize(transport: Transport, exchange?: Exchange): Promise<void>;

  /** Serve a request addressed to this session through its current transport */
  handleRequest(exchange: Exchange): Promise<void>;

  /** Whether the session would move onto a transport of this kind now */
  canAcceptUpgrade(kind: TransportKind): boolean;

  /** Move onto a new transport; the session owns the switch */
  upgrade(transport: Transport): void;

  /** Queue an application message */
  send(data: unknown): void;

  close(reason?: CloseReason): void;

  /** Subscribe to the session's single close notification */
  onClose(listener: (reason: CloseReason) => void): void;
}

/**
 * Values a session needs from the server configuration.
 */
export interface SessionOptions {
  pingInterval: number;
  pingTimeout: number;
  allowUpgrades: boolean;
}

export type SessionFactory = (id: string, options: SessionOptions) => Session;

// ============================================================================
// Server Configuration
// ============================================================================

/**
 * What `allowRequest` sees of a request that would open a new session.
 */
export interface HandshakeRequest {
  readonly transport: TransportKind;
  readonly query: Query;
  header(name: string): string | undefined;
}

export interface ServerOptions {
  /**
   * Milliseconds without a heartbeat before a session is considered dead.
   * @default 5000
   */
  pingTimeout?: number;

  /**
   * Milliseconds between server-initiated heartbeats.
   * @default 25000
   */
  pingInterval?: number;

  /**
   * Whether polling sessions may move to WebSocket.
   * @default true
   */
  allowUpgrades?: boolean;

  /**
   * Largest accepted polling request body, in bytes.
   * @default 1e6
   */
  maxHttpBufferSize?: number;

  /**
   * Admission check for new sessions. Returning false answers a polling
   * handshake with FORBIDDEN and closes a WebSocket handshake.
   */
  allowRequest?: (request: HandshakeRequest) => boolean;

  /** Session id generator */
  generateId?: () => string;

  /** Session implementation; EngineSocket by default */
  createSession?: SessionFactory;
}
