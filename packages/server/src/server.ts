/**
 * Engine Server
 *
 * Host-facing entry point. Owns the session registry and wires the handshake
 * negotiator and both dispatchers to it.
 *
 * Can run attached to a Node.js HTTP server (see `attach()`) or embedded in an
 * external framework through `handleRequest()` and `handleWebSocket()`.
 *
 * @example
 * ```typescript
 * const engine = new EngineServer({ pingInterval: 10000 });
 *
 * engine.on("connection", (session: EngineSocket) => {
 *   session.on("message", (data) => session.send(data));
 * });
 *
 * attach(engine, httpServer, { path: "/engine" });
 * ```
 *
 * Emits `connection` with each session established by a handshake.
 */

import { EventEmitter } from "events";
import { Logger } from "@switchback/kernel";
import type {
  Exchange,
  PersistentConnection,
  ServerOptions,
  Session,
  SessionFactory,
  SessionOptions,
} from "./types.js";
import { ServerConfigError } from "./errors.js";
import { SessionRegistry } from "./session-registry.js";
import { HandshakeNegotiator } from "./handshake.js";
import { ConnectionDispatcher, type ConnectionOutcome } from "./connection-dispatcher.js";
import { UpgradeDispatcher, type UpgradeOutcome } from "./upgrade-dispatcher.js";
import { EngineSocket } from "./socket.js";
import { createIdGenerator } from "./session-id.js";

const log = Logger.for("EngineServer");

export const DEFAULT_PING_TIMEOUT = 5000;
export const DEFAULT_PING_INTERVAL = 25000;
export const DEFAULT_MAX_HTTP_BUFFER_SIZE = 1e6;

const defaultSessionFactory: SessionFactory = (id, options) => new EngineSocket(id, options);

function positive(option: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ServerConfigError(option, value);
  }
  return value;
}

export class EngineServer extends EventEmitter {
  private readonly sessionOptions: SessionOptions;
  private readonly bufferSize: number;
  private readonly registry = new SessionRegistry();
  private readonly connections: ConnectionDispatcher;
  private readonly upgrades: UpgradeDispatcher;

  constructor(options: ServerOptions = {}) {
    super();

    this.sessionOptions = {
      pingTimeout: positive("pingTimeout", options.pingTimeout, DEFAULT_PING_TIMEOUT),
      pingInterval: positive("pingInterval", options.pingInterval, DEFAULT_PING_INTERVAL),
      allowUpgrades: options.allowUpgrades ?? true,
    };
    this.bufferSize = positive(
      "maxHttpBufferSize",
      options.maxHttpBufferSize,
      DEFAULT_MAX_HTTP_BUFFER_SIZE,
    );

    const createSession = options.createSession ?? defaultSessionFactory;
    const negotiator = new HandshakeNegotiator(this.registry, {
      generateId: options.generateId ?? createIdGenerator(),
      createSession: (id) => createSession(id, this.sessionOptions),
      onConnection: (session) => {
        this.emit("connection", session);
      },
    });

    const { allowRequest } = options;
    this.connections = new ConnectionDispatcher(this.registry, negotiator, { allowRequest });
    this.upgrades = new UpgradeDispatcher(this.registry, negotiator, { allowRequest });
  }

  /** Milliseconds without a heartbeat before a session is considered dead */
  get pingTimeout(): number {
    return this.sessionOptions.pingTimeout;
  }

  /** Milliseconds between server-initiated heartbeats */
  get pingInterval(): number {
    return this.sessionOptions.pingInterval;
  }

  get maxHttpBufferSize(): number {
    return this.bufferSize;
  }

  /** Number of live sessions */
  get clientsCount(): number {
    return this.registry.size;
  }

  getSession(id: string): Session | undefined {
    return this.registry.get(id);
  }

  /** Live session ids in sorted order */
  sessionIds(): string[] {
    return this.registry.ids();
  }

  /**
   * Handle a plain HTTP request (polling transport).
   * Rejects only if writing the response fails.
   */
  handleRequest(exchange: Exchange): Promise<ConnectionOutcome> {
    return this.connections.dispatch(exchange);
  }

  /**
   * Handle an accepted WebSocket: upgrade a live session or open a new one.
   */
  handleWebSocket(connection: PersistentConnection): Promise<UpgradeOutcome> {
    return this.upgrades.dispatch(connection);
  }

  /**
   * Close every live session. Each deregisters itself as it closes.
   */
  close(): void {
    const sessions = this.registry.values();
    if (sessions.length > 0) {
      log.info({ clients: sessions.length }, "closing all sessions");
    }
    for (const session of sessions) {
      session.close("server close");
    }
  }
}
