/**
 * Attach an EngineServer to a Node.js HTTP server.
 *
 * Requests under `path` go to `handleRequest()`; upgrade requests under `path`
 * are accepted by a `ws` server and go to `handleWebSocket()`. Anything else is
 * left to the HTTP server's other listeners, or answered 404 when there are none.
 */

import type { IncomingMessage, Server, ServerResponse } from "http";
import type { Duplex } from "stream";
import { WebSocketServer } from "ws";
import { Logger } from "@switchback/kernel";
import type { EngineServer } from "./server.js";
import { JSON_CONTENT_TYPE } from "./error-responder.js";
import { createNodeExchange, parseRequestUrl } from "./node-exchange.js";
import { createWsConnection } from "./ws-connection.js";

const log = Logger.for("attach");

export const DEFAULT_PATH = "/engine";

export interface AttachOptions {
  /**
   * Path the engine answers on.
   * @default "/engine"
   */
  path?: string;
}

export interface AttachedEngine {
  readonly path: string;
  /** Stop routing to the engine and close the WebSocket server */
  close(): Promise<void>;
}

function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

export function attach(
  engine: EngineServer,
  httpServer: Server,
  options: AttachOptions = {},
): AttachedEngine {
  const path = normalizePath(options.path ?? DEFAULT_PATH);
  const wss = new WebSocketServer({ noServer: true });

  // An unparseable target never matches.
  const matches = (req: IncomingMessage): boolean => {
    const url = parseRequestUrl(req.url);
    return url !== undefined && normalizePath(url.pathname) === path;
  };

  const onRequest = (req: IncomingMessage, res: ServerResponse): void => {
    if (!matches(req)) {
      if (httpServer.listenerCount("request") === 1) {
        res.writeHead(404, { "Content-Type": JSON_CONTENT_TYPE });
        res.end(JSON.stringify({ error: "Not found" }));
      }
      return;
    }

    const exchange = createNodeExchange(req, res, { maxHttpBufferSize: engine.maxHttpBufferSize });
    engine.handleRequest(exchange).catch((error: unknown) => {
      log.error({ err: error, url: req.url }, "Request error");
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": JSON_CONTENT_TYPE });
        res.end(JSON.stringify({ error: "Internal server error" }));
      }
    });
  };

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    if (!matches(req)) {
      if (httpServer.listenerCount("upgrade") === 1) {
        socket.destroy();
      }
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      const connection = createWsConnection(ws, req);
      engine.handleWebSocket(connection).catch((error: unknown) => {
        log.error({ err: error, url: req.url }, "WebSocket error");
        connection.close();
      });
    });
  };

  httpServer.on("request", onRequest);
  httpServer.on("upgrade", onUpgrade);

  return {
    path,
    close() {
      httpServer.off("request", onRequest);
      httpServer.off("upgrade", onUpgrade);
      return new Promise((resolve) => {
        wss.close(() => resolve());
      });
    },
  };
}
