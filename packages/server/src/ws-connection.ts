/**
 * Persistent connection over a `ws` WebSocket.
 */

import { WebSocket } from "ws";
import type { IncomingMessage } from "http";
import type { PersistentConnection } from "./types.js";
import { parseQuery, readHeader } from "./node-exchange.js";

export function createWsConnection(socket: WebSocket, request: IncomingMessage): PersistentConnection {
  return {
    query: parseQuery(request.url),
    header: (name) => readHeader(request.headers, name),

    get isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },

    send(data) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(data);
      }
    },

    close() {
      socket.close();
    },

    onMessage(listener) {
      socket.on("message", (data) => listener(data.toString()));
    },

    onClose(listener) {
      socket.on("close", () => listener());
    },

    onError(listener) {
      socket.on("error", listener);
    },
  };
}
