/**
 * Server Testing Utilities
 *
 * In-process stand-ins for the exchange and persistent connection, for driving
 * an EngineServer without sockets.
 *
 * @example
 * ```typescript
 * import { createMockExchange } from '@switchback/server/testing';
 *
 * const exchange = createMockExchange({ query: { transport: 'polling' } });
 * await engine.handleRequest(exchange);
 * expect(exchange.response?.status).toBe(200);
 * ```
 *
 * @module @switchback/server/testing
 */

import type { Query } from "@switchback/shared";
import type { Exchange, ExchangeResponse, PersistentConnection } from "./types.js";

// ============================================================================
// Mock Exchange
// ============================================================================

export interface MockExchangeOptions {
  method?: string;
  query?: Query;
  headers?: Record<string, string>;
  body?: string;
  /** Make body() reject with this error */
  bodyError?: Error;
}

export interface MockExchange extends Exchange {
  /** Every response written, in order; a correct caller writes one */
  readonly responses: ExchangeResponse[];
  /** The first response, if any */
  readonly response: ExchangeResponse | undefined;
  /** Parsed JSON body of the first response */
  json(): unknown;
}

export function createMockExchange(options: MockExchangeOptions = {}): MockExchange {
  const responses: ExchangeResponse[] = [];
  const headers = new Map(
    Object.entries(options.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value]),
  );

  return {
    method: (options.method ?? "GET").toUpperCase(),
    query: options.query ?? {},
    responses,
    get response() {
      return responses[0];
    },
    header: (name) => headers.get(name.toLowerCase()),
    body() {
      return options.bodyError ? Promise.reject(options.bodyError) : Promise.resolve(options.body ?? "");
    },
    respond(response) {
      responses.push(response);
    },
    json() {
      const first = responses[0];
      return first ? JSON.parse(first.body) : undefined;
    },
  };
}

// ============================================================================
// Mock Persistent Connection
// ============================================================================

export interface MockConnection extends PersistentConnection {
  /** Frames sent to the client */
  readonly sent: string[];
  /** Number of close() calls */
  readonly closeCount: number;
  /** Simulate a frame from the client */
  receive(data: string): void;
  /** Simulate the client going away */
  disconnect(): void;
  /** Simulate a socket error */
  fail(error: Error): void;
}

export function createMockConnection(
  query: Query = {},
  headers: Record<string, string> = {},
): MockConnection {
  const headerMap = new Map(
    Object.entries(headers).map(([name, value]) => [name.toLowerCase(), value]),
  );
  const sent: string[] = [];
  const messageListeners: Array<(data: string) => void> = [];
  const closeListeners: Array<() => void> = [];
  const errorListeners: Array<(error: Error) => void> = [];
  let open = true;
  let closeCount = 0;

  const notifyClose = () => {
    if (!open) return;
    open = false;
    for (const listener of closeListeners) listener();
  };

  return {
    query,
    sent,
    get closeCount() {
      return closeCount;
    },
    get isOpen() {
      return open;
    },
    header: (name) => headerMap.get(name.toLowerCase()),
    send(data) {
      if (open) sent.push(data);
    },
    close() {
      closeCount++;
      notifyClose();
    },
    onMessage(listener) {
      messageListeners.push(listener);
    },
    onClose(listener) {
      closeListeners.push(listener);
    },
    onError(listener) {
      errorListeners.push(listener);
    },
    receive(data) {
      for (const listener of messageListeners) listener(data);
    },
    disconnect() {
      notifyClose();
    },
    fail(error) {
      for (const listener of errorListeners) listener(error);
    },
  };
}
