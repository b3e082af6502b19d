/**
 * Shared fixtures for server specs.
 */

import { vi } from "vitest";
import type { TransportKind } from "@switchback/shared";
import type { CloseReason, Exchange, Session, SessionOptions, SessionState } from "../types.js";
import type { Transport } from "../transports/transport.js";

export const SESSION_OPTIONS: SessionOptions = {
  pingInterval: 25000,
  pingTimeout: 5000,
  allowUpgrades: true,
};

/**
 * Session double with spied operations. `fireClose()` delivers the close
 * notification as many times as it is called.
 */
export class FakeSession implements Session {
  transportKind: TransportKind | undefined;
  readyState: SessionState = "open";
  private closeListeners: Array<(reason: CloseReason) => void> = [];

  initialize = vi.fn(async (_transport: Transport, _exchange?: Exchange) => {});
  handleRequest = vi.fn(async (_exchange: Exchange) => {});
  canAcceptUpgrade = vi.fn((_kind: TransportKind) => true);
  upgrade = vi.fn((_transport: Transport) => {});
  send = vi.fn((_data: unknown) => {});
  close = vi.fn((_reason?: CloseReason) => {});

  constructor(
    readonly id: string,
    transportKind: TransportKind = "polling",
  ) {
    this.transportKind = transportKind;
  }

  onClose(listener: (reason: CloseReason) => void): void {
    this.closeListeners.push(listener);
  }

  fireClose(reason: CloseReason = "transport close"): void {
    for (const listener of this.closeListeners) listener(reason);
  }
}

/** Ids "sid-1", "sid-2", ... */
export function sequentialIds(): () => string {
  let counter = 0;
  return () => `sid-${++counter}`;
}
