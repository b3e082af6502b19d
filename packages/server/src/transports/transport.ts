/**
 * Session Transport Interface
 *
 * A transport carries packets between one session and its client. Sessions bind
 * to exactly one transport at a time and swap it on upgrade.
 */

import type { Packet, TransportKind } from "@switchback/shared";
import type { Exchange } from "../types.js";
import { TransportError } from "../errors.js";
import { sendErrorMessage } from "../error-responder.js";

// ============================================================================
// Transport Interface
// ============================================================================

/**
 * Events a transport reports to its session.
 */
export interface TransportEvents {
  /** Packet received from the client */
  packet: (packet: Packet) => void;

  /** Transport became writable */
  drain: () => void;

  /** Transport closed */
  close: () => void;

  /** Transport failed; the session closes */
  error: (error: TransportError) => void;
}

export interface Transport {
  readonly kind: TransportKind;

  /** Whether `send()` may be called now */
  readonly writable: boolean;

  /** Register the session's handler for an event */
  on<K extends keyof TransportEvents>(event: K, handler: TransportEvents[K]): void;

  /** Serve a plain HTTP request addressed to this transport */
  handleRequest(exchange: Exchange): Promise<void>;

  /** Deliver packets; only while writable */
  send(packets: Packet[]): void;

  /** Close the transport and report `close` */
  close(): void;

  /** Detach from the session without reporting `close` (used on upgrade) */
  discard(): void;
}

// ============================================================================
// Base Transport Implementation (shared logic)
// ============================================================================

export abstract class BaseTransport implements Transport {
  abstract readonly kind: TransportKind;
  protected handlers: Partial<TransportEvents> = {};
  protected closed = false;

  abstract get writable(): boolean;
  abstract send(packets: Packet[]): void;
  abstract close(): void;

  on<K extends keyof TransportEvents>(event: K, handler: TransportEvents[K]): void {
    this.handlers[event] = handler;
  }

  /**
   * Transports that do not speak plain HTTP refuse requests routed to them.
   */
  async handleRequest(exchange: Exchange): Promise<void> {
    sendErrorMessage(exchange, "BAD_REQUEST");
  }

  discard(): void {
    this.handlers = {};
  }

  protected onPacket(packet: Packet): void {
    this.handlers.packet?.(packet);
  }

  protected onDrain(): void {
    this.handlers.drain?.();
  }

  protected onError(message: string): void {
    this.handlers.error?.(new TransportError(this.kind, message));
  }

  protected onClose(): void {
    if (this.closed) return;
    this.closed = true;
    this.handlers.close?.();
  }
}
