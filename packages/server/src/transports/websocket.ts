/**
 * WebSocket Transport
 *
 * Wraps an accepted persistent connection. Each packet travels as one JSON text frame.
 */

import { TransportKinds, decodePacket, encodePacket, type Packet } from "@switchback/shared";
import type { PersistentConnection } from "../types.js";
import { BaseTransport } from "./transport.js";

export class WebSocketTransport extends BaseTransport {
  readonly kind = TransportKinds.WEBSOCKET;

  constructor(private readonly connection: PersistentConnection) {
    super();

    connection.onMessage((data) => {
      const packet = decodePacket(data);
      if (!packet) {
        this.onError("malformed packet");
        return;
      }
      this.onPacket(packet);
    });
    connection.onClose(() => this.onClose());
    connection.onError((error) => this.onError(error.message));
  }

  get writable(): boolean {
    return !this.closed && this.connection.isOpen;
  }

  send(packets: Packet[]): void {
    for (const packet of packets) {
      this.connection.send(encodePacket(packet));
    }
  }

  close(): void {
    if (this.closed) return;
    this.connection.close();
    this.onClose();
  }
}
