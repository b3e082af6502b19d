/**
 * Polling Transport
 *
 * Long-polling over plain HTTP. A GET is held until the session has packets to
 * deliver; a POST carries packets from the client.
 */

import { HttpMethods, TransportKinds, decodePayload, encodePayload, type Packet } from "@switchback/shared";
import { Logger } from "@switchback/kernel";
import type { Exchange, ExchangeResponse } from "../types.js";
import { PayloadTooLargeError, TransportError } from "../errors.js";
import { JSON_CONTENT_TYPE, corsHeaders, sendErrorMessage } from "../error-responder.js";
import { BaseTransport } from "./transport.js";

const log = Logger.for("PollingTransport");

function pollResponse(exchange: Exchange, packets: readonly Packet[]): ExchangeResponse {
  return {
    status: 200,
    headers: { "Content-Type": JSON_CONTENT_TYPE, ...corsHeaders(exchange.header("origin")) },
    body: encodePayload(packets),
  };
}

export class PollingTransport extends BaseTransport {
  readonly kind = TransportKinds.POLLING;
  private pending: Exchange | null = null;

  get writable(): boolean {
    return this.pending !== null && !this.closed;
  }

  override async handleRequest(exchange: Exchange): Promise<void> {
    switch (exchange.method) {
      case HttpMethods.GET:
        this.onPollRequest(exchange);
        return;
      case HttpMethods.POST:
        await this.onDataRequest(exchange);
        return;
      default:
        sendErrorMessage(exchange, "BAD_REQUEST");
    }
  }

  send(packets: Packet[]): void {
    const exchange = this.pending;
    if (!exchange || this.closed) {
      throw new TransportError(this.kind, "send() without a pending poll");
    }
    this.pending = null;
    exchange.respond(pollResponse(exchange, packets));
  }

  close(): void {
    if (this.closed) return;
    const exchange = this.pending;
    this.pending = null;
    if (exchange) {
      exchange.respond(pollResponse(exchange, [{ type: "close" }]));
    }
    this.onClose();
  }

  /**
   * Release a held poll with a noop so the client stops polling this transport.
   */
  override discard(): void {
    const exchange = this.pending;
    this.pending = null;
    super.discard();
    if (exchange) {
      exchange.respond(pollResponse(exchange, [{ type: "noop" }]));
    }
  }

  private onPollRequest(exchange: Exchange): void {
    if (this.closed) {
      exchange.respond(pollResponse(exchange, [{ type: "close" }]));
      return;
    }
    if (this.pending) {
      log.debug("overlapping poll request");
      sendErrorMessage(exchange, "BAD_REQUEST");
      this.onError("overlapping poll request");
      return;
    }
    this.pending = exchange;
    this.onDrain();
  }

  private async onDataRequest(exchange: Exchange): Promise<void> {
    let raw: string;
    try {
      raw = await exchange.body();
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        sendErrorMessage(exchange, "BAD_REQUEST");
        this.onError(error.message);
        return;
      }
      throw error;
    }

    const packets = decodePayload(raw);
    if (!packets) {
      sendErrorMessage(exchange, "BAD_REQUEST");
      this.onError("malformed payload");
      return;
    }

    exchange.respond({
      status: 200,
      headers: { "Content-Type": "text/plain; charset=utf-8", ...corsHeaders(exchange.header("origin")) },
      body: "ok",
    });

    for (const packet of packets) {
      if (this.closed) break;
      this.onPacket(packet);
    }
  }
}
