/**
 * Engine Socket
 *
 * Default session implementation. Queues outgoing packets and flushes them
 * whenever the bound transport is writable, re-emits client messages, and moves
 * between transports on upgrade.
 */

import { EventEmitter } from "events";
import {
  PacketTypes,
  upgradesFrom,
  type OpenPacketData,
  type Packet,
  type TransportKind,
} from "@switchback/shared";
import { Logger } from "@switchback/kernel";
import type {
  CloseReason,
  Exchange,
  Session,
  SessionOptions,
  SessionState,
} from "./types.js";
import type { Transport } from "./transports/transport.js";
import { SessionStateError } from "./errors.js";

const log = Logger.for("EngineSocket");

export interface EngineSocketEvents {
  /** Application data from the client */
  message: (data: unknown) => void;
  /** The session moved onto a new transport */
  upgrade: (kind: TransportKind) => void;
  /** The session closed; fires once */
  close: (reason: CloseReason) => void;
}

export class EngineSocket implements Session {
  private transport: Transport | null = null;
  private state: SessionState = "opening";
  private upgraded = false;
  private writeBuffer: Packet[] = [];
  private readonly emitter = new EventEmitter();

  constructor(
    readonly id: string,
    private readonly options: SessionOptions,
  ) {}

  get transportKind(): TransportKind | undefined {
    return this.transport?.kind;
  }

  get readyState(): SessionState {
    return this.state;
  }

  on<K extends keyof EngineSocketEvents>(event: K, listener: EngineSocketEvents[K]): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof EngineSocketEvents>(event: K, listener: EngineSocketEvents[K]): this {
    this.emitter.off(event, listener);
    return this;
  }

  onClose(listener: (reason: CloseReason) => void): void {
    this.emitter.once("close", listener);
  }

  async initialize(transport: Transport, exchange?: Exchange): Promise<void> {
    if (this.state !== "opening") {
      throw new SessionStateError(this.id, "already initialized");
    }

    this.bind(transport);
    this.state = "open";

    const open: OpenPacketData = {
      sid: this.id,
      upgrades: this.options.allowUpgrades ? [...upgradesFrom(transport.kind)] : [],
      pingInterval: this.options.pingInterval,
      pingTimeout: this.options.pingTimeout,
    };
    this.sendPacket({ type: PacketTypes.OPEN, data: open });

    if (exchange) {
      await transport.handleRequest(exchange);
    }
  }

  async handleRequest(exchange: Exchange): Promise<void> {
    const transport = this.transport;
    if (!transport) {
      throw new SessionStateError(this.id, "no transport bound");
    }
    await transport.handleRequest(exchange);
  }

  canAcceptUpgrade(kind: TransportKind): boolean {
    const current = this.transport;
    return (
      this.state === "open" &&
      this.options.allowUpgrades &&
      !this.upgraded &&
      current !== null &&
      upgradesFrom(current.kind).includes(kind)
    );
  }

  upgrade(transport: Transport): void {
    if (!this.canAcceptUpgrade(transport.kind)) {
      throw new SessionStateError(this.id, `cannot upgrade to ${transport.kind}`);
    }

    const previous = this.transport;
    previous?.discard();
    this.upgraded = true;
    this.bind(transport);

    log.debug({ sid: this.id, from: previous?.kind, to: transport.kind }, "upgraded");
    this.emit("upgrade", transport.kind);
    this.flush();
  }

  send(data: unknown): void {
    this.sendPacket({ type: PacketTypes.MESSAGE, data });
  }

  close(reason: CloseReason = "forced close"): void {
    if (this.state === "closing" || this.state === "closed") return;
    this.state = "closing";
    const transport = this.transport;
    this.finish(reason);
    transport?.close();
  }

  private bind(transport: Transport): void {
    this.transport = transport;
    transport.on("packet", (packet) => this.onPacket(packet));
    transport.on("drain", () => this.flush());
    transport.on("close", () => this.finish("transport close"));
    transport.on("error", (error) => {
      log.debug({ sid: this.id, err: error.message }, "transport error");
      this.close("transport error");
    });
  }

  private onPacket(packet: Packet): void {
    if (this.state !== "open") return;
    switch (packet.type) {
      case PacketTypes.MESSAGE:
        this.emit("message", packet.data);
        break;
      case PacketTypes.CLOSE:
        this.close("client close");
        break;
      default:
        log.debug({ sid: this.id, type: packet.type }, "ignored packet");
    }
  }

  private sendPacket(packet: Packet): void {
    if (this.state !== "open") return;
    this.writeBuffer.push(packet);
    this.flush();
  }

  private flush(): void {
    const transport = this.transport;
    if (this.state !== "open" || !transport?.writable || this.writeBuffer.length === 0) return;
    const packets = this.writeBuffer;
    this.writeBuffer = [];
    transport.send(packets);
  }

  private finish(reason: CloseReason): void {
    if (this.state === "closed") return;
    this.state = "closed";
    this.writeBuffer = [];
    log.debug({ sid: this.id, reason }, "closed");
    this.emit("close", reason);
  }

  private emit<K extends keyof EngineSocketEvents>(
    event: K,
    ...args: Parameters<EngineSocketEvents[K]>
  ): void {
    this.emitter.emit(event, ...args);
  }
}
