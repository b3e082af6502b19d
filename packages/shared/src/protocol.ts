/**
 * Wire Protocol - Shared between client and server
 *
 * Transport kinds, the handshake method, the protocol error table and the
 * packet codec. Both ends of a switchback connection use these definitions.
 *
 * @module @switchback/shared/protocol
 */

import { z } from "zod";

// ============================================================================
// Transports
// ============================================================================

/**
 * Transport identifiers, as they appear in the `transport` query parameter.
 */
export const TransportKinds = {
  /** Long-polling over plain HTTP request/response */
  POLLING: "polling",
  /** Full-duplex WebSocket */
  WEBSOCKET: "websocket",
} as const;

export type TransportKind = (typeof TransportKinds)[keyof typeof TransportKinds];

export const TRANSPORT_KINDS: readonly TransportKind[] = Object.values(TransportKinds);

export function isTransportKind(value: unknown): value is TransportKind {
  return TRANSPORT_KINDS.some((kind) => kind === value);
}

/**
 * Transports a session may move to from its current one.
 */
export function upgradesFrom(kind: TransportKind): readonly TransportKind[] {
  switch (kind) {
    case TransportKinds.POLLING:
      return [TransportKinds.WEBSOCKET];
    case TransportKinds.WEBSOCKET:
      return [];
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

// ============================================================================
// HTTP
// ============================================================================

export const HttpMethods = {
  GET: "GET",
  POST: "POST",
  OPTIONS: "OPTIONS",
} as const;

export type HttpMethod = (typeof HttpMethods)[keyof typeof HttpMethods];

/** A new polling session may only be opened with a read-only retrieval. */
export const HANDSHAKE_METHOD: HttpMethod = HttpMethods.GET;

// ============================================================================
// Query Parameters
// ============================================================================

export const QueryParams = {
  TRANSPORT: "transport",
  SESSION_ID: "sid",
} as const;

/** Decoded query string; repeated keys keep their last value. */
export type Query = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Protocol Errors
// ============================================================================

export interface ErrorDescriptor {
  readonly code: number;
  readonly message: string;
}

/**
 * Protocol errors reported to polling clients. Codes are stable across versions.
 */
export const SERVER_ERRORS = {
  UNKNOWN_TRANSPORT: { code: 0, message: "Transport unknown" },
  UNKNOWN_SID: { code: 1, message: "Session ID unknown" },
  BAD_HANDSHAKE_METHOD: { code: 2, message: "Bad handshake method" },
  BAD_REQUEST: { code: 3, message: "Bad request" },
  FORBIDDEN: { code: 4, message: "Forbidden" },
} as const satisfies Record<string, ErrorDescriptor>;

export type ServerErrorKind = keyof typeof SERVER_ERRORS;

export function describeError(kind: ServerErrorKind): ErrorDescriptor {
  return SERVER_ERRORS[kind];
}

// ============================================================================
// Packets
// ============================================================================

export const PacketTypes = {
  /** Server → client, first packet of every session */
  OPEN: "open",
  /** Either side ends the session */
  CLOSE: "close",
  /** Application data */
  MESSAGE: "message",
  /** Answers a held poll that has nothing to deliver */
  NOOP: "noop",
} as const;

export type PacketType = (typeof PacketTypes)[keyof typeof PacketTypes];

export const PacketSchema = z.object({
  type: z.enum([PacketTypes.OPEN, PacketTypes.CLOSE, PacketTypes.MESSAGE, PacketTypes.NOOP]),
  data: z.unknown().optional(),
});

export type Packet = z.infer<typeof PacketSchema>;

const PayloadSchema = z.union([PacketSchema.transform((packet) => [packet]), z.array(PacketSchema)]);

/**
 * Payload of the `open` packet that completes a handshake.
 */
export interface OpenPacketData {
  sid: string;
  upgrades: TransportKind[];
  pingInterval: number;
  pingTimeout: number;
}

export function encodePacket(packet: Packet): string {
  return JSON.stringify(packet);
}

export function encodePayload(packets: readonly Packet[]): string {
  return JSON.stringify(packets);
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Decode a single packet. Returns undefined for anything that is not one.
 */
export function decodePacket(raw: string): Packet | undefined {
  const result = PacketSchema.safeParse(parseJson(raw));
  return result.success ? result.data : undefined;
}

/**
 * Decode a polling request body: one packet or an array of packets.
 */
export function decodePayload(raw: string): Packet[] | undefined {
  const result = PayloadSchema.safeParse(parseJson(raw));
  return result.success ? result.data : undefined;
}
