/**
 * Server Errors
 *
 * Protocol rejections are never thrown: they are `ServerErrorKind` values handed
 * to the error responder. The classes below cover programmer and environment
 * failures only.
 */

import type { TransportKind } from "@switchback/shared";

/**
 * Thrown when a session id is registered twice.
 */
export class DuplicateSessionError extends Error {
  readonly name = "DuplicateSessionError";

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is already registered`);
  }
}

/**
 * Thrown by the server constructor for an unusable option value.
 */
export class ServerConfigError extends Error {
  readonly name = "ServerConfigError";

  constructor(
    readonly option: string,
    readonly value: unknown,
  ) {
    super(`Invalid server option ${option}: ${String(value)}`);
  }
}

/**
 * Raised while reading a request body that exceeds `maxHttpBufferSize`.
 */
export class PayloadTooLargeError extends Error {
  readonly name = "PayloadTooLargeError";

  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
  }
}

/**
 * Reported by a transport to its session; the session closes in response.
 */
export class TransportError extends Error {
  readonly name = "TransportError";

  constructor(
    readonly transport: TransportKind,
    message: string,
  ) {
    super(`${transport}: ${message}`);
  }
}

/**
 * Thrown when a session operation is called in a state that does not allow it.
 */
export class SessionStateError extends Error {
  readonly name = "SessionStateError";

  constructor(
    readonly sessionId: string,
    message: string,
  ) {
    super(`Session ${sessionId}: ${message}`);
  }
}
