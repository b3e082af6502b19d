/**
 * Error Responder
 *
 * Turns a protocol error kind into the JSON response polling clients expect.
 */

import { describeError, type ServerErrorKind } from "@switchback/shared";
import type { Exchange, ExchangeResponse } from "./types.js";

export const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

/**
 * CORS headers for a response to a request with the given Origin.
 */
export function corsHeaders(origin: string | undefined): Record<string, string> {
  if (origin !== undefined) {
    return {
      "Access-Control-Allow-Credentials": "true",
      "Access-Control-Allow-Origin": origin,
    };
  }
  return { "Access-Control-Allow-Origin": "*" };
}

/**
 * Build the error response. FORBIDDEN answers 403 without CORS headers;
 * every other kind answers 400 with them.
 */
export function buildErrorResponse(kind: ServerErrorKind, origin?: string): ExchangeResponse {
  const { code, message } = describeError(kind);
  const body = JSON.stringify({ code, message });

  if (kind === "FORBIDDEN") {
    return { status: 403, headers: { "Content-Type": JSON_CONTENT_TYPE }, body };
  }

  return {
    status: 400,
    headers: { "Content-Type": JSON_CONTENT_TYPE, ...corsHeaders(origin) },
    body,
  };
}

export function sendErrorMessage(exchange: Exchange, kind: ServerErrorKind): void {
  exchange.respond(buildErrorResponse(kind, exchange.header("origin")));
}
