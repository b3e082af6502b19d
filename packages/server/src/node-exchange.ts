/**
 * Node.js HTTP bindings for the exchange and upgrade request headers.
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "http";
import type { Query } from "@switchback/shared";
import type { Exchange } from "./types.js";
import { PayloadTooLargeError } from "./errors.js";

export interface NodeExchangeOptions {
  /** Largest accepted request body, in bytes */
  maxHttpBufferSize: number;
}

const BASE_URL = "http://localhost";

/**
 * Parse a request target. Only the path and query matter, so any base works.
 * Returns undefined for a target that is not a valid URL.
 */
export function parseRequestUrl(url: string | undefined): URL | undefined {
  const target = url ?? "/";
  return URL.canParse(target, BASE_URL) ? new URL(target, BASE_URL) : undefined;
}

/**
 * Query string of a request URL; empty when the target does not parse.
 */
export function parseQuery(url: string | undefined): Query {
  const parsed = parseRequestUrl(url);
  return parsed ? Object.fromEntries(parsed.searchParams) : {};
}

export function readHeader(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value.join(", ") : value;
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let settled = false;

    req.on("data", (chunk: Buffer) => {
      if (settled) return;
      size += chunk.length;
      if (size > limit) {
        settled = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (settled) return;
      settled = true;
      resolve(Buffer.concat(chunks).toString("utf8"));
    });
    req.on("error", (error) => {
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}

export function createNodeExchange(
  req: IncomingMessage,
  res: ServerResponse,
  options: NodeExchangeOptions,
): Exchange {
  let body: Promise<string> | null = null;

  return {
    method: (req.method ?? "GET").toUpperCase(),
    query: parseQuery(req.url),
    header: (name) => readHeader(req.headers, name),
    body() {
      body ??= readBody(req, options.maxHttpBufferSize);
      return body;
    },
    respond(response) {
      res.writeHead(response.status, response.headers);
      res.end(response.body);
    },
  };
}
