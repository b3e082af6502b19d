/**
 * Node.js bindings, end to end over a real HTTP server on localhost.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createServer, request, type IncomingHttpHeaders, type Server } from "node:http";
import { connect as connectSocket, type AddressInfo } from "node:net";
import WebSocket from "ws";
import { EngineServer } from "../server.js";
import { EngineSocket } from "../socket.js";
import { attach, type AttachedEngine } from "../attach.js";
import type { ServerOptions, Session } from "../types.js";
import { sequentialIds } from "./helpers.js";

const HOST = "127.0.0.1";

interface HttpResult {
  status: number;
  headers: IncomingHttpHeaders;
  body: string;
}

describe("attach", () => {
  let httpServer: Server | undefined;
  let attached: AttachedEngine | undefined;
  let engine: EngineServer;
  let port: number;
  const clients: WebSocket[] = [];

  async function start(options: ServerOptions = {}): Promise<void> {
    engine = new EngineServer({ generateId: sequentialIds(), ...options });
    const server = createServer();
    httpServer = server;
    attached = attach(engine, server);
    await new Promise<void>((resolve) => server.listen(0, HOST, () => resolve()));
    const address: AddressInfo | string | null = server.address();
    port = typeof address === "object" && address !== null ? address.port : 0;
  }

  afterEach(async () => {
    for (const client of clients.splice(0)) client.terminate();
    engine.close();
    await attached?.close();
    const server = httpServer;
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    httpServer = undefined;
    attached = undefined;
  });

  function send(
    method: string,
    path: string,
    options: { body?: string; headers?: Record<string, string> } = {},
  ): Promise<HttpResult> {
    return new Promise((resolve, reject) => {
      const req = request(
        { host: HOST, port, method, path, headers: options.headers, agent: false },
        (res) => {
          const chunks: Buffer[] = [];
          res.on("data", (chunk: Buffer) => chunks.push(chunk));
          res.on("end", () =>
            resolve({
              status: res.statusCode ?? 0,
              headers: res.headers,
              body: Buffer.concat(chunks).toString("utf8"),
            }),
          );
        },
      );
      req.on("error", reject);
      req.end(options.body);
    });
  }

  function sendRaw(payload: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const socket = connectSocket(port, HOST, () => socket.end(payload));
      const chunks: Buffer[] = [];
      socket.on("data", (chunk: Buffer) => chunks.push(chunk));
      socket.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
      socket.on("error", reject);
    });
  }

  function connect(query: string): WebSocket {
    const client = new WebSocket(`ws://${HOST}:${port}/engine?${query}`);
    clients.push(client);
    return client;
  }

  function nextMessage(client: WebSocket): Promise<string> {
    return new Promise((resolve) => client.once("message", (data) => resolve(data.toString())));
  }

  function opened(client: WebSocket): Promise<void> {
    return new Promise((resolve) => client.once("open", () => resolve()));
  }

  function closed(client: WebSocket): Promise<void> {
    return new Promise((resolve) => client.once("close", () => resolve()));
  }

  describe("polling", () => {
    it("should answer a handshake with the open packet", async () => {
      await start();

      const result = await send("GET", "/engine?transport=polling");

      expect(result.status).toBe(200);
      expect(result.headers["content-type"]).toBe("application/json; charset=utf-8");
      expect(JSON.parse(result.body)).toEqual([
        {
          type: "open",
          data: { sid: "sid-1", upgrades: ["websocket"], pingInterval: 25000, pingTimeout: 5000 },
        },
      ]);
      expect(engine.clientsCount).toBe(1);
    });

    it("should answer protocol errors with JSON and CORS headers", async () => {
      await start();

      const result = await send("GET", "/engine?transport=polling&sid=nope", {
        headers: { Origin: "https://app.test" },
      });

      expect(result.status).toBe(400);
      expect(result.headers["access-control-allow-origin"]).toBe("https://app.test");
      expect(result.headers["access-control-allow-credentials"]).toBe("true");
      expect(JSON.parse(result.body)).toEqual({ code: 1, message: "Session ID unknown" });
    });

    it("should reject a request without a transport", async () => {
      await start();

      const result = await send("GET", "/engine");

      expect(result.status).toBe(400);
      expect(result.headers["access-control-allow-origin"]).toBe("*");
      expect(JSON.parse(result.body)).toEqual({ code: 0, message: "Transport unknown" });
    });

    it("should deliver posted messages to the session", async () => {
      await start();
      const received: unknown[] = [];
      engine.on("connection", (session: Session) => {
        if (session instanceof EngineSocket) {
          session.on("message", (data) => received.push(data));
        }
      });
      await send("GET", "/engine?transport=polling");

      const result = await send("POST", "/engine?transport=polling&sid=sid-1", {
        body: '[{"type":"message","data":"hi"}]',
      });

      expect(result.status).toBe(200);
      expect(result.body).toBe("ok");
      expect(received).toEqual(["hi"]);
    });

    it("should reject a body over maxHttpBufferSize and close the session", async () => {
      await start({ maxHttpBufferSize: 16 });
      await send("GET", "/engine?transport=polling");

      const result = await send("POST", "/engine?transport=polling&sid=sid-1", {
        body: JSON.stringify([{ type: "message", data: "x".repeat(64) }]),
      });

      expect(result.status).toBe(400);
      expect(JSON.parse(result.body)).toEqual({ code: 3, message: "Bad request" });
      expect(engine.clientsCount).toBe(0);
    });

    it("should answer a request target that is not a URL and keep serving", async () => {
      await start();

      const raw = await sendRaw("GET //[ HTTP/1.1\r\nHost: x\r\nConnection: close\r\n\r\n");

      expect(raw.split("\r\n")[0]).toBe("HTTP/1.1 404 Not Found");
      const next = await send("GET", "/engine?transport=polling");
      expect(next.status).toBe(200);
    });

    it("should answer 404 outside the engine path", async () => {
      await start();

      const result = await send("GET", "/elsewhere");

      expect(result.status).toBe(404);
      expect(JSON.parse(result.body)).toEqual({ error: "Not found" });
    });
  });

  describe("websocket", () => {
    it("should open a session with the open packet as the first frame", async () => {
      await start();
      const client = connect("transport=websocket");

      const first = await nextMessage(client);

      expect(JSON.parse(first)).toEqual({
        type: "open",
        data: { sid: "sid-1", upgrades: [], pingInterval: 25000, pingTimeout: 5000 },
      });
      expect(engine.getSession("sid-1")?.transportKind).toBe("websocket");
    });

    it("should upgrade a polling session", async () => {
      await start();
      await send("GET", "/engine?transport=polling");
      const client = connect("transport=websocket&sid=sid-1");
      await opened(client);

      expect(engine.getSession("sid-1")?.transportKind).toBe("websocket");

      const message = nextMessage(client);
      engine.getSession("sid-1")?.send("over ws");
      expect(await message).toBe('{"type":"message","data":"over ws"}');

      const poll = await send("GET", "/engine?transport=polling&sid=sid-1");
      expect(poll.status).toBe(400);
      expect(JSON.parse(poll.body)).toEqual({ code: 3, message: "Bad request" });
    });

    it("should close an upgrade for an unknown session", async () => {
      await start();
      const client = connect("transport=websocket&sid=nope");

      await closed(client);

      expect(engine.clientsCount).toBe(0);
    });

    it("should deregister the session when the client disconnects", async () => {
      await start();
      const client = connect("transport=websocket");
      await nextMessage(client);
      const session = engine.getSession("sid-1");
      const sessionClosed = new Promise<string>((resolve) => session?.onClose(resolve));

      client.close();

      expect(await sessionClosed).toBe("transport close");
      expect(engine.clientsCount).toBe(0);
    });

    it("should destroy upgrades outside the engine path", async () => {
      await start();
      const client = new WebSocket(`ws://${HOST}:${port}/elsewhere`);
      clients.push(client);
      const errors: Error[] = [];
      client.on("error", (error) => errors.push(error));

      await closed(client);

      expect(errors).toHaveLength(1);
    });
  });

  it("should stop routing after close", async () => {
    await start();
    const server = httpServer;

    await attached?.close();

    expect(server?.listenerCount("request")).toBe(0);
    expect(server?.listenerCount("upgrade")).toBe(0);
  });
});
