import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "../lib/logger.js";
import { fetchText } from "../testing/http-client.js";
import { listen, serveUntilShutdown } from "./serve.js";
import { ShutdownSignal } from "./shutdown.js";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), critical: vi.fn() };
}

/** Server whose `/slow` responses are held until `release()`. */
function gatedServer() {
  let release: () => void = () => {};
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  let arrived: () => void = () => {};
  const slowArrived = new Promise<void>((resolve) => {
    arrived = resolve;
  });

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    if (req.url === "/slow") {
      arrived();
      void released.then(() => res.end("done"));
      return;
    }
    res.end("fast");
  });
  return { server, release, slowArrived };
}

const servers: Server[] = [];

afterEach(() => {
  for (const server of servers.splice(0)) {
    server.closeAllConnections();
    server.close();
  }
});

describe("listen", () => {
  it("binds an ephemeral port", async () => {
    const server = createServer();
    servers.push(server);

    const bound = await listen(server, { host: "127.0.0.1", port: 0 });

    expect(bound.address).toBe("127.0.0.1");
    expect(bound.port).toBeGreaterThan(0);
  });

  it("rejects when the port is taken", async () => {
    const first = createServer();
    const second = createServer();
    servers.push(first, second);
    const { port } = await listen(first, { host: "127.0.0.1", port: 0 });

    await expect(listen(second, { host: "127.0.0.1", port })).rejects.toMatchObject({
      code: "EADDRINUSE",
    });
  });
});

describe("serveUntilShutdown", () => {
  it("lets in-flight requests finish and refuses new connections", async () => {
    const { server, release, slowArrived } = gatedServer();
    servers.push(server);
    const { port } = await listen(server, { host: "127.0.0.1", port: 0 });
    const shutdown = new ShutdownSignal();
    const serving = serveUntilShutdown(server, shutdown, { graceMs: 5_000, logger: silentLogger() });

    expect(await fetchText(port, "/fast")).toEqual({ status: 200, body: "fast" });
    const inFlight = fetchText(port, "/slow");
    await slowArrived;

    shutdown.trigger("SIGTERM");
    await expect(fetchText(port, "/fast")).rejects.toMatchObject({ code: "ECONNREFUSED" });

    release();
    expect(await inFlight).toEqual({ status: 200, body: "done" });
    await expect(serving).resolves.toBeUndefined();
    expect(server.listening).toBe(false);
  });

  it("force-closes connections still open after the grace period", async () => {
    const { server, slowArrived } = gatedServer();
    servers.push(server);
    const { port } = await listen(server, { host: "127.0.0.1", port: 0 });
    const log = silentLogger();
    const shutdown = new ShutdownSignal();
    const serving = serveUntilShutdown(server, shutdown, { graceMs: 50, logger: log });

    const stuck = fetchText(port, "/slow");
    await slowArrived;
    shutdown.trigger("SIGTERM");

    await expect(stuck).rejects.toThrow();
    await expect(serving).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith(
      "Grace period expired, closing remaining connections",
      { inFlight: 1 },
    );
  });

  it("resolves immediately with nothing in flight", async () => {
    const { server } = gatedServer();
    servers.push(server);
    await listen(server, { host: "127.0.0.1", port: 0 });
    const shutdown = new ShutdownSignal();
    const serving = serveUntilShutdown(server, shutdown, { graceMs: 5_000, logger: silentLogger() });

    shutdown.trigger("SIGINT");

    await expect(serving).resolves.toBeUndefined();
  });
});
