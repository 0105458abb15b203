import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { errorFields } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import type { ListenAddress } from "../lib/config.js";
import type { ShutdownSignal } from "./shutdown.js";

/** Bind the server. Rejects on EADDRINUSE and other listen errors. */
export function listen(server: Server, address: ListenAddress): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(err);
    };
    server.once("error", onError);
    server.listen(address.port, address.host, () => {
      server.removeListener("error", onError);
      const bound = server.address();
      if (bound === null || typeof bound === "string") {
        reject(new Error(`Unexpected listener address: ${String(bound)}`));
        return;
      }
      resolve(bound);
    });
  });
}

export interface ServeOptions {
  /** How long in-flight requests may run after shutdown begins. */
  graceMs: number;
  logger?: Logger;
}

/**
 * Serve until the shutdown event fires, then drain:
 *
 *   1. stop accepting connections,
 *   2. let requests already being handled finish,
 *   3. close idle keep-alive sockets as they become idle,
 *   4. after `graceMs`, force-close whatever is still open.
 *
 * Resolves once the server has fully closed.
 */
export function serveUntilShutdown(
  server: Server,
  shutdown: ShutdownSignal,
  options: ServeOptions,
): Promise<void> {
  const log = options.logger ?? rootLogger;
  let closing = false;
  let inFlight = 0;

  const onRequest = (_req: IncomingMessage, res: ServerResponse): void => {
    inFlight += 1;
    res.once("close", () => {
      inFlight -= 1;
      if (closing) {
        setImmediate(() => server.closeIdleConnections());
      }
    });
  };
  server.on("request", onRequest);

  return new Promise((resolve, reject) => {
    shutdown.onShutdown((reason) => {
      closing = true;
      log.info("Stopping HTTP server, draining in-flight requests", { reason, inFlight });

      const grace = setTimeout(() => {
        log.warn("Grace period expired, closing remaining connections", { inFlight });
        server.closeAllConnections();
      }, options.graceMs);
      grace.unref();

      server.close((err) => {
        clearTimeout(grace);
        server.removeListener("request", onRequest);
        if (err && !isNotRunning(err)) {
          log.error("HTTP server did not close cleanly", errorFields(err));
          reject(err);
          return;
        }
        log.info("HTTP server closed");
        resolve();
      });
      server.closeIdleConnections();
    });
  });
}

function isNotRunning(err: Error): boolean {
  return "code" in err && err.code === "ERR_SERVER_NOT_RUNNING";
}
