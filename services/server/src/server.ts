import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import { getRequestListener } from "@hono/node-server";
import type { Hono } from "hono";
import { createApp } from "./app.js";
import type { ServerCommand, ServerConfig } from "./lib/config.js";
import { ReloadError, errorFields, errorMessage } from "./lib/errors.js";
import { logger } from "./lib/logger.js";
import { shutdownTelemetry } from "./lib/telemetry.js";
import { TemplateRegistry } from "./lib/templates.js";
import { listen, serveUntilShutdown } from "./lifecycle/serve.js";
import { ShutdownSignal, installSignalHandlers, type SignalSource } from "./lifecycle/shutdown.js";
import type { WatchStatus } from "./routes/health.js";
import type { AppEnv } from "./types/env.js";
import { ParcelChangeSource } from "./watcher/parcel-source.js";
import { watchTemplates, type TemplateWatch } from "./watcher/reload.js";
import type { ChangeSource } from "./watcher/types.js";

export interface ServerHooks {
  /** Defaults to a fresh signal fed by SIGTERM/SIGINT. */
  shutdown?: ShutdownSignal;
  signalSource?: SignalSource;
  changeSource?: ChangeSource;
  /** Collaborator routes. */
  mount?: (app: Hono<AppEnv>) => void;
  onListening?: (address: AddressInfo) => void;
}

function formatAddress(address: AddressInfo): string {
  const host = address.family === "IPv6" ? `[${address.address}]` : address.address;
  return `${host}:${address.port}`;
}

/**
 * The `server` command: load templates, optionally watch them, serve HTTP
 * until a termination signal, then drain and stop background work.
 */
export async function runServer(
  command: ServerCommand,
  config: ServerConfig,
  hooks: ServerHooks = {},
): Promise<void> {
  const shutdown = hooks.shutdown ?? new ShutdownSignal();

  // A process without a shutdown path must not start; this throws SignalInstallError.
  const uninstallSignals = installSignalHandlers(shutdown, { source: hooks.signalSource });

  try {
    let templates: TemplateRegistry;
    try {
      templates = await TemplateRegistry.load(config.templates.paths);
    } catch (err) {
      throw new ReloadError(`could not load templates: ${errorMessage(err)}`, { cause: err });
    }

    let watchStatus: WatchStatus = "off";
    let watch: TemplateWatch | undefined;

    if (command.watch) {
      try {
        watch = await watchTemplates(hooks.changeSource ?? new ParcelChangeSource(), templates, {
          signal: shutdown.signal,
        });
        watchStatus = "active";
        void watch.done.then((outcome) => {
          watchStatus = outcome;
        });
      } catch (err) {
        logger.error(
          "Could not watch for templates changes, continuing without hot reload",
          errorFields(err),
        );
      }
    }

    const app = createApp({
      templates,
      requestTimeoutMs: config.requestTimeoutMs,
      health: {
        version: config.serviceVersion,
        watchStatus: () => watchStatus,
        shuttingDown: () => shutdown.raised,
      },
      mount: hooks.mount,
    });

    const server = createServer(getRequestListener(app.fetch));
    let bound: AddressInfo;
    try {
      bound = await listen(server, config.address);
    } catch (err) {
      await watch?.stop();
      throw new Error(`could not bind address ${config.address.host}:${config.address.port}`, {
        cause: err,
      });
    }

    logger.info(`Listening on http://${formatAddress(bound)}`);
    hooks.onListening?.(bound);

    await serveUntilShutdown(server, shutdown, { graceMs: config.shutdownGraceMs });

    const outcome = await watch?.stop();
    if (outcome) logger.info("Template watcher stopped", { outcome });
  } finally {
    uninstallSignals();
    await shutdownTelemetry();
  }
}
