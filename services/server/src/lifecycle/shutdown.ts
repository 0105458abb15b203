import { SignalInstallError, errorFields, errorMessage } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";

/**
 * Process-wide shutdown event.
 *
 * Raised at most once; every listener hears about it exactly once, including
 * listeners registered after the fact. Background tasks take `signal` (an
 * AbortSignal) and check it at their suspension points; the serving loop
 * awaits `wait()`.
 */

export type ShutdownListener = (reason: string) => void;

export class ShutdownSignal {
  readonly #controller = new AbortController();
  readonly #listeners = new Set<ShutdownListener>();
  readonly #raised: Promise<string>;
  #resolve: (reason: string) => void = () => {};
  #reason: string | undefined;
  #logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.#logger = options.logger ?? rootLogger;
    this.#raised = new Promise((resolve) => {
      this.#resolve = resolve;
    });
  }

  get raised(): boolean {
    return this.#reason !== undefined;
  }

  get reason(): string | undefined {
    return this.#reason;
  }

  /** Aborted when the event is raised. */
  get signal(): AbortSignal {
    return this.#controller.signal;
  }

  /** Raise the event. Returns false if it had already been raised. */
  trigger(reason: string): boolean {
    if (this.#reason !== undefined) return false;
    this.#reason = reason;

    this.#controller.abort(reason);
    this.#resolve(reason);

    const listeners = [...this.#listeners];
    this.#listeners.clear();
    for (const listener of listeners) {
      this.#notify(listener, reason);
    }
    return true;
  }

  /** Resolves with the reason once the event is raised. */
  wait(): Promise<string> {
    return this.#raised;
  }

  /** Returns an unsubscribe function. */
  onShutdown(listener: ShutdownListener): () => void {
    if (this.#reason !== undefined) {
      this.#notify(listener, this.#reason);
      return () => {};
    }
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  #notify(listener: ShutdownListener, reason: string): void {
    try {
      listener(reason);
    } catch (err) {
      this.#logger.error("Shutdown listener failed", errorFields(err));
    }
  }
}

// =============================================================================
// OS signals
// =============================================================================

/** The part of `process` used to listen for termination signals. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface InstallOptions {
  source?: SignalSource;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

/** Termination signals observed on a platform. Windows only delivers SIGINT (Ctrl+C). */
export function terminationSignals(platform: NodeJS.Platform): NodeJS.Signals[] {
  return platform === "win32" ? ["SIGINT"] : ["SIGTERM", "SIGINT"];
}

/**
 * Route SIGTERM/SIGINT into `shutdown`. Both are handled the same way; the
 * first one raises the event, later ones are only logged.
 *
 * Throws SignalInstallError if a handler cannot be installed: without a
 * shutdown path the process must not start. Returns an uninstall function.
 */
export function installSignalHandlers(
  shutdown: ShutdownSignal,
  options: InstallOptions = {},
): () => void {
  const source = options.source ?? process;
  const log = options.logger ?? rootLogger;
  const signals = terminationSignals(options.platform ?? process.platform);

  const handler = (signal: NodeJS.Signals): void => {
    if (shutdown.trigger(signal)) {
      log.info(`Got ${signal}, shutting down`);
    } else {
      log.warn(`Got ${signal}, already shutting down`);
    }
  };

  const installed: NodeJS.Signals[] = [];
  const uninstall = (): void => {
    for (const signal of installed.splice(0)) {
      source.removeListener(signal, handler);
    }
  };

  for (const signal of signals) {
    try {
      source.on(signal, handler);
      installed.push(signal);
    } catch (err) {
      uninstall();
      throw new SignalInstallError(`failed to install ${signal} signal handler: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  return uninstall;
}
