import { errorFields } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { templateReloadsTotal, templateWatchActive } from "../lib/metrics.js";
import type { TemplateProvider } from "../lib/templates.js";
import { MultiRootWatcher } from "./multi-root.js";
import type { ChangeSource, WatchRoot } from "./types.js";

/**
 * How a watch loop finished:
 *   - stopped: stop() was called or the shutdown signal fired
 *   - ended:   every subscription ended on its own
 *   - failed:  the change stream broke; no further reloads until restart
 */
export type WatchOutcome = "stopped" | "ended" | "failed";

export interface TemplateWatch {
  readonly roots: readonly WatchRoot[];
  /** Settles when the loop exits. Never rejects. */
  readonly done: Promise<WatchOutcome>;
  /** Close the subscriptions and wait for the loop to exit. */
  stop(): Promise<WatchOutcome>;
}

export interface WatchTemplatesOptions {
  /** Shutdown signal; once aborted the loop stops issuing reloads. */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Watch the provider's roots and reload templates on every change batch.
 *
 * Setup is awaited, so a SetupError reaches the caller. The reload loop then
 * runs detached: this resolves as soon as the subscriptions are open.
 */
export async function watchTemplates(
  source: ChangeSource,
  provider: TemplateProvider,
  options: WatchTemplatesOptions = {},
): Promise<TemplateWatch> {
  const log = options.logger ?? rootLogger;
  const roots = await provider.watchRoots();
  const watcher = await MultiRootWatcher.open(source, roots, { logger: log });

  let stopRequested = false;
  const requestStop = async (): Promise<void> => {
    stopRequested = true;
    await watcher.close();
  };

  const onAbort = (): void => {
    requestStop().catch((err: unknown) => {
      log.error("Could not stop template watcher", errorFields(err));
    });
  };

  if (options.signal?.aborted) {
    onAbort();
  } else {
    options.signal?.addEventListener("abort", onAbort, { once: true });
  }

  log.info("Watching templates for changes", { roots });

  const done = runReloadLoop(watcher, provider, log, () => stopRequested).finally(() => {
    options.signal?.removeEventListener("abort", onAbort);
  });

  return {
    roots,
    done,
    stop: async () => {
      await requestStop();
      return done;
    },
  };
}

/**
 * Process batches one at a time. A failed reload is logged and the loop goes
 * on to the next batch; a failed stream ends the loop.
 */
async function runReloadLoop(
  watcher: MultiRootWatcher,
  provider: TemplateProvider,
  log: Logger,
  isStopping: () => boolean,
): Promise<WatchOutcome> {
  templateWatchActive.set({}, 1);
  try {
    for await (const batch of watcher) {
      if (isStopping()) break;

      log.info("Files changed, reloading templates", { root: batch.root, files: batch.files });
      try {
        await provider.reload();
        templateReloadsTotal.inc({ outcome: "ok" });
      } catch (err) {
        templateReloadsTotal.inc({ outcome: "error" });
        log.error("Could not reload templates", {
          ...errorFields(err),
          root: batch.root,
          files: batch.files,
        });
      }
    }
    return isStopping() ? "stopped" : "ended";
  } catch (err) {
    log.error("Error while watching templates, stop watching", errorFields(err));
    return "failed";
  } finally {
    templateWatchActive.set({}, 0);
  }
}
