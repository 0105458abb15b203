import { SetupError, errorFields, errorMessage } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import { mergeSubscriptions } from "./merge.js";
import type { ChangeEventBatch, ChangeSource, Subscription, SubscriptionData, WatchRoot } from "./types.js";

/** Reduce a payload to a change batch; control messages map to undefined. */
export function toChangeBatch(data: SubscriptionData): ChangeEventBatch | undefined {
  if (data.kind !== "files-changed" || data.files === undefined) return undefined;
  return { root: data.root, files: data.files };
}

async function closeAll(subscriptions: readonly Subscription[], log: Logger): Promise<void> {
  const results = await Promise.allSettled(subscriptions.map((s) => s.close()));
  results.forEach((result, i) => {
    if (result.status === "rejected") {
      log.warn("Could not close template watch subscription", {
        root: subscriptions[i]?.root.path,
        ...errorFields(result.reason),
      });
    }
  });
}

export interface MultiRootWatcherOptions {
  logger?: Logger;
}

/**
 * One subscription per watch root, merged into a single sequence of change
 * batches.
 *
 * Setup is all-or-nothing: if any root fails to resolve or subscribe, the
 * subscriptions opened so far are closed and a SetupError is thrown. The
 * merged sequence can be iterated once; watching again means opening a new
 * watcher.
 */
export class MultiRootWatcher implements AsyncIterable<ChangeEventBatch> {
  readonly roots: readonly WatchRoot[];
  readonly #subscriptions: readonly Subscription[];
  readonly #logger: Logger;
  #iterated = false;
  #closed = false;

  private constructor(roots: readonly WatchRoot[], subscriptions: Subscription[], log: Logger) {
    this.roots = roots;
    this.#subscriptions = subscriptions;
    this.#logger = log;
  }

  static async open(
    source: ChangeSource,
    roots: readonly WatchRoot[],
    options: MultiRootWatcherOptions = {},
  ): Promise<MultiRootWatcher> {
    const log = options.logger ?? rootLogger;

    if (roots.length === 0) {
      throw new SetupError("No template roots to watch");
    }

    const opened: Subscription[] = [];
    for (const root of roots) {
      try {
        const handle = await source.resolveRoot(root);
        opened.push(await source.subscribe(handle));
        log.debug("Watching template root", { root, resolved: handle.resolved });
      } catch (err) {
        await closeAll(opened, log);
        if (err instanceof SetupError) throw err;
        throw new SetupError(`Could not watch template root ${root}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }

    return new MultiRootWatcher(Object.freeze([...roots]), opened, log);
  }

  get closed(): boolean {
    return this.#closed;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ChangeEventBatch, void, undefined> {
    if (this.#iterated) {
      throw new SetupError("Watcher stream already consumed; open a new watcher");
    }
    this.#iterated = true;

    try {
      for await (const data of mergeSubscriptions(this.#subscriptions)) {
        const batch = toChangeBatch(data);
        if (batch) yield batch;
      }
    } finally {
      await this.close();
    }
  }

  /** Close every subscription. Ends an in-progress iteration. */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    await closeAll(this.#subscriptions, this.#logger);
  }
}
