import { realpath, stat } from "node:fs/promises";
import path from "node:path";
import watcher from "@parcel/watcher";
import type { AsyncSubscription, Event, SubscribeCallback } from "@parcel/watcher";
import { SetupError, StreamError, errorMessage } from "../lib/errors.js";
import type { ChangeSource, RootHandle, Subscription, SubscriptionData, WatchRoot } from "./types.js";

type SubscribeOptions = NonNullable<Parameters<typeof watcher.subscribe>[2]>;

export type SubscribeFn = (
  directoryPath: string,
  callback: SubscribeCallback,
  options?: SubscribeOptions,
) => Promise<AsyncSubscription>;

const WATCHER_IGNORE_GLOBS: readonly string[] = ["**/.git/**", "**/node_modules/**"];

function normalizePath(value: string): string {
  return value.replaceAll("\\", "/");
}

/**
 * Queue between the watcher's push callback and the pull-based `next()`.
 * Holds at most one pending reader; the reload loop pulls one batch at a time.
 */
class ParcelSubscription implements Subscription {
  readonly root: RootHandle;
  #handle: AsyncSubscription | undefined;
  #buffer: SubscriptionData[] = [];
  #failure: StreamError | undefined;
  #closed = false;
  #waiter:
    | { resolve: (data: SubscriptionData | undefined) => void; reject: (err: unknown) => void }
    | undefined;

  constructor(root: RootHandle) {
    this.root = root;
  }

  attach(handle: AsyncSubscription): void {
    this.#handle = handle;
  }

  readonly onEvents: SubscribeCallback = (error, events) => {
    if (this.#closed || this.#failure) return;

    if (error) {
      this.#fail(
        new StreamError(`Watcher failed for ${this.root.path}: ${error.message}`, {
          cause: error,
          root: this.root.path,
        }),
      );
      return;
    }

    const files = this.#relativeFiles(events);
    if (files.length === 0) return;
    this.#push({ kind: "files-changed", root: this.root.path, files });
  };

  next(): Promise<SubscriptionData | undefined> {
    const buffered = this.#buffer.shift();
    if (buffered) return Promise.resolve(buffered);
    if (this.#failure) return Promise.reject(this.#failure);
    if (this.#closed) return Promise.resolve(undefined);

    return new Promise((resolve, reject) => {
      this.#waiter = { resolve, reject };
    });
  }

  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;
    this.#buffer = [];

    const waiter = this.#waiter;
    this.#waiter = undefined;
    waiter?.resolve(undefined);

    await this.#handle?.unsubscribe();
    this.#handle = undefined;
  }

  #relativeFiles(events: Event[]): string[] {
    const seen = new Set<string>();
    for (const event of events) {
      const relative = normalizePath(path.relative(this.root.resolved, event.path));
      if (relative === "" || relative.startsWith("..")) continue;
      seen.add(relative);
    }
    return [...seen];
  }

  #push(data: SubscriptionData): void {
    const waiter = this.#waiter;
    if (waiter) {
      this.#waiter = undefined;
      waiter.resolve(data);
      return;
    }
    this.#buffer.push(data);
  }

  #fail(error: StreamError): void {
    this.#failure = error;
    const waiter = this.#waiter;
    if (waiter) {
      this.#waiter = undefined;
      waiter.reject(error);
    }
  }
}

/**
 * ChangeSource backed by @parcel/watcher (native FSEvents / inotify /
 * ReadDirectoryChangesW). The subscribe function is injectable for tests.
 */
export class ParcelChangeSource implements ChangeSource {
  #subscribe: SubscribeFn;

  constructor(subscribeFn: SubscribeFn = watcher.subscribe) {
    this.#subscribe = subscribeFn;
  }

  async resolveRoot(root: WatchRoot): Promise<RootHandle> {
    try {
      const resolved = await realpath(root);
      if (!(await stat(resolved)).isDirectory()) {
        throw new Error("not a directory");
      }
      return { path: root, resolved };
    } catch (err) {
      throw new SetupError(`Could not resolve watch root ${root}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async subscribe(root: RootHandle): Promise<Subscription> {
    const subscription = new ParcelSubscription(root);
    try {
      const handle = await this.#subscribe(root.resolved, subscription.onEvents, {
        ignore: [...WATCHER_IGNORE_GLOBS],
      });
      subscription.attach(handle);
      return subscription;
    } catch (err) {
      throw new SetupError(`Could not subscribe to ${root.path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
