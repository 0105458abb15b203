/** Absolute path of a directory observed for template changes. */
export type WatchRoot = string;

/** A watch root after resolution against the change source. */
export interface RootHandle {
  /** Path as configured. */
  path: WatchRoot;
  /** Canonical path (symlinks resolved). */
  resolved: string;
}

/**
 * Payload produced by a subscription. Only `files-changed` drives a reload;
 * the other kinds are control messages.
 */
export type SubscriptionData =
  | { kind: "files-changed"; root: string; files?: string[] }
  | { kind: "state-enter"; root: string; state: string }
  | { kind: "state-leave"; root: string; state: string }
  | { kind: "heartbeat"; root: string };

/**
 * Per-root handle over the change source. `next()` resolves `undefined` at
 * end of stream and rejects with a StreamError on transport failure.
 */
export interface Subscription {
  readonly root: RootHandle;
  next(): Promise<SubscriptionData | undefined>;
  close(): Promise<void>;
}

/** Filesystem change notification capability. */
export interface ChangeSource {
  resolveRoot(path: WatchRoot): Promise<RootHandle>;
  subscribe(root: RootHandle): Promise<Subscription>;
}

/** Changed files (relative to `root`), in the order the root reported them. */
export interface ChangeEventBatch {
  root: string;
  files: string[];
}
