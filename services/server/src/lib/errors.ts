/**
 * Error taxonomy for the runtime lifecycle core.
 *
 * Every class carries a `kind` discriminant so callers can branch on the
 * failure category without `instanceof` chains:
 *
 *   - setup:  a watch root could not be resolved or subscribed. Fatal to the
 *             watcher only; the caller may keep serving without hot reload.
 *   - reload: a template failed to load or compile. Logged, watch continues.
 *   - stream: the change-notification stream broke mid-watch. Ends the watch
 *             loop, never the process.
 *   - signal: termination handlers could not be installed. Fatal at startup.
 *   - config: configuration or CLI arguments are invalid. Fatal at startup.
 */

export type LifecycleErrorKind = "setup" | "reload" | "stream" | "signal" | "config";

export class LifecycleError extends Error {
  readonly kind: LifecycleErrorKind;

  constructor(kind: LifecycleErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "LifecycleError";
  }
}

export class SetupError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("setup", message, options);
    this.name = "SetupError";
  }
}

export class ReloadError extends LifecycleError {
  /** Template file that failed, when the failure is attributable to one. */
  readonly file: string | undefined;

  constructor(message: string, options?: { cause?: unknown; file?: string }) {
    super("reload", message, options);
    this.name = "ReloadError";
    this.file = options?.file;
  }
}

export class StreamError extends LifecycleError {
  /** Watch root whose subscription failed. */
  readonly root: string | undefined;

  constructor(message: string, options?: { cause?: unknown; root?: string }) {
    super("stream", message, options);
    this.name = "StreamError";
    this.root = options?.root;
  }
}

export class SignalInstallError extends LifecycleError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("signal", message, options);
    this.name = "SignalInstallError";
  }
}

export class ConfigError extends LifecycleError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super("config", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, options);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isLifecycleError(value: unknown): value is LifecycleError {
  return value instanceof LifecycleError;
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Structured log fields for an error, following its `cause` chain one level
 * deep so wrapped failures keep their root message.
 */
export function errorFields(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) {
    return { error: String(err) };
  }

  const fields: Record<string, unknown> = { error: err.message };
  if (isLifecycleError(err)) fields["errorKind"] = err.kind;
  if (err.cause !== undefined) fields["cause"] = errorMessage(err.cause);
  if (err.stack) fields["stack"] = err.stack;
  return fields;
}
