import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/env.js";

/** Headers whose values never appear in logs. */
export const DEFAULT_SENSITIVE_HEADERS: readonly string[] = ["authorization", "cookie", "set-cookie"];

export const REDACTED = "[redacted]";

/**
 * Mark headers as sensitive for the rest of the request. Loggers read the
 * set through `c.get("sensitiveHeaders")`; the headers themselves are left
 * as they are.
 */
export function sensitiveHeaders(
  names: readonly string[] = DEFAULT_SENSITIVE_HEADERS,
): MiddlewareHandler<AppEnv> {
  const marked: ReadonlySet<string> = new Set(names.map((n) => n.toLowerCase()));

  return async (c, next) => {
    const inherited = c.get("sensitiveHeaders");
    c.set("sensitiveHeaders", inherited ? new Set([...inherited, ...marked]) : marked);
    await next();
  };
}

/** Plain header map with sensitive values replaced by `[redacted]`. */
export function redactHeaders(
  headers: Headers,
  sensitive: ReadonlySet<string> | undefined,
): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, name) => {
    out[name] = sensitive?.has(name.toLowerCase()) ? REDACTED : value;
  });
  return out;
}
