import type { MiddlewareHandler } from "hono";
import type { TemplateSnapshot } from "../lib/templates.js";
import type { AppEnv } from "../types/env.js";

export interface SnapshotSource {
  current(): TemplateSnapshot;
}

/**
 * Pin the live template snapshot for the request. Handlers render through
 * `c.get("templates")`, so a reload that lands mid-request does not change
 * the templates that request is rendering with.
 */
export function templateSnapshot(source: SnapshotSource): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("templates", source.current());
    await next();
  };
}
