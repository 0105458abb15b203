import type { HttpBindings } from "@hono/node-server";
import type { TemplateSnapshot } from "../lib/templates.js";

/**
 * Hono environment type for the template host.
 *
 * Bindings are the Node request/response pair supplied by
 * @hono/node-server; they are absent when an app is driven through
 * `app.request()` in tests.
 */
export type AppEnv = {
  Bindings: HttpBindings;
  Variables: {
    /** Unique request ID (set by request-id middleware). */
    requestId: string;
    /** Header names to redact in logs (set by sensitive-headers middleware). */
    sensitiveHeaders: ReadonlySet<string> | undefined;
    /** Template snapshot pinned for the whole request. */
    templates: TemplateSnapshot;
  };
};
