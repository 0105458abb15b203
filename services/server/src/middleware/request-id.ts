import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/env.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

/** Visible ASCII, no spaces, at most 128 characters. */
const ACCEPTED_ID = /^[\x21-\x7e]{1,128}$/;

export interface RequestIdOptions {
  /** Defaults to a random UUID. */
  generate?: () => string;
}

/**
 * First pipeline stage. Reuses the caller's X-Request-Id (from a gateway or
 * load balancer) when it is a plausible token, otherwise mints one. The id
 * lands in `c.get("requestId")`, on the response header, and on every
 * access and error log line for the request.
 */
export function requestId(options: RequestIdOptions = {}): MiddlewareHandler<AppEnv> {
  const generate = options.generate ?? randomUUID;

  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const id = incoming !== undefined && ACCEPTED_ID.test(incoming) ? incoming : generate();

    c.set("requestId", id);
    c.header(REQUEST_ID_HEADER, id);
    await next();
  };
}
