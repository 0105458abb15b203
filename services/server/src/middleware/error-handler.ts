import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { logger } from "../lib/logger.js";
import type { AppEnv } from "../types/env.js";

/** Global error handler. Returns structured JSON errors. */
export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  const logFields: Record<string, unknown> = {
    requestId: c.get("requestId"),
    method: c.req.method,
    path: c.req.path,
  };

  if (err instanceof HTTPException) {
    const status = err.status;
    const message = err.message || "Request failed";
    if (status >= 500) {
      logger.error(message, { ...logFields, status, stack: err.stack });
    } else {
      logger.warn(message, { ...logFields, status });
    }
    return c.json({ error: { message, status } }, status);
  }

  logger.error(err.message || "Internal Server Error", {
    ...logFields,
    status: 500,
    stack: err.stack,
  });
  return c.json({ error: { message: "Internal Server Error", status: 500 } }, 500);
};
