import type { MiddlewareHandler } from "hono";
import { compress } from "hono/compress";
import { timeout } from "hono/timeout";
import type { AppEnv } from "../types/env.js";
import { requestId } from "./request-id.js";
import { DEFAULT_SENSITIVE_HEADERS, sensitiveHeaders } from "./sensitive-headers.js";
import { traceMiddleware, type TraceOptions } from "./trace.js";

/**
 * The request/response pipeline, outermost stage first:
 *
 *   request-id -> observe -> time-bound -> compress -> redact-sensitive-headers
 *
 * `observe` wraps everything below it so the span and access log see the
 * final status, including 504s from `time-bound` and errors turned into
 * responses by the error handler.
 */

export type PipelineStage =
  | "request-id"
  | "observe"
  | "time-bound"
  | "compress"
  | "redact-sensitive-headers";

export interface PipelineEntry {
  stage: PipelineStage;
  handler: MiddlewareHandler<AppEnv>;
}

export interface PipelineOptions {
  /** Per-request deadline; expiry answers 504. */
  requestTimeoutMs: number;
  trace?: TraceOptions;
  sensitiveHeaders?: readonly string[];
}

export function buildPipeline(options: PipelineOptions): PipelineEntry[] {
  return [
    { stage: "request-id", handler: requestId() },
    { stage: "observe", handler: traceMiddleware(options.trace) },
    { stage: "time-bound", handler: timeout(options.requestTimeoutMs) },
    { stage: "compress", handler: compress() },
    {
      stage: "redact-sensitive-headers",
      handler: sensitiveHeaders(options.sensitiveHeaders ?? DEFAULT_SENSITIVE_HEADERS),
    },
  ];
}
