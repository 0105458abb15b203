import {
  ROOT_CONTEXT,
  SpanKind,
  SpanStatusCode,
  context,
  isSpanContextValid,
  propagation,
  trace,
  type Context as OtelContext,
  type TextMapGetter,
  type Tracer,
} from "@opentelemetry/api";
import type { Context, MiddlewareHandler } from "hono";
import { createChildLogger } from "../lib/logger.js";
import { httpErrorsTotal, httpRequestDuration, httpRequestsTotal } from "../lib/metrics.js";
import type { AppEnv } from "../types/env.js";
import { redactHeaders } from "./sensitive-headers.js";

/**
 * Request tracing middleware ("observe" layer).
 *
 * For every request:
 *   1. Extracts the upstream trace context from the headers. Only a valid
 *      *remote* span context becomes the parent; anything else (no header,
 *      malformed header, a local default) starts a fresh root trace.
 *   2. Opens a SERVER span named `request` with http.method, http.target,
 *      http.flavor and http.user_agent, and makes it the active span while
 *      the rest of the chain runs.
 *   3. On completion records otel.status_code (ok / error / unset) and
 *      http.status_code, emits HTTP metrics and one structured access log.
 *
 * Purely observational: request and response are passed through untouched.
 */

// =============================================================================
// Context extraction
// =============================================================================

export interface TraceContextExtractor {
  extract(headers: Headers): OtelContext;
}

const headerGetter: TextMapGetter<Headers> = {
  get: (carrier, key) => carrier.get(key) ?? undefined,
  keys: (carrier) => [...carrier.keys()],
};

/** Extractor backed by the globally registered propagator (W3C by default). */
export const globalExtractor: TraceContextExtractor = {
  extract: (headers) => propagation.extract(ROOT_CONTEXT, headers, headerGetter),
};

/**
 * Parent context for a request span: the extracted context when it carries
 * a valid remote span, otherwise ROOT_CONTEXT.
 */
export function parentContext(extracted: OtelContext): OtelContext {
  const spanContext = trace.getSpanContext(extracted);
  if (spanContext && spanContext.isRemote === true && isSpanContextValid(spanContext)) {
    return extracted;
  }
  return ROOT_CONTEXT;
}

// =============================================================================
// Span fields
// =============================================================================

const HTTP_FLAVORS: Readonly<Record<string, string>> = {
  "0.9": "0.9",
  "1.0": "1.0",
  "1.1": "1.1",
  "2": "2.0",
  "2.0": "2.0",
  "3": "3.0",
  "3.0": "3.0",
};

/** Canonical protocol version; unknown versions map to "". */
export function httpFlavor(version: string | undefined): string {
  if (version === undefined) return "";
  return HTTP_FLAVORS[version] ?? "";
}

export type OtelStatus = "ok" | "error" | "unset";

export function classifyStatus(status: number): OtelStatus {
  if (status >= 200 && status < 400) return "ok";
  if (status >= 400 && status < 600) return "error";
  return "unset";
}

const SPAN_STATUS: Record<OtelStatus, SpanStatusCode> = {
  ok: SpanStatusCode.OK,
  error: SpanStatusCode.ERROR,
  unset: SpanStatusCode.UNSET,
};

function requestTarget(url: string): string {
  const parsed = new URL(url);
  return parsed.pathname + parsed.search;
}

function httpVersionOf(c: Context<AppEnv>): string | undefined {
  return c.env?.incoming?.httpVersion;
}

// =============================================================================
// Middleware
// =============================================================================

export interface TraceOptions {
  /** Defaults to the global tracer provider's `template-host` tracer. */
  tracer?: Tracer;
  extractor?: TraceContextExtractor;
}

export function traceMiddleware(options: TraceOptions = {}): MiddlewareHandler<AppEnv> {
  const extractor = options.extractor ?? globalExtractor;

  return async (c, next) => {
    const start = performance.now();
    const tracer = options.tracer ?? trace.getTracer("template-host");
    const parent = parentContext(extractor.extract(c.req.raw.headers));

    const span = tracer.startSpan(
      "request",
      {
        kind: SpanKind.SERVER,
        attributes: {
          "http.method": c.req.method,
          "http.target": requestTarget(c.req.url),
          "http.flavor": httpFlavor(httpVersionOf(c)),
          "otel.kind": "server",
        },
      },
      parent,
    );

    const userAgent = c.req.header("User-Agent");
    if (userAgent !== undefined) {
      span.setAttribute("http.user_agent", userAgent);
    }

    try {
      await context.with(trace.setSpan(parent, span), next);
    } finally {
      const status = c.res.status;
      const outcome = classifyStatus(status);
      span.setAttribute("otel.status_code", outcome);
      span.setAttribute("http.status_code", status);
      span.setStatus({ code: SPAN_STATUS[outcome] });

      context.with(trace.setSpan(parent, span), () => {
        recordRequest(c, status, performance.now() - start);
      });
      span.end();
    }
  };
}

function recordRequest(c: Context<AppEnv>, status: number, durationMs: number): void {
  const method = c.req.method;
  const path = c.req.path;
  const route = c.req.routePath ?? path;
  const durationSec = durationMs / 1000;

  httpRequestsTotal.inc({ method, route, status: String(status) });
  httpRequestDuration.observe({ method, route }, durationSec);
  if (status >= 400) {
    httpErrorsTotal.inc({ method, route, status: String(status) });
  }

  const log = createChildLogger({
    requestId: c.get("requestId"),
    httpRequest: {
      requestMethod: method,
      requestUrl: path,
      status,
      latency: `${durationSec.toFixed(4)}s`,
      protocol: `HTTP/${httpFlavor(httpVersionOf(c)) || "unknown"}`,
      remoteIp: c.req.header("X-Forwarded-For")?.split(",")[0]?.trim() ?? undefined,
      userAgent: c.req.header("User-Agent") ?? undefined,
    },
    requestHeaders: redactHeaders(c.req.raw.headers, c.get("sensitiveHeaders")),
  });

  const line = `${method} ${path} ${status} ${durationMs.toFixed(1)}ms`;
  if (status >= 500) {
    log.error(line);
  } else if (status >= 400) {
    log.warn(line);
  } else {
    log.info(line);
  }
}
