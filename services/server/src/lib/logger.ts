import { trace } from "@opentelemetry/api";
import type { LogLevel } from "./config.js";

/**
 * Structured JSON logger compatible with GCP Cloud Logging.
 *
 * GCP Cloud Logging expects a `severity` field (not `level`) and
 * recognises these values: DEBUG, INFO, WARNING, ERROR, CRITICAL.
 *
 * When an OpenTelemetry span is active (e.g. inside a request handler),
 * its `traceId` and `spanId` are attached so log lines can be joined to
 * the request span.
 *
 * Usage:
 *   import { logger } from "./logger.js";
 *   logger.info("Templates loaded", { generation, count });
 *   logger.error("Reload failed", { ...errorFields(err), files });
 */

type Severity = "DEBUG" | "INFO" | "WARNING" | "ERROR" | "CRITICAL";

interface LogEntry {
  severity: Severity;
  message: string;
  /** ISO-8601 timestamp. */
  timestamp: string;
  serviceContext: { service: string; version: string };
  [key: string]: unknown;
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  critical(message: string, fields?: LogFields): void;
}

const SERVICE_NAME = "template-host";

const SEVERITY_RANK: Record<Severity, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
};

const LEVEL_SEVERITY: Record<LogLevel, Severity> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR",
};

let minimumRank = SEVERITY_RANK.INFO;
let serviceVersion = process.env["SERVICE_VERSION"] ?? "0.1.0";

/** Apply runtime logging settings (called once config is loaded). */
export function configureLogger(options: { level?: LogLevel; version?: string }): void {
  if (options.level) minimumRank = SEVERITY_RANK[LEVEL_SEVERITY[options.level]];
  if (options.version) serviceVersion = options.version;
}

function traceFields(): LogFields {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext) return {};
  return { traceId: spanContext.traceId, spanId: spanContext.spanId };
}

function emit(severity: Severity, message: string, fields?: LogFields): void {
  if (SEVERITY_RANK[severity] < minimumRank) return;

  const entry: LogEntry = {
    severity,
    message,
    timestamp: new Date().toISOString(),
    serviceContext: { service: SERVICE_NAME, version: serviceVersion },
    ...traceFields(),
    ...fields,
  };

  const output = JSON.stringify(entry);

  if (severity === "ERROR" || severity === "CRITICAL") {
    process.stderr.write(output + "\n");
  } else {
    process.stdout.write(output + "\n");
  }
}

/**
 * Create a child logger with pre-bound context fields.
 * Used for request-scoped and component-scoped logging.
 */
export function createChildLogger(context: LogFields): Logger {
  return {
    debug: (message, fields) => emit("DEBUG", message, { ...context, ...fields }),
    info: (message, fields) => emit("INFO", message, { ...context, ...fields }),
    warn: (message, fields) => emit("WARNING", message, { ...context, ...fields }),
    error: (message, fields) => emit("ERROR", message, { ...context, ...fields }),
    critical: (message, fields) => emit("CRITICAL", message, { ...context, ...fields }),
  };
}

export const logger: Logger = createChildLogger({});
