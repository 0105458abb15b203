import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import { W3CTraceContextPropagator } from "@opentelemetry/core";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { ConsoleSpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { errorFields } from "./errors.js";
import { logger } from "./logger.js";

/**
 * OpenTelemetry bootstrap.
 *
 * Starts the Node SDK once per process with the W3C trace-context
 * propagator (used to extract upstream parents) and an AsyncLocalStorage
 * context manager so the request span stays active across awaits.
 * No auto-instrumentation: the only spans are the request spans.
 */

let sdk: NodeSDK | null = null;

export interface TelemetryOptions {
  exporter: "none" | "console";
}

export function initTelemetry(options: TelemetryOptions): void {
  if (sdk !== null) return;

  sdk = new NodeSDK({
    serviceName: "template-host",
    instrumentations: [],
    contextManager: new AsyncLocalStorageContextManager(),
    textMapPropagator: new W3CTraceContextPropagator(),
    spanProcessors:
      options.exporter === "console" ? [new SimpleSpanProcessor(new ConsoleSpanExporter())] : [],
  });
  sdk.start();

  logger.debug("Telemetry initialised", { exporter: options.exporter });
}

/** Flush and stop span processing (for shutdown hooks). */
export async function shutdownTelemetry(): Promise<void> {
  if (sdk === null) return;
  const running = sdk;
  sdk = null;
  try {
    await running.shutdown();
  } catch (err) {
    logger.warn("Could not flush telemetry", errorFields(err));
  }
}
