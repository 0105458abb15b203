import path from "node:path";
import { parseArgs } from "node:util";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * Service configuration.
 *
 * Read from environment variables (container convention) plus the
 * `server` command's flags. Everything is validated up-front so a bad
 * deployment fails at startup rather than on the first request.
 */

// =============================================================================
// Listener address
// =============================================================================

export interface ListenAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port`. IPv6 hosts are bracketed (`[::1]:8080`) and returned
 * without the brackets.
 */
export function parseListenAddress(value: string): ListenAddress | undefined {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d{1,5})$/.exec(value.trim());
  if (!match) return undefined;

  const host = match[1] ?? match[2] ?? "";
  const port = Number(match[3]);
  if (port > 65_535) return undefined;

  return { host: host === "" ? "0.0.0.0" : host, port };
}

// =============================================================================
// Environment schema
// =============================================================================

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const positiveMs = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const envSchema = z.object({
  HTTP_ADDRESS: z
    .string()
    .default("0.0.0.0:8080")
    .transform((value, ctx) => {
      const parsed = parseListenAddress(value);
      if (!parsed) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `could not parse listener address "${value}"`,
        });
        return z.NEVER;
      }
      return parsed;
    }),
  // An empty PORT= means unset, not port 0.
  PORT: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().min(0).max(65_535).optional(),
  ),
  TEMPLATES_PATH: z
    .string()
    .default("templates")
    .transform((value) =>
      value
        .split(",")
        .map((p) => p.trim())
        .filter((p) => p.length > 0),
    )
    .pipe(z.array(z.string()).min(1, "at least one template directory is required")),
  REQUEST_TIMEOUT_MS: positiveMs(10_000),
  SHUTDOWN_GRACE_MS: positiveMs(10_000),
  SERVICE_VERSION: z.string().default("0.1.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  OTEL_TRACES_EXPORTER: z.enum(["none", "console"]).default("none"),
});

export interface ServerConfig {
  address: ListenAddress;
  templates: {
    /** Absolute template directories, lowest precedence first. */
    paths: string[];
  };
  requestTimeoutMs: number;
  shutdownGraceMs: number;
  serviceVersion: string;
  logLevel: LogLevel;
  tracesExporter: "none" | "console";
}

/**
 * Build the configuration from an environment map.
 * Relative template paths resolve against `cwd`.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): ServerConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }

  const parsed = result.data;
  return {
    address: {
      host: parsed.HTTP_ADDRESS.host,
      port: parsed.PORT ?? parsed.HTTP_ADDRESS.port,
    },
    templates: {
      paths: parsed.TEMPLATES_PATH.map((p) => path.resolve(cwd, p)),
    },
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS,
    serviceVersion: parsed.SERVICE_VERSION,
    logLevel: parsed.LOG_LEVEL,
    tracesExporter: parsed.OTEL_TRACES_EXPORTER,
  };
}

// =============================================================================
// Command line
// =============================================================================

export interface ServerCommand {
  command: "server";
  /** Watch template directories and hot-reload on change. */
  watch: boolean;
}

export type Command = ServerCommand | { command: "help" };

export const USAGE = `Usage: template-host server [options]

Options:
  -w, --watch   Watch for changes for templates on the filesystem
  -h, --help    Show this help`;

export function parseCommand(argv: readonly string[]): Command {
  let parsed: ReturnType<typeof parseServerArgs>;
  try {
    parsed = parseServerArgs(argv);
  } catch (err) {
    throw new ConfigError("Invalid arguments", [err instanceof Error ? err.message : String(err)], {
      cause: err,
    });
  }

  if (parsed.values.help === true) return { command: "help" };

  const [command, ...rest] = parsed.positionals;
  if (command !== undefined && command !== "server") {
    throw new ConfigError("Invalid arguments", [`unknown command "${command}"`]);
  }
  if (rest.length > 0) {
    throw new ConfigError("Invalid arguments", [`unexpected argument "${rest.join(" ")}"`]);
  }

  return { command: "server", watch: parsed.values.watch === true };
}

function parseServerArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      watch: { type: "boolean", short: "w", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}
