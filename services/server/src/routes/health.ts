import { Hono } from "hono";
import { renderMetrics } from "../lib/metrics.js";
import type { AppEnv } from "../types/env.js";
import type { WatchOutcome } from "../watcher/reload.js";

/** Template watch state: `off` without --watch, `active` while watching. */
export type WatchStatus = "off" | "active" | WatchOutcome;

export interface HealthState {
  version: string;
  watchStatus(): WatchStatus;
  shuttingDown(): boolean;
}

export function healthRoutes(state: HealthState): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const startedAt = new Date();

  // -- GET / -- Basic health. -------------------------------------------------

  routes.get("/", (c) => {
    return c.json({
      status: "ok",
      service: "template-host",
      version: state.version,
      timestamp: new Date().toISOString(),
    });
  });

  // -- GET /live -- Liveness probe. -------------------------------------------

  routes.get("/live", (c) => {
    return c.json({ status: "ok" });
  });

  // -- GET /ready -- Readiness probe; 503 once shutdown has begun. ------------

  routes.get("/ready", (c) => {
    const draining = state.shuttingDown();
    const snapshot = c.get("templates");

    return c.json(
      {
        status: draining ? "shutting_down" : "ok",
        service: "template-host",
        version: state.version,
        uptime: uptimeString(startedAt),
        started_at: startedAt.toISOString(),
        templates: {
          generation: snapshot.generation,
          count: snapshot.names.length,
          loaded_at: snapshot.loadedAt.toISOString(),
          watch: state.watchStatus(),
        },
      },
      draining ? 503 : 200,
    );
  });

  // -- GET /metrics -- Prometheus text exposition. ----------------------------

  routes.get("/metrics", (c) => {
    return c.body(renderMetrics(), 200, {
      "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
    });
  });

  return routes;
}

// =============================================================================
// Helpers
// =============================================================================

function uptimeString(startedAt: Date): string {
  const seconds = Math.floor((Date.now() - startedAt.getTime()) / 1000);
  const d = Math.floor(seconds / 86400);
  const h = Math.floor((seconds % 86400) / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const parts: string[] = [];
  if (d > 0) parts.push(`${d}d`);
  if (h > 0) parts.push(`${h}h`);
  if (m > 0) parts.push(`${m}m`);
  parts.push(`${s}s`);
  return parts.join(" ");
}
