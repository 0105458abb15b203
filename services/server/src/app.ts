import { Hono } from "hono";
import { errorHandler } from "./middleware/error-handler.js";
import { buildPipeline, type PipelineOptions } from "./middleware/pipeline.js";
import { templateSnapshot, type SnapshotSource } from "./middleware/templates.js";
import { healthRoutes, type HealthState } from "./routes/health.js";
import type { AppEnv } from "./types/env.js";

export interface AppDeps extends PipelineOptions {
  templates: SnapshotSource;
  health: HealthState;
  /**
   * Hook for the collaborators that own routing and page handlers. Runs
   * after the pipeline and health routes are mounted.
   */
  mount?: (app: Hono<AppEnv>) => void;
}

/**
 * Build the HTTP application: the request pipeline, template pinning, the
 * health/metrics routes and whatever routes the host mounts.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // -- Global middleware (runs on every request) ------------------------------

  for (const { handler } of buildPipeline(deps)) {
    app.use("*", handler);
  }
  app.use("*", templateSnapshot(deps.templates));
  app.onError(errorHandler);

  // -- Public routes ----------------------------------------------------------

  app.route("/health", healthRoutes(deps.health));

  deps.mount?.(app);

  return app;
}
