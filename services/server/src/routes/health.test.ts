import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../app.js";
import { staticSnapshot } from "../testing/static-snapshot.js";
import type { WatchStatus } from "./health.js";

/**
 * Health route tests.
 *
 * The routes are mounted through createApp so /ready sees the pinned
 * template snapshot the same way it does in production.
 */

const SERVICE_VERSION = "0.1.0-test";

let draining = false;
let watch: WatchStatus = "active";

function testApp() {
  return createApp({
    requestTimeoutMs: 1_000,
    templates: {
      current: () => staticSnapshot(3, { "index.html": "", "layout.html": "" }),
    },
    health: {
      version: SERVICE_VERSION,
      watchStatus: () => watch,
      shuttingDown: () => draining,
    },
  });
}

beforeEach(() => {
  draining = false;
  watch = "active";
  vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  vi.spyOn(process.stderr, "write").mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const res = await testApp().request("/health");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body).toMatchObject({
      status: "ok",
      service: "template-host",
      version: SERVICE_VERSION,
    });
    expect(new Date(body.timestamp).toISOString()).toBe(body.timestamp);
  });

  it("returns JSON content type", async () => {
    const res = await testApp().request("/health");
    expect(res.headers.get("content-type")).toContain("application/json");
  });
});

describe("GET /health/live", () => {
  it("returns 200 with status ok", async () => {
    const res = await testApp().request("/health/live");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("GET /health/ready", () => {
  it("reports the live template generation and watch state", async () => {
    const res = await testApp().request("/health/ready");
    expect(res.status).toBe(200);

    expect(await res.json()).toMatchObject({
      status: "ok",
      uptime: "0s",
      templates: {
        generation: 3,
        count: 2,
        loaded_at: "2024-01-01T00:00:00.000Z",
        watch: "active",
      },
    });
  });

  it("reports a watch that stopped after a stream failure", async () => {
    watch = "failed";
    const res = await testApp().request("/health/ready");

    expect(await res.json()).toMatchObject({ templates: { watch: "failed" } });
  });

  it("returns 503 once shutdown has begun", async () => {
    draining = true;
    const res = await testApp().request("/health/ready");

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: "shutting_down" });
  });
});

describe("GET /health/metrics", () => {
  it("exposes request counters in Prometheus text format", async () => {
    const app = testApp();
    await app.request("/health/live");

    const res = await app.request("/health/metrics");

    expect(res.headers.get("content-type")).toBe("text/plain; version=0.0.4; charset=utf-8");
    const text = await res.text();
    expect(text).toContain("# TYPE http_requests_total counter");
    expect(text).toMatch(/^http_requests_total\{method="GET",route="[^"]+",status="200"\} \d+$/m);
  });
});

describe("unknown routes", () => {
  it("return 404", async () => {
    const res = await testApp().request("/nonexistent");
    expect(res.status).toBe(404);
  });
});
