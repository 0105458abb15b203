import { Hono } from "hono";
import { describe, it, expect } from "vitest";
import type { AppEnv } from "../types/env.js";
import { requestId } from "./request-id.js";

function appWith(generate?: () => string) {
  const app = new Hono<AppEnv>();
  app.use("*", requestId({ generate }));
  app.get("/", (c) => c.text(c.get("requestId")));
  return app;
}

describe("requestId", () => {
  it("mints an id when the caller sends none", async () => {
    const res = await appWith(() => "generated-1").request("/");

    expect(await res.text()).toBe("generated-1");
    expect(res.headers.get("X-Request-Id")).toBe("generated-1");
  });

  it("defaults to a random UUID", async () => {
    const res = await appWith().request("/");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("reuses a well-formed incoming id", async () => {
    const res = await appWith(() => "generated-1").request("/", {
      headers: { "X-Request-Id": "gw-7f3a/42" },
    });

    expect(await res.text()).toBe("gw-7f3a/42");
  });

  it("replaces ids that are too long or contain spaces", async () => {
    const app = appWith(() => "generated-1");

    const long = await app.request("/", { headers: { "X-Request-Id": "x".repeat(129) } });
    const spaced = await app.request("/", { headers: { "X-Request-Id": "two words" } });

    expect(await long.text()).toBe("generated-1");
    expect(await spaced.text()).toBe("generated-1");
  });
});
