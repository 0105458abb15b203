import { describe, it, expect } from "vitest";
import { Counter, Gauge, Histogram, labelKey, renderMetrics } from "./metrics.js";

describe("labelKey", () => {
  it("renders label sets in insertion order", () => {
    expect(labelKey({})).toBe("");
    expect(labelKey({ method: "GET", status: "200" })).toBe('{method="GET",status="200"}');
  });

  it("escapes quotes, backslashes and newlines", () => {
    expect(labelKey({ route: 'a"b\\c\nd' })).toBe('{route="a\\"b\\\\c\\nd"}');
  });
});

describe("Counter", () => {
  it("accumulates per label set", () => {
    const counter = new Counter("jobs_total", "Jobs");
    counter.inc({ outcome: "ok" });
    counter.inc({ outcome: "ok" }, 2);
    counter.inc({ outcome: "error" });

    expect(counter.get({ outcome: "ok" })).toBe(3);
    expect(counter.get({ outcome: "missing" })).toBe(0);
    expect(counter.render()).toBe(
      [
        "# HELP jobs_total Jobs",
        "# TYPE jobs_total counter",
        'jobs_total{outcome="ok"} 3',
        'jobs_total{outcome="error"} 1',
      ].join("\n"),
    );
  });
});

describe("Gauge", () => {
  it("keeps the last value set", () => {
    const gauge = new Gauge("generation", "Live generation");
    gauge.set({}, 1);
    gauge.set({}, 4);

    expect(gauge.get()).toBe(4);
    expect(gauge.render()).toBe("# HELP generation Live generation\n# TYPE generation gauge\ngeneration 4");
  });
});

describe("Histogram", () => {
  it("renders cumulative buckets, sum and count", () => {
    const histogram = new Histogram("latency_seconds", "Latency", [1, 0.1]);
    histogram.observe({ route: "/" }, 0.25);
    histogram.observe({ route: "/" }, 0.5);
    histogram.observe({ route: "/" }, 3);

    expect(histogram.render()).toBe(
      [
        "# HELP latency_seconds Latency",
        "# TYPE latency_seconds histogram",
        'latency_seconds_bucket{route="/",le="0.1"} 0',
        'latency_seconds_bucket{route="/",le="1"} 2',
        'latency_seconds_bucket{route="/",le="+Inf"} 3',
        'latency_seconds_sum{route="/"} 3.75',
        'latency_seconds_count{route="/"} 3',
      ].join("\n"),
    );
  });
});

describe("renderMetrics", () => {
  it("includes every registered series and the uptime gauge", () => {
    const text = renderMetrics();

    expect(text).toContain("# TYPE template_reloads_total counter");
    expect(text).toContain("# TYPE template_generation gauge");
    expect(text).toMatch(/^process_uptime_seconds \d+\.\d{3}$/m);
    expect(text.endsWith("\n")).toBe(true);
  });
});
