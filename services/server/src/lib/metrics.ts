/**
 * In-process metrics collector with Prometheus-compatible text exposition.
 *
 * Tracks:
 *   - HTTP request count (by method, route, status) and duration histogram
 *   - HTTP error count (by status)
 *   - Template reload outcomes, live snapshot generation, watcher state
 *
 * Exposed via GET /health/metrics in Prometheus text format.
 */

export type Labels = Readonly<Record<string, string>>;

type MetricType = "counter" | "gauge" | "histogram";

interface Metric {
  readonly name: string;
  render(): string;
}

function header(name: string, help: string, type: MetricType): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

// =============================================================================
// Counter / Gauge
// =============================================================================

/** One number per label set. */
abstract class SingleValueMetric implements Metric {
  protected abstract readonly type: MetricType;
  protected readonly values = new Map<string, number>();

  constructor(
    readonly name: string,
    readonly help: string,
  ) {}

  get(labels: Labels = {}): number {
    return this.values.get(labelKey(labels)) ?? 0;
  }

  render(): string {
    const lines = header(this.name, this.help, this.type);
    for (const [key, value] of this.values) {
      lines.push(`${this.name}${key} ${value}`);
    }
    return lines.join("\n");
  }
}

export class Counter extends SingleValueMetric {
  protected readonly type = "counter";

  inc(labels: Labels = {}, value = 1): void {
    const key = labelKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + value);
  }
}

export class Gauge extends SingleValueMetric {
  protected readonly type = "gauge";

  set(labels: Labels, value: number): void {
    this.values.set(labelKey(labels), value);
  }
}

// =============================================================================
// Histogram
// =============================================================================

interface HistogramSeries {
  /** Per-bucket counts, non-cumulative; made cumulative on render. */
  buckets: number[];
  sum: number;
  count: number;
}

export class Histogram implements Metric {
  readonly #bounds: readonly number[];
  readonly #series = new Map<string, { labels: Labels; data: HistogramSeries }>();

  constructor(
    readonly name: string,
    readonly help: string,
    bounds: readonly number[],
  ) {
    this.#bounds = [...bounds].sort((a, b) => a - b);
  }

  observe(labels: Labels, value: number): void {
    const key = labelKey(labels);
    let series = this.#series.get(key);
    if (!series) {
      series = {
        labels,
        data: { buckets: new Array<number>(this.#bounds.length).fill(0), sum: 0, count: 0 },
      };
      this.#series.set(key, series);
    }

    const { data } = series;
    data.sum += value;
    data.count += 1;
    const index = this.#bounds.findIndex((bound) => value <= bound);
    if (index >= 0) data.buckets[index] = (data.buckets[index] ?? 0) + 1;
  }

  render(): string {
    const lines = header(this.name, this.help, "histogram");
    for (const [key, { labels, data }] of this.#series) {
      let cumulative = 0;
      this.#bounds.forEach((bound, i) => {
        cumulative += data.buckets[i] ?? 0;
        lines.push(`${this.name}_bucket${labelKey({ ...labels, le: String(bound) })} ${cumulative}`);
      });
      lines.push(`${this.name}_bucket${labelKey({ ...labels, le: "+Inf" })} ${data.count}`);
      lines.push(`${this.name}_sum${key} ${data.sum}`);
      lines.push(`${this.name}_count${key} ${data.count}`);
    }
    return lines.join("\n");
  }
}

// =============================================================================
// Metric instances
// =============================================================================

export const httpRequestsTotal = new Counter(
  "http_requests_total",
  "Total HTTP requests processed",
);

export const httpRequestDuration = new Histogram(
  "http_request_duration_seconds",
  "HTTP request duration in seconds",
  [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
);

export const httpErrorsTotal = new Counter(
  "http_errors_total",
  "Total HTTP errors by status code",
);

export const templateReloadsTotal = new Counter(
  "template_reloads_total",
  "Template reload attempts by outcome (ok, error)",
);

export const templateGeneration = new Gauge(
  "template_generation",
  "Generation number of the live template snapshot",
);

export const templateWatchActive = new Gauge(
  "template_watch_active",
  "1 while the template watcher is observing changes, 0 otherwise",
);

const processStartTime = Date.now() / 1000;

const allMetrics: readonly Metric[] = [
  httpRequestsTotal,
  httpRequestDuration,
  httpErrorsTotal,
  templateReloadsTotal,
  templateGeneration,
  templateWatchActive,
];

// =============================================================================
// Rendering
// =============================================================================

/** Render all metrics in Prometheus text exposition format. */
export function renderMetrics(): string {
  const sections = allMetrics.map((m) => m.render());

  const uptimeSeconds = Date.now() / 1000 - processStartTime;
  sections.push(
    [
      ...header("process_uptime_seconds", "Time since process start in seconds", "gauge"),
      `process_uptime_seconds ${uptimeSeconds.toFixed(3)}`,
    ].join("\n"),
  );

  return sections.join("\n\n") + "\n";
}

/** `{a="1",b="2"}` with label values escaped; "" for no labels. */
export function labelKey(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return "";
  const parts = entries.map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  return `{${parts.join(",")}}`;
}

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}
