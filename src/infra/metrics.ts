import type { WebhookDeliveryOutcome } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

abstract class LabeledMetric<TState> {
  private readonly series = new Map<string, { labels: LabelSet; state: TState }>();

  protected constructor(
    protected readonly name: string,
    private readonly help: string,
    private readonly type: "counter" | "histogram",
    private readonly labelNames: readonly string[],
  ) {}

  protected abstract initialState(): TState;
  protected abstract renderSeries(labels: LabelSet, state: TState): string[];

  protected stateFor(labels: LabelSet): TState {
    const normalized: LabelSet = {};
    for (const labelName of this.labelNames) {
      normalized[labelName] = labels[labelName] ?? "";
    }
    const key = JSON.stringify(this.labelNames.map((labelName) => normalized[labelName]));
    const existing = this.series.get(key);
    if (existing) {
      return existing.state;
    }
    const created = { labels: normalized, state: this.initialState() };
    this.series.set(key, created);
    return created.state;
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} ${this.type}`];
    for (const { labels, state } of this.series.values()) {
      lines.push(...this.renderSeries(labels, state));
    }
    return lines;
  }
}

class CounterMetric extends LabeledMetric<{ value: number }> {
  constructor(name: string, help: string, labelNames: readonly string[]) {
    super(name, help, "counter", labelNames);
  }

  inc(labels: LabelSet, value = 1): void {
    this.stateFor(labels).value += value;
  }

  protected initialState(): { value: number } {
    return { value: 0 };
  }

  protected renderSeries(labels: LabelSet, state: { value: number }): string[] {
    return [`${this.name}${formatLabels(labels)} ${state.value}`];
  }
}

interface HistogramState {
  count: number;
  sum: number;
  bucketCounts: number[];
}

class HistogramMetric extends LabeledMetric<HistogramState> {
  constructor(
    name: string,
    help: string,
    labelNames: readonly string[],
    private readonly buckets: readonly number[],
  ) {
    super(name, help, "histogram", labelNames);
  }

  observe(labels: LabelSet, value: number): void {
    const state = this.stateFor(labels);
    state.count += 1;
    state.sum += value;
    this.buckets.forEach((bound, index) => {
      if (value <= bound) {
        state.bucketCounts[index] = (state.bucketCounts[index] ?? 0) + 1;
      }
    });
  }

  protected initialState(): HistogramState {
    return { count: 0, sum: 0, bucketCounts: this.buckets.map(() => 0) };
  }

  protected renderSeries(labels: LabelSet, state: HistogramState): string[] {
    const lines = this.buckets.map(
      (bound, index) =>
        `${this.name}_bucket${formatLabels({ ...labels, le: String(bound) })} ${state.bucketCounts[index] ?? 0}`,
    );
    lines.push(`${this.name}_bucket${formatLabels({ ...labels, le: "+Inf" })} ${state.count}`);
    lines.push(`${this.name}_sum${formatLabels(labels)} ${state.sum}`);
    lines.push(`${this.name}_count${formatLabels(labels)} ${state.count}`);
    return lines;
  }
}

class GaugeMetric {
  private value = 0;

  constructor(
    private readonly name: string,
    private readonly help: string,
  ) {}

  set(value: number): void {
    this.value = value;
  }

  render(): string[] {
    return [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} gauge`, `${this.name} ${this.value}`];
  }
}

export class SmartPayMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "smartpay_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "smartpay_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly idempotencyReplays = new CounterMetric(
    "smartpay_idempotency_replays_total",
    "Total number of requests answered as idempotent replays by operation.",
    ["operation"],
  );
  private readonly notificationsPublished = new CounterMetric(
    "smartpay_notifications_published_total",
    "Total number of tenant notifications published by topic.",
    ["topic"],
  );
  private readonly webhookAttempts = new CounterMetric(
    "smartpay_webhook_delivery_attempts_total",
    "Total number of webhook delivery attempts by outcome.",
    ["outcome"],
  );
  private readonly webhookAttemptDuration = new HistogramMetric(
    "smartpay_webhook_delivery_duration_seconds",
    "Webhook delivery attempt duration in seconds by outcome.",
    ["outcome"],
    [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  );
  private readonly outboxDepth = new GaugeMetric(
    "smartpay_webhook_outbox_depth",
    "Number of envelopes waiting in the webhook outbox.",
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordIdempotencyReplay(operation: string): void {
    this.idempotencyReplays.inc({ operation });
  }

  recordNotificationPublished(topic: string): void {
    this.notificationsPublished.inc({ topic });
  }

  recordWebhookAttempt(outcome: WebhookDeliveryOutcome, durationSeconds: number): void {
    this.webhookAttempts.inc({ outcome });
    this.webhookAttemptDuration.observe({ outcome }, durationSeconds);
  }

  setOutboxDepth(depth: number): void {
    this.outboxDepth.set(depth);
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.idempotencyReplays.render(),
      ...this.notificationsPublished.render(),
      ...this.webhookAttempts.render(),
      ...this.webhookAttemptDuration.render(),
      ...this.outboxDepth.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
