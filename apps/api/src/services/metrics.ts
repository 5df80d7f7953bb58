import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export interface MetricsOptions {
  collectDefaults?: boolean;
}

export class MetricsService {
  readonly registry: Registry;
  readonly checksTotal: Counter;
  readonly deniedTotal: Counter;
  readonly failOpenTotal: Counter;
  readonly storeErrorsTotal: Counter;
  readonly eventPublishErrorsTotal: Counter;
  readonly rulesLoaded: Gauge;
  readonly latencyMs: Histogram;

  constructor(options: MetricsOptions = {}) {
    this.registry = new Registry();
    if (options.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry, prefix: "tollgate_" });
    }

    this.checksTotal = new Counter({
      name: "ratelimit_checks_total",
      help: "Total number of rate limit checks by outcome",
      labelNames: ["operation", "scope", "outcome"],
      registers: [this.registry]
    });

    this.deniedTotal = new Counter({
      name: "ratelimit_denied_total",
      help: "Total number of denied checks",
      labelNames: ["operation", "scope"],
      registers: [this.registry]
    });

    this.failOpenTotal = new Counter({
      name: "ratelimit_fail_open_total",
      help: "Checks admitted because the limiter could not decide",
      labelNames: ["operation", "reason"],
      registers: [this.registry]
    });

    this.storeErrorsTotal = new Counter({
      name: "ratelimit_store_errors_total",
      help: "Bucket store failures",
      labelNames: ["store", "reason"],
      registers: [this.registry]
    });

    this.eventPublishErrorsTotal = new Counter({
      name: "ratelimit_event_publish_errors_total",
      help: "Observability events that could not be published",
      labelNames: ["type"],
      registers: [this.registry]
    });

    this.rulesLoaded = new Gauge({
      name: "ratelimit_rules_loaded",
      help: "Number of rules in the active rule set",
      registers: [this.registry]
    });

    this.latencyMs = new Histogram({
      name: "ratelimit_latency_ms",
      help: "Rate limit check latency in milliseconds",
      buckets: [0.25, 0.5, 1, 2, 3, 5, 10, 25, 50],
      labelNames: ["operation", "outcome"],
      registers: [this.registry]
    });
  }

  async getMetricsText(): Promise<string> {
    return this.registry.metrics();
  }
}
