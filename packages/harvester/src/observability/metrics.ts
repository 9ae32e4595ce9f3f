type MetricSnapshot = {
  counters: Record<string, number>;
  durations: {
    count: number;
    min: number;
    max: number;
    avg: number;
    total: number;
  };
};

type MetricsLogger = {
  info: (msg: string, data?: string) => void;
};

/** Query counters and latencies for one harvest run. */
export class HarvestMetrics {
  private readonly counters: Map<string, number>;
  private durationCount: number;
  private durationTotal: number;
  private durationMin: number;
  private durationMax: number;

  constructor() {
    this.counters = new Map();
    this.durationCount = 0;
    this.durationTotal = 0;
    this.durationMin = Number.POSITIVE_INFINITY;
    this.durationMax = 0;
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  count(counter: string): number {
    return this.counters.get(counter) ?? 0;
  }

  // Aggregates only, samples are not kept
  recordDuration(ms: number): void {
    this.durationCount += 1;
    this.durationTotal += ms;
    this.durationMin = Math.min(this.durationMin, ms);
    this.durationMax = Math.max(this.durationMax, ms);
  }

  snapshot(): MetricSnapshot {
    const counters: Record<string, number> = {};
    for (const [key, value] of this.counters) {
      counters[key] = value;
    }

    const count = this.durationCount;
    const total = this.durationTotal;
    const min = count > 0 ? this.durationMin : 0;
    const max = count > 0 ? this.durationMax : 0;
    const avg = count > 0 ? total / count : 0;

    return {
      counters,
      durations: { count, min, max, avg, total },
    };
  }

  log(logger: MetricsLogger, phase: string): void {
    logger.info(`[Metrics] ${phase}`, JSON.stringify(this.snapshot()));
  }
}

export type { MetricSnapshot, MetricsLogger };
