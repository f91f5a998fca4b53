import type { DecisionState } from "../contracts/evidence";

export const DEFAULT_METRICS_WINDOW = 2000;

/**
 * Linear-interpolation percentile. Empty input yields null;
 * p <= 0 is the minimum and p >= 100 the maximum.
 */
export function percentile(values: readonly number[], p: number): number | null {
  if (values.length === 0) return null;

  const sorted = [...values].sort((a, b) => a - b);
  const last = sorted.length - 1;
  if (p <= 0) return sorted[0];
  if (p >= 100) return sorted[last];

  const rank = (p / 100) * last;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  const weight = rank - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

/**
 * Fixed-capacity FIFO of latency samples; the oldest sample is overwritten first.
 */
export class LatencyWindow {
  private readonly buffer: Float64Array;
  private next = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    this.buffer = new Float64Array(Math.max(1, Math.floor(capacity)));
  }

  push(value: number): void {
    this.buffer[this.next] = value;
    this.next = (this.next + 1) % this.buffer.length;
    if (this.size < this.buffer.length) this.size += 1;
  }

  get length(): number {
    return this.size;
  }

  values(): number[] {
    if (this.size < this.buffer.length) {
      return Array.from(this.buffer.subarray(0, this.size));
    }
    return [
      ...Array.from(this.buffer.subarray(this.next)),
      ...Array.from(this.buffer.subarray(0, this.next)),
    ];
  }
}

export type MetricsSample = {
  decisionState: DecisionState;
  latencyMs: number;
  llmUsed?: boolean | null;
  outOfScopeHit?: boolean;
};

export type MetricsSnapshot = {
  window_size: number;
  samples: number;
  total_analyses: number;
  decision_counts: Record<DecisionState, number>;
  decision_rates: Record<DecisionState, number>;
  llm_used_true: number;
  llm_used_rate: number;
  oos_hits: number;
  oos_rate: number;
  latency_ms: {
    p50: number | null;
    p95: number | null;
    p99: number | null;
    max: number | null;
  };
};

const rate = (count: number, total: number) => (total === 0 ? 0 : count / total);

export class MetricsAggregator {
  private readonly window: LatencyWindow;
  private readonly decisionCounts: Record<DecisionState, number> = { ALLOW: 0, GUIDE: 0, BLOCK: 0 };
  private total = 0;
  private llmUsedTrue = 0;
  private oosHits = 0;

  constructor(opts: { windowSize?: number } = {}) {
    this.window = new LatencyWindow(opts.windowSize ?? DEFAULT_METRICS_WINDOW);
  }

  /**
   * O(1). Counters are monotonic for the life of the process.
   */
  record(sample: MetricsSample): void {
    this.total += 1;
    this.decisionCounts[sample.decisionState] += 1;
    if (sample.llmUsed === true) this.llmUsedTrue += 1;
    if (sample.outOfScopeHit) this.oosHits += 1;

    if (Number.isFinite(sample.latencyMs)) {
      this.window.push(Math.max(0, sample.latencyMs));
    }
  }

  get totalAnalyses(): number {
    return this.total;
  }

  percentile(p: number): number | null {
    return percentile(this.window.values(), p);
  }

  snapshot(): MetricsSnapshot {
    const values = this.window.values();
    const total = this.total;

    return {
      window_size: this.window.capacity,
      samples: values.length,
      total_analyses: total,
      decision_counts: { ...this.decisionCounts },
      decision_rates: {
        ALLOW: rate(this.decisionCounts.ALLOW, total),
        GUIDE: rate(this.decisionCounts.GUIDE, total),
        BLOCK: rate(this.decisionCounts.BLOCK, total),
      },
      llm_used_true: this.llmUsedTrue,
      llm_used_rate: rate(this.llmUsedTrue, total),
      oos_hits: this.oosHits,
      oos_rate: rate(this.oosHits, total),
      latency_ms: {
        p50: percentile(values, 50),
        p95: percentile(values, 95),
        p99: percentile(values, 99),
        max: percentile(values, 100),
      },
    };
  }
}
