const LATENCY_BUCKETS_MS = [250, 500, 1000, 2000, 5000, 10000, 30000, 60000];

interface CallCounters {
  total: number;
  ok: number;
  status_4xx: number;
  status_5xx: number;
  status_429: number;
  network: number;
  retries: number;
  chunk_shrinks: number;
}

/**
 * Per-run LLM call counters and a coarse latency histogram, summarised in the
 * run's final log line.
 */
export class RunMetrics {
  private readonly counters: CallCounters = {
    total: 0,
    ok: 0,
    status_4xx: 0,
    status_5xx: 0,
    status_429: 0,
    network: 0,
    retries: 0,
    chunk_shrinks: 0,
  };
  private latencyCount = 0;
  private latencySumMs = 0;
  private readonly latencyHistogram = new Array<number>(LATENCY_BUCKETS_MS.length + 1).fill(0);
  private inputTokens = 0;
  private outputTokens = 0;

  /** `status` is null for calls that failed before an HTTP status was seen. */
  recordCall(status: number | null, latencyMs: number): void {
    this.counters.total += 1;
    if (status == null) this.counters.network += 1;
    else if (status >= 200 && status < 300) this.counters.ok += 1;
    else if (status >= 400 && status < 500) this.counters.status_4xx += 1;
    else if (status >= 500) this.counters.status_5xx += 1;
    if (status === 429) this.counters.status_429 += 1;
    this.observeLatency(latencyMs);
  }

  recordRetry(shrunk: boolean): void {
    this.counters.retries += 1;
    if (shrunk) this.counters.chunk_shrinks += 1;
  }

  recordUsage(usage: { input_tokens: number; output_tokens: number }): void {
    this.inputTokens += usage.input_tokens;
    this.outputTokens += usage.output_tokens;
  }

  private observeLatency(ms: number): void {
    this.latencyCount += 1;
    this.latencySumMs += ms;
    const idx = LATENCY_BUCKETS_MS.findIndex((limit) => ms <= limit);
    const bucketIndex = idx >= 0 ? idx : LATENCY_BUCKETS_MS.length;
    this.latencyHistogram[bucketIndex] += 1;
  }

  private estimatePercentile(p: number): number {
    if (this.latencyCount <= 0) return 0;
    const target = Math.max(1, Math.ceil(this.latencyCount * p));
    let running = 0;
    for (let i = 0; i < this.latencyHistogram.length; i += 1) {
      running += this.latencyHistogram[i];
      if (running >= target) {
        return i < LATENCY_BUCKETS_MS.length ? LATENCY_BUCKETS_MS[i] : LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1];
      }
    }
    return LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1];
  }

  snapshot() {
    return {
      counters: { ...this.counters },
      usage: { input_tokens: this.inputTokens, output_tokens: this.outputTokens },
      latency: {
        count: this.latencyCount,
        avg_ms: this.latencyCount > 0 ? Math.round((this.latencySumMs / this.latencyCount) * 100) / 100 : 0,
        p50_ms_upper_bound: this.estimatePercentile(0.5),
        p95_ms_upper_bound: this.estimatePercentile(0.95),
      },
    };
  }
}
