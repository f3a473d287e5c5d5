const PERCENTILES = [50, 95, 99] as const;

function percentile(sorted: number[], p: number): number {
  return sorted[Math.floor(sorted.length * (p / 100))] ?? 0;
}

/**
 * In-process counters and duration samples, exposed on GET /api/metrics.
 */
export class MetricsService {
  private counters = new Map<string, number>();
  private durations = new Map<string, number[]>();

  constructor(private readonly maxSamples = 1000) {}

  increment(name: string, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  recordDuration(name: string, ms: number): void {
    const samples = this.durations.get(name) ?? [];
    samples.push(ms);
    if (samples.length > this.maxSamples) samples.shift();
    this.durations.set(name, samples);
  }

  getMetrics(): Record<string, number> {
    const result: Record<string, number> = Object.fromEntries(this.counters);

    for (const [name, samples] of this.durations) {
      if (samples.length === 0) continue;
      const sorted = [...samples].sort((a, b) => a - b);
      for (const p of PERCENTILES) {
        result[`${name}_p${p}`] = percentile(sorted, p);
      }
    }

    return result;
  }

  reset(): void {
    this.counters.clear();
    this.durations.clear();
  }
}

export const metrics = new MetricsService();
