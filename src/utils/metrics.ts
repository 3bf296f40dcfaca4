const counters = new Map<string, number>();
const gauges = new Map<string, number>();

export function incrementCounter(name: string, by = 1): void {
  counters.set(name, (counters.get(name) ?? 0) + by);
}

export function setGauge(name: string, value: number): void {
  gauges.set(name, value);
}

export function getCounter(name: string): number {
  return counters.get(name) ?? 0;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
}

export function snapshot(): MetricsSnapshot {
  return {
    counters: Object.fromEntries(counters),
    gauges: Object.fromEntries(gauges),
  };
}

export function resetMetrics(): void {
  counters.clear();
  gauges.clear();
}
