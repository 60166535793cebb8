import type {
  CounterSample,
  CounterSnapshot,
  ICounterStore,
  Labels,
  SummarySample,
} from './ICounterStore.js';

function seriesKey(name: string, labels: Labels): string {
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`);
  return `${name}{${parts.join(',')}}`;
}

export class InMemoryCounterStore implements ICounterStore {
  private readonly counters = new Map<string, CounterSample>();
  private readonly summaries = new Map<string, SummarySample>();

  increment(name: string, labels: Labels = {}, by = 1): void {
    const key = seriesKey(name, labels);
    const existing = this.counters.get(key);
    if (existing) {
      existing.value += by;
    } else {
      this.counters.set(key, { name, labels: { ...labels }, value: by });
    }
  }

  observe(name: string, value: number, labels: Labels = {}): void {
    const key = seriesKey(name, labels);
    const existing = this.summaries.get(key);
    if (existing) {
      existing.count += 1;
      existing.sum += value;
    } else {
      this.summaries.set(key, { name, labels: { ...labels }, count: 1, sum: value });
    }
  }

  get(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  total(name: string): number {
    let sum = 0;
    for (const sample of this.counters.values()) {
      if (sample.name === name) sum += sample.value;
    }
    return sum;
  }

  snapshot(): CounterSnapshot {
    return {
      counters: [...this.counters.values()].map((s) => ({ ...s, labels: { ...s.labels } })),
      summaries: [...this.summaries.values()].map((s) => ({ ...s, labels: { ...s.labels } })),
    };
  }
}
