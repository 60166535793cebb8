/**
 * Counter store interface.
 * Process-local counters and summaries, rendered on /metrics.
 */

export type Labels = Record<string, string>;

export interface CounterSample {
  name: string;
  labels: Labels;
  value: number;
}

export interface SummarySample {
  name: string;
  labels: Labels;
  count: number;
  sum: number;
}

export interface CounterSnapshot {
  counters: CounterSample[];
  summaries: SummarySample[];
}

export interface ICounterStore {
  increment(name: string, labels?: Labels, by?: number): void;

  /** Record one observation into a summary (count and sum). */
  observe(name: string, value: number, labels?: Labels): void;

  /** Current counter value for exactly these labels; 0 when never incremented. */
  get(name: string, labels?: Labels): number;

  /** Sum of a counter over every label combination. */
  total(name: string): number;

  snapshot(): CounterSnapshot;
}
