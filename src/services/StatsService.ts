/**
 * Stats and cache administration.
 */

import type { ILogProvider } from '../providers/ILogProvider.js';
import type { StatsResponse } from '../types/api.js';
import type { CounterSnapshot, Labels } from '../stores/ICounterStore.js';
import { METRIC, type DetectionState } from './DetectionState.js';

export class StatsService {
  constructor(
    private readonly state: DetectionState,
    private readonly logger: ILogProvider
  ) {}

  snapshot(): StatsResponse {
    const { cache, counters } = this.state;

    let errors = 0;
    for (const sample of counters.snapshot().counters) {
      if (sample.name === METRIC.httpRequests && Number(sample.labels.status) >= 400) {
        errors += sample.value;
      }
    }

    return {
      cache: { size: cache.size, maxEntries: cache.maxEntries },
      counters: {
        requests: counters.total(METRIC.httpRequests),
        cache_hits: counters.get(METRIC.cacheHits),
        ai_calls: counters.get(METRIC.modelCalls),
        fallbacks: counters.get(METRIC.detections, { source: 'fallback' }),
        errors,
      },
    };
  }

  /** Empty the result cache. Returns how many entries were removed. */
  clearCache(): number {
    const cleared = this.state.cache.clear();
    this.logger.info('Result cache cleared', { cleared });
    return cleared;
  }

  /** Counters and summaries in Prometheus text exposition format. */
  renderMetrics(): string {
    return renderPrometheus(this.state.counters.snapshot(), {
      cache_entries: this.state.cache.size,
    });
  }
}

function formatLabels(labels: Labels): string {
  const keys = Object.keys(labels).sort();
  if (keys.length === 0) return '';
  const parts = keys.map((k) => `${k}="${labels[k].replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`);
  return `{${parts.join(',')}}`;
}

export function renderPrometheus(snapshot: CounterSnapshot, gauges: Record<string, number> = {}): string {
  const lines: string[] = [];

  const byName = <T extends { name: string }>(samples: T[]): Map<string, T[]> => {
    const grouped = new Map<string, T[]>();
    for (const sample of samples) {
      const group = grouped.get(sample.name) ?? [];
      group.push(sample);
      grouped.set(sample.name, group);
    }
    return new Map([...grouped.entries()].sort(([a], [b]) => a.localeCompare(b)));
  };

  for (const [name, samples] of byName(snapshot.counters)) {
    lines.push(`# TYPE ${name} counter`);
    for (const s of samples) lines.push(`${name}${formatLabels(s.labels)} ${s.value}`);
  }
  for (const [name, samples] of byName(snapshot.summaries)) {
    lines.push(`# TYPE ${name} summary`);
    for (const s of samples) {
      lines.push(`${name}_count${formatLabels(s.labels)} ${s.count}`);
      lines.push(`${name}_sum${formatLabels(s.labels)} ${s.sum}`);
    }
  }
  for (const [name, value] of Object.entries(gauges)) {
    lines.push(`# TYPE ${name} gauge`);
    lines.push(`${name} ${value}`);
  }

  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
