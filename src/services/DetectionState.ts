/**
 * The only shared mutable state of the detector: the result cache and the
 * counters. One instance is created in the container and handed by
 * reference to every service that needs it.
 */

import type { ICounterStore } from '../stores/ICounterStore.js';
import type { IResultCache } from '../stores/IResultCache.js';

export const METRIC = {
  detections: 'detections_total',
  cacheHits: 'cache_hits_total',
  modelCalls: 'model_calls_total',
  modelFailures: 'model_failures_total',
  httpRequests: 'http_requests_total',
  httpDuration: 'http_request_duration_ms',
} as const;

export class DetectionState {
  constructor(
    readonly cache: IResultCache,
    readonly counters: ICounterStore
  ) {}
}
