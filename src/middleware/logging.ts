/**
 * Request log and HTTP metrics, from one timing per request.
 *
 * Each request yields a RequestLogEvent tagged with its endpoint, plus
 * http_requests_total{endpoint,status} and http_request_duration_ms{endpoint}.
 * A detection summary left on the context by the handler is appended to
 * the log line ("[cache, gpt-4o-mini]", "[3 items, 1 failed, gpt-4o-mini]").
 *
 * 2xx → info, 4xx → warn, 5xx or a thrown handler → error (re-thrown, counted as 500).
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import { METRIC } from '../services/DetectionState.js';
import type { ICounterStore } from '../stores/ICounterStore.js';
import type { DetectionSummary } from '../types/models.js';
import type { Handler, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

function describe(detection: DetectionSummary | undefined): string {
  if (!detection) return '';
  if (detection.kind === 'single') return ` [${detection.source}, ${detection.model}]`;
  return ` [${detection.total} items, ${detection.failed} failed, ${detection.model}]`;
}

/** One middleware per endpoint label, all sharing the log sink and counters. */
export function createRequestLogging(
  logProvider: ILogProvider,
  counters: ICounterStore
): (endpoint: string) => Middleware {
  return (endpoint) =>
    (next: Handler): Handler =>
      async (req, ctx) => {
        const method = req.method;
        const path = new URL(req.url).pathname;
        const start = performance.now();
        let status = 500;
        let thrown: string | undefined;

        try {
          const response = await next(req, ctx);
          status = response.status;
          return response;
        } catch (err) {
          thrown = err instanceof Error ? err.message : String(err);
          throw err;
        } finally {
          const elapsed = performance.now() - start;
          counters.increment(METRIC.httpRequests, { endpoint, status: String(status) });
          counters.observe(METRIC.httpDuration, elapsed, { endpoint });

          const durationMs = Math.round(elapsed);
          const event: RequestLogEvent = {
            level: thrown === undefined ? levelForStatus(status) : 'error',
            message: `${method} ${path} → ${status} (${durationMs}ms)${describe(ctx.detection)}`,
            method,
            path,
            endpoint,
            status,
            durationMs,
            ...(ctx.client && { clientId: ctx.client.id }),
            ...(ctx.detection && { detection: ctx.detection }),
            ...(thrown !== undefined && { fields: { error: thrown } }),
          };
          logProvider.log(event);
        }
      };
}
