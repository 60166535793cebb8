/**
 * Batch Coordinator
 *
 * Runs many detections through a bounded worker pool. Each item owns the
 * slot at its input index, so output order is input order whatever order
 * the model calls finish in. Item errors stay in their slot.
 */

import { AppError, InternalError, ValidationError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { BatchItemOutcome, BatchRequest, BatchResult, DetectionSource } from '../types/models.js';
import { preview, resolveOverride, type DetectionService } from './DetectionService.js';

export const DEFAULT_BATCH_CONCURRENCY = 8;
export const DEFAULT_BATCH_MAX_ITEMS = 100;

/** Error codes that mean the model was called and rejected the request. */
const MODEL_ERROR_CODES: ReadonlySet<string> = new Set([
  'AUTH_ERROR',
  'QUOTA_ERROR',
  'MODEL_NOT_FOUND',
]);

const MODEL_SOURCES: ReadonlySet<DetectionSource> = new Set<DetectionSource>(['model', 'fallback']);

export interface BatchServiceOptions {
  concurrency?: number;
  maxItems?: number;
}

export class BatchService {
  private readonly concurrency: number;
  private readonly maxItems: number;

  constructor(
    private readonly detection: DetectionService,
    private readonly logger: ILogProvider,
    options?: BatchServiceOptions
  ) {
    this.concurrency = options?.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
    this.maxItems = options?.maxItems ?? DEFAULT_BATCH_MAX_ITEMS;
  }

  async detectBatch(request: BatchRequest): Promise<BatchResult> {
    const started = Date.now();
    const { items } = request;

    if (items.length === 0) {
      throw new ValidationError('At least one item is required');
    }
    if (items.length > this.maxItems) {
      throw new ValidationError(`Too many items: at most ${this.maxItems} per batch`, {
        maxItems: this.maxItems,
        received: items.length,
      });
    }
    const override = resolveOverride(request.model, request.apiKey);

    const slots = new Array<BatchItemOutcome>(items.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        slots[index] = await this.runItem(index, request);
      }
    };

    const workers = Math.min(this.concurrency, items.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    let cacheHits = 0;
    let aiCalls = 0;
    let fallbacks = 0;
    let failed = 0;
    for (const slot of slots) {
      if (slot.ok) {
        if (slot.result.source === 'cache') cacheHits++;
        if (MODEL_SOURCES.has(slot.result.source)) aiCalls++;
        if (slot.result.source === 'fallback') fallbacks++;
      } else {
        failed++;
        if (MODEL_ERROR_CODES.has(slot.error.code)) aiCalls++;
      }
    }

    const result: BatchResult = {
      items: slots,
      total: items.length,
      cacheHits,
      aiCalls,
      fallbacks,
      failed,
      model: this.detection.effectiveModel(override),
      isCustom: override !== null,
      timeMs: Date.now() - started,
    };

    this.logger.info('Batch detection complete', {
      total: result.total,
      cacheHits,
      aiCalls,
      fallbacks,
      failed,
      timeMs: result.timeMs,
    });
    return result;
  }

  private async runItem(index: number, request: BatchRequest): Promise<BatchItemOutcome> {
    const item = request.items[index];
    try {
      const result = await this.detection.detect({
        title: item.title,
        description: item.description,
        model: request.model,
        apiKey: request.apiKey,
      });
      return { index, ok: true, result };
    } catch (err) {
      if (err instanceof AppError) {
        return { index, ok: false, error: err };
      }
      this.logger.error('Unexpected error in batch item', {
        index,
        error: err instanceof Error ? err.message : String(err),
        preview: preview(item.description ?? item.title ?? ''),
      });
      return { index, ok: false, error: new InternalError() };
    }
  }
}
