/**
 * Detection endpoints.
 * POST /api/v1/detect       — Detect attributes of one product description
 * POST /api/v1/detect/batch — Detect attributes of many descriptions
 */

import { ValidationError, type AppError } from '../errors.js';
import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type {
  BatchDetectRequestBody,
  BatchResponseData,
  BatchResultItem,
  DetectRequestBody,
  DetectResponseData,
} from '../types/api.js';
import type { BatchItemInput, BatchResult } from '../types/models.js';
import { success } from './respond.js';

const MAX_TEXT_LENGTH = 50_000;

const overrideFields: BodySchema = {
  model: { type: 'string', required: false, maxLength: 200 },
  api_key: { type: 'string', required: false, maxLength: 500 },
};

const detectSchema: BodySchema = {
  title: { type: 'string', required: false, maxLength: MAX_TEXT_LENGTH },
  description: { type: 'string', required: false, maxLength: MAX_TEXT_LENGTH },
  ...overrideFields,
};

const batchSchema: BodySchema = {
  items: { type: 'array', required: false, items: 'object' },
  descriptions: { type: 'array', required: false, items: 'string' },
  ...overrideFields,
};

const TERMINAL_CODES: ReadonlySet<string> = new Set(['AUTH_ERROR', 'QUOTA_ERROR', 'MODEL_NOT_FOUND']);

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  return value;
}

function toBatchItems(body: BatchDetectRequestBody): BatchItemInput[] {
  if (body.items !== undefined) {
    return body.items.map((item, i) => ({
      title: optionalString(item.title, `items[${i}].title`),
      description: optionalString(item.description, `items[${i}].description`),
    }));
  }
  if (body.descriptions !== undefined) {
    return body.descriptions.map((description) => ({ description }));
  }
  throw new ValidationError("Either 'items' or 'descriptions' is required");
}

/** Every slot failed with one terminal model error: the batch answers as that error. */
function sharedTerminalError(result: BatchResult): AppError | undefined {
  const first = result.items[0];
  if (!first || first.ok || !TERMINAL_CODES.has(first.error.code)) return undefined;
  const allSame = result.items.every((slot) => !slot.ok && slot.error.code === first.error.code);
  return allSame ? first.error : undefined;
}

export function createDetectHandlers(container: Container) {
  const detect: Handler = pipeline(
    container.logging('detect'),
    errorHandler,
    container.authenticate,
    validateBody(detectSchema)
  )(async (req, ctx) => {
    const body = await req.json() as DetectRequestBody;

    const result = await container.detectionService.detect({
      title: body.title,
      description: body.description,
      model: body.model,
      apiKey: body.api_key,
    });
    ctx.detection = {
      kind: 'single',
      model: result.model,
      isCustom: result.isCustom,
      source: result.source,
    };

    const data: DetectResponseData = {
      attributes: result.attributes,
      cache: result.cache,
      source: result.source,
      model: result.model,
      is_custom: result.isCustom,
      time: result.timeMs,
    };
    return success(data);
  });

  const batch: Handler = pipeline(
    container.logging('detect_batch'),
    errorHandler,
    container.authenticate,
    validateBody(batchSchema)
  )(async (req, ctx) => {
    const body = await req.json() as BatchDetectRequestBody;

    const result = await container.batchService.detectBatch({
      items: toBatchItems(body),
      model: body.model,
      apiKey: body.api_key,
    });
    ctx.detection = {
      kind: 'batch',
      model: result.model,
      isCustom: result.isCustom,
      total: result.total,
      cacheHits: result.cacheHits,
      fallbacks: result.fallbacks,
      failed: result.failed,
    };

    const terminal = sharedTerminalError(result);
    if (terminal) throw terminal;

    const results: BatchResultItem[] = result.items.map((slot) =>
      slot.ok
        ? {
            attributes: slot.result.attributes,
            cache: slot.result.cache,
            source: slot.result.source,
          }
        : { error: { code: slot.error.code, message: slot.error.message } }
    );

    const data: BatchResponseData = {
      results,
      total: result.total,
      cache_hits: result.cacheHits,
      ai_calls: result.aiCalls,
      fallbacks: result.fallbacks,
      failed: result.failed,
      model: result.model,
      is_custom: result.isCustom,
      time: result.timeMs,
    };
    return success(data, result.failed > 0 ? 'Partial' : 'OK');
  });

  return { detect, batch };
}
