/**
 * HS-code endpoints.
 * GET /api/v1/hscodes?q=&limit= — Search the catalog
 * GET /api/v1/hscodes/:code     — Validate a code, with suggestions
 */

import { ValidationError } from '../errors.js';
import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { HsCodeEntry } from '../services/HsCodeCatalog.js';
import type { HsCodeItemResponse, HsCodeValidationResponse } from '../types/api.js';
import { success } from './respond.js';

const DEFAULT_LIMIT = 10;
const MAX_LIMIT = 50;

function toItem(entry: HsCodeEntry): HsCodeItemResponse {
  return { hscode: entry.hscode, en: entry.en, ja: entry.ja, zh: entry.zh };
}

function parseLimit(raw: string | null): number {
  if (raw === null || raw.trim() === '') return DEFAULT_LIMIT;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIMIT}`);
  }
  return limit;
}

export function createHsCodeHandlers(container: Container) {
  const search: Handler = pipeline(
    container.logging('hscodes'),
    errorHandler,
    container.authenticate
  )(async (req) => {
    const url = new URL(req.url);
    const q = url.searchParams.get('q')?.trim();
    if (!q) {
      throw new ValidationError("Query parameter 'q' is required");
    }

    const items = container.hsCodeCatalog.search(q, parseLimit(url.searchParams.get('limit'))).map(toItem);
    return success({ items, total: items.length });
  });

  const validate: Handler = pipeline(
    container.logging('hscode'),
    errorHandler,
    container.authenticate
  )(async (req) => {
    const url = new URL(req.url);
    const parts = url.pathname.split('/').filter((p) => p.length > 0);
    let code: string;
    try {
      code = decodeURIComponent(parts[parts.length - 1]);
    } catch {
      throw new ValidationError('Malformed HS code in path');
    }

    const validation = container.hsCodeCatalog.getValidated(code);
    const data: HsCodeValidationResponse = {
      original: validation.original,
      is_valid: validation.isValid,
      matched_item: validation.matchedItem ? toItem(validation.matchedItem) : null,
      suggestions: validation.suggestions.map(toItem),
    };
    return success(data);
  });

  return { search, validate };
}
