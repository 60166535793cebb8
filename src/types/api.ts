/**
 * API types — shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 * Field names are snake_case on the wire.
 */

import type { AttributeSet, DetectionSource } from './models.js';

// ── Requests ──

export interface DetectRequestBody {
  title?: string;
  description?: string;
  model?: string;
  api_key?: string;
}

export interface BatchDetectRequestBody {
  items?: Array<{ title?: string; description?: string }>;
  /** Plain description list, each mapped to an item with only a description. */
  descriptions?: string[];
  model?: string;
  api_key?: string;
}

// ── Responses ──

export type ResultStatus = 'OK' | 'Partial' | 'Failed';

export interface SuccessEnvelope<T> {
  result: Exclude<ResultStatus, 'Failed'>;
  data: T;
}

export interface DetectResponseData {
  attributes: AttributeSet;
  cache: boolean;
  source: DetectionSource;
  model: string;
  is_custom: boolean;
  /** Processing time in milliseconds. */
  time: number;
}

export type BatchResultItem =
  | { attributes: AttributeSet; cache: boolean; source: DetectionSource }
  | { error: ErrorEnvelope };

export interface BatchResponseData {
  results: BatchResultItem[];
  total: number;
  cache_hits: number;
  ai_calls: number;
  fallbacks: number;
  failed: number;
  model: string;
  is_custom: boolean;
  time: number;
}

export interface HealthResponse {
  status: 'healthy';
  service: string;
  version: string;
}

export interface StatsResponse {
  cache: {
    size: number;
    maxEntries: number;
  };
  counters: {
    requests: number;
    cache_hits: number;
    ai_calls: number;
    fallbacks: number;
    errors: number;
  };
}

export interface HsCodeItemResponse {
  hscode: string;
  en: string;
  ja: string;
  zh: string;
}

export interface HsCodeValidationResponse {
  original: string;
  is_valid: boolean;
  matched_item: HsCodeItemResponse | null;
  suggestions: HsCodeItemResponse[];
}

// ── Errors ──

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'AUTH_ERROR'
  | 'QUOTA_ERROR'
  | 'MODEL_NOT_FOUND'
  | 'NOT_FOUND'
  | 'METHOD_NOT_ALLOWED'
  | 'INIT_ERROR'
  | 'INTERNAL_ERROR';

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  result: 'Failed';
  errors: ErrorEnvelope[];
}
