/**
 * Domain models — attribute records as the detector understands them.
 * Decoupled from the wire shapes in api.ts.
 */

import type { AppError } from '../errors.js';

// ── Attributes ──

export const ATTRIBUTE_NAMES = [
  'country',
  'size',
  'material',
  'brand',
  'target_user',
  'hscode',
  'color',
] as const;

export type AttributeName = (typeof ATTRIBUTE_NAMES)[number];

/** Attributes whose value is an ordered list rather than a single string. */
export type ListAttributeName = 'country' | 'target_user';

export const TARGET_USERS = [
  'children',
  'adult',
  'men',
  'women',
  'senior',
  'baby',
  'unisex',
] as const;

export type AttributeValue = string | readonly string[];

export interface AttributeField {
  /** Extracted value; `[]` or `"none"` when unknown. */
  value: AttributeValue;
  /** Source text the value was taken from, or `"none"`. */
  evidence: string;
  /** Certainty in [0, 1]. Zero only for the unknown sentinel. */
  confidence: number;
}

export type AttributeSet = Readonly<Partial<Record<AttributeName, Readonly<AttributeField>>>>;

export type CountryCodeFormat = 'alpha2' | 'alpha3';

// ── Detection ──

export interface DetectionRequest {
  title?: string;
  description?: string;
  /** Caller-supplied model. Must be paired with apiKey. */
  model?: string;
  /** Caller-supplied model credential. Must be paired with model. */
  apiKey?: string;
}

/**
 * Where a result came from.
 *   cache     — served from the result cache
 *   model     — parsed from a successful model call
 *   fallback  — the model failed recoverably; heuristic result
 *   heuristic — nothing left after normalization; the model was not called
 */
export type DetectionSource = 'cache' | 'model' | 'fallback' | 'heuristic';

export interface DetectionResult {
  attributes: AttributeSet;
  cache: boolean;
  source: DetectionSource;
  /** Effective model identifier used for the fingerprint. */
  model: string;
  /** True when the caller supplied its own model and credential. */
  isCustom: boolean;
  timeMs: number;
}

export interface BatchItemInput {
  title?: string;
  description?: string;
}

export interface BatchRequest {
  items: BatchItemInput[];
  model?: string;
  apiKey?: string;
}

export type BatchItemOutcome =
  | { index: number; ok: true; result: DetectionResult }
  | { index: number; ok: false; error: AppError };

export interface BatchResult {
  items: BatchItemOutcome[];
  total: number;
  cacheHits: number;
  aiCalls: number;
  fallbacks: number;
  failed: number;
  model: string;
  isCustom: boolean;
  timeMs: number;
}

/** What a detection request produced, as reported in the request log. */
export type DetectionSummary =
  | { kind: 'single'; model: string; isCustom: boolean; source: DetectionSource }
  | {
      kind: 'batch';
      model: string;
      isCustom: boolean;
      total: number;
      cacheHits: number;
      fallbacks: number;
      failed: number;
    };

// ── Clients ──

/** A caller authenticated by service API key. */
export interface ApiClient {
  /** Short, non-reversible fingerprint of the key, safe to log. */
  id: string;
}
