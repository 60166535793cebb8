/**
 * Model reply parser.
 * Turns raw reply text into a validated AttributeSet. Anything that is not a
 * JSON object with an `attributes` object is a parse failure; individual
 * malformed attributes become unknown fields instead.
 */

import { ModelProviderError } from '../providers/IModelProvider.js';
import {
  ModelResponseSchema,
  RawAttributeFieldSchema,
  type RawAttributeField,
} from '../schemas/ModelResponseSchema.js';
import {
  TARGET_USERS,
  type AttributeField,
  type AttributeName,
  type AttributeSet,
  type CountryCodeFormat,
} from '../types/models.js';
import { freezeAttributes, makeField, unknownField } from './attributes.js';
import type { CountryCatalog } from './CountryCatalog.js';
import { hsDigits, type HsCodeCatalog } from './HsCodeCatalog.js';
import { squash } from './patterns.js';

const ALLOWED_TARGET_USERS: ReadonlySet<string> = new Set(TARGET_USERS);
const MIN_HS_DIGITS = 6;
const MAX_HS_DIGITS = 10;
/** Codes missing from the catalog are never trusted above this. */
const UNCATALOGUED_HS_CONFIDENCE = 0.5;

export interface ModelResponseParserOptions {
  attributes: readonly AttributeName[];
  countryFormat: CountryCodeFormat;
}

/** Remove a surrounding Markdown code fence, if any. */
export function stripCodeFence(reply: string): string {
  const trimmed = reply.trim();
  const fenced = /^```[a-zA-Z]*\s*([\s\S]*?)\s*```$/.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

export class ModelResponseParser {
  constructor(
    private readonly countries: CountryCatalog,
    private readonly hsCodes: HsCodeCatalog,
    private readonly options: ModelResponseParserOptions
  ) {}

  /** Throws ModelProviderError('parse') when the reply is unusable. */
  parse(reply: string): AttributeSet {
    const body = stripCodeFence(reply);
    if (!body) {
      throw new ModelProviderError('parse', 'Empty model reply');
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new ModelProviderError('parse', `Model reply is not JSON: ${body.slice(0, 50)}`);
    }

    const result = ModelResponseSchema.safeParse(json);
    if (!result.success) {
      throw new ModelProviderError('parse', 'Model reply has no attributes object');
    }

    const fields: Partial<Record<AttributeName, AttributeField>> = {};
    for (const name of this.options.attributes) {
      fields[name] = this.sanitize(name, result.data.attributes[name]);
    }
    return freezeAttributes(fields);
  }

  private sanitize(name: AttributeName, raw: unknown): AttributeField {
    const parsed = RawAttributeFieldSchema.safeParse(raw);
    if (!parsed.success) return unknownField(name);

    const { value, evidence, confidence } = parsed.data;
    const strings = toStrings(value);
    const cleanEvidence = squash(evidence ?? '');
    const score = toConfidence(confidence);

    switch (name) {
      case 'country':
        return makeField(
          name,
          this.countries.normalizeCodes(strings, this.options.countryFormat),
          cleanEvidence,
          score
        );
      case 'target_user': {
        const users = strings
          .map((s) => s.toLowerCase())
          .filter((s, i, all) => ALLOWED_TARGET_USERS.has(s) && all.indexOf(s) === i);
        return makeField(name, users, cleanEvidence, score);
      }
      case 'hscode': {
        const digits = hsDigits(strings[0] ?? '').slice(0, MAX_HS_DIGITS);
        if (digits.length < MIN_HS_DIGITS) return unknownField(name);
        const capped = this.hsCodes.validate(digits) ? score : Math.min(score, UNCATALOGUED_HS_CONFIDENCE);
        return makeField(name, digits, cleanEvidence, capped);
      }
      case 'size':
      case 'material':
      case 'brand':
      case 'color':
        return makeField(name, strings.join(', '), cleanEvidence, score);
    }
  }
}

function toStrings(value: RawAttributeField['value']): string[] {
  if (value === null || value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.map((v) => squash(String(v))).filter((v) => v.length > 0);
}

function toConfidence(value: RawAttributeField['confidence']): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}
