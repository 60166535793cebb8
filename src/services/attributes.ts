/**
 * Attribute helpers: unknown sentinels, field construction and the cache
 * admission rule.
 */

import type {
  AttributeField,
  AttributeName,
  AttributeSet,
  AttributeValue,
  ListAttributeName,
} from '../types/models.js';

export const UNKNOWN_VALUE = 'none';
export const UNKNOWN_EVIDENCE = 'none';

/** Results are cached only when some field is more certain than this. */
export const ADMISSION_THRESHOLD = 0.5;

const LIST_ATTRIBUTES: ReadonlySet<AttributeName> = new Set<ListAttributeName>([
  'country',
  'target_user',
]);

export function isListAttribute(name: AttributeName): name is ListAttributeName {
  return LIST_ATTRIBUTES.has(name);
}

export function unknownField(name: AttributeName): AttributeField {
  return {
    value: isListAttribute(name) ? [] : UNKNOWN_VALUE,
    evidence: UNKNOWN_EVIDENCE,
    confidence: 0,
  };
}

export function isUnknownValue(value: AttributeValue): boolean {
  if (typeof value === 'string') {
    return value === '' || value.toLowerCase() === UNKNOWN_VALUE;
  }
  return value.length === 0;
}

/**
 * Build a field, keeping the sentinel and zero confidence in step:
 * an unknown value always has confidence 0, and confidence 0 always
 * carries the unknown value.
 */
export function makeField(
  name: AttributeName,
  value: AttributeValue,
  evidence: string,
  confidence: number
): AttributeField {
  const clamped = clampConfidence(confidence);
  if (clamped === 0 || isUnknownValue(value)) {
    return unknownField(name);
  }
  return {
    value: typeof value === 'string' ? value : [...value],
    evidence: evidence.trim() || UNKNOWN_EVIDENCE,
    confidence: clamped,
  };
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Freeze a set (and its fields and list values) once assembled. */
export function freezeAttributes(
  fields: Partial<Record<AttributeName, AttributeField>>
): AttributeSet {
  for (const field of Object.values(fields)) {
    if (!field) continue;
    if (Array.isArray(field.value)) Object.freeze(field.value);
    Object.freeze(field);
  }
  return Object.freeze(fields);
}

export function emptyAttributeSet(names: readonly AttributeName[]): AttributeSet {
  const fields: Partial<Record<AttributeName, AttributeField>> = {};
  for (const name of names) {
    fields[name] = unknownField(name);
  }
  return freezeAttributes(fields);
}

export function meetsAdmissionThreshold(attributes: AttributeSet): boolean {
  return Object.values(attributes).some(
    (field) => field !== undefined && field.confidence > ADMISSION_THRESHOLD
  );
}
