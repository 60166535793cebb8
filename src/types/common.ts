/**
 * Declarative body schemas for the validate-body middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** string: maximum length in characters. */
  maxLength?: number;
  /** string: allowed values. */
  enum?: readonly string[];
  /** number bounds (inclusive). */
  min?: number;
  max?: number;
  /** array: maximum number of elements. */
  maxItems?: number;
  /** array: type every element must have. */
  items?: Exclude<FieldType, 'array'>;
}

export type BodySchema = Record<string, FieldSchema>;
