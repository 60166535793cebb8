/**
 * Prompt for attribute extraction.
 */

import type { AttributeName, CountryCodeFormat } from '../types/models.js';
import { TARGET_USERS } from '../types/models.js';
import type { ModelPrompt } from '../providers/IModelProvider.js';

const ATTRIBUTE_HINTS: Record<AttributeName, (format: CountryCodeFormat) => string> = {
  country: (format) =>
    `country of origin (manufacture) as a list of ISO 3166-1 ${format === 'alpha3' ? 'alpha-3' : 'alpha-2'} codes; ` +
    'regions map to their country (Wales, Scotland -> United Kingdom). Ignore shipping origins.',
  size: () => 'size or dimensions as written',
  material: () => 'main material or fabric composition',
  brand: () => 'brand or maker name',
  target_user: () => `intended users as a list drawn from: ${TARGET_USERS.join(', ')}`,
  hscode: () => 'Harmonized System code, digits only, at least 6 digits',
  color: () => 'colour as written',
};

export function buildAttributePrompt(
  text: string,
  attributes: readonly AttributeName[],
  countryFormat: CountryCodeFormat
): ModelPrompt {
  const lines = attributes.map((name) => `- ${name}: ${ATTRIBUTE_HINTS[name](countryFormat)}`);

  const system = [
    'You extract product attributes from multilingual product descriptions (English, Japanese, Chinese).',
    'Reply with a single JSON object and nothing else, shaped as:',
    '{"attributes": {"<name>": {"value": ..., "evidence": "...", "confidence": 0.0}}}',
    '"evidence" quotes the text the value was taken from. "confidence" is between 0 and 1.',
    'When an attribute is not stated, use value [] for list attributes or "none" otherwise,',
    'evidence "none" and confidence 0.',
    'Attributes:',
    ...lines,
  ].join('\n');

  return { system, user: `Product description:\n${text}` };
}
