/**
 * Text normalizer.
 * Turns raw listing text (often scraped HTML) into the plain text used for
 * both the cache fingerprint and the model prompt, so two descriptions that
 * differ only by markup produce the same key.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const ZERO_WIDTH = /[\u200b\u200c\u200d\u2060\ufeff]/g;

export function normalizeText(raw: string): string {
  if (!raw) return '';

  let text = raw
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, ' ')
    // Table cells become column separators, rows and blocks become clause breaks.
    .replace(/<\/t[dh]\s*>/gi, ' | ')
    .replace(/<\/(tr|p|li|div|h[1-6]|table)\s*>|<br\s*\/?>/gi, ' ; ')
    .replace(/<[^>]*>/g, ' ');

  text = decodeEntities(text).replace(ZERO_WIDTH, '');

  return text
    .replace(/\s+/g, ' ')
    // "| ;" and "; ;" runs left behind by nested tables collapse into one break
    .replace(/(?:\s*[|;]\s*){2,}/g, (run) => (run.includes(';') ? ' ; ' : ' | '))
    .replace(/^[\s|;]+|[\s|;]+$/g, '')
    .replace(/\s+/g, ' ');
}

/**
 * Combine title and description into one text.
 * The description leads; the title is appended only when it adds something.
 */
export function combineText(title: string | undefined, description: string | undefined): string {
  const normalizedDescription = normalizeText(description ?? '');
  const normalizedTitle = normalizeText(title ?? '');

  if (!normalizedDescription) return normalizedTitle;
  if (!normalizedTitle || normalizedDescription.includes(normalizedTitle)) {
    return normalizedDescription;
  }
  return `${normalizedDescription} ; ${normalizedTitle}`;
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}
