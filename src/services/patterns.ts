/**
 * Regex helpers shared by the catalogs and the heuristic extractor.
 * Latin terms get letter boundaries so "men" does not match inside "women";
 * CJK terms are matched as plain substrings.
 */

const LATIN = /[A-Za-z]/;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function termPattern(term: string): string {
  const escaped = escapeRegExp(term).replace(/\s+/g, '\\s+');
  if (!LATIN.test(term)) return escaped;

  const head = LATIN.test(term[0]) ? '(?<![A-Za-z])' : '';
  const tail = LATIN.test(term[term.length - 1]) ? '(?![A-Za-z])' : '';
  return `${head}${escaped}${tail}`;
}

/** Non-capturing alternation of terms, longest first so the leftmost match is also the longest. */
export function alternation(terms: Iterable<string>): string {
  const unique = [...new Set(terms)].filter((t) => t.length > 0);
  unique.sort((a, b) => b.length - a.length);
  return `(?:${unique.map(termPattern).join('|')})`;
}

/** Collapse whitespace (including newlines) to single spaces and trim. */
export function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
