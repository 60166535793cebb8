/**
 * HS-code catalog: a small table of six-digit Harmonized System headings
 * with English, Japanese and Chinese descriptions.
 */

import hsCodeTable from '../data/hscodes.json' with { type: 'json' };
import { alternation } from './patterns.js';

export interface HsCodeEntry {
  hscode: string;
  en: string;
  ja: string;
  zh: string;
  /** Product words that indicate this heading in free text. */
  terms: string[];
}

export interface HsCodeValidation {
  original: string;
  isValid: boolean;
  matchedItem: HsCodeEntry | null;
  suggestions: HsCodeEntry[];
}

const MIN_DIGITS = 6;

/** Strip separators ("6109.10", "6109-10") down to digits. */
export function hsDigits(code: string): string {
  return code.replace(/\D/g, '');
}

export class HsCodeCatalog {
  private readonly byCode = new Map<string, HsCodeEntry>();
  private readonly termMatchers: Array<{ entry: HsCodeEntry; pattern: RegExp }>;

  constructor(readonly entries: readonly HsCodeEntry[] = hsCodeTable) {
    for (const entry of entries) {
      this.byCode.set(entry.hscode, entry);
    }
    this.termMatchers = entries
      .filter((entry) => entry.terms.length > 0)
      .map((entry) => ({ entry, pattern: new RegExp(alternation(entry.terms), 'i') }));
  }

  /** Case-insensitive search over names, terms and code prefix. */
  search(keyword: string, limit = 10): HsCodeEntry[] {
    const needle = keyword.trim().toLowerCase();
    if (!needle) return [];
    const codeQuery = /^[\d.\-\s]+$/.test(needle) ? hsDigits(needle) : '';

    return this.entries
      .filter((entry) => {
        if (codeQuery) return entry.hscode.startsWith(codeQuery.slice(0, MIN_DIGITS));
        return [entry.en, entry.ja, entry.zh, ...entry.terms].some((text) =>
          text.toLowerCase().includes(needle)
        );
      })
      .slice(0, Math.max(0, limit));
  }

  getByCode(code: string): HsCodeEntry | undefined {
    return this.byCode.get(hsDigits(code).slice(0, MIN_DIGITS));
  }

  /** A code is valid when it has at least six digits and its heading is catalogued. */
  validate(code: string): boolean {
    const digits = hsDigits(code);
    return digits.length >= MIN_DIGITS && this.byCode.has(digits.slice(0, MIN_DIGITS));
  }

  /** Entries sharing the four-digit heading. */
  findSimilar(code: string, limit = 5): HsCodeEntry[] {
    const digits = hsDigits(code);
    if (digits.length < 4) return [];
    const heading = digits.slice(0, 4);
    return this.entries
      .filter((entry) => entry.hscode.startsWith(heading) && entry.hscode !== digits.slice(0, MIN_DIGITS))
      .slice(0, Math.max(0, limit));
  }

  /** First entry (in table order) whose term occurs in the text. */
  matchText(text: string): { entry: HsCodeEntry; term: string } | undefined {
    for (const { entry, pattern } of this.termMatchers) {
      const match = pattern.exec(text);
      if (match) return { entry, term: match[0] };
    }
    return undefined;
  }

  getValidated(code: string, keywords?: string): HsCodeValidation {
    const matchedItem = this.validate(code) ? (this.getByCode(code) ?? null) : null;
    let suggestions: HsCodeEntry[] = [];
    if (!matchedItem) {
      suggestions = this.findSimilar(code);
      if (suggestions.length === 0 && keywords) {
        suggestions = this.search(keywords, 5);
      }
    }
    return { original: code, isValid: matchedItem !== null, matchedItem, suggestions };
  }
}
