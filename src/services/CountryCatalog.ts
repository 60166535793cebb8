/**
 * Country table: names (English, Japanese, Chinese), regions that map to a
 * sovereign code, common aliases and ISO 3166-1 alpha-2/alpha-3 codes.
 */

import countryTable from '../data/countries.json' with { type: 'json' };
import type { CountryCodeFormat } from '../types/models.js';

export interface CountryEntry {
  alpha2: string;
  alpha3: string;
  /** Matched case-insensitively anywhere; the first is the display name. */
  names: string[];
  /** Abbreviations (USA, UK) only trusted after an origin label. */
  aliases: string[];
}

/** Placeholder some models emit for "no country". */
const UNKNOWN_CODE = 'ZZ';

export class CountryCatalog {
  private readonly byName = new Map<string, CountryEntry>();
  private readonly byCode = new Map<string, CountryEntry>();

  constructor(readonly entries: readonly CountryEntry[] = countryTable) {
    for (const entry of entries) {
      this.byCode.set(entry.alpha2, entry);
      this.byCode.set(entry.alpha3, entry);
      for (const name of [...entry.names, ...entry.aliases]) {
        this.byName.set(name.toLowerCase(), entry);
      }
    }
  }

  /** Names that are safe to match without an origin label. */
  names(): string[] {
    return this.entries.flatMap((e) => e.names);
  }

  /** Everything that may follow an origin label: names, aliases and codes. */
  originTerms(): string[] {
    return this.entries.flatMap((e) => [...e.names, ...e.aliases, e.alpha2, e.alpha3]);
  }

  /**
   * Resolve a name, alias or alpha code as written in text.
   * Codes only count in upper case, so "in" or "it" in running text is not a country.
   */
  resolve(term: string): CountryEntry | undefined {
    const cleaned = term.replace(/\s+/g, ' ').trim();
    const byName = this.byName.get(cleaned.toLowerCase());
    if (byName) return byName;
    return cleaned === cleaned.toUpperCase() ? this.byCode.get(cleaned) : undefined;
  }

  /** Resolve an ISO code (alpha-2 or alpha-3) only. */
  resolveCode(code: string): CountryEntry | undefined {
    const cleaned = code.toUpperCase().replace(/[^A-Z]/g, '');
    if (cleaned === UNKNOWN_CODE) return undefined;
    return this.byCode.get(cleaned);
  }

  format(entry: CountryEntry, format: CountryCodeFormat): string {
    return format === 'alpha3' ? entry.alpha3 : entry.alpha2;
  }

  /**
   * Validate codes from an untrusted source and convert them to the profile.
   * Unknown codes and the "ZZ" placeholder are dropped; order is kept and
   * duplicates removed.
   */
  normalizeCodes(codes: readonly string[], format: CountryCodeFormat): string[] {
    const result: string[] = [];
    for (const code of codes) {
      const entry = this.resolveCode(code) ?? this.byName.get(code.trim().toLowerCase());
      if (!entry) continue;
      const formatted = this.format(entry, format);
      if (!result.includes(formatted)) result.push(formatted);
    }
    return result;
  }
}
