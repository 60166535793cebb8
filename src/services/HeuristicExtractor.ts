/**
 * Heuristic Extractor
 *
 * Deterministic, regex-based attribute extraction used when the model cannot
 * be reached or its reply cannot be used. Pure and synchronous; never throws.
 *
 * Confidence tiers:
 *   1.0  explicit origin phrase ("Made in Wales", "原産国：日本", "中国製")
 *   0.5  labelled value ("Size: M", "素材: 綿", "HS code: 6109.10")
 *   0.3  keyword hit (bare country name, known material/colour/brand, ...)
 *   0.0  nothing found
 */

import keywordTable from '../data/keywords.json' with { type: 'json' };
import type {
  AttributeField,
  AttributeName,
  AttributeSet,
  CountryCodeFormat,
} from '../types/models.js';
import { emptyAttributeSet, freezeAttributes, makeField, unknownField } from './attributes.js';
import type { CountryCatalog } from './CountryCatalog.js';
import { hsDigits, type HsCodeCatalog } from './HsCodeCatalog.js';
import { alternation, squash } from './patterns.js';

export const ORIGIN_CONFIDENCE = 1.0;
export const LABEL_CONFIDENCE = 0.5;
export const KEYWORD_CONFIDENCE = 0.3;

export interface KeywordTable {
  material: Record<string, string[]>;
  color: Record<string, string[]>;
  target_user: Record<string, string[]>;
  brand: string[];
}

export interface HeuristicExtractorOptions {
  attributes: readonly AttributeName[];
  countryFormat: CountryCodeFormat;
  keywords?: KeywordTable;
}

const ORIGIN_LABELS = [
  'made in',
  'manufactured in',
  'produced in',
  'product of',
  'country of origin',
  'origin',
  '原産国',
  '原産地',
  '製造国',
  '生産国',
  '原产地',
  '产地',
  '制造国',
];

const ORIGIN_SUFFIXES = ['製', '産', '制造', '生产'];

const LIST_SEPARATOR = '\\s*(?:[/,、&・，]|(?<![A-Za-z])(?:and|or)(?![A-Za-z]))\\s*';
/** A listed country only counts when its clause ends there ("Italy, Japan edition" stops at Italy). */
const CLAUSE_END =
  '(?=[ \\t]*(?:[.;|,、。)/&・，\\n]|(?<![A-Za-z])(?:and|or)(?![A-Za-z])|$))';

/** Words just before a country name that mean "ships from/to", not "made in". */
const SHIPPING_CUE = /ship|deliver|dispatch|発送|配送|出荷|发货/i;
const SHIPPING_WINDOW = 15;

const LABELS: ReadonlyArray<[AttributeName, string[]]> = [
  ['size', ['size', 'サイズ', '尺寸', '尺码']],
  ['material', ['material', 'fabric', 'composition', '素材', '材質', '材质', '面料']],
  ['brand', ['brand', 'ブランド', '品牌']],
  ['color', ['colour', 'color', 'カラー', '颜色', '色']],
];

/** Cut a labelled value where the next "Label:" starts. */
const NEXT_LABEL = /\s+[^\s:：]+\s*[:：]/;
const MAX_LABEL_VALUE = 40;

const SIZE_KEYWORD = /(?<![A-Za-z0-9])(?:XXS|XS|XXL|XL|3XL|4XL|One Size|Free Size|フリーサイズ|均码)(?![A-Za-z0-9])/;

const HS_LABEL = /(hs\s*code|hs\s*コード|hts|税番|海关编码)\s*[:：]?\s*(\d{4}[.\-\s]?\d{2}(?:[.\-\s]?\d{2,4})?)/i;

interface KeywordMatcher {
  pattern: RegExp;
  canonical: Map<string, string>;
}

function keywordMatcher(groups: Record<string, string[]>): KeywordMatcher {
  const canonical = new Map<string, string>();
  for (const [name, terms] of Object.entries(groups)) {
    for (const term of terms) {
      if (!canonical.has(term.toLowerCase())) canonical.set(term.toLowerCase(), name);
    }
  }
  return { pattern: new RegExp(alternation(canonical.keys()), 'gi'), canonical };
}

export class HeuristicExtractor {
  private readonly originPhrase: RegExp;
  private readonly originSuffix: RegExp;
  private readonly countryTerm: RegExp;
  private readonly bareCountry: RegExp;
  private readonly labels = new Map<AttributeName, RegExp>();
  private readonly material: KeywordMatcher;
  private readonly color: KeywordMatcher;
  private readonly targetUser: KeywordMatcher;
  private readonly brand: KeywordMatcher;

  constructor(
    private readonly countries: CountryCatalog,
    private readonly hsCodes: HsCodeCatalog,
    private readonly options: HeuristicExtractorOptions
  ) {
    const country = alternation(countries.originTerms());
    const countryList = `${country}(?:${LIST_SEPARATOR}${country}${CLAUSE_END})*`;

    this.originPhrase = new RegExp(
      `${alternation(ORIGIN_LABELS)}\\s*[:：]?\\s*(?:the\\s+)?(${countryList})`,
      'gi'
    );
    this.originSuffix = new RegExp(
      `(${alternation(countries.names())})${alternation(ORIGIN_SUFFIXES)}`,
      'g'
    );
    this.countryTerm = new RegExp(country, 'gi');
    this.bareCountry = new RegExp(alternation(countries.names()), 'gi');

    for (const [name, labels] of LABELS) {
      this.labels.set(
        name,
        new RegExp(`(${alternation(labels)}\\s*[:：]\\s*)([^;|,、。]+)`, 'i')
      );
    }

    const keywords = options.keywords ?? keywordTable;
    this.material = keywordMatcher(keywords.material);
    this.color = keywordMatcher(keywords.color);
    this.targetUser = keywordMatcher(keywords.target_user);
    this.brand = keywordMatcher(Object.fromEntries(keywords.brand.map((b) => [b, [b]])));
  }

  extract(text: string): AttributeSet {
    const { attributes } = this.options;
    if (!text.trim()) return emptyAttributeSet(attributes);

    const fields: Partial<Record<AttributeName, AttributeField>> = {};
    for (const name of attributes) {
      fields[name] = this.extractField(name, text);
    }
    return freezeAttributes(fields);
  }

  private extractField(name: AttributeName, text: string): AttributeField {
    switch (name) {
      case 'country':
        return this.country(text);
      case 'size':
        return this.labelled(name, text) ?? this.size(text);
      case 'material':
        return this.labelled(name, text) ?? this.keyword(name, this.material, text);
      case 'brand':
        return this.labelled(name, text) ?? this.keyword(name, this.brand, text);
      case 'color':
        return this.labelled(name, text) ?? this.keyword(name, this.color, text);
      case 'target_user':
        return this.targetUsers(text);
      case 'hscode':
        return this.hscode(text);
    }
  }

  private country(text: string): AttributeField {
    const codes: string[] = [];
    const evidence: string[] = [];

    const collect = (phrase: string, list: string): void => {
      let found = false;
      for (const term of list.matchAll(this.countryTerm)) {
        const entry = this.countries.resolve(term[0]);
        if (!entry) continue;
        const code = this.countries.format(entry, this.options.countryFormat);
        if (!codes.includes(code)) codes.push(code);
        found = true;
      }
      if (found && !evidence.includes(phrase)) evidence.push(phrase);
    };

    for (const match of text.matchAll(this.originPhrase)) {
      collect(match[0], match[1]);
    }
    for (const match of text.matchAll(this.originSuffix)) {
      collect(match[0], match[1]);
    }
    if (codes.length > 0) {
      return makeField('country', codes, evidence.join('; '), ORIGIN_CONFIDENCE);
    }

    for (const match of text.matchAll(this.bareCountry)) {
      const index = match.index ?? 0;
      const before = text.slice(Math.max(0, index - SHIPPING_WINDOW), index);
      if (SHIPPING_CUE.test(before)) continue;
      collect(match[0], match[0]);
    }
    return makeField('country', codes, evidence.join(', '), KEYWORD_CONFIDENCE);
  }

  private labelled(name: AttributeName, text: string): AttributeField | undefined {
    const pattern = this.labels.get(name);
    const match = pattern?.exec(text);
    if (!match) return undefined;

    const raw = match[2];
    const next = NEXT_LABEL.exec(raw);
    const value = squash(next ? raw.slice(0, next.index) : raw).slice(0, MAX_LABEL_VALUE);
    if (!value) return undefined;

    return makeField(name, value, `${match[1]}${value}`, LABEL_CONFIDENCE);
  }

  private size(text: string): AttributeField {
    const match = SIZE_KEYWORD.exec(text);
    if (!match) return unknownField('size');
    return makeField('size', match[0], match[0], KEYWORD_CONFIDENCE);
  }

  private keyword(name: AttributeName, matcher: KeywordMatcher, text: string): AttributeField {
    for (const match of text.matchAll(matcher.pattern)) {
      const canonical = matcher.canonical.get(match[0].toLowerCase().replace(/\s+/g, ' '));
      if (canonical) return makeField(name, canonical, match[0], KEYWORD_CONFIDENCE);
    }
    return unknownField(name);
  }

  private targetUsers(text: string): AttributeField {
    const users: string[] = [];
    const evidence: string[] = [];
    for (const match of text.matchAll(this.targetUser.pattern)) {
      const canonical = this.targetUser.canonical.get(match[0].toLowerCase().replace(/\s+/g, ' '));
      if (!canonical) continue;
      if (!users.includes(canonical)) users.push(canonical);
      if (!evidence.includes(match[0])) evidence.push(match[0]);
    }
    return makeField('target_user', users, evidence.join(', '), KEYWORD_CONFIDENCE);
  }

  private hscode(text: string): AttributeField {
    const labelled = HS_LABEL.exec(text);
    if (labelled) {
      return makeField('hscode', hsDigits(labelled[2]), labelled[0], LABEL_CONFIDENCE);
    }
    const term = this.hsCodes.matchText(text);
    if (!term) return unknownField('hscode');
    return makeField('hscode', term.entry.hscode, term.term, KEYWORD_CONFIDENCE);
  }
}
