import { describe, it, expect } from 'vitest';
import { DEFAULT_ATTRIBUTES } from '../../src/config.js';
import { CountryCatalog } from '../../src/services/CountryCatalog.js';
import { HsCodeCatalog } from '../../src/services/HsCodeCatalog.js';
import { HeuristicExtractor } from '../../src/services/HeuristicExtractor.js';
import type { CountryCodeFormat } from '../../src/types/models.js';

function extractor(countryFormat: CountryCodeFormat = 'alpha2', attributes = DEFAULT_ATTRIBUTES) {
  return new HeuristicExtractor(new CountryCatalog(), new HsCodeCatalog(), {
    attributes,
    countryFormat,
  });
}

describe('HeuristicExtractor', () => {
  const heuristic = extractor();

  // ── country ──

  describe('country', () => {
    it('should read an origin phrase with full confidence', () => {
      expect(heuristic.extract('Made in Wales').country).toEqual({
        value: ['GB'],
        evidence: 'Made in Wales',
        confidence: 1,
      });
    });

    it('should emit alpha-3 codes under that profile', () => {
      expect(extractor('alpha3').extract('Made in Wales').country?.value).toEqual(['GBR']);
    });

    it('should read every country of a listed origin in order', () => {
      expect(heuristic.extract('Country of origin: Indonesia / Vietnam').country).toEqual({
        value: ['ID', 'VN'],
        evidence: 'Country of origin: Indonesia / Vietnam',
        confidence: 1,
      });
      expect(heuristic.extract('Made in China and Japan').country?.value).toEqual(['CN', 'JP']);
    });

    it('should stop a listed origin where the next clause begins', () => {
      expect(heuristic.extract('Made in Italy, Japan edition').country).toEqual({
        value: ['IT'],
        evidence: 'Made in Italy',
        confidence: 1,
      });
      expect(heuristic.extract('Made in Italy and France. Japan edition').country?.value).toEqual([
        'IT',
        'FR',
      ]);
    });

    it('should read Japanese labels and suffix forms', () => {
      expect(heuristic.extract('原産国：日本').country).toEqual({
        value: ['JP'],
        evidence: '原産国：日本',
        confidence: 1,
      });
      expect(heuristic.extract('日本製').country).toEqual({
        value: ['JP'],
        evidence: '日本製',
        confidence: 1,
      });
    });

    it('should accept aliases after an origin label', () => {
      expect(heuristic.extract('Made in the USA').country).toEqual({
        value: ['US'],
        evidence: 'Made in the USA',
        confidence: 1,
      });
    });

    it('should not read lower-case words as country codes', () => {
      expect(heuristic.extract('Made in it').country).toEqual({
        value: [],
        evidence: 'none',
        confidence: 0,
      });
    });

    it('should give a bare country name keyword confidence', () => {
      expect(heuristic.extract('Designed in Italy').country).toEqual({
        value: ['IT'],
        evidence: 'Italy',
        confidence: 0.3,
      });
    });

    it('should ignore countries in a shipping context', () => {
      expect(heuristic.extract('Ships from China. Cotton T-shirt').country?.value).toEqual([]);
      expect(heuristic.extract('Ships from Japan. Made in Vietnam').country).toEqual({
        value: ['VN'],
        evidence: 'Made in Vietnam',
        confidence: 1,
      });
    });
  });

  // ── labelled values ──

  it('should read labelled values at medium confidence', () => {
    const result = heuristic.extract('Size: M ; 素材: 綿 100% ; Brand: RASW ; HS code: 6109.10');

    expect(result.size).toEqual({ value: 'M', evidence: 'Size: M', confidence: 0.5 });
    expect(result.material).toEqual({ value: '綿 100%', evidence: '素材: 綿 100%', confidence: 0.5 });
    expect(result.brand).toEqual({ value: 'RASW', evidence: 'Brand: RASW', confidence: 0.5 });
    expect(result.hscode).toEqual({ value: '610910', evidence: 'HS code: 6109.10', confidence: 0.5 });
  });

  it('should cut a labelled value where the next label starts', () => {
    expect(heuristic.extract('Material: Cotton 100% Color: navy').material).toEqual({
      value: 'Cotton 100%',
      evidence: 'Material: Cotton 100%',
      confidence: 0.5,
    });
  });

  // ── keywords ──

  it('should read keywords at low confidence', () => {
    const result = heuristic.extract('Ships from China. Cotton T-shirt');

    expect(result.material).toEqual({ value: 'cotton', evidence: 'Cotton', confidence: 0.3 });
    expect(result.hscode).toEqual({ value: '610910', evidence: 'T-shirt', confidence: 0.3 });
  });

  it('should collect every target user in order', () => {
    expect(heuristic.extract('Unisex hoodie for men and women').target_user).toEqual({
      value: ['unisex', 'men', 'women'],
      evidence: 'Unisex, men, women',
      confidence: 0.3,
    });
  });

  it('should recognise known brands', () => {
    const result = heuristic.extract('Nike Air running shoes');
    expect(result.brand).toEqual({ value: 'Nike', evidence: 'Nike', confidence: 0.3 });
    expect(result.hscode?.value).toBe('640411');
  });

  // ── unknowns ──

  it('should return the all-unknown set for empty text', () => {
    const result = heuristic.extract('');

    expect(result.country).toEqual({ value: [], evidence: 'none', confidence: 0 });
    expect(result.size).toEqual({ value: 'none', evidence: 'none', confidence: 0 });
    expect(Object.keys(result)).toEqual([...DEFAULT_ATTRIBUTES]);
  });

  it('should only report enabled attributes', () => {
    const result = extractor('alpha2', ['country']).extract('Made in Japan, cotton');
    expect(Object.keys(result)).toEqual(['country']);
  });

  it('should return frozen sets', () => {
    expect(Object.isFrozen(heuristic.extract('Made in Japan'))).toBe(true);
  });
});
