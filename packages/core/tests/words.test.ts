// Adjective, numeral, particle and prenoun tests
import { describe, test, expect } from 'vitest';
import { adverb, attributive, colorNoun, comparative, SUPERLATIVE } from '../src/words/adjective.js';
import { adverbial, cardinal, fraction, ordinal } from '../src/words/number.js';
import { placeParticle } from '../src/words/particle.js';
import { causesLenition, combineWithNoun } from '../src/words/prenoun.js';
import { UnknownCategoryOrFeatureError } from '../src/errors.js';

describe('adjectives', () => {
  test('attributive adds -a unless already present', () => {
    expect(attributive('lor')).toBe('lora');
    expect(attributive('apxa')).toBe('apxa');
  });

  test('le-derived adjectives stay bare after the noun', () => {
    expect(attributive('lefpom', { position: 'after', leDerived: true })).toBe('lefpom');
    expect(attributive('lefpom', { position: 'before', leDerived: true })).toBe('lefpoma');
  });

  test('adverb', () => {
    expect(adverb('lor')).toBe('nilor');
  });

  test('comparison', () => {
    expect(comparative('lor', 'standard', 'tute')).toBe('to tute');
    expect(comparative('lor', 'standard')).toBe('to');
    expect(comparative('lor', 'superlative')).toBe(SUPERLATIVE);
    expect(comparative('lor', 'equality', 'tute')).toBe('niftxan lor na tute');
    expect(comparative('lor', 'equality')).toBe('niftxan lor na');
  });

  test('color nouns', () => {
    expect(colorNoun('ean')).toBe('eampin');
    expect(colorNoun('rim')).toBe('rimpin');
  });
});

describe('numbers', () => {
  test('cardinals', () => {
    expect(cardinal(1)).toBe("'aw");
    expect(cardinal(8)).toBe('vol');
  });

  test('ordinals shorten some stems', () => {
    expect(ordinal(1)).toBe("'awve");
    expect(ordinal(2)).toBe('muve');
    expect(ordinal(3)).toBe('pxeyve');
    expect(ordinal(4)).toBe('tsive');
    expect(ordinal(7)).toBe('kive');
  });

  test('fractions', () => {
    expect(fraction(2)).toBe('mawl');
    expect(fraction(3)).toBe('pan');
    expect(fraction(4)).toBe('tsipxi');
    expect(fraction(5)).toBe('mrrpxi');
  });

  test('adverbials', () => {
    expect(adverbial(1)).toBe("'awlo");
    expect(adverbial(4)).toBe('alo atsing');
    expect(adverbial(8)).toBe('alo avol');
  });

  test('values outside one to eight are rejected', () => {
    expect(() => cardinal(9)).toThrow(UnknownCategoryOrFeatureError);
    expect(() => ordinal(0)).toThrow('Unknown cardinal value for number: 0');
    expect(() => fraction(1.5)).toThrow('Unknown fraction value for number: 1.5');
  });
});

describe('particles', () => {
  test('question particles lead', () => {
    expect(placeParticle('srak', 'question', 'nga kame oeti')).toBe('srak nga kame oeti');
  });

  test('vocative uses ma', () => {
    expect(placeParticle('ma', 'vocative', 'Neytiri')).toBe('ma Neytiri');
  });

  test('others follow', () => {
    expect(placeParticle('ke', 'negative', 'kame')).toBe('kame ke');
    expect(placeParticle('nìteng', 'general', 'oe')).toBe('oe nìteng');
  });
});

describe('prenouns', () => {
  test('a + a contracts', () => {
    expect(combineWithNoun('tsa', 'atan')).toBe('tsatan');
    expect(combineWithNoun('fì', 'tute')).toBe('fìtute');
    expect(combineWithNoun('pe', 'atan')).toBe('peatan');
  });

  test('leniting prenouns', () => {
    expect(causesLenition('pe')).toBe(true);
    expect(causesLenition('fay')).toBe(true);
    expect(causesLenition('fì')).toBe(false);
  });
});
