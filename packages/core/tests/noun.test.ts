// Noun generator tests
import { describe, test, expect } from 'vitest';
import { hasLenition, makeIndefinite, nounCase, nounNumber, nounNumberWithCase } from '../src/words/noun.js';
import { phonologicalProfile } from '../src/phonology.js';

const inflect = (lemma: string, caseName: Parameters<typeof nounCase>[2]) =>
  nounCase(lemma, phonologicalProfile(lemma), caseName);

describe('nounCase', () => {
  test('subjective is unmarked', () => {
    expect(inflect('ikran', 'subjective')).toBe('ikran');
  });

  test('agentive', () => {
    expect(inflect('tute', 'agentive')).toBe('tutel');
    expect(inflect('ikran', 'agentive')).toBe('ikranil');
    expect(inflect('tsaw', 'agentive')).toBe('tsawil');
  });

  test('patientive and dative treat diphthongs like vowels', () => {
    expect(inflect('tute', 'patientive')).toBe('tuteti');
    expect(inflect('ikran', 'patientive')).toBe('ikranit');
    expect(inflect('tsaw', 'patientive')).toBe('tsawti');
    expect(inflect('tute', 'dative')).toBe('tuteru');
    expect(inflect('ikran', 'dative')).toBe('ikranur');
    expect(inflect('tsaw', 'dative')).toBe('tsawru');
  });

  test('genitive', () => {
    expect(inflect('tute', 'genitive')).toBe('tuteyä');
    expect(inflect('kelku', 'genitive')).toBe('kelkuä');
    expect(inflect('ikran', 'genitive')).toBe('ikranä');
    expect(inflect('tsaw', 'genitive')).toBe('tsawä');
  });

  test('topical', () => {
    expect(inflect('tute', 'topical')).toBe('tuteri');
    expect(inflect('ikran', 'topical')).toBe('ikraniri');
  });

  test('follows the profile it is given', () => {
    const consonantal = { endsWithVowel: false, endsWithDiphthong: false, endsWithPseudovowel: false };
    expect(nounCase('tute', consonantal, 'agentive')).toBe('tuteil');
  });
});

describe('nounNumber', () => {
  test('singular is the lemma', () => {
    expect(nounNumber('tsmukan', 'singular')).toBe('tsmukan');
  });

  test('prefixes a lenited stem', () => {
    expect(nounNumber('tsmukan', 'dual')).toBe('mesmukan');
    expect(nounNumber('tsmukan', 'trial')).toBe('pxesmukan');
    expect(nounNumber('tsmukan', 'plural')).toBe('aysmukan');
    expect(nounNumber('txon', 'dual')).toBe('meton');
    expect(nounNumber('ikran', 'plural')).toBe('ayikran');
  });

  test('hasLenition reports a changed initial', () => {
    expect(hasLenition('tsmukan', 'plural')).toBe(true);
    expect(hasLenition('tute', 'plural')).toBe(false);
    expect(hasLenition('tsmukan', 'singular')).toBe(false);
  });
});

describe('nounNumberWithCase', () => {
  test('lenites once and picks the suffix from the numbered form', () => {
    expect(nounNumberWithCase('txon', 'plural', 'agentive')).toBe('aytonil');
    expect(nounNumberWithCase('ikran', 'plural', 'agentive')).toBe('ayikranil');
    expect(nounNumberWithCase('tute', 'dual', 'patientive')).toBe('metuteti');
  });
});

describe('makeIndefinite', () => {
  test('appends -o', () => {
    expect(makeIndefinite('tute')).toBe('tuteo');
  });
});
