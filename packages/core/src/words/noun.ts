// navi-morph/words/noun - Case and number marking for nouns

import { applyLenition, phonologicalProfile, type PhonologicalProfile } from '../phonology.js';
import type { GrammaticalNumber, NounCase } from './types.js';

const NUMBER_PREFIXES: Record<GrammaticalNumber, string> = {
  singular: '',
  dual: 'me',
  trial: 'pxe',
  plural: 'ay'
};

function genitiveSuffix(lemma: string, profile: PhonologicalProfile): string {
  if (!profile.endsWithVowel) return 'ä';
  if (lemma.endsWith('o') || lemma.endsWith('u')) return 'ä';
  return 'yä';
}

export function caseSuffix(lemma: string, profile: PhonologicalProfile, caseName: NounCase): string {
  const vowelOrDiphthong = profile.endsWithVowel || profile.endsWithDiphthong;

  switch (caseName) {
    case 'subjective':
      return '';
    case 'agentive':
      return profile.endsWithVowel ? 'l' : 'il';
    case 'patientive':
      return vowelOrDiphthong ? 'ti' : 'it';
    case 'dative':
      return vowelOrDiphthong ? 'ru' : 'ur';
    case 'genitive':
      return genitiveSuffix(lemma, profile);
    case 'topical':
      return profile.endsWithVowel ? 'ri' : 'iri';
  }
}

/**
 * Attach the case ending chosen from the given profile.
 *
 *   nounCase('tute', phonologicalProfile('tute'), 'agentive') // 'tutel'
 *   nounCase('ikran', phonologicalProfile('ikran'), 'dative') // 'ikranur'
 */
export function nounCase(
  lemma: string,
  profile: PhonologicalProfile,
  caseName: NounCase
): string {
  return lemma + caseSuffix(lemma, profile, caseName);
}

export function nounNumber(lemma: string, number: GrammaticalNumber): string {
  const prefix = NUMBER_PREFIXES[number];
  if (!prefix) return lemma;
  return prefix + applyLenition(lemma);
}

// The case ending follows the numbered form's own ending, not the lemma's
export function nounNumberWithCase(lemma: string, number: GrammaticalNumber, caseName: NounCase): string {
  const numbered = nounNumber(lemma, number);
  return nounCase(numbered, phonologicalProfile(numbered), caseName);
}

export function makeIndefinite(lemma: string): string {
  return lemma + 'o';
}

// True when number marking changed the lemma's initial consonant
export function hasLenition(lemma: string, number: GrammaticalNumber): boolean {
  return number !== 'singular' && applyLenition(lemma) !== lemma;
}
