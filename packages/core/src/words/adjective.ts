// navi-morph/words/adjective - Attribution, adverbs, comparison and color nouns

import type { AdjectivePosition, Comparison } from './types.js';

export interface AttributiveOptions {
  position?: AdjectivePosition;
  /** Adjectives derived with le- stay unmarked after the noun */
  leDerived?: boolean;
}

/**
 * Attributive form with the linking -a-.
 *
 *   attributive('lor')  // 'lora'
 *   attributive('apxa') // 'apxa'
 */
export function attributive(lemma: string, options: AttributiveOptions = {}): string {
  const position = options.position ?? 'before';
  if (options.leDerived && position === 'after') {
    return lemma;
  }
  if (lemma.endsWith('a')) {
    return lemma;
  }
  return lemma + 'a';
}

export function adverb(lemma: string): string {
  return 'ni' + lemma;
}

export const SUPERLATIVE = 'frato';

export function comparative(lemma: string, comparison: Comparison, comparedTo?: string): string {
  switch (comparison) {
    case 'standard':
      return comparedTo ? `to ${comparedTo}` : 'to';
    case 'superlative':
      return SUPERLATIVE;
    case 'equality':
      return comparedTo ? `niftxan ${lemma} na ${comparedTo}` : `niftxan ${lemma} na`;
  }
}

// A final n assimilates to m before -pin: ean → eampin
export function colorNoun(lemma: string): string {
  if (lemma.endsWith('n')) {
    return lemma.slice(0, -1) + 'mpin';
  }
  return lemma + 'pin';
}
