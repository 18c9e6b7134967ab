// navi-morph/words/verb - Infix placement in verb stems

import { isVowel, splitSyllables } from '../phonology.js';
import type { InfixSlots, Voice } from './types.js';

// ============================================================================
// INFIX INVENTORY
// ============================================================================

export const PRE_FIRST_INFIXES = ['äp', 'eyk', 'äpeyk'] as const;

export const FIRST_INFIXES = [
  'am', 'ìm', 'ìy', 'ay', 'er', 'ol', 'iv', 'ilv', 'irv', 'imv', 'iyev', 'ìyev',
  'alm', 'ìlm', 'ìyl', 'ayl', 'arm', 'ìrm', 'ìyr', 'ayr', 'asy', 'aly', 'ary', 'ìsy',
  'us', 'awn'
] as const;

export const SECOND_INFIXES = ['ei', 'eiy', 'äng', 'ats', 'uy'] as const;

export const ACTIVE_PARTICIPLE_INFIX = 'us';
export const PASSIVE_PARTICIPLE_INFIX = 'awn';
export const CAUSATIVE_INFIX = 'eyk';
export const REFLEXIVE_INFIX = 'äp';

// ============================================================================
// INSERTION
// ============================================================================

/**
 * Insert an infix before the first vowel of one syllable. Negative indices
 * count from the end; an index past either end falls back to the last
 * syllable (negative) or the first (non-negative).
 *
 *   insertInfix('taron', 'us', -2) // 'tusaron'
 */
export function insertInfix(word: string, infix: string, syllableIndex: number): string {
  const syllables = splitSyllables(word);
  if (syllables.length === 0) return word;

  let index = syllableIndex;
  if (Math.abs(index) > syllables.length || index >= syllables.length) {
    index = index < 0 ? -1 : 0;
  }
  const position = index < 0 ? syllables.length + index : index;

  const target = syllables[position];
  const chars = [...target];
  const vowelAt = chars.findIndex(isVowel);
  if (vowelAt === -1) return word;

  syllables[position] = chars.slice(0, vowelAt).join('') + infix + chars.slice(vowelAt).join('');
  return syllables.join('');
}

/**
 * Fill the three infix slots in order. The pre-first and first slots go into
 * the second-to-last syllable, the second slot into the last one; the
 * pre-first slot is skipped for one-syllable verbs.
 */
export function addInfixes(verb: string, slots: InfixSlots): string {
  let result = verb;

  if (slots.preFirst && splitSyllables(result).length >= 2) {
    result = insertInfix(result, slots.preFirst, -2);
  }
  if (slots.first) {
    result = insertInfix(result, slots.first, -2);
  }
  if (slots.second) {
    result = insertInfix(result, slots.second, -1);
  }

  return result;
}

export function participle(verb: string, voice: Voice = 'active'): string {
  return addInfixes(verb, { first: voice === 'active' ? ACTIVE_PARTICIPLE_INFIX : PASSIVE_PARTICIPLE_INFIX });
}

export function causative(verb: string): string {
  return addInfixes(verb, { preFirst: CAUSATIVE_INFIX });
}

export function reflexive(verb: string): string {
  return addInfixes(verb, { preFirst: REFLEXIVE_INFIX });
}
