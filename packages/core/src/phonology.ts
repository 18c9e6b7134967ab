// navi-morph/phonology - Character classes, lenition and syllables

// ============================================================================
// CHARACTER CLASSES
// ============================================================================

export const VOWELS = ['a', 'e', 'i', 'ì', 'o', 'u', 'ä'] as const;
export const DIPHTHONGS = ['aw', 'ay', 'ew', 'ey'] as const;
export const PSEUDOVOWELS = ['ll', 'rr'] as const;

const VOWEL_SET: ReadonlySet<string> = new Set<string>(VOWELS);

export interface PhonologicalProfile {
  endsWithVowel: boolean;
  endsWithDiphthong: boolean;
  endsWithPseudovowel: boolean;
}

export function isVowel(char: string): boolean {
  return VOWEL_SET.has(char);
}

export function endsWithVowel(word: string): boolean {
  return word.length > 0 && isVowel(word[word.length - 1]);
}

export function endsWithDiphthong(word: string): boolean {
  return DIPHTHONGS.some(d => word.endsWith(d));
}

export function endsWithPseudovowel(word: string): boolean {
  return PSEUDOVOWELS.some(p => word.endsWith(p));
}

/**
 * Derive the ending profile of a surface string.
 * Never cached: a numbered noun gets its own profile, not its lemma's.
 */
export function phonologicalProfile(word: string): PhonologicalProfile {
  const lower = word.toLowerCase();
  return {
    endsWithVowel: endsWithVowel(lower),
    endsWithDiphthong: endsWithDiphthong(lower),
    endsWithPseudovowel: endsWithPseudovowel(lower)
  };
}

// ============================================================================
// LENITION
// ============================================================================

/**
 * Ordered [from, to] pairs. Clusters come before single letters so that
 * "px" is never read as "p" followed by "x".
 */
export const LENITION_RULES: readonly (readonly [string, string])[] = Object.freeze([
  ['px', 'p'],
  ['tx', 't'],
  ['kx', 'k'],
  ['ts', 's'],
  ['p', 'p'],
  ['t', 't'],
  ['k', 'k']
] as const);

export function applyLenition(
  word: string,
  rules: readonly (readonly [string, string])[] = LENITION_RULES
): string {
  for (const [from, to] of rules) {
    if (word.startsWith(from)) {
      return to + word.slice(from.length);
    }
  }
  return word;
}

// ============================================================================
// SYLLABLES
// ============================================================================

/**
 * Split a word into syllables. A syllable runs up to and including the next
 * vowel; consonants after the last vowel join the final syllable. A word
 * without vowels comes back as a single syllable.
 *
 *   splitSyllables('taron')  // ['ta', 'ron']
 *   splitSyllables('kame')   // ['ka', 'me']
 */
export function splitSyllables(word: string): string[] {
  const syllables: string[] = [];
  let current = '';

  for (const char of word) {
    current += char;
    if (isVowel(char)) {
      syllables.push(current);
      current = '';
    }
  }

  if (current) {
    if (syllables.length > 0) {
      syllables[syllables.length - 1] += current;
    } else {
      syllables.push(current);
    }
  }

  return syllables;
}
