// navi-morph/affixes - Affix tables used by the lemmatizer

export interface AffixTables {
  /** Scanned in table order; the first match wins */
  readonly numberPrefixes: readonly string[];
  /** Scanned longest first */
  readonly caseSuffixes: readonly string[];
  /** Scanned longest first */
  readonly verbSuffixes: readonly string[];
}

export const NUMBER_PREFIXES = ['ay', 'me', 'pxe'] as const;
export const CASE_SUFFIXES = ['l', 'ìl', 'ti', 'it', 'ru', 'ìri', 'yä', 'ri', 'ä'] as const;
export const VERB_SUFFIXES = ['ie', 'i', 'u', 'ìm'] as const;

export const DEFAULT_AFFIX_TABLES: AffixTables = Object.freeze({
  numberPrefixes: NUMBER_PREFIXES,
  caseSuffixes: CASE_SUFFIXES,
  verbSuffixes: VERB_SUFFIXES
});

export function createAffixTables(overrides: Partial<AffixTables> = {}): AffixTables {
  return Object.freeze({
    numberPrefixes: Object.freeze([...(overrides.numberPrefixes ?? NUMBER_PREFIXES)]),
    caseSuffixes: Object.freeze([...(overrides.caseSuffixes ?? CASE_SUFFIXES)]),
    verbSuffixes: Object.freeze([...(overrides.verbSuffixes ?? VERB_SUFFIXES)])
  });
}

// Stable: affixes of equal length keep their table order
export function byDescendingLength(affixes: readonly string[]): string[] {
  return [...affixes].sort((a, b) => b.length - a.length);
}
