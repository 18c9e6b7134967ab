// navi-morph/lemmatizer - Reduce an inflected surface word to its lemma

import { LRUCache } from 'lru-cache';
import { DEFAULT_AFFIX_TABLES, byDescendingLength, type AffixTables } from './affixes.js';
import { InvalidInputError } from './errors.js';
import { ExceptionIndex } from './exceptions.js';
import { dp, traced, type TraceHook } from './log.js';

export interface LemmatizerOptions {
  affixes?: AffixTables;
  exceptions?: ExceptionIndex;
  trace?: TraceHook;
  /** Number of memoized results; 0 disables the memo. Default 1000. */
  cacheSize?: number;
}

const DEFAULT_CACHE_SIZE = 1000;

// ============================================================================
// STRIPPING STAGES
// ============================================================================

// At most one prefix, in table order, leaving more than one character past its length
export function stripNumberPrefix(word: string, prefixes: readonly string[]): string {
  for (const prefix of prefixes) {
    if (word.startsWith(prefix) && word.length > prefix.length + 1) {
      return word.slice(prefix.length);
    }
  }
  return word;
}

export function stripCaseSuffix(word: string, suffixes: readonly string[]): string {
  for (const suffix of byDescendingLength(suffixes)) {
    if (word.endsWith(suffix) && word.length > suffix.length + 1) {
      return word.slice(0, word.length - suffix.length);
    }
  }
  return word;
}

// Unlike case suffixes, verb suffixes have no minimum-remainder guard
export function stripVerbSuffix(word: string, suffixes: readonly string[]): string {
  for (const suffix of byDescendingLength(suffixes)) {
    if (word.endsWith(suffix)) {
      return word.slice(0, word.length - suffix.length);
    }
  }
  return word;
}

// ============================================================================
// LEMMATIZER
// ============================================================================

export class Lemmatizer {
  readonly affixes: AffixTables;
  readonly exceptions: ExceptionIndex;
  private readonly trace?: TraceHook;
  private readonly cache: LRUCache<string, string> | null;

  constructor(options: LemmatizerOptions = {}) {
    this.affixes = options.affixes ?? DEFAULT_AFFIX_TABLES;
    this.exceptions = options.exceptions ?? ExceptionIndex.empty();
    this.trace = options.trace;

    const cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
    this.cache = Number.isFinite(cacheSize) && cacheSize > 0
      ? new LRUCache<string, string>({ max: Math.floor(cacheSize) })
      : null;
  }

  /**
   * Lemmatize one token. Number prefix, case suffix and verb suffix are each
   * stripped at most once, in that order, whether or not an earlier stage
   * matched.
   *
   *   lemmatize('pxetsmukan') // 'tsmukan'
   *   lemmatize('tìyawnä')    // 'tìyawn'
   *   lemmatize('kameie')     // 'kame'
   */
  lemmatize(word: unknown): string {
    if (typeof word !== 'string') {
      throw new InvalidInputError('word must be a string', word === null ? 'null' : typeof word);
    }
    return traced(this.trace, 'lemmatize', word, () => this.lemmatizeNormalized(word.toLowerCase()));
  }

  private lemmatizeNormalized(word: string): string {
    const cached = this.cache?.get(word);
    if (cached !== undefined) return cached;

    const lemma = this.resolve(word);
    this.cache?.set(word, lemma);
    return lemma;
  }

  private resolve(word: string): string {
    const exception = this.exceptions.findLemma(word);
    if (exception !== undefined) {
      dp(`lemmatize: '${word}' is an exception of '${exception}'`);
      return exception;
    }

    let stem = stripNumberPrefix(word, this.affixes.numberPrefixes);
    stem = stripCaseSuffix(stem, this.affixes.caseSuffixes);
    stem = stripVerbSuffix(stem, this.affixes.verbSuffixes);

    if (stem !== word) {
      dp(`lemmatize: '${word}' -> '${stem}'`);
    }
    return stem;
  }

  clearCache(): void {
    this.cache?.clear();
  }
}

/**
 * Split a sentence on whitespace and trim surrounding . , ! ? from each token.
 * No further syntax is attempted.
 */
export function tokenize(sentence: string): string[] {
  return sentence
    .split(/\s+/)
    .map(token => token.replace(/^[.,!?]+|[.,!?]+$/g, ''))
    .filter(token => token.length > 0);
}
