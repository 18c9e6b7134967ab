// @navi-morph/data/parser - Sentence → per-word dictionary information

import {
  ConfigurationError,
  Lemmatizer,
  consoleTraceHook,
  tokenize,
  traced,
  type TraceHook
} from '@navi-morph/core';
import { JsonFileExceptionSource } from './exceptions.js';
import { createProvider, type NaviConfig } from './config.js';
import { loadLexicon, UNKNOWN_PART_OF_SPEECH, type LexicalRecord, type LexiconLookup } from './lexicon.js';
import type { FetchFn } from './providers/api.js';

export type WordInfo = LexicalRecord;

export interface SentenceParserOptions {
  lemmatizer?: Pick<Lemmatizer, 'lemmatize'>;
  trace?: TraceHook;
}

export class SentenceParser {
  private readonly lemmatizer: Pick<Lemmatizer, 'lemmatize'>;
  private readonly trace?: TraceHook;

  constructor(private readonly lexicon: LexiconLookup, options: SentenceParserOptions = {}) {
    this.lemmatizer = options.lemmatizer ?? new Lemmatizer();
    this.trace = options.trace;
  }

  /**
   * Wire a parser from configuration: exception table, lemmatizer and the
   * configured dictionary provider, loaded once.
   */
  static async fromConfig(config: NaviConfig, fetchFn?: FetchFn): Promise<SentenceParser> {
    if (!config.provider) {
      throw new ConfigurationError('no dictionary provider configured', 'NAVI_PROVIDER');
    }
    const trace = config.trace ? consoleTraceHook : undefined;
    const lemmatizer = new Lemmatizer({
      exceptions: new JsonFileExceptionSource(config.exceptionsPath).load(),
      cacheSize: config.lemmaCacheSize,
      trace
    });
    const provider = createProvider(config.provider, fetchFn);
    console.log(`Using provider: ${config.provider.type}`);
    const lexicon = await loadLexicon(provider);
    return new SentenceParser(lexicon, { lemmatizer, trace });
  }

  tokenize(sentence: string): string[] {
    return tokenize(sentence);
  }

  /** Lemmatize, then look the lemma up. Unknown words keep their surface form. */
  getWordInfo(word: string): WordInfo {
    return traced(this.trace, 'getWordInfo', word, () => {
      const lemma = this.lemmatizer.lemmatize(word.toLowerCase());
      const record = this.lexicon.lookup(lemma);
      if (record) {
        return { ...record, translations: [...record.translations] };
      }
      return unknownWord(word);
    });
  }

  parseSentence(sentence: string): WordInfo[] {
    return traced(this.trace, 'parseSentence', sentence, () =>
      this.tokenize(sentence).map(token => this.getWordInfo(token))
    );
  }
}

export function unknownWord(word: string): WordInfo {
  return {
    surfaceForm: word,
    syllabicForm: '',
    acousticForm: '',
    partOfSpeech: UNKNOWN_PART_OF_SPEECH,
    translations: []
  };
}

// ============================================================================
// REPORTING
// ============================================================================

/** Count of each part of speech, most frequent first, ties in first-seen order */
export function partOfSpeechCounts(results: readonly WordInfo[]): [string, number][] {
  const counts = new Map<string, number>();
  for (const info of results) {
    counts.set(info.partOfSpeech, (counts.get(info.partOfSpeech) ?? 0) + 1);
  }
  return [...counts].sort((a, b) => b[1] - a[1]);
}

const TSV_HEADER = ['navi', 'syllabic', 'acoustic', 'pos', 'translations'];

function tsvCell(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

export function formatResultsTsv(results: readonly WordInfo[]): string {
  const lines = [TSV_HEADER.join('\t')];
  for (const info of results) {
    lines.push([
      info.surfaceForm,
      info.syllabicForm,
      info.acousticForm,
      info.partOfSpeech,
      info.translations.join('; ')
    ].map(tsvCell).join('\t'));
  }
  return lines.join('\n');
}
