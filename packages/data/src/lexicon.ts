// @navi-morph/data/lexicon - Dictionary records and in-memory lookup

import { dp } from '@navi-morph/core';

export interface LexicalRecord {
  surfaceForm: string;
  syllabicForm: string;
  acousticForm: string;
  partOfSpeech: string;
  translations: string[];
}

export interface LexiconLookup {
  lookup(lemma: string): LexicalRecord | undefined;
}

/** Anything that can produce dictionary records: a TSV file, a remote API */
export interface LexiconProvider {
  readonly name: string;
  load(): Promise<LexicalRecord[]>;
}

export const UNKNOWN_PART_OF_SPEECH = 'unknown';

/**
 * Lower-cased surface form → record. When two records share a surface form
 * the first one is kept.
 */
export class InMemoryLexicon implements LexiconLookup {
  private readonly records = new Map<string, LexicalRecord>();

  constructor(records: Iterable<LexicalRecord> = []) {
    for (const record of records) {
      const key = record.surfaceForm.toLowerCase();
      if (!this.records.has(key)) {
        this.records.set(key, record);
      }
    }
  }

  get size(): number {
    return this.records.size;
  }

  lookup(lemma: string): LexicalRecord | undefined {
    return this.records.get(lemma.toLowerCase());
  }
}

export async function loadLexicon(provider: LexiconProvider): Promise<InMemoryLexicon> {
  const records = await provider.load();
  dp(`${provider.name}: ${records.length} records`);
  return new InMemoryLexicon(records);
}

// ============================================================================
// VALIDATION
// ============================================================================

export interface RawRecordFields {
  surfaceForm: unknown;
  syllabicForm?: unknown;
  acousticForm?: unknown;
  partOfSpeech?: unknown;
  translations?: unknown;
}

function optionalText(value: unknown): string | undefined {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value.trim() : undefined;
}

function toTextList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const texts = value.filter((item): item is string => typeof item === 'string');
  return texts.length === value.length ? texts.map(text => text.trim()) : undefined;
}

/**
 * Check one record coming from a provider. Returns undefined, after a
 * warning, when a field has the wrong type or the surface form is empty.
 */
export function toLexicalRecord(fields: RawRecordFields, source: string): LexicalRecord | undefined {
  const surfaceForm = typeof fields.surfaceForm === 'string' ? fields.surfaceForm.trim().toLowerCase() : '';
  if (!surfaceForm) {
    console.warn(`${source}: skipping record without a surface form`);
    return undefined;
  }

  const syllabicForm = optionalText(fields.syllabicForm);
  const acousticForm = optionalText(fields.acousticForm);
  const partOfSpeech = optionalText(fields.partOfSpeech);
  const translations = toTextList(fields.translations ?? []);
  if (
    syllabicForm === undefined ||
    acousticForm === undefined ||
    partOfSpeech === undefined ||
    translations === undefined
  ) {
    console.warn(`${source}: skipping malformed record '${surfaceForm}'`);
    return undefined;
  }

  return {
    surfaceForm,
    syllabicForm,
    acousticForm,
    partOfSpeech: partOfSpeech || UNKNOWN_PART_OF_SPEECH,
    translations
  };
}
