/**
 * Remote dictionary over HTTP
 *
 * GETs one JSON array of entries shaped like
 * `{ navi, syllabic, acoustic, wordclass, translations }`.
 */

import { dp } from '@navi-morph/core';
import { toLexicalRecord, type LexicalRecord, type LexiconProvider } from '../lexicon.js';

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Pick<Response, 'ok' | 'status' | 'statusText' | 'json'>>;

export interface DictionaryApiOptions {
  url: string;
  timeoutMs: number;
  /** Total attempts, including the first */
  retries: number;
  fetch?: FetchFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toApiRecords(body: unknown, source: string): LexicalRecord[] {
  if (!Array.isArray(body)) {
    console.warn(`${source}: returned a non-list response; expected a list`);
    return [];
  }

  const records: LexicalRecord[] = [];
  for (const item of body) {
    if (!isRecord(item)) {
      console.warn(`${source}: skipping non-object entry`);
      continue;
    }
    const record = toLexicalRecord({
      surfaceForm: item.navi,
      syllabicForm: item.syllabic,
      acousticForm: item.acoustic,
      partOfSpeech: item.wordclass,
      translations: item.translations
    }, source);
    if (record) records.push(record);
  }
  return records;
}

export class DictionaryApiProvider implements LexiconProvider {
  readonly name: string;
  private readonly fetch: FetchFn;

  constructor(private readonly options: DictionaryApiOptions) {
    this.name = `api:${options.url}`;
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async load(): Promise<LexicalRecord[]> {
    const attempts = Math.max(1, this.options.retries);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        console.log(`Loading dictionary API (attempt ${attempt})`);
        const body = await this.request();
        return toApiRecords(body, this.name);
      } catch (error) {
        console.warn(`Dictionary API load failed: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    console.error('Dictionary API unreachable');
    return [];
  }

  private async request(): Promise<unknown> {
    const response = await this.fetch(this.options.url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    const body: unknown = await response.json();
    dp(`${this.name}: response received`);
    return body;
  }
}
