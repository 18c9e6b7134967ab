/**
 * Tab-separated dictionary export
 *
 * Expects a header row naming at least `Word (Na'vi)`, `POS` and
 * `Translation (en)`; other columns are ignored. The file carries no
 * syllable or stress information.
 */

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { toLexicalRecord, type LexicalRecord, type LexiconProvider } from '../lexicon.js';

export const TSV_COLUMNS = {
  word: "Word (Na'vi)",
  pos: 'POS',
  translation: 'Translation (en)'
} as const;

function isRowList(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

/** Parse TSV text into records. Missing columns yield no records. */
export function parseLexiconTsv(content: string, source = 'tsv'): LexicalRecord[] {
  const rows: unknown = parse(content, {
    delimiter: '\t',
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true
  });
  if (!isRowList(rows) || rows.length === 0) {
    console.warn(`${source}: TSV file is empty`);
    return [];
  }

  const [header, ...body] = rows;
  const columns = header.map(name => name.trim());
  const wordAt = columns.indexOf(TSV_COLUMNS.word);
  const posAt = columns.indexOf(TSV_COLUMNS.pos);
  const translationAt = columns.indexOf(TSV_COLUMNS.translation);
  if (wordAt === -1 || posAt === -1 || translationAt === -1) {
    console.warn(`${source}: TSV file missing expected columns`);
    return [];
  }

  const records: LexicalRecord[] = [];
  for (const row of body) {
    const record = toLexicalRecord({
      surfaceForm: row[wordAt],
      partOfSpeech: row[posAt],
      translations: row[translationAt] === undefined ? [] : [row[translationAt]]
    }, source);
    if (record) records.push(record);
  }
  return records;
}

export class TsvLexiconProvider implements LexiconProvider {
  readonly name: string;

  constructor(readonly filePath: string) {
    this.name = `tsv:${filePath}`;
  }

  async load(): Promise<LexicalRecord[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      console.error(`Failed to read TSV file ${this.filePath}:`, error instanceof Error ? error.message : error);
      return [];
    }
    return parseLexiconTsv(content, this.filePath);
  }
}
