/**
 * Exception table loading
 *
 * Reads `{ "lemma": ["form", ...] }` JSON into an ExceptionIndex. Nothing
 * here throws to the caller: a missing or unreadable file gives an empty
 * table, and bad entries are dropped one at a time.
 */

import fs from 'fs';
import { ExceptionIndex, MalformedExceptionDataError, dp } from '@navi-morph/core';

export interface ExceptionSource {
  load(): ExceptionIndex;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed JSON into lemma/forms pairs.
 * A non-object root raises MalformedExceptionDataError; a bad entry is
 * skipped with a warning.
 */
export function parseExceptionData(raw: unknown, source = 'inline'): ExceptionIndex {
  if (!isRecord(raw)) {
    throw new MalformedExceptionDataError('root must be an object of lemma → forms', source);
  }

  const entries: [string, string[]][] = [];
  for (const [lemma, forms] of Object.entries(raw)) {
    if (lemma.trim() === '') {
      console.warn(`Skipping exception entry with an empty lemma (${source})`);
      continue;
    }
    if (!Array.isArray(forms)) {
      console.warn(`Skipping exception entry '${lemma}': forms must be an array (${source})`);
      continue;
    }
    const valid = forms.filter((form): form is string => typeof form === 'string');
    if (valid.length !== forms.length) {
      console.warn(`Skipping exception entry '${lemma}': every form must be a string (${source})`);
      continue;
    }
    entries.push([lemma, valid]);
  }

  dp(`Loaded ${entries.length} exception entries from ${source}`);
  return new ExceptionIndex(entries);
}

export class JsonFileExceptionSource implements ExceptionSource {
  constructor(readonly filePath: string) {}

  load(): ExceptionIndex {
    if (!fs.existsSync(this.filePath)) {
      console.log(`No exception table at ${this.filePath}, using an empty one`);
      return ExceptionIndex.empty();
    }

    try {
      return parseExceptionData(this.readJson(), this.filePath);
    } catch (error) {
      if (error instanceof MalformedExceptionDataError) {
        console.warn(`${error.message}; using an empty exception table`);
        return ExceptionIndex.empty();
      }
      throw error;
    }
  }

  private readJson(): unknown {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedExceptionDataError(`unreadable file (${reason})`, this.filePath);
    }
    try {
      return JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedExceptionDataError(`invalid JSON (${reason})`, this.filePath);
    }
  }
}
