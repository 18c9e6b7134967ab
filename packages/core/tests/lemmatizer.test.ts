// Lemmatizer tests
import { describe, test, expect } from 'vitest';
import { Lemmatizer, tokenize } from '../src/lemmatizer.js';
import { createAffixTables } from '../src/affixes.js';
import { ExceptionIndex } from '../src/exceptions.js';
import { InvalidInputError } from '../src/errors.js';
import type { TraceEvent } from '../src/log.js';

describe('Lemmatizer', () => {
  const lemmatizer = new Lemmatizer();

  test('strips a number prefix', () => {
    expect(lemmatizer.lemmatize('pxetsmukan')).toBe('tsmukan');
  });

  test('strips a case suffix', () => {
    expect(lemmatizer.lemmatize('tìyawnä')).toBe('tìyawn');
  });

  test('strips a verb suffix', () => {
    expect(lemmatizer.lemmatize('kameie')).toBe('kame');
  });

  test('tries longer case suffixes first', () => {
    // -ri would leave "tsmukanì"
    expect(lemmatizer.lemmatize('tsmukanìri')).toBe('tsmukan');
  });

  test('lower-cases its input', () => {
    expect(lemmatizer.lemmatize('PXETSMUKAN')).toBe('tsmukan');
  });

  test('empty string comes back unchanged', () => {
    expect(lemmatizer.lemmatize('')).toBe('');
  });

  test('strips at most one number prefix', () => {
    expect(lemmatizer.lemmatize('ayayfo')).toBe('ayfo');
  });

  test('bare stems are left alone', () => {
    for (const stem of ['tsmukan', 'tìyawn', 'kame']) {
      expect(lemmatizer.lemmatize(stem)).toBe(stem);
      expect(lemmatizer.lemmatize(lemmatizer.lemmatize(stem))).toBe(stem);
    }
  });

  test('keeps a number prefix when too little stem would remain', () => {
    expect(lemmatizer.lemmatize('ayo')).toBe('ayo');
  });

  test('keeps a case suffix when too little stem would remain', () => {
    expect(lemmatizer.lemmatize('yä')).toBe('yä');
  });

  test('verb suffixes have no remainder guard', () => {
    expect(lemmatizer.lemmatize('ie')).toBe('');
    expect(lemmatizer.lemmatize('u')).toBe('');
  });

  test('rejects non-string input', () => {
    expect(() => lemmatizer.lemmatize(42)).toThrow(InvalidInputError);
    expect(() => lemmatizer.lemmatize(null)).toThrow('Invalid input: word must be a string | Type: null');
    expect(() => lemmatizer.lemmatize(undefined)).toThrow('Type: undefined');
  });
});

describe('Lemmatizer exceptions', () => {
  const exceptions = ExceptionIndex.fromRecord({ ayoe: ['ayoel', 'AYOERU'] });
  const lemmatizer = new Lemmatizer({ exceptions });

  test('listed forms map to their lemma before any affix rule', () => {
    // The regular rules would give "oe"
    expect(new Lemmatizer().lemmatize('ayoel')).toBe('oe');
    expect(lemmatizer.lemmatize('ayoel')).toBe('ayoe');
  });

  test('forms are compared case-insensitively', () => {
    expect(lemmatizer.lemmatize('Ayoeru')).toBe('ayoe');
  });

  test('the lemma is one of its own forms', () => {
    expect(lemmatizer.lemmatize('ayoe')).toBe('ayoe');
  });
});

describe('Lemmatizer options', () => {
  test('number prefixes are scanned in table order, not by length', () => {
    const affixes = createAffixTables({ numberPrefixes: ['p', 'pxe'] });
    expect(new Lemmatizer({ affixes }).lemmatize('pxetsmukan')).toBe('xetsmukan');
  });

  test('an empty verb suffix table disables that stage', () => {
    const affixes = createAffixTables({ verbSuffixes: [] });
    expect(new Lemmatizer({ affixes }).lemmatize('kameie')).toBe('kameie');
  });

  test('affix tables hold only the tables the lemmatizer scans', () => {
    expect(Object.keys(createAffixTables())).toEqual(['numberPrefixes', 'caseSuffixes', 'verbSuffixes']);
  });

  test('reports calls to the trace hook, cached or not', () => {
    const events: TraceEvent[] = [];
    const lemmatizer = new Lemmatizer({ trace: event => events.push(event) });

    lemmatizer.lemmatize('kameie');
    lemmatizer.lemmatize('kameie');

    expect(events.map(e => e.phase)).toEqual(['start', 'end', 'start', 'end']);
    expect(events[0]).toEqual({ phase: 'start', operation: 'lemmatize', input: 'kameie' });
    expect(events[1]).toMatchObject({ phase: 'end', operation: 'lemmatize', output: 'kame' });
  });

  test('works with the memo disabled', () => {
    const lemmatizer = new Lemmatizer({ cacheSize: 0 });
    expect(lemmatizer.lemmatize('pxetsmukan')).toBe('tsmukan');
    expect(lemmatizer.lemmatize('pxetsmukan')).toBe('tsmukan');
  });
});

describe('tokenize', () => {
  test('splits on whitespace and trims punctuation', () => {
    expect(tokenize('Oel ngati kameie, ma tsmukan!')).toEqual(['Oel', 'ngati', 'kameie', 'ma', 'tsmukan']);
  });

  test('drops tokens that were only punctuation', () => {
    expect(tokenize('  Kaltxì ! ?  ')).toEqual(['Kaltxì']);
  });
});

describe('ExceptionIndex', () => {
  test('lists a lemma among its own forms', () => {
    const index = ExceptionIndex.fromRecord({ Oe: ['oel'] });
    expect(index.formsOf('oe')).toEqual(['oe', 'oel']);
    expect(index.lemmas()).toEqual(['oe']);
    expect(index.size).toBe(1);
  });

  test('returns undefined for unknown words', () => {
    expect(ExceptionIndex.empty().findLemma('tute')).toBeUndefined();
  });
});
