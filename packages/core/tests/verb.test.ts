// Verb infix tests
import { describe, test, expect } from 'vitest';
import { addInfixes, causative, insertInfix, participle, reflexive } from '../src/words/verb.js';

describe('insertInfix', () => {
  test('inserts before the vowel of the chosen syllable', () => {
    expect(insertInfix('taron', 'us', -2)).toBe('tusaron');
    expect(insertInfix('kame', 'ei', -1)).toBe('kameie');
  });

  test('clamps out-of-range indices', () => {
    expect(insertInfix('taron', 'us', 5)).toBe('tusaron');
    expect(insertInfix('kame', 'ol', 2)).toBe('kolame');
    expect(insertInfix('kame', 'ol', -5)).toBe('kamole');
  });

  test('leaves words without vowels alone', () => {
    expect(insertInfix('hrr', 'ol', -1)).toBe('hrr');
    expect(insertInfix('', 'ol', -1)).toBe('');
  });
});

describe('addInfixes', () => {
  test('second slot goes into the last syllable', () => {
    expect(addInfixes('kame', { second: 'ei' })).toBe('kameie');
  });

  test('first and second slots together', () => {
    expect(addInfixes('kame', { first: 'ol', second: 'ei' })).toBe('kolameie');
  });

  test('pre-first then first', () => {
    expect(addInfixes('taron', { preFirst: 'eyk', first: 'us' })).toBe('teykusaron');
  });

  test('no slots returns the verb', () => {
    expect(addInfixes('taron', {})).toBe('taron');
  });
});

describe('derived forms', () => {
  test('participles', () => {
    expect(participle('taron')).toBe('tusaron');
    expect(participle('taron', 'passive')).toBe('tawnaron');
    expect(participle('si')).toBe('susi');
  });

  test('causative and reflexive need two syllables', () => {
    expect(causative('taron')).toBe('teykaron');
    expect(reflexive('taron')).toBe('täparon');
    expect(causative('si')).toBe('si');
  });
});
