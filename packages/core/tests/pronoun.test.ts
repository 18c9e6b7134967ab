// Pronoun paradigm tests
import { describe, test, expect } from 'vitest';
import {
  basicPronoun,
  genderedForm,
  hasShortForm,
  honorificForm,
  laheForm,
  pronounCase,
  pronounForm,
  pronounGenitive,
  questionForms,
  questionParadigm,
  shortForm,
  shortPlural
} from '../src/words/pronoun.js';
import { DEFAULT_PRONOUN_FEATURES, type PronounFeatures } from '../src/words/types.js';
import { UnknownCategoryOrFeatureError } from '../src/errors.js';
import { nounCase } from '../src/words/noun.js';
import { phonologicalProfile } from '../src/phonology.js';

const features = (overrides: Partial<PronounFeatures>): PronounFeatures => ({ ...DEFAULT_PRONOUN_FEATURES, ...overrides });

describe('pronounCase', () => {
  test('uses the noun endings for non-genitive cases', () => {
    expect(pronounCase('oe', 'agentive')).toBe('oel');
    expect(pronounCase('nga', 'patientive')).toBe('ngati');
    expect(pronounCase('po', 'dative')).toBe('poru');
    expect(pronounCase('oeng', 'agentive')).toBe('oengil');
    expect(pronounCase('po', 'topical')).toBe('pori');
  });

  test('routes the genitive through the irregular table', () => {
    expect(pronounCase('nga', 'genitive')).toBe('ngeyä');
    expect(pronounCase('oe', 'genitive')).toBe('oeyä');
  });
});

describe('pronounGenitive', () => {
  test('listed irregulars', () => {
    expect(pronounGenitive('po')).toBe('peyä');
    expect(pronounGenitive("tsa'u")).toBe('tseyä');
    expect(pronounGenitive('sno')).toBe('sneyä');
    expect(pronounGenitive('fko')).toBe('fkeyä');
  });

  test('po-derived pronouns share the po genitive', () => {
    expect(pronounGenitive('tsapo')).toBe('tsapeyä');
    expect(pronounGenitive('frapo')).toBe('frapeyä');
    expect(pronounGenitive("'awpo")).toBe("'awpeyä");
  });

  test('unlisted pronouns take the noun genitive for their ending', () => {
    expect(pronounGenitive('menga')).toBe('mengayä');
    expect(pronounGenitive('mefo')).toBe('mefoä');
    expect(pronounCase('aynga', 'genitive')).toBe('ayngayä');
    expect(pronounCase('menga', 'genitive')).toBe(nounCase('menga', phonologicalProfile('menga'), 'genitive'));
  });
});

describe('honorific and gendered forms', () => {
  test('third person singular animate follows gender', () => {
    expect(honorificForm('po', features({ gender: 'male' }))).toBe('pohan');
    expect(honorificForm('po', features({ gender: 'female' }))).toBe('pohe');
    expect(honorificForm('po', features({}))).toBe('poho');
    expect(genderedForm('po', features({ gender: 'male' }))).toBe('poan');
    expect(genderedForm('po', features({ gender: 'female' }))).toBe('poe');
  });

  test('gender is ignored outside the third person singular animate', () => {
    expect(honorificForm('nga', features({ person: 'second', gender: 'male' }))).toBe('ngenga');
    expect(genderedForm('mefo', features({ number: 'dual', gender: 'female' }))).toBe('mefo');
  });

  test('unlisted lemmas stay as they are', () => {
    expect(honorificForm('sno', features({ person: 'second' }))).toBe('sno');
  });
});

describe('basicPronoun', () => {
  test('looks up person, number, inclusivity and animacy', () => {
    expect(basicPronoun(features({ person: 'first' }))).toBe('oe');
    expect(basicPronoun(features({ person: 'first', inclusivity: 'inclusive', number: 'dual' }))).toBe('oeng');
    expect(basicPronoun(features({ person: 'second', number: 'trial' }))).toBe('pxenga');
    expect(basicPronoun(features({ animacy: 'inanimate', number: 'plural' }))).toBe("aysa'u");
  });

  test('rejects combinations with no pronoun', () => {
    expect(() => basicPronoun(features({ person: 'first', inclusivity: 'inclusive' }))).toThrow(UnknownCategoryOrFeatureError);
    expect(() => basicPronoun(features({ person: 'first', inclusivity: 'inclusive' }))).toThrow(
      "Unknown feature combination for pronoun: 'first-inclusive-singular'"
    );
  });

  test('pronounForm applies gender or honorific', () => {
    expect(pronounForm(features({ gender: 'female' }))).toBe('poe');
    expect(pronounForm(features({ gender: 'female', honorific: true }))).toBe('pohe');
    expect(pronounForm(features({ person: 'first', number: 'dual', honorific: true }))).toBe('mohe');
  });
});

describe('question pronouns', () => {
  test('returns the long and short forms', () => {
    expect(questionForms('male', 'dual')).toEqual(['pemstan', 'mestampe']);
    expect(questionForms('common', 'singular')).toEqual(['pesu', 'tupe']);
  });

  test('paradigm covers every number', () => {
    expect(Object.keys(questionParadigm('female'))).toEqual(['singular', 'dual', 'trial', 'plural']);
  });
});

describe('short forms', () => {
  test('shortPlural lenites po and fo only', () => {
    expect(shortPlural('po')).toBe('aypo');
    expect(shortPlural('fo')).toBe('ayfo');
    expect(shortPlural('nga')).toBe('aynga');
  });

  test('shortForm', () => {
    expect(hasShortForm('ayoeng')).toBe(true);
    expect(shortForm('ayoeng')).toBe('awnga');
    expect(hasShortForm('oe')).toBe(false);
    expect(shortForm('oe')).toBe('oe');
  });

  test('lahe paradigm', () => {
    expect(laheForm('full', 'agentive')).toBe('aylahel');
    expect(laheForm('short', 'genitive')).toBe('ayleyä');
  });
});
