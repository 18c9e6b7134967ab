// navi-morph/words/pronoun - Pronoun paradigms and their irregular forms

import { UnknownCategoryOrFeatureError } from '../errors.js';
import { applyLenition, phonologicalProfile } from '../phonology.js';
import { nounCase } from './noun.js';
import type {
  GrammaticalNumber,
  NounCase,
  PronounFeatures,
  QuestionGender,
  Register
} from './types.js';

// ============================================================================
// TABLES
// ============================================================================

const IRREGULAR_GENITIVES: ReadonlyMap<string, string> = new Map([
  ['fko', 'fkeyä'],
  ['nga', 'ngeyä'],
  ['po', 'peyä'],
  ['sno', 'sneyä'],
  ["tsa'u", 'tseyä'],
  ['ayla', 'ayleyä'],
  ['fo', 'feyä'],
  ['awnga', 'awngeyä'],
  ['ayoeng', 'ayoengeyä'],
  ['oe', 'oeyä'],
  ['moe', 'moeyä'],
  ['pxoe', 'pxoeyä'],
  ['ayoe', 'ayoeyä'],
  ['oeng', 'oengeyä'],
  ['pxoeng', 'pxoengeyä']
]);

// frapo "everyone", 'awpo "one individual", lapo "another one", fìpo "this one", tsapo "that one"
const DERIVED_PO_PREFIXES = ['fra', "'aw", 'la', 'fì', 'tsa'] as const;

const HONORIFIC_FORMS: ReadonlyMap<string, string> = new Map([
  ['oe', 'ohe'],
  ['moe', 'mohe'],
  ['pxoe', 'pxohe'],
  ['ayoe', 'ayohe'],
  ['oeng', 'oheng'],
  ['pxoeng', 'pxoheng'],
  ['ayoeng', 'ayoheng'],
  ['nga', 'ngenga'],
  ['menga', 'mengenga'],
  ['pxenga', 'pxengenga'],
  ['aynga', 'ayngenga'],
  ['po', 'poho']
]);

const BASIC_PRONOUNS: ReadonlyMap<string, string> = new Map([
  ['first-exclusive-singular', 'oe'],
  ['first-exclusive-dual', 'moe'],
  ['first-exclusive-trial', 'pxoe'],
  ['first-exclusive-plural', 'ayoe'],
  ['first-inclusive-dual', 'oeng'],
  ['first-inclusive-trial', 'pxoeng'],
  ['first-inclusive-plural', 'ayoeng'],
  ['second-singular', 'nga'],
  ['second-dual', 'menga'],
  ['second-trial', 'pxenga'],
  ['second-plural', 'aynga'],
  ['third-animate-singular', 'po'],
  ['third-animate-dual', 'mefo'],
  ['third-animate-trial', 'pxefo'],
  ['third-animate-plural', 'ayfo'],
  ['third-inanimate-singular', "tsa'u"],
  ['third-inanimate-dual', "mesa'u"],
  ['third-inanimate-trial', "pxesa'u"],
  ['third-inanimate-plural', "aysa'u"]
]);

const SHORT_FORMS: ReadonlyMap<string, string> = new Map([
  ['ayoeng', 'awnga'],
  ['ayfo', 'fo'],
  ["aysa'u", "sa'u"]
]);

/** [long, short] "who" forms */
export type QuestionForms = readonly [string, string];

const QUESTION_FORMS: Readonly<Record<QuestionGender, Readonly<Record<GrammaticalNumber, QuestionForms>>>> = {
  common: {
    singular: ['pesu', 'tupe'],
    dual: ['pemsu', 'mesupe'],
    trial: ['pepxsu', 'pxesupe'],
    plural: ['paysu', 'aysupe']
  },
  male: {
    singular: ['pestan', 'tutampe'],
    dual: ['pemstan', 'mestampe'],
    trial: ['pepxstan', 'pxestampe'],
    plural: ['paystan', 'aystampe']
  },
  female: {
    singular: ['peste', 'tutepe'],
    dual: ['pemste', 'mestepe'],
    trial: ['pepxste', 'pxestepe'],
    plural: ['payste', 'aystepe']
  }
};

// "others": a paradigm of its own, listed rather than derived
const LAHE_FORMS: Readonly<Record<Register, Readonly<Record<NounCase, string>>>> = {
  full: {
    subjective: 'aylahe',
    agentive: 'aylahel',
    patientive: 'aylaheti',
    dative: 'aylaheru',
    genitive: 'aylaheyä',
    topical: 'aylaheri'
  },
  short: {
    subjective: 'ayla',
    agentive: 'aylal',
    patientive: 'aylat',
    dative: 'aylar',
    genitive: 'ayleyä',
    topical: 'aylari'
  }
};

const IRREGULAR_PLURAL_BASES = ['po', 'fo'];

// ============================================================================
// FORMS
// ============================================================================

function isThirdSingularAnimate(features: Pick<PronounFeatures, 'person' | 'number' | 'animacy'>): boolean {
  return features.person === 'third' && features.number === 'singular' && features.animacy === 'animate';
}

// Same endings as nouns, chosen from the pronoun's own ending
export function pronounCase(lemma: string, caseName: NounCase): string {
  if (caseName === 'genitive') {
    return pronounGenitive(lemma);
  }
  return nounCase(lemma, phonologicalProfile(lemma), caseName);
}

/**
 * Genitive with the irregular table applied; other pronouns take the noun
 * genitive for their own ending.
 *
 *   pronounGenitive('nga')   // 'ngeyä'
 *   pronounGenitive('tsapo') // 'tsapeyä'
 *   pronounGenitive('menga') // 'mengayä'
 */
export function pronounGenitive(lemma: string): string {
  if (DERIVED_PO_PREFIXES.some(prefix => lemma.startsWith(prefix)) && lemma.endsWith('po')) {
    return lemma.slice(0, -2) + 'peyä';
  }
  return IRREGULAR_GENITIVES.get(lemma) ?? nounCase(lemma, phonologicalProfile(lemma), 'genitive');
}

export function honorificForm(lemma: string, features: Pick<PronounFeatures, 'person' | 'number' | 'animacy' | 'gender'>): string {
  if (isThirdSingularAnimate(features)) {
    if (features.gender === 'male') return 'pohan';
    if (features.gender === 'female') return 'pohe';
  }
  return HONORIFIC_FORMS.get(lemma) ?? lemma;
}

export function genderedForm(lemma: string, features: Pick<PronounFeatures, 'person' | 'number' | 'animacy' | 'gender'>): string {
  if (isThirdSingularAnimate(features)) {
    if (features.gender === 'male') return 'poan';
    if (features.gender === 'female') return 'poe';
  }
  return lemma;
}

export function basicPronoun(features: Pick<PronounFeatures, 'person' | 'number' | 'animacy' | 'inclusivity'>): string {
  const key = features.person === 'first'
    ? `first-${features.inclusivity}-${features.number}`
    : features.person === 'second'
      ? `second-${features.number}`
      : `third-${features.animacy}-${features.number}`;

  const pronoun = BASIC_PRONOUNS.get(key);
  if (pronoun === undefined) {
    throw new UnknownCategoryOrFeatureError('pronoun', 'feature combination', key);
  }
  return pronoun;
}

/**
 * Surface pronoun for a full feature set: the basic pronoun in its honorific
 * form when requested, in its gendered form otherwise.
 */
export function pronounForm(features: PronounFeatures): string {
  const base = basicPronoun(features);
  if (features.honorific) {
    return honorificForm(base, features);
  }
  return genderedForm(base, features);
}

export function questionForms(gender: QuestionGender, number: GrammaticalNumber): QuestionForms {
  return QUESTION_FORMS[gender][number];
}

export function questionParadigm(gender: QuestionGender): Readonly<Record<GrammaticalNumber, QuestionForms>> {
  return QUESTION_FORMS[gender];
}

export function shortPlural(lemma: string): string {
  if (IRREGULAR_PLURAL_BASES.includes(lemma)) {
    return 'ay' + applyLenition(lemma);
  }
  return 'ay' + lemma;
}

export function hasShortForm(lemma: string): boolean {
  return SHORT_FORMS.has(lemma);
}

export function shortForm(lemma: string): string {
  return SHORT_FORMS.get(lemma) ?? lemma;
}

export function laheForm(register: Register, caseName: NounCase): string {
  return LAHE_FORMS[register][caseName];
}
