// navi-morph/generate - One entry point over every word-form generator
//
// Requests are tagged by category and form. parseGenerateRequest() checks an
// untyped request against the closed enumerations; generate() runs the same
// check, so a JavaScript caller cannot slip an unknown case or form through.

import { assertOneOf, UnknownCategoryOrFeatureError } from './errors.js';
import { traced, type TraceHook } from './log.js';
import { phonologicalProfile, splitSyllables, type PhonologicalProfile } from './phonology.js';
import { adverb, attributive, colorNoun, comparative } from './words/adjective.js';
import { makeIndefinite, nounCase, nounNumber, nounNumberWithCase } from './words/noun.js';
import { adverbial, cardinal, fraction, ordinal } from './words/number.js';
import { placeParticle } from './words/particle.js';
import { combineWithNoun } from './words/prenoun.js';
import {
  genderedForm,
  honorificForm,
  laheForm,
  pronounCase,
  pronounForm,
  pronounGenitive,
  questionForms,
  shortForm,
  shortPlural
} from './words/pronoun.js';
import {
  ADJECTIVE_POSITIONS,
  ANIMACIES,
  CATEGORIES,
  COMPARISONS,
  DEFAULT_PRONOUN_FEATURES,
  GENDERS,
  GRAMMATICAL_NUMBERS,
  INCLUSIVITIES,
  NOUN_CASES,
  PARTICLE_TYPES,
  PERSONS,
  QUESTION_GENDERS,
  REGISTERS,
  VOICES,
  type AdjectivePosition,
  type Comparison,
  type GrammaticalNumber,
  type NounCase,
  type ParticleType,
  type PronounFeatures,
  type QuestionGender,
  type Register,
  type Voice
} from './words/types.js';
import {
  addInfixes,
  causative,
  FIRST_INFIXES,
  participle,
  PRE_FIRST_INFIXES,
  reflexive,
  SECOND_INFIXES
} from './words/verb.js';

// ============================================================================
// REQUEST TYPES
// ============================================================================

export type NounRequest =
  | { category: 'noun'; lemma: string; form: 'case'; case: NounCase; number?: GrammaticalNumber; profile?: PhonologicalProfile }
  | { category: 'noun'; lemma: string; form: 'number'; number: GrammaticalNumber }
  | { category: 'noun'; lemma: string; form: 'indefinite' };

export type PronounRequest =
  | { category: 'pronoun'; lemma: string; form: 'case'; case: NounCase }
  | { category: 'pronoun'; lemma: string; form: 'genitive' }
  | { category: 'pronoun'; lemma: string; form: 'honorific'; features?: Partial<PronounFeatures> }
  | { category: 'pronoun'; lemma: string; form: 'gendered'; features?: Partial<PronounFeatures> }
  | { category: 'pronoun'; lemma: string; form: 'shortPlural' }
  | { category: 'pronoun'; lemma: string; form: 'shortForm' }
  | { category: 'pronoun'; form: 'basic'; features: Partial<PronounFeatures> }
  | { category: 'pronoun'; form: 'question'; gender: QuestionGender; number: GrammaticalNumber }
  | { category: 'pronoun'; form: 'lahe'; register: Register; case: NounCase };

export type VerbRequest =
  | { category: 'verb'; lemma: string; form: 'infix'; preFirst?: string; first?: string; second?: string }
  | { category: 'verb'; lemma: string; form: 'participle'; voice: Voice }
  | { category: 'verb'; lemma: string; form: 'causative' }
  | { category: 'verb'; lemma: string; form: 'reflexive' }
  | { category: 'verb'; lemma: string; form: 'syllables' };

export type AdjectiveRequest =
  | { category: 'adjective'; lemma: string; form: 'attributive'; position?: AdjectivePosition; leDerived?: boolean }
  | { category: 'adjective'; lemma: string; form: 'adverb' }
  | { category: 'adjective'; lemma: string; form: 'comparative'; comparison: Comparison; comparedTo?: string }
  | { category: 'adjective'; lemma: string; form: 'colorNoun' };

export type NumberRequest = {
  category: 'number';
  form: 'cardinal' | 'ordinal' | 'fraction' | 'adverbial';
  value: number;
};

export type ParticleRequest = { category: 'particle'; lemma: string; form: 'place'; type: ParticleType; context: string };

export type PrenounRequest = { category: 'prenoun'; lemma: string; form: 'combine'; noun: string };

export type GenerateRequest =
  | NounRequest
  | PronounRequest
  | VerbRequest
  | AdjectiveRequest
  | NumberRequest
  | ParticleRequest
  | PrenounRequest;

export const FORMS = {
  noun: ['case', 'number', 'indefinite'],
  pronoun: ['case', 'genitive', 'honorific', 'gendered', 'shortPlural', 'shortForm', 'basic', 'question', 'lahe'],
  verb: ['infix', 'participle', 'causative', 'reflexive', 'syllables'],
  adjective: ['attributive', 'adverb', 'comparative', 'colorNoun'],
  number: ['cardinal', 'ordinal', 'fraction', 'adverbial'],
  particle: ['place'],
  prenoun: ['combine']
} as const satisfies Record<GenerateRequest['category'], readonly string[]>;

// ============================================================================
// VALIDATION
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class FieldReader {
  constructor(private readonly raw: Record<string, unknown>, private readonly category: string) {}

  string(key: string): string {
    const value = this.raw[key];
    if (typeof value !== 'string') {
      throw new UnknownCategoryOrFeatureError(this.category, key, value);
    }
    return value;
  }

  optionalString(key: string): string | undefined {
    return this.raw[key] === undefined ? undefined : this.string(key);
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T {
    return assertOneOf(this.raw[key], allowed, this.category, key);
  }

  optionalOneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
    return this.raw[key] === undefined ? undefined : this.oneOf(key, allowed);
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.raw[key];
    if (value === undefined || typeof value === 'boolean') return value;
    throw new UnknownCategoryOrFeatureError(this.category, key, value);
  }

  integer(key: string): number {
    const value = this.raw[key];
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new UnknownCategoryOrFeatureError(this.category, key, value);
    }
    return value;
  }

  profile(key: string): PhonologicalProfile | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      throw new UnknownCategoryOrFeatureError(this.category, key, value);
    }
    const nested = new FieldReader(value, this.category);
    return {
      endsWithVowel: nested.optionalBoolean('endsWithVowel') ?? false,
      endsWithDiphthong: nested.optionalBoolean('endsWithDiphthong') ?? false,
      endsWithPseudovowel: nested.optionalBoolean('endsWithPseudovowel') ?? false
    };
  }

  pronounFeatures(key: string): Partial<PronounFeatures> | undefined {
    const value = this.raw[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      throw new UnknownCategoryOrFeatureError(this.category, key, value);
    }
    const nested = new FieldReader(value, this.category);
    const features: Partial<PronounFeatures> = {};
    const person = nested.optionalOneOf('person', PERSONS);
    const number = nested.optionalOneOf('number', GRAMMATICAL_NUMBERS);
    const animacy = nested.optionalOneOf('animacy', ANIMACIES);
    const inclusivity = nested.optionalOneOf('inclusivity', INCLUSIVITIES);
    const gender = nested.optionalOneOf('gender', GENDERS);
    const honorific = nested.optionalBoolean('honorific');
    if (person !== undefined) features.person = person;
    if (number !== undefined) features.number = number;
    if (animacy !== undefined) features.animacy = animacy;
    if (inclusivity !== undefined) features.inclusivity = inclusivity;
    if (gender !== undefined) features.gender = gender;
    if (honorific !== undefined) features.honorific = honorific;
    return features;
  }
}

function parseNoun(r: FieldReader): NounRequest {
  const lemma = r.string('lemma');
  const form = r.oneOf('form', FORMS.noun);
  switch (form) {
    case 'case': {
      const request: Extract<NounRequest, { form: 'case' }> = { category: 'noun', lemma, form, case: r.oneOf('case', NOUN_CASES) };
      const number = r.optionalOneOf('number', GRAMMATICAL_NUMBERS);
      const profile = r.profile('profile');
      // A numbered form derives its own profile
      if (profile !== undefined && number !== undefined && number !== 'singular') {
        throw new UnknownCategoryOrFeatureError('noun', 'number with an explicit profile', number, ['singular']);
      }
      if (number !== undefined) request.number = number;
      if (profile !== undefined) request.profile = profile;
      return request;
    }
    case 'number':
      return { category: 'noun', lemma, form, number: r.oneOf('number', GRAMMATICAL_NUMBERS) };
    case 'indefinite':
      return { category: 'noun', lemma, form };
  }
}

function parsePronoun(r: FieldReader): PronounRequest {
  const form = r.oneOf('form', FORMS.pronoun);
  switch (form) {
    case 'case':
      return { category: 'pronoun', lemma: r.string('lemma'), form, case: r.oneOf('case', NOUN_CASES) };
    case 'honorific':
    case 'gendered': {
      const request: Extract<PronounRequest, { form: 'honorific' | 'gendered' }> = { category: 'pronoun', lemma: r.string('lemma'), form };
      const features = r.pronounFeatures('features');
      if (features !== undefined) request.features = features;
      return request;
    }
    case 'genitive':
    case 'shortPlural':
    case 'shortForm':
      return { category: 'pronoun', lemma: r.string('lemma'), form };
    case 'basic':
      return { category: 'pronoun', form, features: r.pronounFeatures('features') ?? {} };
    case 'question':
      return {
        category: 'pronoun',
        form,
        gender: r.optionalOneOf('gender', QUESTION_GENDERS) ?? 'common',
        number: r.optionalOneOf('number', GRAMMATICAL_NUMBERS) ?? 'singular'
      };
    case 'lahe':
      return {
        category: 'pronoun',
        form,
        register: r.optionalOneOf('register', REGISTERS) ?? 'full',
        case: r.oneOf('case', NOUN_CASES)
      };
  }
}

function parseVerb(r: FieldReader): VerbRequest {
  const lemma = r.string('lemma');
  const form = r.oneOf('form', FORMS.verb);
  switch (form) {
    case 'infix': {
      const request: Extract<VerbRequest, { form: 'infix' }> = { category: 'verb', lemma, form };
      const preFirst = r.optionalOneOf('preFirst', PRE_FIRST_INFIXES);
      const first = r.optionalOneOf('first', FIRST_INFIXES);
      const second = r.optionalOneOf('second', SECOND_INFIXES);
      if (preFirst !== undefined) request.preFirst = preFirst;
      if (first !== undefined) request.first = first;
      if (second !== undefined) request.second = second;
      return request;
    }
    case 'participle':
      return { category: 'verb', lemma, form, voice: r.optionalOneOf('voice', VOICES) ?? 'active' };
    case 'causative':
    case 'reflexive':
    case 'syllables':
      return { category: 'verb', lemma, form };
  }
}

function parseAdjective(r: FieldReader): AdjectiveRequest {
  const lemma = r.string('lemma');
  const form = r.oneOf('form', FORMS.adjective);
  switch (form) {
    case 'attributive': {
      const request: Extract<AdjectiveRequest, { form: 'attributive' }> = { category: 'adjective', lemma, form };
      const position = r.optionalOneOf('position', ADJECTIVE_POSITIONS);
      const leDerived = r.optionalBoolean('leDerived');
      if (position !== undefined) request.position = position;
      if (leDerived !== undefined) request.leDerived = leDerived;
      return request;
    }
    case 'comparative': {
      const request: Extract<AdjectiveRequest, { form: 'comparative' }> = { category: 'adjective', lemma, form, comparison: r.oneOf('comparison', COMPARISONS) };
      const comparedTo = r.optionalString('comparedTo');
      if (comparedTo !== undefined) request.comparedTo = comparedTo;
      return request;
    }
    case 'adverb':
    case 'colorNoun':
      return { category: 'adjective', lemma, form };
  }
}

/**
 * Validate an untyped request (parsed JSON, CLI options) into a GenerateRequest.
 * Every category, form and enumerated feature outside its closed set raises
 * UnknownCategoryOrFeatureError.
 */
export function parseGenerateRequest(raw: unknown): GenerateRequest {
  if (!isRecord(raw)) {
    throw new UnknownCategoryOrFeatureError('request', 'shape', raw);
  }
  const category = assertOneOf(raw.category, CATEGORIES, 'request', 'category');
  const r = new FieldReader(raw, category);

  switch (category) {
    case 'noun':
      return parseNoun(r);
    case 'pronoun':
      return parsePronoun(r);
    case 'verb':
      return parseVerb(r);
    case 'adjective':
      return parseAdjective(r);
    case 'number':
      return { category, form: r.oneOf('form', FORMS.number), value: r.integer('value') };
    case 'particle':
      return {
        category,
        lemma: r.string('lemma'),
        form: r.oneOf('form', FORMS.particle),
        type: r.optionalOneOf('type', PARTICLE_TYPES) ?? 'general',
        context: r.string('context')
      };
    case 'prenoun':
      return { category, lemma: r.string('lemma'), form: r.oneOf('form', FORMS.prenoun), noun: r.string('noun') };
  }
}

// ============================================================================
// DISPATCH
// ============================================================================

function generateNoun(request: NounRequest): string {
  switch (request.form) {
    case 'case':
      if (request.number !== undefined && request.number !== 'singular') {
        return nounNumberWithCase(request.lemma, request.number, request.case);
      }
      return nounCase(request.lemma, request.profile ?? phonologicalProfile(request.lemma), request.case);
    case 'number':
      return nounNumber(request.lemma, request.number);
    case 'indefinite':
      return makeIndefinite(request.lemma);
  }
}

function generatePronoun(request: PronounRequest): string | string[] {
  switch (request.form) {
    case 'case':
      return pronounCase(request.lemma, request.case);
    case 'genitive':
      return pronounGenitive(request.lemma);
    case 'honorific':
      return honorificForm(request.lemma, { ...DEFAULT_PRONOUN_FEATURES, ...request.features });
    case 'gendered':
      return genderedForm(request.lemma, { ...DEFAULT_PRONOUN_FEATURES, ...request.features });
    case 'shortPlural':
      return shortPlural(request.lemma);
    case 'shortForm':
      return shortForm(request.lemma);
    case 'basic':
      return pronounForm({ ...DEFAULT_PRONOUN_FEATURES, ...request.features });
    case 'question':
      return [...questionForms(request.gender, request.number)];
    case 'lahe':
      return laheForm(request.register, request.case);
  }
}

function generateVerb(request: VerbRequest): string | string[] {
  switch (request.form) {
    case 'infix':
      return addInfixes(request.lemma, { preFirst: request.preFirst, first: request.first, second: request.second });
    case 'participle':
      return participle(request.lemma, request.voice);
    case 'causative':
      return causative(request.lemma);
    case 'reflexive':
      return reflexive(request.lemma);
    case 'syllables':
      return splitSyllables(request.lemma);
  }
}

function generateAdjective(request: AdjectiveRequest): string {
  switch (request.form) {
    case 'attributive':
      return attributive(request.lemma, { position: request.position, leDerived: request.leDerived });
    case 'adverb':
      return adverb(request.lemma);
    case 'comparative':
      return comparative(request.lemma, request.comparison, request.comparedTo);
    case 'colorNoun':
      return colorNoun(request.lemma);
  }
}

function generateNumber(request: NumberRequest): string {
  switch (request.form) {
    case 'cardinal':
      return cardinal(request.value);
    case 'ordinal':
      return ordinal(request.value);
    case 'fraction':
      return fraction(request.value);
    case 'adverbial':
      return adverbial(request.value);
  }
}

function describeRequest(request: GenerateRequest): string {
  const subject = 'lemma' in request ? request.lemma : request.category === 'number' ? String(request.value) : '-';
  return `${request.category}.${request.form} ${subject}`;
}

/**
 * Produce the surface form(s) for one request.
 *
 *   generate({ category: 'noun', lemma: 'tute', form: 'case', case: 'agentive' }) // 'tutel'
 *   generate({ category: 'verb', lemma: 'taron', form: 'participle', voice: 'active' }) // 'tusaron'
 */
export function generate(request: GenerateRequest, trace?: TraceHook): string | string[] {
  const checked = parseGenerateRequest(request);
  return traced(trace, 'generate', describeRequest(checked), () => {
    switch (checked.category) {
      case 'noun':
        return generateNoun(checked);
      case 'pronoun':
        return generatePronoun(checked);
      case 'verb':
        return generateVerb(checked);
      case 'adjective':
        return generateAdjective(checked);
      case 'number':
        return generateNumber(checked);
      case 'particle':
        return placeParticle(checked.lemma, checked.type, checked.context);
      case 'prenoun':
        return combineWithNoun(checked.lemma, checked.noun);
    }
  });
}
