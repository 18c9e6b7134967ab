// navi-morph/words/types - Closed feature enumerations shared by the generators

export const CATEGORIES = ['noun', 'pronoun', 'verb', 'adjective', 'number', 'particle', 'prenoun'] as const;
export type Category = typeof CATEGORIES[number];

export const NOUN_CASES = ['subjective', 'agentive', 'patientive', 'dative', 'genitive', 'topical'] as const;
export type NounCase = typeof NOUN_CASES[number];

export const GRAMMATICAL_NUMBERS = ['singular', 'dual', 'trial', 'plural'] as const;
export type GrammaticalNumber = typeof GRAMMATICAL_NUMBERS[number];

export const PERSONS = ['first', 'second', 'third'] as const;
export type Person = typeof PERSONS[number];

export const ANIMACIES = ['animate', 'inanimate'] as const;
export type Animacy = typeof ANIMACIES[number];

export const INCLUSIVITIES = ['exclusive', 'inclusive'] as const;
export type Inclusivity = typeof INCLUSIVITIES[number];

export const GENDERS = ['neutral', 'male', 'female'] as const;
export type Gender = typeof GENDERS[number];

export const QUESTION_GENDERS = ['common', 'male', 'female'] as const;
export type QuestionGender = typeof QUESTION_GENDERS[number];

export const REGISTERS = ['full', 'short'] as const;
export type Register = typeof REGISTERS[number];

export interface PronounFeatures {
  person: Person;
  number: GrammaticalNumber;
  animacy: Animacy;
  /** Only meaningful for the first person */
  inclusivity: Inclusivity;
  /** Only meaningful for the third person singular animate */
  gender: Gender;
  honorific: boolean;
}

export const DEFAULT_PRONOUN_FEATURES: Readonly<PronounFeatures> = Object.freeze({
  person: 'third',
  number: 'singular',
  animacy: 'animate',
  inclusivity: 'exclusive',
  gender: 'neutral',
  honorific: false
});

export interface InfixSlots {
  /** Causative / reflexive slot */
  preFirst?: string;
  /** Tense, aspect, mood and participle slot */
  first?: string;
  /** Affect and evidentiality slot */
  second?: string;
}

export const ADJECTIVE_POSITIONS = ['before', 'after'] as const;
export type AdjectivePosition = typeof ADJECTIVE_POSITIONS[number];

export const COMPARISONS = ['standard', 'superlative', 'equality'] as const;
export type Comparison = typeof COMPARISONS[number];

export const PARTICLE_TYPES = ['question', 'vocative', 'negative', 'general'] as const;
export type ParticleType = typeof PARTICLE_TYPES[number];

export const VOICES = ['active', 'passive'] as const;
export type Voice = typeof VOICES[number];
