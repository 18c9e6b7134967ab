// @navi-morph/core - Lemmatizer, phonology helpers and word-form generators

// Errors
export {
  MorphologyError,
  InvalidInputError,
  MalformedExceptionDataError,
  UnknownCategoryOrFeatureError,
  ConfigurationError,
  assertOneOf
} from './errors.js';

// Logging and tracing
export { DEBUG, setDebug, dp, consoleTraceHook, traced, type TraceEvent, type TraceHook } from './log.js';

// Phonology
export {
  VOWELS,
  DIPHTHONGS,
  PSEUDOVOWELS,
  LENITION_RULES,
  isVowel,
  endsWithVowel,
  endsWithDiphthong,
  endsWithPseudovowel,
  phonologicalProfile,
  applyLenition,
  splitSyllables,
  type PhonologicalProfile
} from './phonology.js';

// Analysis
export {
  DEFAULT_AFFIX_TABLES,
  NUMBER_PREFIXES,
  CASE_SUFFIXES,
  VERB_SUFFIXES,
  createAffixTables,
  byDescendingLength,
  type AffixTables
} from './affixes.js';
export { ExceptionIndex, type ExceptionTable } from './exceptions.js';
export {
  Lemmatizer,
  tokenize,
  stripNumberPrefix,
  stripCaseSuffix,
  stripVerbSuffix,
  type LemmatizerOptions
} from './lemmatizer.js';

// Synthesis
export * from './words/types.js';
export * from './words/noun.js';
export * from './words/pronoun.js';
export * from './words/verb.js';
export * from './words/adjective.js';
export * from './words/number.js';
export * from './words/particle.js';
export * from './words/prenoun.js';
export {
  generate,
  parseGenerateRequest,
  FORMS,
  type GenerateRequest,
  type NounRequest,
  type PronounRequest,
  type VerbRequest,
  type AdjectiveRequest,
  type NumberRequest,
  type ParticleRequest,
  type PrenounRequest
} from './generate.js';
export { createMorphology, type Morphology, type MorphologyOptions } from './morphology.js';
