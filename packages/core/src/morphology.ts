// navi-morph/morphology - Lemmatizer and generators behind one object

import { generate, type GenerateRequest } from './generate.js';
import { Lemmatizer, tokenize, type LemmatizerOptions } from './lemmatizer.js';

export interface Morphology {
  lemmatize(word: unknown): string;
  /** Lemma of every token in a sentence, in order */
  lemmatizeSentence(sentence: string): string[];
  generate(request: GenerateRequest): string | string[];
  readonly lemmatizer: Lemmatizer;
}

// The trace hook, when given, reports both lemmatize and generate calls
export type MorphologyOptions = LemmatizerOptions;

export function createMorphology(options: MorphologyOptions = {}): Morphology {
  const lemmatizer = new Lemmatizer(options);
  return {
    lemmatizer,
    lemmatize: (word) => lemmatizer.lemmatize(word),
    lemmatizeSentence: (sentence) => tokenize(sentence).map(token => lemmatizer.lemmatize(token)),
    generate: (request) => generate(request, options.trace)
  };
}
