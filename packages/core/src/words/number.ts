// navi-morph/words/number - Numerals one to eight
// Na'vi counts in base eight; vol (8) is the first two-digit number.

import { UnknownCategoryOrFeatureError } from '../errors.js';

const CARDINALS: readonly string[] = ["'aw", 'mune', 'pxey', 'tsing', 'mrr', 'pukap', 'kinä', 'vol'];

// Ordinal and fraction stems; mune, tsing, pukap and kinä shorten
const ORDINAL_STEMS: ReadonlyMap<string, string> = new Map([
  ["'aw", "'aw"],
  ['mune', 'mu'],
  ['pxey', 'pxey'],
  ['tsing', 'tsi'],
  ['mrr', 'mrr'],
  ['pukap', 'pu'],
  ['kinä', 'ki'],
  ['vol', 'vol']
]);

const IRREGULAR_FRACTIONS: ReadonlyMap<number, string> = new Map([
  [2, 'mawl'],
  [3, 'pan']
]);

const IRREGULAR_ADVERBIALS: ReadonlyMap<number, string> = new Map([
  [1, "'awlo"],
  [2, 'melo'],
  [3, 'pxelo']
]);

export const MIN_NUMERAL = 1;
export const MAX_NUMERAL = CARDINALS.length;

function checkValue(value: number, form: string): number {
  if (!Number.isInteger(value) || value < MIN_NUMERAL || value > MAX_NUMERAL) {
    throw new UnknownCategoryOrFeatureError('number', `${form} value`, value);
  }
  return value;
}

export function cardinal(value: number): string {
  return CARDINALS[checkValue(value, 'cardinal') - 1];
}

export function ordinal(value: number): string {
  const base = cardinal(value);
  return (ORDINAL_STEMS.get(base) ?? base) + 've';
}

/**
 * mawl "half" and pan "third" are irregular; the rest add -pxi to the
 * ordinal stem: tsing → tsipxi.
 */
export function fraction(value: number): string {
  const irregular = IRREGULAR_FRACTIONS.get(checkValue(value, 'fraction'));
  if (irregular) return irregular;
  return ordinal(value).slice(0, -'ve'.length) + 'pxi';
}

// "once", "twice", "three times", then alo a<cardinal>
export function adverbial(value: number): string {
  const irregular = IRREGULAR_ADVERBIALS.get(value);
  if (irregular) return irregular;
  return `alo a${cardinal(value)}`;
}
