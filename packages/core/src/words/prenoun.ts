// navi-morph/words/prenoun - Prenoun + noun compounds

export const LENITING_PRENOUNS = ['pe', 'ay', 'me', 'pxe', 'fay', 'tsay', 'pay'] as const;

const LENITING_SET: ReadonlySet<string> = new Set<string>(LENITING_PRENOUNS);

// tsa- + atan → tsatan
export function combineWithNoun(prenoun: string, noun: string): string {
  if (prenoun.endsWith('a') && noun.startsWith('a')) {
    return prenoun.slice(0, -1) + noun;
  }
  return prenoun + noun;
}

export function causesLenition(prenoun: string): boolean {
  return LENITING_SET.has(prenoun);
}
