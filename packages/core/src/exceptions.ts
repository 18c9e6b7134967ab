// navi-morph/exceptions - Irregular surface forms, consulted before any affix rule

export type ExceptionTable = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Lemma → known irregular surface forms, lower-cased on the way in.
 * A lemma always matches itself, listed or not.
 *
 * When one surface form is listed under two lemmas, the lemma inserted first
 * wins. Callers should not rely on that order.
 */
export class ExceptionIndex {
  private readonly entries: ExceptionTable;

  constructor(entries: Iterable<readonly [string, Iterable<string>]> = []) {
    const table = new Map<string, ReadonlySet<string>>();
    for (const [lemma, forms] of entries) {
      const key = lemma.toLowerCase();
      const merged = new Set(table.get(key));
      for (const form of forms) {
        merged.add(form.toLowerCase());
      }
      table.set(key, merged);
    }
    this.entries = table;
  }

  static empty(): ExceptionIndex {
    return new ExceptionIndex();
  }

  static fromRecord(record: Readonly<Record<string, readonly string[]>>): ExceptionIndex {
    return new ExceptionIndex(Object.entries(record));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Expects an already lower-cased word. */
  findLemma(word: string): string | undefined {
    for (const [lemma, forms] of this.entries) {
      if (word === lemma || forms.has(word)) {
        return lemma;
      }
    }
    return undefined;
  }

  formsOf(lemma: string): string[] {
    const key = lemma.toLowerCase();
    const forms = this.entries.get(key);
    if (!forms) return [];
    return forms.has(key) ? [...forms] : [key, ...forms];
  }

  lemmas(): string[] {
    return [...this.entries.keys()];
  }
}
