// navi-morph/errors - Error types raised by the morphology engine

/**
 * Base class for every error the engine raises.
 * The formatted message joins the parts with " | ", e.g.
 * `Invalid input: word must be a string | Type: number`.
 */
export class MorphologyError extends Error {
  constructor(public readonly detail: string, public readonly word?: string) {
    super(detail);
    this.name = 'MorphologyError';
    // Subclasses format once their own fields are set
    if (new.target === MorphologyError) {
      this.message = this.formatMessage();
    }
  }

  protected formatParts(): string[] {
    const parts = [this.detail];
    if (this.word !== undefined) {
      parts.push(`Word: '${this.word}'`);
    }
    return parts;
  }

  protected formatMessage(): string {
    return this.formatParts().join(' | ');
  }
}

// Non-text argument to lemmatize()
export class InvalidInputError extends MorphologyError {
  constructor(detail: string, public readonly inputType: string) {
    super(detail);
    this.name = 'InvalidInputError';
    this.message = this.formatMessage();
  }

  protected override formatParts(): string[] {
    return [`Invalid input: ${this.detail}`, `Type: ${this.inputType}`];
  }
}

/**
 * Raised when an exception table cannot be parsed at all.
 * Loaders recover from it with an empty table; it never reaches lemmatize().
 */
export class MalformedExceptionDataError extends MorphologyError {
  constructor(detail: string, public readonly source?: string) {
    super(detail);
    this.name = 'MalformedExceptionDataError';
    this.message = this.formatMessage();
  }

  protected override formatParts(): string[] {
    const parts = [`Malformed exception data: ${this.detail}`];
    if (this.source) {
      parts.push(`Source: ${this.source}`);
    }
    return parts;
  }
}

// A generator was asked for a category, form or feature value outside its closed set
export class UnknownCategoryOrFeatureError extends MorphologyError {
  constructor(
    public readonly category: string,
    public readonly feature: string,
    public readonly value: unknown,
    public readonly allowed: readonly string[] = []
  ) {
    super(`unknown ${feature} for ${category}`);
    this.name = 'UnknownCategoryOrFeatureError';
    this.message = this.formatMessage();
  }

  protected override formatParts(): string[] {
    const parts = [`Unknown ${this.feature} for ${this.category}: ${describeValue(this.value)}`];
    if (this.allowed.length > 0) {
      parts.push(`Expected one of: ${this.allowed.join(', ')}`);
    }
    return parts;
  }
}

export class ConfigurationError extends MorphologyError {
  constructor(detail: string, public readonly variable: string) {
    super(detail);
    this.name = 'ConfigurationError';
    this.message = this.formatMessage();
  }

  protected override formatParts(): string[] {
    return [`Configuration error: ${this.detail}`, `Variable: ${this.variable}`];
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value === undefined) return 'undefined';
  return JSON.stringify(value) ?? String(value);
}

/**
 * Check a run-time value against a closed enumeration.
 * Throws UnknownCategoryOrFeatureError instead of falling back to a default.
 */
export function assertOneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  category: string,
  feature: string
): T {
  const match = allowed.find(candidate => candidate === value);
  if (match === undefined) {
    throw new UnknownCategoryOrFeatureError(category, feature, value, allowed);
  }
  return match;
}
