/**
 * Option type for values that may be absent.
 *
 * Used where "not found" or "does not match" is a normal answer rather
 * than a failure (lookups, partial extractors).
 */

export type Option<T> =
  | { readonly some: true; readonly value: T }
  | { readonly some: false };

export function some<T>(value: T): Option<T> {
  return { some: true, value };
}

export const none: Option<never> = { some: false };

export function fromNullable<T>(value: T | null | undefined): Option<T> {
  return value === null || value === undefined ? none : some(value);
}

export function mapOption<T, U>(
  option: Option<T>,
  fn: (value: T) => U,
): Option<U> {
  return option.some ? some(fn(option.value)) : none;
}

export function bindOption<T, U>(
  option: Option<T>,
  fn: (value: T) => Option<U>,
): Option<U> {
  return option.some ? fn(option.value) : none;
}

export function optionOrElse<T>(option: Option<T>, fallback: T): T {
  return option.some ? option.value : fallback;
}

/**
 * Tries each extractor in order and returns the first match.
 * Extractors after the first match are not called.
 */
export function firstSome<T, U>(
  input: T,
  extractors: readonly ((input: T) => Option<U>)[],
): Option<U> {
  for (const extract of extractors) {
    const result = extract(input);
    if (result.some) {
      return result;
    }
  }
  return none;
}

/**
 * Renders an Option as `Some(<value>)` or `None`.
 */
export function formatOption<T>(
  option: Option<T>,
  formatValue: (value: T) => string = String,
): string {
  return option.some ? `Some(${formatValue(option.value)})` : "None";
}
