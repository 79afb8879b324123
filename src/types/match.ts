/**
 * Guard-based matching.
 *
 * Cases are tried top to bottom; the first guard that holds produces
 * the result and the remaining guards are skipped.
 *
 * @example
 * ```typescript
 * const sign = match<number, string>(n)
 *   .when((x) => x < 0, () => "negative")
 *   .when((x) => x === 0, () => "zero")
 *   .otherwise(() => "positive");
 * ```
 */

import type { Option } from "./option.js";
import { some, none } from "./option.js";

export interface Matcher<T, R> {
  when(guard: (value: T) => boolean, handler: (value: T) => R): Matcher<T, R>;
  otherwise(handler: (value: T) => R): R;
}

class GuardMatcher<T, R> implements Matcher<T, R> {
  constructor(
    private readonly value: T,
    private readonly matched: Option<R>,
  ) {}

  when(guard: (value: T) => boolean, handler: (value: T) => R): Matcher<T, R> {
    if (this.matched.some || !guard(this.value)) {
      return this;
    }
    return new GuardMatcher(this.value, some(handler(this.value)));
  }

  otherwise(handler: (value: T) => R): R {
    return this.matched.some ? this.matched.value : handler(this.value);
  }
}

export function match<T, R>(value: T): Matcher<T, R> {
  return new GuardMatcher<T, R>(value, none);
}
