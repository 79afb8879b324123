/**
 * Active patterns as extractor functions.
 *
 * A complete pattern maps every input to one of a closed set of cases.
 * A partial pattern returns an Option: Some when the input matches,
 * None otherwise. A parameterised pattern is a function that builds a
 * partial pattern.
 */

import type { Snippet } from "../types/snippet.js";
import type { Option } from "../types/option.js";
import { some, none, firstSome, mapOption, optionOrElse } from "../types/option.js";

export type Parity = { readonly kind: "even" } | { readonly kind: "odd" };

export function parity(n: number): Parity {
  return n % 2 === 0 ? { kind: "even" } : { kind: "odd" };
}

export function asInteger(input: string): Option<number> {
  return /^-?\d+$/.test(input) ? some(Number.parseInt(input, 10)) : none;
}

export function asFloat(input: string): Option<number> {
  return /^-?\d*\.\d+$/.test(input) ? some(Number.parseFloat(input)) : none;
}

export function asBoolean(input: string): Option<boolean> {
  switch (input.toLowerCase()) {
    case "true":
      return some(true);
    case "false":
      return some(false);
    default:
      return none;
  }
}

export type ParsedInput =
  | { readonly kind: "integer"; readonly value: number }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "text"; readonly value: string };

/** Tries each partial pattern in turn; anything unmatched is text. */
export function parseInput(input: string): ParsedInput {
  const parsed = firstSome<string, ParsedInput>(input, [
    (s) => mapOption<number, ParsedInput>(asInteger(s), (value) => ({ kind: "integer", value })),
    (s) => mapOption<number, ParsedInput>(asFloat(s), (value) => ({ kind: "float", value })),
    (s) => mapOption<boolean, ParsedInput>(asBoolean(s), (value) => ({ kind: "boolean", value })),
  ]);
  return optionOrElse(parsed, { kind: "text", value: input });
}

/** Parameterised pattern: matches multiples of `divisor`, yielding the quotient. */
export function multipleOf(divisor: number): (n: number) => Option<number> {
  return (n) => (n % divisor === 0 ? some(n / divisor) : none);
}

export const paritySnippet: Snippet = {
  id: "parity",
  title: "A complete pattern: even or odd",
  topic: "active-patterns",
  description: "parity() sorts every integer into exactly one of two named cases.",
  expected: ["7 is odd", "10 is even"],
  run() {
    return [7, 10].map((n) => `${n} is ${parity(n).kind}`);
  },
};

export const parseInputSnippet: Snippet = {
  id: "parse-input",
  title: "Partial patterns for parsing",
  topic: "active-patterns",
  description:
    "Integer, float and boolean extractors are tried in order; unmatched input stays text.",
  expected: ["integer 42", "float 3.14", "boolean true", "text hello"],
  run() {
    return ["42", "3.14", "TRUE", "hello"].map((input) => {
      const parsed = parseInput(input);
      return `${parsed.kind} ${String(parsed.value)}`;
    });
  },
};

export const multipleOfSnippet: Snippet = {
  id: "multiple-of",
  title: "A parameterised pattern",
  topic: "active-patterns",
  description: "multipleOf(3) builds an extractor that also returns how many times 3 fits.",
  expected: ["12 is a multiple of 3 (4 times)", "14 is not a multiple of 3"],
  run() {
    const byThree = multipleOf(3);
    return [12, 14].map((n) => {
      const quotient = byThree(n);
      return quotient.some
        ? `${n} is a multiple of 3 (${quotient.value} times)`
        : `${n} is not a multiple of 3`;
    });
  },
};

export const ACTIVE_PATTERN_SNIPPETS: readonly Snippet[] = [
  paritySnippet,
  parseInputSnippet,
  multipleOfSnippet,
];
