/**
 * Function composition: new functions built from existing ones
 * without naming the intermediate values.
 */

import type { Snippet } from "../types/snippet.js";
import { compose, composeRight, flow } from "../types/function.js";

export const add1 = (n: number): number => n + 1;
export const double = (n: number): number => n * 2;
export const square = (n: number): number => n * n;

export const add1ThenDouble = compose(add1, double);
export const doubleThenAdd1 = composeRight(add1, double);
export const add1DoubleSquare = flow(add1, double, square);

export const shout = flow(
  (s: string) => s.trim(),
  (s: string) => s.toUpperCase(),
  (s: string) => `${s}!`,
);

export const forwardCompositionSnippet: Snippet = {
  id: "forward-composition",
  title: "Forward and backward composition",
  topic: "composition",
  description:
    "compose runs its left function first; composeRight runs its right function first.",
  expected: ["add1 >> double: 8", "add1 << double: 7"],
  run() {
    return [
      `add1 >> double: ${add1ThenDouble(3)}`,
      `add1 << double: ${doubleThenAdd1(3)}`,
    ];
  },
};

export const flowSnippet: Snippet = {
  id: "flow",
  title: "Composing several functions",
  topic: "composition",
  description: "flow chains any number of steps, and the types may change between steps.",
  expected: ["flow(add1, double, square)(2) = 36", "HELLO!"],
  run() {
    return [
      `flow(add1, double, square)(2) = ${add1DoubleSquare(2)}`,
      shout("  hello "),
    ];
  },
};

export const COMPOSITION_SNIPPETS: readonly Snippet[] = [
  forwardCompositionSnippet,
  flowSnippet,
];
