/**
 * Pattern matching with guards. Cases are ordered; the first guard
 * that holds decides the branch.
 */

import type { Snippet } from "../types/snippet.js";
import { match } from "../types/match.js";

export function classifyNumber(n: number): string {
  return match<number, string>(n)
    .when((x) => x < 0, () => "negative")
    .when((x) => x === 0, () => "zero")
    .when((x) => x <= 10 && x % 2 === 0, () => "small even")
    .when((x) => x <= 10, () => "small odd")
    .otherwise(() => "large");
}

export function fizzBuzz(n: number): string {
  return match<number, string>(n)
    .when((x) => x % 15 === 0, () => "FizzBuzz")
    .when((x) => x % 3 === 0, () => "Fizz")
    .when((x) => x % 5 === 0, () => "Buzz")
    .otherwise(String);
}

export type Point = readonly [x: number, y: number];

/** Matches on the shape of a tuple: which coordinates are zero or equal. */
export function describePoint(point: Point): string {
  const [x, y] = point;
  return match<Point, string>(point)
    .when(() => x === 0 && y === 0, () => "origin")
    .when(() => y === 0, () => "on the x-axis")
    .when(() => x === 0, () => "on the y-axis")
    .when(() => x === y, () => "on the diagonal")
    .otherwise(() => `at (${x}, ${y})`);
}

export const classifyNumberSnippet: Snippet = {
  id: "classify-number",
  title: "Guards on a number",
  topic: "pattern-matching",
  description: "Ordered guards classify an integer; later guards can rely on earlier ones having failed.",
  expected: [
    "-5 is negative",
    "0 is zero",
    "4 is small even",
    "7 is small odd",
    "42 is large",
  ],
  run() {
    return [-5, 0, 4, 7, 42].map((n) => `${n} is ${classifyNumber(n)}`);
  },
};

export const fizzBuzzSnippet: Snippet = {
  id: "fizz-buzz",
  title: "FizzBuzz with guards",
  topic: "pattern-matching",
  description: "The most specific guard comes first, so 15 is FizzBuzz rather than Fizz.",
  expected: ["1 2 Fizz 4 Buzz Fizz 7 8 Fizz Buzz 11 Fizz 13 14 FizzBuzz"],
  run() {
    const words: string[] = [];
    for (let n = 1; n <= 15; n++) {
      words.push(fizzBuzz(n));
    }
    return [words.join(" ")];
  },
};

export const describePointSnippet: Snippet = {
  id: "describe-point",
  title: "Matching on a tuple",
  topic: "pattern-matching",
  description: "A coordinate pair is destructured and matched against special positions.",
  expected: [
    "origin",
    "on the x-axis",
    "on the y-axis",
    "on the diagonal",
    "at (1, 5)",
  ],
  run() {
    const points: readonly Point[] = [[0, 0], [3, 0], [0, -2], [2, 2], [1, 5]];
    return points.map(describePoint);
  },
};

export const PATTERN_MATCHING_SNIPPETS: readonly Snippet[] = [
  classifyNumberSnippet,
  fizzBuzzSnippet,
  describePointSnippet,
];
