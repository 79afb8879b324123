/**
 * Discriminated unions: a literal `kind` field tells the variants apart,
 * and a switch over it is checked for exhaustiveness by the compiler.
 */

import type { Snippet } from "../types/snippet.js";

export type Shape =
  | { readonly kind: "circle"; readonly radius: number }
  | { readonly kind: "rectangle"; readonly width: number; readonly height: number }
  | { readonly kind: "triangle"; readonly base: number; readonly height: number };

export function area(shape: Shape): number {
  switch (shape.kind) {
    case "circle":
      return Math.PI * shape.radius ** 2;
    case "rectangle":
      return shape.width * shape.height;
    case "triangle":
      return (shape.base * shape.height) / 2;
  }
}

export const SUITS = ["hearts", "diamonds", "clubs", "spades"] as const;
export type Suit = (typeof SUITS)[number];

export type Face = "jack" | "queen" | "king";

export type Rank =
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "face"; readonly face: Face }
  | { readonly kind: "ace" };

/** A playing card is a rank/suit pair. */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

function describeRank(rank: Rank): string {
  switch (rank.kind) {
    case "number":
      return String(rank.value);
    case "face":
      return rank.face;
    case "ace":
      return "ace";
  }
}

export function describeCard(card: Card): string {
  return `${describeRank(card.rank)} of ${card.suit}`;
}

/** Blackjack-style value: aces count 11, faces 10. */
export function cardValue(card: Card): number {
  switch (card.rank.kind) {
    case "number":
      return card.rank.value;
    case "face":
      return 10;
    case "ace":
      return 11;
  }
}

export function fullDeck(): readonly Card[] {
  const ranks: Rank[] = [{ kind: "ace" }];
  for (let value = 2; value <= 10; value++) {
    ranks.push({ kind: "number", value });
  }
  for (const face of ["jack", "queen", "king"] as const) {
    ranks.push({ kind: "face", face });
  }
  return SUITS.flatMap((suit) => ranks.map((rank) => ({ rank, suit })));
}

export const shapeAreaSnippet: Snippet = {
  id: "shape-area",
  title: "Area of a shape",
  topic: "discriminated-unions",
  description:
    "Each shape variant carries only the fields it needs; area() switches on the tag.",
  expected: ["circle: 3.14", "rectangle: 6.00", "triangle: 6.00"],
  run() {
    const shapes: readonly Shape[] = [
      { kind: "circle", radius: 1 },
      { kind: "rectangle", width: 2, height: 3 },
      { kind: "triangle", base: 4, height: 3 },
    ];
    return shapes.map((shape) => `${shape.kind}: ${area(shape).toFixed(2)}`);
  },
};

export const playingCardSnippet: Snippet = {
  id: "playing-card",
  title: "Cards as rank and suit",
  topic: "discriminated-unions",
  description:
    "A card pairs a union-typed rank with a suit; describing and scoring it never needs a default branch.",
  expected: [
    "ace of spades = 11",
    "queen of clubs = 10",
    "7 of hearts = 7",
    "deck size: 52",
  ],
  run() {
    const hand: readonly Card[] = [
      { rank: { kind: "ace" }, suit: "spades" },
      { rank: { kind: "face", face: "queen" }, suit: "clubs" },
      { rank: { kind: "number", value: 7 }, suit: "hearts" },
    ];
    return [
      ...hand.map((card) => `${describeCard(card)} = ${cardValue(card)}`),
      `deck size: ${fullDeck().length}`,
    ];
  },
};

export const DISCRIMINATED_UNION_SNIPPETS: readonly Snippet[] = [
  shapeAreaSnippet,
  playingCardSnippet,
];
