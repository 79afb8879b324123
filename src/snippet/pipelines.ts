/**
 * Pipelines: `pipe(value, f, g, h)` reads in the order the steps
 * happen, like a chain of `|>` operators.
 */

import type { Snippet } from "../types/snippet.js";
import { pipe } from "../types/function.js";

export interface LineItem {
  readonly sku: string;
  readonly quantity: number;
  readonly unitPrice: number;
}

export interface Order {
  readonly id: number;
  readonly customer: string;
  readonly items: readonly LineItem[];
}

const sum = (values: readonly number[]): number =>
  values.reduce((acc, v) => acc + v, 0);

export function lineTotal(item: LineItem): number {
  return item.quantity * item.unitPrice;
}

export function orderTotal(order: Order): number {
  return pipe(
    order.items,
    (items) => items.map(lineTotal),
    sum,
  );
}

/** SKUs of line items that actually ship (quantity above zero). */
export function shippedSkus(order: Order): readonly string[] {
  return pipe(
    order.items,
    (items) => items.filter((item) => item.quantity > 0),
    (items) => items.map((item) => item.sku),
  );
}

export function longWordsShouted(sentence: string, minLength: number): string {
  return pipe(
    sentence,
    (s) => s.split(/\s+/),
    (words) => words.filter((w) => w.length > minLength),
    (words) => words.map((w) => w.toUpperCase()),
    (words) => words.join("-"),
  );
}

export function sumOfOddSquares(limit: number): number {
  return pipe(
    Array.from({ length: limit }, (_, i) => i + 1),
    (ns) => ns.filter((n) => n % 2 === 1),
    (ns) => ns.map((n) => n * n),
    sum,
  );
}

const sampleOrder: Order = {
  id: 1001,
  customer: "Ada",
  items: [
    { sku: "A-100", quantity: 2, unitPrice: 3.5 },
    { sku: "B-200", quantity: 1, unitPrice: 12 },
    { sku: "C-300", quantity: 0, unitPrice: 99 },
  ],
};

export const orderTotalSnippet: Snippet = {
  id: "order-total",
  title: "Totalling an order",
  topic: "pipelines",
  description:
    "An order's line items are mapped to line totals and summed in one pipeline.",
  expected: ["order 1001 total: 19.00", "shipped: A-100, B-200"],
  run() {
    return [
      `order ${sampleOrder.id} total: ${orderTotal(sampleOrder).toFixed(2)}`,
      `shipped: ${shippedSkus(sampleOrder).join(", ")}`,
    ];
  },
};

export const textPipelineSnippet: Snippet = {
  id: "text-pipeline",
  title: "Transforming text step by step",
  topic: "pipelines",
  description: "Split, filter, map and join, each step a separate stage of the pipe.",
  expected: ["QUICK-BROWN"],
  run() {
    return [longWordsShouted("the quick brown fox", 3)];
  },
};

export const numberPipelineSnippet: Snippet = {
  id: "number-pipeline",
  title: "Summing odd squares",
  topic: "pipelines",
  description: "A range of numbers is filtered, squared and summed.",
  expected: ["sum of odd squares up to 10: 165"],
  run() {
    return [`sum of odd squares up to 10: ${sumOfOddSquares(10)}`];
  },
};

export const PIPELINE_SNIPPETS: readonly Snippet[] = [
  orderTotalSnippet,
  textPipelineSnippet,
  numberPipelineSnippet,
];
