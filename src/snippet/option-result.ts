/**
 * Option and Result: absence and expected failure as return values
 * instead of null checks and exceptions.
 */

import type { Snippet } from "../types/snippet.js";
import type { Result } from "../types/result.js";
import type { Option } from "../types/option.js";
import { ok, err, bindResult, tryCatch, formatResult } from "../types/result.js";
import {
  bindOption,
  fromNullable,
  optionOrElse,
  formatOption,
} from "../types/option.js";

export class DivideByZeroError extends Error {
  constructor() {
    super("Attempted to divide by zero.");
    this.name = "DivideByZeroError";
  }
}

function divideOrThrow(dividend: number, divisor: number): number {
  if (divisor === 0) {
    throw new DivideByZeroError();
  }
  return dividend / divisor;
}

/**
 * Divides, turning the exception thrown for a zero divisor into an
 * error value.
 */
export function safeDivide(dividend: number, divisor: number): Result<number, Error> {
  return tryCatch(
    () => divideOrThrow(dividend, divisor),
    (cause) => (cause instanceof Error ? cause : new Error(String(cause))),
  );
}

export const MIN_PASSWORD_LENGTH = 8;

function checkLength(input: string): Result<string, string> {
  return input.length >= MIN_PASSWORD_LENGTH
    ? ok(input)
    : err(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
}

function checkDigit(input: string): Result<string, string> {
  return /\d/.test(input)
    ? ok(input)
    : err("Password must contain at least one digit");
}

/**
 * Returns the password unchanged when it passes every rule, or the
 * message of the first rule it breaks.
 */
export function validatePassword(input: string): Result<string, string> {
  return bindResult(checkLength(input), checkDigit);
}

export interface Customer {
  readonly id: number;
  readonly name: string;
  readonly email?: string;
}

export function tryFindCustomer(
  customers: readonly Customer[],
  id: number,
): Option<Customer> {
  return fromNullable(customers.find((c) => c.id === id));
}

export function customerEmail(
  customers: readonly Customer[],
  id: number,
): Option<string> {
  return bindOption(tryFindCustomer(customers, id), (c) => fromNullable(c.email));
}

export const safeDivideSnippet: Snippet = {
  id: "safe-divide",
  title: "Converting exceptions to results",
  topic: "option-result",
  description:
    "Division by zero throws; safeDivide catches it and returns an explicit failure value instead.",
  expected: ["1 / 0 = Error(Attempted to divide by zero.)", "1 / 1 = Ok(1)"],
  run() {
    const show = (result: Result<number, Error>): string =>
      formatResult(result, String, (e) => e.message);
    return [`1 / 0 = ${show(safeDivide(1, 0))}`, `1 / 1 = ${show(safeDivide(1, 1))}`];
  },
};

export const validatePasswordSnippet: Snippet = {
  id: "validate-password",
  title: "Validating a password",
  topic: "option-result",
  description:
    "Length and digit rules are chained; the first failing rule's message is returned.",
  expected: [
    '"password" -> Error(Password must contain at least one digit)',
    '"passw0rd" -> Ok(passw0rd)',
    '"pw1" -> Error(Password must be at least 8 characters long)',
  ],
  run() {
    return ["password", "passw0rd", "pw1"].map(
      (input) => `${JSON.stringify(input)} -> ${formatResult(validatePassword(input))}`,
    );
  },
};

const customers: readonly Customer[] = [
  { id: 1, name: "Ada", email: "ada@example.com" },
  { id: 2, name: "Grace" },
];

export const customerLookupSnippet: Snippet = {
  id: "customer-lookup",
  title: "Looking up an optional value",
  topic: "option-result",
  description:
    "A missing customer and a customer without an email both end in None; a default covers either.",
  expected: [
    "customer 1 email: Some(ada@example.com)",
    "customer 2 email: None",
    "customer 3 email: None",
    "customer 2 email or default: no-reply@example.com",
  ],
  run() {
    return [
      ...[1, 2, 3].map(
        (id) => `customer ${id} email: ${formatOption(customerEmail(customers, id))}`,
      ),
      `customer 2 email or default: ${optionOrElse(customerEmail(customers, 2), "no-reply@example.com")}`,
    ];
  },
};

export const OPTION_RESULT_SNIPPETS: readonly Snippet[] = [
  safeDivideSnippet,
  validatePasswordSnippet,
  customerLookupSnippet,
];
