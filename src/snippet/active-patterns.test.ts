import { describe, it, expect } from "vitest";
import {
  parity,
  asInteger,
  asFloat,
  asBoolean,
  parseInput,
  multipleOf,
  paritySnippet,
  parseInputSnippet,
  multipleOfSnippet,
} from "./active-patterns.js";

describe("parity", () => {
  it("classifies zero and negatives", () => {
    expect(parity(0)).toEqual({ kind: "even" });
    expect(parity(-3)).toEqual({ kind: "odd" });
  });
});

describe("partial patterns", () => {
  it("asInteger matches whole numbers only", () => {
    expect(asInteger("-17")).toEqual({ some: true, value: -17 });
    expect(asInteger("1.5")).toEqual({ some: false });
    expect(asInteger("")).toEqual({ some: false });
  });

  it("asFloat requires a fractional part", () => {
    expect(asFloat(".5")).toEqual({ some: true, value: 0.5 });
    expect(asFloat("2")).toEqual({ some: false });
  });

  it("asBoolean ignores case", () => {
    expect(asBoolean("False")).toEqual({ some: true, value: false });
    expect(asBoolean("yes")).toEqual({ some: false });
  });
});

describe("parseInput", () => {
  it("prefers integer over float for whole numbers", () => {
    expect(parseInput("8")).toEqual({ kind: "integer", value: 8 });
  });

  it("keeps unmatched input as text", () => {
    expect(parseInput("1.2.3")).toEqual({ kind: "text", value: "1.2.3" });
  });
});

describe("multipleOf", () => {
  it("yields the quotient for a multiple", () => {
    expect(multipleOf(5)(25)).toEqual({ some: true, value: 5 });
  });

  it("yields none otherwise", () => {
    expect(multipleOf(5)(26)).toEqual({ some: false });
  });
});

describe("active pattern snippets", () => {
  it.each([paritySnippet, parseInputSnippet, multipleOfSnippet])(
    "$id prints its documented output",
    (snippet) => {
      expect(snippet.run()).toEqual(snippet.expected);
    },
  );
});
