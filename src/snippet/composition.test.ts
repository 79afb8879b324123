import { describe, it, expect } from "vitest";
import {
  add1ThenDouble,
  doubleThenAdd1,
  add1DoubleSquare,
  shout,
  forwardCompositionSnippet,
  flowSnippet,
} from "./composition.js";

describe("composed functions", () => {
  it("apply their steps in the documented order", () => {
    expect(add1ThenDouble(0)).toBe(2);
    expect(doubleThenAdd1(0)).toBe(1);
    expect(add1DoubleSquare(0)).toBe(4);
  });

  it("shout trims, upper-cases and adds an exclamation mark", () => {
    expect(shout(" hi")).toBe("HI!");
  });
});

describe("composition snippets", () => {
  it.each([forwardCompositionSnippet, flowSnippet])(
    "$id prints its documented output",
    (snippet) => {
      expect(snippet.run()).toEqual(snippet.expected);
    },
  );
});
