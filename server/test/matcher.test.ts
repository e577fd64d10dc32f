import { describe, expect, it } from "vitest";
import type { CorrectionInstruction } from "../src/corrections/config.js";
import {
  compositeMatcher,
  createMatcher,
  findMatches,
  numberWords,
  numericMatcher,
  numericVariants,
  parseAmount,
  type CorrectionMatcher
} from "../src/corrections/matcher.js";

function instruction(incorrect: string, correct: string): CorrectionInstruction {
  return { type: "inaccurate", field: null, incorrect, correct, sections: [], sources: [] };
}

describe("amount parsing", () => {
  it("reads currency, separators and scale words", () => {
    expect(parseAmount("$50M")).toEqual({ currency: "$", value: 50_000_000 });
    expect(parseAmount("$1.5B")).toEqual({ currency: "$", value: 1_500_000_000 });
    expect(parseAmount("€2,500")).toEqual({ currency: "€", value: 2500 });
    expect(parseAmount("12 million dollars")).toEqual({ currency: "", value: 12_000_000 });
    expect(parseAmount("Series B")).toBeNull();
  });

  it("spells small whole numbers", () => {
    expect(numberWords(0)).toBe("zero");
    expect(numberWords(42)).toBe("forty-two");
    expect(numberWords(150)).toBe("one hundred fifty");
    expect(numberWords(1000)).toBeNull();
    expect(numberWords(1.5)).toBeNull();
  });
});

describe("numeric variants", () => {
  it("lists the other spellings of a money amount", () => {
    expect(numericVariants("$50M")).toEqual([
      "$50MM",
      "$50mn",
      "$50 million",
      "50 million dollars",
      "fifty million",
      "fifty million dollars",
      "$50,000,000",
      "$50000000"
    ]);
    expect(numericVariants("$1.5B")).toEqual(["$1.5bn", "$1.5 billion", "1.5 billion dollars", "$1,500,000,000", "$1500000000"]);
    expect(numericVariants("Series B")).toEqual([]);
  });

  it("combines matchers without repeating forms or listing the correct value", async () => {
    const extra: CorrectionMatcher = { name: "stub", variants: async () => ["fifty mil", "$50MM", "$35M"] };
    const matcher = compositeMatcher([numericMatcher, extra]);
    expect(matcher.name).toBe("numeric+stub");
    const forms = await matcher.variants(instruction("$50M", "$35M"));
    expect(forms.slice(-2)).toEqual(["$50000000", "fifty mil"]);
    expect(forms).not.toContain("$35M");
    expect(forms.filter((f) => f === "$50MM")).toHaveLength(1);
  });

  it("builds matchers by kind", async () => {
    expect(await createMatcher("exact").variants(instruction("$50M", "$35M"))).toEqual([]);
    expect(createMatcher("numeric").name).toBe("numeric");
    expect(() => createMatcher("llm")).toThrow("The llm matcher needs an abort signal and a log sink");
  });
});

describe("finding matches", () => {
  it("respects number boundaries", () => {
    expect(findMatches("Raised $150M, not $50M, and $50MM later", ["$50M"])).toEqual([{ index: 18, text: "$50M" }]);
    expect(findMatches("A $50M round and a $50M.5 typo", ["$50M"])).toEqual([{ index: 2, text: "$50M" }]);
  });

  it("does not match a spelled number inside a larger one", () => {
    expect(findMatches("one hundred fifty million users", ["fifty million"])).toEqual([]);
    expect(findMatches("about fifty million users", ["fifty million"])).toEqual([{ index: 6, text: "fifty million" }]);
  });

  it("matches case-insensitively and across whitespace runs", () => {
    expect(findMatches("raised $50m and $50\nmillion", ["$50M", "$50 million"])).toEqual([
      { index: 7, text: "$50m" },
      { index: 16, text: "$50\nmillion" }
    ]);
  });
});
