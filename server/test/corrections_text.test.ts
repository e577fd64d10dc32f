import { describe, expect, it } from "vitest";
import {
  contextSample,
  flagUnsupportedClaims,
  NEEDS_CITATION,
  quotedSpans,
  replaceEditable,
  sentenceSpan,
  splitMatches
} from "../src/corrections/text.js";

describe("quotations", () => {
  it("finds quoted phrases and blockquote lines", () => {
    expect(quotedSpans('He said "we raised $50M" then.\n> Quote line')).toEqual([
      { start: 8, end: 24 },
      { start: 31, end: 43 }
    ]);
  });

  it("separates editable matches from quoted ones and replaces only the editable", () => {
    const text = 'Raised $50M. He said "we raised $50M".';
    expect(splitMatches(text, ["$50M"])).toEqual({
      editable: [{ index: 7, text: "$50M" }],
      quoted: [{ index: 32, text: "$50M" }]
    });
    expect(replaceEditable(text, ["$50M"], "$35M")).toEqual({ text: 'Raised $35M. He said "we raised $50M".', count: 1 });
  });
});

describe("samples and sentences", () => {
  it("trims context and marks elisions", () => {
    expect(contextSample("abc $50M def", 4, 4, 2)).toBe("…c $50M d…");
    expect(contextSample("abc\n\n$50M", 5, 4)).toBe("abc $50M");
  });

  it("finds the sentence around an index without splitting decimals", () => {
    const text = "First one. Second has $1.5B here.[^2] Third.";
    expect(sentenceSpan(text, text.indexOf("$1.5B"))).toEqual({ start: 10, end: 37 });
    expect(sentenceSpan("Line one\nLine two", 12)).toEqual({ start: 9, end: 17 });
  });
});

describe("unsupported claim flags", () => {
  const definitions = new Map([
    ["1", "2024-02-01. [Acme raises $50M](https://news.example.com/acme). Example Wire."],
    ["2", "2024-02-02. [Revenue report](https://news.example.com/acme/revenue). Example Wire."]
  ]);

  it("flags a corrected sentence whose every source states the old value", () => {
    const body = "Raised $35M.[^1] Revenue was $35M.[^2]";
    const out = flagUnsupportedClaims(body, "$35M", definitions, ["$50M"]);
    expect(out).toEqual({ text: `Raised $35M.[^1] ${NEEDS_CITATION} Revenue was $35M.[^2]`, flagged: 1 });
    expect(flagUnsupportedClaims(out.text, "$35M", definitions, ["$50M"])).toEqual({ text: out.text, flagged: 0 });
  });

  it("leaves uncited sentences and sentences with a current source alone", () => {
    expect(flagUnsupportedClaims("We expect $35M.", "$35M", definitions, ["$50M"]).flagged).toBe(0);
    expect(flagUnsupportedClaims("Raised $35M.[^1][^2]", "$35M", definitions, ["$50M"]).flagged).toBe(0);
  });
});
