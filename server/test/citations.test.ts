import { describe, expect, it } from "vitest";
import { CitationIntegrityError } from "../src/errors.js";
import {
  consolidateCitations,
  inlineMarkers,
  parseCitationFields,
  parseSection,
  removeCitations,
  renderSection,
  splitCitationBlock,
  verifyConsolidatedDocument,
  type SectionInput
} from "../src/pipeline/citations.js";

function def(n: number): string {
  return `2024-0${n}-01. [Source ${n}](https://example.com/${n}). Publisher ${n}. Published: 2024-0${n}-01 | Updated: N/A`;
}

const alpha: SectionInput = {
  key: "01-alpha.md",
  number: 1,
  content: ["# Alpha", "", "Revenue grew.[^1] Margin held.[^2]", "", "### Citations", "", `[^1]: ${def(1)}`, "", `[^2]: ${def(2)}`].join("\n")
};

const beta: SectionInput = {
  key: "02-beta.md",
  number: 2,
  content: ["# Beta", "", "Market is large.[^1]", "", `[^1]: ${def(3)}`].join("\n")
};

const gamma: SectionInput = {
  key: "03-gamma.md",
  number: 3,
  content: ["# Gamma", "", "Team is strong.[^1] Hiring is on plan.[^2] Repeat claim.[^1]", "", "---", "", "### Sources", "", `[^1]: ${def(4)}`, `[^2]: ${def(5)}`].join("\n")
};

describe("citation consolidation", () => {
  it("renumbers three sections into one global sequence", () => {
    const result = consolidateCitations([alpha, beta, gamma]);

    expect(result.issues).toEqual([]);
    expect(result.citations.map((c) => [c.number, c.section, c.localId])).toEqual([
      [1, "01-alpha.md", "1"],
      [2, "01-alpha.md", "2"],
      [3, "02-beta.md", "1"],
      [4, "03-gamma.md", "1"],
      [5, "03-gamma.md", "2"]
    ]);
    expect(result.document).toBe(
      [
        "# Alpha",
        "",
        "Revenue grew.[^1] Margin held.[^2]",
        "",
        "# Beta",
        "",
        "Market is large.[^3]",
        "",
        "# Gamma",
        "",
        "Team is strong.[^4] Hiring is on plan.[^5] Repeat claim.[^4]",
        "",
        "---",
        "",
        "### Citations",
        "",
        `[^1]: ${def(1)}`,
        "",
        `[^2]: ${def(2)}`,
        "",
        `[^3]: ${def(3)}`,
        "",
        `[^4]: ${def(4)}`,
        "",
        `[^5]: ${def(5)}`,
        ""
      ].join("\n")
    );
    expect(verifyConsolidatedDocument(result.document)).toEqual([]);
  });

  it("orders sections by number, not by input order", () => {
    const result = consolidateCitations([gamma, alpha, beta]);
    expect(result.citations.map((c) => c.section)).toEqual(["01-alpha.md", "01-alpha.md", "02-beta.md", "03-gamma.md", "03-gamma.md"]);
  });

  it("keeps identical sources cited from two sections as two numbers", () => {
    const other: SectionInput = { key: "02-beta.md", number: 2, content: `# Beta\n\nSame source.[^1]\n\n[^1]: ${def(1)}` };
    const result = consolidateCitations([alpha, other]);
    expect(result.citations.map((c) => c.text)).toEqual([def(1), def(2), def(1)]);
    expect(result.citations.map((c) => c.number)).toEqual([1, 2, 3]);
  });

  it("is idempotent on its own output", () => {
    const once = consolidateCitations([alpha, beta, gamma]).document;
    const twice = consolidateCitations([{ key: "doc", number: 1, content: once }]).document;
    expect(twice).toBe(once);
  });

  it("flags a marker with no definition and keeps numbering contiguous", () => {
    const broken: SectionInput = { key: "02-beta.md", number: 2, name: "Beta", content: "# Beta\n\nUnsourced.[^7]" };
    const result = consolidateCitations([alpha, broken, gamma]);

    expect(result.issues).toEqual([{ kind: "orphan_marker", section: "02-beta.md", marker: "7", globalNumber: 3 }]);
    expect(result.citations[2]).toEqual({
      number: 3,
      section: "02-beta.md",
      localId: "7",
      text: "[CITATION NEEDED: no source was provided for local marker 7 in Beta]",
      orphan: true
    });
    expect(result.document).toContain("Unsourced.[^3]");
    expect(verifyConsolidatedDocument(result.document)).toEqual([]);
  });

  it("throws under the fail policy when a marker is orphaned", () => {
    const broken: SectionInput = { key: "02-beta.md", number: 2, content: "# Beta\n\nUnsourced.[^7]" };
    expect(() => consolidateCitations([alpha, broken], { orphanPolicy: "fail" })).toThrow(CitationIntegrityError);
    try {
      consolidateCitations([alpha, broken], { orphanPolicy: "fail" });
    } catch (err) {
      expect(err instanceof CitationIntegrityError ? err.problems : []).toEqual(["02-beta.md: marker [^7] has no definition"]);
    }
  });

  it("drops unreferenced definitions and reports duplicates and malformed ones", () => {
    const messy: SectionInput = {
      key: "01-messy.md",
      number: 1,
      content: ["# Messy", "", "Claim.[^1]", "", "[^1]: see the deck", "[^1]: second copy", `[^9]: ${def(9)}`].join("\n")
    };
    const result = consolidateCitations([messy]);

    expect(result.issues).toEqual([
      { kind: "malformed_definition", section: "01-messy.md", marker: "1", text: "see the deck" },
      { kind: "unreferenced_definition", section: "01-messy.md", marker: "9" },
      { kind: "duplicate_definition", section: "01-messy.md", marker: "1" }
    ]);
    expect(result.document).toBe("# Messy\n\nClaim.[^1]\n\n---\n\n### Citations\n\n[^1]: see the deck\n");
  });

  it("renders a document without citations as plain bodies", () => {
    const result = consolidateCitations([{ key: "t", number: 0, content: "# Title" }, { key: "a", number: 1, content: "# A\n\nNo sources." }]);
    expect(result.document).toBe("# Title\n\n# A\n\nNo sources.\n");
    expect(result.citations).toEqual([]);
  });
});

describe("section parsing", () => {
  it("joins indented continuation lines of a definition", () => {
    const parsed = parseSection("Body.[^1]\n\n[^1]: first part\n  second part\n");
    expect(parsed.body).toBe("Body.[^1]");
    expect(parsed.definitions.get("1")).toBe("first part second part");
  });

  it("lists markers once in order of first appearance", () => {
    expect(parseSection("a[^2] b[^10] c[^2]").markers).toEqual(["2", "10"]);
    expect(inlineMarkers("a[^2] b[^10] c[^2]")).toEqual(["2", "10", "2"]);
  });

  it("round-trips a section through renderSection", () => {
    const parsed = parseSection(alpha.content);
    const rendered = renderSection(parsed.body, [...parsed.definitions]);
    expect(rendered).toBe(`# Alpha\n\nRevenue grew.[^1] Margin held.[^2]\n\n### Citations\n\n[^1]: ${def(1)}\n\n[^2]: ${def(2)}\n`);
  });

  it("reads the standard citation fields", () => {
    expect(parseCitationFields(def(1))).toEqual({
      date: "2024-01-01",
      title: "Source 1",
      url: "https://example.com/1",
      publisher: "Publisher 1",
      published: "2024-01-01",
      updated: "N/A"
    });
    expect(parseCitationFields("just text")).toBeNull();
  });

  it("verifyConsolidatedDocument reports out-of-order and missing definitions", () => {
    expect(verifyConsolidatedDocument("a[^2] b[^1]\n\n[^1]: x\n\n[^2]: y")).toEqual([
      "marker [^2] appears where [^1] was expected",
      "marker [^1] appears where [^2] was expected"
    ]);
    expect(verifyConsolidatedDocument("a[^1] b[^2]\n\n[^1]: x")).toEqual(["marker [^2] has no definition"]);
  });

  it("splits a section at the divider above its citation block", () => {
    expect(splitCitationBlock(gamma.content)).toEqual({
      body: "# Gamma\n\nTeam is strong.[^1] Hiring is on plan.[^2] Repeat claim.[^1]",
      trailer: `\n\n---\n\n### Sources\n\n[^1]: ${def(4)}\n[^2]: ${def(5)}`
    });
    expect(splitCitationBlock(beta.content)).toEqual({ body: "# Beta\n\nMarket is large.[^1]", trailer: `\n\n[^1]: ${def(3)}` });
    expect(splitCitationBlock("# Plain\n\nNo sources.\n")).toEqual({ body: "# Plain\n\nNo sources.", trailer: "\n" });
  });

  it("removes chosen citations and drops a block left empty", () => {
    const content = "# S\n\nA.[^1] B.[^2]\n\n### Citations\n\n[^1]: d1\n\n[^2]: d2\n";
    expect(removeCitations(content, new Set(["2"]))).toBe("# S\n\nA.[^1] B.\n\n### Citations\n\n[^1]: d1\n");
    expect(removeCitations(content, new Set(["1", "2"]))).toBe("# S\n\nA. B.\n");
    expect(removeCitations(content, new Set())).toBe(content);
  });
});
