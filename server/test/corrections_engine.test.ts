import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CorrectionInstruction, CorrectionsFile } from "../src/corrections/config.js";
import { runCorrections } from "../src/corrections/engine.js";
import { numericMatcher } from "../src/corrections/matcher.js";
import { literalRewriter } from "../src/corrections/rewriter.js";
import { InputError, NotFoundError } from "../src/errors.js";
import { writeSectionFile } from "../src/pipeline/artifacts.js";
import { initialState, loadState, saveState } from "../src/pipeline/state.js";
import { runDirAbs } from "../src/pipeline/utils.js";
import { allocateVersion, loadLedger } from "../src/pipeline/versioning.js";

const COMPANY = "acme-robotics";
const SERIES_B_SOURCE =
  "2024-02-01. [Acme raises $50M](https://news.example.com/acme/series-b). Example Wire. Published: 2024-02-01 | Updated: N/A";

const SECTIONS: Record<string, string> = {
  "01-executive-summary.md": [
    "# Executive Summary",
    "",
    "Acme Robotics closed a $50 million Series B.[^1]",
    "",
    "### Citations",
    "",
    "[^1]: 2024-02-01. [Acme Series B coverage](https://news.example.com/acme/coverage). Example Wire. Published: 2024-02-01 | Updated: N/A",
    ""
  ].join("\n"),
  "03-market-context.md": [
    "# Market Context",
    "",
    "Acme raised $50M in its Series B.[^1] The market is worth $150M today.",
    "",
    "### Citations",
    "",
    `[^1]: ${SERIES_B_SOURCE}`,
    ""
  ].join("\n"),
  "07-funding-terms.md": [
    "# Funding & Terms",
    "",
    'The CEO said "we raised $50M and will hire fast" at launch.[^1]',
    "",
    "### Citations",
    "",
    "[^1]: 2024-02-02. [Acme interview](https://news.example.com/acme/interview). Example Wire. Published: 2024-02-02 | Updated: N/A",
    ""
  ].join("\n")
};

let tmpOut: string;

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "memo-correct-"));
  process.env.MEMO_OUTPUT_DIR = tmpOut;

  const version = await allocateVersion(COMPANY, "generate");
  const runDir = runDirAbs(COMPANY, version);
  await saveState(runDir, initialState({ companyName: "Acme Robotics", investmentType: "direct", mode: "consider", version }));
  for (const [filename, content] of Object.entries(SECTIONS)) await writeSectionFile(runDir, filename, content);
});

afterEach(async () => {
  delete process.env.MEMO_OUTPUT_DIR;
  await fs.rm(tmpOut, { recursive: true, force: true });
});

function correction(overrides: Partial<CorrectionInstruction> = {}): CorrectionInstruction {
  return {
    type: "outdated",
    field: null,
    incorrect: "$50M",
    correct: "$35M",
    sections: ["Market Context", "7"],
    sources: [],
    ...overrides
  };
}

function correctionsFile(corrections: CorrectionInstruction[] = [correction()]): CorrectionsFile {
  return { companyName: "Acme Robotics", sourceVersion: "latest", outputMode: "new_version", dateCreated: null, corrections };
}

const engine = { matcher: numericMatcher, rewriter: literalRewriter, orphanPolicy: "flag" as const };

const DEFINITION_WARNING = `03-market-context.md: "$50M" (for $50M) appears in a citation definition and was not changed; review manually: [^1]: ${SERIES_B_SOURCE}`;
const QUOTE_WARNING =
  '07-funding-terms.md: "$50M" (for $50M) appears in a direct quotation and was not changed; review manually: # Funding & Terms The CEO said "we raised $50M and will hire fast" at launch.[^1]';

async function readSection(version: string, filename: string): Promise<string> {
  return await fs.readFile(path.join(runDirAbs(COMPANY, version), "2-sections", filename), "utf8");
}

describe("correction engine", () => {
  it("writes a new version with every spelling corrected and protected text left alone", async () => {
    const created: string[] = [];
    const report = await runCorrections(correctionsFile(), {
      ...engine,
      onVersionCreated: async (company, from, to) => void created.push(`${company} ${from}->${to}`)
    });

    expect(report.targetVersion).toBe("v0.0.2");
    expect(report.instancesCorrected).toBe(2);
    expect(report.sectionsModified).toBe(2);
    expect(report.modifiedFiles).toEqual(["2-sections/01-executive-summary.md", "2-sections/03-market-context.md"]);
    expect(report.warnings).toEqual([
      DEFINITION_WARNING,
      QUOTE_WARNING,
      '"$35M": 1 claim(s) flagged [NEEDS CITATION]; their sources describe the old value'
    ]);
    expect(created).toEqual(["acme-robotics v0.0.1->v0.0.2"]);

    const hits = report.corrections[0].located.hits;
    expect(hits.map((h) => [h.filename, h.matchedForms])).toEqual([
      ["01-executive-summary.md", ["$50 million"]],
      ["03-market-context.md", ["$50M"]]
    ]);
    expect(hits[1].samples).toEqual(["# Market Context Acme raised $50M in its Series B.[^1] The market is worth $150M today."]);
    expect(report.corrections[0].analysis.sectionHints.map((h) => h.filename)).toEqual(["03-market-context.md", "07-funding-terms.md"]);

    expect(await readSection("v0.0.2", "03-market-context.md")).toBe(
      [
        "# Market Context",
        "",
        "Acme raised $35M in its Series B.[^1] [NEEDS CITATION] The market is worth $150M today.",
        "",
        "### Citations",
        "",
        `[^1]: ${SERIES_B_SOURCE}`,
        ""
      ].join("\n")
    );
    expect(await readSection("v0.0.2", "01-executive-summary.md")).toContain("closed a $35M Series B.[^1]\n");
    expect(await readSection("v0.0.2", "07-funding-terms.md")).toBe(SECTIONS["07-funding-terms.md"]);
    expect(await readSection("v0.0.1", "03-market-context.md")).toBe(SECTIONS["03-market-context.md"]);

    const state = await loadState(runDirAbs(COMPANY, "v0.0.2"));
    expect(state.version).toBe("v0.0.2");
    expect(state.sections["03-market-context.md"]).toMatchObject({ provenance: "edited", updatedBy: "correction" });
    expect(state.messages).toEqual(['correction: "$50M" -> "$35M" (2 instance(s), 2 section(s))']);
    expect(state.finalDraft?.path).toBe("4-final-draft.md");

    const draft = await fs.readFile(path.join(runDirAbs(COMPANY, "v0.0.2"), "4-final-draft.md"), "utf8");
    expect(draft).toContain("Acme raised $35M in its Series B.[^2] [NEEDS CITATION]");

    const audit: unknown = JSON.parse(await fs.readFile(path.join(runDirAbs(COMPANY, "v0.0.2"), "corrections-audit.json"), "utf8"));
    expect(audit).toMatchObject([
      {
        sourceVersion: "v0.0.1",
        targetVersion: "v0.0.2",
        matcher: "numeric",
        rewriter: "literal",
        corrections: [{ incorrect: "$50M", correct: "$35M", instancesCorrected: 2, files: ["01-executive-summary.md", "03-market-context.md"] }]
      }
    ]);

    const ledger = await loadLedger(COMPANY);
    expect(ledger?.latest).toBe("v0.0.2");
    expect(ledger?.history[1]).toMatchObject({ version: "v0.0.2", source: "correction", derivedFrom: "v0.0.1" });
  });

  it("leaves everything untouched when a second pass finds nothing", async () => {
    await runCorrections(correctionsFile(), engine);
    const again = await runCorrections(correctionsFile(), engine);

    expect(again.sourceVersion).toBe("v0.0.2");
    expect(again.targetVersion).toBeNull();
    expect(again.instancesCorrected).toBe(0);
    expect(again.warnings.slice(-2)).toEqual([
      'No instances of "$50M" found in acme-robotics v0.0.2',
      "No changes applied; the run was left untouched"
    ]);
    expect((await loadLedger(COMPANY))?.latest).toBe("v0.0.2");
  });

  it("previews without writing anything", async () => {
    const report = await runCorrections(correctionsFile(), { ...engine, preview: true });

    expect(report.preview).toBe(true);
    expect(report.targetVersion).toBeNull();
    expect(report.sectionsModified).toBe(2);
    expect(report.instancesCorrected).toBe(2);
    expect(report.modifiedFiles).toEqual(["01-executive-summary.md", "03-market-context.md"]);
    expect(report.warnings).toEqual([DEFINITION_WARNING, QUOTE_WARNING]);
    expect(await readSection("v0.0.1", "03-market-context.md")).toBe(SECTIONS["03-market-context.md"]);
    expect((await loadLedger(COMPANY))?.latest).toBe("v0.0.1");
  });

  it("corrects the source run in place", async () => {
    const created: string[] = [];
    const report = await runCorrections(correctionsFile(), {
      ...engine,
      outputMode: "in_place",
      onVersionCreated: async (_company, _from, to) => void created.push(to)
    });

    expect(report.targetVersion).toBe("v0.0.1");
    expect(await readSection("v0.0.1", "01-executive-summary.md")).toContain("closed a $35M Series B.[^1]\n");
    await expect(fs.stat(runDirAbs(COMPANY, "v0.0.2"))).rejects.toThrow();
    expect(created).toEqual([]);
  });

  it("refuses to correct a superseded version in place", async () => {
    await runCorrections(correctionsFile(), engine);

    await expect(
      runCorrections(correctionsFile(), { ...engine, outputMode: "in_place", sourceVersion: "v0.0.1" })
    ).rejects.toThrow(
      new InputError("acme-robotics v0.0.1 has been superseded by v0.0.2; in_place corrections only apply to the latest version")
    );
    expect(await readSection("v0.0.1", "03-market-context.md")).toBe(SECTIONS["03-market-context.md"]);
  });

  it("keeps a hand-formatted citation block byte for byte", async () => {
    const handFormatted = [
      "# Traction & Milestones",
      "",
      "Revenue reached $50M in 2024.[^1]",
      "",
      "---",
      "",
      "## Sources",
      "",
      "[^1]: 2024-05-01. [Acme revenue](https://news.example.com/acme/revenue). Example Wire.",
      "  Published: 2024-05-01 | Updated: N/A",
      "",
      "[^1]: 2024-05-01. [Acme revenue](https://news.example.com/acme/revenue). Example Wire.",
      ""
    ].join("\n");
    await writeSectionFile(runDirAbs(COMPANY, "v0.0.1"), "05-traction-milestones.md", handFormatted);

    await runCorrections(correctionsFile(), engine);

    expect(await readSection("v0.0.2", "05-traction-milestones.md")).toBe(handFormatted.replace("$50M in 2024", "$35M in 2024"));
  });

  it("rejects an unknown section hint and an unknown company", async () => {
    await expect(runCorrections(correctionsFile([correction({ sections: ["Nowhere"] })]), engine)).rejects.toThrow(
      new InputError('Unknown section "Nowhere" in correction "$50M"')
    );
    await expect(runCorrections({ ...correctionsFile(), companyName: "Globex" }, engine)).rejects.toBeInstanceOf(NotFoundError);
  });
});
