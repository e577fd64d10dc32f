import { CancelledError } from "../../errors.js";
import { parseSection, splitCitationBlock } from "../citations.js";
import type { CompanyBrief, MemoCollaborators, SectionForReview } from "../collaborators.js";
import type { StageContext } from "../controller.js";
import type { PipelineState, SectionState, StageName } from "../state.js";

export type StageDeps = {
  collaborators: MemoCollaborators;
};

export function brief(state: PipelineState): CompanyBrief {
  return { companyName: state.companyName, investmentType: state.investmentType, mode: state.mode };
}

export function toReview(section: SectionState): SectionForReview {
  return { number: section.number, name: section.name, content: section.content };
}

export function throwIfAborted(ctx: StageContext): void {
  if (ctx.signal.aborted) throw new CancelledError();
}

/**
 * The section with new content. Files under `2-sections/` are written by the controller
 * once the stage's update has merged.
 */
export function withContent(
  section: SectionState,
  content: string,
  updatedBy: StageName,
  provenance: SectionState["provenance"] = section.provenance
): SectionState {
  return { ...section, content: content.endsWith("\n") ? content : `${content}\n`, updatedBy, provenance };
}

/**
 * Inserts a line directly under the section's `# Title` line.
 */
export function insertAfterTitle(content: string, line: string): string {
  const nl = content.indexOf("\n");
  if (nl === -1) return `${content}\n\n${line}\n`;
  const rest = content.slice(nl + 1).replace(/^\n+/, "");
  return `${content.slice(0, nl)}\n\n${line}\n\n${rest}`;
}

/**
 * Appends a block to the end of the section body, above its citation block.
 */
export function appendToBody(content: string, block: string): string {
  const { body, trailer } = splitCitationBlock(content);
  return trailer.trim().length > 0 ? `${body}\n\n${block}${trailer}` : `${body}\n\n${block}\n`;
}

/**
 * True when every existing marker and definition survives unchanged in `after`.
 * With `allowNew` false, `after` may not add markers either.
 */
export function citationsPreserved(before: string, after: string, allowNew: boolean): boolean {
  const a = parseSection(before);
  const b = parseSection(after);
  for (const id of a.markers) {
    if (!b.markers.includes(id)) return false;
  }
  for (const [id, text] of a.definitions) {
    if (b.definitions.get(id) !== text) return false;
  }
  if (!allowNew && b.markers.length !== a.markers.length) return false;
  return true;
}
