import diff3Merge from "diff3";

import type { ConflictStyle } from "@treesmith/core";

const LINEBREAKS = /^.*(\r?\n|$)/gm;

const MARKER_SIZE = 7;

export interface MergeTextInput {
  base: string;
  ours: string;
  theirs: string;
  /** Label after the "<<<<<<<" marker */
  ourName: string;
  /** Label after the ">>>>>>>" marker */
  theirName: string;
  /** Label after the "|||||||" marker in diff3 styles */
  baseName: string;
  conflictStyle?: ConflictStyle;
}

export interface MergeTextResult {
  text: string;
  hasConflict: boolean;
}

function splitLines(text: string): string[] {
  return (text.match(LINEBREAKS) ?? []).filter((line) => line !== "");
}

function withNewline(lines: readonly string[]): string {
  const text = lines.join("");
  return text === "" || text.endsWith("\n") ? text : `${text}\n`;
}

/**
 * Line-based three-way merge of text content.
 *
 * Conflicting hunks are written with git-style markers. The "merge"
 * style shows both sides; "diff3" and "zdiff3" also show the base.
 */
export function mergeText(input: MergeTextInput): MergeTextResult {
  const regions = diff3Merge(splitLines(input.ours), splitLines(input.base), splitLines(input.theirs));
  const showBase = input.conflictStyle === "diff3" || input.conflictStyle === "zdiff3";

  let text = "";
  let hasConflict = false;
  for (const region of regions) {
    if ("ok" in region) {
      text += region.ok.join("");
      continue;
    }
    hasConflict = true;
    const { a, o, b } = region.conflict;
    text += `${"<".repeat(MARKER_SIZE)} ${input.ourName}\n`;
    text += withNewline(a);
    if (showBase) {
      text += `${"|".repeat(MARKER_SIZE)} ${input.baseName}\n`;
      text += withNewline(o);
    }
    text += `${"=".repeat(MARKER_SIZE)}\n`;
    text += withNewline(b);
    text += `${">".repeat(MARKER_SIZE)} ${input.theirName}\n`;
  }

  return { text, hasConflict };
}
