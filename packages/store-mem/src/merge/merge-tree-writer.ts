import { type MergeTreeOutput, formatFileMode } from "@treesmith/core";
import { encodeString } from "@treesmith/utils";

/**
 * Encode one merge result the way `git merge-tree --write-tree --stdin -z`
 * prints it: NUL-terminated tokens, with an empty token after the result.
 */
export function encodeMergeTreeOutput(output: MergeTreeOutput): Uint8Array {
  const tokens = [output.clean ? "1" : "0", output.treeId];
  if (!output.clean) {
    for (const file of output.files) {
      tokens.push(`${formatFileMode(file.mode)} ${file.id} ${file.stage}\t${file.path}`);
    }
    tokens.push("");
    for (const annotation of output.annotations) {
      tokens.push(String(annotation.paths.length), ...annotation.paths);
      tokens.push(annotation.type, annotation.message);
    }
    tokens.push("");
  }
  tokens.push("");
  return encodeString(tokens.map((token) => `${token}\0`).join(""));
}
