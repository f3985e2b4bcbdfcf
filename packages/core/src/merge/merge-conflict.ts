import { formatFileMode } from "../files/index.js";
import { shortId } from "../id/index.js";
import { mergeStageName } from "./merge-stage.js";
import type { MergeConflict } from "./merge-tree-types.js";

/**
 * Unique conflicted paths, in the order they first appear.
 */
export function conflictedPaths(conflict: MergeConflict): string[] {
  const seen = new Set<string>();
  for (const file of conflict.files) {
    seen.add(file.path);
  }
  return [...seen];
}

/**
 * Render a conflict for people: one block per file listing its stages,
 * followed by the messages that mention conflicted files.
 *
 * ```
 * conflicting files: a.txt
 *   a.txt
 *     base   100644 1a2b3c4
 *     ours   100644 5d6e7f8
 *     theirs 100644 9a0b1c2
 * Auto-merging a.txt
 * CONFLICT (contents): Merge conflict in a.txt
 * ```
 */
export function formatMergeConflict(conflict: MergeConflict): string {
  const paths = conflictedPaths(conflict);
  const lines = [`conflicting files: ${paths.join(", ")}`];
  for (const path of paths) {
    lines.push(`  ${path}`);
    for (const file of conflict.files) {
      if (file.path !== path) continue;
      lines.push(
        `    ${mergeStageName(file.stage).padEnd(6)} ${formatFileMode(file.mode)} ${shortId(file.id)}`,
      );
    }
  }
  const conflicted = new Set(paths);
  for (const annotation of conflict.annotations) {
    if (annotation.paths.some((path) => conflicted.has(path))) {
      lines.push(annotation.message.trimEnd());
    }
  }
  return lines.join("\n");
}
