import type { ObjectId } from "../id/index.js";
import type { MergeStageValue } from "./merge-stage.js";

/**
 * Conflict marker style written into conflicted blobs.
 */
export type ConflictStyle = "merge" | "diff3" | "zdiff3";

/**
 * Parameters of a tree merge.
 */
export interface MergeTreeRequest {
  /**
   * First side ("ours"). Must be commit-ish when no merge base is given,
   * any tree-ish otherwise.
   */
  branch1: string;
  /**
   * Second side ("theirs"), with the same constraints as branch1.
   */
  branch2: string;
  /**
   * Explicit merge base. The changes from it to branch2 are applied
   * on top of branch1. Without it the store computes the base itself.
   */
  mergeBase?: string;
  /**
   * Marker style for conflicted files. The store default applies when unset.
   */
  conflictStyle?: ConflictStyle;
}

/**
 * One stage of one conflicted file.
 * A path appears once per stage present in the conflict.
 */
export interface MergeConflictFile {
  /** File mode of this stage */
  mode: number;
  /** Object id of this stage */
  id: ObjectId;
  stage: MergeStageValue;
  path: string;
}

/**
 * Informational message about the merge.
 *
 * Annotations also report paths that were merged automatically, so they
 * do not enumerate exactly the conflicted files.
 */
export interface MergeAnnotation {
  /** Stable machine tag, e.g. "Auto-merging" or "CONFLICT (contents)" */
  type: string;
  /** Human-readable text; wording may change between store versions */
  message: string;
  /** Paths the message is about */
  paths: string[];
}

/**
 * Stable annotation tags reported by the merge.
 */
export const MergeAnnotationType = {
  AUTO_MERGING: "Auto-merging",
  CONFLICT_CONTENTS: "CONFLICT (contents)",
  CONFLICT_ADD_ADD: "CONFLICT (add/add)",
  CONFLICT_MODIFY_DELETE: "CONFLICT (modify/delete)",
} as const;

/**
 * Details of a merge that needs manual resolution.
 */
export interface MergeConflict {
  readonly files: readonly MergeConflictFile[];
  readonly annotations: readonly MergeAnnotation[];
}

/**
 * Outcome kind of a tree merge.
 */
export enum MergeTreeStatus {
  /** No blocking conflicts; the tree is the merge result */
  CLEAN = "clean",
  /** Some files need resolution; the tree holds conflict markers */
  CONFLICTED = "conflicted",
}

export interface CleanMergeTreeResult {
  readonly status: MergeTreeStatus.CLEAN;
  readonly treeId: ObjectId;
}

export interface ConflictedMergeTreeResult {
  readonly status: MergeTreeStatus.CONFLICTED;
  /** Best-effort tree, with conflict markers in conflicted files */
  readonly treeId: ObjectId;
  readonly conflict: MergeConflict;
}

/**
 * Result of a tree merge. Conflicts are an expected outcome, not an error:
 * failures of the store or of its protocol are thrown instead.
 */
export type MergeTreeResult = CleanMergeTreeResult | ConflictedMergeTreeResult;
