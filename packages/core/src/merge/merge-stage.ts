import { ProtocolError } from "../errors/index.js";

/**
 * Stage of a file in a merge conflict.
 *
 * Following Git's index stage numbers.
 */
export const MergeStage = {
  /** Non-conflicted entry (stage 0) */
  OK: 0,
  /** Base version - common ancestor (stage 1) */
  BASE: 1,
  /** Our version - branch1 (stage 2) */
  OURS: 2,
  /** Their version - branch2 (stage 3) */
  THEIRS: 3,
} as const;

export type MergeStageValue = (typeof MergeStage)[keyof typeof MergeStage];

const STAGE_NAMES = ["ok", "base", "ours", "theirs"] as const;

export type MergeStageName = (typeof STAGE_NAMES)[number];

/**
 * Parse a single-digit stage as printed by merge-tree.
 *
 * @throws ProtocolError for anything but "0".."3"
 */
export function parseMergeStage(text: string): MergeStageValue {
  switch (text) {
    case "0":
      return MergeStage.OK;
    case "1":
      return MergeStage.BASE;
    case "2":
      return MergeStage.OURS;
    case "3":
      return MergeStage.THEIRS;
    default:
      throw new ProtocolError(`Invalid conflict stage: ${JSON.stringify(text)}`);
  }
}

export function mergeStageName(stage: MergeStageValue): MergeStageName {
  return STAGE_NAMES[stage];
}
