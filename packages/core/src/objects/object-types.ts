import { FileMode } from "../files/index.js";

/**
 * Git object type string representations
 *
 * Tags exist in the store but never appear inside trees.
 */
export type ObjectType = "blob" | "tree" | "commit";

const OBJECT_TYPES: ReadonlySet<string> = new Set<ObjectType>(["blob", "tree", "commit"]);

export function isObjectType(value: string): value is ObjectType {
  return OBJECT_TYPES.has(value);
}

/**
 * Object type implied by a tree entry mode.
 */
export function objectTypeForMode(mode: number): ObjectType {
  switch (mode) {
    case FileMode.TREE:
      return "tree";
    case FileMode.GITLINK:
      return "commit";
    default:
      return "blob";
  }
}
