import { InvalidEntryError } from "../errors/index.js";

/** Name used for the root directory of a tree. */
export const ROOT_DIR = ".";

/**
 * Normalize a slash-separated path inside a tree.
 *
 * Leading and trailing slashes are dropped. Empty, "." and ".."
 * segments are rejected since they cannot name a tree entry.
 *
 * @throws InvalidEntryError for paths that cannot be stored
 */
export function normalizeTreePath(path: string): string {
  const trimmed = path.replace(/^\/+|\/+$/g, "");
  if (trimmed === "") {
    throw new InvalidEntryError(`Invalid path: ${JSON.stringify(path)}`);
  }
  for (const segment of trimmed.split("/")) {
    if (segment === "" || segment === "." || segment === "..") {
      throw new InvalidEntryError(`Invalid path: ${JSON.stringify(path)}`);
    }
  }
  return trimmed;
}

/**
 * Split a normalized path into its directory ("." for the root) and name.
 */
export function splitTreePath(path: string): { dir: string; name: string } {
  const slash = path.lastIndexOf("/");
  if (slash < 0) {
    return { dir: ROOT_DIR, name: path };
  }
  return { dir: path.slice(0, slash), name: path.slice(slash + 1) };
}

/**
 * Parent of a directory; the parent of a top-level directory is the root.
 */
export function parentDir(dir: string): string {
  return splitTreePath(dir).dir;
}

/**
 * Number of segments in a directory path; the root has depth 0.
 */
export function dirDepth(dir: string): number {
  if (dir === ROOT_DIR) return 0;
  let depth = 1;
  for (let i = dir.indexOf("/"); i >= 0; i = dir.indexOf("/", i + 1)) {
    depth++;
  }
  return depth;
}
