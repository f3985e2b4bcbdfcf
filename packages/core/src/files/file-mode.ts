import { InvalidEntryError } from "../errors/index.js";

/**
 * File mode constants (following Git patterns)
 *
 * These are octal values stored in tree entries:
 * - Trees (directories) use 040000
 * - Regular files use 100644 (non-executable) or 100755 (executable)
 * - Symbolic links use 120000
 * - Gitlinks (submodules) use 160000
 * - 000000 marks an absent entry
 */
export const FileMode = {
  /** Absent entry */
  ZERO: 0o000000,
  /** Directory (tree) */
  TREE: 0o040000,
  /** Regular file (non-executable) */
  REGULAR_FILE: 0o100644,
  /** Executable file */
  EXECUTABLE_FILE: 0o100755,
  /** Symbolic link */
  SYMLINK: 0o120000,
  /** Submodule (gitlink) */
  GITLINK: 0o160000,
} as const;

export type FileModeValue = (typeof FileMode)[keyof typeof FileMode];

const OCTAL = /^[0-7]{1,7}$/;

/**
 * Parse the octal text form of a mode ("100644", "40000", "040000").
 *
 * @throws InvalidEntryError if the text is not an octal number
 */
export function parseFileMode(text: string): number {
  if (!OCTAL.test(text)) {
    throw new InvalidEntryError(`Invalid file mode: ${JSON.stringify(text)}`);
  }
  return Number.parseInt(text, 8);
}

/**
 * Format a mode as six zero-padded octal digits, as git prints it.
 */
export function formatFileMode(mode: number): string {
  return mode.toString(8).padStart(6, "0");
}

export function isTreeMode(mode: number): boolean {
  return mode === FileMode.TREE;
}
