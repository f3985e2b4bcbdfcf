import { ProtocolError } from "../errors/index.js";
import { formatFileMode, parseFileMode } from "../files/index.js";
import { isObjectType } from "../objects/index.js";
import type { TreeEntry } from "./tree-entry.js";

/**
 * Parse one tree record as printed by `ls-tree -z`:
 *
 *   <mode> SP <type> SP <id> TAB <name>
 *
 * The name is taken verbatim; it may contain spaces or tabs.
 *
 * @throws ProtocolError if the record is malformed
 */
export function parseTreeRecord(record: string): TreeEntry {
  const tab = record.indexOf("\t");
  if (tab < 0) {
    throw new ProtocolError(`Invalid tree record (no tab): ${JSON.stringify(record)}`);
  }
  const fields = record.slice(0, tab).split(" ");
  const name = record.slice(tab + 1);
  if (fields.length !== 3 || name === "") {
    throw new ProtocolError(`Invalid tree record: ${JSON.stringify(record)}`);
  }
  const [modeText, type, id] = fields;

  let mode: number;
  try {
    mode = parseFileMode(modeText);
  } catch (error) {
    throw new ProtocolError(`Invalid mode in tree record: ${JSON.stringify(record)}`, {
      cause: error,
    });
  }
  if (!isObjectType(type)) {
    throw new ProtocolError(`Invalid object type in tree record: ${JSON.stringify(record)}`);
  }
  if (id === "") {
    throw new ProtocolError(`Missing object id in tree record: ${JSON.stringify(record)}`);
  }
  return { mode, type, id, name };
}

/**
 * Format a tree record in the form `mktree` and `ls-tree` use,
 * without the trailing terminator.
 */
export function formatTreeRecord(entry: TreeEntry): string {
  return `${formatFileMode(entry.mode)} ${entry.type} ${entry.id}\t${entry.name}`;
}
