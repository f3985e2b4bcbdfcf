/**
 * Parser for the output of `git merge-tree --write-tree --stdin -z`.
 *
 * The output is a sequence of NUL-terminated tokens. Each merge result
 * has the form:
 *
 *   <status> NUL <tree-id> NUL
 *   [ <conflicted-file-info> NUL ... NUL  <informational-messages> ... NUL ]
 *
 * - status is "1" for a clean merge and "0" for a conflicted one; a clean
 *   merge ends after the tree id.
 * - conflicted-file-info is "<mode> SP <id> SP <stage> TAB <path>";
 *   an empty token ends the section.
 * - each informational message is
 *   "<path-count> NUL <path>... NUL <type> NUL <message> NUL";
 *   an empty token ends the section.
 *
 * An empty token or end of input where a status is expected ends the
 * output. git ends each result with an empty token, so at most one
 * result is read from a single request.
 */

import { ProtocolError } from "../errors/index.js";
import { parseFileMode } from "../files/index.js";
import type { ObjectId } from "../id/index.js";
import { parseMergeStage } from "./merge-stage.js";
import type { MergeAnnotation, MergeConflictFile } from "./merge-tree-types.js";

/**
 * One merge result as read from the wire.
 */
export interface MergeTreeOutput {
  clean: boolean;
  treeId: ObjectId;
  files: MergeConflictFile[];
  annotations: MergeAnnotation[];
}

/**
 * Parse every merge result in a token stream.
 *
 * The token source is closed when parsing stops, including on error,
 * so a producing process is released.
 *
 * @throws ProtocolError when the tokens violate the grammar
 */
export async function parseMergeTreeOutput(
  tokens: AsyncIterable<string>,
): Promise<MergeTreeOutput[]> {
  const iterator = tokens[Symbol.asyncIterator]();
  const next = async (): Promise<string | undefined> => {
    const slot = await iterator.next();
    return slot.done ? undefined : slot.value;
  };

  const outputs: MergeTreeOutput[] = [];
  try {
    for (let status = await next(); status; status = await next()) {
      let clean: boolean;
      switch (status) {
        case "0":
          clean = false;
          break;
        case "1":
          clean = true;
          break;
        default:
          throw new ProtocolError(`Expected merge status '0' or '1', got ${JSON.stringify(status)}`);
      }

      const treeId = await next();
      if (!treeId) {
        throw new ProtocolError("Expected tree id after merge status, got end of output");
      }

      const output: MergeTreeOutput = { clean, treeId, files: [], annotations: [] };
      outputs.push(output);
      if (clean) {
        continue;
      }

      for (let record = await next(); record; record = await next()) {
        output.files.push(parseConflictFileRecord(record));
      }

      for (let countText = await next(); countText; countText = await next()) {
        output.annotations.push(await readAnnotation(countText, next));
      }
    }
  } finally {
    await iterator.return?.();
  }
  return outputs;
}

async function readAnnotation(
  countText: string,
  next: () => Promise<string | undefined>,
): Promise<MergeAnnotation> {
  if (!/^\d+$/.test(countText)) {
    throw new ProtocolError(`Expected number of paths, got ${JSON.stringify(countText)}`);
  }
  const count = Number.parseInt(countText, 10);

  const paths: string[] = [];
  for (let i = 0; i < count; i++) {
    const path = await next();
    if (path === undefined) {
      throw new ProtocolError(`Expected path #${i + 1} of ${count}, got end of output`);
    }
    paths.push(path);
  }

  const type = await next();
  if (type === undefined) {
    throw new ProtocolError("Expected conflict type, got end of output");
  }
  const message = await next();
  if (message === undefined) {
    throw new ProtocolError("Expected conflict message, got end of output");
  }
  return { type, message, paths };
}

/**
 * Parse "<mode> <id> <stage>\t<path>".
 *
 * @throws ProtocolError if the record is malformed
 */
export function parseConflictFileRecord(record: string): MergeConflictFile {
  const tab = record.indexOf("\t");
  if (tab < 0) {
    throw new ProtocolError(`Invalid conflicted file info (no path): ${JSON.stringify(record)}`);
  }
  const fields = record.slice(0, tab).split(" ");
  const path = record.slice(tab + 1);
  if (fields.length !== 3 || fields[1] === "" || path === "") {
    throw new ProtocolError(`Invalid conflicted file info: ${JSON.stringify(record)}`);
  }
  const [modeText, id, stageText] = fields;

  let mode: number;
  try {
    mode = parseFileMode(modeText);
  } catch (error) {
    throw new ProtocolError(`Invalid mode in conflicted file info: ${JSON.stringify(record)}`, {
      cause: error,
    });
  }
  return { mode, id, stage: parseMergeStage(stageText), path };
}
