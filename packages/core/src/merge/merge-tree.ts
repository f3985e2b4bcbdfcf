import { toTokens } from "@treesmith/utils";

import { InvalidEntryError, ProtocolError, protocolErrorFrom } from "../errors/index.js";
import { shortId } from "../id/index.js";
import type { Logger } from "../logging/index.js";
import type { ObjectStore } from "../store/index.js";
import { throwIfAborted } from "../utils/index.js";
import { parseMergeTreeOutput } from "./merge-tree-parser.js";
import { type MergeTreeRequest, type MergeTreeResult, MergeTreeStatus } from "./merge-tree-types.js";

export interface MergeTreeOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Merge two trees (or commits) inside the store, without touching any
 * working directory or index.
 *
 * A merge whose only findings are automatic resolutions (for example
 * "Auto-merging <file>") is reported as clean. A conflicted merge still
 * carries the id of the tree the store wrote, with conflict markers in
 * the conflicted files.
 *
 * @throws InvalidEntryError for a malformed request
 * @throws ProtocolError when the store output violates the grammar
 * @throws StoreIOError when the store fails
 * @throws OperationCanceledError when the signal fires
 */
export async function mergeTree(
  store: ObjectStore,
  request: MergeTreeRequest,
  options: MergeTreeOptions = {},
): Promise<MergeTreeResult> {
  const { signal, logger } = options;
  validateRequest(request);
  throwIfAborted(signal);

  const outputs = await parseMergeTreeOutput(
    toTokens(store.streamMergeTree(request, { signal })),
  ).catch((error: unknown) => {
    throw protocolErrorFrom(error, "merge-tree");
  });
  throwIfAborted(signal);
  if (outputs.length !== 1) {
    throw new ProtocolError(`Expected one merge result, got ${outputs.length}`);
  }

  const [output] = outputs;
  logger?.debug?.(
    `merge-tree ${request.branch1} ${request.branch2}: tree ${shortId(output.treeId)},`,
    `${output.files.length} conflicted file stage(s), ${output.annotations.length} message(s)`,
  );

  if (output.files.length === 0) {
    return { status: MergeTreeStatus.CLEAN, treeId: output.treeId };
  }
  return {
    status: MergeTreeStatus.CONFLICTED,
    treeId: output.treeId,
    conflict: { files: output.files, annotations: output.annotations },
  };
}

function validateRequest(request: MergeTreeRequest): void {
  checkRevision("branch1", request.branch1);
  checkRevision("branch2", request.branch2);
  if (request.mergeBase !== undefined) {
    checkRevision("mergeBase", request.mergeBase);
  }
}

// Revisions travel space-separated on one stdin line.
function checkRevision(field: string, value: string): void {
  if (value === "" || /\s/.test(value)) {
    throw new InvalidEntryError(`Invalid merge request: ${field} ${JSON.stringify(value)}`);
  }
}
