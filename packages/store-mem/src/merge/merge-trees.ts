/**
 * Three-way tree merge for the in-memory store.
 *
 * Works on whole paths: the three sides are listed recursively and each
 * path is resolved on its own. Content merges of text files use diff3;
 * binary files, symlinks and gitlinks that changed on both sides are
 * reported as conflicts with our version left in the tree.
 */

import {
  type BlobInfo,
  EMPTY_TREE_ID,
  FileMode,
  type MergeAnnotation,
  MergeAnnotationType,
  type MergeConflictFile,
  MergeStage,
  type MergeStageValue,
  type MergeTreeOutput,
  type MergeTreeRequest,
  type ObjectId,
  type ObjectStore,
  type StoreCallOptions,
  makeTreeRecursive,
  throwIfAborted,
} from "@treesmith/core";
import { collect, decodeString } from "@treesmith/utils";

import { mergeText } from "./merge-blobs.js";

interface Version {
  mode: number;
  id: ObjectId;
}

interface PathState {
  base?: Version;
  ours?: Version;
  theirs?: Version;
}

interface MergeState {
  store: ObjectStore;
  request: MergeTreeRequest;
  options: StoreCallOptions;
  blobs: BlobInfo[];
  files: MergeConflictFile[];
  annotations: MergeAnnotation[];
}

function sameVersion(a: Version | undefined, b: Version | undefined): boolean {
  if (!a || !b) return a === b;
  return a.mode === b.mode && a.id === b.id;
}

function isTextMergeable(mode: number): boolean {
  return mode === FileMode.REGULAR_FILE || mode === FileMode.EXECUTABLE_FILE;
}

/**
 * Merge `request.branch1` and `request.branch2`, both tree ids, against
 * `request.mergeBase` (the empty tree when unset). Blobs and trees of the
 * result are written to the store.
 */
export async function mergeTrees(
  store: ObjectStore,
  request: MergeTreeRequest,
  options: StoreCallOptions = {},
): Promise<MergeTreeOutput> {
  const sides: Array<[keyof PathState, ObjectId]> = [
    ["base", request.mergeBase ?? EMPTY_TREE_ID],
    ["ours", request.branch1],
    ["theirs", request.branch2],
  ];
  const paths = new Map<string, PathState>();
  for (const [side, treeId] of sides) {
    for await (const entry of store.listTree(treeId, { ...options, recurse: true })) {
      let state = paths.get(entry.name);
      if (!state) {
        state = {};
        paths.set(entry.name, state);
      }
      state[side] = { mode: entry.mode, id: entry.id };
    }
  }

  const state: MergeState = { store, request, options, blobs: [], files: [], annotations: [] };
  for (const path of [...paths.keys()].sort()) {
    throwIfAborted(options.signal);
    const versions = paths.get(path) ?? {};
    const result = await mergePath(state, path, versions);
    if (result) {
      state.blobs.push({ mode: result.mode, id: result.id, path });
    }
  }

  const treeId = await makeTreeRecursive(store, state.blobs, options);
  return {
    clean: state.files.length === 0,
    treeId,
    files: state.files,
    annotations: state.annotations,
  };
}

async function mergePath(
  state: MergeState,
  path: string,
  { base, ours, theirs }: PathState,
): Promise<Version | undefined> {
  if (sameVersion(ours, theirs)) return ours;
  if (sameVersion(base, ours)) return theirs;
  if (sameVersion(base, theirs)) return ours;

  if (ours && theirs) {
    return mergeContents(state, path, base, ours, theirs);
  }

  // Changed on one side, deleted on the other: keep the changed version.
  const survivor = ours ?? theirs;
  if (!survivor || !base) return survivor;
  const { branch1, branch2 } = state.request;
  const [deletedIn, modifiedIn] = ours ? [branch2, branch1] : [branch1, branch2];
  addStages(state, path, [
    [MergeStage.BASE, base],
    [ours ? MergeStage.OURS : MergeStage.THEIRS, survivor],
  ]);
  state.annotations.push({
    type: MergeAnnotationType.CONFLICT_MODIFY_DELETE,
    message:
      `CONFLICT (modify/delete): ${path} deleted in ${deletedIn} and modified in ${modifiedIn}.` +
      `  Version ${modifiedIn} of ${path} left in tree.\n`,
    paths: [path],
  });
  return survivor;
}

async function mergeContents(
  state: MergeState,
  path: string,
  base: Version | undefined,
  ours: Version,
  theirs: Version,
): Promise<Version> {
  const { store, request, options } = state;
  const mode =
    ours.mode === theirs.mode || (base && base.mode !== ours.mode) ? ours.mode : theirs.mode;
  if (ours.id === theirs.id) {
    return { mode, id: ours.id };
  }

  state.annotations.push({
    type: MergeAnnotationType.AUTO_MERGING,
    message: `Auto-merging ${path}\n`,
    paths: [path],
  });

  let merged: Version | undefined;
  if (isTextMergeable(ours.mode) && isTextMergeable(theirs.mode)) {
    const [baseBytes, ourBytes, theirBytes] = await Promise.all([
      base ? collect(store.readBlob(base.id, options)) : new Uint8Array(0),
      collect(store.readBlob(ours.id, options)),
      collect(store.readBlob(theirs.id, options)),
    ]);
    if (!isBinary(baseBytes) && !isBinary(ourBytes) && !isBinary(theirBytes)) {
      const { text, hasConflict } = mergeText({
        base: decodeString(baseBytes),
        ours: decodeString(ourBytes),
        theirs: decodeString(theirBytes),
        ourName: request.branch1,
        theirName: request.branch2,
        baseName: request.mergeBase ?? "empty tree",
        conflictStyle: request.conflictStyle,
      });
      const id = await store.writeBlob(text, options);
      if (!hasConflict) {
        return { mode, id };
      }
      merged = { mode, id };
    }
  }

  const stages: Array<[MergeStageValue, Version]> = [];
  if (base) stages.push([MergeStage.BASE, base]);
  stages.push([MergeStage.OURS, ours], [MergeStage.THEIRS, theirs]);
  addStages(state, path, stages);

  const addAdd = !base;
  state.annotations.push({
    type: addAdd ? MergeAnnotationType.CONFLICT_ADD_ADD : MergeAnnotationType.CONFLICT_CONTENTS,
    message: `${addAdd ? "CONFLICT (add/add)" : "CONFLICT (contents)"}: Merge conflict in ${path}\n`,
    paths: [path],
  });
  return merged ?? { mode, id: ours.id };
}

function addStages(
  state: MergeState,
  path: string,
  stages: Array<[MergeStageValue, Version]>,
): void {
  for (const [stage, version] of stages) {
    state.files.push({ mode: version.mode, id: version.id, stage, path });
  }
}

function isBinary(bytes: Uint8Array): boolean {
  return bytes.includes(0);
}
