import { Utf8DecodeError } from "@treesmith/utils";

import { VcsError } from "./vcs-error.js";

/**
 * Thrown when an object, or a path inside a tree, does not exist.
 *
 * The only error the tree patch engine recovers from: a directory that
 * cannot be resolved is treated as empty.
 */
export class ObjectNotFoundError extends VcsError {
  /** What was looked up: an object id, or "treeish:path" */
  readonly ref: string;

  constructor(ref: string, message?: string, options?: ErrorOptions) {
    super(message ?? `Object not found: ${ref}`, options);
    this.name = "ObjectNotFoundError";
    this.ref = ref;
  }
}

/**
 * Thrown for a tree entry or path the store cannot accept.
 * Always a caller bug, never worth retrying.
 */
export class InvalidEntryError extends VcsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidEntryError";
  }
}

/**
 * Thrown when the store process cannot be started or exits with an error.
 */
export class StoreIOError extends VcsError {
  /** Command that failed, e.g. "git mktree" */
  readonly command?: string;
  /** Exit code, null when killed by a signal or never started */
  readonly exitCode?: number | null;
  /** Trimmed standard error output */
  readonly stderr?: string;

  constructor(
    message: string,
    details: { command?: string; exitCode?: number | null; stderr?: string } = {},
    options?: ErrorOptions,
  ) {
    super(details.stderr ? `${message}\nstderr:\n${details.stderr}` : message, options);
    this.name = "StoreIOError";
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

/**
 * Thrown when a store response violates its wire grammar.
 * Usually a sign of an unsupported store version.
 */
export class ProtocolError extends VcsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/**
 * Thrown when an engine finds its own bookkeeping inconsistent.
 * Always a defect in this library.
 */
export class InternalInvariantError extends VcsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InternalInvariantError";
  }
}

/**
 * Thrown when an operation stops because its AbortSignal fired.
 */
export class OperationCanceledError extends VcsError {
  constructor(message?: string, options?: ErrorOptions) {
    super(message ?? "Operation canceled", options);
    this.name = "OperationCanceledError";
  }
}

export function isObjectNotFound(error: unknown): error is ObjectNotFoundError {
  return error instanceof ObjectNotFoundError;
}

/**
 * Turn a token that failed UTF-8 decoding into a ProtocolError; other
 * errors are returned as they are.
 */
export function protocolErrorFrom(error: unknown, source: string): unknown {
  if (error instanceof Utf8DecodeError) {
    return new ProtocolError(`${source} printed a name that is not valid UTF-8`, { cause: error });
  }
  return error;
}
