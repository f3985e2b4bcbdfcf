import { OperationCanceledError } from "../errors/index.js";

/**
 * Throw OperationCanceledError if the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCanceledError(undefined, { cause: signal.reason });
  }
}
