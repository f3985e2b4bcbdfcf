/**
 * Base class for all errors raised by the object store and the tree engines.
 */
export class VcsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VcsError";
  }
}
