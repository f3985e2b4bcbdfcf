/**
 * Optional logger accepted by stores and engines.
 *
 * Every method is optional so that `console`, a pino/winston instance or a
 * test spy can be passed as is. Nothing is logged when no logger is given.
 */
export interface Logger {
  debug?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}
