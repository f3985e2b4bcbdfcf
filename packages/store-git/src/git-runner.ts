/**
 * Runs git commands for one repository.
 *
 * Every call spawns its own process. Standard input is written while
 * standard output and standard error are drained, so a command that
 * produces output before it has read all of its input cannot deadlock.
 */

import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { type Logger, StoreIOError, throwIfAborted } from "@treesmith/core";
import { type ByteSource, collect, decodeString, encodeString, toByteChunks } from "@treesmith/utils";

import type { GitChildProcess, GitExecutor, GitExit } from "./git-executor.js";

export interface GitRunnerOptions {
  executor: GitExecutor;
  /** Working directory of every command */
  cwd?: string;
  /** Complete process environment */
  env: NodeJS.ProcessEnv;
  /** Passed as `-c key=value` before every command */
  config?: Record<string, string>;
  logger?: Logger;
}

export interface GitCallOptions {
  /** Standard input; closed right away when unset */
  input?: ByteSource;
  signal?: AbortSignal;
  /** Extra `-c key=value` settings for this call */
  config?: Record<string, string>;
  /** Exit codes that count as success (default: only 0) */
  okExitCodes?: readonly number[];
}

export interface GitRunResult {
  exitCode: number;
  stdout: Uint8Array;
  /** Trimmed standard error */
  stderr: string;
}

interface Settled {
  exit: GitExit;
  stderr: string;
  inputError?: unknown;
}

export class GitRunner {
  private readonly executor: GitExecutor;
  private readonly cwd?: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly config: Record<string, string>;
  private readonly logger?: Logger;

  constructor(options: GitRunnerOptions) {
    this.executor = options.executor;
    this.cwd = options.cwd;
    this.env = options.env;
    this.config = options.config ?? {};
    this.logger = options.logger;
  }

  /**
   * Run a command to completion and collect its output.
   *
   * A non-zero exit code is returned, not thrown.
   *
   * @throws StoreIOError if git cannot be started or is killed
   * @throws OperationCanceledError when the signal fires
   */
  async run(args: string[], options: GitCallOptions = {}): Promise<GitRunResult> {
    const { signal } = options;
    throwIfAborted(signal);
    const child = this.start(args, options);

    const onAbort = (): void => child.kill();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const [stdout, settled] = await Promise.all([
        collect(readChunks(child.stdout)),
        this.settle(child, options.input),
      ]);
      throwIfAborted(signal);
      const exitCode = this.checkStarted(args, settled);
      return { exitCode, stdout, stderr: settled.stderr };
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Run a command and return its standard output with the trailing
   * newline removed.
   *
   * @throws StoreIOError if the command fails
   */
  async output(args: string[], options: GitCallOptions = {}): Promise<string> {
    const result = await this.run(args, options);
    this.checkExit(args, result.exitCode, result.stderr, options);
    return decodeString(result.stdout).replace(/\r?\n$/, "");
  }

  /**
   * Run a command and stream its standard output.
   *
   * Stopping the iteration early kills the process and drains its pipes.
   * The exit status is checked once the output has been read in full.
   *
   * @throws StoreIOError (through the stream) if the command fails
   */
  async *stream(args: string[], options: GitCallOptions = {}): AsyncGenerator<Uint8Array> {
    const { signal } = options;
    throwIfAborted(signal);
    const child = this.start(args, options);

    const onAbort = (): void => child.kill();
    signal?.addEventListener("abort", onAbort, { once: true });
    const settling = this.settle(child, options.input);
    try {
      let completed = false;
      try {
        yield* readChunks(child.stdout);
        completed = true;
      } finally {
        if (!completed) {
          child.kill();
          child.stdout.resume();
          await settling;
        }
      }

      const settled = await settling;
      throwIfAborted(signal);
      const exitCode = this.checkStarted(args, settled);
      this.checkExit(args, exitCode, settled.stderr, options);
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Throw StoreIOError unless the exit code counts as success.
   */
  checkExit(args: string[], exitCode: number, stderr: string, options: GitCallOptions = {}): void {
    const okExitCodes = options.okExitCodes ?? [0];
    if (!okExitCodes.includes(exitCode)) {
      throw new StoreIOError(`${commandName(args)} exited with code ${exitCode}`, {
        command: commandName(args),
        exitCode,
        stderr,
      });
    }
  }

  private start(args: string[], options: GitCallOptions): GitChildProcess {
    const fullArgs: string[] = [];
    for (const [key, value] of Object.entries({ ...this.config, ...options.config })) {
      fullArgs.push("-c", `${key}=${value}`);
    }
    fullArgs.push(...args);

    this.logger?.debug?.(`git ${fullArgs.join(" ")}`);
    return this.executor.spawn(fullArgs, { cwd: this.cwd, env: this.env });
  }

  private async settle(child: GitChildProcess, input: ByteSource | undefined): Promise<Settled> {
    const [inputError, stderrBytes, exit] = await Promise.all([
      writeInput(child, input ?? ""),
      collect(readChunks(child.stderr)),
      child.exited,
    ]);
    const stderr = decodeString(stderrBytes).trim();
    if (stderr) {
      this.logger?.debug?.(`git stderr: ${stderr}`);
    }
    return { exit, stderr, inputError };
  }

  private checkStarted(args: string[], { exit, stderr, inputError }: Settled): number {
    const command = commandName(args);
    if (exit.error) {
      throw new StoreIOError(`Cannot run ${command}: ${exit.error.message}`, { command }, {
        cause: exit.error,
      });
    }
    if (exit.code === null) {
      throw new StoreIOError(`${command} was killed by ${exit.signal ?? "a signal"}`, {
        command,
        exitCode: null,
        stderr,
      });
    }
    if (exit.code === 0 && inputError !== undefined) {
      throw new StoreIOError(`Cannot write input of ${command}`, { command, exitCode: 0 }, {
        cause: inputError,
      });
    }
    return exit.code;
  }
}

function commandName(args: string[]): string {
  return `git ${args[0] ?? ""}`.trimEnd();
}

/**
 * Feed input to the process and close its standard input.
 * Resolves to the write error, if any; a process that exits without
 * reading its input reports through its exit status instead.
 */
async function writeInput(child: GitChildProcess, input: ByteSource): Promise<unknown> {
  try {
    await pipeline(Readable.from(toByteChunks(input)), child.stdin);
    return undefined;
  } catch (error) {
    return error;
  }
}

async function* readChunks(readable: Readable): AsyncGenerator<Uint8Array> {
  for await (const chunk of readable) {
    yield chunk instanceof Uint8Array ? chunk : encodeString(String(chunk));
  }
}
