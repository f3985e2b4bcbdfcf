import { spawn } from "node:child_process";
import type { Readable, Writable } from "node:stream";

/**
 * How a git process ended.
 */
export interface GitExit {
  /** Exit code, null when the process was killed or never started */
  code: number | null;
  /** Signal that terminated the process, if any */
  signal: string | null;
  /** Set when the process could not be started */
  error?: Error;
}

export interface GitSpawnOptions {
  cwd?: string;
  env: NodeJS.ProcessEnv;
}

/**
 * A running git process.
 */
export interface GitChildProcess {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  /** Resolves once the process has ended and its pipes are closed; never rejects */
  exited: Promise<GitExit>;
  kill(): void;
}

/**
 * Starts git processes. Replaced in tests by an in-process fake.
 */
export interface GitExecutor {
  spawn(args: string[], options: GitSpawnOptions): GitChildProcess;
}

/**
 * Executor that runs the git binary through node:child_process.
 *
 * @param gitPath Path or name of the git executable
 */
export function createNodeGitExecutor(gitPath = "git"): GitExecutor {
  return {
    spawn(args, options) {
      const child = spawn(gitPath, args, { cwd: options.cwd, env: options.env });
      const exited = new Promise<GitExit>((resolve) => {
        child.once("error", (error) => resolve({ code: null, signal: null, error }));
        child.once("close", (code, signal) => resolve({ code, signal }));
      });
      return {
        stdin: child.stdin,
        stdout: child.stdout,
        stderr: child.stderr,
        exited,
        kill: () => {
          child.kill();
        },
      };
    },
  };
}
