import { type Logger, ProtocolError } from "@treesmith/core";

import { createNodeGitExecutor, type GitExecutor } from "./git-executor.js";
import { GitObjectStore } from "./git-object-store.js";
import { GitRunner } from "./git-runner.js";

/**
 * Options for opening a repository
 */
export interface GitRepositoryOptions {
  /** Variables added to the inherited process environment */
  env?: Record<string, string>;
  /** Git executable (default: "git" from PATH) */
  gitPath?: string;
  /** Settings passed as `-c key=value` to every command */
  config?: Record<string, string>;
  /** Receives every command line and its standard error at debug level */
  logger?: Logger;
  /** Process launcher; defaults to node:child_process */
  executor?: GitExecutor;
  signal?: AbortSignal;
}

export interface InitGitRepositoryOptions extends GitRepositoryOptions {
  /** Name of the initial branch (default: "main") */
  branch?: string;
}

/**
 * Handle to one git repository.
 *
 * All state lives in the handle: two repositories opened in the same
 * process never share configuration.
 */
export class GitRepository {
  /** Object store running git in this repository */
  readonly objects: GitObjectStore;

  constructor(
    /** Top-level directory of the working tree */
    readonly root: string,
    /** Absolute path of the .git directory */
    readonly gitDir: string,
    readonly runner: GitRunner,
  ) {
    this.objects = new GitObjectStore(runner);
  }
}

function createRunner(cwd: string, options: GitRepositoryOptions): GitRunner {
  return new GitRunner({
    executor: options.executor ?? createNodeGitExecutor(options.gitPath),
    cwd,
    env: { ...process.env, ...options.env },
    config: options.config,
    logger: options.logger,
  });
}

/**
 * Open the repository containing `dir`.
 *
 * @throws StoreIOError if `dir` is not inside a git working tree
 */
export async function openGitRepository(
  dir: string,
  options: GitRepositoryOptions = {},
): Promise<GitRepository> {
  const output = await createRunner(dir, options).output(
    ["rev-parse", "--show-toplevel", "--absolute-git-dir"],
    { signal: options.signal },
  );
  const lines = output.split("\n");
  if (lines.length !== 2 || !lines[0] || !lines[1]) {
    throw new ProtocolError(`Unexpected output from git rev-parse: ${JSON.stringify(output)}`);
  }
  const [root, gitDir] = lines;
  return new GitRepository(root, gitDir, createRunner(root, options));
}

/**
 * Create a repository in `dir` and open it.
 */
export async function initGitRepository(
  dir: string,
  options: InitGitRepositoryOptions = {},
): Promise<GitRepository> {
  const branch = options.branch || "main";
  await createRunner(dir, options).output(["init", `--initial-branch=${branch}`], {
    signal: options.signal,
  });
  return openGitRepository(dir, options);
}
