/**
 * In-process stand-in for the git executable.
 *
 * Implements the plumbing commands GitObjectStore runs on top of a
 * MemoryObjectStore, printing the same output formats and exit codes as
 * git. Tests can replace any command with their own handler.
 */

import { PassThrough } from "node:stream";

import {
  ObjectNotFoundError,
  VcsError,
  formatTreeRecord,
  isObjectNotFound,
  parseTreeRecord,
  type ConflictStyle,
  type MergeTreeRequest,
} from "@treesmith/core";
import { MemoryObjectStore, encodeMergeTreeOutput, mergeTrees } from "@treesmith/store-mem";
import { collect, concatBytes, decodeString, encodeString, toArray, toTokens } from "@treesmith/utils";

import type { GitChildProcess, GitExecutor, GitExit, GitSpawnOptions } from "../../src/index.js";

export interface FakeGitCall {
  /** Arguments after the `-c` settings */
  args: string[];
  /** Settings given with `-c key=value` */
  config: Record<string, string>;
  cwd?: string;
  env: NodeJS.ProcessEnv;
  /** Everything written to standard input */
  stdin: string;
  stdinBytes: Uint8Array;
}

export interface FakeGitResponse {
  stdout?: string | Uint8Array;
  stderr?: string;
  exitCode?: number;
}

export type FakeGitHandler = (call: FakeGitCall) => Promise<FakeGitResponse>;

class FakeGitProcess implements GitChildProcess {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly exited: Promise<GitExit>;
  killed = false;
  private resolveExit: (exit: GitExit) => void = () => {};
  private done = false;

  constructor() {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  kill(): void {
    this.killed = true;
    this.stdin.destroy();
    this.finish({}, { code: null, signal: "SIGTERM" });
  }

  finish(response: FakeGitResponse, exit: GitExit): void {
    if (this.done) return;
    this.done = true;
    // A consumer that stopped early has already destroyed stdout.
    if (!this.stdout.destroyed) this.stdout.end(response.stdout ?? "");
    if (!this.stderr.destroyed) this.stderr.end(response.stderr ?? "");
    this.resolveExit(exit);
  }
}

async function readInput(stdin: PassThrough): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stdin) {
    chunks.push(chunk instanceof Uint8Array ? chunk : encodeString(String(chunk)));
  }
  return concatBytes(chunks);
}

function fatal(message: string, exitCode = 128): FakeGitResponse {
  return { stderr: `fatal: ${message}\n`, exitCode };
}

/**
 * A fake git executor backed by an in-memory object store.
 */
export class FakeGitExecutor implements GitExecutor {
  readonly calls: FakeGitCall[] = [];
  readonly processes: FakeGitProcess[] = [];
  private readonly handlers = new Map<string, FakeGitHandler>();

  constructor(
    readonly store: MemoryObjectStore = new MemoryObjectStore(),
    /** Directory reported as the top of the working tree */
    readonly root = "/repo",
  ) {}

  /**
   * Replace the handler of a git command (its first argument).
   */
  on(command: string, handler: FakeGitHandler): this {
    this.handlers.set(command, handler);
    return this;
  }

  /**
   * Make a command run until it is killed.
   */
  hang(command: string): this {
    return this.on(command, () => new Promise<FakeGitResponse>(() => {}));
  }

  spawn(args: string[], options: GitSpawnOptions): GitChildProcess {
    const proc = new FakeGitProcess();
    this.processes.push(proc);
    this.execute(proc, args, options).catch((error: unknown) => {
      proc.finish(fatal(error instanceof Error ? error.message : String(error)), {
        code: 128,
        signal: null,
      });
    });
    return proc;
  }

  private async execute(
    proc: FakeGitProcess,
    argv: string[],
    options: GitSpawnOptions,
  ): Promise<void> {
    const config: Record<string, string> = {};
    let i = 0;
    for (; argv[i] === "-c"; i += 2) {
      const setting = argv[i + 1] ?? "";
      const eq = setting.indexOf("=");
      config[setting.slice(0, eq)] = setting.slice(eq + 1);
    }
    const args = argv.slice(i);

    const stdinBytes = proc.killed ? new Uint8Array(0) : await readInput(proc.stdin);
    const call: FakeGitCall = {
      args,
      config,
      cwd: options.cwd,
      env: options.env,
      stdin: decodeString(stdinBytes),
      stdinBytes,
    };
    this.calls.push(call);

    const handler = this.handlers.get(args[0] ?? "") ?? ((c: FakeGitCall) => this.runCommand(c));
    const response = await handler(call);
    proc.finish(response, { code: response.exitCode ?? 0, signal: null });
  }

  private async runCommand(call: FakeGitCall): Promise<FakeGitResponse> {
    const [command, ...rest] = call.args;
    try {
      switch (command) {
        case "hash-object":
          return { stdout: `${await this.store.writeBlob(call.stdinBytes)}\n` };
        case "cat-file":
          return await this.catFile(rest);
        case "ls-tree":
          return await this.lsTree(rest);
        case "mktree":
          return await this.mktree(call.stdinBytes);
        case "rev-parse":
          return await this.revParse(rest);
        case "merge-tree":
          return await this.mergeTree(call);
        case "init":
          return { stdout: `Initialized empty Git repository in ${call.cwd ?? this.root}/.git/\n` };
        default:
          return {
            stderr: `git: '${command ?? ""}' is not a git command. See 'git --help'.\n`,
            exitCode: 1,
          };
      }
    } catch (error) {
      if (error instanceof VcsError) {
        return fatal(error.message);
      }
      throw error;
    }
  }

  private async catFile([type, id = ""]: string[]): Promise<FakeGitResponse> {
    if (!this.store.has(id)) {
      return fatal(`Not a valid object name ${id}`);
    }
    if (type !== "blob" || this.store.typeOf(id) !== "blob") {
      return fatal(`git cat-file ${id}: bad file`);
    }
    return { stdout: await collect(this.store.readBlob(id)) };
  }

  private async lsTree(args: string[]): Promise<FakeGitResponse> {
    const id = args[args.length - 1] ?? "";
    try {
      const entries = await toArray(this.store.listTree(id, { recurse: args.includes("-r") }));
      return { stdout: entries.map((entry) => `${formatTreeRecord(entry)}\0`).join("") };
    } catch (error) {
      if (isObjectNotFound(error)) {
        return fatal(this.store.has(id) ? "not a tree object" : `Not a valid object name ${id}`);
      }
      throw error;
    }
  }

  private async mktree(input: Uint8Array): Promise<FakeGitResponse> {
    const records = await toArray(toTokens([input]));
    const { id } = await this.store.makeTree(records.map(parseTreeRecord));
    return { stdout: `${id}\n` };
  }

  private async revParse(args: string[]): Promise<FakeGitResponse> {
    if (args.includes("--show-toplevel")) {
      return { stdout: `${this.root}\n${this.root}/.git\n` };
    }
    const ref = args[args.length - 1] ?? "";
    try {
      return { stdout: `${await this.resolve(ref)}\n` };
    } catch (error) {
      if (isObjectNotFound(error)) {
        return { exitCode: 1 };
      }
      throw error;
    }
  }

  private async resolve(ref: string): Promise<string> {
    const peel = /^(.*)\^\{(tree|commit)\}$/.exec(ref);
    if (peel) {
      const [, name, type] = peel;
      if (type === "tree" && this.store.typeOf(name) === "tree") {
        return name;
      }
      throw new ObjectNotFoundError(ref);
    }
    const colon = ref.indexOf(":");
    if (colon >= 0) {
      return this.store.hashAt(ref.slice(0, colon), ref.slice(colon + 1));
    }
    if (!this.store.has(ref)) {
      throw new ObjectNotFoundError(ref);
    }
    return ref;
  }

  private async mergeTree(call: FakeGitCall): Promise<FakeGitResponse> {
    const line = call.stdin.replace(/\n$/, "");
    const [basePart, branches] = line.includes(" -- ") ? line.split(" -- ") : [undefined, line];
    const [branch1 = "", branch2 = ""] = branches.split(" ");
    const style = call.config["merge.conflictStyle"];
    const request: MergeTreeRequest = {
      branch1,
      branch2,
      mergeBase: basePart,
      conflictStyle: isConflictStyle(style) ? style : undefined,
    };
    const output = await mergeTrees(this.store, request);
    return { stdout: encodeMergeTreeOutput(output) };
  }
}

function isConflictStyle(value: string | undefined): value is ConflictStyle {
  return value === "merge" || value === "diff3" || value === "zdiff3";
}
