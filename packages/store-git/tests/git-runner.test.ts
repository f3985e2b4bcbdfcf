import { PassThrough } from "node:stream";

import { OperationCanceledError, StoreIOError } from "@treesmith/core";
import { collect, decodeString } from "@treesmith/utils";
import { describe, expect, it, vi } from "vitest";

import { type GitExecutor, GitRunner, type GitRunnerOptions } from "../src/index.js";
import { FakeGitExecutor } from "./helpers/fake-git.js";

function createRunner(
  executor: GitExecutor,
  options: Partial<GitRunnerOptions> = {},
): GitRunner {
  return new GitRunner({ executor, cwd: "/repo", env: { HOME: "/home/test" }, ...options });
}

describe("GitRunner", () => {
  describe("command line", () => {
    it("prefixes repository and call settings as -c options", async () => {
      const fake = new FakeGitExecutor();
      const runner = createRunner(fake, { config: { "core.quotePath": "false" } });

      await runner.run(["rev-parse", "--show-toplevel", "--absolute-git-dir"], {
        config: { "merge.conflictStyle": "diff3" },
      });

      expect(fake.calls).toHaveLength(1);
      expect(fake.calls[0].args).toEqual(["rev-parse", "--show-toplevel", "--absolute-git-dir"]);
      expect(fake.calls[0].config).toEqual({
        "core.quotePath": "false",
        "merge.conflictStyle": "diff3",
      });
    });

    it("runs in the configured directory and environment", async () => {
      const fake = new FakeGitExecutor();
      const runner = createRunner(fake, { cwd: "/work", env: { GIT_AUTHOR_NAME: "Test" } });

      await runner.run(["init"]);

      expect(fake.calls[0].cwd).toBe("/work");
      expect(fake.calls[0].env).toEqual({ GIT_AUTHOR_NAME: "Test" });
    });

    it("logs the command and its stderr at debug level", async () => {
      const fake = new FakeGitExecutor().on("status", async () => ({
        stderr: "warning: something odd\n",
      }));
      const debug = vi.fn();
      const runner = createRunner(fake, { config: { "a.b": "c" }, logger: { debug } });

      await runner.run(["status"]);

      expect(debug).toHaveBeenCalledWith("git -c a.b=c status");
      expect(debug).toHaveBeenCalledWith("git stderr: warning: something odd");
    });
  });

  describe("run", () => {
    it("writes the input and collects the output", async () => {
      const fake = new FakeGitExecutor().on("cat", async (call) => ({ stdout: call.stdin }));
      const runner = createRunner(fake);

      const result = await runner.run(["cat"], { input: "some input\n" });

      expect(result.exitCode).toBe(0);
      expect(decodeString(result.stdout)).toBe("some input\n");
      expect(result.stderr).toBe("");
    });

    it("feeds large input without blocking", async () => {
      const fake = new FakeGitExecutor();
      const runner = createRunner(fake);
      const content = "x".repeat(1024 * 1024);

      const id = await runner.output(["hash-object", "-w", "--stdin", "-t", "blob"], {
        input: content,
      });

      expect(id).toBe(await fake.store.writeBlob(content));
      expect(fake.calls[0].stdinBytes).toHaveLength(content.length);
    });

    it("returns a failed exit code with trimmed stderr", async () => {
      const fake = new FakeGitExecutor();
      const runner = createRunner(fake);

      const result = await runner.run(["frobnicate"]);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toBe("git: 'frobnicate' is not a git command. See 'git --help'.");
    });

    it("reports a git binary that cannot be started", async () => {
      const executor: GitExecutor = {
        spawn: () => {
          const stdout = new PassThrough();
          const stderr = new PassThrough();
          stdout.end();
          stderr.end();
          return {
            stdin: new PassThrough(),
            stdout,
            stderr,
            exited: Promise.resolve({ code: null, signal: null, error: new Error("spawn git ENOENT") }),
            kill: () => {},
          };
        },
      };

      const error = await createRunner(executor).run(["status"]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreIOError);
      expect(error).toMatchObject({ message: "Cannot run git status: spawn git ENOENT" });
    });

    it("kills the process when the signal fires", async () => {
      const fake = new FakeGitExecutor().hang("cat-file");
      const runner = createRunner(fake);
      const controller = new AbortController();

      const pending = runner.run(["cat-file", "blob", "HEAD"], { signal: controller.signal });
      await vi.waitFor(() => expect(fake.calls).toHaveLength(1));
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(OperationCanceledError);
      expect(fake.processes[0].killed).toBe(true);
    });

    it("does not start a process for an aborted signal", async () => {
      const fake = new FakeGitExecutor();
      const controller = new AbortController();
      controller.abort();

      await expect(
        createRunner(fake).run(["status"], { signal: controller.signal }),
      ).rejects.toBeInstanceOf(OperationCanceledError);
      expect(fake.processes).toHaveLength(0);
    });
  });

  describe("output", () => {
    it("removes one trailing newline", async () => {
      const fake = new FakeGitExecutor().on("echo", async () => ({ stdout: "a\nb\n\n" }));
      expect(await createRunner(fake).output(["echo"])).toBe("a\nb\n");
    });

    it("throws StoreIOError with the exit code and stderr", async () => {
      const fake = new FakeGitExecutor().on("mktree", async () => ({
        stderr: "fatal: input format error\n",
        exitCode: 128,
      }));

      const error = await createRunner(fake)
        .output(["mktree", "-z"])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreIOError);
      expect(error).toMatchObject({
        command: "git mktree",
        exitCode: 128,
        stderr: "fatal: input format error",
        message: "git mktree exited with code 128\nstderr:\nfatal: input format error",
      });
    });

    it("accepts additional success exit codes", async () => {
      const fake = new FakeGitExecutor().on("diff", async () => ({ stdout: "changed\n", exitCode: 1 }));
      expect(await createRunner(fake).output(["diff"], { okExitCodes: [0, 1] })).toBe("changed");
    });
  });

  describe("stream", () => {
    it("streams the output", async () => {
      const fake = new FakeGitExecutor().on("show", async () => ({ stdout: "streamed\n" }));
      const output = await collect(createRunner(fake).stream(["show"]));
      expect(decodeString(output)).toBe("streamed\n");
    });

    it("fails after the output when the exit code is not zero", async () => {
      const fake = new FakeGitExecutor().on("show", async () => ({
        stdout: "partial",
        stderr: "fatal: broken\n",
        exitCode: 128,
      }));
      const chunks: string[] = [];

      const consume = async (): Promise<void> => {
        for await (const chunk of createRunner(fake).stream(["show"])) {
          chunks.push(decodeString(chunk));
        }
      };

      await expect(consume()).rejects.toBeInstanceOf(StoreIOError);
      expect(chunks.join("")).toBe("partial");
    });

    it("kills the process when the consumer stops early", async () => {
      const fake = new FakeGitExecutor().on("log", async () => ({ stdout: "first\0second\0" }));

      for await (const chunk of createRunner(fake).stream(["log"])) {
        expect(chunk.length).toBeGreaterThan(0);
        break;
      }

      expect(fake.processes).toHaveLength(1);
      await expect(fake.processes[0].exited).resolves.toBeDefined();
    });

    it("stops with OperationCanceledError when the signal fires", async () => {
      const fake = new FakeGitExecutor().hang("ls-tree");
      const controller = new AbortController();
      const pending = collect(
        createRunner(fake).stream(["ls-tree", "HEAD"], { signal: controller.signal }),
      );

      await vi.waitFor(() => expect(fake.calls).toHaveLength(1));
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(OperationCanceledError);
      expect(fake.processes[0].killed).toBe(true);
    });
  });
});
