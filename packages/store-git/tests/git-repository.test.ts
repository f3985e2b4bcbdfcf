import { ProtocolError, StoreIOError } from "@treesmith/core";
import { describe, expect, it } from "vitest";

import { initGitRepository, openGitRepository } from "../src/index.js";
import { FakeGitExecutor } from "./helpers/fake-git.js";

describe("openGitRepository", () => {
  it("reads the top-level and git directories", async () => {
    const fake = new FakeGitExecutor(undefined, "/work/project");

    const repository = await openGitRepository("/work/project/src", { executor: fake });

    expect(repository.root).toBe("/work/project");
    expect(repository.gitDir).toBe("/work/project/.git");
    expect(fake.calls[0].cwd).toBe("/work/project/src");
    expect(fake.calls[0].args).toEqual(["rev-parse", "--show-toplevel", "--absolute-git-dir"]);
  });

  it("runs later commands in the top-level directory", async () => {
    const fake = new FakeGitExecutor(undefined, "/work/project");
    const repository = await openGitRepository("/work/project/src", { executor: fake });

    await repository.objects.writeBlob("content\n");

    expect(fake.calls[1].cwd).toBe("/work/project");
  });

  it("adds variables to the inherited environment", async () => {
    const fake = new FakeGitExecutor();

    await openGitRepository("/repo", { executor: fake, env: { GIT_TEST_MARKER: "1" } });

    expect(fake.calls[0].env.GIT_TEST_MARKER).toBe("1");
    expect(fake.calls[0].env.PATH).toBe(process.env.PATH);
  });

  it("passes repository settings to every command", async () => {
    const fake = new FakeGitExecutor();
    const repository = await openGitRepository("/repo", {
      executor: fake,
      config: { "core.quotePath": "false" },
    });

    await repository.objects.writeBlob("content\n");

    expect(fake.calls.map((call) => call.config)).toEqual([
      { "core.quotePath": "false" },
      { "core.quotePath": "false" },
    ]);
  });

  it("rejects unexpected rev-parse output", async () => {
    const fake = new FakeGitExecutor().on("rev-parse", async () => ({ stdout: "/repo\n" }));

    await expect(openGitRepository("/repo", { executor: fake })).rejects.toBeInstanceOf(
      ProtocolError,
    );
  });

  it("fails outside a working tree", async () => {
    const fake = new FakeGitExecutor().on("rev-parse", async () => ({
      stderr: "fatal: not a git repository (or any of the parent directories): .git\n",
      exitCode: 128,
    }));

    const error = await openGitRepository("/tmp", { executor: fake }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreIOError);
    expect(error).toMatchObject({ command: "git rev-parse", exitCode: 128 });
  });
});

describe("initGitRepository", () => {
  it("creates the repository on the main branch by default", async () => {
    const fake = new FakeGitExecutor(undefined, "/new");

    const repository = await initGitRepository("/new", { executor: fake });

    expect(fake.calls[0].args).toEqual(["init", "--initial-branch=main"]);
    expect(fake.calls[0].cwd).toBe("/new");
    expect(repository.root).toBe("/new");
  });

  it("uses the requested initial branch", async () => {
    const fake = new FakeGitExecutor(undefined, "/new");

    await initGitRepository("/new", { executor: fake, branch: "trunk" });

    expect(fake.calls[0].args).toEqual(["init", "--initial-branch=trunk"]);
  });
});
