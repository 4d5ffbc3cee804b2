import { beforeEach, describe, expect, it, vi } from "vitest";
import { COMMIT_IDENTITY, COMMIT_MESSAGE } from "../config/pipeline";
import { FakeCommandRunner, repoScenario } from "../test/fakes";
import { PublishError } from "./errors";
import { identityArgs, publishChanges, type PublishOptions } from "./publisher";

const options: PublishOptions = {
  cwd: "/repo",
  outputDir: "output",
  identity: COMMIT_IDENTITY,
  message: COMMIT_MESSAGE,
  remote: "origin",
  branch: "main",
};

describe("publishChanges", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("stops after the diff check when nothing is staged", async () => {
    const runner = new FakeCommandRunner(repoScenario({ staged: false }));

    await expect(publishChanges(runner, options)).resolves.toEqual({ status: "no-changes" });
    expect(runner.gitCalls()).toEqual(["remote", "add", "diff"]);
    expect(runner.calls[1]?.args).toEqual(["add", "--", "output"]);
    expect(runner.calls[2]?.args).toEqual(["diff", "--cached", "--quiet"]);
    expect(console.log).toHaveBeenCalledWith("  No changes to commit");
  });

  it("commits with the bot identity and pushes HEAD to main", async () => {
    const runner = new FakeCommandRunner(repoScenario({ staged: true, revision: "abc1234def" }));

    await expect(publishChanges(runner, options)).resolves.toEqual({ status: "published", revision: "abc1234def" });
    expect(runner.gitCalls()).toEqual(["remote", "add", "diff", "commit", "rev-parse", "push"]);

    const commit = runner.calls.find((call) => call.args.includes("commit"));
    expect(commit?.args).toEqual([
      "-c",
      "user.name=github-actions",
      "-c",
      "user.email=github-actions@github.com",
      "commit",
      "-m",
      "Update CSV and log [skip ci]",
    ]);
    expect(runner.calls.at(-1)?.args).toEqual(["push", "origin", "HEAD:main"]);
    expect(runner.calls.every((call) => call.options.cwd === "/repo")).toBe(true);
  });

  it("fails once on a rejected push without retrying", async () => {
    const runner = new FakeCommandRunner(repoScenario({ staged: true, pushExit: 1 }));

    const error = await publishChanges(runner, options).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PublishError);
    expect(error).toMatchObject({
      step: "publish",
      message: "Push to origin/main failed (exit 1): ! [rejected] HEAD -> main (fetch first)",
    });
    expect(runner.gitCalls().filter((name) => name === "push")).toHaveLength(1);
  });

  it("treats an unexpected diff exit code as a failure", async () => {
    const runner = new FakeCommandRunner((command, args) =>
      args[0] === "diff" ? { exitCode: 128, stderr: "fatal: not a git repository" } : undefined
    );

    await expect(publishChanges(runner, options)).rejects.toThrow(
      "Checking staged changes failed (exit 128): fatal: not a git repository"
    );
  });

  it("fails when the output directory cannot be staged", async () => {
    const runner = new FakeCommandRunner((command, args) =>
      args[0] === "add" ? { exitCode: 128, stderr: "fatal: pathspec 'output' did not match any files\n" } : undefined
    );

    await expect(publishChanges(runner, options)).rejects.toThrow(
      "Staging output failed (exit 128): fatal: pathspec 'output' did not match any files"
    );
    expect(runner.gitCalls()).toEqual(["remote", "add"]);
  });

  it("wraps a missing git binary", async () => {
    const runner = new FakeCommandRunner(() => new Error("spawn git ENOENT"));
    await expect(publishChanges(runner, options)).rejects.toThrow("Could not run git remote: spawn git ENOENT");
  });
});

describe("identityArgs", () => {
  it("scopes the identity to one invocation", () => {
    expect(identityArgs({ name: "bot", email: "bot@example.com" })).toEqual([
      "-c",
      "user.name=bot",
      "-c",
      "user.email=bot@example.com",
    ]);
  });
});
