import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseCliFlags, runCli, type CliContext } from "./cli";
import { loadPipelineConfig } from "./config/pipeline";
import { initDatabase } from "./db/database";
import { finishRun, insertRun } from "./db/runs";
import { FakeCommandRunner, repoScenario, type CommandHandler, type RepoScenario } from "./test/fakes";

describe("parseCliFlags", () => {
  it("reads the flags", () => {
    expect(parseCliFlags(["--run", "--trigger=schedule"])).toEqual({
      run: true,
      daemon: false,
      test: false,
      trigger: "schedule",
      history: null,
    });
  });

  it("defaults the history limit", () => {
    expect(parseCliFlags(["--history=3"]).history).toBe(3);
    expect(parseCliFlags(["--history"]).history).toBe(10);
    expect(parseCliFlags(["--history=abc"]).history).toBe(10);
  });
});

describe("runCli", () => {
  let cwd: string;
  const config = loadPipelineConfig({});

  const contextFor = (handler: CommandHandler, openDatabase = vi.fn(() => initDatabase(":memory:"))) => {
    const runner = new FakeCommandRunner(handler);
    const context: CliContext = {
      config,
      runner,
      cwd,
      openDatabase,
      runtimeVersion: "20.11.1",
      interpreter: "node",
    };
    return { runner, context, openDatabase };
  };

  const scenario = (options: RepoScenario) => contextFor(repoScenario(options));

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "cli-"));
    writeFileSync(join(cwd, "package.json"), "{}\n");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("exits 0 when there is nothing to publish", async () => {
    const { runner, context } = scenario({ staged: false });

    await expect(runCli(["--run"], context)).resolves.toBe(0);
    expect(runner.gitCalls()).not.toContain("commit");
  });

  it("exits 0 after publishing", async () => {
    const { runner, context } = scenario({ staged: true });

    await expect(runCli(["--run", "--trigger=schedule"], context)).resolves.toBe(0);
    expect(runner.gitCalls()).toContain("push");
  });

  it("exits 1 when the push is rejected", async () => {
    const { context } = scenario({ staged: true, pushExit: 1 });

    await expect(runCli(["--run"], context)).resolves.toBe(1);
  });

  it("exits 1 when the task fails", async () => {
    const { runner, context } = scenario({ staged: true, taskExit: 2 });

    await expect(runCli(["--run"], context)).resolves.toBe(1);
    expect(runner.gitCalls()).toEqual([]);
  });

  it("exits 1 on an unknown trigger without running anything", async () => {
    const { runner, context, openDatabase } = scenario({});

    await expect(runCli(["--run", "--trigger=nightly"], context)).resolves.toBe(1);
    expect(runner.calls).toEqual([]);
    expect(openDatabase).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('Unknown trigger "nightly". Use one of: schedule, manual');
  });

  it("prints usage without flags", async () => {
    const { runner, context, openDatabase } = scenario({});

    await expect(runCli([], context)).resolves.toBe(0);
    expect(runner.calls).toEqual([]);
    expect(openDatabase).not.toHaveBeenCalled();
  });

  it("lists recorded runs", async () => {
    const { context } = contextFor(
      repoScenario(),
      vi.fn(() => {
        const db = initDatabase(":memory:");
        const id = insertRun(db, "schedule", new Date("2024-05-01T05:00:00Z"));
        finishRun(db, id, { status: "published", finishedAt: new Date("2024-05-01T05:02:00Z"), revision: "abc1234def" });
        return db;
      })
    );

    await expect(runCli(["--history=5"], context)).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith("  #1  2024-05-01T05:00:00.000Z  schedule  published   abc1234");
  });

  it("checks the git remote with --test", async () => {
    const { runner, context } = scenario({});

    await expect(runCli(["--test"], context)).resolves.toBe(0);
    expect(runner.calls.map((call) => call.args)).toEqual([["remote", "get-url", "origin"]]);
  });

  it("exits 1 when the remote is missing", async () => {
    const { context } = contextFor(() => ({ exitCode: 2, stderr: "error: No such remote 'origin'\n" }));

    await expect(runCli(["--test"], context)).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(`  ❌ Remote "origin" not configured: error: No such remote 'origin'`);
  });
});
