/**
 * Change publisher
 *
 * Stages the output directory and, when anything changed, records one
 * commit under the bot identity and pushes it. A rejected push is fatal;
 * there is no retry or rebase.
 */

import type { CommitIdentity } from "../config/pipeline";
import type { CommandResult, ICommandRunner } from "../interfaces/ICommandRunner";
import { describeError, PublishError } from "./errors";

export interface PublishOptions {
  cwd: string;
  outputDir: string;
  identity: CommitIdentity;
  message: string;
  remote: string;
  branch: string;
}

export type PublishResult = { status: "no-changes" } | { status: "published"; revision: string };

async function git(runner: ICommandRunner, cwd: string, args: string[]): Promise<CommandResult> {
  try {
    return await runner.run("git", args, { cwd });
  } catch (error) {
    throw new PublishError(`Could not run git ${args[0]}: ${describeError(error)}`, "", { cause: error });
  }
}

async function gitOrFail(runner: ICommandRunner, cwd: string, args: string[], action: string): Promise<CommandResult> {
  const result = await git(runner, cwd, args);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || result.stdout.trim();
    throw new PublishError(`${action} failed (exit ${result.exitCode})${detail ? `: ${detail}` : ""}`, result.stderr);
  }
  return result;
}

/**
 * Identity flags scoped to a single git invocation
 */
export function identityArgs(identity: CommitIdentity): string[] {
  return ["-c", `user.name=${identity.name}`, "-c", `user.email=${identity.email}`];
}

export async function publishChanges(runner: ICommandRunner, options: PublishOptions): Promise<PublishResult> {
  const { cwd, outputDir, identity, message, remote, branch } = options;

  const remotes = await git(runner, cwd, ["remote", "-v"]);
  console.log(`  Remote: ${remotes.stdout.trim().split("\n")[0] || "(none)"}`);
  console.log(`  Author: ${identity.name} <${identity.email}>`);

  await gitOrFail(runner, cwd, ["add", "--", outputDir], `Staging ${outputDir}`);

  // --quiet exits 1 when the index differs from HEAD
  const diff = await git(runner, cwd, ["diff", "--cached", "--quiet"]);
  if (diff.exitCode === 0) {
    console.log("  No changes to commit");
    return { status: "no-changes" };
  }
  if (diff.exitCode !== 1) {
    throw new PublishError(`Checking staged changes failed (exit ${diff.exitCode}): ${diff.stderr.trim()}`, diff.stderr);
  }

  await gitOrFail(runner, cwd, [...identityArgs(identity), "commit", "-m", message], "Commit");
  const head = await gitOrFail(runner, cwd, ["rev-parse", "HEAD"], "Resolving HEAD");
  const revision = head.stdout.trim();
  console.log(`  ✓ Committed ${revision.slice(0, 7)}`);

  await gitOrFail(runner, cwd, ["push", remote, `HEAD:${branch}`], `Push to ${remote}/${branch}`);
  console.log(`  ✓ Pushed to ${remote}/${branch}`);

  return { status: "published", revision };
}
