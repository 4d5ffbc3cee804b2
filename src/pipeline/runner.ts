/**
 * Run orchestration: provision → install → execute → publish.
 * The first failure ends the run.
 */

import type { PipelineConfig } from "../config/pipeline";
import type { Database } from "../db/database";
import { finishRun, insertRun } from "../db/runs";
import type { ICommandRunner } from "../interfaces/ICommandRunner";
import { describeError, PipelineError, type StepName } from "./errors";
import { executeTask } from "./executor";
import { installDependencies, provisionEnvironment } from "./provision";
import { publishChanges } from "./publisher";
import type { TriggerSource } from "./trigger";

export interface PipelineContext {
  config: PipelineConfig;
  runner: ICommandRunner;
  cwd: string;
  // run ledger; runs are not recorded without one
  db?: Database.Database | null;
  now?: () => Date;
  runtimeVersion?: string;
  interpreter?: string;
}

export interface StepReport {
  step: StepName;
  durationMs: number;
}

export interface RunReport {
  runId: number | null;
  trigger: TriggerSource;
  status: "published" | "no-changes";
  revision: string | null;
  steps: StepReport[];
  startedAt: Date;
  finishedAt: Date;
}

export async function runPipeline(trigger: TriggerSource, context: PipelineContext): Promise<RunReport> {
  const { config, runner, cwd } = context;
  const now = context.now ?? (() => new Date());
  const db = context.db ?? null;
  const startedAt = now();
  const runId = db ? insertRun(db, trigger, startedAt) : null;
  const steps: StepReport[] = [];

  console.log(`\n🚀 Pipeline run${runId !== null ? ` #${runId}` : ""} (${trigger} trigger)`);

  let current: StepName = "provision";
  const step = async <T>(name: StepName, fn: () => Promise<T> | T): Promise<T> => {
    current = name;
    console.log(`\n▶ ${name}`);
    const began = Date.now();
    const result = await fn();
    steps.push({ step: name, durationMs: Date.now() - began });
    return result;
  };

  try {
    await step("provision", () =>
      provisionEnvironment({
        cwd,
        nodeVersion: config.nodeVersion,
        manifestPath: config.manifestPath,
        runtimeVersion: context.runtimeVersion,
      })
    );
    await step("install", () => installDependencies(runner, cwd, config.installCommand));
    await step("execute", () =>
      executeTask(runner, { cwd, script: config.taskScript, interpreter: context.interpreter })
    );
    const published = await step("publish", () =>
      publishChanges(runner, {
        cwd,
        outputDir: config.outputDir,
        identity: config.identity,
        message: config.commitMessage,
        remote: config.remote,
        branch: config.branch,
      })
    );

    const finishedAt = now();
    const revision = published.status === "published" ? published.revision : null;
    if (db && runId !== null) {
      finishRun(db, runId, { status: published.status, finishedAt, revision: revision ?? undefined });
    }

    console.log(
      published.status === "published"
        ? `\n✅ Run complete: published ${published.revision.slice(0, 7)}\n`
        : `\n✅ Run complete: nothing to publish\n`
    );

    return { runId, trigger, status: published.status, revision, steps, startedAt, finishedAt };
  } catch (error) {
    const failedStep = error instanceof PipelineError ? error.step : current;
    if (db && runId !== null) {
      finishRun(db, runId, { status: "failed", finishedAt: now(), failedStep, error: describeError(error) });
    }
    console.error(`\n❌ Run failed at ${failedStep}: ${describeError(error)}\n`);
    throw error;
  }
}
