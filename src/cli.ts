/**
 * Pipeline command line
 *
 * Flag handling for index.ts. Returns the process exit code: 0 when the run
 * published or found nothing to publish, 1 otherwise.
 */

import type { PipelineConfig } from "./config/pipeline";
import type { Database } from "./db/database";
import { getRecentRuns } from "./db/runs";
import type { ICommandRunner } from "./interfaces/ICommandRunner";
import { runPipeline, type PipelineContext } from "./pipeline/runner";
import {
  isTriggerSource,
  SCHEDULE_TIMEZONE,
  TRIGGER_SOURCES,
  TriggerDispatcher,
  validateSchedule,
  type TriggerSource,
} from "./pipeline/trigger";

export interface CliFlags {
  run: boolean;
  daemon: boolean;
  test: boolean;
  trigger: string | undefined;
  // null without --history
  history: number | null;
}

export function parseCliFlags(args: readonly string[]): CliFlags {
  const historyArg = args.find((arg) => arg === "--history" || arg.startsWith("--history="));
  let history: number | null = null;
  if (historyArg) {
    const limit = historyArg.includes("=") ? Number.parseInt(historyArg.split("=")[1] ?? "", 10) : 10;
    history = Number.isFinite(limit) && limit > 0 ? limit : 10;
  }

  return {
    run: args.includes("--run"),
    daemon: args.includes("--daemon"),
    test: args.includes("--test"),
    trigger: args.find((arg) => arg.startsWith("--trigger="))?.split("=")[1],
    history,
  };
}

export interface CliContext {
  config: PipelineConfig;
  runner: ICommandRunner;
  cwd: string;
  openDatabase: (path: string) => Database.Database;
  runtimeVersion?: string;
  interpreter?: string;
}

/**
 * Handle --history: print the run ledger
 */
function showHistory(db: Database.Database, limit: number): void {
  const runs = getRecentRuns(db, limit);
  if (runs.length === 0) {
    console.log("No runs recorded.");
    return;
  }
  for (const run of runs) {
    const detail =
      run.status === "failed"
        ? `${run.failedStep ?? "?"}: ${run.error ?? ""}`
        : run.revision
          ? run.revision.slice(0, 7)
          : "";
    console.log(`  #${run.id}  ${run.startedAt}  ${run.trigger.padEnd(8)}  ${run.status.padEnd(10)}  ${detail}`);
  }
}

/**
 * Handle --test: check git and the configuration without running anything
 */
async function testSetup(context: CliContext): Promise<boolean> {
  const { config, runner, cwd } = context;
  validateSchedule(config.schedule);
  console.log(`  Schedule: ${config.schedule} (${SCHEDULE_TIMEZONE})`);
  console.log(`  Node.js: ${process.versions.node} (required ${config.nodeVersion})`);

  const remote = await runner.run("git", ["remote", "get-url", config.remote], { cwd });
  if (remote.exitCode !== 0) {
    console.error(`  ❌ Remote "${config.remote}" not configured: ${remote.stderr.trim()}`);
    return false;
  }
  console.log(`  ✓ ${config.remote} → ${remote.stdout.trim()} (branch ${config.branch})`);
  return true;
}

/**
 * Handle --daemon: fire on the schedule until stopped
 */
function startDaemon(config: PipelineConfig, run: (trigger: TriggerSource) => Promise<void>): void {
  const dispatcher = new TriggerDispatcher(config.schedule, run);
  dispatcher.start();
  console.log(`Scheduler started: "${dispatcher.schedule}" (${SCHEDULE_TIMEZONE})`);

  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, stopping scheduler`);
    dispatcher.stop();
    if (!dispatcher.isRunning) {
      process.exit(0);
    }
    console.log("Waiting for the active run to finish...");
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

function showUsageHelp(): void {
  console.log("\n=== Usage ===");
  console.log("  npm run pipeline -- [options]");
  console.log("\nOptions:");
  console.log("  --run                  Run the pipeline once (manual dispatch)");
  console.log("  --trigger=<source>     Label the run: schedule | manual (default: manual)");
  console.log("  --daemon               Stay running and fire on the schedule");
  console.log("  --history[=<n>]        Show the last n recorded runs (default: 10)");
  console.log("  --test                 Check configuration and git remote only");
  console.log("\nExamples:");
  console.log("  npm run pipeline -- --run");
  console.log("  npm run pipeline -- --run --trigger=schedule");
  console.log("  npm run pipeline -- --daemon");
}

export async function runCli(args: readonly string[], context: CliContext): Promise<number> {
  const flags = parseCliFlags(args);
  const { config } = context;

  if (flags.test) {
    const ok = await testSetup(context);
    if (!ok) {
      return 1;
    }
    console.log("\nSetup check successful!");
    return 0;
  }

  let trigger: TriggerSource = "manual";
  if (flags.trigger !== undefined) {
    if (!isTriggerSource(flags.trigger)) {
      console.error(`Unknown trigger "${flags.trigger}". Use one of: ${TRIGGER_SOURCES.join(", ")}`);
      return 1;
    }
    trigger = flags.trigger;
  }

  if (!flags.run && !flags.daemon && flags.history === null) {
    showUsageHelp();
    return 0;
  }

  const db = context.openDatabase(config.dbPath);
  const pipelineContext: PipelineContext = {
    config,
    runner: context.runner,
    cwd: context.cwd,
    db,
    runtimeVersion: context.runtimeVersion,
    interpreter: context.interpreter,
  };

  if (flags.history !== null) {
    showHistory(db, flags.history);
    db.close();
    return 0;
  }

  if (flags.daemon) {
    startDaemon(config, async (source) => {
      await runPipeline(source, pipelineContext);
    });
    return 0;
  }

  try {
    await runPipeline(trigger, pipelineContext);
    return 0;
  } catch {
    // runPipeline has logged and recorded the failure
    return 1;
  } finally {
    db.close();
  }
}
