/**
 * Run ledger: one row per pipeline run
 */

import type { Database } from "./database";
import type { StepName } from "../pipeline/errors";
import type { TriggerSource } from "../pipeline/trigger";

export type RunStatus = "running" | "published" | "no-changes" | "failed";

export interface PipelineRun {
  id: number;
  trigger: TriggerSource;
  status: RunStatus;
  startedAt: string;
  finishedAt: string | null;
  failedStep: StepName | null;
  error: string | null;
  revision: string | null;
}

interface PipelineRunRow {
  id: number;
  trigger: TriggerSource;
  status: RunStatus;
  started_at: string;
  finished_at: string | null;
  failed_step: StepName | null;
  error: string | null;
  revision: string | null;
}

export function insertRun(db: Database.Database, trigger: TriggerSource, startedAt: Date): number {
  const result = db
    .prepare("INSERT INTO pipeline_runs (trigger, status, started_at) VALUES (?, 'running', ?)")
    .run(trigger, startedAt.toISOString());
  return Number(result.lastInsertRowid);
}

export function finishRun(
  db: Database.Database,
  id: number,
  outcome: {
    status: Exclude<RunStatus, "running">;
    finishedAt: Date;
    failedStep?: StepName;
    error?: string;
    revision?: string;
  }
): void {
  db.prepare(`
    UPDATE pipeline_runs
    SET status = ?, finished_at = ?, failed_step = ?, error = ?, revision = ?
    WHERE id = ?
  `).run(
    outcome.status,
    outcome.finishedAt.toISOString(),
    outcome.failedStep ?? null,
    outcome.error ?? null,
    outcome.revision ?? null,
    id
  );
}

/**
 * Most recent runs first
 */
export function getRecentRuns(db: Database.Database, limit: number = 10): PipelineRun[] {
  const rows = db
    .prepare<[number], PipelineRunRow>("SELECT * FROM pipeline_runs ORDER BY id DESC LIMIT ?")
    .all(limit);

  return rows.map((row) => ({
    id: row.id,
    trigger: row.trigger,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    failedStep: row.failed_step,
    error: row.error,
    revision: row.revision,
  }));
}
