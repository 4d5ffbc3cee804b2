/**
 * Trigger dispatcher
 *
 * Decides when a run starts: when the wall clock matches the cron schedule
 * (evaluated in UTC), or when an operator asks for one. The trigger source
 * only labels the run.
 */

import cron, { type ScheduledTask } from "node-cron";
import { ConfigError } from "../config/pipeline";

export type TriggerSource = "schedule" | "manual";

export const TRIGGER_SOURCES: readonly TriggerSource[] = ["schedule", "manual"];

export const SCHEDULE_TIMEZONE = "Etc/UTC";

export function isTriggerSource(value: string): value is TriggerSource {
  return TRIGGER_SOURCES.some((source) => source === value);
}

export function validateSchedule(expression: string): string {
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid cron schedule "${expression}"`);
  }
  return expression;
}

export type TriggerHandler = (trigger: TriggerSource) => Promise<void>;

/**
 * In-process dispatcher. One run at a time: a firing that arrives while a
 * run is active is skipped.
 */
export class TriggerDispatcher {
  private task: ScheduledTask | null = null;
  private active = false;
  readonly schedule: string;

  constructor(
    schedule: string,
    private readonly handler: TriggerHandler
  ) {
    this.schedule = validateSchedule(schedule);
  }

  get isRunning(): boolean {
    return this.active;
  }

  get isScheduled(): boolean {
    return this.task !== null;
  }

  start(): void {
    this.stop();
    this.task = cron.schedule(
      this.schedule,
      () => {
        this.dispatch("schedule").catch((error: unknown) => {
          console.error("❌ Scheduled run failed:", error);
        });
      },
      { scheduled: true, timezone: SCHEDULE_TIMEZONE }
    );
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  /**
   * Start a run now. Resolves false when skipped because a run is active;
   * rejects with the run's error.
   */
  async dispatch(trigger: TriggerSource): Promise<boolean> {
    if (this.active) {
      console.warn(`⚠️ ${trigger} trigger ignored: a run is already in progress`);
      return false;
    }
    this.active = true;
    try {
      await this.handler(trigger);
      return true;
    } finally {
      this.active = false;
    }
  }
}
