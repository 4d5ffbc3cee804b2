import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { initDatabase, type Database } from "./database";
import { finishRun, getRecentRuns, insertRun } from "./runs";

describe("run ledger", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = initDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("records runs and lists the newest first", () => {
    const first = insertRun(db, "schedule", new Date("2024-05-01T05:00:00Z"));
    finishRun(db, first, {
      status: "published",
      finishedAt: new Date("2024-05-01T05:02:00Z"),
      revision: "abc1234",
    });
    const second = insertRun(db, "manual", new Date("2024-05-02T09:00:00Z"));
    finishRun(db, second, {
      status: "failed",
      finishedAt: new Date("2024-05-02T09:01:00Z"),
      failedStep: "execute",
      error: "Task src/scripts/fetch-prices.ts exited with code 1",
    });
    insertRun(db, "schedule", new Date("2024-05-03T05:00:00Z"));

    const runs = getRecentRuns(db, 2);

    expect(runs).toEqual([
      {
        id: 3,
        trigger: "schedule",
        status: "running",
        startedAt: "2024-05-03T05:00:00.000Z",
        finishedAt: null,
        failedStep: null,
        error: null,
        revision: null,
      },
      {
        id: 2,
        trigger: "manual",
        status: "failed",
        startedAt: "2024-05-02T09:00:00.000Z",
        finishedAt: "2024-05-02T09:01:00.000Z",
        failedStep: "execute",
        error: "Task src/scripts/fetch-prices.ts exited with code 1",
        revision: null,
      },
    ]);
    expect(getRecentRuns(db)).toHaveLength(3);
  });
});
