import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "../config/pipeline";
import { isTriggerSource, TriggerDispatcher, validateSchedule, type TriggerSource } from "./trigger";

describe("validateSchedule", () => {
  it("accepts cron expressions", () => {
    expect(validateSchedule("0 5 * * *")).toBe("0 5 * * *");
    expect(validateSchedule("*/15 * * * *")).toBe("*/15 * * * *");
  });

  it("rejects invalid expressions", () => {
    expect(() => validateSchedule("0 24 * * *")).toThrow(ConfigError);
    expect(() => validateSchedule("every morning")).toThrow('Invalid cron schedule "every morning"');
  });
});

describe("isTriggerSource", () => {
  it("knows both sources", () => {
    expect(isTriggerSource("schedule")).toBe(true);
    expect(isTriggerSource("manual")).toBe(true);
    expect(isTriggerSource("nightly")).toBe(false);
  });
});

describe("TriggerDispatcher", () => {
  const dispatchers: TriggerDispatcher[] = [];
  const create = (handler: (trigger: TriggerSource) => Promise<void>) => {
    const dispatcher = new TriggerDispatcher("0 5 * * *", handler);
    dispatchers.push(dispatcher);
    return dispatcher;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-03-10T04:00:00Z"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    for (const dispatcher of dispatchers.splice(0)) {
      dispatcher.stop();
    }
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("rejects an invalid schedule", () => {
    expect(() => new TriggerDispatcher("61 5 * * *", async () => {})).toThrow(ConfigError);
  });

  it("fires once when the wall clock reaches the slot", async () => {
    vi.setSystemTime(new Date("2024-03-10T04:59:58Z"));
    const handler = vi.fn(async (_trigger: TriggerSource) => {});
    create(handler).start();

    await vi.advanceTimersByTimeAsync(1000);
    expect(handler).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(2000);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith("schedule");

    await vi.advanceTimersByTimeAsync(60_000);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("follows the wall clock when it jumps forward", async () => {
    const handler = vi.fn(async (_trigger: TriggerSource) => {});
    create(handler).start();

    vi.setSystemTime(new Date("2024-03-10T04:59:59Z"));
    await vi.advanceTimersByTimeAsync(1000);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("does not fire after stop", async () => {
    vi.setSystemTime(new Date("2024-03-10T04:59:58Z"));
    const handler = vi.fn(async (_trigger: TriggerSource) => {});
    const dispatcher = create(handler);
    dispatcher.start();
    dispatcher.stop();

    await vi.advanceTimersByTimeAsync(5000);
    expect(handler).not.toHaveBeenCalled();
    expect(dispatcher.isScheduled).toBe(false);
  });

  it("runs the same handler for manual dispatch", async () => {
    const handler = vi.fn(async (_trigger: TriggerSource) => {});
    const dispatcher = create(handler);

    await expect(dispatcher.dispatch("manual")).resolves.toBe(true);
    expect(handler).toHaveBeenCalledWith("manual");
  });

  it("skips a trigger while a run is active", async () => {
    let release: () => void = () => {};
    const handler = vi.fn(
      (_trigger: TriggerSource) =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const dispatcher = create(handler);

    const first = dispatcher.dispatch("manual");
    expect(dispatcher.isRunning).toBe(true);
    await expect(dispatcher.dispatch("schedule")).resolves.toBe(false);
    expect(console.warn).toHaveBeenCalledWith("⚠️ schedule trigger ignored: a run is already in progress");

    release();
    await expect(first).resolves.toBe(true);
    expect(dispatcher.isRunning).toBe(false);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("stays scheduled after a failed run", async () => {
    vi.setSystemTime(new Date("2024-03-10T04:59:59Z"));
    const handler = vi.fn(async (_trigger: TriggerSource) => {
      throw new Error("boom");
    });
    const dispatcher = create(handler);
    dispatcher.start();

    await vi.advanceTimersByTimeAsync(1000);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith("❌ Scheduled run failed:", expect.any(Error));
    expect(dispatcher.isScheduled).toBe(true);
  });
});
