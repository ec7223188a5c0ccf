import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import fs from "fs";
import { AlreadyScheduled, InvalidTransition, NotFound } from "../../src/core/errors.js";
import { createEngineBus, type EngineBus } from "../../src/core/events.js";
import type { CycleTiming } from "../../src/evolution/cycle.js";
import { EvolutionScheduler, countMissed, describeCadence, nextAfter } from "../../src/evolution/scheduler.js";
import { FilesystemStore } from "../../src/store/storage.js";
import type { EvolutionCycle } from "../../src/store/types.js";
import { makeCycle, makeProject, tempDir } from "../helpers.js";

vi.mock("../../src/core/logger.js", () => ({
  log: { info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

const MIN = 60_000;
const T0 = new Date("2026-01-01T00:00:00.000Z").getTime();
const at = (ms: number) => new Date(T0 + ms).toISOString();

describe("EvolutionScheduler", () => {
  let testDir: string;
  let store: FilesystemStore;
  let bus: EngineBus;
  let timings: CycleTiming[];
  let runCycle: Mock<(projectId: string, timing: CycleTiming) => Promise<EvolutionCycle>>;
  let onStopped: Mock<(projectId: string) => void>;
  let scheduler: EvolutionScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    testDir = tempDir("scheduler");
    store = new FilesystemStore(testDir);
    store.saveProject(makeProject("p1", ["a"], { status: "completed" }));
    bus = createEngineBus();
    timings = [];
    runCycle = vi.fn(async (projectId: string, timing: CycleTiming) => {
      timings.push(timing);
      const cycle = makeCycle(projectId, timings.length);
      store.appendCycle(projectId, cycle);
      return cycle;
    });
    onStopped = vi.fn<(projectId: string) => void>();
    scheduler = new EvolutionScheduler({ store, bus, runCycle, onStopped });
  });

  afterEach(async () => {
    await scheduler.stopAll();
    vi.useRealTimers();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("runs exactly three cycles in three intervals, each one interval apart", async () => {
    scheduler.start("p1", { intervalMs: 30 * MIN });
    await vi.advanceTimersByTimeAsync(90 * MIN);

    expect(runCycle).toHaveBeenCalledTimes(3);
    expect(timings.map((t) => t.scheduledAt)).toEqual([at(30 * MIN), at(60 * MIN), at(90 * MIN)]);
    expect(timings.every((t) => !t.manual)).toBe(true);
    expect(store.loadCycles("p1").map((c) => c.sequence)).toEqual([1, 2, 3]);
  });

  it("persists an active schedule owned by this process", async () => {
    scheduler.start("p1", { intervalMs: 30 * MIN });
    expect(store.loadSchedule("p1")).toMatchObject({
      active: true,
      cadence: { intervalMs: 30 * MIN },
      startedAt: at(0),
      nextAt: at(30 * MIN),
      ownerPid: process.pid,
    });

    await vi.advanceTimersByTimeAsync(30 * MIN);
    expect(store.loadSchedule("p1")).toMatchObject({ nextAt: at(60 * MIN), lastCycleAt: at(30 * MIN) });
  });

  it("finishes the in-flight cycle before stopping", async () => {
    let finish: () => void = () => {};
    runCycle.mockImplementationOnce(async (projectId) => {
      await new Promise<void>((r) => { finish = r; });
      const cycle = makeCycle(projectId, 1);
      store.appendCycle(projectId, cycle);
      return cycle;
    });
    const cancel = scheduler.start("p1", { intervalMs: 30 * MIN });
    await vi.advanceTimersByTimeAsync(30 * MIN);
    expect(runCycle).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = cancel().then((result) => {
      stopped = true;
      return result;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finish();
    await expect(stopping).resolves.toBe(true);
    expect(store.loadCycles("p1")).toHaveLength(1);
    expect(store.loadSchedule("p1")?.active).toBe(false);
    expect(onStopped).toHaveBeenCalledWith("p1");

    await vi.advanceTimersByTimeAsync(60 * MIN);
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("refuses a second loop for the same project", () => {
    scheduler.start("p1", { intervalMs: MIN });
    expect(() => scheduler.start("p1", { intervalMs: MIN })).toThrow(AlreadyScheduled);
  });

  it("only starts for completed projects", () => {
    store.saveProject(makeProject("p2", ["a"], { status: "running" }));
    expect(() => scheduler.start("p2", { intervalMs: MIN })).toThrow(InvalidTransition);
    expect(() => scheduler.start("ghost", { intervalMs: MIN })).toThrow(NotFound);
    expect(scheduler.isScheduled("p2")).toBe(false);
  });

  it("stops before the next cycle when another process marks the schedule inactive", async () => {
    const stoppedEvents = vi.fn();
    bus.on("evolution:stopped", stoppedEvents);
    scheduler.start("p1", { intervalMs: 30 * MIN });

    const schedule = store.loadSchedule("p1");
    if (schedule) store.saveSchedule({ ...schedule, active: false });
    await vi.advanceTimersByTimeAsync(30 * MIN);

    expect(runCycle).not.toHaveBeenCalled();
    expect(scheduler.isScheduled("p1")).toBe(false);
    expect(onStopped).toHaveBeenCalledWith("p1");
    expect(stoppedEvents).toHaveBeenCalledWith({ projectId: "p1" });
  });

  it("logs cycles missed during a long cycle as skipped and resumes one step after now", async () => {
    const skipped = vi.fn();
    bus.on("evolution:skipped", skipped);
    runCycle.mockImplementationOnce(async (projectId, timing) => {
      timings.push(timing);
      await new Promise((r) => setTimeout(r, 25 * MIN));
      return makeCycle(projectId, 1);
    });

    scheduler.start("p1", { intervalMs: 10 * MIN });
    await vi.advanceTimersByTimeAsync(36 * MIN);
    expect(skipped).toHaveBeenCalledWith({ projectId: "p1", missed: 2 });
    expect(runCycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(9 * MIN);
    expect(runCycle).toHaveBeenCalledTimes(2);
    expect(timings[1]?.scheduledAt).toBe(at(45 * MIN));
  });

  it("resumes an active schedule from now without back-filling", async () => {
    const skipped = vi.fn();
    bus.on("evolution:skipped", skipped);
    store.saveSchedule({
      projectId: "p1",
      active: true,
      cadence: { intervalMs: 30 * MIN },
      startedAt: at(-120 * MIN),
      stoppedAt: null,
      nextAt: at(-65 * MIN),
      lastCycleAt: at(-95 * MIN),
      ownerPid: 1,
    });

    expect(scheduler.resume("p1")).not.toBeNull();
    expect(skipped).toHaveBeenCalledWith({ projectId: "p1", missed: 3 });
    expect(store.loadSchedule("p1")).toMatchObject({ ownerPid: process.pid, nextAt: at(30 * MIN), lastCycleAt: at(-95 * MIN) });

    await vi.advanceTimersByTimeAsync(29 * MIN);
    expect(runCycle).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(MIN);
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it("does not resume inactive or missing schedules", async () => {
    expect(scheduler.resume("p1")).toBeNull();
    scheduler.start("p1", { intervalMs: MIN });
    await expect(scheduler.stop("p1")).resolves.toBe(true);
    expect(scheduler.resume("p1")).toBeNull();
  });

  it("keeps schedules active on disk when halting all loops", async () => {
    scheduler.start("p1", { intervalMs: MIN });
    await scheduler.stopAll();
    expect(scheduler.isScheduled("p1")).toBe(false);
    expect(store.loadSchedule("p1")?.active).toBe(true);
    expect(onStopped).not.toHaveBeenCalled();
  });

  it("returns false when stopping a project with no loop", async () => {
    await expect(scheduler.stop("p1")).resolves.toBe(false);
  });
});

describe("cadence helpers", () => {
  it("steps interval cadences by their interval", () => {
    expect(nextAfter({ intervalMs: 1000 }, 5000)).toBe(6000);
    expect(countMissed({ intervalMs: 1000 }, 5000, 7500)).toBe(3);
    expect(countMissed({ intervalMs: 1000 }, 5000, 4999)).toBe(0);
  });

  it("computes the next cron fire time in the given zone", () => {
    const from = new Date("2026-01-01T00:07:00.000Z").getTime();
    const next = nextAfter({ cron: "*/15 * * * *", tz: "UTC" }, from);
    expect(new Date(next).toISOString()).toBe("2026-01-01T00:15:00.000Z");
  });

  it("describes cadences", () => {
    expect(describeCadence({ intervalMs: 1000 })).toBe("every 1000ms");
    expect(describeCadence({ cron: "0 * * * *", tz: "UTC" })).toBe('cron "0 * * * *" (UTC)');
  });
});
