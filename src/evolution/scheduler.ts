import { CronExpressionParser } from "cron-parser";
import { AlreadyScheduled, InvalidTransition, NotFound } from "../core/errors.js";
import type { EngineBus } from "../core/events.js";
import { log } from "../core/logger.js";
import type { Store } from "../store/storage.js";
import type { Cadence, EvolutionCycle, Schedule } from "../store/types.js";
import type { CycleTiming } from "./cycle.js";

export type CycleRunner = (projectId: string, timing: CycleTiming) => Promise<EvolutionCycle>;

/** Stops scheduling. Resolves once the in-flight cycle, if any, has been recorded. */
export type CancelFunc = () => Promise<boolean>;

export interface SchedulerOptions {
  store: Store;
  runCycle: CycleRunner;
  bus?: EngineBus | undefined;
  /** Called when a loop ends because its schedule was deactivated. */
  onStopped?: ((projectId: string) => void) | undefined;
}

interface Loop {
  projectId: string;
  cadence: Cadence;
  nextAt: number;
  timer: NodeJS.Timeout | null;
  inFlight: Promise<void> | null;
  stopped: boolean;
}

const MAX_MISSED_COUNT = 10_000;

export function describeCadence(cadence: Cadence): string {
  if ("intervalMs" in cadence) return `every ${cadence.intervalMs}ms`;
  return `cron "${cadence.cron}"${cadence.tz ? ` (${cadence.tz})` : ""}`;
}

/** Time of the first cadence step strictly after `from`. */
export function nextAfter(cadence: Cadence, from: number): number {
  if ("intervalMs" in cadence) return from + cadence.intervalMs;
  const expr = CronExpressionParser.parse(cadence.cron, {
    currentDate: new Date(from),
    ...(cadence.tz ? { tz: cadence.tz } : {}),
  });
  return expr.next().getTime();
}

/** Number of cadence steps from `first` up to and including `now`. */
export function countMissed(cadence: Cadence, first: number, now: number): number {
  let missed = 0;
  let at = first;
  while (at <= now && missed < MAX_MISSED_COUNT) {
    missed++;
    at = nextAfter(cadence, at);
  }
  return missed;
}

const iso = (ms: number) => new Date(ms).toISOString();

/**
 * Runs evolution cycles on a cadence, one loop per project. The persisted
 * schedule record is re-read before every cycle so another process can stop
 * the loop by marking it inactive.
 */
export class EvolutionScheduler {
  private loops = new Map<string, Loop>();

  constructor(private readonly opts: SchedulerOptions) {}

  isScheduled(projectId: string): boolean {
    return this.loops.has(projectId);
  }

  start(projectId: string, cadence: Cadence): CancelFunc {
    if (this.loops.has(projectId)) throw new AlreadyScheduled(projectId);
    const project = this.opts.store.loadProject(projectId);
    if (!project) throw new NotFound("project", projectId);
    if (project.status !== "completed") {
      throw new InvalidTransition(`project ${projectId} is ${project.status}; evolution starts only after completion`);
    }

    const now = Date.now();
    const nextAt = nextAfter(cadence, now);
    const previous = this.opts.store.loadSchedule(projectId);
    this.opts.store.saveSchedule({
      projectId,
      active: true,
      cadence,
      startedAt: iso(now),
      stoppedAt: null,
      nextAt: iso(nextAt),
      lastCycleAt: previous?.lastCycleAt ?? null,
      ownerPid: process.pid,
    });

    const loop: Loop = { projectId, cadence, nextAt, timer: null, inFlight: null, stopped: false };
    this.loops.set(projectId, loop);
    this.arm(loop);
    log.info("evolution", `${projectId}: scheduled ${describeCadence(cadence)}, next at ${iso(nextAt)}`);
    return () => this.stop(projectId);
  }

  /**
   * Pick up a schedule left active by a previous process. Cadence restarts from
   * now; cycles that fell due while nothing was running are logged as skipped.
   */
  resume(projectId: string): CancelFunc | null {
    if (this.loops.has(projectId)) throw new AlreadyScheduled(projectId);
    const schedule = this.opts.store.loadSchedule(projectId);
    if (!schedule?.active) return null;

    const project = this.opts.store.loadProject(projectId);
    if (project?.status !== "completed") {
      log.warn("evolution", `${projectId}: not resuming schedule, project is ${project?.status ?? "missing"}`);
      return null;
    }

    if (schedule.nextAt) {
      const missed = countMissed(schedule.cadence, Date.parse(schedule.nextAt), Date.now());
      this.reportMissed(projectId, missed);
    }
    return this.start(projectId, schedule.cadence);
  }

  /** Stop a project's loop and mark its schedule inactive. Returns false if none was running. */
  async stop(projectId: string): Promise<boolean> {
    const loop = await this.halt(projectId);
    if (!loop) return false;
    this.deactivate(projectId);
    log.info("evolution", `${projectId}: schedule stopped`);
    this.opts.bus?.emit("evolution:stopped", { projectId });
    this.opts.onStopped?.(projectId);
    return true;
  }

  /**
   * Halt every loop after its in-flight cycle. Persisted schedules stay active
   * so a later process can resume them.
   */
  async stopAll(): Promise<void> {
    await Promise.all([...this.loops.keys()].map((id) => this.halt(id)));
  }

  private async halt(projectId: string): Promise<Loop | null> {
    const loop = this.loops.get(projectId);
    if (!loop) return null;
    loop.stopped = true;
    if (loop.timer) clearTimeout(loop.timer);
    loop.timer = null;
    await loop.inFlight;
    this.loops.delete(projectId);
    return loop;
  }

  private deactivate(projectId: string): void {
    const schedule = this.opts.store.loadSchedule(projectId);
    if (!schedule || !schedule.active) return;
    this.opts.store.saveSchedule({ ...schedule, active: false, stoppedAt: iso(Date.now()), nextAt: null });
  }

  private arm(loop: Loop): void {
    loop.timer = setTimeout(() => {
      loop.timer = null;
      loop.inFlight = this.fire(loop).finally(() => {
        loop.inFlight = null;
      });
    }, Math.max(0, loop.nextAt - Date.now()));
  }

  private async fire(loop: Loop): Promise<void> {
    if (loop.stopped) return;
    const { projectId, cadence } = loop;

    const schedule = this.opts.store.loadSchedule(projectId);
    if (!schedule?.active) {
      this.externallyStopped(loop);
      return;
    }

    const scheduledAt = loop.nextAt;
    let next = nextAfter(cadence, scheduledAt);
    try {
      await this.opts.runCycle(projectId, { manual: false, scheduledAt: iso(scheduledAt), nextScheduledAt: iso(next) });
    } catch (err) {
      log.error("evolution", `${projectId}: cycle failed:`, err);
    }

    const now = Date.now();
    if (next <= now) {
      this.reportMissed(projectId, countMissed(cadence, next, now));
      next = nextAfter(cadence, now);
    }
    loop.nextAt = next;

    const current = this.opts.store.loadSchedule(projectId);
    if (!current?.active) {
      this.externallyStopped(loop);
      return;
    }
    this.save({ ...current, nextAt: iso(next), lastCycleAt: iso(now) });
    if (loop.stopped) return;
    this.arm(loop);
  }

  private externallyStopped(loop: Loop): void {
    loop.stopped = true;
    this.loops.delete(loop.projectId);
    log.info("evolution", `${loop.projectId}: schedule marked inactive, stopping`);
    this.opts.bus?.emit("evolution:stopped", { projectId: loop.projectId });
    this.opts.onStopped?.(loop.projectId);
  }

  private reportMissed(projectId: string, missed: number): void {
    if (missed === 0) return;
    log.warn("evolution", `${projectId}: skipped ${missed} missed cycle${missed === 1 ? "" : "s"}`);
    this.opts.bus?.emit("evolution:skipped", { projectId, missed });
  }

  private save(schedule: Schedule): void {
    this.opts.store.saveSchedule(schedule);
  }
}
