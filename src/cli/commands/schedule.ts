import type { Store } from "../../store/storage.js";
import { requireFlag, UsageError, type ParsedArgs } from "../args.js";
import { isRunning, openWorkspace } from "../workspace.js";

export interface StopResult {
  wasActive: boolean;
  /** Pid of the owning process that was sent SIGTERM, if any. */
  signalled: number | null;
}

/**
 * Mark a project's schedule inactive. The owning process notices before its
 * next cycle; if it is alive it is also asked to stop now.
 */
export function stopSchedule(store: Store, projectId: string): StopResult {
  const schedule = store.loadSchedule(projectId);
  if (!schedule?.active) return { wasActive: false, signalled: null };

  store.saveSchedule({ ...schedule, active: false, stoppedAt: new Date().toISOString(), nextAt: null });

  const pid = schedule.ownerPid;
  if (pid !== null && pid !== process.pid && isRunning(pid)) {
    process.kill(pid, "SIGTERM");
    return { wasActive: true, signalled: pid };
  }
  return { wasActive: true, signalled: null };
}

export function run(args: ParsedArgs): number {
  const subcommand = args.positionals[1];
  if (subcommand !== "stop") {
    throw new UsageError("usage: phaseloop schedule stop --project <id>");
  }
  const projectId = requireFlag(args, "project");
  const { store, logger } = openWorkspace(args);
  try {
    const result = stopSchedule(store, projectId);
    if (!result.wasActive) {
      console.log(`No active schedule for ${projectId}.`);
      return 1;
    }
    console.log(
      result.signalled !== null
        ? `Schedule stopped for ${projectId} (signalled pid ${result.signalled}).`
        : `Schedule stopped for ${projectId}.`,
    );
    return 0;
  } finally {
    logger.close();
  }
}
