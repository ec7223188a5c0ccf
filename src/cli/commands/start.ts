import path from "path";
import { PhaseFailed } from "../../core/errors.js";
import { log } from "../../core/logger.js";
import { describeCadence } from "../../evolution/scheduler.js";
import { createOrchestrator } from "../../orchestrator/index.js";
import { ProjectModeSchema, type Cadence } from "../../store/types.js";
import { flag, parseDuration, requireFlag, UsageError, type ParsedArgs } from "../args.js";
import { openWorkspace } from "../workspace.js";

export function cadenceFromArgs(args: ParsedArgs): Cadence | undefined {
  const every = flag(args, "every");
  const cron = flag(args, "cron");
  if (every && cron) throw new UsageError("use either --every or --cron, not both");
  if (every) return { intervalMs: parseDuration(every) };
  if (cron) {
    const tz = flag(args, "tz");
    return tz ? { cron, tz } : { cron };
  }
  return undefined;
}

export async function run(args: ParsedArgs): Promise<number> {
  const projectId = requireFlag(args, "project");
  const mode = ProjectModeSchema.safeParse(requireFlag(args, "mode"));
  if (!mode.success) {
    throw new UsageError(`--mode must be one of: ${ProjectModeSchema.options.join(", ")}`);
  }
  const cadence = cadenceFromArgs(args);
  const evolve = args.flags.has("no-evolve") ? false : undefined;

  const ws = openWorkspace(args);
  const orchestrator = createOrchestrator({ store: ws.store, config: ws.config });

  const controller = new AbortController();
  let release: () => void = () => {};
  const finished = new Promise<void>((r) => { release = r; });
  const onSignal = (signal: NodeJS.Signals) => {
    log.info("cli", `received ${signal}, stopping`);
    controller.abort();
    release();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  orchestrator.bus.on("evolution:stopped", (e) => {
    if (e.projectId === projectId) release();
  });

  try {
    const project = await orchestrator.start(
      {
        id: projectId,
        mode: mode.data,
        workdir: path.resolve(flag(args, "workdir") ?? process.cwd()),
        name: flag(args, "name"),
      },
      { signal: controller.signal, evolve, cadence },
    );
    console.log(`Project ${project.id} completed (${project.phases.length} phases).`);

    const schedule = ws.store.loadSchedule(projectId);
    if (orchestrator.scheduler.isScheduled(projectId) && schedule) {
      console.log(`Evolution running ${describeCadence(schedule.cadence)}, next at ${schedule.nextAt ?? "?"}. Press Ctrl-C to stop.`);
      await finished;
      if (ws.store.loadSchedule(projectId)?.active === false) {
        await orchestrator.stopEvolution(projectId);
      }
    }
    return 0;
  } catch (err) {
    if (err instanceof PhaseFailed) {
      console.error(`Phase ${err.phaseIndex + 1} (${err.phaseName}) failed:`);
      for (const cause of err.causes) console.error(`  ${cause}`);
      return 1;
    }
    throw err;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await orchestrator.shutdown();
    ws.logger.close();
  }
}
