import type { EngineConfig } from "../core/config.js";
import { InvalidTransition, NotFound } from "../core/errors.js";
import type { EngineBus } from "../core/events.js";
import { withLock } from "../core/lock.js";
import { log } from "../core/logger.js";
import { dispatch, type FanOutDeps } from "../phases/fanout.js";
import type { PhaseStateMachine } from "../phases/machine.js";
import type { Workflow } from "../phases/types.js";
import type { Store } from "../store/storage.js";
import type { CycleOutcome, EvolutionCycle, SessionResponse } from "../store/types.js";

export interface CycleDeps extends FanOutDeps {
  store: Store;
  machine: PhaseStateMachine;
  config: EngineConfig;
  bus?: EngineBus | undefined;
}

export interface CycleTiming {
  manual: boolean;
  scheduledAt: string | null;
  nextScheduledAt: string | null;
}

export function nextSequence(store: Store, projectId: string): number {
  const cycles = store.loadCycles(projectId);
  return (cycles[cycles.length - 1]?.sequence ?? 0) + 1;
}

function countResponses(responses: SessionResponse[]): CycleOutcome["sessions"] {
  const count = (outcome: SessionResponse["outcome"]) => responses.filter((r) => r.outcome === outcome).length;
  return {
    addressed: responses.length,
    responded: count("result"),
    errored: count("error"),
    unresponsive: count("failed-to-respond"),
    unavailable: count("unavailable"),
  };
}

export function summarizeCycle(sequence: number, outcome: CycleOutcome): string {
  const { invocations: inv, sessions } = outcome;
  const parts = [
    `refresh ${inv.succeeded}/${inv.succeeded + inv.failed} succeeded`,
    `${sessions.responded}/${sessions.addressed} sessions responded`,
  ];
  if (sessions.unresponsive > 0) parts.push(`${sessions.unresponsive} unresponsive`);
  if (sessions.errored > 0) parts.push(`${sessions.errored} errored`);
  return `cycle #${sequence}: ${parts.join(", ")}`;
}

/**
 * One post-completion refresh: run the workflow's refresh calls, send the
 * update directive to every live session, then record the outcome. Cycles of
 * one project never overlap. A cycle is never aborted part way.
 */
export async function runEvolutionCycle(
  deps: CycleDeps,
  workflow: Workflow,
  projectId: string,
  timing: CycleTiming,
): Promise<EvolutionCycle> {
  return withLock(`evolution:${projectId}`, async () => {
    const project = deps.store.loadProject(projectId);
    if (!project) throw new NotFound("project", projectId);
    if (project.status !== "completed") {
      throw new InvalidTransition(`project ${projectId} is ${project.status}; evolution runs only after completion`);
    }

    const sequence = nextSequence(deps.store, projectId);
    const startedAt = new Date().toISOString();
    log.info("evolution", `${projectId}: cycle #${sequence} started${timing.manual ? " (manual)" : ""}`);

    const invocations = { succeeded: 0, failed: 0 };
    for (const item of workflow.refresh) {
      const outcome = await deps.machine.invokeItem(project, item);
      if (outcome.ok) {
        invocations.succeeded++;
      } else {
        invocations.failed++;
        log.warn("evolution", `${projectId}: refresh ${item.id} failed: ${outcome.causes[0] ?? "unknown"}`);
      }
    }

    const targets = deps.registry.listSessions(projectId, "live").map((s) => ({
      sessionId: s.id,
      role: s.role,
      directive: workflow.evolutionDirective(s.role, sequence),
    }));
    const responses = await dispatch(deps, targets, { timeoutMs: deps.config.evolution.timeoutMs });

    const outcome: CycleOutcome = { invocations, sessions: countResponses(responses) };
    const cycle: EvolutionCycle = {
      projectId,
      sequence,
      manual: timing.manual,
      scheduledAt: timing.scheduledAt,
      startedAt,
      completedAt: new Date().toISOString(),
      nextScheduledAt: timing.nextScheduledAt,
      outcome,
      summary: summarizeCycle(sequence, outcome),
    };

    deps.store.appendCycle(projectId, cycle);
    const pruned = deps.store.pruneCycles(projectId, deps.config.evolution.historyLimit);
    if (pruned > 0) log.debug("evolution", `${projectId}: pruned ${pruned} old cycles`);

    deps.bus?.emit("evolution:cycle", cycle);
    log.info("evolution", `${projectId}: ${cycle.summary}`);
    return cycle;
  });
}
