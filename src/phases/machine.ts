import type { EngineConfig } from "../core/config.js";
import { AllStrategiesExhausted, InvalidTransition, NotFound, PhaseFailed, describeCause } from "../core/errors.js";
import type { EngineBus } from "../core/events.js";
import { log } from "../core/logger.js";
import type { ToolGateway } from "../gateway/gateway.js";
import type { HandlerRegistry } from "../gateway/handlers.js";
import type { Store } from "../store/storage.js";
import type { ItemOutcome, PhaseRecord, PhaseStatus, Project, ProjectStatus } from "../store/types.js";
import { runFanOut, type FanOutDeps } from "./fanout.js";
import type { InvokeItem, PhaseDefinition, Workflow } from "./types.js";

export interface PhaseMachineDeps extends FanOutDeps {
  store: Store;
  gateway: ToolGateway;
  handlers: HandlerRegistry;
  config: EngineConfig;
  bus?: EngineBus | undefined;
}

export interface RunOptions {
  signal?: AbortSignal | undefined;
}

export function emptyPhase(index: number, name: string): PhaseRecord {
  return {
    index,
    name,
    status: "pending",
    startedAt: null,
    completedAt: null,
    failedAt: null,
    cause: null,
    items: [],
  };
}

const CANCELLED = "cancelled";

/**
 * Runs a project's phases strictly in order. Every transition is persisted
 * before the machine moves on, and completed phases are never re-entered
 * unless the project is reset.
 */
export class PhaseStateMachine {
  constructor(private readonly deps: PhaseMachineDeps) {}

  /** Resolve a capability's strategies: config override, then item, then defaults. */
  strategiesFor(item: InvokeItem) {
    const specs = this.deps.config.capabilities[item.capability]
      ?? item.strategies
      ?? this.deps.config.gateway.defaultStrategies;
    return this.deps.handlers.resolve(specs);
  }

  async invokeItem(project: Project, item: InvokeItem, signal?: AbortSignal): Promise<ItemOutcome> {
    const base = { id: item.id, kind: "invoke" as const, required: item.required };
    try {
      const output = await this.deps.gateway.invoke(item.capability, item.input, this.strategiesFor(item), {
        projectId: project.id,
        workdir: project.workdir,
        tags: item.tags,
        signal,
      });
      return { ...base, ok: true, causes: [], output };
    } catch (err) {
      if (!(err instanceof AllStrategiesExhausted)) {
        log.error("phases", `${item.capability}: unexpected gateway error:`, err);
      }
      return { ...base, ok: false, causes: describeCause(err) };
    }
  }

  async run(projectId: string, workflow: Workflow, opts: RunOptions = {}): Promise<Project> {
    const project = this.deps.store.loadProject(projectId);
    if (!project) throw new NotFound("project", projectId);
    this.checkAlignment(project, workflow);

    if (project.status === "completed") {
      log.info("phases", `project ${projectId} already completed`);
      return project;
    }
    if (project.status === "failed") {
      log.info("phases", `retrying project ${projectId} from its last completed phase`);
      this.setProjectStatus(project, "running");
    }

    for (const [index, def] of workflow.phases.entries()) {
      const record = project.phases[index];
      if (!record) throw new InvalidTransition(`project ${projectId} has no record for phase ${index}`);
      if (record.status === "completed") {
        log.debug("phases", `skipping completed phase ${index + 1} (${def.name})`);
        continue;
      }

      if (opts.signal?.aborted) {
        this.failPhase(project, index, [CANCELLED]);
      }

      this.setPhaseStatus(project, index, "running");
      log.info("phases", `phase ${index + 1}/${workflow.phases.length} (${def.name}) running`);

      const causes = await this.execute(project, index, def, opts.signal);
      if (opts.signal?.aborted) {
        this.failPhase(project, index, [CANCELLED]);
      }
      if (causes.length > 0) {
        this.failPhase(project, index, causes);
      }

      this.setPhaseStatus(project, index, "completed");
      log.info("phases", `phase ${index + 1}/${workflow.phases.length} (${def.name}) completed`);
    }

    this.setProjectStatus(project, "completed");
    log.info("phases", `project ${projectId} completed`);
    return project;
  }

  /** Explicit reset: every phase back to pending, project back to running. */
  reset(projectId: string): Project {
    const project = this.deps.store.loadProject(projectId);
    if (!project) throw new NotFound("project", projectId);
    const from = project.status;
    const now = new Date().toISOString();
    project.phases = project.phases.map((p) => emptyPhase(p.index, p.name));
    project.status = "running";
    project.failure = null;
    project.completedAt = null;
    project.updatedAt = now;
    this.deps.store.appendTransition(projectId, { at: now, scope: "project", from, to: "running", cause: ["reset"] });
    this.deps.store.saveProject(project);
    this.deps.bus?.emit("project:status", { projectId, status: "running" });
    log.info("phases", `project ${projectId} reset`);
    return project;
  }

  private checkAlignment(project: Project, workflow: Workflow): void {
    const stored = project.phases.map((p) => p.name);
    const declared = workflow.phases.map((p) => p.name);
    if (stored.length !== declared.length || stored.some((name, i) => name !== declared[i])) {
      throw new InvalidTransition(
        `project ${project.id} was created with phases [${stored.join(", ")}] but workflow ${workflow.name} declares [${declared.join(", ")}]`,
      );
    }
  }

  /** Run a phase's items in declared order. Returns the causes of a required failure, if any. */
  private async execute(project: Project, index: number, def: PhaseDefinition, signal?: AbortSignal): Promise<string[]> {
    const timeoutMs = def.timeoutMs ?? this.deps.config.phases.timeoutMs;

    for (const item of def.items) {
      if (signal?.aborted) return [CANCELLED];

      const outcome = item.kind === "invoke"
        ? await this.invokeItem(project, item, signal)
        : await runFanOut(this.deps, item, {
            projectId: project.id,
            workdir: project.workdir,
            policy: def.policy ?? "all",
            timeoutMs,
            signal,
          });

      this.recordItem(project, index, outcome);

      if (!outcome.ok) {
        if (item.required) return outcome.causes;
        log.warn("phases", `optional item ${item.id} failed in ${def.name}: ${outcome.causes[0] ?? "unknown"}`);
      }
    }
    return [];
  }

  private recordItem(project: Project, index: number, outcome: ItemOutcome): void {
    const record = project.phases[index];
    if (!record) return;
    record.items.push(outcome);
    project.updatedAt = new Date().toISOString();
    this.deps.store.saveProject(project);
  }

  private setPhaseStatus(project: Project, index: number, to: PhaseStatus, cause?: string[]): void {
    const record = project.phases[index];
    if (!record) throw new InvalidTransition(`project ${project.id} has no phase ${index}`);
    const from = record.status;
    const now = new Date().toISOString();

    if (to === "running") {
      record.startedAt = now;
      record.completedAt = null;
      record.failedAt = null;
      record.cause = null;
      record.items = [];
    } else if (to === "completed") {
      record.completedAt = now;
    } else if (to === "failed") {
      record.failedAt = now;
      record.cause = cause ?? [];
    }
    record.status = to;
    project.updatedAt = now;

    this.deps.store.appendTransition(project.id, {
      at: now,
      scope: "phase",
      phaseIndex: index,
      phaseName: record.name,
      from,
      to,
      ...(cause ? { cause } : {}),
    });
    this.deps.store.saveProject(project);
    this.deps.bus?.emit("phase:transition", { projectId: project.id, index, name: record.name, status: to, cause });
  }

  private setProjectStatus(project: Project, to: ProjectStatus, cause?: string[]): void {
    const from = project.status;
    const now = new Date().toISOString();
    project.status = to;
    project.updatedAt = now;
    if (to === "completed") project.completedAt = now;
    if (to === "running") project.failure = null;

    this.deps.store.appendTransition(project.id, { at: now, scope: "project", from, to, ...(cause ? { cause } : {}) });
    this.deps.store.saveProject(project);
    this.deps.bus?.emit("project:status", { projectId: project.id, status: to });
  }

  /** Persist the failure, halt the project and throw. */
  private failPhase(project: Project, index: number, causes: string[]): never {
    const record = project.phases[index];
    const name = record?.name ?? `#${index}`;
    if (record && record.status !== "failed") {
      this.setPhaseStatus(project, index, "failed", causes);
    }
    project.failure = { phaseIndex: index, phaseName: name, cause: causes };
    this.setProjectStatus(project, "failed", causes);

    const err = new PhaseFailed(project.id, index, name, causes);
    log.error("phases", `${err.message}\n${causes.map((c) => `  ${c}`).join("\n")}`);
    throw err;
  }
}
