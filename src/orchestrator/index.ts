import fs from "fs";
import path from "path";
import type { EngineConfig } from "../core/config.js";
import { claudeEngine, type Engine } from "../core/engine/index.js";
import { InvalidTransition, NotFound, PhaseFailed } from "../core/errors.js";
import { createEngineBus, type EngineBus } from "../core/events.js";
import { log } from "../core/logger.js";
import { runEvolutionCycle, type CycleDeps } from "../evolution/cycle.js";
import { EvolutionScheduler, type CancelFunc } from "../evolution/scheduler.js";
import { ToolGateway } from "../gateway/gateway.js";
import { createHandlerRegistry, type HandlerRegistry } from "../gateway/handlers.js";
import { InvocationLog } from "../gateway/invocation-log.js";
import { PhaseStateMachine, emptyPhase, type PhaseMachineDeps } from "../phases/machine.js";
import { MessageRouter } from "../router/router.js";
import { createClaudeDirectiveHandler, echoDirectiveHandler } from "../runtime/handlers.js";
import { LocalAgentRuntime } from "../runtime/local.js";
import type { AgentRuntime } from "../runtime/types.js";
import { SessionRegistry } from "../sessions/registry.js";
import type { Store } from "../store/storage.js";
import type { Cadence, EvolutionCycle, Project, ProjectMode } from "../store/types.js";
import { buildWorkflow } from "../workflows/index.js";

export interface OrchestratorOptions {
  store: Store;
  config: EngineConfig;
  engine?: Engine | undefined;
  runtime?: AgentRuntime | undefined;
  handlers?: HandlerRegistry | undefined;
  bus?: EngineBus | undefined;
}

export interface ProjectInit {
  id: string;
  mode: ProjectMode;
  workdir: string;
  name?: string | undefined;
}

export interface StartOptions {
  signal?: AbortSignal | undefined;
  /** Start evolution after completion. Defaults to `evolution.enabled`. */
  evolve?: boolean | undefined;
  /** Overrides the configured cadence when a new schedule is started. */
  cadence?: Cadence | undefined;
}

export const WORKDIR_LAYOUT = ["docs", "src", "tests", "config", "logs", "artifacts", "knowledge-base"] as const;

/**
 * Wires the gateway, session registry, router, state machine and evolution
 * scheduler for one workspace. Sessions created by a project's phases stay
 * alive through evolution and are terminated when the project fails, when its
 * schedule stops, or when it completes without evolution.
 */
export class Orchestrator {
  readonly bus: EngineBus;
  readonly store: Store;
  readonly config: EngineConfig;
  readonly invocations: InvocationLog;
  readonly handlers: HandlerRegistry;
  readonly registry: SessionRegistry;
  readonly router: MessageRouter;
  readonly runtime: AgentRuntime;
  readonly machine: PhaseStateMachine;
  readonly scheduler: EvolutionScheduler;

  private readonly cycleDeps: CycleDeps;
  private readonly controllers = new Map<string, AbortController>();
  private readonly attachedProjects = new Set<string>();
  private readonly unsubscribe: () => void;

  constructor(opts: OrchestratorOptions) {
    const { store, config } = opts;
    const engine = opts.engine ?? claudeEngine;
    this.store = store;
    this.config = config;
    this.bus = opts.bus ?? createEngineBus();

    this.invocations = new InvocationLog();
    this.unsubscribe = this.invocations.onAppend((invocation) => {
      if (invocation.projectId !== undefined) {
        try {
          store.appendInvocation(invocation.projectId, invocation);
        } catch (err) {
          log.error("orchestrator", `failed to persist invocation ${invocation.id}:`, err);
        }
      }
      this.bus.emit("gateway:invocation", invocation);
    });

    this.handlers = opts.handlers ?? createHandlerRegistry({
      engine,
      store,
      defaultTimeoutMs: config.gateway.defaultTimeoutMs,
    });
    this.registry = new SessionRegistry(store, this.bus);
    this.router = new MessageRouter(this.registry, store, {
      deliveryTimeoutMs: config.deliveryTimeoutMs,
      bus: this.bus,
    });
    this.runtime = opts.runtime ?? new LocalAgentRuntime(
      config.runtime.handler === "echo"
        ? echoDirectiveHandler
        : createClaudeDirectiveHandler(engine, config.runtime.model),
      { pollIntervalMs: config.runtime.pollIntervalMs },
    );

    const machineDeps: PhaseMachineDeps = {
      store,
      config,
      bus: this.bus,
      gateway: new ToolGateway(this.invocations),
      handlers: this.handlers,
      registry: this.registry,
      router: this.router,
      runtime: this.runtime,
      pollIntervalMs: config.phases.pollIntervalMs,
    };
    this.machine = new PhaseStateMachine(machineDeps);
    this.cycleDeps = { ...machineDeps, machine: this.machine };

    this.scheduler = new EvolutionScheduler({
      store,
      bus: this.bus,
      runCycle: (projectId, timing) => runEvolutionCycle(this.cycleDeps, this.workflowFor(projectId), projectId, timing),
      onStopped: (projectId) => this.terminateSessions(projectId),
    });
  }

  /**
   * Run a project from its last completed phase. Creates the project record
   * and its working directory on first start. Throws PhaseFailed when a
   * required item fails, InvalidTransition when the project is already running.
   */
  async start(init: ProjectInit, opts: StartOptions = {}): Promise<Project> {
    if (this.controllers.has(init.id)) {
      throw new InvalidTransition(`project ${init.id} is already running`);
    }
    const project = this.ensureProject(init);
    this.reattach(project);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });
    this.controllers.set(project.id, controller);

    let result: Project;
    try {
      result = await this.machine.run(project.id, buildWorkflow(project), { signal: controller.signal });
    } catch (err) {
      if (err instanceof PhaseFailed) this.terminateSessions(project.id);
      throw err;
    } finally {
      opts.signal?.removeEventListener("abort", onAbort);
      if (this.controllers.get(project.id) === controller) this.controllers.delete(project.id);
    }

    const evolve = opts.evolve ?? this.config.evolution.enabled;
    if (!evolve) {
      this.terminateSessions(project.id);
    } else if (!this.scheduler.isScheduled(project.id)) {
      if (this.store.loadSchedule(project.id)?.active) {
        this.scheduler.resume(project.id);
      } else {
        this.startEvolution(project.id, opts.cadence);
      }
    }
    return result;
  }

  status(projectId: string): Project {
    const project = this.store.loadProject(projectId);
    if (!project) throw new NotFound("project", projectId);
    return project;
  }

  reset(projectId: string): Project {
    if (this.controllers.has(projectId)) {
      throw new InvalidTransition(`project ${projectId} is running; cancel it before resetting`);
    }
    if (this.scheduler.isScheduled(projectId) || this.store.loadSchedule(projectId)?.active) {
      throw new InvalidTransition(`project ${projectId} has an active schedule; stop it before resetting`);
    }
    return this.machine.reset(projectId);
  }

  /** Abort the in-flight phase and stop evolution after its current cycle. */
  async cancel(projectId: string): Promise<boolean> {
    const controller = this.controllers.get(projectId);
    controller?.abort();
    const stopped = await this.scheduler.stop(projectId);
    if (controller || stopped) log.info("orchestrator", `${projectId}: cancelled`);
    return controller !== undefined || stopped;
  }

  defaultCadence(): Cadence {
    const { cron, tz, intervalMs } = this.config.evolution;
    if (cron) return tz ? { cron, tz } : { cron };
    return { intervalMs };
  }

  startEvolution(projectId: string, cadence: Cadence = this.defaultCadence()): CancelFunc {
    this.reattach(this.status(projectId));
    return this.scheduler.start(projectId, cadence);
  }

  stopEvolution(projectId: string): Promise<boolean> {
    return this.scheduler.stop(projectId);
  }

  /** One manual cycle, recorded like a scheduled one. */
  runEvolutionCycle(projectId: string): Promise<EvolutionCycle> {
    const project = this.status(projectId);
    this.reattach(project);
    const schedule = this.store.loadSchedule(projectId);
    return runEvolutionCycle(this.cycleDeps, buildWorkflow(project), projectId, {
      manual: true,
      scheduledAt: null,
      nextScheduledAt: schedule?.active ? schedule.nextAt : null,
    });
  }

  /** Resume every schedule a previous process left active. Returns the resumed project ids. */
  resumeSchedules(): string[] {
    const resumed: string[] = [];
    for (const project of this.store.listProjects()) {
      if (project.status !== "completed" || this.scheduler.isScheduled(project.id)) continue;
      if (!this.store.loadSchedule(project.id)?.active) continue;
      this.reattach(project);
      if (this.scheduler.resume(project.id)) resumed.push(project.id);
    }
    if (resumed.length > 0) log.info("orchestrator", `resumed schedules: ${resumed.join(", ")}`);
    return resumed;
  }

  /**
   * Let in-flight cycles finish, then release runtimes and timers. Schedules
   * stay active on disk so the next process resumes them.
   */
  async shutdown(): Promise<void> {
    for (const controller of this.controllers.values()) controller.abort();
    await this.scheduler.stopAll();
    await this.runtime.close();
    this.router.close();
    this.unsubscribe();
    log.info("orchestrator", "shut down");
  }

  private workflowFor(projectId: string) {
    return buildWorkflow(this.status(projectId));
  }

  private ensureProject(init: ProjectInit): Project {
    const existing = this.store.loadProject(init.id);
    if (existing) {
      if (existing.mode !== init.mode) {
        throw new InvalidTransition(`project ${init.id} was created in ${existing.mode} mode, not ${init.mode}`);
      }
      return existing;
    }

    const now = new Date().toISOString();
    const project: Project = {
      id: init.id,
      name: init.name ?? init.id,
      mode: init.mode,
      workdir: init.workdir,
      status: "running",
      createdAt: now,
      updatedAt: now,
      completedAt: null,
      failure: null,
      phases: buildWorkflow({ name: init.name ?? init.id, mode: init.mode }).phases.map((p, i) => emptyPhase(i, p.name)),
    };
    for (const dir of WORKDIR_LAYOUT) {
      fs.mkdirSync(path.join(project.workdir, dir), { recursive: true });
    }
    this.store.appendTransition(project.id, { at: now, scope: "project", from: "new", to: "running" });
    this.store.saveProject(project);
    log.info("orchestrator", `created project ${project.id} (${project.mode})`);
    return project;
  }

  /** Hand sessions persisted by an earlier process to this process's runtime. */
  private reattach(project: Project): void {
    if (this.attachedProjects.has(project.id)) return;
    this.attachedProjects.add(project.id);
    for (const session of this.registry.load(project.id)) {
      if (session.status === "terminated") continue;
      this.runtime.attach(session, this.router.portFor(session.id), project.workdir);
      this.registry.markReady(session.id);
    }
  }

  private terminateSessions(projectId: string): void {
    for (const session of this.registry.listSessions(projectId, "live")) {
      this.runtime.detach(session.id);
      this.router.discard(session.id);
    }
    const count = this.registry.terminateProject(projectId);
    if (count > 0) log.info("orchestrator", `${projectId}: terminated ${count} sessions`);
  }
}

export function createOrchestrator(opts: OrchestratorOptions): Orchestrator {
  return new Orchestrator(opts);
}
