import fs from "fs";
import path from "path";
import { appendJsonLine, readJsonFile, readJsonLines, writeJsonFileAtomic } from "../core/json.js";
import { log } from "../core/logger.js";
import { ToolInvocationSchema, type ToolInvocation } from "../gateway/types.js";
import {
  AgentSessionSchema,
  EvolutionCycleSchema,
  ManualActionSchema,
  MessageEventSchema,
  ProjectSchema,
  ScheduleSchema,
  TransitionSchema,
  type AgentSession,
  type EvolutionCycle,
  type ManualAction,
  type MessageEvent,
  type Project,
  type Schedule,
  type Transition,
} from "./types.js";

/**
 * Append-or-upsert store keyed by project id. Upserts replace a whole record,
 * appends never rewrite earlier lines.
 */
export interface Store {
  listProjects(): Project[];
  loadProject(projectId: string): Project | null;
  saveProject(project: Project): void;

  appendTransition(projectId: string, transition: Transition): void;
  loadTransitions(projectId: string): Transition[];

  loadSessions(projectId: string): AgentSession[];
  saveSessions(projectId: string, sessions: AgentSession[]): void;

  appendMessageEvent(projectId: string, event: MessageEvent): void;
  loadMessageEvents(projectId: string): MessageEvent[];

  appendInvocation(projectId: string, invocation: ToolInvocation): void;
  loadInvocations(projectId: string): ToolInvocation[];

  appendCycle(projectId: string, cycle: EvolutionCycle): void;
  loadCycles(projectId: string): EvolutionCycle[];
  pruneCycles(projectId: string, keep: number): number;

  loadSchedule(projectId: string): Schedule | null;
  saveSchedule(schedule: Schedule): void;

  appendManualAction(projectId: string, action: ManualAction): void;
  loadManualActions(projectId: string): ManualAction[];
}

export class FilesystemStore implements Store {
  constructor(readonly workspaceDir: string) {}

  private projectsDir(): string {
    return path.join(this.workspaceDir, "projects");
  }

  projectDir(projectId: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(projectId) || projectId.startsWith(".")) {
      throw new Error(`Invalid project id: ${projectId}`);
    }
    return path.join(this.projectsDir(), projectId);
  }

  private file(projectId: string, name: string): string {
    return path.join(this.projectDir(projectId), name);
  }

  listProjects(): Project[] {
    const dir = this.projectsDir();
    if (!fs.existsSync(dir)) return [];
    const projects: Project[] = [];
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const project = this.loadProject(entry.name);
      if (project) projects.push(project);
    }
    return projects.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  loadProject(projectId: string): Project | null {
    return readJsonFile(this.file(projectId, "project.json"), ProjectSchema, `project.json (${projectId})`);
  }

  saveProject(project: Project): void {
    writeJsonFileAtomic(this.file(project.id, "project.json"), project);
  }

  appendTransition(projectId: string, transition: Transition): void {
    appendJsonLine(this.file(projectId, "transitions.jsonl"), transition);
  }

  loadTransitions(projectId: string): Transition[] {
    return readJsonLines(this.file(projectId, "transitions.jsonl"), TransitionSchema, `transitions (${projectId})`);
  }

  loadSessions(projectId: string): AgentSession[] {
    return readJsonFile(
      this.file(projectId, "sessions.json"),
      AgentSessionSchema.array(),
      `sessions.json (${projectId})`,
    ) ?? [];
  }

  saveSessions(projectId: string, sessions: AgentSession[]): void {
    writeJsonFileAtomic(this.file(projectId, "sessions.json"), sessions);
  }

  appendMessageEvent(projectId: string, event: MessageEvent): void {
    appendJsonLine(this.file(projectId, "messages.jsonl"), event);
  }

  loadMessageEvents(projectId: string): MessageEvent[] {
    return readJsonLines(this.file(projectId, "messages.jsonl"), MessageEventSchema, `messages (${projectId})`);
  }

  appendInvocation(projectId: string, invocation: ToolInvocation): void {
    appendJsonLine(this.file(projectId, "invocations.jsonl"), invocation);
  }

  loadInvocations(projectId: string): ToolInvocation[] {
    return readJsonLines(this.file(projectId, "invocations.jsonl"), ToolInvocationSchema, `invocations (${projectId})`);
  }

  appendCycle(projectId: string, cycle: EvolutionCycle): void {
    appendJsonLine(this.file(projectId, "cycles.jsonl"), cycle);
  }

  loadCycles(projectId: string): EvolutionCycle[] {
    return readJsonLines(this.file(projectId, "cycles.jsonl"), EvolutionCycleSchema, `cycles (${projectId})`);
  }

  /** Drop the oldest cycles beyond `keep`. Returns how many were removed. */
  pruneCycles(projectId: string, keep: number): number {
    const cycles = this.loadCycles(projectId);
    const excess = cycles.length - keep;
    if (excess <= 0) return 0;
    const kept = cycles.slice(excess);
    const filePath = this.file(projectId, "cycles.jsonl");
    const tmp = `${filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, kept.map((c) => JSON.stringify(c) + "\n").join(""));
    fs.renameSync(tmp, filePath);
    log.debug("store", `pruned ${excess} evolution cycle(s) for ${projectId}`);
    return excess;
  }

  loadSchedule(projectId: string): Schedule | null {
    return readJsonFile(this.file(projectId, "schedule.json"), ScheduleSchema, `schedule.json (${projectId})`);
  }

  saveSchedule(schedule: Schedule): void {
    writeJsonFileAtomic(this.file(schedule.projectId, "schedule.json"), schedule);
  }

  appendManualAction(projectId: string, action: ManualAction): void {
    appendJsonLine(this.file(projectId, "manual-actions.jsonl"), action);
  }

  loadManualActions(projectId: string): ManualAction[] {
    return readJsonLines(this.file(projectId, "manual-actions.jsonl"), ManualActionSchema, `manual actions (${projectId})`);
  }
}
