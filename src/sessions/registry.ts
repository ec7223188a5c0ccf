import crypto from "crypto";
import { InvalidTransition, NotFound } from "../core/errors.js";
import type { EngineBus } from "../core/events.js";
import { log } from "../core/logger.js";
import type { Store } from "../store/storage.js";
import type { AgentSession, SessionStatus } from "../store/types.js";

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  created: ["idle", "terminated"],
  idle: ["busy", "unreachable", "terminated"],
  busy: ["idle", "unreachable", "terminated"],
  unreachable: ["idle", "terminated"],
  terminated: [],
};

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

export type StatusFilter = SessionStatus | readonly SessionStatus[] | "live";

function matches(status: SessionStatus, filter: StatusFilter | undefined): boolean {
  if (filter === undefined) return true;
  if (filter === "live") return status !== "terminated";
  if (typeof filter === "string") return status === filter;
  return filter.includes(status);
}

/**
 * Directory and lifecycle authority for agent sessions. Holds no payloads;
 * mailboxes belong to the router.
 */
export class SessionRegistry {
  private sessions = new Map<string, AgentSession>();
  private loaded = new Set<string>();

  constructor(
    private readonly store: Store,
    private readonly bus?: EngineBus,
  ) {}

  /** Restore a project's sessions from the store. Safe to call repeatedly. */
  load(projectId: string): AgentSession[] {
    if (!this.loaded.has(projectId)) {
      for (const session of this.store.loadSessions(projectId)) {
        if (!this.sessions.has(session.id)) {
          this.sessions.set(session.id, session);
        }
      }
      this.loaded.add(projectId);
    }
    return this.listSessions(projectId);
  }

  createSession(projectId: string, role: string): string {
    this.load(projectId);
    const now = new Date().toISOString();
    const id = `${role.replace(/[^A-Za-z0-9-]/g, "-")}-${crypto.randomBytes(4).toString("hex")}`;
    this.sessions.set(id, {
      id,
      projectId,
      role,
      status: "created",
      createdAt: now,
      updatedAt: now,
      terminatedAt: null,
    });
    this.persist(projectId);
    log.info("sessions", `created ${id} (role: ${role}) for project ${projectId}`);
    return id;
  }

  /** Fails with NotFound for unknown or terminated sessions. */
  getSession(id: string): AgentSession {
    const session = this.sessions.get(id);
    if (!session || session.status === "terminated") {
      throw new NotFound("session", id);
    }
    return { ...session };
  }

  /** Like getSession, but terminated sessions are returned too. */
  peek(id: string): AgentSession | undefined {
    const session = this.sessions.get(id);
    return session ? { ...session } : undefined;
  }

  listSessions(projectId: string, filter?: StatusFilter): AgentSession[] {
    return [...this.sessions.values()]
      .filter((s) => s.projectId === projectId && matches(s.status, filter))
      .map((s) => ({ ...s }));
  }

  /** Idempotent: terminating a terminated session is a no-op. */
  terminateSession(id: string): void {
    const session = this.sessions.get(id);
    if (!session) throw new NotFound("session", id);
    if (session.status === "terminated") return;
    this.apply(session, "terminated");
    log.info("sessions", `terminated ${id}`);
  }

  terminateProject(projectId: string): number {
    let count = 0;
    for (const session of this.listSessions(projectId, "live")) {
      this.terminateSession(session.id);
      count++;
    }
    return count;
  }

  /** Strict transition; throws InvalidTransition on an illegal move. */
  transition(id: string, to: SessionStatus): AgentSession {
    const session = this.sessions.get(id);
    if (!session) throw new NotFound("session", id);
    if (!canTransition(session.status, to)) {
      throw new InvalidTransition(`session ${id}: ${session.status} → ${to} is not allowed`);
    }
    this.apply(session, to);
    return { ...session };
  }

  /** Best-effort transition used by the router; illegal moves are logged and ignored. */
  tryTransition(id: string, to: SessionStatus): boolean {
    const session = this.sessions.get(id);
    if (!session || !canTransition(session.status, to)) {
      log.debug("sessions", `ignoring ${session?.status ?? "missing"} → ${to} for ${id}`);
      return false;
    }
    this.apply(session, to);
    return true;
  }

  /**
   * Mark a session ready for work once a runtime has attached to it. Sessions
   * left busy or unreachable by a previous process come back as idle.
   */
  markReady(id: string): void {
    const session = this.sessions.get(id);
    if (!session || session.status === "terminated") throw new NotFound("session", id);
    if (session.status !== "idle") {
      this.apply(session, "idle");
    }
  }

  private apply(session: AgentSession, to: SessionStatus): void {
    const from = session.status;
    if (from === to) return;
    const now = new Date().toISOString();
    session.status = to;
    session.updatedAt = now;
    if (to === "terminated") session.terminatedAt = now;
    this.persist(session.projectId);
    this.bus?.emit("session:status", { sessionId: session.id, projectId: session.projectId, from, to });
  }

  private persist(projectId: string): void {
    this.store.saveSessions(
      projectId,
      [...this.sessions.values()].filter((s) => s.projectId === projectId),
    );
  }
}
