import { SessionUnresponsive, TargetUnavailable, errorMessage } from "../core/errors.js";
import { log } from "../core/logger.js";
import { sleep } from "../core/sleep.js";
import { ORCHESTRATOR, type MessageRouter } from "../router/router.js";
import type { AgentRuntime } from "../runtime/types.js";
import type { SessionRegistry } from "../sessions/registry.js";
import type { ItemOutcome, Message, Payload, SessionResponse } from "../store/types.js";
import { describePolicy, policySatisfied } from "./policy.js";
import type { FanOutItem, PassPolicy } from "./types.js";

export interface FanOutDeps {
  registry: SessionRegistry;
  router: MessageRouter;
  runtime: AgentRuntime;
  pollIntervalMs: number;
}

export interface DispatchTarget {
  sessionId: string;
  role: string;
  directive: Payload;
}

export interface DispatchOptions {
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

/** Create a session for a role and hand it to the runtime. */
export function spawnSession(deps: FanOutDeps, projectId: string, role: string, workdir: string): string {
  const id = deps.registry.createSession(projectId, role);
  deps.runtime.attach(deps.registry.getSession(id), deps.router.portFor(id), workdir);
  deps.registry.markReady(id);
  return id;
}

function acquireSession(
  deps: FanOutDeps,
  projectId: string,
  role: string,
  workdir: string,
  reuse: boolean,
  taken: Set<string>,
): string {
  if (reuse) {
    const existing = deps.registry
      .listSessions(projectId, ["idle", "busy"])
      .find((s) => s.role === role && !taken.has(s.id));
    if (existing) return existing.id;
  }
  return spawnSession(deps, projectId, role, workdir);
}

interface Pending {
  target: DispatchTarget;
  messageId: string;
}

/**
 * Pick the result or error answering `messageId` out of a drained batch. Acks
 * are dropped; replies to earlier directives are logged and discarded.
 */
function takeReply(drained: Message[], messageId: string): Message | undefined {
  let reply: Message | undefined;
  for (const message of drained) {
    if (message.kind === "ack") continue;
    if (!reply && message.replyTo === messageId) {
      reply = message;
      continue;
    }
    log.debug("phases", `dropping stale ${message.kind} ${message.id} from ${message.from} (reply to ${message.replyTo ?? "nothing"})`);
  }
  return reply;
}

/**
 * Send every directive first, then poll each session until all have returned a
 * result or error, the timeout elapses, or the signal aborts. Responses are
 * listed in the order sessions answered.
 */
export async function dispatch(
  deps: FanOutDeps,
  targets: DispatchTarget[],
  opts: DispatchOptions,
): Promise<SessionResponse[]> {
  const responses: SessionResponse[] = [];
  const pending = new Map<string, Pending>();

  for (const target of targets) {
    try {
      const messageId = deps.router.send(ORCHESTRATOR, target.sessionId, target.directive, "directive");
      pending.set(target.sessionId, { target, messageId });
    } catch (err) {
      if (!(err instanceof TargetUnavailable)) throw err;
      log.warn("phases", err.message);
      responses.push({ sessionId: target.sessionId, role: target.role, outcome: "unavailable" });
    }
  }

  const deadline = Date.now() + opts.timeoutMs;
  while (pending.size > 0 && !opts.signal?.aborted) {
    for (const [sessionId, { target, messageId }] of pending) {
      const reply = takeReply(deps.router.poll(sessionId), messageId);
      if (!reply) continue;
      pending.delete(sessionId);
      responses.push({
        sessionId,
        role: target.role,
        outcome: reply.kind === "result" ? "result" : "error",
        payload: reply.payload,
      });
    }
    const remaining = deadline - Date.now();
    if (pending.size === 0 || remaining <= 0) break;
    await sleep(Math.min(deps.pollIntervalMs, remaining), opts.signal);
  }

  for (const [sessionId, { target }] of pending) {
    const err = new SessionUnresponsive(sessionId, opts.timeoutMs);
    log.warn("phases", err.message);
    deps.registry.tryTransition(sessionId, "unreachable");
    responses.push({ sessionId, role: target.role, outcome: "failed-to-respond" });
  }

  return responses;
}

function describeResponse(response: SessionResponse, timeoutMs: number): string {
  const who = `${response.role} (${response.sessionId})`;
  switch (response.outcome) {
    case "result":
      return `${who}: result`;
    case "error": {
      const payload = response.payload;
      const detail = typeof payload === "string"
        ? payload
        : typeof payload?.error === "string" ? payload.error : JSON.stringify(payload);
      return `${who}: error: ${detail}`;
    }
    case "failed-to-respond":
      return `${who}: failed-to-respond (${new SessionUnresponsive(response.sessionId, timeoutMs).message})`;
    case "unavailable":
      return `${who}: unavailable`;
  }
}

export interface FanOutContext {
  projectId: string;
  workdir: string;
  policy: PassPolicy;
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

export async function runFanOut(deps: FanOutDeps, item: FanOutItem, ctx: FanOutContext): Promise<ItemOutcome> {
  const policy = item.policy ?? ctx.policy;
  const taken = new Set<string>();
  const targets: DispatchTarget[] = [];

  try {
    for (const t of item.targets) {
      const sessionId = acquireSession(deps, ctx.projectId, t.role, ctx.workdir, item.reuseSessions ?? false, taken);
      taken.add(sessionId);
      targets.push({ sessionId, role: t.role, directive: t.directive });
    }
  } catch (err) {
    return {
      id: item.id,
      kind: "fanout",
      required: item.required,
      ok: false,
      causes: [`fan-out ${item.id}: could not create sessions: ${errorMessage(err)}`],
      responses: [],
    };
  }

  log.info("phases", `fan-out ${item.id}: ${targets.length} session(s), policy ${policy}`);
  const responses = await dispatch(deps, targets, { timeoutMs: ctx.timeoutMs, signal: ctx.signal });
  const succeeded = responses.filter((r) => r.outcome === "result").length;
  const ok = policySatisfied(policy, succeeded, targets.length);

  const failures = responses.filter((r) => r.outcome !== "result").map((r) => `  ${describeResponse(r, ctx.timeoutMs)}`);
  const causes = ok
    ? []
    : [`fan-out ${item.id}: ${succeeded}/${targets.length} sessions returned results, ${describePolicy(policy, targets.length)}`, ...failures];

  if (ok && failures.length > 0) {
    log.warn("phases", `fan-out ${item.id} passed with partial responses:\n${failures.join("\n")}`);
  }

  return { id: item.id, kind: "fanout", required: item.required, ok, causes, responses };
}
