import crypto from "crypto";
import { NotFound, TargetUnavailable } from "../core/errors.js";
import type { EngineBus } from "../core/events.js";
import { log } from "../core/logger.js";
import type { SessionRegistry } from "../sessions/registry.js";
import type { Store } from "../store/storage.js";
import type { Message, MessageKind, Payload } from "../store/types.js";

export const ORCHESTRATOR = "orchestrator";

export type ReplyKind = Exclude<MessageKind, "directive">;

/** A session's view of the router, handed to the runtime that serves it. */
export interface SessionPort {
  readonly sessionId: string;
  /** Drain directives waiting for this session, oldest first. */
  receive(): Message[];
  reply(payload: Payload, kind: ReplyKind, replyTo?: string): string;
}

export interface RouterOptions {
  deliveryTimeoutMs: number;
  bus?: EngineBus | undefined;
}

interface Mailbox {
  /** Directives addressed to the session, awaiting pickup by its runtime. */
  inbound: Message[];
  /** Acks, results and errors from the session, awaiting a poll. */
  outbound: Message[];
}

interface PendingAck {
  sessionId: string;
  message: Message;
  timer: NodeJS.Timeout;
}

/**
 * Asynchronous delivery between the orchestrator and agent sessions. `send`
 * only enqueues; consumers drain mailboxes with `poll` (orchestrator side) or
 * `receive` (runtime side). Each mailbox is touched only synchronously, so
 * operations on one session never interleave.
 */
export class MessageRouter {
  private mailboxes = new Map<string, Mailbox>();
  private pendingAcks = new Map<string, PendingAck>();

  constructor(
    private readonly registry: SessionRegistry,
    private readonly store: Store,
    private readonly options: RouterOptions,
  ) {}

  send(from: string, to: string, payload: Payload, kind: MessageKind, replyTo?: string): string {
    const message: Message = {
      id: crypto.randomBytes(6).toString("hex"),
      from,
      to,
      kind,
      payload: structuredClone(payload),
      sentAt: new Date().toISOString(),
      deliveredAt: null,
      ...(replyTo !== undefined ? { replyTo } : {}),
    };

    if (to !== ORCHESTRATOR) {
      const target = this.registry.peek(to);
      if (!target) throw new TargetUnavailable(to, "unknown");
      if (target.status === "terminated") throw new TargetUnavailable(to, "terminated");

      this.mailbox(to).inbound.push(message);
      this.store.appendMessageEvent(target.projectId, { type: "sent", message });
      if (kind === "directive") this.armDeliveryTimer(to, message);
      log.debug("router", `${kind} ${message.id} queued for ${to}`);
      return message.id;
    }

    // Replies travel on the sending session's outbound lane.
    const source = this.registry.getSession(from);
    this.mailbox(from).outbound.push(message);
    this.store.appendMessageEvent(source.projectId, { type: "sent", message });

    if (kind === "ack") {
      this.acknowledge(from, replyTo);
    } else if (kind === "result" || kind === "error") {
      this.registry.tryTransition(from, "idle");
    }
    return message.id;
  }

  /** Drain everything a session has sent to the orchestrator, FIFO. */
  poll(sessionId: string): Message[] {
    const session = this.registry.peek(sessionId);
    if (!session) throw new NotFound("session", sessionId);
    const box = this.mailboxes.get(sessionId);
    if (!box || box.outbound.length === 0) return [];

    const at = new Date().toISOString();
    const drained = box.outbound.splice(0).map((m) => ({ ...m, deliveredAt: at }));
    for (const m of drained) {
      this.store.appendMessageEvent(session.projectId, { type: "delivered", messageId: m.id, at });
    }
    return drained;
  }

  /** Drain directives waiting for a session. Terminated sessions receive nothing. */
  receive(sessionId: string): Message[] {
    const session = this.registry.peek(sessionId);
    if (!session || session.status === "terminated") return [];
    const box = this.mailboxes.get(sessionId);
    if (!box) return [];
    return box.inbound.splice(0).map((m) => ({ ...m }));
  }

  portFor(sessionId: string): SessionPort {
    return {
      sessionId,
      receive: () => this.receive(sessionId),
      reply: (payload, kind, replyTo) => this.send(sessionId, ORCHESTRATOR, payload, kind, replyTo),
    };
  }

  pending(sessionId: string): { inbound: number; outbound: number } {
    const box = this.mailboxes.get(sessionId);
    return { inbound: box?.inbound.length ?? 0, outbound: box?.outbound.length ?? 0 };
  }

  /** Forget a session's queues and delivery timers, e.g. after termination. */
  discard(sessionId: string): void {
    this.mailboxes.delete(sessionId);
    for (const [id, pending] of this.pendingAcks) {
      if (pending.sessionId === sessionId) {
        clearTimeout(pending.timer);
        this.pendingAcks.delete(id);
      }
    }
  }

  close(): void {
    for (const pending of this.pendingAcks.values()) {
      clearTimeout(pending.timer);
    }
    this.pendingAcks.clear();
  }

  private mailbox(sessionId: string): Mailbox {
    let box = this.mailboxes.get(sessionId);
    if (!box) {
      box = { inbound: [], outbound: [] };
      this.mailboxes.set(sessionId, box);
    }
    return box;
  }

  private armDeliveryTimer(sessionId: string, message: Message): void {
    const timeoutMs = this.options.deliveryTimeoutMs;
    const timer = setTimeout(() => this.expire(message.id), timeoutMs);
    this.pendingAcks.set(message.id, { sessionId, message, timer });
  }

  private acknowledge(sessionId: string, messageId: string | undefined): void {
    // A late ack still proves the session is reachable again.
    const status = this.registry.peek(sessionId)?.status;
    if (status === "created" || status === "unreachable") {
      this.registry.tryTransition(sessionId, "idle");
    }
    this.registry.tryTransition(sessionId, "busy");

    if (messageId === undefined) return;
    const pending = this.pendingAcks.get(messageId);
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pendingAcks.delete(messageId);

    const session = this.registry.peek(sessionId);
    if (session) {
      this.store.appendMessageEvent(session.projectId, {
        type: "delivered",
        messageId,
        at: new Date().toISOString(),
      });
    }
  }

  /** No ack within the delivery timeout: mark unreachable and tell the orchestrator. No retry. */
  private expire(messageId: string): void {
    const pending = this.pendingAcks.get(messageId);
    if (!pending) return;
    this.pendingAcks.delete(messageId);
    const { sessionId, message } = pending;
    const timeoutMs = this.options.deliveryTimeoutMs;

    const box = this.mailboxes.get(sessionId);
    if (box) {
      box.inbound = box.inbound.filter((m) => m.id !== messageId);
    }

    const session = this.registry.peek(sessionId);
    if (!session || session.status === "terminated") return;

    this.registry.tryTransition(sessionId, "unreachable");
    log.warn("router", `session ${sessionId} did not acknowledge ${message.id} within ${timeoutMs}ms`);

    const notice: Message = {
      id: crypto.randomBytes(6).toString("hex"),
      from: sessionId,
      to: ORCHESTRATOR,
      kind: "error",
      payload: { error: "SessionUnresponsive", messageId, timeoutMs },
      sentAt: new Date().toISOString(),
      deliveredAt: null,
      replyTo: messageId,
    };
    this.mailbox(sessionId).outbound.push(notice);
    this.store.appendMessageEvent(session.projectId, { type: "sent", message: notice });
    this.options.bus?.emit("router:undelivered", { sessionId, messageId, timeoutMs });
  }
}
