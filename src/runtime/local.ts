import { withLock } from "../core/lock.js";
import { errorMessage } from "../core/errors.js";
import { log } from "../core/logger.js";
import type { SessionPort } from "../router/router.js";
import type { AgentSession, Message } from "../store/types.js";
import type { AgentRuntime, DirectiveHandler } from "./types.js";

interface Attached {
  session: AgentSession;
  port: SessionPort;
  workdir: string | undefined;
  timer: NodeJS.Timeout;
  abortController: AbortController;
  inFlight: Promise<void> | null;
}

export interface LocalRuntimeOptions {
  pollIntervalMs: number;
}

/**
 * In-process runtime: each attached session polls its own mailbox on a timer
 * and works through directives one at a time.
 */
export class LocalAgentRuntime implements AgentRuntime {
  private attached = new Map<string, Attached>();

  constructor(
    private readonly handler: DirectiveHandler,
    private readonly options: LocalRuntimeOptions,
  ) {}

  attach(session: AgentSession, port: SessionPort, workdir?: string): void {
    if (this.attached.has(session.id)) return;
    const entry: Attached = {
      session,
      port,
      workdir,
      abortController: new AbortController(),
      inFlight: null,
      timer: setInterval(() => this.tick(session.id), this.options.pollIntervalMs),
    };
    this.attached.set(session.id, entry);
    log.debug("runtime", `attached ${session.id} (role: ${session.role})`);
  }

  detach(sessionId: string): void {
    const entry = this.attached.get(sessionId);
    if (!entry) return;
    clearInterval(entry.timer);
    entry.abortController.abort();
    this.attached.delete(sessionId);
    log.debug("runtime", `detached ${sessionId}`);
  }

  async close(): Promise<void> {
    const inFlight = [...this.attached.values()]
      .map((e) => e.inFlight)
      .filter((p): p is Promise<void> => p !== null);
    for (const id of [...this.attached.keys()]) {
      this.detach(id);
    }
    await Promise.allSettled(inFlight);
  }

  private tick(sessionId: string): void {
    const entry = this.attached.get(sessionId);
    if (!entry || entry.inFlight) return;

    const directives = entry.port.receive().filter((m) => m.kind === "directive");
    if (directives.length === 0) return;

    const work = withLock(`runtime:${sessionId}`, async () => {
      for (const directive of directives) {
        if (entry.abortController.signal.aborted) return;
        await this.process(entry, directive);
      }
    });
    entry.inFlight = work
      .catch((err) => log.warn("runtime", `session ${sessionId} stopped processing:`, err))
      .finally(() => {
        entry.inFlight = null;
      });
  }

  private async process(entry: Attached, directive: Message): Promise<void> {
    const { port, session } = entry;
    port.reply({ ack: directive.id }, "ack", directive.id);
    try {
      const result = await this.handler(directive.payload, {
        session,
        workdir: entry.workdir,
        signal: entry.abortController.signal,
      });
      if (entry.abortController.signal.aborted) return;
      if (result !== null) {
        port.reply(result, "result", directive.id);
      }
    } catch (err) {
      if (entry.abortController.signal.aborted) return;
      log.warn("runtime", `session ${session.id} failed directive ${directive.id}:`, err);
      port.reply({ error: errorMessage(err) }, "error", directive.id);
    }
  }
}
