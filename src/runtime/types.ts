import type { SessionPort } from "../router/router.js";
import type { AgentSession, Payload } from "../store/types.js";

export interface DirectiveContext {
  session: AgentSession;
  workdir: string | undefined;
  signal: AbortSignal;
}

/**
 * Executes one directive for a session. The returned payload is replied as a
 * `result`; a thrown error becomes an `error` reply; `null` sends nothing.
 */
export type DirectiveHandler = (directive: Payload, ctx: DirectiveContext) => Promise<Payload | null>;

export interface AgentRuntime {
  attach(session: AgentSession, port: SessionPort, workdir?: string): void;
  detach(sessionId: string): void;
  close(): Promise<void>;
}
