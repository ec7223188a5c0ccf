import { EventEmitter } from "events";
import type { PhaseStatus, ProjectStatus, EvolutionCycle, SessionStatus } from "../store/types.js";
import type { ToolInvocation } from "../gateway/types.js";

export interface EngineEvents {
  "project:status": [payload: {
    projectId: string;
    status: ProjectStatus;
  }];
  "phase:transition": [payload: {
    projectId: string;
    index: number;
    name: string;
    status: PhaseStatus;
    cause?: string[] | undefined;
  }];
  "gateway:invocation": [payload: ToolInvocation];
  "session:status": [payload: {
    sessionId: string;
    projectId: string;
    from: SessionStatus;
    to: SessionStatus;
  }];
  "router:undelivered": [payload: {
    sessionId: string;
    messageId: string;
    timeoutMs: number;
  }];
  "evolution:cycle": [payload: EvolutionCycle];
  "evolution:skipped": [payload: {
    projectId: string;
    missed: number;
  }];
  "evolution:stopped": [payload: {
    projectId: string;
  }];
}

export class TypedEmitter extends EventEmitter {
  emit<K extends keyof EngineEvents>(event: K, ...args: EngineEvents[K]): boolean {
    return super.emit(event, ...args);
  }
  on<K extends keyof EngineEvents>(event: K, listener: (...args: EngineEvents[K]) => void): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }
  off<K extends keyof EngineEvents>(event: K, listener: (...args: EngineEvents[K]) => void): this {
    return super.off(event, listener as (...args: unknown[]) => void);
  }
}

export type EngineBus = TypedEmitter;

export function createEngineBus(): EngineBus {
  return new TypedEmitter();
}
