import type { StrategySpec } from "../gateway/types.js";
import type { Payload } from "../store/types.js";

/**
 * How many fan-out sessions must return a `result` for the item to pass.
 * Conflicting results are not reconciled; only the count of results is weighed.
 */
export type PassPolicy = "all" | "majority" | "any";

export interface InvokeItem {
  kind: "invoke";
  id: string;
  capability: string;
  input: Payload;
  /** Falls back to the configured default strategies when omitted. */
  strategies?: StrategySpec[] | undefined;
  required: boolean;
  tags?: string[] | undefined;
}

export interface FanOutTarget {
  role: string;
  directive: Payload;
}

export interface FanOutItem {
  kind: "fanout";
  id: string;
  targets: FanOutTarget[];
  required: boolean;
  /** Overrides the phase policy for this item. */
  policy?: PassPolicy | undefined;
  /** Address live sessions with the same role instead of creating new ones. */
  reuseSessions?: boolean | undefined;
}

export type WorkItem = InvokeItem | FanOutItem;

export interface PhaseDefinition {
  name: string;
  policy?: PassPolicy | undefined;
  /** Upper bound on how long fan-out items in this phase wait for responses. */
  timeoutMs?: number | undefined;
  items: WorkItem[];
}

export interface Workflow {
  name: string;
  phases: PhaseDefinition[];
  /** Gateway calls run by every evolution cycle, tagged "refresh". */
  refresh: InvokeItem[];
  /** Status/update directive fanned out to live sessions by every evolution cycle. */
  evolutionDirective(role: string, sequence: number): Payload;
}
