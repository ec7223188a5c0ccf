import type { ToolInvocation } from "./types.js";

export type InvocationSink = (invocation: ToolInvocation) => void;

/**
 * Append-only audit of every gateway call. Entries are frozen copies; sinks
 * (persistence, event bus) run in registration order on each append.
 */
export class InvocationLog {
  private entries: ToolInvocation[] = [];
  private sinks: InvocationSink[] = [];

  constructor(private readonly maxEntries = 1000) {}

  onAppend(sink: InvocationSink): () => void {
    this.sinks.push(sink);
    return () => {
      this.sinks = this.sinks.filter((s) => s !== sink);
    };
  }

  append(invocation: ToolInvocation): void {
    const entry = Object.freeze(structuredClone(invocation));
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }
    for (const sink of this.sinks) {
      sink(entry);
    }
  }

  list(filter?: { projectId?: string; capability?: string }): ToolInvocation[] {
    return this.entries.filter((e) =>
      (filter?.projectId === undefined || e.projectId === filter.projectId) &&
      (filter?.capability === undefined || e.capability === filter.capability),
    );
  }

  get size(): number {
    return this.entries.length;
  }
}
