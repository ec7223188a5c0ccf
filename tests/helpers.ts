import fs from "fs";
import os from "os";
import path from "path";
import { defineConfig, type EngineConfig, type EngineConfigInput } from "../src/core/config.js";
import type { Strategy } from "../src/gateway/types.js";
import type { HandlerRegistry } from "../src/gateway/handlers.js";
import { emptyPhase } from "../src/phases/machine.js";
import type { EvolutionCycle, Payload, Project } from "../src/store/types.js";

export function tempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `phaseloop-${prefix}-`));
}

export function makeProject(id: string, phaseNames: string[], overrides: Partial<Project> = {}): Project {
  return {
    id,
    name: id,
    mode: "genesis",
    workdir: "/tmp/work",
    status: "running",
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    completedAt: null,
    failure: null,
    phases: phaseNames.map((name, i) => emptyPhase(i, name)),
    ...overrides,
  };
}

export function makeCycle(projectId: string, sequence: number): EvolutionCycle {
  return {
    projectId,
    sequence,
    manual: false,
    scheduledAt: null,
    startedAt: "2026-01-01T00:00:00.000Z",
    completedAt: "2026-01-01T00:00:01.000Z",
    nextScheduledAt: null,
    outcome: {
      invocations: { succeeded: 0, failed: 0 },
      sessions: { addressed: 0, responded: 0, errored: 0, unresponsive: 0, unavailable: 0 },
    },
    summary: `cycle #${sequence}`,
  };
}

export function testConfig(input: EngineConfigInput = {}): EngineConfig {
  return defineConfig({
    deliveryTimeoutMs: 1000,
    ...input,
    phases: { timeoutMs: 2000, pollIntervalMs: 5, ...input.phases },
    runtime: { handler: "echo", pollIntervalMs: 5, ...input.runtime },
  });
}

export function okStrategy(name: string, output: Payload = `${name} ok`): Strategy {
  return { name, timeoutMs: 1000, run: async () => output };
}

export function failingStrategy(name: string, reason = `${name} broke`): Strategy {
  return {
    name,
    timeoutMs: 1000,
    run: async () => {
      throw new Error(reason);
    },
  };
}

/**
 * Handler registry whose strategies are decided per capability by `pick`.
 * Capabilities `pick` does not know succeed.
 */
export function stubHandlers(pick: (capability: string) => Strategy[] | undefined = () => undefined): HandlerRegistry & {
  calls: string[];
} {
  const calls: string[] = [];
  return {
    calls,
    resolve(specs) {
      return specs.map((spec, i) => ({
        name: `stub:${spec.handler}`,
        timeoutMs: 1000,
        async run(input, ctx) {
          calls.push(ctx.capability);
          const chosen = pick(ctx.capability);
          const strategy = chosen?.[i] ?? chosen?.[chosen.length - 1];
          return strategy ? strategy.run(input, ctx) : `${ctx.capability} done`;
        },
      }));
    },
    register() {},
  };
}
