import { execFile } from "child_process";
import type { Engine } from "../core/engine/index.js";
import type { Payload } from "../store/types.js";
import type { Store } from "../store/storage.js";
import { getCapabilityPrompt } from "./prompts.js";
import type { HandlerName, Strategy, StrategySpec } from "./types.js";

export function payloadText(payload: Payload): string {
  return typeof payload === "string" ? payload : JSON.stringify(payload);
}

export interface HandlerDeps {
  engine: Engine;
  store: Store;
  defaultTimeoutMs: number;
}

type StrategyFactory<S extends StrategySpec = StrategySpec> = (spec: S, deps: HandlerDeps) => Strategy;

const claudeStrategy: StrategyFactory<Extract<StrategySpec, { handler: "claude" }>> = (spec, deps) => ({
  name: spec.model ? `claude:${spec.model}` : "claude",
  timeoutMs: spec.timeoutMs ?? deps.defaultTimeoutMs,
  async run(input, ctx) {
    const abortController = new AbortController();
    ctx.signal.addEventListener("abort", () => abortController.abort(), { once: true });
    const result = await deps.engine.run(
      getCapabilityPrompt(ctx.capability, payloadText(input)),
      {
        cwd: ctx.workdir,
        ...(spec.model ? { model: spec.model } : {}),
        ...(spec.maxTurns ? { maxTurns: spec.maxTurns } : {}),
      },
      abortController,
    );
    if (!result.text) throw new Error("engine returned an empty response");
    return result.text;
  },
});

const shellStrategy: StrategyFactory<Extract<StrategySpec, { handler: "shell" }>> = (spec, deps) => ({
  name: `shell:${spec.command}`,
  timeoutMs: spec.timeoutMs ?? deps.defaultTimeoutMs,
  run(input, ctx) {
    const text = payloadText(input);
    const args = (spec.args ?? []).map((a) => a.split("{input}").join(text));
    return new Promise<Payload>((resolve, reject) => {
      execFile(
        spec.command,
        args,
        { cwd: ctx.workdir, timeout: ctx.timeoutMs, signal: ctx.signal, maxBuffer: 10 * 1024 * 1024 },
        (err, stdout, stderr) => {
          if (err) {
            const detail = String(stderr).trim();
            reject(new Error(detail ? `${err.message}: ${detail}` : err.message, { cause: err }));
            return;
          }
          resolve(String(stdout).trim());
        },
      );
    });
  },
});

/** Manual fallback: record the capability as a follow-up for a human and succeed. */
const noteStrategy: StrategyFactory<Extract<StrategySpec, { handler: "note" }>> = (spec, deps) => ({
  name: "note",
  timeoutMs: spec.timeoutMs ?? deps.defaultTimeoutMs,
  async run(input, ctx) {
    if (!ctx.projectId) throw new Error("note strategy needs a project");
    deps.store.appendManualAction(ctx.projectId, {
      capability: ctx.capability,
      input,
      text: spec.text ?? `Run ${ctx.capability} manually`,
      at: new Date().toISOString(),
    });
    return `manual follow-up recorded: ${ctx.capability}`;
  },
});

export interface HandlerRegistry {
  resolve(specs: StrategySpec[]): Strategy[];
  /** Replace a built-in handler, e.g. with a stub in dry runs. */
  register(name: HandlerName, factory: (spec: StrategySpec) => Strategy): void;
}

export function createHandlerRegistry(deps: HandlerDeps): HandlerRegistry {
  const custom = new Map<HandlerName, (spec: StrategySpec) => Strategy>();

  function resolveOne(spec: StrategySpec): Strategy {
    const override = custom.get(spec.handler);
    if (override) return override(spec);
    switch (spec.handler) {
      case "claude":
        return claudeStrategy(spec, deps);
      case "shell":
        return shellStrategy(spec, deps);
      case "note":
        return noteStrategy(spec, deps);
    }
  }

  return {
    resolve(specs) {
      return specs.map(resolveOne);
    },
    register(name, factory) {
      custom.set(name, factory);
    },
  };
}
