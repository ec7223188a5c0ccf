import crypto from "crypto";
import { AllStrategiesExhausted, StrategyFailure, errorMessage } from "../core/errors.js";
import { log } from "../core/logger.js";
import type { Payload } from "../store/types.js";
import { InvocationLog } from "./invocation-log.js";
import type { InvokeOptions, Strategy, StrategyAttempt, ToolInvocation } from "./types.js";

class StrategyTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "StrategyTimeout";
  }
}

/**
 * Run one strategy bounded by its own timeout. The strategy's signal fires on
 * timeout or when the caller aborts, whichever comes first.
 */
async function runBounded(
  strategy: Strategy,
  input: Payload,
  capability: string,
  opts: InvokeOptions,
): Promise<Payload> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(opts.signal?.reason);
  opts.signal?.addEventListener("abort", onAbort, { once: true });

  const stopped = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => {
      const reason: unknown = controller.signal.reason;
      reject(reason instanceof Error ? reason : new Error("aborted"));
    }, { once: true });
  });
  // Whichever promise loses the race may still reject later; keep it observed.
  stopped.catch(() => {});
  const timer = setTimeout(() => controller.abort(new StrategyTimeout(strategy.timeoutMs)), strategy.timeoutMs);

  try {
    const run = strategy.run(structuredClone(input), {
      capability,
      projectId: opts.projectId,
      workdir: opts.workdir,
      timeoutMs: strategy.timeoutMs,
      signal: controller.signal,
    });
    run.catch(() => {});
    return structuredClone(await Promise.race([run, stopped]));
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onAbort);
  }
}

export class ToolGateway {
  readonly invocations: InvocationLog;

  constructor(invocations: InvocationLog = new InvocationLog()) {
    this.invocations = invocations;
  }

  /**
   * Try each strategy in order until one succeeds. Every call, successful or
   * not, is appended to the invocation log before this returns.
   */
  async invoke(
    capability: string,
    input: Payload,
    strategies: Strategy[],
    opts: InvokeOptions = {},
  ): Promise<Payload> {
    if (strategies.length === 0) {
      throw new RangeError(`${capability}: at least one strategy is required`);
    }

    const startedAt = new Date();
    const attempts: StrategyAttempt[] = [];
    const failures: StrategyFailure[] = [];

    const record = (outcome: ToolInvocation["outcome"], result: { output?: Payload; error?: string }) => {
      this.invocations.append({
        id: crypto.randomBytes(6).toString("hex"),
        ...(opts.projectId !== undefined ? { projectId: opts.projectId } : {}),
        capability,
        tags: opts.tags ?? [],
        input,
        attempts,
        outcome,
        ...result,
        startedAt: startedAt.toISOString(),
        durationMs: Date.now() - startedAt.getTime(),
      });
    };

    for (const [index, strategy] of strategies.entries()) {
      if (opts.signal?.aborted) {
        failures.push(new StrategyFailure(capability, index, strategy.name, "cancelled"));
        break;
      }

      const began = Date.now();
      try {
        const output = await runBounded(strategy, input, capability, opts);
        attempts.push({ index, strategy: strategy.name, ok: true, durationMs: Date.now() - began });
        if (index > 0) {
          log.info("gateway", `${capability}: fallback strategy #${index} (${strategy.name}) succeeded`);
        }
        record("success", { output });
        return output;
      } catch (err) {
        const reason = errorMessage(err);
        const failure = new StrategyFailure(capability, index, strategy.name, reason, { cause: err });
        attempts.push({ index, strategy: strategy.name, ok: false, error: reason, durationMs: Date.now() - began });
        failures.push(failure);
        log.warn("gateway", failure.message);
      }
    }

    const exhausted = new AllStrategiesExhausted(capability, failures);
    record("all-failed", { error: exhausted.message });
    log.warn("gateway", exhausted.message);
    throw exhausted;
  }
}
