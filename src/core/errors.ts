export type ErrorCode =
  | "STRATEGY_FAILURE"
  | "ALL_STRATEGIES_EXHAUSTED"
  | "TARGET_UNAVAILABLE"
  | "SESSION_UNRESPONSIVE"
  | "PHASE_FAILED"
  | "ALREADY_SCHEDULED"
  | "NOT_FOUND"
  | "INVALID_TRANSITION";

export abstract class OrchestratorError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One fallback strategy failed. The gateway moves on to the next one. */
export class StrategyFailure extends OrchestratorError {
  readonly code = "STRATEGY_FAILURE";

  constructor(
    readonly capability: string,
    readonly strategyIndex: number,
    readonly strategyName: string,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${capability}: strategy #${strategyIndex} (${strategyName}) failed: ${reason}`, options);
  }
}

export class AllStrategiesExhausted extends OrchestratorError {
  readonly code = "ALL_STRATEGIES_EXHAUSTED";

  constructor(readonly capability: string, readonly failures: StrategyFailure[]) {
    super(`${capability}: all ${failures.length} strategies failed`);
  }
}

export class TargetUnavailable extends OrchestratorError {
  readonly code = "TARGET_UNAVAILABLE";

  constructor(readonly target: string, readonly reason: "unknown" | "terminated") {
    super(`target ${target} is unavailable (${reason})`);
  }
}

export class SessionUnresponsive extends OrchestratorError {
  readonly code = "SESSION_UNRESPONSIVE";

  constructor(readonly sessionId: string, readonly timeoutMs: number) {
    super(`session ${sessionId} did not respond within ${timeoutMs}ms`);
  }
}

export class PhaseFailed extends OrchestratorError {
  readonly code = "PHASE_FAILED";

  constructor(
    readonly projectId: string,
    readonly phaseIndex: number,
    readonly phaseName: string,
    readonly causes: string[],
  ) {
    super(`phase ${phaseIndex + 1} (${phaseName}) failed: ${causes[0] ?? "unknown cause"}`);
  }
}

export class AlreadyScheduled extends OrchestratorError {
  readonly code = "ALREADY_SCHEDULED";

  constructor(readonly projectId: string) {
    super(`project ${projectId} already has an active evolution schedule`);
  }
}

export class NotFound extends OrchestratorError {
  readonly code = "NOT_FOUND";

  constructor(readonly kind: string, readonly id: string) {
    super(`${kind} not found: ${id}`);
  }
}

export class InvalidTransition extends OrchestratorError {
  readonly code = "INVALID_TRANSITION";
}

/**
 * Flatten an error into ordered cause lines, outermost first. Exhausted
 * invocations expand into one line per attempted strategy.
 */
export function describeCause(err: unknown): string[] {
  if (err instanceof AllStrategiesExhausted) {
    return [err.message, ...err.failures.map((f) => `  ${f.message}`)];
  }
  if (err instanceof PhaseFailed) {
    return [...err.causes];
  }
  if (err instanceof Error) {
    const lines = [err.message];
    if (err.cause !== undefined && !(err instanceof OrchestratorError)) {
      lines.push(...describeCause(err.cause).map((l) => `  caused by: ${l}`));
    }
    return lines;
  }
  return [String(err)];
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
