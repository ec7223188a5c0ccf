import { z } from "zod/v4";
import { PayloadSchema, type Payload } from "../store/types.js";

export const StrategySpecSchema = z.discriminatedUnion("handler", [
  z.object({
    handler: z.literal("claude"),
    model: z.enum(["sonnet", "opus", "haiku"]).optional(),
    maxTurns: z.number().int().positive().optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    handler: z.literal("shell"),
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    handler: z.literal("note"),
    text: z.string().optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
]);

/** A strategy as declared in workflows and config, before it is bound to a handler. */
export type StrategySpec = z.infer<typeof StrategySpecSchema>;
export type HandlerName = StrategySpec["handler"];

export interface StrategyContext {
  capability: string;
  projectId: string | undefined;
  workdir: string | undefined;
  timeoutMs: number;
  signal: AbortSignal;
}

/** One concrete way of performing a capability call. */
export interface Strategy {
  name: string;
  timeoutMs: number;
  run(input: Payload, ctx: StrategyContext): Promise<Payload>;
}

export interface InvokeOptions {
  projectId?: string | undefined;
  workdir?: string | undefined;
  tags?: string[] | undefined;
  signal?: AbortSignal | undefined;
}

export const StrategyAttemptSchema = z.object({
  index: z.number().int().nonnegative(),
  strategy: z.string(),
  ok: z.boolean(),
  error: z.string().optional(),
  durationMs: z.number().nonnegative(),
});
export type StrategyAttempt = z.infer<typeof StrategyAttemptSchema>;

export const ToolInvocationSchema = z.object({
  id: z.string(),
  projectId: z.string().optional(),
  capability: z.string(),
  tags: z.array(z.string()),
  input: PayloadSchema,
  attempts: z.array(StrategyAttemptSchema),
  outcome: z.enum(["success", "all-failed"]),
  output: PayloadSchema.optional(),
  error: z.string().optional(),
  startedAt: z.string(),
  durationMs: z.number().nonnegative(),
});
export type ToolInvocation = z.infer<typeof ToolInvocationSchema>;
