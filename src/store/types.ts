import { z } from "zod/v4";

export const ProjectModeSchema = z.enum(["genesis", "phoenix", "saas"]);
export type ProjectMode = z.infer<typeof ProjectModeSchema>;

export const ProjectStatusSchema = z.enum(["running", "completed", "failed"]);
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;

export const PhaseStatusSchema = z.enum(["pending", "running", "completed", "failed"]);
export type PhaseStatus = z.infer<typeof PhaseStatusSchema>;

export const SessionStatusSchema = z.enum(["created", "idle", "busy", "unreachable", "terminated"]);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const MessageKindSchema = z.enum(["directive", "ack", "result", "error"]);
export type MessageKind = z.infer<typeof MessageKindSchema>;

/** Opaque text or structured blob. Always passed by value across boundaries. */
export const PayloadSchema = z.union([z.string(), z.record(z.string(), z.unknown())]);
export type Payload = z.infer<typeof PayloadSchema>;

export const SessionResponseSchema = z.object({
  sessionId: z.string(),
  role: z.string(),
  outcome: z.enum(["result", "error", "failed-to-respond", "unavailable"]),
  payload: PayloadSchema.optional(),
});
export type SessionResponse = z.infer<typeof SessionResponseSchema>;

export const ItemOutcomeSchema = z.object({
  id: z.string(),
  kind: z.enum(["invoke", "fanout"]),
  required: z.boolean(),
  ok: z.boolean(),
  causes: z.array(z.string()),
  output: PayloadSchema.optional(),
  responses: z.array(SessionResponseSchema).optional(),
});
export type ItemOutcome = z.infer<typeof ItemOutcomeSchema>;

export const PhaseRecordSchema = z.object({
  index: z.number().int().nonnegative(),
  name: z.string(),
  status: PhaseStatusSchema,
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  failedAt: z.string().nullable(),
  cause: z.array(z.string()).nullable(),
  items: z.array(ItemOutcomeSchema),
});
export type PhaseRecord = z.infer<typeof PhaseRecordSchema>;

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  mode: ProjectModeSchema,
  workdir: z.string(),
  status: ProjectStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  completedAt: z.string().nullable(),
  failure: z.object({
    phaseIndex: z.number().int().nonnegative(),
    phaseName: z.string(),
    cause: z.array(z.string()),
  }).nullable(),
  phases: z.array(PhaseRecordSchema),
});
export type Project = z.infer<typeof ProjectSchema>;

export const TransitionSchema = z.object({
  at: z.string(),
  scope: z.enum(["project", "phase"]),
  phaseIndex: z.number().int().nonnegative().optional(),
  phaseName: z.string().optional(),
  from: z.string(),
  to: z.string(),
  cause: z.array(z.string()).optional(),
});
export type Transition = z.infer<typeof TransitionSchema>;

export const AgentSessionSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  role: z.string(),
  status: SessionStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  terminatedAt: z.string().nullable(),
});
export type AgentSession = z.infer<typeof AgentSessionSchema>;

export const MessageSchema = z.object({
  id: z.string(),
  from: z.string(),
  to: z.string(),
  kind: MessageKindSchema,
  payload: PayloadSchema,
  sentAt: z.string(),
  deliveredAt: z.string().nullable(),
  replyTo: z.string().optional(),
});
export type Message = z.infer<typeof MessageSchema>;

export const MessageEventSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("sent"), message: MessageSchema }),
  z.object({ type: z.literal("delivered"), messageId: z.string(), at: z.string() }),
]);
export type MessageEvent = z.infer<typeof MessageEventSchema>;

export const CycleOutcomeSchema = z.object({
  invocations: z.object({
    succeeded: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
  }),
  sessions: z.object({
    addressed: z.number().int().nonnegative(),
    responded: z.number().int().nonnegative(),
    errored: z.number().int().nonnegative(),
    unresponsive: z.number().int().nonnegative(),
    unavailable: z.number().int().nonnegative(),
  }),
});
export type CycleOutcome = z.infer<typeof CycleOutcomeSchema>;

export const EvolutionCycleSchema = z.object({
  projectId: z.string(),
  sequence: z.number().int().positive(),
  manual: z.boolean(),
  scheduledAt: z.string().nullable(),
  startedAt: z.string(),
  completedAt: z.string(),
  nextScheduledAt: z.string().nullable(),
  outcome: CycleOutcomeSchema,
  summary: z.string(),
});
export type EvolutionCycle = z.infer<typeof EvolutionCycleSchema>;

export const CadenceSchema = z.union([
  z.object({ intervalMs: z.number().int().positive() }),
  z.object({ cron: z.string(), tz: z.string().optional() }),
]);
export type Cadence = z.infer<typeof CadenceSchema>;

export const ScheduleSchema = z.object({
  projectId: z.string(),
  active: z.boolean(),
  cadence: CadenceSchema,
  startedAt: z.string(),
  stoppedAt: z.string().nullable(),
  nextAt: z.string().nullable(),
  lastCycleAt: z.string().nullable(),
  ownerPid: z.number().int().nullable(),
});
export type Schedule = z.infer<typeof ScheduleSchema>;

export const ManualActionSchema = z.object({
  capability: z.string(),
  input: PayloadSchema,
  text: z.string(),
  at: z.string(),
});
export type ManualAction = z.infer<typeof ManualActionSchema>;
