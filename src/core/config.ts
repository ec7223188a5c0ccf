import fs from "fs";
import path from "path";
import { z } from "zod/v4";
import { StrategySpecSchema } from "../gateway/types.js";
import { safeParseJsonFile } from "./json.js";

export const CONFIG_FILE = "phaseloop.json";

const GatewayConfigSchema = z.object({
  defaultTimeoutMs: z.number().int().positive().default(120_000),
  defaultStrategies: z.array(StrategySpecSchema).min(1).default([{ handler: "claude" }, { handler: "note" }]),
});

const PhasesConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(600_000),
  pollIntervalMs: z.number().int().positive().default(250),
});

const EvolutionConfigSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.number().int().positive().default(30 * 60_000),
  cron: z.string().optional(),
  tz: z.string().optional(),
  historyLimit: z.number().int().positive().default(100),
  timeoutMs: z.number().int().positive().default(5 * 60_000),
});

const RuntimeConfigSchema = z.object({
  handler: z.enum(["claude", "echo"]).default("claude"),
  model: z.enum(["sonnet", "opus", "haiku"]).default("sonnet"),
  pollIntervalMs: z.number().int().positive().default(250),
});

export const EngineConfigSchema = z.object({
  /** How long a session has to acknowledge a directive before it is marked unreachable. */
  deliveryTimeoutMs: z.number().int().positive().default(30_000),
  gateway: GatewayConfigSchema.default(() => GatewayConfigSchema.parse({})),
  phases: PhasesConfigSchema.default(() => PhasesConfigSchema.parse({})),
  evolution: EvolutionConfigSchema.default(() => EvolutionConfigSchema.parse({})),
  runtime: RuntimeConfigSchema.default(() => RuntimeConfigSchema.parse({})),
  /** Per-capability strategy lists, replacing the workflow defaults. */
  capabilities: z.record(z.string(), z.array(StrategySpecSchema).min(1)).default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export function defineConfig(input: EngineConfigInput = {}): EngineConfig {
  return EngineConfigSchema.parse(input);
}

export class ConfigError extends Error {
  constructor(readonly filePath: string, readonly issues: string[]) {
    super(`invalid config ${filePath}:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/** Load `<workspace>/phaseloop.json`; a missing file means all defaults. */
export function loadEngineConfig(workspaceDir: string): EngineConfig {
  const filePath = path.join(workspaceDir, CONFIG_FILE);
  if (!fs.existsSync(filePath)) return defineConfig();

  const raw = safeParseJsonFile(filePath, CONFIG_FILE);
  if (raw === null) throw new ConfigError(filePath, ["file is not valid JSON"]);

  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      filePath,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  return result.data;
}
