import crypto from "crypto";
import { query, type SettingSource } from "@anthropic-ai/claude-agent-sdk";
import { log } from "../logger.js";
import type { Engine, EngineOptions, EngineResult } from "./types.js";

/** Generate a short random run ID for log correlation */
function runId(): string {
  return crypto.randomBytes(3).toString("hex");
}

export class EngineError extends Error {
  constructor(readonly subtype: string, message: string) {
    super(message);
    this.name = "EngineError";
  }
}

async function execQuery(
  message: string,
  options: EngineOptions,
  abortController: AbortController | undefined,
): Promise<EngineResult> {
  const tag = `engine:${runId()}`;
  log.info(tag, `running${options.cwd ? ` in ${options.cwd}` : ""}`);

  const settingSources: SettingSource[] = ["project"];
  const queryOptions = {
    ...(options.cwd ? { cwd: options.cwd } : {}),
    ...(options.systemPrompt ? { systemPrompt: options.systemPrompt } : {}),
    model: options.model ?? "sonnet",
    ...(options.maxTurns ? { maxTurns: options.maxTurns } : {}),
    settingSources,
  };

  log.debug(tag, "options", JSON.stringify({
    ...queryOptions,
    ...(queryOptions.systemPrompt ? { systemPrompt: "[omitted]" } : {}),
  }));

  const result = query({
    prompt: message,
    options: {
      ...queryOptions,
      ...(abortController ? { abortController } : {}),
    },
  });

  let responseText = "";
  let resultSessionId: string | undefined;
  let resultUsage: EngineResult["usage"];

  for await (const event of result) {
    log.debug(tag, `event: ${event.type}${("subtype" in event && event.subtype) ? `:${event.subtype}` : ""}`);

    if (event.type === "assistant") {
      resultSessionId = event.session_id;
      for (const block of event.message.content) {
        if (block.type === "text" && block.text.trim()) {
          responseText = block.text;
        }
      }
    } else if (event.type === "result" && event.subtype === "success") {
      responseText = event.result;
      resultSessionId = event.session_id;
      log.info(tag, `done, session: ${resultSessionId}, cost: $${event.total_cost_usd}, duration: ${event.duration_ms}ms, turns: ${event.num_turns}`);
      resultUsage = {
        inputTokens: event.usage.input_tokens ?? 0,
        outputTokens: event.usage.output_tokens ?? 0,
        cacheReadTokens: event.usage.cache_read_input_tokens ?? 0,
        costUsd: event.total_cost_usd ?? 0,
        durationMs: event.duration_ms,
        turns: event.num_turns,
      };
    } else if (event.type === "result") {
      log.error(tag, `${event.subtype} after ${event.num_turns} turn(s)`);
      throw new EngineError(event.subtype, `engine run ended with ${event.subtype}`);
    }
  }

  if (abortController?.signal.aborted) {
    log.info(tag, "aborted by caller");
    return { text: "", sessionId: resultSessionId, usage: resultUsage };
  }

  return { text: responseText.trim(), sessionId: resultSessionId, usage: resultUsage };
}

export function createClaudeEngine(): Engine {
  return {
    run(message, options, abortController) {
      return execQuery(message, options, abortController);
    },
  };
}

export const claudeEngine = createClaudeEngine();
