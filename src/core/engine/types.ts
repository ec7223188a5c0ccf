export type Model = "sonnet" | "opus" | "haiku";

export interface EngineResult {
  text: string;
  sessionId?: string | undefined;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    cacheReadTokens: number;
    costUsd: number;
    durationMs: number;
    turns: number;
  } | undefined;
}

export interface EngineOptions {
  cwd?: string | undefined;
  systemPrompt?: string | undefined;
  model?: Model | undefined;
  maxTurns?: number | undefined;
}

export interface Engine {
  run(
    message: string,
    options: EngineOptions,
    abortController?: AbortController,
  ): Promise<EngineResult>;
}
