export type {
  Engine,
  EngineOptions,
  EngineResult,
  Model,
} from "./types.js";

export { createClaudeEngine, claudeEngine, EngineError } from "./claude.js";
