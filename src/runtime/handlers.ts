import type { Engine, Model } from "../core/engine/index.js";
import { payloadText } from "../gateway/handlers.js";
import { getRoleSystemPrompt } from "./prompts.js";
import type { DirectiveHandler } from "./types.js";

export function createClaudeDirectiveHandler(engine: Engine, model: Model): DirectiveHandler {
  return async (directive, ctx) => {
    const abortController = new AbortController();
    ctx.signal.addEventListener("abort", () => abortController.abort(), { once: true });
    const result = await engine.run(
      payloadText(directive),
      {
        cwd: ctx.workdir,
        systemPrompt: getRoleSystemPrompt(ctx.session.role),
        model,
      },
      abortController,
    );
    return { role: ctx.session.role, text: result.text };
  };
}

/** Replies with the directive itself. Used for dry runs without an agent backend. */
export const echoDirectiveHandler: DirectiveHandler = async (directive, ctx) => {
  return { role: ctx.session.role, echo: directive };
};
