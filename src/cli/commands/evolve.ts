import { createOrchestrator } from "../../orchestrator/index.js";
import { requireFlag, type ParsedArgs } from "../args.js";
import { openWorkspace } from "../workspace.js";

export async function run(args: ParsedArgs): Promise<number> {
  const projectId = requireFlag(args, "project");
  const ws = openWorkspace(args);
  const orchestrator = createOrchestrator({ store: ws.store, config: ws.config });
  try {
    const cycle = await orchestrator.runEvolutionCycle(projectId);
    console.log(cycle.summary);
    return 0;
  } finally {
    await orchestrator.shutdown();
    ws.logger.close();
  }
}
