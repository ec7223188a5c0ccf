import { createOrchestrator } from "../../orchestrator/index.js";
import { requireFlag, type ParsedArgs } from "../args.js";
import { openWorkspace } from "../workspace.js";

export async function run(args: ParsedArgs): Promise<number> {
  const projectId = requireFlag(args, "project");
  const ws = openWorkspace(args);
  const orchestrator = createOrchestrator({ store: ws.store, config: ws.config });
  try {
    const project = orchestrator.reset(projectId);
    console.log(`Project ${project.id} reset; ${project.phases.length} phases pending.`);
    return 0;
  } finally {
    await orchestrator.shutdown();
    ws.logger.close();
  }
}
