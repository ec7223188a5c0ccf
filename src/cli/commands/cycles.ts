import { requireFlag, type ParsedArgs } from "../args.js";
import { formatCycle } from "../format.js";
import { openWorkspace } from "../workspace.js";

export function run(args: ParsedArgs): number {
  const projectId = requireFlag(args, "project");
  const { store, logger } = openWorkspace(args);
  try {
    if (!store.loadProject(projectId)) {
      console.error(`Project not found: ${projectId}`);
      return 1;
    }
    const cycles = store.loadCycles(projectId);
    if (cycles.length === 0) {
      console.log("No evolution cycles recorded.");
      return 0;
    }
    for (const cycle of cycles) console.log(formatCycle(cycle));
    return 0;
  } finally {
    logger.close();
  }
}
