import { requireFlag, type ParsedArgs } from "../args.js";
import { formatStatus } from "../format.js";
import { openWorkspace } from "../workspace.js";

export function run(args: ParsedArgs): number {
  const projectId = requireFlag(args, "project");
  const { store, logger } = openWorkspace(args);
  try {
    const project = store.loadProject(projectId);
    if (!project) {
      console.error(`Project not found: ${projectId}`);
      return 1;
    }
    for (const line of formatStatus(project, store.loadSchedule(projectId))) {
      console.log(line);
    }
    return 0;
  } finally {
    logger.close();
  }
}
