import { requireFlag, type ParsedArgs } from "../args.js";
import { formatSession } from "../format.js";
import { openWorkspace } from "../workspace.js";

export function run(args: ParsedArgs): number {
  const projectId = requireFlag(args, "project");
  const { store, logger } = openWorkspace(args);
  try {
    if (!store.loadProject(projectId)) {
      console.error(`Project not found: ${projectId}`);
      return 1;
    }
    const sessions = store.loadSessions(projectId);
    if (sessions.length === 0) {
      console.log("No sessions.");
      return 0;
    }
    for (const session of sessions) console.log(formatSession(session));
    return 0;
  } finally {
    logger.close();
  }
}
