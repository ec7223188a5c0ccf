import type { InvokeItem, PhaseDefinition, Workflow } from "../phases/types.js";
import type { ProjectMode } from "../store/types.js";
import { getEvolutionPrompt, getResearchFocus, getRolePrompt, getStrategyPrompt } from "./prompts.js";

export interface WorkflowProject {
  name: string;
  mode: ProjectMode;
}

function invoke(id: string, input: string, required: boolean, tags?: string[]): InvokeItem {
  return { kind: "invoke", id, capability: id, input, required, ...(tags ? { tags } : {}) };
}

export function teamRoles(mode: ProjectMode): string[] {
  switch (mode) {
    case "genesis":
      return ["orchestrator", "backend", "frontend", "qa", "devops"];
    case "phoenix":
      return ["orchestrator", "backend", "modernization", "qa", "devops"];
    case "saas":
      return ["orchestrator", "backend", "frontend", "qa", "devops", "growth"];
  }
}

function phases(project: WorkflowProject): PhaseDefinition[] {
  const { name, mode } = project;
  return [
    {
      name: "strategic-planning",
      items: [
        invoke("strategic-thinking", getStrategyPrompt(name, mode), true),
        invoke("market-research", `Research ${getResearchFocus(mode)}: latest trends and established practice.`, false),
        invoke("documentation-search", "Collect documentation on development methodology, architectural patterns and testing strategy.", false),
      ],
    },
    {
      name: "deep-analysis",
      items: [
        invoke("architecture-analysis", `Validate the proposed architecture for "${name}" for feasibility, scalability, security and maintainability.`, true),
        invoke("context-curation", `Assemble a development context for "${name}" from the research and analysis so far.`, false),
        invoke("expert-consultation", "Review the proposed architecture and give recommendations.", false),
      ],
    },
    {
      name: "project-setup",
      items: [
        invoke("task-board-init", `Initialize a task board for "${name}" with the stages from the strategy.`, true),
        invoke("repository-setup", `Set up version control and CI for "${name}".`, false),
        invoke("knowledge-base", `Record the project's decisions so far in a knowledge base (mode: ${mode}).`, false),
      ],
    },
    {
      name: "team-orchestration",
      policy: "majority",
      items: [
        {
          kind: "fanout",
          id: "team-briefing",
          required: true,
          reuseSessions: true,
          targets: teamRoles(mode).map((role) => ({ role, directive: getRolePrompt(role, name) })),
        },
      ],
    },
  ];
}

export function refreshItems(project: WorkflowProject): InvokeItem[] {
  return [
    invoke("intelligence-refresh", `Gather recent developments relevant to: ${getResearchFocus(project.mode)}.`, false, ["refresh"]),
    invoke("documentation-refresh", `Check for documentation updates in the technologies used by "${project.name}".`, false, ["refresh"]),
    invoke("task-recommendations", `Recommend the next tasks for "${project.name}" from the current task board.`, false, ["refresh"]),
  ];
}

export function buildWorkflow(project: WorkflowProject): Workflow {
  return {
    name: project.mode,
    phases: phases(project),
    refresh: refreshItems(project),
    evolutionDirective: (role, sequence) => getEvolutionPrompt(role, sequence),
  };
}
