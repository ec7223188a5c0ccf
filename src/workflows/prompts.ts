import type { ProjectMode } from "../store/types.js";

export function getResearchFocus(mode: ProjectMode): string {
  switch (mode) {
    case "saas":
      return "SaaS architecture, subscription models, scalability, user acquisition, monetization strategies";
    case "genesis":
      return "current development technologies, emerging frameworks, architectures suited to a new application";
    case "phoenix":
      return "application modernization, legacy transformation, performance optimization";
  }
}

export function getStrategyPrompt(projectName: string, mode: ProjectMode): string {
  return `Plan the overall strategy for "${projectName}" (mode: ${mode}).
Break the work into stages, name the main technical risks, and say which capabilities each stage needs.`;
}

export function getRolePrompt(role: string, projectName: string): string {
  return `Project "${projectName}" is entering active development.
As the ${role} lead, review the plans in the project directory, then:

1. Confirm the scope you own
2. List the first tasks you will take on
3. Flag anything you need from other roles

Reply with your plan.`;
}

export function getEvolutionPrompt(role: string, sequence: number): string {
  return `Evolution cycle #${sequence}. As the ${role} lead:

1. Summarize progress since the last cycle
2. Note anything blocked
3. Say what you will do next, taking new findings into account

Keep it brief.`;
}
