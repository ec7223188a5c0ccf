import { describe, it, expect } from "vitest";
import { buildWorkflow, refreshItems, teamRoles } from "../../src/workflows/index.js";

describe("teamRoles", () => {
  it("varies the team by mode", () => {
    expect(teamRoles("genesis")).toEqual(["orchestrator", "backend", "frontend", "qa", "devops"]);
    expect(teamRoles("phoenix")).toEqual(["orchestrator", "backend", "modernization", "qa", "devops"]);
    expect(teamRoles("saas")).toEqual(["orchestrator", "backend", "frontend", "qa", "devops", "growth"]);
  });
});

describe("buildWorkflow", () => {
  const workflow = buildWorkflow({ name: "Ledger", mode: "saas" });

  it("declares the four phases in order", () => {
    expect(workflow.name).toBe("saas");
    expect(workflow.phases.map((p) => p.name)).toEqual([
      "strategic-planning",
      "deep-analysis",
      "project-setup",
      "team-orchestration",
    ]);
  });

  it("requires exactly one item in each research phase", () => {
    for (const phase of workflow.phases.slice(0, 3)) {
      expect(phase.items.filter((i) => i.required)).toHaveLength(1);
      expect(phase.items[0]?.required).toBe(true);
    }
  });

  it("briefs the whole team under a majority policy", () => {
    const team = workflow.phases[3];
    expect(team?.policy).toBe("majority");
    const briefing = team?.items[0];
    expect(briefing?.kind).toBe("fanout");
    if (briefing?.kind !== "fanout") return;
    expect(briefing.reuseSessions).toBe(true);
    expect(briefing.targets.map((t) => t.role)).toEqual(teamRoles("saas"));
    expect(briefing.targets[0]?.directive).toContain('Project "Ledger" is entering active development.');
  });

  it("numbers evolution directives", () => {
    expect(workflow.evolutionDirective("qa", 7)).toContain("Evolution cycle #7. As the qa lead:");
  });
});

describe("refreshItems", () => {
  it("tags every refresh call and makes none required", () => {
    const items = refreshItems({ name: "Ledger", mode: "phoenix" });
    expect(items.map((i) => i.capability)).toEqual(["intelligence-refresh", "documentation-refresh", "task-recommendations"]);
    expect(items.every((i) => !i.required && i.tags?.[0] === "refresh")).toBe(true);
    expect(items[0]?.input).toBe(
      "Gather recent developments relevant to: application modernization, legacy transformation, performance optimization.",
    );
  });
});
