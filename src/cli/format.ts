import { describeCadence } from "../evolution/scheduler.js";
import type { AgentSession, EvolutionCycle, PhaseRecord, Project, Schedule } from "../store/types.js";

function phaseTimestamp(phase: PhaseRecord): string {
  return phase.failedAt ?? phase.completedAt ?? phase.startedAt ?? "";
}

export function formatSchedule(schedule: Schedule | null): string {
  if (!schedule) return "none";
  if (!schedule.active) return `stopped${schedule.stoppedAt ? ` at ${schedule.stoppedAt}` : ""}`;
  const parts = [`active, ${describeCadence(schedule.cadence)}`];
  if (schedule.nextAt) parts.push(`next at ${schedule.nextAt}`);
  if (schedule.ownerPid !== null) parts.push(`pid ${schedule.ownerPid}`);
  return parts.join(", ");
}

export function formatStatus(project: Project, schedule: Schedule | null): string[] {
  const width = Math.max(...project.phases.map((p) => p.name.length), 0);
  const lines = [
    `Project:    ${project.id} (${project.mode})`,
    `Name:       ${project.name}`,
    `Status:     ${project.status}`,
    `Workdir:    ${project.workdir}`,
    "Phases:",
    ...project.phases.map((p) =>
      `  ${p.index + 1}. ${p.name.padEnd(width)}  ${p.status.padEnd(9)}  ${phaseTimestamp(p)}`.trimEnd(),
    ),
  ];
  if (project.failure) {
    lines.push(`Failure:    phase ${project.failure.phaseIndex + 1} (${project.failure.phaseName})`);
    lines.push(...project.failure.cause.map((c) => `  ${c}`));
  }
  lines.push(`Schedule:   ${formatSchedule(schedule)}`);
  return lines;
}

export function formatSession(session: AgentSession): string {
  return `${session.id}  ${session.role.padEnd(14)}  ${session.status}`;
}

export function formatCycle(cycle: EvolutionCycle): string {
  return `#${cycle.sequence}  ${cycle.startedAt}  ${cycle.manual ? "manual" : "scheduled"}  ${cycle.summary}`;
}
