import type { AgentAssignments } from '../../types/orchestration.types.js';

/**
 * Batches agents by ascending priority; each batch holds at most
 * `maxParallel` agents and never mixes priorities.
 */
export function generateExecutionPlan(assignments: AgentAssignments, maxParallel: number): string[][] {
  if (!Number.isInteger(maxParallel) || maxParallel < 1) {
    throw new RangeError(`maxParallel must be a positive integer, got ${maxParallel}`);
  }

  const byPriority = new Map<number, string[]>();
  for (const [agent, assignment] of Object.entries(assignments)) {
    byPriority.set(assignment.priority, [...(byPriority.get(assignment.priority) ?? []), agent]);
  }

  const batches: string[][] = [];
  for (const priority of [...byPriority.keys()].sort((a, b) => a - b)) {
    const agents = byPriority.get(priority) ?? [];
    for (let i = 0; i < agents.length; i += maxParallel) {
      batches.push(agents.slice(i, i + maxParallel));
    }
  }
  return batches;
}
