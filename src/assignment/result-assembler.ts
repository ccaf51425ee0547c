import { AgentDistribution, AllocationResult, AssignmentRecord } from './types';
import { AgentRoster } from './roster';

/** Final output: records in processing order plus per-agent totals by agent id */
export function assembleResult(records: readonly AssignmentRecord[], roster: AgentRoster): AllocationResult {
  const distribution: AgentDistribution[] = roster.agents
    .map((agent) => ({
      agentId: agent.agentId,
      name: agent.name,
      assigned: roster.assignedTo(agent.agentId),
      initialLoad: agent.currentLoad,
      finalLoad: roster.loadOf(agent.agentId),
    }))
    .sort((a, b) => (a.agentId < b.agentId ? -1 : a.agentId > b.agentId ? 1 : 0));

  return { assignments: [...records], distribution };
}
