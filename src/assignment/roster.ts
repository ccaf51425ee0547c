import { Agent } from './types';
import { ValidationError } from './errors';

/**
 * The agents of one run and their live ticket counts.
 *
 * Loads start at each agent's snapshot value and only ever go up, by one per
 * assignment. Agent records themselves are never written.
 */
export class AgentRoster {
  private readonly byId = new Map<string, Agent>();
  private readonly loads = new Map<string, number>();
  private readonly received = new Map<string, number>();

  constructor(agents: readonly Agent[]) {
    if (agents.length === 0) {
      throw new ValidationError(['agent roster is empty']);
    }
    const duplicates = new Set<string>();
    for (const agent of agents) {
      if (this.byId.has(agent.agentId)) duplicates.add(agent.agentId);
      this.byId.set(agent.agentId, agent);
      this.loads.set(agent.agentId, agent.currentLoad);
      this.received.set(agent.agentId, 0);
    }
    if (duplicates.size > 0) {
      throw new ValidationError([...duplicates].map((id) => `duplicate agent_id "${id}"`));
    }
  }

  /** Agents in input order */
  get agents(): Agent[] {
    return Array.from(this.byId.values());
  }

  get size(): number {
    return this.byId.size;
  }

  get(agentId: string): Agent | undefined {
    return this.byId.get(agentId);
  }

  loadOf(agentId: string): number {
    return this.loads.get(agentId) ?? 0;
  }

  assignedTo(agentId: string): number {
    return this.received.get(agentId) ?? 0;
  }

  /** Commit one ticket to an agent; returns the new load */
  recordAssignment(agentId: string): number {
    const current = this.loads.get(agentId);
    if (current === undefined) {
      throw new Error(`Unknown agent: ${agentId}`);
    }
    const next = current + 1;
    this.loads.set(agentId, next);
    this.received.set(agentId, this.assignedTo(agentId) + 1);
    return next;
  }
}
