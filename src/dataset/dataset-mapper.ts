import Ajv from 'ajv';
import { datasetSchema } from './schema';
import { AgentRecord, AssignmentOutput, Dataset, TicketRecord } from './types';
import { Agent, AllocationResult, Ticket } from '../assignment/types';
import { ValidationError } from '../assignment/errors';

const ajv = new Ajv({ allErrors: true });
const validateDataset = ajv.compile<Dataset>(datasetSchema);

export const AVAILABLE_STATUS = 'Available';

/** Validate a parsed dataset body; throws ValidationError listing every issue */
export function parseDataset(body: unknown): Dataset {
  if (!validateDataset(body)) {
    const issues = (validateDataset.errors ?? []).map((e) => `${e.instancePath} ${e.message ?? 'is invalid'}`.trim());
    throw new ValidationError(issues.length > 0 ? issues : ['dataset is invalid']);
  }
  return body;
}

export function toAgent(record: AgentRecord): Agent {
  return {
    agentId: record.agent_id,
    name: record.name,
    skills: { ...record.skills },
    experienceLevel: record.experience_level,
    currentLoad: record.current_load,
    available: record.availability_status === AVAILABLE_STATUS,
  };
}

export function toTicket(record: TicketRecord): Ticket {
  return {
    ticketId: record.ticket_id,
    title: record.title,
    description: record.description,
    createdAt: record.creation_timestamp,
    priority: record.priority,
  };
}

export function toOutput(result: AllocationResult): AssignmentOutput {
  return {
    assignments: result.assignments.map((a) => ({
      ticket_id: a.ticketId,
      title: a.title,
      assigned_agent_id: a.agentId,
      priority: a.priority,
      matched_skills: [...a.matchedSkills],
      rationale: a.rationale,
      score_breakdown: {
        skill: a.breakdown.skill,
        experience: a.breakdown.experience,
        workload: a.breakdown.workload,
        availability: a.breakdown.availability,
        priority_bonus: a.breakdown.priorityBonus,
        total: a.breakdown.total,
      },
      fallback: a.fallback,
    })),
    distribution: result.distribution.map((d) => ({
      agent_id: d.agentId,
      name: d.name,
      assigned: d.assigned,
      initial_load: d.initialLoad,
      final_load: d.finalLoad,
    })),
  };
}
