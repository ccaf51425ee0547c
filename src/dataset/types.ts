/**
 * Dataset wire format (snake_case JSON)
 */

export interface AgentRecord {
  agent_id: string;
  name: string;
  skills: Record<string, number>;
  current_load: number;
  /** "Available" means available; anything else does not */
  availability_status: string;
  experience_level: number;
}

export interface TicketRecord {
  ticket_id: string;
  title: string;
  description: string;
  /** Unix seconds */
  creation_timestamp?: number;
  priority?: number | 'critical' | 'high' | 'medium' | 'low';
}

export interface Dataset {
  agents: AgentRecord[];
  tickets: TicketRecord[];
}

export interface ScoreBreakdownRecord {
  skill: number;
  experience: number;
  workload: number;
  availability: number;
  priority_bonus: number;
  total: number;
}

export interface AssignmentOutputRecord {
  ticket_id: string;
  title: string;
  assigned_agent_id: string;
  priority: number;
  matched_skills: string[];
  rationale: string;
  score_breakdown: ScoreBreakdownRecord;
  fallback: 'no_skill_matched' | 'no_agent_rated' | null;
}

export interface DistributionRecord {
  agent_id: string;
  name: string;
  assigned: number;
  initial_load: number;
  final_load: number;
}

export interface AssignmentOutput {
  assignments: AssignmentOutputRecord[];
  distribution: DistributionRecord[];
}
