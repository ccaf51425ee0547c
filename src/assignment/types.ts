/**
 * Assignment Engine Types
 */

/** Skill category name → proficiency rating (0-10) */
export type SkillRatings = Record<string, number>;

export interface Agent {
  agentId: string;
  /** Display label; never used in scoring */
  name: string;
  skills: SkillRatings;
  /** Years / level, non-negative */
  experienceLevel: number;
  /** Open tickets at the time the snapshot was taken */
  currentLoad: number;
  available: boolean;
}

/** Explicit priority on a ticket: a 1-10 score or a tier label */
export type PriorityLabel = 'critical' | 'high' | 'medium' | 'low';
export type ExplicitPriority = number | PriorityLabel;

export interface Ticket {
  readonly ticketId: string;
  readonly title: string;
  readonly description: string;
  readonly createdAt?: number;
  readonly priority?: ExplicitPriority;
}

/** Skill category → trigger terms */
export type SkillTaxonomy = Readonly<Record<string, readonly string[]>>;

export interface PriorityTier {
  name: PriorityLabel;
  score: number;
  cues: readonly string[];
}

export interface PriorityRules {
  defaultScore: number;
  /** Checked in order; the first tier with a cue in the text wins */
  tiers: readonly PriorityTier[];
}

/** Per-ticket lifecycle during a run */
export type TicketState = 'PENDING' | 'SCORED' | 'ASSIGNED';

export const TICKET_TRANSITIONS: Record<TicketState, TicketState[]> = {
  PENDING: ['SCORED'],
  SCORED: ['ASSIGNED'],
  ASSIGNED: [],
};

export interface TicketTransitionEvent {
  ticketId: string;
  from: TicketState;
  to: TicketState;
}

/** Parameters of the scoring function */
export interface ScoringPolicy {
  /** Multiplier turning a 0-10 average rating into 0-100 */
  skillScale: number;
  experienceMultiplier: number;
  experienceCap: number;
  /** Load at which the workload sub-score reaches zero */
  maxReasonableLoad: number;
  workloadStep: number;
  availabilityBonus: number;
  /** Priorities at or above this earn a bonus */
  priorityBonusThreshold: number;
  priorityBonusFactor: number;
}

export interface ScoreBreakdown {
  skill: number;
  experience: number;
  workload: number;
  availability: number;
  priorityBonus: number;
  total: number;
}

export interface AgentScore {
  agentId: string;
  breakdown: ScoreBreakdown;
  /** Matched categories the agent is rated above 0 in, in taxonomy order */
  ratedSkills: string[];
  /** Load used for this score */
  load: number;
}

/** Why a ticket went to its agent without a skill signal */
export type FallbackReason = 'no_skill_matched' | 'no_agent_rated';

export interface AssignmentRecord {
  readonly ticketId: string;
  readonly title: string;
  readonly agentId: string;
  readonly priority: number;
  readonly matchedSkills: readonly string[];
  readonly breakdown: Readonly<ScoreBreakdown>;
  readonly rationale: string;
  readonly fallback: FallbackReason | null;
}

export interface AgentDistribution {
  agentId: string;
  name: string;
  assigned: number;
  initialLoad: number;
  finalLoad: number;
}

export interface AllocationResult {
  assignments: AssignmentRecord[];
  distribution: AgentDistribution[];
}
