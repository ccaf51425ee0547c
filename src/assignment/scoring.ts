/**
 * Agent Scoring
 *
 * Total = skill + experience + workload + availability + priority bonus.
 *
 * - Skill (0-100): average rating over the ticket's matched categories, ×10.
 *   Categories the agent is not rated in count as 0. Skill names are matched
 *   to category names without regard to case.
 * - Experience (0-20): experience × 1.5, capped.
 * - Workload (0-30): (5 − load) × 6, never below 0.
 * - Availability (0/10)
 * - Priority bonus (0-5): priority × 0.5 for priority ≥ 8.
 */

import { Agent, AgentScore, ScoreBreakdown, ScoringPolicy } from './types';

export const DEFAULT_SCORING_POLICY: Readonly<ScoringPolicy> = {
  skillScale: 10,
  experienceMultiplier: 1.5,
  experienceCap: 20,
  maxReasonableLoad: 5,
  workloadStep: 6,
  availabilityBonus: 10,
  priorityBonusThreshold: 8,
  priorityBonusFactor: 0.5,
};

/** Totals closer than this are treated as equal and fall through to the tie-breaks */
export const SCORE_EPSILON = 1e-9;

export interface ScoringInput {
  matchedSkills: readonly string[];
  priority: number;
}

/** The agent's rating in a category, looked up case-insensitively */
export function ratingFor(agent: Agent, category: string): number | undefined {
  const exact = agent.skills[category];
  if (exact !== undefined) return exact;
  const wanted = category.toLowerCase();
  for (const [name, rating] of Object.entries(agent.skills)) {
    if (name.toLowerCase() === wanted) return rating;
  }
  return undefined;
}

/** Score one agent for one ticket at the given load. Never mutates the agent. */
export function scoreAgent(
  agent: Agent,
  load: number,
  input: ScoringInput,
  policy: Readonly<ScoringPolicy> = DEFAULT_SCORING_POLICY,
): AgentScore {
  const ratings = input.matchedSkills.map((category) => ratingFor(agent, category) ?? 0);
  // A 0 rating counts as no expertise
  const ratedSkills = input.matchedSkills.filter((_, i) => ratings[i] > 0);

  let skill = 0;
  if (ratings.length > 0) {
    const sum = ratings.reduce((acc, r) => acc + r, 0);
    skill = (sum / ratings.length) * policy.skillScale;
  }

  const experience = Math.min(agent.experienceLevel * policy.experienceMultiplier, policy.experienceCap);
  const workload = Math.max(0, (policy.maxReasonableLoad - load) * policy.workloadStep);
  const availability = agent.available ? policy.availabilityBonus : 0;
  const priorityBonus =
    input.priority >= policy.priorityBonusThreshold ? input.priority * policy.priorityBonusFactor : 0;

  const breakdown: ScoreBreakdown = {
    skill,
    experience,
    workload,
    availability,
    priorityBonus,
    total: skill + experience + workload + availability + priorityBonus,
  };

  return { agentId: agent.agentId, breakdown, ratedSkills, load };
}

/**
 * Orders candidates best-first: higher total, then higher skill sub-score,
 * then lower current load, then lowest agent id. Scores within
 * SCORE_EPSILON of each other count as a tie.
 */
export function compareScores(a: AgentScore, b: AgentScore): number {
  const total = b.breakdown.total - a.breakdown.total;
  if (Math.abs(total) > SCORE_EPSILON) return total;
  const skill = b.breakdown.skill - a.breakdown.skill;
  if (Math.abs(skill) > SCORE_EPSILON) return skill;
  if (a.load !== b.load) return a.load - b.load;
  if (a.agentId === b.agentId) return 0;
  return a.agentId < b.agentId ? -1 : 1;
}
