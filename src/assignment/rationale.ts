import { Agent, AgentScore, FallbackReason } from './types';
import { ratingFor } from './scoring';

const MAX_LISTED_SKILLS = 3;
const LOW_WORKLOAD_THRESHOLD = 15;

/** Scores printed with at most two decimals, trailing zeros dropped */
export function formatScore(value: number): string {
  return Number(value.toFixed(2)).toString();
}

function skillList(agent: Agent, skills: readonly string[]): string {
  const listed = skills
    .slice(0, MAX_LISTED_SKILLS)
    .map((skill) => `'${skill}' (${ratingFor(agent, skill) ?? 0})`)
    .join(', ');
  const rest = skills.length - MAX_LISTED_SKILLS;
  return rest > 0 ? `${listed} and ${rest} more` : listed;
}

function fallbackPreamble(reason: FallbackReason, matchedSkills: readonly string[]): string {
  if (reason === 'no_skill_matched') {
    return 'Generalist fallback: no skill category matched the ticket text. ';
  }
  return `Generalist fallback: no agent has a non-zero rating in ${matchedSkills.join(', ')}. `;
}

export interface RationaleInput {
  agent: Agent;
  score: AgentScore;
  matchedSkills: readonly string[];
  /** Ticket earned the priority bonus */
  highPriority: boolean;
  fallback: FallbackReason | null;
}

/** Human-readable explanation of one assignment, including the full breakdown */
export function buildRationale({ agent, score, matchedSkills, highPriority, fallback }: RationaleInput): string {
  const { breakdown } = score;
  let text = fallback ? fallbackPreamble(fallback, matchedSkills) : '';

  text += `Assigned to ${agent.name} (${agent.agentId}) `;
  text +=
    score.ratedSkills.length > 0
      ? `based on expertise in ${skillList(agent, score.ratedSkills)}`
      : `based on experience level (${agent.experienceLevel})`;
  if (breakdown.workload > LOW_WORKLOAD_THRESHOLD) {
    text += ' and lower current workload';
  }

  text +=
    `. Score ${formatScore(breakdown.total)}: ` +
    `skill ${formatScore(breakdown.skill)}, ` +
    `experience ${formatScore(breakdown.experience)}, ` +
    `workload ${formatScore(breakdown.workload)}, ` +
    `availability ${formatScore(breakdown.availability)}, ` +
    `priority bonus ${formatScore(breakdown.priorityBonus)}.`;

  if (highPriority) {
    text += ' High priority ticket requiring immediate attention.';
  }
  return text;
}
