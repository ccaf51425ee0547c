import { ExplicitPriority, PriorityRules, PriorityTier, Ticket } from './types';
import { compileTerm, TermMatcher, ticketText } from './term-matcher';

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;

/**
 * Derives a ticket's urgency score. An explicit priority on the ticket wins;
 * otherwise the first tier whose cue appears in the text decides.
 */
export class PriorityClassifier {
  private readonly tiers: Array<{ tier: PriorityTier; matchers: TermMatcher[] }>;
  private readonly defaultScore: number;

  constructor(rules: PriorityRules) {
    this.defaultScore = rules.defaultScore;
    this.tiers = rules.tiers.map((tier) => ({ tier, matchers: tier.cues.map(compileTerm) }));
  }

  classify(ticket: Ticket): number {
    if (ticket.priority !== undefined) {
      return this.fromExplicit(ticket.priority);
    }
    return this.fromText(ticketText(ticket));
  }

  fromText(text: string): number {
    const lowered = text.toLowerCase();
    for (const { tier, matchers } of this.tiers) {
      if (matchers.some((matches) => matches(lowered))) return tier.score;
    }
    return this.defaultScore;
  }

  fromExplicit(priority: ExplicitPriority): number {
    if (typeof priority === 'number') {
      return Math.min(MAX_PRIORITY, Math.max(MIN_PRIORITY, priority));
    }
    const match = this.tiers.find(({ tier }) => tier.name === priority);
    return match ? match.tier.score : this.defaultScore;
  }
}
