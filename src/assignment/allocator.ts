/**
 * Allocator
 *
 * One sequential pass: tickets in descending priority (input order on ties),
 * every agent scored at its current load, the best one wins and its load goes
 * up by one before the next ticket is scored. That feedback is what spreads
 * work across the roster, so tickets must never be scored concurrently.
 */

import pino from 'pino';
import { AssignmentRecord, FallbackReason, ScoringPolicy, Ticket } from './types';
import { AgentRoster } from './roster';
import { SkillExtractor } from './skill-extractor';
import { PriorityClassifier } from './priority-classifier';
import { DEFAULT_SCORING_POLICY, compareScores, scoreAgent } from './scoring';
import { buildRationale } from './rationale';
import { TicketStateTracker } from './ticket-state';
import { ticketText } from './term-matcher';
import { AllocationError, ValidationError } from './errors';
import { logger } from '../observability/logger';

export interface AllocatorOptions {
  policy?: Partial<ScoringPolicy>;
  log?: pino.Logger;
}

export interface QueuedTicket {
  ticket: Ticket;
  index: number;
  priority: number;
  matchedSkills: string[];
}

export class Allocator {
  private readonly policy: Readonly<ScoringPolicy>;
  private readonly log: pino.Logger;

  constructor(
    private readonly extractor: SkillExtractor,
    private readonly classifier: PriorityClassifier,
    options?: AllocatorOptions,
  ) {
    this.policy = { ...DEFAULT_SCORING_POLICY, ...options?.policy };
    this.log = (options?.log ?? logger).child({ component: 'allocator' });
  }

  /**
   * Assign every ticket to exactly one agent of the roster. The roster's
   * loads are advanced as assignments are made.
   */
  allocate(tickets: readonly Ticket[], roster: AgentRoster): AssignmentRecord[] {
    assertUniqueTicketIds(tickets);

    const queue = this.prioritize(tickets);
    const tracker = new TicketStateTracker(
      tickets.map((t) => t.ticketId),
      this.log,
    );
    const records: AssignmentRecord[] = [];

    for (const queued of queue) {
      records.push(this.assignOne(queued, roster, tracker));
    }

    const unfinished = tracker.unfinished();
    if (unfinished.length > 0) {
      throw new AllocationError(unfinished[0].ticketId, unfinished[0].state);
    }

    this.log.info({ tickets: records.length, agents: roster.size }, 'Allocation complete');
    return records;
  }

  /** Tickets with their priority and skills, highest priority first */
  prioritize(tickets: readonly Ticket[]): QueuedTicket[] {
    const queue = tickets.map((ticket, index) => ({
      ticket,
      index,
      priority: this.classifier.classify(ticket),
      matchedSkills: this.extractor.extract(ticketText(ticket)),
    }));
    return queue.sort((a, b) => b.priority - a.priority || a.index - b.index);
  }

  private assignOne(queued: QueuedTicket, roster: AgentRoster, tracker: TicketStateTracker): AssignmentRecord {
    const { ticket, priority, matchedSkills } = queued;
    const input = { matchedSkills, priority };

    const scores = roster.agents
      .map((agent) => scoreAgent(agent, roster.loadOf(agent.agentId), input, this.policy))
      .sort(compareScores);
    tracker.transition(ticket.ticketId, 'SCORED');

    const best = scores[0];
    const agent = roster.get(best.agentId);
    if (!agent) {
      throw new Error(`Scored agent missing from roster: ${best.agentId}`);
    }

    let fallback: FallbackReason | null = null;
    if (matchedSkills.length === 0) {
      fallback = 'no_skill_matched';
    } else if (scores.every((s) => s.breakdown.skill === 0)) {
      fallback = 'no_agent_rated';
    }

    const record: AssignmentRecord = {
      ticketId: ticket.ticketId,
      title: ticket.title,
      agentId: agent.agentId,
      priority,
      matchedSkills,
      breakdown: best.breakdown,
      rationale: buildRationale({
        agent,
        score: best,
        matchedSkills,
        highPriority: priority >= this.policy.priorityBonusThreshold,
        fallback,
      }),
      fallback,
    };

    const newLoad = roster.recordAssignment(agent.agentId);
    tracker.transition(ticket.ticketId, 'ASSIGNED');

    this.log.debug(
      { ticketId: ticket.ticketId, agentId: agent.agentId, total: best.breakdown.total, newLoad, fallback },
      'Ticket assigned',
    );
    return record;
  }
}

function assertUniqueTicketIds(tickets: readonly Ticket[]): void {
  const seen = new Set<string>();
  const issues: string[] = [];
  for (const ticket of tickets) {
    if (seen.has(ticket.ticketId)) issues.push(`duplicate ticket_id "${ticket.ticketId}"`);
    seen.add(ticket.ticketId);
  }
  if (issues.length > 0) throw new ValidationError(issues);
}
