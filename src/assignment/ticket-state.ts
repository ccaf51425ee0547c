import pino from 'pino';
import { TICKET_TRANSITIONS, TicketState, TicketTransitionEvent } from './types';
import { logger } from '../observability/logger';

export type TransitionLogger = Pick<pino.Logger, 'warn'>;

/** Tracks PENDING → SCORED → ASSIGNED for every ticket of a run */
export class TicketStateTracker {
  private readonly states = new Map<string, TicketState>();

  /** Invalid transitions are warned through `log`, normally the run's logger */
  constructor(
    ticketIds: readonly string[],
    private readonly log: TransitionLogger = logger.child({ component: 'ticket-state' }),
  ) {
    for (const id of ticketIds) this.states.set(id, 'PENDING');
  }

  stateOf(ticketId: string): TicketState | undefined {
    return this.states.get(ticketId);
  }

  /**
   * Attempt a transition. Returns the event if valid, or null and leaves the
   * state unchanged if not.
   */
  transition(ticketId: string, target: TicketState): TicketTransitionEvent | null {
    const current = this.states.get(ticketId);
    if (current === undefined) {
      this.log.warn({ ticketId, to: target }, 'Transition for unknown ticket');
      return null;
    }
    if (!TICKET_TRANSITIONS[current].includes(target)) {
      this.log.warn({ ticketId, from: current, to: target }, 'Invalid ticket state transition attempted');
      return null;
    }
    this.states.set(ticketId, target);
    return { ticketId, from: current, to: target };
  }

  /** Tickets not yet ASSIGNED, with their state */
  unfinished(): Array<{ ticketId: string; state: TicketState }> {
    const open: Array<{ ticketId: string; state: TicketState }> = [];
    for (const [ticketId, state] of this.states) {
      if (state !== 'ASSIGNED') open.push({ ticketId, state });
    }
    return open;
  }
}
