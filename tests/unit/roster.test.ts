import { AgentRoster } from '../../src/assignment/roster';
import { ValidationError } from '../../src/assignment/errors';
import { makeAgent } from '../helpers/builders';

describe('AgentRoster', () => {
  it('should start loads at the snapshot values', () => {
    const roster = new AgentRoster([makeAgent({ agentId: 'A', currentLoad: 3 }), makeAgent({ agentId: 'B' })]);
    expect(roster.loadOf('A')).toBe(3);
    expect(roster.loadOf('B')).toBe(0);
    expect(roster.size).toBe(2);
  });

  it('should raise load by one per assignment and count assignments', () => {
    const roster = new AgentRoster([makeAgent({ agentId: 'A', currentLoad: 1 })]);
    expect(roster.recordAssignment('A')).toBe(2);
    expect(roster.recordAssignment('A')).toBe(3);
    expect(roster.assignedTo('A')).toBe(2);
  });

  it('should leave agent records untouched', () => {
    const agent = makeAgent({ agentId: 'A', currentLoad: 1 });
    const roster = new AgentRoster([agent]);
    roster.recordAssignment('A');
    expect(agent.currentLoad).toBe(1);
  });

  it('should keep input order', () => {
    const roster = new AgentRoster([makeAgent({ agentId: 'Z' }), makeAgent({ agentId: 'A' })]);
    expect(roster.agents.map((a) => a.agentId)).toEqual(['Z', 'A']);
  });

  it('should reject an empty roster', () => {
    expect(() => new AgentRoster([])).toThrow(ValidationError);
  });

  it('should reject duplicate agent ids', () => {
    try {
      new AgentRoster([makeAgent({ agentId: 'A' }), makeAgent({ agentId: 'A' })]);
      throw new Error('expected ValidationError');
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      expect(err.issues).toEqual(['duplicate agent_id "A"']);
    }
  });

  it('should throw for an unknown agent', () => {
    const roster = new AgentRoster([makeAgent({ agentId: 'A' })]);
    expect(() => roster.recordAssignment('nobody')).toThrow('Unknown agent: nobody');
  });
});
