import { buildRationale, formatScore } from '../../src/assignment/rationale';
import { scoreAgent } from '../../src/assignment/scoring';
import { makeAgent } from '../helpers/builders';

describe('formatScore', () => {
  it('should drop trailing zeros and keep two decimals at most', () => {
    expect(formatScore(90)).toBe('90');
    expect(formatScore(7.5)).toBe('7.5');
    expect(formatScore(200 / 3)).toBe('66.67');
  });
});

describe('buildRationale', () => {
  it('should name the matched skills and the full breakdown', () => {
    const agent = makeAgent({ agentId: 'A1', name: 'Alice', skills: { networking: 9 }, experienceLevel: 5 });
    const score = scoreAgent(agent, 2, { matchedSkills: ['networking'], priority: 10 });

    expect(
      buildRationale({ agent, score, matchedSkills: ['networking'], highPriority: true, fallback: null }),
    ).toBe(
      "Assigned to Alice (A1) based on expertise in 'networking' (9) and lower current workload. " +
        'Score 130.5: skill 90, experience 7.5, workload 18, availability 10, priority bonus 5. ' +
        'High priority ticket requiring immediate attention.',
    );
  });

  it('should list at most three skills', () => {
    const skills = { a: 5, b: 6, c: 7, d: 8, e: 9 };
    const agent = makeAgent({ agentId: 'M', name: 'Max', skills });
    const matched = ['a', 'b', 'c', 'd', 'e'];
    const score = scoreAgent(agent, 4, { matchedSkills: matched, priority: 6 });

    expect(buildRationale({ agent, score, matchedSkills: matched, highPriority: false, fallback: null })).toBe(
      "Assigned to Max (M) based on expertise in 'a' (5), 'b' (6), 'c' (7) and 2 more. " +
        'Score 86: skill 70, experience 0, workload 6, availability 10, priority bonus 0.',
    );
  });

  it('should flag a ticket with no matching category', () => {
    const agent = makeAgent({ agentId: 'Q', name: 'Quinn', experienceLevel: 10, currentLoad: 1 });
    const score = scoreAgent(agent, 1, { matchedSkills: [], priority: 6 });

    expect(
      buildRationale({ agent, score, matchedSkills: [], highPriority: false, fallback: 'no_skill_matched' }),
    ).toBe(
      'Generalist fallback: no skill category matched the ticket text. ' +
        'Assigned to Quinn (Q) based on experience level (10) and lower current workload. ' +
        'Score 49: skill 0, experience 15, workload 24, availability 10, priority bonus 0.',
    );
  });

  it('should flag a ticket nobody is rated for', () => {
    const agent = makeAgent({ agentId: 'P', name: 'Pat', experienceLevel: 2, currentLoad: 4, available: false });
    const score = scoreAgent(agent, 4, { matchedSkills: ['printing'], priority: 6 });

    expect(
      buildRationale({ agent, score, matchedSkills: ['printing'], highPriority: false, fallback: 'no_agent_rated' }),
    ).toBe(
      'Generalist fallback: no agent has a non-zero rating in printing. ' +
        'Assigned to Pat (P) based on experience level (2). ' +
        'Score 9: skill 0, experience 3, workload 6, availability 0, priority bonus 0.',
    );
  });
});
