import { Allocator } from '../assignment/allocator';
import { AgentRoster } from '../assignment/roster';
import { SkillExtractor } from '../assignment/skill-extractor';
import { PriorityClassifier } from '../assignment/priority-classifier';
import { assembleResult } from '../assignment/result-assembler';
import { PriorityRules, ScoringPolicy, SkillTaxonomy } from '../assignment/types';
import { ValidationError } from '../assignment/errors';
import { parseDataset, toAgent, toOutput, toTicket } from '../dataset/dataset-mapper';
import { AssignmentOutput, Dataset } from '../dataset/types';
import { ConfigService, getConfigService } from '../config/config-service';
import { childLogger } from '../observability/logger';
import { createRunContext, endSpan, spanDurations, startSpan } from '../observability/trace';

export interface AssignmentServiceOptions {
  policy?: Partial<ScoringPolicy>;
}

/**
 * Runs one allocation over a raw dataset body: validate, allocate, assemble.
 * Each run gets its own roster, so runs never share load state.
 */
export class AssignmentService {
  private readonly extractor: SkillExtractor;
  private readonly classifier: PriorityClassifier;

  constructor(
    taxonomy: SkillTaxonomy,
    priorityRules: PriorityRules,
    private readonly options: AssignmentServiceOptions = {},
  ) {
    this.extractor = new SkillExtractor(taxonomy);
    this.classifier = new PriorityClassifier(priorityRules);
  }

  get categories(): string[] {
    return this.extractor.categoryNames;
  }

  run(body: unknown, source = 'api'): AssignmentOutput {
    const ctx = createRunContext({ source });
    const log = childLogger(ctx.runId, { source });

    const validateSpan = startSpan(ctx, 'validate');
    let roster: AgentRoster;
    let dataset: Dataset;
    try {
      dataset = parseDataset(body);
      roster = new AgentRoster(dataset.agents.map(toAgent));
      endSpan(validateSpan);
    } catch (err) {
      endSpan(validateSpan, 'error');
      if (err instanceof ValidationError) {
        log.warn({ issues: err.issues }, 'Dataset rejected');
      }
      throw err;
    }

    const allocateSpan = startSpan(ctx, 'allocate', { tickets: dataset.tickets.length, agents: roster.size });
    const allocator = new Allocator(this.extractor, this.classifier, { policy: this.options.policy, log });
    const records = allocator.allocate(dataset.tickets.map(toTicket), roster);
    endSpan(allocateSpan);

    const assembleSpan = startSpan(ctx, 'assemble');
    const output = toOutput(assembleResult(records, roster));
    endSpan(assembleSpan);

    log.info(
      {
        assigned: output.assignments.length,
        fallbacks: output.assignments.filter((a) => a.fallback !== null).length,
        spansMs: spanDurations(ctx),
      },
      'Assignment run finished',
    );
    return output;
  }
}

export function createAssignmentService(
  config: ConfigService = getConfigService(),
  options?: AssignmentServiceOptions,
): AssignmentService {
  return new AssignmentService(config.getTaxonomy(), config.getPriorityRules(), options);
}
