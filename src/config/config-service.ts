import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv, { SchemaObject, ValidateFunction } from 'ajv';
import { PriorityRulesFile, SkillTaxonomyFile } from './types';
import { PriorityRules, SkillTaxonomy } from '../assignment/types';
import { ConfigError } from '../assignment/errors';
import { env } from './env';
import { logger } from '../observability/logger';

const TAXONOMY_FILE = 'skill-taxonomy.yaml';
const PRIORITY_RULES_FILE = 'priority-rules.yaml';

const ajv = new Ajv({ allErrors: true });

const termList: SchemaObject = {
  type: 'array',
  minItems: 1,
  items: { type: 'string', minLength: 1 },
};

const validateTaxonomy = ajv.compile<SkillTaxonomyFile>({
  type: 'object',
  required: ['version', 'categories'],
  properties: {
    version: { type: 'integer' },
    categories: {
      type: 'object',
      minProperties: 1,
      additionalProperties: termList,
    },
  },
});

const validatePriorityRules = ajv.compile<PriorityRulesFile>({
  type: 'object',
  required: ['version', 'defaultScore', 'tiers'],
  properties: {
    version: { type: 'integer' },
    defaultScore: { type: 'number', minimum: 1, maximum: 10 },
    tiers: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['name', 'score', 'cues'],
        properties: {
          name: { type: 'string', enum: ['critical', 'high', 'medium', 'low'] },
          score: { type: 'number', minimum: 1, maximum: 10 },
          cues: termList,
        },
      },
    },
  },
});

export class ConfigService {
  private taxonomy: SkillTaxonomy = {};
  private priorityRules: PriorityRules = { defaultScore: 0, tiers: [] };

  constructor(private readonly configDir: string = env.configDir) {
    this.loadAll();
  }

  /** (Re)load both files; throws ConfigError and keeps the previous values on failure */
  loadAll(): void {
    const taxonomyFile = this.loadYAML(TAXONOMY_FILE, validateTaxonomy);
    const rulesFile = this.loadYAML(PRIORITY_RULES_FILE, validatePriorityRules);

    this.taxonomy = Object.freeze({ ...taxonomyFile.categories });
    this.priorityRules = { defaultScore: rulesFile.defaultScore, tiers: rulesFile.tiers };

    logger.info(
      {
        configDir: this.configDir,
        categoryCount: Object.keys(this.taxonomy).length,
        priorityTiers: this.priorityRules.tiers.map((t) => t.name),
      },
      'Assignment configuration loaded',
    );
  }

  getTaxonomy(): SkillTaxonomy {
    return this.taxonomy;
  }

  getPriorityRules(): PriorityRules {
    return this.priorityRules;
  }

  private loadYAML<T>(filename: string, validate: ValidateFunction<T>): T {
    const filepath = path.join(this.configDir, filename);
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filepath, 'utf-8'));
    } catch (err) {
      logger.error({ err, filepath }, 'Failed to read configuration file');
      throw new ConfigError(err instanceof Error ? err.message : String(err), filepath);
    }
    if (!validate(parsed)) {
      const errors = (validate.errors ?? []).map((e) => `${e.instancePath} ${e.message ?? ''}`.trim()).join('; ');
      throw new ConfigError(`Invalid configuration: ${errors}`, filepath);
    }
    return parsed;
  }
}

let instance: ConfigService | undefined;

/** Lazily created service for the configured directory */
export function getConfigService(): ConfigService {
  if (!instance) instance = new ConfigService();
  return instance;
}
