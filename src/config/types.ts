import { PriorityLabel } from '../assignment/types';

/** config/skill-taxonomy.yaml */
export interface SkillTaxonomyFile {
  version: number;
  categories: Record<string, string[]>;
}

/** config/priority-rules.yaml */
export interface PriorityRulesFile {
  version: number;
  defaultScore: number;
  tiers: Array<{ name: PriorityLabel; score: number; cues: string[] }>;
}
