import { SkillTaxonomy } from './types';
import { compileTerm, TermMatcher } from './term-matcher';

interface CompiledCategory {
  name: string;
  matchers: TermMatcher[];
}

/**
 * Maps ticket text to the skill categories whose trigger terms it contains.
 * Pure: the taxonomy is compiled once and never changes.
 */
export class SkillExtractor {
  private readonly categories: CompiledCategory[];

  constructor(taxonomy: SkillTaxonomy) {
    this.categories = Object.entries(taxonomy).map(([name, terms]) => ({
      name,
      matchers: terms.map(compileTerm),
    }));
  }

  /** Matched categories in taxonomy order; empty when nothing matches */
  extract(text: string): string[] {
    const lowered = text.toLowerCase();
    return this.categories
      .filter((category) => category.matchers.some((matches) => matches(lowered)))
      .map((category) => category.name);
  }

  get categoryNames(): string[] {
    return this.categories.map((c) => c.name);
  }
}
