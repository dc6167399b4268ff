import type { Category } from './categories.js';
import { classifyProblem } from './classify.js';
import {
  extractNumbers,
  formatElasticitySection,
  interpretElasticity,
  type ElasticityReading,
} from './elasticity.js';
import { templateLibrary, type TemplateLibrary } from './templates.js';

export interface SolveResult {
  category: Category;
  reading: ElasticityReading | null;
  text: string;
}

/**
 * Classify a question and answer it from the matching template.
 * Pure with respect to its input; never throws for any string.
 */
export class EconomicsSolver {
  constructor(private readonly templates: TemplateLibrary = templateLibrary) {}

  analyze(problem: string): SolveResult {
    const category = classifyProblem(problem);
    const reading = category === 'elasticity' ? interpretElasticity(extractNumbers(problem)) : null;
    const text = this.templates.respond(
      category,
      reading ? formatElasticitySection(reading) : undefined,
    );
    return { category, reading, text };
  }

  solve(problem: string): string {
    return this.analyze(problem).text;
  }
}
