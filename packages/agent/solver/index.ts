export { CATEGORIES, CATEGORY_KEYWORDS, isCategory } from './categories.js';
export type { Category, KeywordRow } from './categories.js';
export { classifyProblem } from './classify.js';
export {
  extractNumbers,
  interpretElasticity,
  labelElasticity,
  formatElasticitySection,
} from './elasticity.js';
export type { ElasticityLabel, ElasticityReading } from './elasticity.js';
export { ECONOMIC_FORMULAS, type FormulaName } from './formulas.js';
export {
  TemplateLibrary,
  templateLibrary,
  respond,
  renderFormulas,
  DEFAULT_TEMPLATE_DIR,
} from './templates.js';
export { EconomicsSolver, type SolveResult } from './solver.js';
