/**
 * Central exports for evaluation framework
 */

export {
  runClassificationEval,
  generateEvalReport,
  loadGoldenProblems,
  GoldenProblemSchema,
  GOLDEN_PROBLEMS_PATH,
  type GoldenProblem,
  type EvalResult,
  type EvalMetrics,
} from './framework.js';
