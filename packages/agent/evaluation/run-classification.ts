/**
 * Classify every golden problem and print the report.
 * Exits non-zero when any problem lands in the wrong category.
 *
 * Usage:
 * ```bash
 * npm run eval:classifier
 * ```
 */

import { generateEvalReport, loadGoldenProblems, runClassificationEval } from './framework.js';

const { metrics } = runClassificationEval(loadGoldenProblems());

console.log(generateEvalReport(metrics));
process.exitCode = metrics.failed > 0 ? 1 : 0;
