/**
 * Evaluation framework for the keyword classifier
 * Runs golden problems through classification and reports accuracy
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CATEGORIES, type Category } from '../solver/categories.js';
import { classifyProblem } from '../solver/classify.js';

export const GOLDEN_PROBLEMS_PATH = fileURLToPath(new URL('./golden-problems.json', import.meta.url));

/**
 * A golden problem test case
 */
export const GoldenProblemSchema = z.object({
  id: z.string().min(1),
  input: z.string().describe('Student question, verbatim'),
  expectedCategory: z.enum(CATEGORIES),
  notes: z.string().optional(),
});

export type GoldenProblem = z.infer<typeof GoldenProblemSchema>;

export interface EvalResult {
  id: string;
  passed: boolean;
  expected: Category;
  actual: Category;
}

export interface EvalMetrics {
  totalTests: number;
  passed: number;
  failed: number;
  accuracy: number;
  byCategory: Array<{ category: Category; total: number; passed: number }>;
  failedTests: Array<{ id: string; expected: Category; actual: Category }>;
}

export function loadGoldenProblems(path = GOLDEN_PROBLEMS_PATH): GoldenProblem[] {
  return z.array(GoldenProblemSchema).parse(JSON.parse(readFileSync(path, 'utf8')));
}

/**
 * Usage:
 * ```typescript
 * const { metrics } = runClassificationEval(loadGoldenProblems());
 * console.log(generateEvalReport(metrics));
 * ```
 */
export function runClassificationEval(
  problems: readonly GoldenProblem[],
  classify: (text: string) => Category = classifyProblem,
): { results: EvalResult[]; metrics: EvalMetrics } {
  const results = problems.map((p) => {
    const actual = classify(p.input);
    return { id: p.id, passed: actual === p.expectedCategory, expected: p.expectedCategory, actual };
  });

  const byCategory = CATEGORIES.map((category) => {
    const rows = results.filter((r) => r.expected === category);
    return { category, total: rows.length, passed: rows.filter((r) => r.passed).length };
  });

  const passed = results.filter((r) => r.passed).length;
  return {
    results,
    metrics: {
      totalTests: results.length,
      passed,
      failed: results.length - passed,
      accuracy: results.length === 0 ? 0 : passed / results.length,
      byCategory,
      failedTests: results
        .filter((r) => !r.passed)
        .map(({ id, expected, actual }) => ({ id, expected, actual })),
    },
  };
}

/**
 * Generate report from evaluation results
 */
export function generateEvalReport(metrics: EvalMetrics): string {
  return [
    '# Classification Report',
    '',
    `**Total Tests:** ${metrics.totalTests}`,
    `**Passed:** ${metrics.passed} (${(metrics.accuracy * 100).toFixed(1)}%)`,
    `**Failed:** ${metrics.failed}`,
    '',
    '## By Category',
    ...metrics.byCategory
      .filter((c) => c.total > 0)
      .map((c) => `- ${c.category}: ${c.passed}/${c.total}`),
    '',
    '## Failed Tests',
    ...(metrics.failedTests.length === 0
      ? ['- none']
      : metrics.failedTests.map((t) => `- **${t.id}**: expected ${t.expected}, got ${t.actual}`)),
  ].join('\n');
}
