import { describe, it, expect } from 'vitest';
import {
  generateEvalReport,
  loadGoldenProblems,
  runClassificationEval,
} from '../evaluation/framework.js';
import type { Category } from '../solver/categories.js';

describe('classification evaluation', () => {
  it('classifies every golden problem as expected', () => {
    const { metrics } = runClassificationEval(loadGoldenProblems());
    expect(metrics.totalTests).toBe(17);
    expect(metrics.failedTests).toEqual([]);
    expect(metrics.accuracy).toBe(1);
  });

  it('renders a report for a clean run', () => {
    const { metrics } = runClassificationEval(loadGoldenProblems());
    expect(generateEvalReport(metrics)).toBe(
      [
        '# Classification Report',
        '',
        '**Total Tests:** 17',
        '**Passed:** 17 (100.0%)',
        '**Failed:** 0',
        '',
        '## By Category',
        '- supply_demand: 3/3',
        '- elasticity: 2/2',
        '- market_equilibrium: 1/1',
        '- consumer_producer_surplus: 2/2',
        '- gdp_analysis: 2/2',
        '- inflation_unemployment: 2/2',
        '- market_structures: 2/2',
        '- general: 3/3',
        '',
        '## Failed Tests',
        '- none',
      ].join('\n'),
    );
  });

  it('lists misclassified problems', () => {
    const alwaysGeneral = (): Category => 'general';
    const { results, metrics } = runClassificationEval(
      [
        { id: 'gdp', input: 'What is GDP?', expectedCategory: 'gdp_analysis' },
        { id: 'plain', input: 'What is scarcity?', expectedCategory: 'general' },
        { id: 'cpi', input: 'How is CPI built?', expectedCategory: 'inflation_unemployment' },
      ],
      alwaysGeneral,
    );

    expect(results.map((r) => r.passed)).toEqual([false, true, false]);
    expect(metrics.accuracy).toBeCloseTo(1 / 3, 10);

    const report = generateEvalReport(metrics).split('\n');
    expect(report).toContain('**Passed:** 1 (33.3%)');
    expect(report).toContain('- gdp_analysis: 0/1');
    expect(report).not.toContain('- elasticity: 0/0');
    expect(report.slice(-2)).toEqual([
      '- **gdp**: expected gdp_analysis, got general',
      '- **cpi**: expected inflation_unemployment, got general',
    ]);
  });

  it('reports zero accuracy for an empty set', () => {
    expect(runClassificationEval([]).metrics.accuracy).toBe(0);
  });
});
