import { describe, it, expect } from 'vitest';
import { classifyProblem } from '../solver/classify.js';
import {
  CATEGORY_KEYWORDS,
  CATEGORIES,
  isCategory,
  type Category,
} from '../solver/categories.js';

describe('classifyProblem', () => {
  it('falls back to general when no keyword matches', () => {
    expect(classifyProblem('What is opportunity cost?')).toBe('general');
    expect(classifyProblem('Trade between nations and exchange rates')).toBe('general');
  });

  it('classifies the empty string as general', () => {
    expect(classifyProblem('')).toBe('general');
  });

  it.each(
    CATEGORY_KEYWORDS.flatMap(({ category, keywords }) =>
      keywords.map((keyword): [string, Category] => [keyword, category]),
    ),
  )('maps a question containing only "%s" to %s', (keyword, category) => {
    expect(classifyProblem(`Please explain ${keyword} to me.`)).toBe(category);
  });

  it('matches keywords case-insensitively', () => {
    expect(classifyProblem('WHAT IS GDP?')).toBe('gdp_analysis');
    expect(classifyProblem('Is Gasoline Inelastic?')).toBe('elasticity');
  });

  it('matches keywords inside longer words', () => {
    // "elastic" is a substring of "elasticities"
    expect(classifyProblem('Compare cross elasticities')).toBe('elasticity');
    // "shift" inside "shifting"
    expect(classifyProblem('Why is the line shifting?')).toBe('supply_demand');
  });

  it('prefers the earliest category in priority order', () => {
    expect(classifyProblem('How do supply shocks affect GDP?')).toBe('supply_demand');
    expect(
      classifyProblem(
        'If the demand curve is Qd = 100 - 2P and the supply curve is Qs = 20 + 3P, find the market equilibrium.',
      ),
    ).toBe('supply_demand');
    expect(classifyProblem('Is the equilibrium price elastic?')).toBe('elasticity');
    expect(classifyProblem('Does inflation hurt competition?')).toBe('inflation_unemployment');
    expect(classifyProblem('Deadweight loss under monopoly')).toBe('consumer_producer_surplus');
  });

  it('only returns known categories', () => {
    for (const text of ['', 'supply', 'monopoly', 'cpi', 'hello']) {
      expect(isCategory(classifyProblem(text))).toBe(true);
    }
    expect(CATEGORIES).toHaveLength(8);
  });
});
