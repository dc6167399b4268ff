import { describe, it, expect } from 'vitest';
import { createEconomicsSolverTool, createTutorTools, ECONOMICS_SOLVER_TOOL_NAME } from '../src/tools.js';
import { EconomicsSolver } from '../solver/solver.js';

describe('economics_solver tool', () => {
  const solver = new EconomicsSolver();

  it('is exposed under its public name', () => {
    const tools = createTutorTools(solver);
    expect(tools.map((t) => t.name)).toEqual([ECONOMICS_SOLVER_TOOL_NAME]);
    expect(ECONOMICS_SOLVER_TOOL_NAME).toBe('economics_solver');
  });

  it('returns the solver text for a problem', async () => {
    const problem = 'Why does a monopoly charge more than a competitive firm?';
    const output = String(await createEconomicsSolverTool(solver).invoke({ problem }));
    expect(output).toBe(solver.solve(problem));
    expect(output.startsWith('**MARKET STRUCTURE ANALYSIS**')).toBe(true);
  });

  it('rejects an empty problem', async () => {
    await expect(createEconomicsSolverTool(solver).invoke({ problem: '' })).rejects.toThrow();
  });
});
