import { z } from 'zod';
import { tool } from '@langchain/core/tools';
import { Logger } from '@nestjs/common';
import { EconomicsSolver } from '../solver/solver.js';
import { ECONOMICS_SOLVER_DESCRIPTION } from './prompts.js';

const logger = new Logger('EconomicsSolverTool');

export const ECONOMICS_SOLVER_TOOL_NAME = 'economics_solver';

export const economicsSolverSchema = z.object({
  problem: z.string().min(1).describe('The economics problem or question to solve'),
});

/** Wrap the solver as a structured tool the chat model can call. */
export const createEconomicsSolverTool = (solver = new EconomicsSolver()) =>
  tool(
    async (input: z.infer<typeof economicsSolverSchema>) => {
      const { problem } = economicsSolverSchema.parse(input);
      const { category, reading, text } = solver.analyze(problem);
      logger.log(
        `Solved problem as ${category}${reading ? ` (elasticity ${reading.elasticity.toFixed(2)}, ${reading.label})` : ''}`,
      );
      return text;
    },
    {
      name: ECONOMICS_SOLVER_TOOL_NAME,
      description: ECONOMICS_SOLVER_DESCRIPTION,
      schema: economicsSolverSchema,
    },
  );

export const createTutorTools = (solver = new EconomicsSolver()) => [
  createEconomicsSolverTool(solver),
];
