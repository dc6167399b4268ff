import type { TutorModelBinder } from '../src/agent.js';
import type { EconomicsSolver } from '../solver/solver.js';

export const TUTOR_MODEL_BINDER = Symbol('TUTOR_MODEL_BINDER');
export const ECONOMICS_SOLVER = Symbol('ECONOMICS_SOLVER');

export interface AgentModuleOptions {
  // Defaults to the provider chosen by the environment (see llm/config)
  bindModel?: TutorModelBinder;
  solver?: EconomicsSolver;
}
