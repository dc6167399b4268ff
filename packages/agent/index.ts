export * from './solver/index.js';
export * from './llm/index.js';
export * from './nest/index.js';
export { bindChatModel, type ToolCallingModel, type TutorModelBinder } from './src/agent.js';
export { compileTutorGraph, type TutorGraph, type TutorGraphDeps } from './src/graph.js';
export {
  createEconomicsSolverTool,
  createTutorTools,
  economicsSolverSchema,
  ECONOMICS_SOLVER_TOOL_NAME,
} from './src/tools.js';
export {
  buildTutorSystemMessage,
  describeTools,
  TUTOR_AGENT_DESCRIPTION,
  TUTOR_KICKOFF_MESSAGE,
  ECONOMICS_SOLVER_DESCRIPTION,
  type DescribedTool,
} from './src/prompts.js';
