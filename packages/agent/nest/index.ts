export { AgentModule } from './agent.module.js';
export { TutorAgentService } from './agent.service.js';
export type { TutorInvokeOptions, TutorRunResult } from './agent.service.js';
export { TUTOR_MODEL_BINDER, ECONOMICS_SOLVER, type AgentModuleOptions } from './agent.tokens.js';
