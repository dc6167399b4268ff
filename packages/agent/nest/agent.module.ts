import { DynamicModule, Module, Provider } from '@nestjs/common';
import { TutorAgentService } from './agent.service.js';
import { ECONOMICS_SOLVER, TUTOR_MODEL_BINDER, type AgentModuleOptions } from './agent.tokens.js';
import { bindChatModel } from '../src/agent.js';
import { createChatModel } from '../llm/factory.js';
import { loadLLMConfig } from '../llm/config.js';
import { EconomicsSolver } from '../solver/solver.js';

@Module({})
export class AgentModule {
  static forRoot(options: AgentModuleOptions = {}): DynamicModule {
    const binderProvider: Provider = options.bindModel
      ? { provide: TUTOR_MODEL_BINDER, useValue: options.bindModel }
      : {
          provide: TUTOR_MODEL_BINDER,
          // Logs provider, model and key presence once at startup
          useFactory: () => bindChatModel(createChatModel(loadLLMConfig(), true)),
        };

    const solverProvider: Provider = {
      provide: ECONOMICS_SOLVER,
      useValue: options.solver ?? new EconomicsSolver(),
    };

    return {
      module: AgentModule,
      providers: [binderProvider, solverProvider, TutorAgentService],
      exports: [TutorAgentService, ECONOMICS_SOLVER],
    };
  }
}
