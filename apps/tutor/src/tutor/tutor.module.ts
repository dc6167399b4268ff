import { DynamicModule, Module } from '@nestjs/common';
import { AgentModule, type AgentModuleOptions } from '@econ-tutor/agent';
import { CoralModule } from '../coral/coral.module.js';
import { TutorLoopService } from './tutor-loop.service.js';

@Module({})
export class TutorModule {
  /** Agent options go to the agent module this loop consumes. */
  static forRoot(agent: AgentModuleOptions = {}): DynamicModule {
    return {
      module: TutorModule,
      imports: [CoralModule, AgentModule.forRoot(agent)],
      providers: [TutorLoopService],
      exports: [TutorLoopService],
    };
  }
}
