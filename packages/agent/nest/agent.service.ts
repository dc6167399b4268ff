import { Inject, Injectable, Logger } from '@nestjs/common';
import { HumanMessage, isAIMessage, type BaseMessage } from '@langchain/core/messages';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { compileTutorGraph, type TutorGraph } from '../src/graph.js';
import type { TutorModelBinder } from '../src/agent.js';
import { buildTutorSystemMessage, TUTOR_KICKOFF_MESSAGE } from '../src/prompts.js';
import { createTutorTools } from '../src/tools.js';
import type { EconomicsSolver } from '../solver/solver.js';
import { ECONOMICS_SOLVER, TUTOR_MODEL_BINDER } from './agent.tokens.js';

export interface TutorInvokeOptions {
  // Abort the whole invocation after this long
  timeoutMs?: number;
  recursionLimit?: number;
  waitForMentionsTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface TutorRunResult {
  messages: BaseMessage[];
  finalOutput: string | null;
}

const contentToString = (content: BaseMessage['content']) =>
  typeof content === 'string' ? content : JSON.stringify(content);

@Injectable()
export class TutorAgentService {
  private readonly logger = new Logger(TutorAgentService.name);

  constructor(
    @Inject(TUTOR_MODEL_BINDER) private readonly bindModel: TutorModelBinder,
    @Inject(ECONOMICS_SOLVER) private readonly solver: EconomicsSolver,
  ) {}

  /**
   * Graph over the server's tools plus the solver tool.
   */
  createGraph(
    coralTools: StructuredToolInterface[],
    waitForMentionsTimeoutMs?: number,
  ): TutorGraph {
    const agentTools = createTutorTools(this.solver);
    const tools: StructuredToolInterface[] = [...coralTools, ...agentTools];
    const systemMessage = buildTutorSystemMessage({
      coralTools,
      agentTools,
      waitForMentionsTimeoutMs,
    });
    return compileTutorGraph({ model: this.bindModel(tools, systemMessage), tools });
  }

  /**
   * Run one receive → solve → reply pass and return the final AI text.
   */
  async invoke(
    coralTools: StructuredToolInterface[],
    options: TutorInvokeOptions = {},
  ): Promise<TutorRunResult> {
    const graph = this.createGraph(coralTools, options.waitForMentionsTimeoutMs);
    const signals = [
      options.signal,
      options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
    ].filter((s): s is AbortSignal => s !== undefined);

    const signal = signals.length > 1 ? AbortSignal.any(signals) : signals[0];

    const res = await graph.invoke(
      { messages: [new HumanMessage(TUTOR_KICKOFF_MESSAGE)] },
      {
        ...(options.recursionLimit ? { recursionLimit: options.recursionLimit } : {}),
        ...(signal ? { signal } : {}),
      },
    );

    let finalOutput: string | null = null;
    for (const msg of res.messages) {
      if (isAIMessage(msg) && (msg.tool_calls?.length ?? 0) === 0 && msg.content) {
        finalOutput = contentToString(msg.content);
      }
    }

    this.logger.log(
      `Invocation finished with ${res.messages.length} messages${finalOutput ? '' : ' and no final answer'}`,
    );
    return { messages: res.messages, finalOutput };
  }
}
