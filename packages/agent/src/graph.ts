import { StateGraph, START, END } from '@langchain/langgraph';
/** Use LangGraph's built-in messages channel + reducer. */
import { MessagesAnnotation } from '@langchain/langgraph';
import { isAIMessage, ToolMessage, type BaseMessage } from '@langchain/core/messages';
import type { ToolCall } from '@langchain/core/messages/tool';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { Logger } from '@nestjs/common';
import type { ToolCallingModel } from './agent.js';

const logger = new Logger('TutorGraph');

// Helper to stringify with truncation for logs
const safeStr = (v: unknown, max = 800) => {
  try {
    const s = typeof v === 'string' ? v : JSON.stringify(v);
    return s.length > max ? `${s.slice(0, max)}…(truncated)` : s;
  } catch {
    return '[unserializable]';
  }
};

const toolCallsOf = (message: BaseMessage | undefined): ToolCall[] =>
  message !== undefined && isAIMessage(message) && Array.isArray(message.tool_calls) ? message.tool_calls : [];

/** Router: if the last message has tool calls, go to tools; otherwise END. */
function shouldContinue(state: typeof MessagesAnnotation.State) {
  const last = state.messages[state.messages.length - 1];
  return toolCallsOf(last).length > 0 ? 'tools' : END;
}

export interface TutorGraphDeps {
  model: ToolCallingModel;
  tools: StructuredToolInterface[];
}

/** Compile the agent/tools loop. */
export function compileTutorGraph({ model, tools }: TutorGraphDeps) {
  const toolMap = new Map(tools.map((t) => [t.name, t] as const));

  /** Agent node: ask the model what to do next. */
  async function agentNode(state: typeof MessagesAnnotation.State) {
    logger.log(`🤖 [Agent] Message count: ${state.messages.length}`);
    const result = await model.invoke({ messages: state.messages });
    const calls = toolCallsOf(result);
    logger.log(`🤖 [Agent] Has tool calls: ${calls.length > 0}`);
    if (calls.length > 0) {
      logger.debug(`🤖 [Agent] Tool calls: ${safeStr(calls.map((c) => c.name))}`);
    }
    return { messages: [result] };
  }

  async function toolsNode(state: typeof MessagesAnnotation.State) {
    const calls = toolCallsOf(state.messages[state.messages.length - 1]);
    const results = await Promise.all(
      calls.map(async (call) => {
        const target = toolMap.get(call.name);
        const id = call.id ?? call.name;

        if (!target) {
          logger.warn(`🤖 [Agent] Tool not found: ${call.name} (id=${id})`);
          return new ToolMessage({
            content: `Tool not found: ${call.name}`,
            tool_call_id: id,
            status: 'error',
          });
        }

        const started = Date.now();
        logger.log(`🤖 [Agent] 🔧 Calling tool: ${call.name}`);
        logger.debug(`🤖 [Agent] 🔧 Args: ${safeStr(call.args)}`);

        try {
          const output: unknown = await target.invoke(call.args);
          const duration = Date.now() - started;
          logger.log(`🤖 [Agent] 🔧 Tool '${call.name}' completed in ${duration}ms`);
          logger.debug(`🤖 [Agent] 🔧 Output: ${safeStr(output)}`);

          return new ToolMessage({
            content: typeof output === 'string' ? output : JSON.stringify(output),
            tool_call_id: id,
            status: 'success',
          });
        } catch (err) {
          const duration = Date.now() - started;
          const message = err instanceof Error ? err.message : String(err);
          logger.error(`🤖 [Agent] 🔧 Tool '${call.name}' failed in ${duration}ms: ${message}`);
          return new ToolMessage({
            content: `Tool '${call.name}' error: ${message}`,
            tool_call_id: id,
            status: 'error',
          });
        }
      }),
    );
    return { messages: results };
  }

  const graph = new StateGraph(MessagesAnnotation)
    .addNode('agent', agentNode)
    .addNode('tools', toolsNode)
    .addEdge(START, 'agent')
    .addConditionalEdges('agent', shouldContinue, ['tools', END])
    .addEdge('tools', 'agent');
  return graph.compile();
}

export type TutorGraph = ReturnType<typeof compileTutorGraph>;
