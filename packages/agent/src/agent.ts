import { ChatPromptTemplate, MessagesPlaceholder } from '@langchain/core/prompts';
import { SystemMessage, type BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { StructuredToolInterface } from '@langchain/core/tools';

/** Anything that answers a message history with the next AI message. */
export interface ToolCallingModel {
  invoke(input: { messages: BaseMessage[] }): Promise<BaseMessage>;
}

/** Binds a tool list and system message to a model, once per graph. */
export type TutorModelBinder = (
  tools: StructuredToolInterface[],
  systemMessage: string,
) => ToolCallingModel;

/** Prompt (system + history) piped into the model with tools bound. */
export const bindChatModel =
  (model: BaseChatModel): TutorModelBinder =>
  (tools, systemMessage) => {
    if (!model.bindTools) {
      throw new Error(`Chat model ${model.getName()} does not support tool calling`);
    }
    const prompt = ChatPromptTemplate.fromMessages([
      new SystemMessage(systemMessage),
      new MessagesPlaceholder('messages'),
    ]);
    return prompt.pipe(model.bindTools(tools));
  };
