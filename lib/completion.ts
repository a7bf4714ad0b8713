import { ChatOpenAI } from "@langchain/openai";
import { HumanMessage, type MessageContent } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";

import type { EnvConfig } from "./env";

/**
 * The inference capability the agents depend on: a prompt in, free-form text
 * out. No structure is promised; callers recover it with `parseStructured`.
 */
export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}

export class ChatCompletionClient implements CompletionClient {
  private llm: BaseChatModel;

  constructor(llm: BaseChatModel) {
    this.llm = llm;
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.llm.invoke([new HumanMessage(prompt)]);
    return contentToText(response.content);
  }
}

export function contentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map(part => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
    .join("");
}

export function createCompletionClient(env: EnvConfig): CompletionClient {
  const apiKey = env.openaiApiKey;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY environment variable is not set');
  }

  const llm = new ChatOpenAI({
    modelName: env.model.name,
    temperature: env.model.temperature,
    maxTokens: env.model.maxTokens,
    openAIApiKey: apiKey,
  });

  return new ChatCompletionClient(llm);
}
