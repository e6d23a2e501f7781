/**
 * Model providers.
 *
 * A provider knows how to build its chat model, how to shape a request into
 * messages, and how to read text and token usage back out of a response.
 * The ModelClient queue and retry loop are provider-agnostic; adding a
 * provider means implementing this interface.
 */

import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  AIMessageChunk,
  BaseMessage,
  HumanMessage,
  MessageContent,
  SystemMessage,
} from "@langchain/core/messages";
import { createChatModel } from "#worldsmith/ai/model.js";
import { createCachedSystemMessage, stripCacheMarkers } from "#worldsmith/ai/prompt-template-processor.js";
import { ProviderResponseError } from "#worldsmith/ai/error.js";
import { ProviderConfig, ProviderName } from "#worldsmith/ai/worldgen/schemas.js";

export interface ChatRequest {
  prompt: string;
  systemPrompt?: string;
}

export interface ModelReply {
  content: string;
  tokensUsed: number;
}

export interface ModelProvider {
  readonly name: ProviderName;
  createModel(config: ProviderConfig, credential: string): BaseChatModel;
  buildRequest(request: ChatRequest): BaseMessage[];
  /** Throws ProviderResponseError when the response carries no usable text. */
  parseResponse(response: AIMessageChunk): ModelReply;
}

/**
 * Concatenated text of a message, whether its content is a plain string or
 * a list of content blocks.
 */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((block) => ("text" in block && typeof block.text === "string" ? block.text : ""))
    .join("");
}

export const anthropicProvider: ModelProvider = {
  name: "anthropic",
  createModel: createChatModel,
  buildRequest({ prompt, systemPrompt }) {
    const messages: BaseMessage[] = [];
    if (systemPrompt) messages.push(createCachedSystemMessage(systemPrompt));
    messages.push(new HumanMessage(prompt));
    return messages;
  },
  parseResponse(response) {
    if (Array.isArray(response.content) && response.content.length === 0) {
      throw new ProviderResponseError("No content blocks in response");
    }
    const content = messageText(response.content);
    if (!content.trim()) {
      throw new ProviderResponseError("No content in response");
    }
    const usage = response.usage_metadata;
    return {
      content,
      tokensUsed: usage ? usage.input_tokens + usage.output_tokens : 0,
    };
  },
};

export const openAiProvider: ModelProvider = {
  name: "openai",
  createModel: createChatModel,
  buildRequest({ prompt, systemPrompt }) {
    const messages: BaseMessage[] = [];
    if (systemPrompt) messages.push(new SystemMessage(stripCacheMarkers(systemPrompt)));
    messages.push(new HumanMessage(prompt));
    return messages;
  },
  parseResponse(response) {
    const content = messageText(response.content);
    if (!content.trim()) {
      throw new ProviderResponseError("No content in response");
    }
    return {
      content,
      tokensUsed: response.usage_metadata?.total_tokens ?? 0,
    };
  },
};

const PROVIDERS: Record<ProviderName, ModelProvider> = {
  anthropic: anthropicProvider,
  openai: openAiProvider,
};

export function getProvider(name: ProviderName): ModelProvider {
  return PROVIDERS[name];
}
