import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ChatAnthropic } from "@langchain/anthropic";
import { ChatOpenAI } from "@langchain/openai";
import { ProviderConfig } from "#worldsmith/ai/worldgen/schemas.js";

/**
 * Build a chat model for the configured provider.
 *
 * SDK-level retries are disabled: retrying, backoff and rate limiting are
 * owned by the ModelClient queue so attempts stay countable.
 */
export const createChatModel = (
    config: ProviderConfig,
    credential: string
): BaseChatModel => {
    console.log(
        `[createChatModel] Initializing ${config.provider} model: ${config.model} (maxTokens: ${config.maxTokensPerRequest})`
    );

    switch (config.provider) {
        case "anthropic":
            return new ChatAnthropic({
                model: config.model,
                apiKey: credential,
                maxTokens: config.maxTokensPerRequest,
                temperature: config.temperature,
                maxRetries: 0,
            });
        case "openai":
            return new ChatOpenAI({
                model: config.model,
                apiKey: credential,
                maxTokens: config.maxTokensPerRequest,
                temperature: config.temperature,
                maxRetries: 0,
            });
    }
};
