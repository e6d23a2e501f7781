/**
 * Chat model stand-in for tests. Each call hands the last message's text to
 * a responder; a returned string becomes the reply, a returned Error is
 * thrown as if the provider had failed.
 */

import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AIMessage, BaseMessage } from "@langchain/core/messages";
import { ChatResult } from "@langchain/core/outputs";
import { messageText } from "#worldsmith/ai/worldgen/providers.js";

export type ScriptedReply = string | Error;
export type Responder = (prompt: string, call: number) => ScriptedReply;

export const TOKENS_PER_REPLY = 10;

export class ScriptedChatModel extends BaseChatModel {
  readonly prompts: string[] = [];
  private readonly responder: Responder;

  constructor(responder: Responder) {
    super({ maxRetries: 0 });
    this.responder = responder;
  }

  _llmType(): string {
    return "scripted";
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    const last = messages[messages.length - 1];
    const prompt = last ? messageText(last.content) : "";
    this.prompts.push(prompt);

    const reply = this.responder(prompt, this.prompts.length);
    if (reply instanceof Error) throw reply;

    const message = new AIMessage({
      content: reply,
      usage_metadata: { input_tokens: 6, output_tokens: 4, total_tokens: TOKENS_PER_REPLY },
    });
    return { generations: [{ text: reply, message }] };
  }
}

/** Replies from a fixed list, in order; runs out with an error. */
export function replyInOrder(replies: ScriptedReply[]): Responder {
  return (_prompt, call) => replies[call - 1] ?? new Error(`No scripted reply for call ${call}`);
}
