/**
 * Model Client
 *
 * Owns all network I/O for a generation run. Requests are queued and drained
 * by a single consumer, so at most one provider call is in flight per client.
 * Each request waits until requestDelayMs has passed since the previous call
 * returned, and failed calls are retried up to maxRetries attempts in total.
 * A retry waits retryDelayMs only; the request delay applies to the first
 * attempt. send() never rejects: failures come back as { ok: false }.
 */

import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { BaseCallbackHandler } from "@langchain/core/callbacks/base";
import { OverloadedError, describeProviderError, toProviderError } from "#worldsmith/ai/error.js";
import { createTracerCallbacks } from "#worldsmith/ai/model-config.js";
import { ModelProvider, getProvider } from "#worldsmith/ai/worldgen/providers.js";
import { ProviderConfig } from "#worldsmith/ai/worldgen/schemas.js";

export type SendResult =
  | { ok: true; content: string; tokensUsed: number; attempts: number }
  | { ok: false; error: string; attempts: number };

export interface ModelClientOptions {
  config: ProviderConfig;
  credential: string;
  provider?: ModelProvider;
  /** Pre-built chat model; by default the provider builds one from config and credential. */
  model?: BaseChatModel;
  tracerProjectName?: string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onStatus?: (status: string) => void;
  onError?: (message: string) => void;
}

interface PendingRequest {
  prompt: string;
  systemPrompt?: string;
  resolve: (result: SendResult) => void;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ModelClient {
  private readonly config: ProviderConfig;
  private readonly provider: ModelProvider;
  private readonly model: BaseChatModel;
  private readonly callbacks: BaseCallbackHandler[];
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly onStatus?: (status: string) => void;
  private readonly onError?: (message: string) => void;

  private readonly queue: PendingRequest[] = [];
  private draining = false;
  private lastCompletedAt: number | null = null;
  private totalTokens = 0;

  constructor(options: ModelClientOptions) {
    this.config = options.config;
    this.provider = options.provider ?? getProvider(options.config.provider);
    this.model = options.model ?? this.provider.createModel(options.config, options.credential);
    this.callbacks = createTracerCallbacks(options.tracerProjectName);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.onStatus = options.onStatus;
    this.onError = options.onError;
  }

  get tokensUsed(): number {
    return this.totalTokens;
  }

  send(prompt: string, systemPrompt?: string): Promise<SendResult> {
    return new Promise<SendResult>((resolve) => {
      this.queue.push({ prompt, systemPrompt, resolve });
      this.drain().catch((error) => {
        console.error("[model-client] Queue drain failed:", describeProviderError(error));
      });
    });
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      let request = this.queue.shift();
      while (request) {
        const result = await this.execute(request);
        request.resolve(result);
        request = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  private async waitForRateLimit(): Promise<void> {
    if (this.lastCompletedAt === null) return;
    const elapsed = this.now() - this.lastCompletedAt;
    const remaining = this.config.requestDelayMs - elapsed;
    if (remaining > 0) {
      await this.sleep(remaining);
    }
  }

  private async execute(request: PendingRequest): Promise<SendResult> {
    const maxAttempts = this.config.maxRetries;
    let lastError = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt === 1) await this.waitForRateLimit();
      try {
        const messages = this.provider.buildRequest(request);
        const response = await this.model.invoke(messages, { callbacks: this.callbacks });
        this.lastCompletedAt = this.now();
        const reply = this.provider.parseResponse(response);
        this.totalTokens += reply.tokensUsed;
        return { ok: true, ...reply, attempts: attempt };
      } catch (error) {
        this.lastCompletedAt = this.now();
        const providerError = toProviderError(error);
        lastError = describeProviderError(providerError);
        console.warn(`[model-client] Attempt ${attempt}/${maxAttempts} failed: ${lastError}`);
        this.onError?.(`Request failed (attempt ${attempt}/${maxAttempts}): ${lastError}`);

        if (attempt < maxAttempts) {
          const reason = providerError instanceof OverloadedError ? "Provider overloaded" : "Request failed";
          this.onStatus?.(`${reason}, retrying (${attempt}/${maxAttempts})...`);
          await this.sleep(this.config.retryDelayMs);
        }
      }
    }

    return {
      ok: false,
      error: `Request failed after ${maxAttempts} attempts: ${lastError}`,
      attempts: maxAttempts,
    };
  }
}
