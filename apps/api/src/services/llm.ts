import OpenAI from "openai";
import type { ChatCompletion } from "openai/resources/chat/completions";
import type { RateTable } from "../config";
import { ModelCallError, ProviderError, describeError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { withRetry } from "../lib/retry";
import { toProviderError } from "./embeddings";
import { estimateCost, type TokenUsage } from "./pricing";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string };

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  /** Omitted for unbounded replies. */
  maxTokens?: number;
  temperature: number;
}

export interface ChatResult {
  content: string;
  model: string;
  usage: TokenUsage;
}

export type ChatTransport = (request: ChatRequest) => Promise<ChatResult>;

export function createOpenAIChatTransport(openai: OpenAI): ChatTransport {
  return async (request) => {
    let response: ChatCompletion;
    try {
      response = await openai.chat.completions.create({
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      });
    } catch (error) {
      throw toProviderError(error);
    }

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new ProviderError(null, "Model returned an empty completion");
    }

    return {
      content,
      model: response.model,
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
      },
    };
  };
}

export interface Completion extends ChatResult {
  costUsd: number;
}

export interface ModelClientOptions {
  model: string;
  rates: RateTable;
  retryBackoffMs: number;
  logger: Logger;
}

/**
 * Synchronous, per-turn access to the chat model: one retry at most,
 * token usage priced from the rate table.
 */
export class ModelClient {
  constructor(
    private readonly transport: ChatTransport,
    private readonly options: ModelClientOptions
  ) {}

  async complete(
    messages: ChatMessage[],
    params: { maxTokens?: number; temperature?: number } = {}
  ): Promise<Completion> {
    const request: ChatRequest = {
      model: this.options.model,
      messages,
      maxTokens: params.maxTokens,
      temperature: params.temperature ?? 0.7,
    };

    const startTime = Date.now();
    let result: ChatResult;
    try {
      result = await withRetry(() => this.transport(request), {
        retries: 1,
        rateLimitBackoffMs: this.options.retryBackoffMs,
        label: "chat completion",
        logger: this.options.logger,
      });
    } catch (error) {
      throw new ModelCallError(`Chat completion failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    const costUsd = estimateCost(this.options.rates, result.model, result.usage);
    this.options.logger.info(
      {
        model: result.model,
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        costUsd,
        ms: Date.now() - startTime,
      },
      "chat completion"
    );

    return { ...result, costUsd };
  }
}
