import OpenAI from "openai";
import type { RateTable } from "../config";
import { EmbeddingError, ProviderError, describeError } from "../lib/errors";
import type { Logger } from "../lib/logger";
import { withRetry } from "../lib/retry";
import { estimateCost } from "./pricing";

export interface EmbeddingBatch {
  embeddings: number[][];
  model: string;
  promptTokens: number;
}

/** Remote call that embeds a batch of inputs with the named model. */
export type EmbeddingTransport = (input: string[], model: string) => Promise<EmbeddingBatch>;

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (error instanceof OpenAI.APIError) {
    const retryAfter = error.headers?.["retry-after"];
    const seconds = retryAfter ? Number(retryAfter) : Number.NaN;
    const retryAfterMs = Number.isNaN(seconds) ? null : seconds * 1000;
    return new ProviderError(error.status ?? null, error.message, retryAfterMs, {
      cause: error,
    });
  }
  return new ProviderError(null, describeError(error), null, { cause: error });
}

export function createOpenAIEmbeddingTransport(openai: OpenAI): EmbeddingTransport {
  return async (input, model) => {
    try {
      const response = await openai.embeddings.create({ model, input });
      return {
        embeddings: [...response.data]
          .sort((a, b) => a.index - b.index)
          .map((d) => d.embedding),
        model: response.model,
        promptTokens: response.usage.prompt_tokens,
      };
    } catch (error) {
      throw toProviderError(error);
    }
  };
}

export interface EmbedderOptions {
  model: string;
  rates: RateTable;
  retryBackoffMs: number;
  logger: Logger;
  /** Inputs per API call. */
  batchSize?: number;
}

export interface EmbeddedTexts {
  embeddings: number[][];
  promptTokens: number;
  costUsd: number;
}

export class Embedder {
  private readonly batchSize: number;

  constructor(
    private readonly transport: EmbeddingTransport,
    private readonly options: EmbedderOptions
  ) {
    this.batchSize = options.batchSize ?? 100;
  }

  async embedTexts(texts: string[]): Promise<EmbeddedTexts> {
    if (texts.length === 0) {
      return { embeddings: [], promptTokens: 0, costUsd: 0 };
    }

    const embeddings: number[][] = [];
    let promptTokens = 0;
    const batches = Math.ceil(texts.length / this.batchSize);

    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      this.options.logger.debug(
        { batch: i / this.batchSize + 1, batches, size: batch.length },
        "embedding batch"
      );
      const result = await this.call(batch);
      embeddings.push(...result.embeddings);
      promptTokens += result.promptTokens;
    }

    const dimension = embeddings[0].length;
    if (embeddings.some((vector) => vector.length !== dimension)) {
      throw new EmbeddingError("Embedding API returned vectors of differing dimensions");
    }

    return {
      embeddings,
      promptTokens,
      costUsd: estimateCost(this.options.rates, this.options.model, {
        promptTokens,
        completionTokens: 0,
      }),
    };
  }

  async embedQuery(
    query: string
  ): Promise<{ embedding: number[]; promptTokens: number; costUsd: number }> {
    const result = await this.embedTexts([query]);
    return {
      embedding: result.embeddings[0],
      promptTokens: result.promptTokens,
      costUsd: result.costUsd,
    };
  }

  private async call(batch: string[]): Promise<EmbeddingBatch> {
    let result: EmbeddingBatch;
    try {
      result = await withRetry(() => this.transport(batch, this.options.model), {
        retries: 1,
        rateLimitBackoffMs: this.options.retryBackoffMs,
        label: "embedding",
        logger: this.options.logger,
      });
    } catch (error) {
      throw new EmbeddingError(`Embedding request failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (result.embeddings.length !== batch.length) {
      throw new EmbeddingError(
        `Embedding API returned ${result.embeddings.length} vectors for ${batch.length} inputs`
      );
    }
    return result;
  }
}
