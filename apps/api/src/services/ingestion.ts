import type { ReportMetadata } from "@biomeai/shared";
import type { NewChunk } from "../db/store";
import type { Logger } from "../lib/logger";
import { chunkText, type ChunkOptions } from "./chunker";
import type { Embedder } from "./embeddings";
import { extractText } from "./pdf-extractor";
import { extractReportMetadata } from "./report-metadata";

export interface IngestedDocument {
  pageCount: number;
  charCount: number;
  sampleDate: string | null;
  metadata: ReportMetadata;
  chunks: NewChunk[];
  promptTokens: number;
  costUsd: number;
}

export interface IngestionDeps {
  embedder: Embedder;
  chunking: ChunkOptions;
  logger: Logger;
  now: () => Date;
  extract?: typeof extractText;
}

/**
 * Extract, chunk and embed an uploaded PDF. Nothing is persisted here; the
 * caller stores the result only once every chunk has an embedding.
 */
export async function ingestDocument(
  bytes: Uint8Array,
  deps: IngestionDeps
): Promise<IngestedDocument> {
  const extract = deps.extract ?? extractText;
  const startTime = Date.now();

  const { pages, text } = await extract(bytes);
  const metadata = extractReportMetadata(text, deps.now());
  const chunks = chunkText(text, deps.chunking);

  const { embeddings, promptTokens, costUsd } = await deps.embedder.embedTexts(
    chunks.map((c) => c.content)
  );

  deps.logger.info(
    {
      pages: pages.length,
      chars: text.length,
      chunks: chunks.length,
      ms: Date.now() - startTime,
    },
    "document ingested"
  );

  return {
    pageCount: pages.length,
    charCount: text.length,
    sampleDate: metadata.sample_date ?? null,
    metadata: { ...metadata },
    chunks: chunks.map((chunk, i) => ({
      chunk_index: chunk.index,
      content: chunk.content,
      token_count: chunk.tokenCount,
      embedding: embeddings[i],
      metadata: { start_char: chunk.metadata.startChar, end_char: chunk.metadata.endChar },
    })),
    promptTokens,
    costUsd,
  };
}
