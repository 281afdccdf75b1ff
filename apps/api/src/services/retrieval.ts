import type { RetrievedChunk } from "@biomeai/shared";
import type { ReportStore } from "../db/store";
import type { Logger } from "../lib/logger";
import type { Embedder } from "./embeddings";

export interface Retrieval {
  chunks: RetrievedChunk[];
  promptTokens: number;
  costUsd: number;
}

/** Embed the query and return the report's nearest chunks. */
export async function retrieve(
  deps: { store: ReportStore; embedder: Embedder; logger: Logger },
  reportId: number,
  query: string,
  topK = 5
): Promise<Retrieval> {
  const { embedding, promptTokens, costUsd } = await deps.embedder.embedQuery(query);
  const chunks = await deps.store.topKChunks(reportId, embedding, topK);

  deps.logger.debug(
    {
      reportId,
      query: query.slice(0, 80),
      retrieved: chunks.map((c) => ({
        index: c.chunk_index,
        distance: Number(c.distance.toFixed(3)),
      })),
    },
    "retrieved chunks"
  );

  return { chunks, promptTokens, costUsd };
}
