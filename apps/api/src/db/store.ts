import type {
  Chunk,
  Message,
  MessageRole,
  Report,
  ReportMetadata,
  RetrievedChunk,
  Stage,
  UsageStats,
  User,
} from "@biomeai/shared";
import { StoreError } from "../lib/errors";
import { canTransition } from "../services/stage";

export interface NewReport {
  user_id: string;
  thread_id: string;
  original_filename: string | null;
  sample_date: string | null;
  metadata: ReportMetadata;
}

/** Document-derived fields a re-upload replaces on an empty report. */
export type ReportPatch = Pick<NewReport, "original_filename" | "sample_date" | "metadata">;

export interface NewChunk {
  chunk_index: number;
  content: string;
  token_count: number;
  embedding: number[];
  metadata: { start_char: number; end_char: number };
}

export interface NewMessage {
  user_id: string | null;
  role: MessageRole;
  content: string;
  input_tokens?: number;
  output_tokens?: number;
  cost_usd?: number;
  retrieved_chunk_ids?: number[];
}

export interface AppendOptions {
  /** Stage the report enters with this message. */
  stage?: Stage;
  /** Merged into the report metadata in the same write. */
  metadata?: ReportMetadata;
}

export interface AppendResult {
  message: Message;
  report: Report;
}

/**
 * Persistence for users, reports, chunks and messages, plus nearest
 * neighbour retrieval over chunk embeddings.
 */
export interface ReportStore {
  upsertUser(id: string, displayName: string): Promise<User>;
  createReport(input: NewReport): Promise<Report>;
  /** Replaces the given fields; metadata is overwritten, not merged. */
  updateReport(id: number, patch: ReportPatch): Promise<Report>;
  getReport(id: number): Promise<Report | null>;
  findReportByThread(threadId: string): Promise<Report | null>;
  listReports(): Promise<Report[]>;
  /**
   * All or nothing. Indices must run 0..n-1 and the report must have no
   * chunks yet.
   */
  addChunks(reportId: number, chunks: NewChunk[]): Promise<Chunk[]>;
  listChunks(reportId: number): Promise<Chunk[]>;
  /** Ascending cosine distance, ties by ascending chunk index. */
  topKChunks(
    reportId: number,
    queryEmbedding: number[],
    k: number
  ): Promise<RetrievedChunk[]>;
  appendMessage(
    reportId: number,
    message: NewMessage,
    options?: AppendOptions
  ): Promise<AppendResult>;
  /** The latest `limit` messages, oldest first. */
  recentMessages(reportId: number, limit: number): Promise<Message[]>;
  listMessages(reportId: number): Promise<Message[]>;
  /** False when the event id was already recorded. */
  recordEvent(eventId: string): Promise<boolean>;
  stats(): Promise<UsageStats>;
}

export function validateChunkBatch(chunks: NewChunk[]): void {
  if (chunks.length === 0) {
    throw new StoreError("Cannot add an empty chunk batch");
  }
  const dimension = chunks[0].embedding.length;
  chunks.forEach((chunk, i) => {
    if (chunk.chunk_index !== i) {
      throw new StoreError(
        `Chunk indices must be contiguous from 0 (got ${chunk.chunk_index} at ${i})`
      );
    }
    if (chunk.embedding.length !== dimension || dimension === 0) {
      throw new StoreError(
        `Chunk ${i} has an embedding of dimension ${chunk.embedding.length}`
      );
    }
  });
}

export function assertTransition(from: Stage, to: Stage): void {
  if (!canTransition(from, to)) {
    throw new StoreError(`Invalid stage transition ${from} -> ${to}`);
  }
}
