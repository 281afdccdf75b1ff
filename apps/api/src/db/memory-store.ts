import type {
  Chunk,
  Message,
  Report,
  RetrievedChunk,
  UsageStats,
  User,
} from "@biomeai/shared";
import { StoreError } from "../lib/errors";
import {
  assertTransition,
  validateChunkBatch,
  type AppendOptions,
  type AppendResult,
  type NewChunk,
  type NewMessage,
  type NewReport,
  type ReportPatch,
  type ReportStore,
} from "./store";

interface StoredChunk extends Chunk {
  embedding: number[];
}

export function cosineDistance(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new StoreError(`Embedding dimension mismatch: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * In-process store. Every operation completes without yielding between
 * its reads and writes, so appends for one report never interleave.
 */
export class MemoryReportStore implements ReportStore {
  private users = new Map<string, User>();
  private reports = new Map<number, Report>();
  private chunks = new Map<number, StoredChunk[]>();
  private messages = new Map<number, Message[]>();
  private events = new Set<string>();
  private nextReportId = 1;
  private nextChunkId = 1;
  private nextMessageId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsertUser(id: string, displayName: string): Promise<User> {
    const timestamp = this.now().toISOString();
    const existing = this.users.get(id);
    const user: User = existing
      ? { ...existing, display_name: displayName, updated_at: timestamp }
      : { id, display_name: displayName, created_at: timestamp, updated_at: timestamp };
    this.users.set(id, user);
    return { ...user };
  }

  async createReport(input: NewReport): Promise<Report> {
    if (!this.users.has(input.user_id)) {
      throw new StoreError(`Unknown user ${input.user_id}`);
    }
    for (const report of this.reports.values()) {
      if (report.thread_id === input.thread_id) {
        throw new StoreError(`Thread ${input.thread_id} already has a report`);
      }
    }

    const timestamp = this.now().toISOString();
    const report: Report = {
      id: this.nextReportId++,
      user_id: input.user_id,
      thread_id: input.thread_id,
      original_filename: input.original_filename,
      sample_date: input.sample_date,
      metadata: { ...input.metadata },
      stage: "awaiting_upload",
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.reports.set(report.id, report);
    this.chunks.set(report.id, []);
    this.messages.set(report.id, []);
    return cloneReport(report);
  }

  async updateReport(id: number, patch: ReportPatch): Promise<Report> {
    const report = this.reports.get(id);
    if (!report) {
      throw new StoreError(`Unknown report ${id}`);
    }
    report.original_filename = patch.original_filename;
    report.sample_date = patch.sample_date;
    report.metadata = { ...patch.metadata };
    report.updated_at = this.now().toISOString();
    return cloneReport(report);
  }

  async getReport(id: number): Promise<Report | null> {
    const report = this.reports.get(id);
    return report ? cloneReport(report) : null;
  }

  async findReportByThread(threadId: string): Promise<Report | null> {
    for (const report of this.reports.values()) {
      if (report.thread_id === threadId) return cloneReport(report);
    }
    return null;
  }

  async listReports(): Promise<Report[]> {
    return [...this.reports.values()]
      .sort((a, b) => b.id - a.id)
      .map(cloneReport);
  }

  async addChunks(reportId: number, chunks: NewChunk[]): Promise<Chunk[]> {
    const existing = this.requireChunks(reportId);
    if (existing.length > 0) {
      throw new StoreError(`Report ${reportId} already has chunks`);
    }
    validateChunkBatch(chunks);

    const stored: StoredChunk[] = chunks.map((chunk) => ({
      id: this.nextChunkId++,
      report_id: reportId,
      chunk_index: chunk.chunk_index,
      content: chunk.content,
      token_count: chunk.token_count,
      metadata: { ...chunk.metadata },
      embedding: [...chunk.embedding],
    }));
    this.chunks.set(reportId, stored);
    return stored.map(stripEmbedding);
  }

  async listChunks(reportId: number): Promise<Chunk[]> {
    return this.requireChunks(reportId).map(stripEmbedding);
  }

  async topKChunks(
    reportId: number,
    queryEmbedding: number[],
    k: number
  ): Promise<RetrievedChunk[]> {
    if (k <= 0) return [];
    return this.requireChunks(reportId)
      .map((chunk) => ({
        ...stripEmbedding(chunk),
        distance: cosineDistance(chunk.embedding, queryEmbedding),
      }))
      .sort((a, b) => a.distance - b.distance || a.chunk_index - b.chunk_index)
      .slice(0, k);
  }

  async appendMessage(
    reportId: number,
    input: NewMessage,
    options: AppendOptions = {}
  ): Promise<AppendResult> {
    const report = this.reports.get(reportId);
    if (!report) {
      throw new StoreError(`Unknown report ${reportId}`);
    }
    if (options.stage) {
      assertTransition(report.stage, options.stage);
    }

    const timestamp = this.now().toISOString();
    const message: Message = {
      id: this.nextMessageId++,
      report_id: reportId,
      user_id: input.user_id,
      role: input.role,
      content: input.content,
      input_tokens: input.input_tokens ?? 0,
      output_tokens: input.output_tokens ?? 0,
      cost_usd: input.cost_usd ?? 0,
      retrieved_chunk_ids: [...(input.retrieved_chunk_ids ?? [])],
      stage_transition: options.stage ?? null,
      created_at: timestamp,
    };
    this.requireMessages(reportId).push(message);

    if (options.stage || options.metadata) {
      report.stage = options.stage ?? report.stage;
      report.metadata = { ...report.metadata, ...options.metadata };
      report.updated_at = timestamp;
    }

    return { message: { ...message }, report: cloneReport(report) };
  }

  async recentMessages(reportId: number, limit: number): Promise<Message[]> {
    if (limit <= 0) return [];
    return this.requireMessages(reportId)
      .slice(-limit)
      .map((message) => ({ ...message }));
  }

  async listMessages(reportId: number): Promise<Message[]> {
    return this.requireMessages(reportId).map((message) => ({ ...message }));
  }

  async recordEvent(eventId: string): Promise<boolean> {
    if (this.events.has(eventId)) return false;
    this.events.add(eventId);
    return true;
  }

  async stats(): Promise<UsageStats> {
    let messages = 0;
    let cost = 0;
    for (const list of this.messages.values()) {
      messages += list.length;
      for (const message of list) cost += message.cost_usd;
    }
    return {
      users: this.users.size,
      reports: this.reports.size,
      messages,
      total_cost_usd: Math.round(cost * 1e6) / 1e6,
    };
  }

  private requireChunks(reportId: number): StoredChunk[] {
    const chunks = this.chunks.get(reportId);
    if (!chunks) throw new StoreError(`Unknown report ${reportId}`);
    return chunks;
  }

  private requireMessages(reportId: number): Message[] {
    const messages = this.messages.get(reportId);
    if (!messages) throw new StoreError(`Unknown report ${reportId}`);
    return messages;
  }
}

function cloneReport(report: Report): Report {
  return { ...report, metadata: { ...report.metadata } };
}

function stripEmbedding({ embedding: _embedding, ...chunk }: StoredChunk): Chunk {
  return { ...chunk, metadata: { ...chunk.metadata } };
}
