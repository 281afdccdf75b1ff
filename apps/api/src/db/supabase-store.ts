import type { SupabaseClient } from "@supabase/supabase-js";
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
  AppendRow,
  toChunk,
  toMessage,
  toReport,
  toRetrievedChunk,
  toStats,
  toUser,
} from "./rows";
import {
  validateChunkBatch,
  type AppendOptions,
  type AppendResult,
  type NewChunk,
  type NewMessage,
  type NewReport,
  type ReportPatch,
  type ReportStore,
} from "./store";

interface PostgrestFailure {
  message: string;
  code?: string;
}

const UNIQUE_VIOLATION = "23505";
const CHUNK_COLUMNS = "id, report_id, chunk_index, content, token_count, metadata";

function fail(operation: string, error: PostgrestFailure): never {
  throw new StoreError(`${operation} failed: ${error.message}`, { cause: error });
}

function toVectorLiteral(embedding: number[]): string {
  // pgvector accepts the bracketed text form over PostgREST
  return `[${embedding.join(",")}]`;
}

/**
 * Report store backed by Supabase Postgres with pgvector. Stage changes and
 * message appends go through `append_report_message`, which runs in one
 * transaction under a row lock on the report.
 */
export class SupabaseReportStore implements ReportStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async upsertUser(id: string, displayName: string): Promise<User> {
    const { data, error } = await this.supabase
      .from("users")
      .upsert(
        { id, display_name: displayName, updated_at: new Date().toISOString() },
        { onConflict: "id" }
      )
      .select()
      .single();
    if (error) fail("upsertUser", error);
    return toUser(data);
  }

  async createReport(input: NewReport): Promise<Report> {
    const { data, error } = await this.supabase
      .from("reports")
      .insert({ ...input, stage: "awaiting_upload" })
      .select()
      .single();
    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        throw new StoreError(`Thread ${input.thread_id} already has a report`, {
          cause: error,
        });
      }
      fail("createReport", error);
    }
    return toReport(data);
  }

  async updateReport(id: number, patch: ReportPatch): Promise<Report> {
    const { data, error } = await this.supabase
      .from("reports")
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq("id", id)
      .select()
      .single();
    if (error) fail("updateReport", error);
    return toReport(data);
  }

  async getReport(id: number): Promise<Report | null> {
    const { data, error } = await this.supabase
      .from("reports")
      .select("*")
      .eq("id", id)
      .maybeSingle();
    if (error) fail("getReport", error);
    return data ? toReport(data) : null;
  }

  async findReportByThread(threadId: string): Promise<Report | null> {
    const { data, error } = await this.supabase
      .from("reports")
      .select("*")
      .eq("thread_id", threadId)
      .maybeSingle();
    if (error) fail("findReportByThread", error);
    return data ? toReport(data) : null;
  }

  async listReports(): Promise<Report[]> {
    const { data, error } = await this.supabase
      .from("reports")
      .select("*")
      .order("created_at", { ascending: false });
    if (error) fail("listReports", error);
    return (data ?? []).map(toReport);
  }

  async addChunks(reportId: number, chunks: NewChunk[]): Promise<Chunk[]> {
    validateChunkBatch(chunks);

    const { count, error: countError } = await this.supabase
      .from("report_chunks")
      .select("id", { count: "exact", head: true })
      .eq("report_id", reportId);
    if (countError) fail("addChunks", countError);
    if (count) {
      throw new StoreError(`Report ${reportId} already has chunks`);
    }

    // A single multi-row insert is one statement, so it commits or fails as a whole
    const rows = chunks.map((chunk) => ({
      report_id: reportId,
      chunk_index: chunk.chunk_index,
      content: chunk.content,
      token_count: chunk.token_count,
      embedding: toVectorLiteral(chunk.embedding),
      metadata: chunk.metadata,
    }));
    const { data, error } = await this.supabase
      .from("report_chunks")
      .insert(rows)
      .select(CHUNK_COLUMNS);
    if (error) fail("addChunks", error);
    return (data ?? []).map(toChunk).sort((a, b) => a.chunk_index - b.chunk_index);
  }

  async listChunks(reportId: number): Promise<Chunk[]> {
    const { data, error } = await this.supabase
      .from("report_chunks")
      .select(CHUNK_COLUMNS)
      .eq("report_id", reportId)
      .order("chunk_index");
    if (error) fail("listChunks", error);
    return (data ?? []).map(toChunk);
  }

  async topKChunks(
    reportId: number,
    queryEmbedding: number[],
    k: number
  ): Promise<RetrievedChunk[]> {
    if (k <= 0) return [];
    const { data, error } = await this.supabase.rpc("match_report_chunks", {
      p_report_id: reportId,
      query_embedding: toVectorLiteral(queryEmbedding),
      match_count: k,
    });
    if (error) fail("topKChunks", error);
    return (Array.isArray(data) ? data : []).map(toRetrievedChunk);
  }

  async appendMessage(
    reportId: number,
    message: NewMessage,
    options: AppendOptions = {}
  ): Promise<AppendResult> {
    const { data, error } = await this.supabase.rpc("append_report_message", {
      p_report_id: reportId,
      p_user_id: message.user_id,
      p_role: message.role,
      p_content: message.content,
      p_input_tokens: message.input_tokens ?? 0,
      p_output_tokens: message.output_tokens ?? 0,
      p_cost_usd: message.cost_usd ?? 0,
      p_chunk_ids: message.retrieved_chunk_ids ?? [],
      p_stage: options.stage ?? null,
      p_metadata: options.metadata ?? null,
    });
    if (error) fail("appendMessage", error);
    return AppendRow.parse(data);
  }

  async recentMessages(reportId: number, limit: number): Promise<Message[]> {
    if (limit <= 0) return [];
    const { data, error } = await this.supabase
      .from("messages")
      .select("*")
      .eq("report_id", reportId)
      .order("created_at", { ascending: false })
      .order("id", { ascending: false })
      .limit(limit);
    if (error) fail("recentMessages", error);
    return (data ?? []).map(toMessage).reverse();
  }

  async listMessages(reportId: number): Promise<Message[]> {
    const { data, error } = await this.supabase
      .from("messages")
      .select("*")
      .eq("report_id", reportId)
      .order("created_at", { ascending: true })
      .order("id", { ascending: true });
    if (error) fail("listMessages", error);
    return (data ?? []).map(toMessage);
  }

  async recordEvent(eventId: string): Promise<boolean> {
    const { error } = await this.supabase
      .from("processed_events")
      .insert({ event_id: eventId });
    if (!error) return true;
    if (error.code === UNIQUE_VIOLATION) return false;
    fail("recordEvent", error);
  }

  async stats(): Promise<UsageStats> {
    const { data, error } = await this.supabase.rpc("usage_stats");
    if (error) fail("stats", error);
    return toStats(data);
  }
}
