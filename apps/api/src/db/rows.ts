import type {
  Chunk,
  Message,
  Report,
  RetrievedChunk,
  UsageStats,
  User,
} from "@biomeai/shared";
import { STAGES } from "@biomeai/shared";
import { z } from "zod";

// PostgREST returns numeric and bigint columns as numbers or strings
// depending on size; coerce both.
const numeric = z.union([z.number(), z.string()]).pipe(z.coerce.number());

export const UserRow = z.object({
  id: z.string(),
  display_name: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const ReportRow = z.object({
  id: numeric,
  user_id: z.string(),
  thread_id: z.string(),
  original_filename: z.string().nullable(),
  sample_date: z.string().nullable(),
  metadata: z.record(z.unknown()).nullable().transform((value) => value ?? {}),
  stage: z.enum(STAGES),
  created_at: z.string(),
  updated_at: z.string(),
});

export const ChunkRow = z.object({
  id: numeric,
  report_id: numeric,
  chunk_index: z.number().int(),
  content: z.string(),
  token_count: z.number().int(),
  metadata: z.object({ start_char: z.number(), end_char: z.number() }),
});

export const RetrievedChunkRow = ChunkRow.extend({ distance: numeric });

export const MessageRow = z.object({
  id: numeric,
  report_id: numeric,
  user_id: z.string().nullable(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  input_tokens: z.number().int(),
  output_tokens: z.number().int(),
  cost_usd: numeric,
  retrieved_chunk_ids: z.array(numeric).nullable().transform((value) => value ?? []),
  stage_transition: z.enum(STAGES).nullable(),
  created_at: z.string(),
});

export const AppendRow = z.object({ message: MessageRow, report: ReportRow });

export const StatsRow = z.object({
  users: numeric,
  reports: numeric,
  messages: numeric,
  total_cost_usd: numeric,
});

export const toUser = (row: unknown): User => UserRow.parse(row);
export const toReport = (row: unknown): Report => ReportRow.parse(row);
export const toChunk = (row: unknown): Chunk => ChunkRow.parse(row);
export const toRetrievedChunk = (row: unknown): RetrievedChunk => RetrievedChunkRow.parse(row);
export const toMessage = (row: unknown): Message => MessageRow.parse(row);
export const toStats = (row: unknown): UsageStats => StatsRow.parse(row);
