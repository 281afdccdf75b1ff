export const STAGES = [
  "awaiting_upload",
  "awaiting_date_or_antibiotics",
  "awaiting_diet_confirmation",
  "awaiting_energy_confirmation",
  "awaiting_digestive_confirmation",
  "summary_delivered",
  "freeform_qa",
] as const;

export type Stage = (typeof STAGES)[number];

export type ReportMetadata = Record<string, unknown>;

export interface User {
  id: string;
  display_name: string;
  created_at: string;
  updated_at: string;
}

export interface Report {
  id: number;
  user_id: string;
  thread_id: string;
  original_filename: string | null;
  sample_date: string | null;
  metadata: ReportMetadata;
  stage: Stage;
  created_at: string;
  updated_at: string;
}

export interface Chunk {
  id: number;
  report_id: number;
  chunk_index: number;
  content: string;
  token_count: number;
  metadata: {
    start_char: number;
    end_char: number;
  };
}

export interface RetrievedChunk extends Chunk {
  distance: number;
}

export type MessageRole = "user" | "assistant";

export interface Message {
  id: number;
  report_id: number;
  user_id: string | null;
  role: MessageRole;
  content: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  retrieved_chunk_ids: number[];
  stage_transition: Stage | null;
  created_at: string;
}

export interface UsageStats {
  users: number;
  reports: number;
  messages: number;
  total_cost_usd: number;
}
