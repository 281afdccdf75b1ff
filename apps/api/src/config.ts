import { z } from "zod";

export interface ModelRate {
  /** USD per 1K prompt tokens. */
  inputPer1K: number;
  /** USD per 1K completion tokens. */
  outputPer1K: number;
}

export type RateTable = Record<string, ModelRate>;

export const DEFAULT_RATES: RateTable = {
  "gpt-4o": { inputPer1K: 0.0025, outputPer1K: 0.01 },
  "gpt-4o-mini": { inputPer1K: 0.00015, outputPer1K: 0.0006 },
  "text-embedding-3-small": { inputPer1K: 0.00002, outputPer1K: 0 },
  "text-embedding-3-large": { inputPer1K: 0.00013, outputPer1K: 0 },
};

export interface AppConfig {
  port: number;
  logLevel: string;
  openaiApiKey: string;
  store:
    | { driver: "memory" }
    | { driver: "supabase"; url: string; serviceKey: string };
  models: {
    chat: string;
    embedding: string;
  };
  rates: RateTable;
  chunking: {
    maxChars: number;
    overlap: number;
  };
  retrieval: {
    topK: number;
  };
  conversation: {
    historyWindow: number;
    maxContextTokens: number;
  };
  requests: {
    timeoutMs: number;
    retryBackoffMs: number;
  };
  outboundWebhookUrl: string | null;
}

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    LOG_LEVEL: z.string().default("info"),
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    STORE_DRIVER: z.enum(["supabase", "memory"]).default("supabase"),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_KEY: z.string().min(1).optional(),
    CHAT_MODEL: z.string().default("gpt-4o"),
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    TOP_K: z.coerce.number().int().positive().default(5),
    HISTORY_WINDOW: z.coerce.number().int().positive().default(10),
    MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(16000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(2000),
    OUTBOUND_WEBHOOK_URL: z.string().url().optional(),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  })
  .refine(
    (env) =>
      env.STORE_DRIVER === "memory" ||
      (env.SUPABASE_URL !== undefined && env.SUPABASE_SERVICE_KEY !== undefined),
    {
      message: "SUPABASE_URL and SUPABASE_SERVICE_KEY are required for the supabase store",
      path: ["SUPABASE_URL"],
    }
  );

/**
 * Build the application config from an environment map. Empty strings are
 * treated as unset so a copied `.env.example` does not trip validation.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;

  return {
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    openaiApiKey: parsed.OPENAI_API_KEY,
    store:
      parsed.STORE_DRIVER === "supabase" && parsed.SUPABASE_URL && parsed.SUPABASE_SERVICE_KEY
        ? {
            driver: "supabase",
            url: parsed.SUPABASE_URL,
            serviceKey: parsed.SUPABASE_SERVICE_KEY,
          }
        : { driver: "memory" },
    models: {
      chat: parsed.CHAT_MODEL,
      embedding: parsed.EMBEDDING_MODEL,
    },
    rates: DEFAULT_RATES,
    chunking: {
      maxChars: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },
    retrieval: {
      topK: parsed.TOP_K,
    },
    conversation: {
      historyWindow: parsed.HISTORY_WINDOW,
      maxContextTokens: parsed.MAX_CONTEXT_TOKENS,
    },
    requests: {
      timeoutMs: parsed.REQUEST_TIMEOUT_MS,
      retryBackoffMs: parsed.RETRY_BACKOFF_MS,
    },
    outboundWebhookUrl: parsed.OUTBOUND_WEBHOOK_URL ?? null,
  };
}
