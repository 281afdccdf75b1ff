import "dotenv/config";
import { serve } from "@hono/node-server";
import OpenAI from "openai";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { createSupabaseClient } from "./db/client";
import { MemoryReportStore } from "./db/memory-store";
import type { ReportStore } from "./db/store";
import { SupabaseReportStore } from "./db/supabase-store";
import { createLogger, type Logger } from "./lib/logger";
import { Embedder, createOpenAIEmbeddingTransport } from "./services/embeddings";
import { ModelClient, createOpenAIChatTransport } from "./services/llm";
import { LogSink, WebhookSink, type MessageSink } from "./services/messaging";
import { Orchestrator } from "./services/orchestrator";
import { isPriced } from "./services/pricing";

const VERSION = "0.1.0";

function createStore(config: AppConfig, logger: Logger): ReportStore {
  if (config.store.driver === "memory") {
    logger.warn("using in-memory store; data is lost on restart");
    return new MemoryReportStore();
  }
  const client = createSupabaseClient(config.store.url, config.store.serviceKey);
  return new SupabaseReportStore(client);
}

function createSink(config: AppConfig, logger: Logger): MessageSink {
  if (config.outboundWebhookUrl) {
    return new WebhookSink(config.outboundWebhookUrl, config.requests.timeoutMs);
  }
  return new LogSink(logger.child({ component: "outbound" }));
}

const config = loadConfig();
const logger = createLogger(config.logLevel);

// Retries are handled per call by withRetry
const openai = new OpenAI({
  apiKey: config.openaiApiKey,
  timeout: config.requests.timeoutMs,
  maxRetries: 0,
});

for (const name of [config.models.chat, config.models.embedding]) {
  if (!isPriced(config.rates, name)) {
    logger.warn({ model: name }, "no rate configured for model; its cost is recorded as 0");
  }
}

const store = createStore(config, logger);

const embedder = new Embedder(createOpenAIEmbeddingTransport(openai), {
  model: config.models.embedding,
  rates: config.rates,
  retryBackoffMs: config.requests.retryBackoffMs,
  logger: logger.child({ component: "embeddings" }),
});

const model = new ModelClient(createOpenAIChatTransport(openai), {
  model: config.models.chat,
  rates: config.rates,
  retryBackoffMs: config.requests.retryBackoffMs,
  logger: logger.child({ component: "llm" }),
});

const orchestrator = new Orchestrator({
  store,
  embedder,
  model,
  sink: createSink(config, logger),
  logger,
  config,
});

const app = createApp({ store, orchestrator, logger, version: VERSION });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, store: config.store.driver, chatModel: config.models.chat },
    "api listening"
  );
});
