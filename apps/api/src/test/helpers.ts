import type {
  AttachmentUploadedEvent,
  MessageCreatedEvent,
  OutboundMessage,
} from "@biomeai/shared";
import { PDFDocument, StandardFonts } from "pdf-lib";
import { vi } from "vitest";
import { DEFAULT_RATES } from "../config";
import { MemoryReportStore } from "../db/memory-store";
import { nullLogger } from "../lib/logger";
import { Embedder, type EmbeddingTransport } from "../services/embeddings";
import type { extractText } from "../services/pdf-extractor";
import { ModelClient, type ChatTransport } from "../services/llm";
import type { MessageSink } from "../services/messaging";
import { Orchestrator } from "../services/orchestrator";

export const FIXED_NOW = new Date("2024-07-20T12:00:00Z");

export const REPORT_TEXT =
  "Viome gut report. Sample Date: 2024-01-15. Bacteroides levels are high. " +
  "Fiber fermenting species are low. Shannon diversity: 3.1";

/** Build a text PDF in process, one array of lines per page. */
export async function buildPdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const lines of pages) {
    const page = doc.addPage([612, 792]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 50, y: 720 - i * 24, size: 12, font });
    });
  }
  return doc.save();
}

/** Deterministic embedding: a few features of the text, never a zero vector. */
export function fakeVector(text: string): number[] {
  const vowels = (text.match(/[aeiou]/gi) ?? []).length;
  return [1 + (text.length % 7), 1 + (vowels % 5), 0.5];
}

export function fakeEmbeddingTransport() {
  return vi.fn<EmbeddingTransport>(async (input, model) => ({
    embeddings: input.map(fakeVector),
    model,
    promptTokens: input.length * 10,
  }));
}

export function fakeChatTransport(content = "Model reply") {
  return vi.fn<ChatTransport>(async (request) => ({
    content,
    model: request.model,
    usage: { promptTokens: 100, completionTokens: 20 },
  }));
}

export class CollectingSink implements MessageSink {
  delivered: OutboundMessage[] = [];

  async deliver(message: OutboundMessage): Promise<void> {
    this.delivered.push(message);
  }

  get contents(): string[] {
    return this.delivered.map((message) => message.content);
  }
}

export function fakeExtract(text = REPORT_TEXT): typeof extractText {
  return async () => ({ pages: [{ pageIndex: 0, text }], text });
}

export function createHarness(
  options: {
    embedding?: ReturnType<typeof fakeEmbeddingTransport>;
    chat?: ReturnType<typeof fakeChatTransport>;
    extract?: typeof extractText;
    sink?: MessageSink;
  } = {}
) {
  const logger = nullLogger();
  const store = new MemoryReportStore(() => FIXED_NOW);
  const embedding = options.embedding ?? fakeEmbeddingTransport();
  const chat = options.chat ?? fakeChatTransport();
  const collected = new CollectingSink();

  const embedder = new Embedder(embedding, {
    model: "text-embedding-3-small",
    rates: DEFAULT_RATES,
    retryBackoffMs: 0,
    logger,
  });
  const model = new ModelClient(chat, {
    model: "gpt-4o",
    rates: DEFAULT_RATES,
    retryBackoffMs: 0,
    logger,
  });

  const orchestrator = new Orchestrator({
    store,
    embedder,
    model,
    sink: options.sink ?? collected,
    logger,
    config: {
      chunking: { maxChars: 200, overlap: 20 },
      retrieval: { topK: 3 },
      conversation: { historyWindow: 10, maxContextTokens: 16000 },
    },
    now: () => FIXED_NOW,
    extract: options.extract ?? fakeExtract(),
  });

  return { store, embedding, chat, sink: collected, orchestrator };
}

const AUTHOR = { id: "user-1", display_name: "Test User", is_bot: false };

export function uploadEvent(
  eventId: string,
  overrides: Partial<AttachmentUploadedEvent> = {}
): AttachmentUploadedEvent {
  return {
    type: "attachment.uploaded",
    event_id: eventId,
    thread_id: "thread-1",
    author: AUTHOR,
    filename: "report.pdf",
    content_type: "application/pdf",
    data: Buffer.from("%PDF-1.4 placeholder").toString("base64"),
    ...overrides,
  };
}

export function messageEvent(
  eventId: string,
  content: string,
  overrides: Partial<MessageCreatedEvent> = {}
): MessageCreatedEvent {
  return {
    type: "message.created",
    event_id: eventId,
    thread_id: "thread-1",
    author: AUTHOR,
    content,
    mentions_bot: false,
    ...overrides,
  };
}

export const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
