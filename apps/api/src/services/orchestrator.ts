import type {
  AttachmentUploadedEvent,
  EventOutcome,
  InboundEvent,
  MessageCreatedEvent,
  Report,
  ReportMetadata,
  Stage,
} from "@biomeai/shared";
import type { AppConfig } from "../config";
import type { NewMessage, ReportStore } from "../db/store";
import {
  AppError,
  EmbeddingError,
  ModelCallError,
  describeError,
} from "../lib/errors";
import { KeyedMutex } from "../lib/keyed-mutex";
import type { Logger } from "../lib/logger";
import {
  GREETING_WITHOUT_DATE,
  PROMPT_TEMPLATES,
  REPLIES,
  UPLOAD_MARKER,
  frameReply,
  greetingWithDate,
  type PromptKind,
} from "../prompts/stages";
import type { Embedder } from "./embeddings";
import { ingestDocument, type IngestionDeps } from "./ingestion";
import type { ModelClient } from "./llm";
import type { MessageSink } from "./messaging";
import { buildPrompt, truncateReply } from "./prompt-assembler";
import {
  extractReportedDate,
  formatLongDate,
  monthsBetween,
} from "./report-metadata";
import { retrieve } from "./retrieval";
import { detectStage, replyPlan } from "./stage";

export interface OrchestratorDeps {
  store: ReportStore;
  embedder: Embedder;
  model: ModelClient;
  sink: MessageSink;
  logger: Logger;
  config: Pick<AppConfig, "chunking" | "retrieval" | "conversation">;
  now?: () => Date;
  extract?: IngestionDeps["extract"];
}

interface Turn {
  threadId: string;
  replies: number;
  log: Logger;
}

type GeneratedReply = Required<Omit<NewMessage, "user_id" | "role">>;

function isPdf(event: AttachmentUploadedEvent): boolean {
  return (
    event.content_type === "application/pdf" ||
    event.filename.toLowerCase().endsWith(".pdf")
  );
}

/**
 * Top-level dispatcher for inbound platform events. Each event is handled
 * end to end under a per-thread lock; every failure is converted into a
 * single reply to the user.
 */
export class Orchestrator {
  private readonly locks = new KeyedMutex();
  private readonly uploadsInFlight = new Set<string>();
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger.child({ component: "orchestrator" });
  }

  async handle(event: InboundEvent): Promise<EventOutcome> {
    const turn: Turn = {
      threadId: event.thread_id,
      replies: 0,
      log: this.log.child({
        eventId: event.event_id,
        threadId: event.thread_id,
        type: event.type,
      }),
    };

    if (event.author.is_bot) {
      return { status: "ignored", reason: "bot author" };
    }

    try {
      const fresh = await this.deps.store.recordEvent(event.event_id);
      if (!fresh) {
        turn.log.info("duplicate event skipped");
        return { status: "duplicate" };
      }

      return await this.locks.run(event.thread_id, () =>
        event.type === "attachment.uploaded"
          ? this.handleUpload(event, turn)
          : this.handleMessage(event, turn)
      );
    } catch (error) {
      turn.log.error({ err: error }, "event handling failed");
      await this.reply(
        turn,
        error instanceof AppError ? error.userMessage : REPLIES.generic
      );
      return { status: "failed", error: describeError(error) };
    }
  }

  private async handleUpload(
    event: AttachmentUploadedEvent,
    turn: Turn
  ): Promise<EventOutcome> {
    const { store } = this.deps;

    if (!isPdf(event)) {
      await this.reply(turn, REPLIES.notPdf);
      return { status: "ignored", reason: "not a pdf" };
    }

    const existing = await store.findReportByThread(event.thread_id);
    if (existing && existing.stage !== "awaiting_upload") {
      await this.reply(turn, REPLIES.alreadyHasReport);
      return { status: "ignored", reason: "thread already has a report" };
    }

    if (this.uploadsInFlight.has(event.author.id)) {
      await this.reply(turn, REPLIES.busy);
      return { status: "ignored", reason: "upload in progress" };
    }

    this.uploadsInFlight.add(event.author.id);
    try {
      const user = await store.upsertUser(event.author.id, event.author.display_name);
      await this.reply(turn, REPLIES.progress);

      const bytes = new Uint8Array(Buffer.from(event.data, "base64"));
      const document = await ingestDocument(bytes, {
        embedder: this.deps.embedder,
        chunking: this.deps.config.chunking,
        logger: turn.log,
        now: this.now,
        extract: this.deps.extract,
      });

      const fields = {
        original_filename: event.filename,
        sample_date: document.sampleDate,
        metadata: document.metadata,
      };
      // A report left without chunks by an earlier failed upload is reused,
      // with the new document's fields
      const report = existing
        ? await store.updateReport(existing.id, fields)
        : await store.createReport({
            user_id: user.id,
            thread_id: event.thread_id,
            ...fields,
          });
      if ((await store.listChunks(report.id)).length === 0) {
        await store.addChunks(report.id, document.chunks);
      }

      await store.appendMessage(report.id, {
        user_id: user.id,
        role: "user",
        content: UPLOAD_MARKER(event.filename),
        input_tokens: document.promptTokens,
        cost_usd: document.costUsd,
      });

      const greeting = this.greeting(document.sampleDate);
      await store.appendMessage(
        report.id,
        { user_id: null, role: "assistant", content: greeting },
        {
          stage: "awaiting_date_or_antibiotics",
          metadata: { ...document.metadata, original_filename: event.filename },
        }
      );
      await this.reply(turn, greeting);

      turn.log.info(
        {
          reportId: report.id,
          userId: user.id,
          chunks: document.chunks.length,
          pages: document.pageCount,
          chars: document.charCount,
        },
        "report ingested"
      );
      return { status: "processed", report_id: report.id, replies: turn.replies };
    } finally {
      this.uploadsInFlight.delete(event.author.id);
    }
  }

  private async handleMessage(
    event: MessageCreatedEvent,
    turn: Turn
  ): Promise<EventOutcome> {
    const { store } = this.deps;

    const found = await store.findReportByThread(event.thread_id);
    if (!found) {
      if (event.mentions_bot) {
        await this.reply(turn, REPLIES.uploadInvite);
        return { status: "processed", report_id: null, replies: turn.replies };
      }
      return { status: "ignored", reason: "not a report thread" };
    }

    const user = await store.upsertUser(event.author.id, event.author.display_name);
    const { report } = await store.appendMessage(found.id, {
      user_id: user.id,
      role: "user",
      content: event.content,
    });

    const stage = detectStage(report);
    const plan = replyPlan(stage);
    turn.log.info({ reportId: report.id, stage, plan: plan.kind }, "handling message");

    try {
      switch (plan.kind) {
        case "upload_required":
          await this.persistAndReply(turn, report, REPLIES.uploadRequired);
          break;

        case "prediction": {
          const answers: ReportMetadata = { [plan.answerKey]: event.content };
          if (stage === "awaiting_date_or_antibiotics" && !report.sample_date) {
            const reported = extractReportedDate(event.content);
            if (reported) answers.sample_date_reported = reported;
          }
          const reply = await this.generate(
            plan.prediction,
            withAnswers(report, answers)
          );
          await this.persistAndReply(turn, report, reply, {
            stage: plan.enters,
            metadata: answers,
          });
          break;
        }

        case "summary": {
          const answers: ReportMetadata = { [plan.answerKey]: event.content };
          const summary = await this.generate("summary", withAnswers(report, answers));
          const { report: summarized } = await this.persistAndReply(
            turn,
            report,
            summary,
            { stage: plan.enters, metadata: answers }
          );
          await this.sendFollowUps(turn, summarized);
          break;
        }

        case "freeform": {
          const reply = await this.generate("freeform", report, event.content);
          await this.persistAndReply(
            turn,
            report,
            reply,
            plan.enters ? { stage: plan.enters } : {}
          );
          break;
        }
      }
    } catch (error) {
      if (!(error instanceof ModelCallError || error instanceof EmbeddingError)) {
        throw error;
      }
      // The turn is not consumed: stage and answers stay as they were
      turn.log.error(
        { err: error, reportId: report.id, stage },
        "reply generation failed"
      );
      await this.persistAndReply(turn, report, error.userMessage);
    }

    return { status: "processed", report_id: report.id, replies: turn.replies };
  }

  /** Actionable insight, then the Q&A invitation that opens free-form mode. */
  private async sendFollowUps(turn: Turn, report: Report): Promise<void> {
    try {
      const insight = await this.generate("insight", report);
      await this.persistAndReply(turn, report, insight);
    } catch (error) {
      if (!(error instanceof ModelCallError || error instanceof EmbeddingError)) {
        throw error;
      }
      // The apology takes the insight's place; Q&A still opens
      turn.log.error({ err: error, reportId: report.id }, "insight generation failed");
      await this.persistAndReply(turn, report, error.userMessage);
    }

    await this.persistAndReply(turn, report, REPLIES.questionsWelcome, {
      stage: "freeform_qa",
    });
  }

  private async generate(
    kind: PromptKind,
    report: Report,
    query?: string
  ): Promise<GeneratedReply> {
    const { store, embedder, model, config } = this.deps;
    const template = PROMPT_TEMPLATES[kind];

    const retrieval = await retrieve(
      { store, embedder, logger: this.log },
      report.id,
      query ?? template.query,
      config.retrieval.topK
    );
    const history = await store.recentMessages(
      report.id,
      config.conversation.historyWindow
    );

    const prompt = buildPrompt({
      kind,
      report,
      chunks: retrieval.chunks,
      history,
      historyWindow: config.conversation.historyWindow,
      maxContextTokens: config.conversation.maxContextTokens,
    });

    const completion = await model.complete(prompt.messages, {
      maxTokens: prompt.maxTokens,
      temperature: prompt.temperature,
    });

    return {
      content: frameReply(kind, truncateReply(completion.content, prompt.maxChars)),
      input_tokens: completion.usage.promptTokens,
      output_tokens: completion.usage.completionTokens,
      cost_usd: Math.round((completion.costUsd + retrieval.costUsd) * 1e6) / 1e6,
      retrieved_chunk_ids: retrieval.chunks.map((chunk) => chunk.id),
    };
  }

  private greeting(sampleDate: string | null): string {
    if (!sampleDate) return GREETING_WITHOUT_DATE;
    const age = Math.max(0, monthsBetween(sampleDate, this.now()));
    return greetingWithDate(formatLongDate(sampleDate), age);
  }

  private async persistAndReply(
    turn: Turn,
    report: Report,
    reply: string | GeneratedReply,
    options: { stage?: Stage; metadata?: ReportMetadata } = {}
  ) {
    const message: NewMessage =
      typeof reply === "string"
        ? { user_id: null, role: "assistant", content: reply }
        : { user_id: null, role: "assistant", ...reply };
    const result = await this.deps.store.appendMessage(report.id, message, options);
    await this.reply(turn, message.content);
    return result;
  }

  private async reply(turn: Turn, content: string): Promise<void> {
    turn.replies++;
    try {
      await this.deps.sink.deliver({ thread_id: turn.threadId, content });
    } catch (error) {
      turn.log.error({ err: error }, "outbound delivery failed");
    }
  }
}

function withAnswers(report: Report, answers: ReportMetadata): Report {
  return { ...report, metadata: { ...report.metadata, ...answers } };
}
