import { encode } from "gpt-tokenizer";
import type { Message, Report, RetrievedChunk } from "@biomeai/shared";
import { PROMPT_TEMPLATES, SYSTEM_PROMPT, type PromptKind } from "../prompts/stages";
import type { ChatMessage } from "./llm";

export interface PromptInput {
  kind: PromptKind;
  report: Pick<Report, "sample_date" | "metadata">;
  chunks: RetrievedChunk[];
  /** Prior turns, oldest first. The current user message is the last entry. */
  history: Message[];
  historyWindow: number;
  maxContextTokens: number;
}

export interface AssembledPrompt {
  messages: ChatMessage[];
  maxTokens?: number;
  maxChars?: number;
  temperature: number;
  /** Estimated prompt size after trimming. */
  promptTokens: number;
}

const ANSWER_LABELS: Array<[string, string]> = [
  ["antibiotics_response", "Antibiotics / test timing"],
  ["diet_response", "Diet"],
  ["energy_response", "Energy"],
  ["digestive_response", "Digestive symptoms"],
];

// Share of the context budget the prompt may use; the rest is left for the reply
const PROMPT_BUDGET_RATIO = 0.8;

export function countTokens(messages: ChatMessage[]): number {
  return messages.reduce((total, message) => total + encode(message.content).length + 4, 0);
}

export function buildContextBlock(chunks: RetrievedChunk[]): string | null {
  if (chunks.length === 0) return null;
  const sections = chunks.map(
    (chunk) => `Report Section ${chunk.chunk_index + 1}: ${chunk.content}`
  );
  return (
    "Here are relevant sections from the user's microbiome report:\n\n" +
    sections.join("\n\n")
  );
}

export function buildProfileBlock(
  report: Pick<Report, "sample_date" | "metadata">
): string | null {
  const lines: string[] = [];
  const { metadata } = report;

  if (report.sample_date) {
    lines.push(`- Sample date: ${report.sample_date}`);
  } else if (typeof metadata.sample_date_reported === "string") {
    lines.push(`- Sample date (reported by user): ${metadata.sample_date_reported}`);
  }
  if (typeof metadata.lab_name === "string") {
    lines.push(`- Lab: ${metadata.lab_name}`);
  }
  for (const [key, label] of ANSWER_LABELS) {
    const value = metadata[key];
    if (typeof value === "string" && value.trim()) {
      lines.push(`- ${label}: ${value.trim()}`);
    }
  }

  return lines.length > 0 ? `What you know about the user so far:\n${lines.join("\n")}` : null;
}

/**
 * Assemble the model input for one turn: system prompt, grounding context,
 * user profile, a window of prior turns and the stage task. Oldest turns
 * are dropped first when the prompt exceeds the context budget.
 */
export function buildPrompt(input: PromptInput): AssembledPrompt {
  const template = PROMPT_TEMPLATES[input.kind];

  const head: ChatMessage[] = [{ role: "system", content: SYSTEM_PROMPT }];
  const context = buildContextBlock(input.chunks);
  if (context) head.push({ role: "system", content: context });
  const profile = buildProfileBlock(input.report);
  if (profile) head.push({ role: "system", content: profile });

  const tail: ChatMessage[] = template.instruction
    ? [{ role: "system", content: template.instruction }]
    : [];

  let turns: ChatMessage[] = input.history
    .slice(-input.historyWindow)
    .map((message): ChatMessage =>
      message.role === "user"
        ? { role: "user", content: message.content }
        : { role: "assistant", content: message.content }
    );

  const budget = Math.floor(input.maxContextTokens * PROMPT_BUDGET_RATIO);
  let promptTokens = countTokens([...head, ...turns, ...tail]);
  while (promptTokens > budget && turns.length > 1) {
    turns = turns.slice(1);
    promptTokens = countTokens([...head, ...turns, ...tail]);
  }

  return {
    messages: [...head, ...turns, ...tail],
    maxTokens: template.maxTokens,
    maxChars: template.maxChars,
    temperature: template.temperature,
    promptTokens,
  };
}

export function truncateReply(content: string, maxChars?: number): string {
  if (maxChars === undefined || content.length <= maxChars) return content;
  return `${content.slice(0, maxChars).trimEnd()}...`;
}
