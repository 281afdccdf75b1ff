import { z } from "zod";

export const EventAuthor = z.object({
  id: z.string().min(1),
  display_name: z.string().min(1),
  is_bot: z.boolean().default(false),
});

export type EventAuthor = z.infer<typeof EventAuthor>;

// Inbound events from the messaging platform
export const AttachmentUploadedEvent = z.object({
  type: z.literal("attachment.uploaded"),
  event_id: z.string().min(1),
  thread_id: z.string().min(1),
  author: EventAuthor,
  filename: z.string().min(1),
  content_type: z.string().optional(),
  data: z.string().min(1), // base64
});

export const MessageCreatedEvent = z.object({
  type: z.literal("message.created"),
  event_id: z.string().min(1),
  thread_id: z.string().min(1),
  author: EventAuthor,
  content: z.string().min(1),
  mentions_bot: z.boolean().default(false),
});

export const InboundEvent = z.discriminatedUnion("type", [
  AttachmentUploadedEvent,
  MessageCreatedEvent,
]);

export type AttachmentUploadedEvent = z.infer<typeof AttachmentUploadedEvent>;
export type MessageCreatedEvent = z.infer<typeof MessageCreatedEvent>;
export type InboundEvent = z.infer<typeof InboundEvent>;

// Outbound delivery to the messaging platform
export const OutboundMessage = z.object({
  thread_id: z.string(),
  content: z.string(),
});

export type OutboundMessage = z.infer<typeof OutboundMessage>;

export type EventOutcome =
  | { status: "processed"; report_id: number | null; replies: number }
  | { status: "duplicate" }
  | { status: "ignored"; reason: string }
  | { status: "failed"; error: string };
