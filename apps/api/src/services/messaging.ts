import type { OutboundMessage } from "@biomeai/shared";
import type { Logger } from "../lib/logger";

/** Outbound side of the messaging platform. */
export interface MessageSink {
  deliver(message: OutboundMessage): Promise<void>;
}

/** POSTs each outbound message as JSON to the platform bridge. */
export class WebhookSink implements MessageSink {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number
  ) {}

  async deliver(message: OutboundMessage): Promise<void> {
    const response = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(message),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Webhook delivery failed: ${response.status} - ${body.slice(0, 200)}`);
    }
  }
}

/** Writes outbound messages to the log; used when no webhook is configured. */
export class LogSink implements MessageSink {
  constructor(private readonly logger: Logger) {}

  async deliver(message: OutboundMessage): Promise<void> {
    this.logger.info(
      { threadId: message.thread_id, content: message.content },
      "outbound message"
    );
  }
}
