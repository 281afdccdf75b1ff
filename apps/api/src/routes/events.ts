import { Hono } from "hono";
import { InboundEvent } from "@biomeai/shared";
import type { Orchestrator } from "../services/orchestrator";

/** Inbound webhook for the messaging platform. */
export function eventRoutes(orchestrator: Orchestrator) {
  const events = new Hono();

  events.post("/", async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = InboundEvent.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          error: "Invalid event",
          issues: parsed.error.issues.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
          ),
        },
        400
      );
    }

    const outcome = await orchestrator.handle(parsed.data);
    return c.json(outcome);
  });

  return events;
}
