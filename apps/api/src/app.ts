import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as requestLogger } from "hono/logger";
import type { ReportStore } from "./db/store";
import { describeError } from "./lib/errors";
import type { Logger } from "./lib/logger";
import type { Orchestrator } from "./services/orchestrator";
import { adminRoutes } from "./routes/admin";
import { eventRoutes } from "./routes/events";
import { reportRoutes } from "./routes/reports";

export interface AppDeps {
  store: ReportStore;
  orchestrator: Orchestrator;
  logger: Logger;
  version: string;
}

export function createApp({ store, orchestrator, logger, version }: AppDeps) {
  const log = logger.child({ component: "http" });
  const app = new Hono();

  app.use("*", cors());
  app.use("*", requestLogger((line) => log.info(line)));

  app.route("/", adminRoutes(store, version));
  app.route("/events", eventRoutes(orchestrator));
  app.route("/reports", reportRoutes(store));

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((error, c) => {
    log.error({ err: error, path: c.req.path }, "unhandled request error");
    return c.json({ error: describeError(error) }, 500);
  });

  return app;
}
