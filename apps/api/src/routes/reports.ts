import { Hono } from "hono";
import type { ReportStore } from "../db/store";

function parseId(raw: string): number | null {
  const id = Number(raw);
  return Number.isInteger(id) && id > 0 ? id : null;
}

/** Read-only views over stored reports, chunks and conversations. */
export function reportRoutes(store: ReportStore) {
  const reports = new Hono();

  // List reports
  reports.get("/", async (c) => {
    const data = await store.listReports();
    return c.json({ reports: data });
  });

  // Get single report
  reports.get("/:id", async (c) => {
    const id = parseId(c.req.param("id"));
    const report = id === null ? null : await store.getReport(id);
    if (!report) {
      return c.json({ error: "Report not found" }, 404);
    }
    return c.json({ report });
  });

  // Get report chunks
  reports.get("/:id/chunks", async (c) => {
    const id = parseId(c.req.param("id"));
    const report = id === null ? null : await store.getReport(id);
    if (!report) {
      return c.json({ error: "Report not found" }, 404);
    }
    const chunks = await store.listChunks(report.id);
    return c.json({ chunks });
  });

  // Get report conversation
  reports.get("/:id/messages", async (c) => {
    const id = parseId(c.req.param("id"));
    const report = id === null ? null : await store.getReport(id);
    if (!report) {
      return c.json({ error: "Report not found" }, 404);
    }
    const messages = await store.listMessages(report.id);
    return c.json({ messages });
  });

  return reports;
}
