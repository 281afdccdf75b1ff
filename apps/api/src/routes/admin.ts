import { Hono } from "hono";
import type { ReportStore } from "../db/store";

export function adminRoutes(store: ReportStore, version: string) {
  const admin = new Hono();

  admin.get("/health", (c) => c.json({ status: "ok", service: "biomeai-api", version }));

  admin.get("/stats", async (c) => {
    const stats = await store.stats();
    return c.json({ stats });
  });

  return admin;
}
