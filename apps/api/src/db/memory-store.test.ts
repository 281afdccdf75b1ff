import { beforeEach, describe, it, expect } from "vitest";
import { StoreError } from "../lib/errors";
import { MemoryReportStore, cosineDistance } from "./memory-store";
import type { NewChunk } from "./store";

function newChunk(index: number, embedding: number[], content = `chunk ${index}`): NewChunk {
  return {
    chunk_index: index,
    content,
    token_count: 2,
    embedding,
    metadata: { start_char: index * 10, end_char: index * 10 + 10 },
  };
}

describe("cosineDistance", () => {
  it("is zero for parallel vectors and one for orthogonal ones", () => {
    expect(cosineDistance([1, 0], [2, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
  });

  it("treats a zero vector as unrelated", () => {
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
  });

  it("rejects mismatched dimensions", () => {
    expect(() => cosineDistance([1, 0], [1, 0, 0])).toThrow(StoreError);
  });
});

describe("MemoryReportStore", () => {
  let store: MemoryReportStore;

  beforeEach(async () => {
    store = new MemoryReportStore(() => new Date("2024-07-20T12:00:00Z"));
    await store.upsertUser("user-1", "Test User");
  });

  const createReport = (threadId = "thread-1") =>
    store.createReport({
      user_id: "user-1",
      thread_id: threadId,
      original_filename: "report.pdf",
      sample_date: null,
      metadata: { lab_name: "Viome" },
    });

  describe("users and reports", () => {
    it("refreshes only the display name on upsert", async () => {
      const user = await store.upsertUser("user-1", "Renamed");
      expect(user).toEqual({
        id: "user-1",
        display_name: "Renamed",
        created_at: "2024-07-20T12:00:00.000Z",
        updated_at: "2024-07-20T12:00:00.000Z",
      });
    });

    it("creates reports awaiting upload, one per thread", async () => {
      const report = await createReport();
      expect(report.stage).toBe("awaiting_upload");
      expect(await store.findReportByThread("thread-1")).toEqual(report);
      await expect(createReport()).rejects.toThrow("Thread thread-1 already has a report");
    });

    it("requires a known user", async () => {
      await expect(
        store.createReport({
          user_id: "nobody",
          thread_id: "thread-9",
          original_filename: null,
          sample_date: null,
          metadata: {},
        })
      ).rejects.toBeInstanceOf(StoreError);
    });

    it("replaces document fields on update", async () => {
      const report = await createReport();
      const updated = await store.updateReport(report.id, {
        original_filename: "second.pdf",
        sample_date: "2024-01-15",
        metadata: { sample_age_months: 6 },
      });

      expect(updated).toMatchObject({
        id: report.id,
        original_filename: "second.pdf",
        sample_date: "2024-01-15",
        metadata: { sample_age_months: 6 },
        stage: "awaiting_upload",
      });
      expect(await store.getReport(report.id)).toEqual(updated);
      await expect(
        store.updateReport(99, { original_filename: null, sample_date: null, metadata: {} })
      ).rejects.toThrow("Unknown report 99");
    });

    it("returns copies", async () => {
      const report = await createReport();
      report.metadata.lab_name = "changed";
      const stored = await store.getReport(report.id);
      expect(stored?.metadata.lab_name).toBe("Viome");
    });
  });

  describe("chunks", () => {
    it("stores a contiguous batch once", async () => {
      const report = await createReport();
      const chunks = await store.addChunks(report.id, [
        newChunk(0, [1, 0]),
        newChunk(1, [0, 1]),
      ]);
      expect(chunks.map((c) => c.chunk_index)).toEqual([0, 1]);
      expect(await store.listChunks(report.id)).toEqual(chunks);

      await expect(store.addChunks(report.id, [newChunk(0, [1, 0])])).rejects.toThrow(
        `Report ${report.id} already has chunks`
      );
    });

    it("rejects a bad batch without storing any of it", async () => {
      const report = await createReport();
      await expect(
        store.addChunks(report.id, [newChunk(0, [1, 0]), newChunk(2, [0, 1])])
      ).rejects.toThrow("Chunk indices must be contiguous from 0 (got 2 at 1)");
      await expect(
        store.addChunks(report.id, [newChunk(0, [1, 0]), newChunk(1, [0, 1, 0])])
      ).rejects.toThrow(StoreError);
      await expect(store.addChunks(report.id, [])).rejects.toThrow(
        "Cannot add an empty chunk batch"
      );
      expect(await store.listChunks(report.id)).toEqual([]);
    });

    it("returns the nearest chunks of one report only", async () => {
      const a = await createReport("thread-a");
      const b = await createReport("thread-b");
      await store.addChunks(a.id, [
        newChunk(0, [1, 0]),
        newChunk(1, [0, 1]),
        newChunk(2, [1, 1]),
      ]);
      await store.addChunks(b.id, [newChunk(0, [1, 0], "other report")]);

      const top = await store.topKChunks(a.id, [1, 0], 2);
      expect(top.map((c) => c.chunk_index)).toEqual([0, 2]);
      expect(top.every((c) => c.report_id === a.id)).toBe(true);
      expect(top[0].distance).toBe(0);
      expect(top[1].distance).toBeCloseTo(1 - Math.SQRT1_2, 10);

      const all = await store.topKChunks(a.id, [1, 0], 10);
      expect(all).toHaveLength(3);
      expect(all.map((c) => c.content)).not.toContain("other report");
      expect(await store.topKChunks(a.id, [1, 0], 0)).toEqual([]);
    });

    it("breaks distance ties by chunk index", async () => {
      const report = await createReport();
      await store.addChunks(report.id, [
        newChunk(0, [0, 1]),
        newChunk(1, [1, 0]),
        newChunk(2, [2, 0]),
      ]);
      const top = await store.topKChunks(report.id, [1, 0], 2);
      expect(top.map((c) => c.chunk_index)).toEqual([1, 2]);
    });
  });

  describe("messages", () => {
    it("appends in order with read-your-writes", async () => {
      const report = await createReport();
      const append = (userId: string | null, content: string) =>
        store.appendMessage(report.id, {
          user_id: userId,
          role: userId ? "user" : "assistant",
          content,
        });
      const first = await append("user-1", "one");
      const second = await append(null, "two");
      const third = await append("user-1", "three");

      expect(second.message.id).toBeGreaterThan(first.message.id);
      expect(third.message.id).toBeGreaterThan(second.message.id);
      const listed = await store.listMessages(report.id);
      expect(listed.map((m) => m.content)).toEqual(["one", "two", "three"]);
      const recent = await store.recentMessages(report.id, 2);
      expect(recent.map((m) => m.content)).toEqual(["two", "three"]);
      expect(await store.recentMessages(report.id, 0)).toEqual([]);
    });

    it("fills defaults for usage fields", async () => {
      const report = await createReport();
      const { message } = await store.appendMessage(report.id, {
        user_id: null,
        role: "assistant",
        content: "hi",
      });
      expect(message).toMatchObject({
        input_tokens: 0,
        output_tokens: 0,
        cost_usd: 0,
        retrieved_chunk_ids: [],
        stage_transition: null,
      });
    });

    it("advances the stage and merges metadata with the message", async () => {
      const report = await createReport();
      const { message, report: updated } = await store.appendMessage(
        report.id,
        { user_id: null, role: "assistant", content: "greeting" },
        { stage: "awaiting_date_or_antibiotics", metadata: { sample_age_months: 6 } }
      );

      expect(message.stage_transition).toBe("awaiting_date_or_antibiotics");
      expect(updated.stage).toBe("awaiting_date_or_antibiotics");
      expect(updated.metadata).toEqual({ lab_name: "Viome", sample_age_months: 6 });
      expect(await store.getReport(report.id)).toEqual(updated);
    });

    it("rejects a skipped stage and appends nothing", async () => {
      const report = await createReport();
      await expect(
        store.appendMessage(
          report.id,
          { user_id: null, role: "assistant", content: "too early" },
          { stage: "summary_delivered" }
        )
      ).rejects.toThrow("Invalid stage transition awaiting_upload -> summary_delivered");
      expect(await store.listMessages(report.id)).toEqual([]);
      expect((await store.getReport(report.id))?.stage).toBe("awaiting_upload");
    });

    it("rejects messages for unknown reports", async () => {
      await expect(
        store.appendMessage(99, { user_id: null, role: "assistant", content: "x" })
      ).rejects.toThrow("Unknown report 99");
    });
  });

  it("records each event id once", async () => {
    expect(await store.recordEvent("evt-1")).toBe(true);
    expect(await store.recordEvent("evt-1")).toBe(false);
    expect(await store.recordEvent("evt-2")).toBe(true);
  });

  it("aggregates usage", async () => {
    const report = await createReport();
    await store.appendMessage(report.id, {
      user_id: "user-1",
      role: "user",
      content: "a",
      cost_usd: 0.1,
    });
    await store.appendMessage(report.id, {
      user_id: null,
      role: "assistant",
      content: "b",
      cost_usd: 0.2,
    });
    expect(await store.stats()).toEqual({
      users: 1,
      reports: 1,
      messages: 2,
      total_cost_usd: 0.3,
    });
  });
});
