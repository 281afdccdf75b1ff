import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./keyed-mutex";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

function gate() {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open: () => open() };
}

describe("KeyedMutex", () => {
  it("runs work under the same key in arrival order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = gate();

    const a = mutex.run("thread-1", async () => {
      order.push("a:start");
      await first.opened;
      order.push("a:end");
    });
    const b = mutex.run("thread-1", async () => {
      order.push("b");
    });

    await tick();
    expect(order).toEqual(["a:start"]);

    first.open();
    await Promise.all([a, b]);
    expect(order).toEqual(["a:start", "a:end", "b"]);
    expect(mutex.size).toBe(0);
  });

  it("runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const blocked = gate();
    const order: string[] = [];

    const slow = mutex.run("thread-1", async () => {
      await blocked.opened;
      order.push("slow");
    });
    await mutex.run("thread-2", async () => {
      order.push("fast");
    });

    expect(order).toEqual(["fast"]);
    blocked.open();
    await slow;
    expect(order).toEqual(["fast", "slow"]);
  });

  it("releases the key when a task fails", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.run("thread-1", async () => {
        throw new Error("task failed");
      })
    ).rejects.toThrow("task failed");

    await expect(mutex.run("thread-1", async () => 42)).resolves.toBe(42);
    expect(mutex.size).toBe(0);
  });
});
