import { describe, it, expect } from "vitest";
import { AsyncQueue } from "./async-queue";

describe("AsyncQueue", () => {
  it("hands out values in push order", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect(await queue.next()).toBe(1);
    expect(await queue.next()).toBe(2);
    expect(await queue.next()).toBe(3);
    expect(queue.size).toBe(0);
  });

  it("wakes a waiting consumer on push", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();

    queue.push("late");
    expect(await pending).toBe("late");
  });

  it("drains buffered values after close, then yields null", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(7);
    queue.close();

    expect(queue.push(8)).toBe(false);
    expect(await queue.next()).toBe(7);
    expect(await queue.next()).toBeNull();
  });

  it("rejects waiters with the close reason", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();

    queue.close(new Error("unplugged"));
    await expect(pending).rejects.toThrow("unplugged");
    await expect(queue.next()).rejects.toThrow("unplugged");
  });

  it("resolves waiters with null on a plain close", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();

    queue.close();
    expect(await pending).toBeNull();
    expect(queue.isClosed()).toBe(true);
  });
});
