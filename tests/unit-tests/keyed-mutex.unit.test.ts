import { describe, it, expect } from "vitest";
import { KeyedMutex } from "@/utils/keyedMutex";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("KeyedMutex", () => {
  it("runs tasks for the same key one at a time, in order", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run("dir", async () => {
        order.push("first:start");
        await sleep(20);
        order.push("first:end");
      }),
      mutex.run("dir", async () => {
        order.push("second");
      }),
    ]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.size).toBe(0);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.run("a", async () => {
        order.push("a:start");
        await sleep(20);
        order.push("a:end");
      }),
      mutex.run("b", async () => {
        order.push("b");
      }),
    ]);

    expect(order).toEqual(["a:start", "b", "a:end"]);
  });

  it("releases the key when a task fails", async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run("dir", async () => {
      throw new Error("boom");
    });
    const after = mutex.run("dir", async () => "ran");

    await expect(failing).rejects.toThrow("boom");
    expect(await after).toBe("ran");
    expect(mutex.size).toBe(0);
  });
});
