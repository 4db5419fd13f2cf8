import { describe, expect, it } from "vitest";
import { ResourceLock } from "../../../src/state/locks.ts";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("ResourceLock", () => {
  it("serializes work on the same resource in arrival order", async () => {
    const locks = new ResourceLock("test");
    const order: string[] = [];

    await Promise.all([
      locks.withLock("escrow:a", async () => {
        order.push("first:start");
        await delay(10);
        order.push("first:end");
      }),
      locks.withLock("escrow:a", async () => {
        order.push("second:start");
        await delay(1);
        order.push("second:end");
      }),
      locks.withLock("escrow:a", () => {
        order.push("third");
        return Promise.resolve();
      }),
    ]);

    expect(order).toEqual(["first:start", "first:end", "second:start", "second:end", "third"]);
  });

  it("lets different resources run concurrently", async () => {
    const locks = new ResourceLock("test");
    const order: string[] = [];

    await Promise.all([
      locks.withLock("escrow:a", async () => {
        order.push("a:start");
        await delay(10);
        order.push("a:end");
      }),
      locks.withLock("escrow:b", () => {
        order.push("b");
        return Promise.resolve();
      }),
    ]);

    expect(order).toEqual(["a:start", "b", "a:end"]);
  });

  it("releases the lock when the work throws", async () => {
    const locks = new ResourceLock("test");

    await expect(
      locks.withLock("escrow:a", () => Promise.reject(new Error("boom")))
    ).rejects.toThrow("boom");

    expect(locks.isLocked("escrow:a")).toBe(false);
    await expect(locks.withLock("escrow:a", () => Promise.resolve(42))).resolves.toBe(42);
  });

  it("reports held locks", async () => {
    const locks = new ResourceLock("test");
    let listedInside: string[] = [];

    await locks.withLock("factory:x", () => {
      listedInside = locks.listLocks().map((info) => info.resource);
      return Promise.resolve();
    });

    expect(listedInside).toEqual(["factory:x"]);
    expect(locks.listLocks()).toEqual([]);
  });
});
