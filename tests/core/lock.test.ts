import { describe, it, expect } from "vitest";
import { withLock } from "../../src/core/lock.js";

describe("withLock", () => {
  it("serializes work on the same key", async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((r) => { releaseFirst = r; });

    const first = withLock("k", async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
    });
    const second = withLock("k", async () => {
      order.push("second");
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(["first:start"]);
    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other keys", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((r) => { release = r; });
    const slow = withLock("a", () => gate);
    await expect(withLock("b", async () => "done")).resolves.toBe("done");
    release();
    await slow;
  });

  it("releases the lock when work throws", async () => {
    await expect(withLock("err", async () => { throw new Error("boom"); })).rejects.toThrow("boom");
    await expect(withLock("err", async () => 1)).resolves.toBe(1);
  });
});
