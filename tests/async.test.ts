import { describe, it, expect } from "vitest";
import { isLocked, withKeyedLock } from "../utils/async";

describe("withKeyedLock", () => {
  it("runs tasks with the same key one after another", async () => {
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = withKeyedLock("status", async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
    });
    const second = withKeyedLock("status", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(isLocked("status")).toBe(true);
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(isLocked("status")).toBe(false);
  });

  it("releases the key when the task throws", async () => {
    await expect(withKeyedLock("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(isLocked("k")).toBe(false);
    await expect(withKeyedLock("k", async () => 42)).resolves.toBe(42);
  });

  it("does not serialize different keys", async () => {
    let releaseA: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseA = resolve;
    });
    const a = withKeyedLock("a", () => gate);
    await expect(withKeyedLock("b", async () => "b")).resolves.toBe("b");
    releaseA();
    await a;
  });
});
