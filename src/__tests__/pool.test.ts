import { describe, it, expect } from "vitest";
import { runPool } from "../pool.js";
import { delay } from "./fake-generator.js";

describe("runPool", () => {
  it("returns outcomes in task order", async () => {
    const tasks = [30, 5, 15].map((ms, i) => async () => {
      await delay(ms);
      return i;
    });
    const outcomes = await runPool(tasks, { concurrency: 3 });
    expect(outcomes).toEqual([
      { status: "fulfilled", value: 0 },
      { status: "fulfilled", value: 1 },
      { status: "fulfilled", value: 2 },
    ]);
  });

  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const tasks = Array.from({ length: 8 }, () => async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight--;
    });
    await runPool(tasks, { concurrency: 3 });
    expect(peak).toBe(3);
  });

  it("records rejections and keeps going by default", async () => {
    const boom = new Error("boom");
    const outcomes = await runPool(
      [async () => 1, async () => { throw boom; }, async () => 3],
      { concurrency: 1 },
    );
    expect(outcomes).toEqual([
      { status: "fulfilled", value: 1 },
      { status: "rejected", reason: boom },
      { status: "fulfilled", value: 3 },
    ]);
  });

  it("skips tasks not yet started after a failure when asked", async () => {
    let started = 0;
    const tasks = [
      async () => { started++; return 1; },
      async () => { started++; throw new Error("boom"); },
      async () => { started++; return 3; },
    ];
    const outcomes = await runPool(tasks, { concurrency: 1, stopOnError: true });
    expect(outcomes.map((o) => o.status)).toEqual(["fulfilled", "rejected", "skipped"]);
    expect(started).toBe(2);
  });

  it("handles an empty task list", async () => {
    expect(await runPool([], { concurrency: 4 })).toEqual([]);
  });
});
