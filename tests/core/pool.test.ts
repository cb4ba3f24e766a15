import { describe, it, expect } from "vitest";
import { runPool } from "../../src/core/pool.js";
import { sleep } from "../helpers.js";

describe("runPool", () => {
  it("processes all items and preserves outcome order", async () => {
    const outcomes = await runPool([1, 2, 3, 4, 5], async (n) => n * 2, { concurrency: 3 });
    expect(outcomes).toEqual([2, 4, 6, 8, 10].map((value) => ({ kind: "success", value })));
  });

  it("respects concurrency limit", async () => {
    let running = 0;
    let maxRunning = 0;

    await runPool([1, 2, 3, 4, 5, 6], async () => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await sleep(10);
      running--;
    }, { concurrency: 2 });

    expect(maxRunning).toBe(2);
  });

  it("handles empty input array", async () => {
    const outcomes = await runPool([], async (n: number) => n, { concurrency: 3 });
    expect(outcomes).toEqual([]);
  });

  it("handles concurrency greater than items length", async () => {
    const outcomes = await runPool([1, 2], async (n) => n + 1, { concurrency: 100 });
    expect(outcomes).toEqual([
      { kind: "success", value: 2 },
      { kind: "success", value: 3 },
    ]);
  });

  it("concurrency of 1 processes sequentially", async () => {
    const order: number[] = [];
    await runPool([1, 2, 3], async (n) => {
      order.push(n);
      await sleep(5);
    }, { concurrency: 1 });
    expect(order).toEqual([1, 2, 3]);
  });

  it("captures failures without stopping other tasks", async () => {
    const ran: number[] = [];
    const outcomes = await runPool([1, 2, 3], async (n) => {
      ran.push(n);
      if (n === 2) throw new Error("fail on 2");
      return n;
    }, { concurrency: 2 });

    expect(ran.sort()).toEqual([1, 2, 3]);
    expect(outcomes[0]).toEqual({ kind: "success", value: 1 });
    expect(outcomes[1].kind).toBe("failure");
    expect(outcomes[1].kind === "failure" && outcomes[1].error.message).toBe("fail on 2");
    expect(outcomes[2]).toEqual({ kind: "success", value: 3 });
  });

  it("captures synchronous throws as failures", async () => {
    const outcomes = await runPool(["x"], () => {
      throw new TypeError("sync");
    }, { concurrency: 4 });
    expect(outcomes[0].kind === "failure" && outcomes[0].error).toBeInstanceOf(TypeError);
  });

  it("reports each completion in completion order with the task total", async () => {
    const settled: Array<[number, number]> = [];
    const finished: number[] = [];
    await runPool([30, 1, 10], async (ms) => {
      await sleep(ms);
      finished.push(ms);
    }, {
      concurrency: 3,
      onSettled: (completed, total) => settled.push([completed, total]),
    });

    expect(finished).toEqual([1, 10, 30]);
    expect(settled).toEqual([[1, 3], [2, 3], [3, 3]]);
  });

  it("passes the submission index to the task", async () => {
    const outcomes = await runPool(["a", "b"], (item, index) => `${item}${index}`, { concurrency: 2 });
    expect(outcomes).toEqual([
      { kind: "success", value: "a0" },
      { kind: "success", value: "b1" },
    ]);
  });
});
