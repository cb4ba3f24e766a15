import { describe, it, expect } from "vitest";
import { createCollector } from "../../src/core/collector.js";
import { appendAccumulator } from "../../src/core/accumulator.js";
import { success, failure } from "../../src/core/outcome.js";

describe("createCollector", () => {
  it("applies the configured policy and lets a call override it", () => {
    const collector = createCollector<number>({
      accumulator: appendAccumulator,
      onError: "suppress",
      returnOutput: true,
    });
    const err = new Error("boom");

    collector.collect(success(1));
    collector.collect(failure(err));
    expect(collector.result()).toEqual([1]);
    expect(() => collector.collect(failure(err), "raise")).toThrow(err);
  });

  it("fills and returns an initial array", () => {
    const initial = ["seed"];
    const collector = createCollector<string>({
      accumulator: appendAccumulator,
      onError: "collect",
      returnOutput: true,
      initialResult: initial,
    });
    collector.collect(success("a"));
    expect(collector.result()).toBe(initial);
    expect(initial).toEqual(["seed", "a"]);
  });

  it("copies an initial iterable that is not an array", () => {
    const initial = new Set(["seed"]);
    const collector = createCollector<string>({
      accumulator: appendAccumulator,
      onError: "collect",
      returnOutput: true,
      initialResult: initial,
    });
    collector.collect(success("a"));
    expect(collector.result()).toEqual(["seed", "a"]);
    expect([...initial]).toEqual(["seed"]);
  });

  it("returns undefined and records nothing without output", () => {
    const collector = createCollector<number>({
      accumulator: appendAccumulator,
      onError: "collect",
      returnOutput: false,
      initialResult: [1],
    });
    collector.collect(success(2));
    collector.collect(failure(new Error("ignored")));
    expect(collector.result()).toBeUndefined();
  });

  it("fails when a recorded error cannot be accumulated", () => {
    const collector = createCollector<number>({
      accumulator: {
        accumulate(value, output) {
          if (value instanceof Error) throw new Error("errors not welcome");
          output.push(value);
        },
      },
      onError: "collect",
      returnOutput: true,
    });
    expect(() => collector.collect(failure(new Error("boom")))).toThrow("Accumulator failed: errors not welcome");
  });
});
