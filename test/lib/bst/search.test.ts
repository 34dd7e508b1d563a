import { describe, expect, it } from "vitest";
import { readFrame, runToIdle, startDelete, startSearch, stepEngine, treeHeight } from "@/lib/bst";
import { createEngine } from "@/lib/bst/engine";
import { loadedEngine } from "./helpers";

const BALANCED = [50, 25, 75, 12, 37, 62, 87];

describe("search machine", () => {
  it("walks the comparison path and stops on a match", () => {
    const engine = loadedEngine([50, 30, 70, 20, 40]);
    startSearch(engine, 40);
    expect(engine.cursor?.key).toBe(50);
    expect(engine.cursor?.tag).toBe("cursor");

    expect(runToIdle(engine)).toBe(3);
    expect(engine.found).toBe(true);
    expect(engine.cursor?.key).toBe(40);
    expect(engine.cursor?.tag).toBe("found");
    expect(engine.log.slice(2)).toEqual([
      "SEARCH 40",
      "  Compare 40 with 50",
      "  40 < 50, go left",
      "  Compare 40 with 30",
      "  40 > 30, go right",
      "  Compare 40 with 40",
      "  Found 40!",
    ]);
  });

  it("moves the cursor tag along with the cursor", () => {
    const engine = loadedEngine([50, 30, 70]);
    startSearch(engine, 70);
    stepEngine(engine);
    expect(engine.root?.tag).toBe("normal");
    expect(engine.root?.right?.tag).toBe("cursor");
  });

  it("ends as not found after walking off a leaf", () => {
    const engine = loadedEngine(BALANCED);
    startSearch(engine, 999);

    expect(runToIdle(engine)).toBe(4);
    expect(engine.found).toBe(false);
    expect(engine.cursor).toBeNull();
    expect(engine.log.slice(-3)).toEqual([
      "  Compare 999 with 87",
      "  999 > 87, go right",
      "  999 not found",
    ]);
  });

  it("needs at most height + 1 steps for any key", () => {
    const engine = loadedEngine(BALANCED);
    const height = treeHeight(engine.root);
    for (const key of [...BALANCED, 1, 30, 60, 100]) {
      startSearch(engine, key);
      expect(runToIdle(engine)).toBeLessThanOrEqual(height + 1);
      expect(engine.found).toBe(BALANCED.includes(key));
    }
  });

  it("records the outcome of the last search", () => {
    const engine = loadedEngine(BALANCED);
    startSearch(engine, 37);
    expect(engine.searchOutcome).toBeNull();
    runToIdle(engine);
    expect(readFrame(engine).searchOutcome).toBe("found");

    startSearch(engine, 999);
    runToIdle(engine);
    expect(readFrame(engine).searchOutcome).toBe("not-found");
  });

  it("does not report a failed delete as a missed search", () => {
    const engine = loadedEngine(BALANCED);
    startSearch(engine, 999);
    runToIdle(engine);
    startDelete(engine, 99);
    expect(engine.log[engine.log.length - 1]).toBe("  99 not found");
    expect(readFrame(engine).searchOutcome).toBeNull();
  });

  it("reports an empty tree without starting", () => {
    const engine = createEngine();
    startSearch(engine, 5);
    expect(engine.searchOutcome).toBe("not-found");
    expect(engine.activity.kind).toBe("idle");
    expect(engine.log).toEqual(["SEARCH 5", "  Tree empty, 5 not found"]);
  });

  it("searches for the pending key by default", () => {
    const engine = loadedEngine([10, 5]);
    startSearch(engine);
    runToIdle(engine);
    expect(engine.found).toBe(true);
    expect(engine.cursor?.key).toBe(10);
  });
});
