import { describe, expect, it } from "vitest";
import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigError,
  EngineInvariantError,
  INSERT_STEPS,
  SCENARIO_PRESETS,
  adjustPendingKey,
  createEngine,
  findScenario,
  inorderKeys,
  isBusy,
  loadScenario,
  readFrame,
  resetEngine,
  runToIdle,
  setPendingKey,
  startInsert,
  startSearch,
  startTraversal,
  stepEngine,
  updateEngine,
} from "@/lib/bst";
import { loadedEngine } from "./helpers";

describe("createEngine", () => {
  it("starts idle and empty with the default pending key", () => {
    const engine = createEngine();
    expect(engine.config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(engine.root).toBeNull();
    expect(engine.pendingKey).toBe(10);
    expect(isBusy(engine)).toBe(false);
    expect(engine.log).toEqual([]);
  });

  it("rejects configs it cannot pace with", () => {
    expect(() => createEngine({ searchHopInterval: 0 })).toThrow(
      "searchHopInterval: must be greater than zero"
    );
    expect(() => createEngine({ easeRate: Number.NaN })).toThrow("easeRate: must be a finite number");
    expect(() => createEngine({ initialKey: 2.5 })).toThrow("initialKey: must be an integer");
    expect(() => createEngine({ flashToggles: 0 })).toThrow("flashToggles: must be at least 1");
    expect(() => createEngine({ halfSpread: -1 })).toThrow("halfSpread: must not be negative");
  });

  it("names the offending field on the error", () => {
    try {
      createEngine({ maxLogLines: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EngineConfigError);
      expect(err instanceof EngineConfigError && err.field).toBe("maxLogLines");
    }
  });
});

describe("insert", () => {
  it("inserts the pending key at once and narrates afterwards", () => {
    const engine = createEngine();
    expect(startInsert(engine)).toBe(true);

    const node = engine.root;
    expect(node?.key).toBe(10);
    expect(node?.position).toEqual({ x: 350, y: -100 });
    expect(node?.target).toEqual({ x: 350, y: 80 });
    expect(engine.cursor).toBe(node);
    expect(node?.tag).toBe("cursor");
    expect(engine.log).toEqual(["INSERT 10", "  Inserted 10"]);

    expect(runToIdle(engine)).toBe(4);
    expect(engine.narration.steps).toEqual([...INSERT_STEPS]);
    expect(engine.narration.index).toBe(4);
    expect(engine.cursor).toBeNull();
    expect(node?.tag).toBe("normal");
    expect(node?.position).toEqual({ x: 350, y: 80 });
  });

  it("skips a duplicate key", () => {
    const engine = loadedEngine([10, 5]);
    expect(startInsert(engine, 10)).toBe(false);
    expect(isBusy(engine)).toBe(false);
    expect(engine.narration.steps).toEqual([]);
    expect(engine.log.slice(-2)).toEqual(["INSERT 10", "  10 already exists, skipping"]);
    expect(inorderKeys(engine.root)).toEqual([5, 10]);
  });

  it("relayouts existing nodes when a new level appears", () => {
    const engine = loadedEngine([50]);
    startInsert(engine, 25);
    expect(engine.root?.left?.target).toEqual({ x: 150, y: 160 });
  });
});

describe("operation switching", () => {
  it("abandons a running traversal and clears its tags", () => {
    const engine = loadedEngine([50, 30, 70, 20, 40]);
    startTraversal(engine, "in-order");
    for (let i = 0; i < 4; i++) stepEngine(engine);
    expect(engine.visitOrder).toEqual([20]);

    startSearch(engine, 70);
    const tags = readFrame(engine).nodes.map((n) => [n.key, n.tag]);
    expect(tags).toEqual([
      [50, "cursor"],
      [30, "normal"],
      [20, "normal"],
      [40, "normal"],
      [70, "normal"],
    ]);
    expect(engine.activity.kind).toBe("searching");
    expect(engine.visitOrder).toEqual([]);
    expect(engine.edge).toBeNull();
  });

  it("clears the found flag when a new operation starts", () => {
    const engine = loadedEngine([50, 30]);
    startSearch(engine, 30);
    runToIdle(engine);
    expect(engine.found).toBe(true);

    startTraversal(engine, "pre-order");
    expect(engine.found).toBe(false);
    expect(engine.cursor).toBeNull();
  });
});

describe("stepping", () => {
  it("does nothing while idle", () => {
    const engine = loadedEngine([50]);
    const before = readFrame(engine);
    stepEngine(engine);
    expect(readFrame(engine)).toEqual(before);
  });

  it("ignores negative and non-finite frame times", () => {
    const engine = loadedEngine([50]);
    startSearch(engine, 50);
    updateEngine(engine, -1);
    updateEngine(engine, Number.POSITIVE_INFINITY);
    expect(engine.log[engine.log.length - 1]).toBe("SEARCH 50");
    expect(engine.root?.position).toEqual({ x: 350, y: -100 });
  });

  it("gives up when a run does not settle in time", () => {
    const engine = createEngine();
    startInsert(engine);
    expect(() => runToIdle(engine, 2)).toThrow(EngineInvariantError);
  });
});

describe("scenarios and reset", () => {
  it("loads a preset without narration", () => {
    const preset = findScenario("two-child-delete");
    expect(preset?.keys).toEqual([50, 30, 70, 20, 40]);

    const engine = createEngine();
    loadScenario(engine, preset?.keys ?? [], preset?.id);
    expect(engine.log).toEqual(["SCENARIO two-child-delete", "  Inserted [50, 30, 70, 20, 40]"]);
    expect(engine.narration.steps).toEqual([]);
    expect(isBusy(engine)).toBe(false);
  });

  it("skips duplicate keys in a scenario", () => {
    const engine = createEngine();
    loadScenario(engine, [5, 3, 5, 8]);
    expect(engine.log).toEqual(["SCENARIO custom", "  Inserted [5, 3, 8]"]);
    expect(inorderKeys(engine.root)).toEqual([3, 5, 8]);
  });

  it("ships only valid presets", () => {
    for (const preset of SCENARIO_PRESETS) {
      const engine = createEngine();
      loadScenario(engine, preset.keys, preset.id);
      expect(inorderKeys(engine.root)).toEqual([...preset.keys].sort((a, b) => a - b));
    }
  });

  it("clears the tree and log on reset", () => {
    const engine = loadedEngine([50, 30]);
    startSearch(engine, 30);
    resetEngine(engine);
    expect(engine.root).toBeNull();
    expect(engine.log).toEqual(["RESET"]);
    expect(isBusy(engine)).toBe(false);
  });
});

describe("pending key and log", () => {
  it("adjusts and sets the pending key", () => {
    const engine = createEngine();
    expect(adjustPendingKey(engine, 1)).toBe(11);
    expect(adjustPendingKey(engine, -3)).toBe(8);
    setPendingKey(engine, 42);
    expect(engine.pendingKey).toBe(42);
    expect(() => setPendingKey(engine, 2.5)).toThrow(EngineInvariantError);
  });

  it("caps the operation log", () => {
    const engine = createEngine({ maxLogLines: 3 });
    startSearch(engine, 1);
    startSearch(engine, 2);
    expect(engine.log).toEqual(["  Tree empty, 1 not found", "SEARCH 2", "  Tree empty, 2 not found"]);
  });
});
