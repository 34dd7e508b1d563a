import { describe, expect, it } from "vitest";
import {
  inorderKeys,
  postorderKeys,
  preorderKeys,
  readFrame,
  runToIdle,
  startTraversal,
  stepEngine,
  updateEngine,
  treeHeight,
  EngineInvariantError,
  type TraversalOrder,
} from "@/lib/bst";
import { createEngine } from "@/lib/bst/engine";
import { createTraversal, traversalHop } from "@/lib/bst/traversal";
import { loadedEngine } from "./helpers";

const SHAPES: number[][] = [
  [50, 30, 70, 20, 40],
  [50, 25, 75, 12, 37, 62, 87],
  [10, 20, 30, 40, 50, 60],
  [50, 20, 45, 25, 40, 30],
  [7],
];

const ORDERS: TraversalOrder[] = ["in-order", "pre-order", "post-order"];

const EXPECTED: Record<TraversalOrder, typeof inorderKeys> = {
  "in-order": inorderKeys,
  "pre-order": preorderKeys,
  "post-order": postorderKeys,
};

describe("traversal machine", () => {
  for (const order of ORDERS) {
    it(`visits nodes in ${order} order`, () => {
      for (const keys of SHAPES) {
        const engine = loadedEngine(keys);
        startTraversal(engine, order);
        runToIdle(engine);
        expect(engine.visitOrder).toEqual(EXPECTED[order](engine.root));
      }
    });
  }

  it("takes four hops per node plus one to finish", () => {
    const engine = loadedEngine([50, 30, 70, 20, 40]);
    startTraversal(engine, "in-order");
    expect(runToIdle(engine)).toBe(21);
    expect(engine.log.slice(-6)).toEqual([
      "  Visit 20",
      "  Visit 30",
      "  Visit 40",
      "  Visit 50",
      "  Visit 70",
      "  Traversal complete: [20, 30, 40, 50, 70]",
    ]);
    expect(engine.cursor).toBeNull();
    expect(engine.edge).toBeNull();
  });

  it("never holds more frames than the tree is tall", () => {
    for (const keys of SHAPES) {
      const engine = loadedEngine(keys);
      startTraversal(engine, "post-order");
      let deepest = 0;
      while (engine.activity.kind !== "idle") {
        deepest = Math.max(deepest, readFrame(engine).stackDepth);
        stepEngine(engine);
      }
      expect(deepest).toBe(treeHeight(engine.root));
    }
  });

  it("lights a followed edge for exactly one hop", () => {
    const engine = loadedEngine([50, 30, 70, 20, 40]);
    const root = engine.root;
    startTraversal(engine, "in-order");

    stepEngine(engine);
    expect(engine.edge?.from).toBe(root);
    expect(engine.edge?.to.key).toBe(30);
    expect(readFrame(engine).edges.filter((e) => e.highlighted)).toHaveLength(1);

    stepEngine(engine);
    expect(engine.edge?.from.key).toBe(30);
    expect(engine.edge?.to.key).toBe(20);

    stepEngine(engine);
    expect(engine.edge).toBeNull();
    expect(engine.cursor?.key).toBe(20);
  });

  it("tags visited nodes as found", () => {
    const engine = loadedEngine([50, 30, 70]);
    startTraversal(engine, "pre-order");
    stepEngine(engine);
    expect(engine.root?.tag).toBe("found");
    expect(engine.visitOrder).toEqual([50]);
  });

  it("finishes immediately on an empty tree", () => {
    const engine = createEngine();
    startTraversal(engine, "in-order");
    expect(runToIdle(engine)).toBe(1);
    expect(engine.log).toEqual(["IN-ORDER TRAVERSAL", "  Traversal complete: []"]);
    expect(engine.visitOrder).toEqual([]);
  });

  it("waits a full hop interval between hops", () => {
    const engine = loadedEngine([50, 30, 70]);
    startTraversal(engine, "pre-order");
    const before = engine.log.length;

    updateEngine(engine, 0.5);
    expect(engine.log.length).toBe(before);
    updateEngine(engine, 0.3);
    expect(engine.log[engine.log.length - 1]).toBe("  Visit 50");
  });

  it("refuses to hop with no frames", () => {
    const engine = createEngine();
    const activity = createTraversal(null, "in-order");
    expect(() => traversalHop(engine, activity)).toThrow(EngineInvariantError);
  });
});
