import type { ActivityKind, BstEngine, SearchOutcome, TraversalOrder, TreeNode, VisualTag } from "./types";
import type { EngineConfig } from "./config";
import { resolveConfig } from "./config";
import { createDelete, secondsUntilDeleteEvent, updateDelete } from "./deletion";
import { invariant } from "./errors";
import { secondsUntilInsertEvent, updateInsert } from "./insertion";
import { easeNodes } from "./layout";
import {
  DELETE_STEPS,
  INSERT_STEPS,
  SEARCH_STEPS,
  TRAVERSAL_STEPS,
  createNarration,
  revealedSteps,
  syncNarration,
} from "./narration";
import { createSearch, secondsUntilSearchHop, updateSearch } from "./search";
import { appendLog, clearTransientState, moveCursor, relayout } from "./state";
import { createTraversal, secondsUntilTraversalHop, traversalHeader, updateTraversal } from "./traversal";
import { countNodes, forEachNode, insertKey, treeHeight } from "./tree";

// ─── Construction ─────────────────────────────────────────────────────────────

export function createEngine(overrides: Partial<EngineConfig> = {}): BstEngine {
  const config = resolveConfig(overrides);
  return {
    config,
    root: null,
    pendingKey: config.initialKey,
    cursor: null,
    edge: null,
    found: false,
    searchOutcome: null,
    activity: { kind: "idle" },
    visitOrder: [],
    narration: createNarration(),
    log: [],
  };
}

function assertKey(key: number): void {
  invariant(Number.isInteger(key), `tree keys must be integers, got ${key}`);
}

function spawnPoint(engine: BstEngine): { x: number; y: number } {
  return { x: engine.config.originX, y: engine.config.spawnY };
}

// ─── Operations ───────────────────────────────────────────────────────────────

/** Inserts immediately and paces the narration. Returns false for a duplicate. */
export function startInsert(engine: BstEngine, key: number = engine.pendingKey): boolean {
  assertKey(key);
  clearTransientState(engine);
  appendLog(engine, `INSERT ${key}`);

  const result = insertKey(engine.root, key, spawnPoint(engine));
  engine.root = result.root;
  if (!result.node) {
    appendLog(engine, `  ${key} already exists, skipping`);
    engine.narration = createNarration();
    return false;
  }

  relayout(engine);
  engine.narration = createNarration(INSERT_STEPS);
  engine.activity = { kind: "inserting", key, node: result.node };
  moveCursor(engine, result.node);
  appendLog(engine, `  Inserted ${key}`);
  return true;
}

export function startSearch(engine: BstEngine, key: number = engine.pendingKey): void {
  assertKey(key);
  clearTransientState(engine);
  appendLog(engine, `SEARCH ${key}`);
  engine.narration = createNarration(SEARCH_STEPS);

  if (!engine.root) {
    appendLog(engine, `  Tree empty, ${key} not found`);
    engine.searchOutcome = "not-found";
    return;
  }

  engine.activity = createSearch(key);
  moveCursor(engine, engine.root);
}

/** Returns false (and stays idle) when the key is not in the tree. */
export function startDelete(engine: BstEngine, key: number = engine.pendingKey): boolean {
  assertKey(key);
  clearTransientState(engine);
  appendLog(engine, `DELETE ${key}`);
  engine.narration = createNarration(DELETE_STEPS);

  const activity = createDelete(engine, key);
  if (!activity) {
    appendLog(engine, `  ${key} not found`);
    return false;
  }

  engine.activity = activity;
  syncNarration(engine.narration, 1);
  appendLog(engine, `  Found ${key}, removing`);
  return true;
}

export function startTraversal(engine: BstEngine, order: TraversalOrder): void {
  clearTransientState(engine);
  appendLog(engine, traversalHeader(order));
  engine.narration = createNarration(TRAVERSAL_STEPS[order]);

  const activity = createTraversal(engine.root, order);
  engine.activity = activity;
  engine.visitOrder = activity.visited;
}

export function resetEngine(engine: BstEngine): void {
  clearTransientState(engine);
  engine.root = null;
  engine.narration = createNarration();
  engine.log = [];
  appendLog(engine, "RESET");
}

/** Clears the tree, then inserts every key without narration. */
export function loadScenario(engine: BstEngine, keys: readonly number[], name = "custom"): void {
  resetEngine(engine);
  engine.log = [];
  appendLog(engine, `SCENARIO ${name}`);

  const inserted: number[] = [];
  for (const key of keys) {
    assertKey(key);
    const result = insertKey(engine.root, key, spawnPoint(engine));
    engine.root = result.root;
    if (result.node) inserted.push(key);
  }

  relayout(engine);
  appendLog(engine, `  Inserted [${inserted.join(", ")}]`);
}

export function adjustPendingKey(engine: BstEngine, delta: number): number {
  assertKey(delta);
  engine.pendingKey += delta;
  return engine.pendingKey;
}

export function setPendingKey(engine: BstEngine, key: number): void {
  assertKey(key);
  engine.pendingKey = key;
}

export function isBusy(engine: BstEngine): boolean {
  return engine.activity.kind !== "idle";
}

// ─── Frame update ─────────────────────────────────────────────────────────────

/** Advances easing and the active machine by `dt` seconds. */
export function updateEngine(engine: BstEngine, dt: number): void {
  const elapsed = Number.isFinite(dt) ? Math.max(0, dt) : 0;
  const { activity } = engine;

  const pinned = activity.kind === "deleting" && activity.phase !== "flash" ? activity.node : null;
  easeNodes(engine.root, elapsed, engine.config.easeRate, pinned);

  switch (activity.kind) {
    case "idle":
      return;
    case "inserting":
      updateInsert(engine, activity, elapsed);
      return;
    case "searching":
      updateSearch(engine, activity, elapsed);
      return;
    case "deleting":
      updateDelete(engine, activity, elapsed);
      return;
    case "traversing":
      updateTraversal(engine, activity, elapsed);
      return;
  }
}

function secondsUntilNextEvent(engine: BstEngine): number | null {
  const { activity } = engine;
  switch (activity.kind) {
    case "idle":
      return null;
    case "inserting":
      return secondsUntilInsertEvent(engine);
    case "searching":
      return secondsUntilSearchHop(engine, activity);
    case "deleting":
      return secondsUntilDeleteEvent(engine, activity);
    case "traversing":
      return secondsUntilTraversalHop(engine, activity);
  }
}

/**
 * Advances exactly far enough for the active machine's next discrete event:
 * one hop, one flash toggle, the end of a drop or fade, or one narration line.
 */
export function stepEngine(engine: BstEngine): void {
  const seconds = secondsUntilNextEvent(engine);
  if (seconds === null) return;
  updateEngine(engine, seconds);
}

/** Steps until the engine is idle. Throws if that takes more than `maxSteps`. */
export function runToIdle(engine: BstEngine, maxSteps = 10_000): number {
  let steps = 0;
  while (isBusy(engine)) {
    invariant(steps < maxSteps, `engine still busy after ${maxSteps} steps`);
    stepEngine(engine);
    steps++;
  }
  return steps;
}

// ─── Renderer snapshot ────────────────────────────────────────────────────────

export interface NodeFrame {
  id: string;
  key: number;
  x: number;
  y: number;
  opacity: number;
  tag: VisualTag;
}

export interface EdgeFrame {
  id: string;
  side: "left" | "right";
  from: { x: number; y: number };
  to: { x: number; y: number };
  highlighted: boolean;
}

export interface EngineFrame {
  nodes: NodeFrame[];
  edges: EdgeFrame[];
  cursorId: string | null;
  narration: { steps: string[]; revealed: string[]; index: number };
  pendingKey: number;
  activity: ActivityKind;
  found: boolean;
  searchOutcome: SearchOutcome | null;
  visitOrder: number[];
  stackDepth: number;
  nodeCount: number;
  height: number;
  log: string[];
}

function edgeFrame(engine: BstEngine, from: TreeNode, to: TreeNode, side: "left" | "right"): EdgeFrame {
  const lit = engine.edge;
  return {
    id: `${from.id}-${to.id}`,
    side,
    from: { x: from.position.x, y: from.position.y },
    to: { x: to.position.x, y: to.position.y },
    highlighted: lit !== null && lit.from === from && lit.to === to,
  };
}

export function readFrame(engine: BstEngine): EngineFrame {
  const nodes: NodeFrame[] = [];
  const edges: EdgeFrame[] = [];

  forEachNode(engine.root, (node) => {
    nodes.push({
      id: node.id,
      key: node.key,
      x: node.position.x,
      y: node.position.y,
      opacity: node.opacity,
      tag: node.tag,
    });
    if (node.left) edges.push(edgeFrame(engine, node, node.left, "left"));
    if (node.right) edges.push(edgeFrame(engine, node, node.right, "right"));
  });

  const { activity, narration } = engine;

  return {
    nodes,
    edges,
    cursorId: engine.cursor?.id ?? null,
    narration: {
      steps: [...narration.steps],
      revealed: revealedSteps(narration),
      index: narration.index,
    },
    pendingKey: engine.pendingKey,
    activity: activity.kind,
    found: engine.found,
    searchOutcome: engine.searchOutcome,
    visitOrder: [...engine.visitOrder],
    stackDepth: activity.kind === "traversing" ? activity.frames.length : 0,
    nodeCount: countNodes(engine.root),
    height: treeHeight(engine.root),
    log: [...engine.log],
  };
}
