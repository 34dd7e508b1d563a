import type { BstEngine, TreeNode } from "./types";
import { computeLayout } from "./layout";
import { resetVisuals } from "./tree";

export function appendLog(engine: BstEngine, line: string): void {
  engine.log.push(line);
  const overflow = engine.log.length - engine.config.maxLogLines;
  if (overflow > 0) engine.log.splice(0, overflow);
}

/**
 * Moves the cursor and keeps the `cursor` tag on the node it points at.
 * Nodes already tagged found or flashing keep their tag.
 */
export function moveCursor(engine: BstEngine, next: TreeNode | null): void {
  const previous = engine.cursor;
  if (previous && previous !== next && previous.tag === "cursor") {
    previous.tag = "normal";
  }
  if (next && next.tag === "normal") {
    next.tag = "cursor";
  }
  engine.cursor = next;
}

/** Discards whatever was in flight: cursor, edge, found flag and node tags. */
export function clearTransientState(engine: BstEngine): void {
  engine.cursor = null;
  engine.edge = null;
  engine.found = false;
  engine.searchOutcome = null;
  engine.activity = { kind: "idle" };
  engine.visitOrder = [];
  resetVisuals(engine.root);
}

export function finishActivity(engine: BstEngine): void {
  engine.activity = { kind: "idle" };
}

export function relayout(engine: BstEngine): void {
  const { originX, originY, halfSpread, rowHeight } = engine.config;
  computeLayout(engine.root, originX, originY, halfSpread, rowHeight);
}
