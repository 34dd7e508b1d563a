import type { BstEngine, DeleteActivity, DeletePhase, Point } from "./types";
import { hasElapsed, reachedThreshold, reachedZero } from "./clock";
import { syncNarration } from "./narration";
import { appendLog, finishActivity, relayout } from "./state";
import { deleteKey, findNode, minNode } from "./tree";

// Narration index of each phase; 0 is the locate step, 4 the commit. Delete
// narration only moves on phase changes, never on the reveal timer.
export const PHASE_STEP: Record<DeletePhase, number> = {
  flash: 1,
  drop: 2,
  fade: 3,
};
export const COMMIT_STEP = 4;

/** Locates the target up front. Returns null when the key is absent. */
export function createDelete(engine: BstEngine, target: number): DeleteActivity | null {
  const node = findNode(engine.root, target);
  if (!node) return null;
  return {
    kind: "deleting",
    target,
    node,
    phase: "flash",
    flashTimer: 0,
    flashCount: 0,
  };
}

function enterPhase(engine: BstEngine, activity: DeleteActivity, phase: DeletePhase): void {
  activity.phase = phase;
  syncNarration(engine.narration, PHASE_STEP[phase]);
}

function commitDelete(engine: BstEngine, activity: DeleteActivity): void {
  const { node, target } = activity;

  // With two children the node object survives holding its successor's key,
  // so it takes over the successor's spot instead of the dropped one.
  let successorKey: number | null = null;
  let successorPosition: Point | null = null;
  if (node.left && node.right) {
    const successor = minNode(node.right);
    successorKey = successor.key;
    successorPosition = { ...successor.position };
  }

  engine.root = deleteKey(engine.root, target);

  if (successorPosition) {
    node.position = successorPosition;
    node.opacity = 1;
    node.tag = "normal";
    appendLog(engine, `  ${target} had two children, successor ${successorKey} moves up`);
  }

  relayout(engine);
  syncNarration(engine.narration, COMMIT_STEP);
  appendLog(engine, `  Deleted ${target}`);
  finishActivity(engine);
}

export function updateDelete(engine: BstEngine, activity: DeleteActivity, dt: number): void {
  const { config } = engine;
  const { node } = activity;

  switch (activity.phase) {
    case "flash": {
      activity.flashTimer += dt;
      if (hasElapsed(activity.flashTimer, config.flashInterval)) {
        activity.flashTimer = 0;
        activity.flashCount++;
        node.tag = activity.flashCount % 2 === 0 ? "flash-on" : "flash-off";
      }
      if (activity.flashCount >= config.flashToggles) {
        node.tag = "flash-on";
        enterPhase(engine, activity, "drop");
      }
      return;
    }

    case "drop": {
      node.position.y += dt * config.dropSpeed;
      if (reachedThreshold(node.position.y, config.dropThreshold)) {
        enterPhase(engine, activity, "fade");
      }
      return;
    }

    case "fade": {
      node.opacity = Math.max(0, node.opacity - dt * config.fadeSpeed);
      if (reachedZero(node.opacity)) {
        node.opacity = 0;
        commitDelete(engine, activity);
      }
      return;
    }
  }
}

/** Update time until the active phase next changes something discrete. */
export function secondsUntilDeleteEvent(engine: BstEngine, activity: DeleteActivity): number {
  const { config } = engine;
  switch (activity.phase) {
    case "flash":
      return Math.max(0, config.flashInterval - activity.flashTimer);
    case "drop":
      return Math.max(0, (config.dropThreshold - activity.node.position.y) / config.dropSpeed);
    case "fade":
      return activity.node.opacity / config.fadeSpeed;
  }
}
