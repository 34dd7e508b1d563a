import type {
  BstEngine,
  FramePhase,
  TraversalActivity,
  TraversalFrame,
  TraversalOrder,
  TreeNode,
} from "./types";
import { hasElapsed } from "./clock";
import { EngineInvariantError, invariant } from "./errors";
import { advanceNarration } from "./narration";
import { appendLog, finishActivity, moveCursor } from "./state";

// ─── Transition table ─────────────────────────────────────────────────────────
//
// Phases 0-2 each run one action on the top frame, phase 3 pops it. `focus`
// moves the cursor onto the frame's node as part of the step.

type FrameAction = "descend-left" | "visit" | "descend-right";

interface PhaseRule {
  action: FrameAction;
  focus: boolean;
}

type PhaseRules = readonly [PhaseRule, PhaseRule, PhaseRule];

const PHASE_RULES: Record<TraversalOrder, PhaseRules> = {
  "in-order": [
    { action: "descend-left", focus: true },
    { action: "visit", focus: true },
    { action: "descend-right", focus: false },
  ],
  "pre-order": [
    { action: "visit", focus: true },
    { action: "descend-left", focus: false },
    { action: "descend-right", focus: false },
  ],
  "post-order": [
    { action: "descend-left", focus: true },
    { action: "descend-right", focus: true },
    { action: "visit", focus: true },
  ],
};

const ORDER_LABEL: Record<TraversalOrder, string> = {
  "in-order": "IN-ORDER",
  "pre-order": "PRE-ORDER",
  "post-order": "POST-ORDER",
};

// ─── Machine ──────────────────────────────────────────────────────────────────

export function createTraversal(root: TreeNode | null, order: TraversalOrder): TraversalActivity {
  return {
    kind: "traversing",
    order,
    frames: root ? [{ node: root, phase: 0 }] : [],
    hopTimer: 0,
    visited: [],
  };
}

export function traversalHeader(order: TraversalOrder): string {
  return `${ORDER_LABEL[order]} TRAVERSAL`;
}

function descend(engine: BstEngine, activity: TraversalActivity, from: TreeNode, child: TreeNode | null): void {
  if (!child) return;
  engine.edge = { from, to: child };
  activity.frames.push({ node: child, phase: 0 });
}

function visit(engine: BstEngine, activity: TraversalActivity, node: TreeNode): void {
  node.tag = "found";
  activity.visited.push(node.key);
  appendLog(engine, `  Visit ${node.key}`);
}

function nextPhase(phase: FramePhase): FramePhase {
  switch (phase) {
    case 0:
      return 1;
    case 1:
      return 2;
    case 2:
      return 3;
    case 3:
      throw new EngineInvariantError("phase 3 has no successor");
  }
}

/**
 * Runs exactly one transition on the top frame. The edge highlight is cleared
 * first, so an edge stays lit for a single hop.
 */
export function traversalHop(engine: BstEngine, activity: TraversalActivity): void {
  const frame: TraversalFrame | undefined = activity.frames[activity.frames.length - 1];
  invariant(frame, "traversal hop on an empty frame stack");

  engine.edge = null;
  const { node } = frame;

  if (frame.phase === 3) {
    const popped = activity.frames.pop();
    invariant(popped === frame, "popped frame is not the top frame");
    return;
  }

  const rule = PHASE_RULES[activity.order][frame.phase];
  invariant(rule, `no rule for phase ${frame.phase} of ${activity.order}`);

  // Advance before descending so the parent resumes at the next phase once
  // the child frame is popped.
  frame.phase = nextPhase(frame.phase);

  if (rule.action === "visit") {
    visit(engine, activity, node);
  }
  if (rule.focus) {
    moveCursor(engine, node);
  }
  if (rule.action === "descend-left") {
    descend(engine, activity, node, node.left);
  } else if (rule.action === "descend-right") {
    descend(engine, activity, node, node.right);
  }
}

function finishTraversal(engine: BstEngine, activity: TraversalActivity): void {
  moveCursor(engine, null);
  engine.edge = null;
  appendLog(engine, `  Traversal complete: [${activity.visited.join(", ")}]`);
  finishActivity(engine);
}

export function updateTraversal(engine: BstEngine, activity: TraversalActivity, dt: number): void {
  if (activity.frames.length === 0) {
    finishTraversal(engine, activity);
    return;
  }

  advanceNarration(engine.narration, dt, engine.config.narrationInterval);

  activity.hopTimer += dt;
  if (!hasElapsed(activity.hopTimer, engine.config.traversalHopInterval)) return;
  activity.hopTimer = 0;

  traversalHop(engine, activity);
}

/** Seconds of update time before the next hop (0 when termination is pending). */
export function secondsUntilTraversalHop(engine: BstEngine, activity: TraversalActivity): number {
  if (activity.frames.length === 0) return 0;
  return Math.max(0, engine.config.traversalHopInterval - activity.hopTimer);
}
