import type { EngineConfig } from "./config";

// ─── Geometry ─────────────────────────────────────────────────────────────────

export interface Point {
  x: number;
  y: number;
}

// ─── Tree ─────────────────────────────────────────────────────────────────────

export type VisualTag = "normal" | "cursor" | "found" | "flash-on" | "flash-off";

export interface TreeNode {
  key: number;
  left: TreeNode | null;
  right: TreeNode | null;
  id: string;
  position: Point;
  target: Point;
  opacity: number;
  tag: VisualTag;
}

export interface HighlightedEdge {
  from: TreeNode;
  to: TreeNode;
}

// ─── Traversal ────────────────────────────────────────────────────────────────

export type TraversalOrder = "in-order" | "pre-order" | "post-order";

/** 0 = descend left, 1 = visit, 2 = descend right, 3 = pop (in-order naming). */
export type FramePhase = 0 | 1 | 2 | 3;

export interface TraversalFrame {
  node: TreeNode;
  phase: FramePhase;
}

// ─── Narration ────────────────────────────────────────────────────────────────

export interface NarrationClock {
  steps: string[];
  index: number;
  timer: number;
}

// ─── Activities ───────────────────────────────────────────────────────────────

export type DeletePhase = "flash" | "drop" | "fade";

export interface IdleActivity {
  kind: "idle";
}

export interface InsertActivity {
  kind: "inserting";
  key: number;
  node: TreeNode;
}

export interface SearchActivity {
  kind: "searching";
  target: number;
  hopTimer: number;
}

export interface DeleteActivity {
  kind: "deleting";
  target: number;
  node: TreeNode;
  phase: DeletePhase;
  flashTimer: number;
  flashCount: number;
}

export interface TraversalActivity {
  kind: "traversing";
  order: TraversalOrder;
  frames: TraversalFrame[];
  hopTimer: number;
  visited: number[];
}

export type Activity =
  | IdleActivity
  | InsertActivity
  | SearchActivity
  | DeleteActivity
  | TraversalActivity;

export type ActivityKind = Activity["kind"];

export type SearchOutcome = "found" | "not-found";

// ─── Engine context ───────────────────────────────────────────────────────────

export interface BstEngine {
  readonly config: EngineConfig;
  root: TreeNode | null;
  pendingKey: number;
  cursor: TreeNode | null;
  edge: HighlightedEdge | null;
  /** Set by Search when the target key is reached; cleared by every start. */
  found: boolean;
  /** Result of the most recent search; null while searching or after any other operation. */
  searchOutcome: SearchOutcome | null;
  activity: Activity;
  /** Keys visited by the current or most recent traversal. */
  visitOrder: number[];
  narration: NarrationClock;
  log: string[];
}
