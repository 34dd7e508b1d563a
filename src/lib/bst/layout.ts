import type { TreeNode } from "./types";
import { forEachNode } from "./tree";

// ─── Layout algorithm ─────────────────────────────────────────────────────────

/**
 * Assigns every node's target by halving the horizontal spread per level.
 * Only the tree's shape is read; current positions are left alone.
 */
export function computeLayout(
  root: TreeNode | null,
  originX: number,
  originY: number,
  halfSpread: number,
  rowHeight: number
): void {
  function layout(node: TreeNode | null, x: number, y: number, spread: number): void {
    if (!node) return;
    node.target.x = x;
    node.target.y = y;
    layout(node.left, x - spread, y + rowHeight, spread / 2);
    layout(node.right, x + spread, y + rowHeight, spread / 2);
  }

  layout(root, originX, originY, halfSpread);
}

// ─── Easing ───────────────────────────────────────────────────────────────────

function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/** Moves every node (except `skip`) a `dt * rate` share of the way to its target. */
export function easeNodes(
  root: TreeNode | null,
  dt: number,
  rate: number,
  skip: TreeNode | null = null
): void {
  const t = Math.min(1, Math.max(0, dt * rate));
  if (t === 0) return;

  forEachNode(root, (node) => {
    if (node === skip) return;
    node.position.x = lerp(node.position.x, node.target.x, t);
    node.position.y = lerp(node.position.y, node.target.y, t);
  });
}
