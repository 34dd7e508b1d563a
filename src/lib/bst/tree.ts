import type { Point, TreeNode } from "./types";

// ─── Node IDs ─────────────────────────────────────────────────────────────────

let nodeIdCounter = 0;
function newNodeId(): string {
  return `bn-${++nodeIdCounter}`;
}

// ─── Construction ─────────────────────────────────────────────────────────────

export function createTreeNode(key: number, spawn: Point): TreeNode {
  return {
    key,
    left: null,
    right: null,
    id: newNodeId(),
    position: { x: spawn.x, y: spawn.y },
    target: { x: spawn.x, y: spawn.y },
    opacity: 1,
    tag: "normal",
  };
}

// ─── Queries ──────────────────────────────────────────────────────────────────

export function treeHeight(node: TreeNode | null): number {
  if (!node) return 0;
  return 1 + Math.max(treeHeight(node.left), treeHeight(node.right));
}

export function countNodes(node: TreeNode | null): number {
  if (!node) return 0;
  return 1 + countNodes(node.left) + countNodes(node.right);
}

export function minNode(node: TreeNode): TreeNode {
  let current = node;
  while (current.left) current = current.left;
  return current;
}

export function findNode(root: TreeNode | null, key: number): TreeNode | null {
  let current = root;
  while (current) {
    if (key === current.key) return current;
    current = key < current.key ? current.left : current.right;
  }
  return null;
}

/** Pre-order walk with an explicit stack, so deep degenerate trees don't recurse. */
export function forEachNode(root: TreeNode | null, fn: (node: TreeNode) => void): void {
  if (!root) return;
  const stack: TreeNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    fn(node);
    if (node.right) stack.push(node.right);
    if (node.left) stack.push(node.left);
  }
}

export function inorderKeys(node: TreeNode | null): number[] {
  if (!node) return [];
  return [...inorderKeys(node.left), node.key, ...inorderKeys(node.right)];
}

export function preorderKeys(node: TreeNode | null): number[] {
  if (!node) return [];
  return [node.key, ...preorderKeys(node.left), ...preorderKeys(node.right)];
}

export function postorderKeys(node: TreeNode | null): number[] {
  if (!node) return [];
  return [...postorderKeys(node.left), ...postorderKeys(node.right), node.key];
}

export function isValidBst(root: TreeNode | null): boolean {
  const keys = inorderKeys(root);
  return keys.every((key, i) => i === 0 || keys[i - 1] < key);
}

export function resetVisuals(root: TreeNode | null): void {
  forEachNode(root, (node) => {
    node.tag = "normal";
    node.opacity = 1;
  });
}

// ─── Mutation ─────────────────────────────────────────────────────────────────

export interface InsertResult {
  root: TreeNode;
  /** The created node, or null when the key was already present. */
  node: TreeNode | null;
}

export function insertKey(root: TreeNode | null, key: number, spawn: Point): InsertResult {
  if (!root) {
    const node = createTreeNode(key, spawn);
    return { root: node, node };
  }

  if (key < root.key) {
    const result = insertKey(root.left, key, spawn);
    root.left = result.root;
    return { root, node: result.node };
  }
  if (key > root.key) {
    const result = insertKey(root.right, key, spawn);
    root.right = result.root;
    return { root, node: result.node };
  }

  return { root, node: null }; // duplicate
}

/**
 * Standard BST deletion. A node with two children takes its in-order
 * successor's key and the successor is removed from the right subtree.
 */
export function deleteKey(root: TreeNode | null, key: number): TreeNode | null {
  if (!root) return null;

  if (key < root.key) {
    root.left = deleteKey(root.left, key);
  } else if (key > root.key) {
    root.right = deleteKey(root.right, key);
  } else {
    if (!root.left) return root.right;
    if (!root.right) return root.left;

    const successor = minNode(root.right);
    root.key = successor.key;
    root.right = deleteKey(root.right, successor.key);
  }

  return root;
}
