import { createEngine, loadScenario } from "@/lib/bst/engine";
import { insertKey } from "@/lib/bst/tree";
import type { BstEngine, TreeNode } from "@/lib/bst/types";

export const SPAWN = { x: 0, y: 0 };

export function buildTree(keys: readonly number[]): TreeNode | null {
  let root: TreeNode | null = null;
  for (const key of keys) {
    root = insertKey(root, key, SPAWN).root;
  }
  return root;
}

export function loadedEngine(keys: readonly number[]): BstEngine {
  const engine = createEngine();
  loadScenario(engine, keys);
  return engine;
}
