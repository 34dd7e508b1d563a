import { describe, expect, it } from "vitest";
import { computeLayout, easeNodes } from "@/lib/bst/layout";
import { createTreeNode, findNode } from "@/lib/bst/tree";
import { buildTree } from "./helpers";

describe("computeLayout", () => {
  it("halves the horizontal spread on each level", () => {
    const root = buildTree([50, 25, 75, 12, 37, 62, 87]);
    computeLayout(root, 350, 80, 200, 80);

    const targetOf = (key: number) => findNode(root, key)?.target;
    expect(targetOf(50)).toEqual({ x: 350, y: 80 });
    expect(targetOf(25)).toEqual({ x: 150, y: 160 });
    expect(targetOf(75)).toEqual({ x: 550, y: 160 });
    expect(targetOf(12)).toEqual({ x: 50, y: 240 });
    expect(targetOf(37)).toEqual({ x: 250, y: 240 });
    expect(targetOf(62)).toEqual({ x: 450, y: 240 });
    expect(targetOf(87)).toEqual({ x: 650, y: 240 });
  });

  it("does not touch current positions", () => {
    const root = buildTree([50, 25]);
    computeLayout(root, 350, 80, 200, 80);
    expect(root?.position).toEqual({ x: 0, y: 0 });
    expect(root?.left?.position).toEqual({ x: 0, y: 0 });
  });
});

describe("easeNodes", () => {
  it("moves a dt * rate share of the remaining distance", () => {
    const node = createTreeNode(1, { x: 0, y: 0 });
    node.target = { x: 100, y: 40 };

    easeNodes(node, 0.1, 5);
    expect(node.position).toEqual({ x: 50, y: 20 });
  });

  it("clamps the fraction at one", () => {
    const node = createTreeNode(1, { x: 0, y: 0 });
    node.target = { x: 100, y: 40 };

    easeNodes(node, 2, 5);
    expect(node.position).toEqual({ x: 100, y: 40 });
  });

  it("leaves the skipped node in place", () => {
    const root = createTreeNode(2, { x: 0, y: 0 });
    const child = createTreeNode(1, { x: 0, y: 0 });
    root.left = child;
    root.target = { x: 10, y: 10 };
    child.target = { x: 20, y: 20 };

    easeNodes(root, 1, 5, child);
    expect(root.position).toEqual({ x: 10, y: 10 });
    expect(child.position).toEqual({ x: 0, y: 0 });
  });
});
