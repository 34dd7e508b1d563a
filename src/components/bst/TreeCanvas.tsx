"use client";

import { motion } from "framer-motion";
import { TreePine } from "lucide-react";
import type { EdgeFrame, NodeFrame } from "@/lib/bst";
import {
  EDGE_LEFT_COLOR,
  EDGE_LIT_COLOR,
  EDGE_RIGHT_COLOR,
  FOUND_COLOR,
  CURSOR_COLOR,
  NODE_RADIUS,
  TAG_FILL,
  TAG_STROKE,
} from "./palette";

// Fixed so the layout's own coordinates (root at 350, 80) are used as-is and
// a dropping node leaves through the bottom edge.
const VIEW_BOX = "-60 0 820 560";

interface TreeCanvasProps {
  nodes: NodeFrame[];
  edges: EdgeFrame[];
  cursorId: string | null;
}

function TreeNodeViz({ node, isCursor }: { node: NodeFrame; isCursor: boolean }) {
  const glow =
    node.tag === "found"
      ? `drop-shadow(0 0 12px ${FOUND_COLOR}60)`
      : isCursor
      ? `drop-shadow(0 0 10px ${CURSOR_COLOR}50)`
      : undefined;

  return (
    <motion.g
      initial={{ scale: 0.5 }}
      animate={{ scale: 1 }}
      transition={{ duration: 0.3, ease: "easeOut" }}
      style={{ opacity: node.opacity }}
    >
      <circle
        cx={node.x}
        cy={node.y}
        r={NODE_RADIUS}
        fill={TAG_FILL[node.tag]}
        stroke={isCursor ? CURSOR_COLOR : TAG_STROKE[node.tag]}
        strokeWidth={isCursor ? 3 : 2}
        style={{ filter: glow, transition: "fill 150ms ease-out" }}
      />
      <text
        x={node.x}
        y={node.y + 1}
        textAnchor="middle"
        dominantBaseline="central"
        fill="#ffffff"
        fontSize="13"
        fontFamily="monospace"
        fontWeight="bold"
      >
        {node.key}
      </text>
    </motion.g>
  );
}

export default function TreeCanvas({ nodes, edges, cursorId }: TreeCanvasProps) {
  if (nodes.length === 0) {
    return (
      <div className="flex flex-col items-center gap-2 py-24">
        <TreePine size={32} style={{ color: "#2a2a3e" }} />
        <span className="text-sm text-[#4a4a5e]">
          Tree is empty. Insert a value or pick a preset to begin.
        </span>
      </div>
    );
  }

  return (
    <svg width="100%" viewBox={VIEW_BOX} className="block" style={{ maxHeight: "560px" }}>
      {/* Edges */}
      {edges.map((edge) => (
        <line
          key={edge.id}
          x1={edge.from.x}
          y1={edge.from.y}
          x2={edge.to.x}
          y2={edge.to.y}
          stroke={
            edge.highlighted
              ? EDGE_LIT_COLOR
              : edge.side === "left"
              ? EDGE_LEFT_COLOR
              : EDGE_RIGHT_COLOR
          }
          strokeWidth={edge.highlighted ? 3 : 1.5}
          style={{
            filter: edge.highlighted ? `drop-shadow(0 0 4px ${EDGE_LIT_COLOR}60)` : undefined,
          }}
        />
      ))}

      {/* Nodes */}
      {nodes.map((node) => (
        <TreeNodeViz key={node.id} node={node} isCursor={node.id === cursorId} />
      ))}
    </svg>
  );
}
