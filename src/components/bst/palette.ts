import type { VisualTag } from "@/lib/bst";

export const DOMAIN_COLOR = "#10b981";
export const DEFAULT_NODE_COLOR = "#6366f1";
export const CURSOR_COLOR = "#f59e0b";
export const FOUND_COLOR = "#10b981";
export const FLASH_COLOR = "#ef4444";
export const DIM_COLOR = "#2a2a3e";
export const EDGE_LEFT_COLOR = "#3f3f5a";
export const EDGE_RIGHT_COLOR = "#2f4a5e";
export const EDGE_LIT_COLOR = "#ef4444";
export const PANEL_BG = "#111118";
export const PANEL_BORDER = "#1e1e2e";

export const NODE_RADIUS = 22;

export const TAG_FILL: Record<VisualTag, string> = {
  normal: DEFAULT_NODE_COLOR,
  cursor: CURSOR_COLOR,
  found: FOUND_COLOR,
  "flash-on": FLASH_COLOR,
  "flash-off": DIM_COLOR,
};

export const TAG_STROKE: Record<VisualTag, string> = {
  normal: "#4f46e5",
  cursor: "#d97706",
  found: "#059669",
  "flash-on": "#dc2626",
  "flash-off": "#4a4a5e",
};

export const TAG_LABEL: Record<VisualTag, string> = {
  normal: "Default",
  cursor: "Cursor",
  found: "Found / Visited",
  "flash-on": "Deleting",
  "flash-off": "Flash",
};
