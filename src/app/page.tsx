"use client";

import { useState, useEffect, useCallback } from "react";
import { motion, AnimatePresence } from "framer-motion";
import {
  TreePine,
  Plus,
  Search,
  Trash2,
  Shuffle,
  ArrowDown,
  ArrowUp,
  Layers,
  Route,
  Check,
  X,
  Footprints,
} from "lucide-react";
import Navbar from "@/components/layout/Navbar";
import ModuleControls from "@/components/ui/ModuleControls";
import ModuleHeader from "@/components/ui/ModuleHeader";
import MetricsPanel, { type Metric } from "@/components/ui/MetricsPanel";
import ScenarioSelector from "@/components/ui/ScenarioSelector";
import TreeCanvas from "@/components/bst/TreeCanvas";
import AlgorithmStepsPanel from "@/components/bst/AlgorithmStepsPanel";
import OperationLog from "@/components/bst/OperationLog";
import {
  CURSOR_COLOR,
  DEFAULT_NODE_COLOR,
  DOMAIN_COLOR,
  FLASH_COLOR,
  FOUND_COLOR,
  PANEL_BG,
  PANEL_BORDER,
  TAG_FILL,
  TAG_LABEL,
} from "@/components/bst/palette";
import { useBstEngine } from "@/hooks/useBstEngine";
import { SCENARIO_PRESETS, type TraversalOrder, type VisualTag } from "@/lib/bst";

const TRAVERSALS: { order: TraversalOrder; label: string }[] = [
  { order: "in-order", label: "In-Order" },
  { order: "pre-order", label: "Pre-Order" },
  { order: "post-order", label: "Post-Order" },
];

const LEGEND_TAGS: VisualTag[] = ["normal", "cursor", "found", "flash-on"];

const buttonStyle = { background: PANEL_BG, border: `1px solid ${PANEL_BORDER}` };

export default function BstVisualizerPage() {
  const {
    frame,
    isPlaying,
    speed,
    play,
    pause,
    step,
    setSpeed,
    insert,
    search,
    remove,
    traverse,
    reset,
    adjustKey,
    setKey,
    loadPreset,
  } = useBstEngine();

  const [showMetrics, setShowMetrics] = useState(true);
  const [activeScenario, setActiveScenario] = useState("");
  const [valueInput, setValueInput] = useState(String(frame.pendingKey));

  // Keep the text field in step with arrow-key adjustments
  useEffect(() => {
    setValueInput(String(frame.pendingKey));
  }, [frame.pendingKey]);

  // ── Keyboard ────────────────────────────────────────────────────────────────
  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.target instanceof HTMLInputElement) return;
      if (e.key === "ArrowUp") {
        e.preventDefault();
        adjustKey(1);
      } else if (e.key === "ArrowDown") {
        e.preventDefault();
        adjustKey(-1);
      }
    };
    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [adjustKey]);

  const handleValueChange = useCallback(
    (text: string) => {
      setValueInput(text);
      const v = parseInt(text, 10);
      if (!isNaN(v)) setKey(v);
    },
    [setKey]
  );

  const handleRandomInsert = useCallback(() => {
    const v = Math.floor(Math.random() * 99) + 1;
    setKey(v);
    insert(v);
  }, [setKey, insert]);

  const handleScenario = useCallback(
    (id: string) => {
      setActiveScenario(id);
      loadPreset(id);
    },
    [loadPreset]
  );

  const handleReset = useCallback(() => {
    setActiveScenario("");
    reset();
  }, [reset]);

  const metrics: Metric[] = [
    { label: "Nodes", value: frame.nodeCount, color: DEFAULT_NODE_COLOR, icon: <Layers size={12} /> },
    { label: "Height", value: frame.height, color: "#06b6d4", icon: <TreePine size={12} /> },
    {
      label: "Stack Depth",
      value: frame.stackDepth,
      max: frame.height,
      color: CURSOR_COLOR,
      icon: <Route size={12} />,
    },
    {
      label: "Visited",
      value: frame.visitOrder.length,
      max: frame.nodeCount,
      color: FOUND_COLOR,
      icon: <Footprints size={12} />,
    },
  ];

  const isBusy = frame.activity !== "idle";
  const searchMissed = frame.searchOutcome === "not-found";

  // ── Render ──────────────────────────────────────────────────────────────────
  return (
    <div className="min-h-screen" style={{ background: "#0a0a0f" }}>
      <Navbar activity={frame.activity} />

      <div className="pt-14">
        <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8 py-6">
          <div className="mb-6">
            <ModuleHeader
              badge="BST"
              title="Binary Search Tree: Animated Operations"
              description="Insert, search and delete keys, and step through in-, pre- and post-order traversals. Every hop of the algorithm moves a cursor, lights the edge it follows, and reveals the matching line of the algorithm."
              accentColor={DOMAIN_COLOR}
              prerequisites={["Binary Search", "Recursion"]}
              shortcuts={["↑ / ↓ change value"]}
            />
          </div>

          {/* ── Operations row ───────────────────────────────────────────── */}
          <motion.div
            initial={{ opacity: 0, y: 12 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.5, delay: 0.1, ease: [0.23, 1, 0.32, 1] }}
            className="flex flex-wrap items-center gap-3 mb-4"
          >
            <div className="flex items-center gap-2 px-3 py-2 rounded-xl text-sm" style={buttonStyle}>
              <span className="text-xs text-[#71717a]">Value:</span>
              <button
                onClick={() => adjustKey(-1)}
                className="text-[#71717a] hover:text-white transition-colors"
                title="Decrease"
              >
                <ArrowDown size={12} />
              </button>
              <input
                type="number"
                value={valueInput}
                onChange={(e) => handleValueChange(e.target.value)}
                className="w-14 bg-transparent text-white text-sm font-mono outline-none border-b border-[#2a2a3e] focus:border-[#6366f1] transition-colors text-center"
              />
              <button
                onClick={() => adjustKey(1)}
                className="text-[#71717a] hover:text-white transition-colors"
                title="Increase"
              >
                <ArrowUp size={12} />
              </button>
              <button
                onClick={() => insert()}
                className="px-2 py-1 rounded-lg text-xs font-medium text-[#10b981] hover:bg-[#10b981]/10 transition-colors"
                title="Insert"
              >
                <Plus size={14} />
              </button>
              <button
                onClick={() => search()}
                className="px-2 py-1 rounded-lg text-xs font-medium text-[#06b6d4] hover:bg-[#06b6d4]/10 transition-colors"
                title="Search"
              >
                <Search size={14} />
              </button>
              <button
                onClick={() => remove()}
                className="px-2 py-1 rounded-lg text-xs font-medium text-[#ef4444] hover:bg-[#ef4444]/10 transition-colors"
                title="Delete"
              >
                <Trash2 size={14} />
              </button>
            </div>

            <button
              onClick={handleRandomInsert}
              className="flex items-center gap-1.5 px-3 py-2.5 rounded-xl text-sm font-medium text-[#a1a1aa] hover:text-white transition-all duration-200 hover:scale-[1.02] active:scale-[0.98]"
              style={buttonStyle}
            >
              <Shuffle size={14} />
              Random Insert
            </button>

            {TRAVERSALS.map(({ order, label }) => (
              <button
                key={order}
                onClick={() => traverse(order)}
                className="flex items-center gap-1.5 px-3 py-2.5 rounded-xl text-sm font-medium text-[#a1a1aa] hover:text-white transition-all duration-200 hover:scale-[1.02] active:scale-[0.98]"
                style={buttonStyle}
              >
                <Route size={14} />
                {label}
              </button>
            ))}

            <div className="flex-1" />

            <ScenarioSelector
              scenarios={SCENARIO_PRESETS}
              activeScenario={activeScenario}
              onSelect={handleScenario}
            />
          </motion.div>

          <div className="grid grid-cols-1 lg:grid-cols-[1fr_320px] gap-4">
            {/* ── Visualization area ───────────────────────────────────── */}
            <div className="space-y-4">
              <motion.div
                initial={{ opacity: 0, y: 16 }}
                animate={{ opacity: 1, y: 0 }}
                transition={{ duration: 0.6, delay: 0.2, ease: [0.23, 1, 0.32, 1] }}
                className="rounded-2xl overflow-hidden"
                style={{
                  background: PANEL_BG,
                  border: `1px solid ${PANEL_BORDER}`,
                  boxShadow: "0 0 0 1px rgba(16,185,129,0.03), 0 20px 50px -12px rgba(0,0,0,0.5)",
                }}
              >
                <div className="flex items-center justify-between px-5 py-3 border-b border-[#1e1e2e]">
                  <div className="flex items-center gap-3">
                    <TreePine size={14} style={{ color: DEFAULT_NODE_COLOR }} />
                    <span className="text-sm text-white font-medium">Value {frame.pendingKey}</span>
                  </div>
                  {frame.visitOrder.length > 0 && (
                    <span className="text-xs font-mono text-[#4a4a5e]">
                      Visit order: [{frame.visitOrder.join(", ")}]
                    </span>
                  )}
                </div>

                <div className="overflow-hidden" style={{ minHeight: "350px" }}>
                  <TreeCanvas nodes={frame.nodes} edges={frame.edges} cursorId={frame.cursorId} />
                </div>

                {/* Legend */}
                <div
                  className="flex items-center justify-center gap-5 px-4 py-2.5 border-t"
                  style={{ borderColor: PANEL_BORDER }}
                >
                  {LEGEND_TAGS.map((tag) => (
                    <div key={tag} className="flex items-center gap-1.5">
                      <div className="w-2.5 h-2.5 rounded-full" style={{ background: TAG_FILL[tag] }} />
                      <span className="text-[11px] text-[#71717a]">{TAG_LABEL[tag]}</span>
                    </div>
                  ))}
                  <div className="flex items-center gap-1.5">
                    <div className="w-4 h-0.5" style={{ background: FLASH_COLOR }} />
                    <span className="text-[11px] text-[#71717a]">Edge followed</span>
                  </div>
                </div>
              </motion.div>

              <ModuleControls
                isPlaying={isPlaying}
                isBusy={isBusy}
                onPlay={play}
                onPause={pause}
                onStep={step}
                onReset={handleReset}
                speed={speed}
                onSpeedChange={setSpeed}
                showMetrics={showMetrics}
                onToggleMetrics={() => setShowMetrics(!showMetrics)}
              >
                <AnimatePresence>
                  {frame.found && (
                    <motion.div
                      initial={{ opacity: 0, scale: 0.9 }}
                      animate={{ opacity: 1, scale: 1 }}
                      exit={{ opacity: 0, scale: 0.9 }}
                      className="flex items-center gap-1.5 px-3 py-1.5 rounded-lg text-xs"
                      style={{ background: `${FOUND_COLOR}15`, color: FOUND_COLOR }}
                    >
                      <Check size={12} />
                      Found
                    </motion.div>
                  )}
                  {searchMissed && (
                    <motion.div
                      initial={{ opacity: 0, scale: 0.9 }}
                      animate={{ opacity: 1, scale: 1 }}
                      exit={{ opacity: 0, scale: 0.9 }}
                      className="flex items-center gap-1.5 px-3 py-1.5 rounded-lg text-xs"
                      style={{ background: `${FLASH_COLOR}15`, color: FLASH_COLOR }}
                    >
                      <X size={12} />
                      Not found
                    </motion.div>
                  )}
                </AnimatePresence>
              </ModuleControls>
            </div>

            {/* ── Side panels ──────────────────────────────────────────── */}
            <div className="space-y-4">
              <AlgorithmStepsPanel steps={frame.narration.steps} revealed={frame.narration.revealed} />
              <MetricsPanel metrics={metrics} visible={showMetrics} />
              <OperationLog entries={frame.log} />
            </div>
          </div>
        </div>
      </div>
    </div>
  );
}
