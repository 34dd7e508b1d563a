"use client";

import { motion, AnimatePresence } from "framer-motion";
import { ListOrdered } from "lucide-react";
import { DEFAULT_NODE_COLOR, PANEL_BG, PANEL_BORDER } from "./palette";

interface AlgorithmStepsPanelProps {
  steps: string[];
  revealed: string[];
}

export default function AlgorithmStepsPanel({ steps, revealed }: AlgorithmStepsPanelProps) {
  const current = revealed.length - 1;

  return (
    <div
      className="rounded-2xl overflow-hidden"
      style={{ background: PANEL_BG, border: `1px solid ${PANEL_BORDER}` }}
    >
      <div className="flex items-center justify-between px-5 py-3.5 border-b border-[#1e1e2e]">
        <div className="flex items-center gap-2">
          <ListOrdered size={14} style={{ color: DEFAULT_NODE_COLOR }} />
          <span className="text-sm font-semibold text-white">Algorithm Steps</span>
        </div>
        {steps.length > 0 && (
          <span className="text-[11px] font-mono text-[#71717a]">
            {revealed.length}/{steps.length}
          </span>
        )}
      </div>

      <div className="p-4 space-y-1.5 min-h-[150px]">
        {revealed.length === 0 ? (
          <span className="text-xs text-[#4a4a5e] italic">
            Start an operation to follow its steps...
          </span>
        ) : (
          <AnimatePresence initial={false}>
            {revealed.map((step, i) => (
              <motion.div
                key={`${i}-${step}`}
                initial={{ opacity: 0, x: -8 }}
                animate={{ opacity: 1, x: 0 }}
                transition={{ duration: 0.2 }}
                className="text-xs font-mono px-2.5 py-1.5 rounded-lg"
                style={{
                  background: i === current ? `${DEFAULT_NODE_COLOR}10` : "#0d0d14",
                  color: i === current ? "#e4e4e7" : "#71717a",
                  borderLeft: `2px solid ${i === current ? DEFAULT_NODE_COLOR : "transparent"}`,
                }}
              >
                - {step}
              </motion.div>
            ))}
          </AnimatePresence>
        )}
      </div>
    </div>
  );
}
