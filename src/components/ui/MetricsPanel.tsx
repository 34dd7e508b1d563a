"use client";

import { motion, AnimatePresence } from "framer-motion";

export interface Metric {
  label: string;
  value: string | number;
  color?: string;
  icon?: React.ReactNode;
  /** Upper bound for `value`; draws a gauge under the number, e.g. stack depth against height. */
  max?: number;
}

function gaugeWidth(value: number, max: number): string {
  if (max <= 0) return "0%";
  return `${Math.min(100, Math.round((value / max) * 100))}%`;
}

interface MetricsPanelProps {
  metrics: Metric[];
  visible: boolean;
}

export default function MetricsPanel({ metrics, visible }: MetricsPanelProps) {
  return (
    <AnimatePresence>
      {visible && (
        <motion.div
          initial={{ opacity: 0, y: -10, scale: 0.95 }}
          animate={{ opacity: 1, y: 0, scale: 1 }}
          exit={{ opacity: 0, y: -10, scale: 0.95 }}
          transition={{ duration: 0.2, ease: "easeOut" }}
          className="grid grid-cols-2 gap-2"
        >
          {metrics.map((metric) => (
            <div
              key={metric.label}
              className="flex items-center gap-2 px-3 py-2 rounded-lg bg-[#111118] border"
              style={{ borderColor: `${metric.color ?? "#1e1e2e"}33` }}
            >
              {metric.icon && <span style={{ color: metric.color ?? "#71717a" }}>{metric.icon}</span>}
              <div className="flex flex-col flex-1 min-w-0">
                <span className="text-[10px] uppercase tracking-wider text-[#71717a] font-medium">
                  {metric.label}
                </span>
                <span
                  className="text-sm font-mono font-semibold tabular-nums"
                  style={{ color: metric.color ?? "#e4e4e7" }}
                >
                  {metric.value}
                  {metric.max !== undefined && (
                    <span className="text-[10px] text-[#4a4a5e]"> / {metric.max}</span>
                  )}
                </span>
                {metric.max !== undefined && typeof metric.value === "number" && (
                  <div className="mt-1 h-1 rounded-full bg-[#1e1e2e] overflow-hidden">
                    <motion.div
                      className="h-full rounded-full"
                      style={{ background: metric.color ?? "#6366f1" }}
                      animate={{ width: gaugeWidth(metric.value, metric.max) }}
                      transition={{ duration: 0.2, ease: "easeOut" }}
                    />
                  </div>
                )}
              </div>
            </div>
          ))}
        </motion.div>
      )}
    </AnimatePresence>
  );
}
