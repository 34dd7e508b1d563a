"use client";

import { motion } from "framer-motion";
import { Keyboard, Zap } from "lucide-react";

interface ModuleHeaderProps {
  badge: string;
  title: string;
  description: string;
  accentColor: string;
  prerequisites?: string[];
  shortcuts?: string[];
}

export default function ModuleHeader({
  badge,
  title,
  description,
  accentColor,
  prerequisites = [],
  shortcuts = [],
}: ModuleHeaderProps) {
  return (
    <motion.div
      initial={{ opacity: 0, y: 16 }}
      animate={{ opacity: 1, y: 0 }}
      transition={{ duration: 0.5, ease: [0.23, 1, 0.32, 1] }}
      className="space-y-2"
    >
      <div className="flex items-center gap-3">
        <span
          className="px-2.5 py-1 rounded-md text-xs font-mono font-semibold"
          style={{
            backgroundColor: `${accentColor}15`,
            color: accentColor,
            border: `1px solid ${accentColor}30`,
          }}
        >
          {badge}
        </span>
        <h1 className="text-2xl sm:text-3xl font-bold tracking-tight text-white">{title}</h1>
      </div>
      <p className="text-sm text-[#a1a1aa] max-w-2xl">{description}</p>

      {(prerequisites.length > 0 || shortcuts.length > 0) && (
        <div className="flex flex-wrap items-center gap-2 pt-1">
          {prerequisites.length > 0 && (
            <span
              className="inline-flex items-center gap-1.5 px-2.5 py-1 rounded-md text-[11px] font-medium"
              style={{
                background: "rgba(245,158,11,0.08)",
                color: "#f59e0b",
                border: "1px solid rgba(245,158,11,0.15)",
              }}
            >
              <Zap size={11} />
              Prerequisite: {prerequisites.join(", ")}
            </span>
          )}
          {shortcuts.map((shortcut) => (
            <span
              key={shortcut}
              className="inline-flex items-center gap-1.5 px-2.5 py-1 rounded-md text-[11px] text-[#71717a] bg-[#1e1e2e]"
            >
              <Keyboard size={11} />
              {shortcut}
            </span>
          ))}
        </div>
      )}
    </motion.div>
  );
}
