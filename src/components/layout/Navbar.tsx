"use client";

import Link from "next/link";
import { GitBranch } from "lucide-react";
import type { ActivityKind } from "@/lib/bst";

const ACTIVITY_LABEL: Record<ActivityKind, string> = {
  idle: "Idle",
  inserting: "Inserting",
  searching: "Searching",
  deleting: "Deleting",
  traversing: "Traversing",
};

export default function Navbar({ activity }: { activity: ActivityKind }) {
  const busy = activity !== "idle";
  const color = busy ? "#f59e0b" : "#10b981";

  return (
    <nav className="fixed top-0 left-0 right-0 z-50 border-b border-[#1e1e2e]/50 bg-[#0a0a0f]/80 backdrop-blur-xl">
      <div className="max-w-7xl mx-auto px-4 sm:px-6 lg:px-8">
        <div className="flex items-center justify-between h-14">
          <Link href="/" className="flex items-center gap-2.5 group">
            <div className="flex items-center justify-center w-8 h-8 rounded-lg bg-gradient-to-br from-[#6366f1] to-[#06b6d4] shadow-lg shadow-[#6366f1]/20">
              <GitBranch size={16} className="text-white" />
            </div>
            <span className="text-base font-semibold tracking-tight">
              <span className="text-white">BST</span>
              <span className="text-[#6366f1]"> Motion</span>
              <span className="text-[#71717a]"> Lab</span>
            </span>
          </Link>

          <div
            className="flex items-center gap-1.5 px-3 py-1.5 rounded-lg"
            style={{ background: `${color}1a`, border: `1px solid ${color}33` }}
          >
            <div
              className={`w-1.5 h-1.5 rounded-full ${busy ? "animate-pulse" : ""}`}
              style={{ background: color }}
            />
            <span className="text-xs font-medium" style={{ color }}>
              {ACTIVITY_LABEL[activity]}
            </span>
          </div>
        </div>
      </div>
    </nav>
  );
}
