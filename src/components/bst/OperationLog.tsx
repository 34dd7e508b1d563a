"use client";

import { useEffect, useRef } from "react";
import { ScrollText } from "lucide-react";
import { DEFAULT_NODE_COLOR, PANEL_BG, PANEL_BORDER } from "./palette";

export default function OperationLog({ entries }: { entries: string[] }) {
  const bottomRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    bottomRef.current?.scrollIntoView({ block: "nearest" });
  }, [entries.length]);

  const last = entries.length - 1;

  return (
    <div
      className="rounded-2xl overflow-hidden"
      style={{ background: PANEL_BG, border: `1px solid ${PANEL_BORDER}` }}
    >
      <div className="px-5 py-3.5 border-b border-[#1e1e2e]">
        <div className="flex items-center gap-2">
          <ScrollText size={14} style={{ color: DEFAULT_NODE_COLOR }} />
          <span className="text-sm font-semibold text-white">Operation Log</span>
        </div>
      </div>
      <div className="p-4 overflow-y-auto space-y-1" style={{ maxHeight: "260px" }}>
        {entries.length === 0 ? (
          <span className="text-xs text-[#4a4a5e] italic">
            Insert, search, or delete a value to see operations...
          </span>
        ) : (
          entries.map((entry, i) => (
            <div
              key={i}
              className="text-xs font-mono leading-relaxed px-2 py-1 rounded whitespace-pre"
              style={{
                background: i === last ? `${DEFAULT_NODE_COLOR}08` : "transparent",
                color: i === last ? "#a1a1aa" : "#5a5a6e",
                borderLeft: i === last ? `2px solid ${DEFAULT_NODE_COLOR}` : "2px solid transparent",
              }}
            >
              {entry}
            </div>
          ))
        )}
        <div ref={bottomRef} />
      </div>
    </div>
  );
}
