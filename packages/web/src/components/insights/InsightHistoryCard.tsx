import { Trash2 } from "lucide-react";
import type { InsightHistoryItem } from "@vitalog/shared";
import { formatTimestamp } from "../../lib/format";

export function InsightHistoryCard({
  item,
  isActive,
  onClick,
  onDelete,
}: {
  item: InsightHistoryItem;
  isActive: boolean;
  onClick: () => void;
  onDelete: () => void;
}) {
  return (
    <div
      className={`flex items-center gap-2 p-3 rounded-xl border transition-colors ${
        isActive
          ? "bg-indigo-900/30 border-indigo-500/50"
          : "bg-slate-800/50 border-slate-700/50"
      }`}
    >
      <button onClick={onClick} className="flex-1 min-w-0 text-left">
        <div className="flex items-center gap-2">
          <span className="text-xs font-medium text-white">{formatTimestamp(item.createdAt)}</span>
          {item.stale && (
            <span className="text-[10px] px-1.5 py-0.5 rounded bg-amber-500/15 text-amber-300">
              outdated
            </span>
          )}
        </div>
        <p className="text-[11px] text-slate-400 truncate mt-0.5">{item.summary}</p>
        <p className="text-[10px] text-slate-600 mt-0.5">
          {item.periodStart} → {item.periodEnd} · {item.entryCount} entries
        </p>
      </button>
      <button
        onClick={onDelete}
        aria-label="Delete insight"
        className="p-1.5 text-slate-600 hover:text-red-400"
      >
        <Trash2 className="w-4 h-4" />
      </button>
    </div>
  );
}
