import type { ReactNode } from "react";
import { CalendarClock, CheckCircle2, Pause, Play, Trash2, Pencil } from "lucide-react";
import { GOAL_TYPE_CONFIG, type GoalResponse } from "@vitalog/shared";
import { longDate } from "../../lib/format";

interface Props {
  goal: GoalResponse;
  onEdit: () => void;
  onComplete: () => void;
  onToggleStatus: () => void;
  onDelete: () => void;
}

function barColor(percent: number): string {
  if (percent >= 100) return "#10B981";
  if (percent >= 50) return "#6366F1";
  return "#F59E0B";
}

export function GoalCard({ goal, onEdit, onComplete, onToggleStatus, onDelete }: Props) {
  const type = GOAL_TYPE_CONFIG[goal.type];
  const { progress } = goal;
  const completed = goal.status === "completed";
  const overdue = !completed && progress.daysLeft < 0;

  return (
    <div className="bg-slate-800/50 rounded-xl p-4 border border-slate-700/50">
      <div className="flex items-start justify-between gap-3 mb-3">
        <div className="min-w-0">
          <p className="text-[10px] uppercase tracking-wider text-slate-500 mb-1">
            {type.icon} {type.label}
            {goal.status === "paused" && <span className="ml-2 text-amber-400">paused</span>}
          </p>
          <p className="text-sm font-medium text-white">{goal.description}</p>
        </div>
        <span className="text-sm font-semibold text-white tabular-nums">{progress.percent}%</span>
      </div>

      <div className="h-2 rounded-full bg-slate-700 overflow-hidden mb-2">
        <div
          className="h-full rounded-full transition-all"
          style={{ width: `${progress.cappedPercent}%`, background: barColor(progress.cappedPercent) }}
        />
      </div>

      <div className="flex items-center justify-between text-[11px] text-slate-400 mb-3">
        <span>
          {goal.currentValue} / {goal.targetValue}
        </span>
        {completed ? (
          <span className="text-emerald-400">
            Completed {goal.completedAt ? longDate(goal.completedAt.slice(0, 10)) : ""}
          </span>
        ) : (
          <span className={overdue ? "text-red-400" : undefined}>
            {overdue
              ? `${Math.abs(progress.daysLeft)} days overdue`
              : `${progress.daysLeft} days left · ${longDate(goal.targetDate)}`}
          </span>
        )}
      </div>

      {!completed && <p className="text-xs text-slate-300 mb-3">{progress.message}</p>}

      <div className="flex items-center gap-1">
        {!completed && (
          <>
            <IconButton label="Update progress" onClick={onEdit}>
              <Pencil className="w-4 h-4" />
            </IconButton>
            <IconButton label="Mark complete" onClick={onComplete}>
              <CheckCircle2 className="w-4 h-4" />
            </IconButton>
            <IconButton label={goal.status === "paused" ? "Resume" : "Pause"} onClick={onToggleStatus}>
              {goal.status === "paused" ? <Play className="w-4 h-4" /> : <Pause className="w-4 h-4" />}
            </IconButton>
            {overdue && (
              <IconButton label="Extend deadline" onClick={onEdit}>
                <CalendarClock className="w-4 h-4 text-amber-400" />
              </IconButton>
            )}
          </>
        )}
        <div className="flex-1" />
        <IconButton label="Delete" onClick={onDelete}>
          <Trash2 className="w-4 h-4 hover:text-red-400" />
        </IconButton>
      </div>
    </div>
  );
}

function IconButton({
  label,
  onClick,
  children,
}: {
  label: string;
  onClick: () => void;
  children: ReactNode;
}) {
  return (
    <button
      onClick={onClick}
      aria-label={label}
      title={label}
      className="p-2 rounded-lg text-slate-400 hover:text-white hover:bg-slate-700/50 transition-colors"
    >
      {children}
    </button>
  );
}
