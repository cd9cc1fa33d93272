import { useEffect, useState } from "react";
import { toast } from "sonner";
import { Target } from "lucide-react";
import { GOAL_TYPE_CONFIG, type GoalResponse } from "@vitalog/shared";
import { useGoals } from "../hooks/useGoals";
import { ApiError } from "../api/client";
import { GoalCard } from "../components/goals/GoalCard";
import { GoalEditSheet } from "../components/goals/GoalEditSheet";
import { CreateGoalForm } from "../components/goals/CreateGoalForm";

type Tab = "active" | "completed" | "create";

const TABS: Array<{ value: Tab; label: string }> = [
  { value: "active", label: "Active" },
  { value: "completed", label: "Completed" },
  { value: "create", label: "New Goal" },
];

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof ApiError ? err.message : fallback;
}

export function GoalsPage() {
  const {
    goals,
    stats,
    loading,
    fetchGoals,
    createGoal,
    updateProgress,
    completeGoal,
    setStatus,
    extendDeadline,
    deleteGoal,
  } = useGoals();
  const [tab, setTab] = useState<Tab>("active");
  const [editing, setEditing] = useState<GoalResponse | null>(null);

  useEffect(() => {
    fetchGoals().catch((err) => toast.error(errorMessage(err, "Failed to load goals")));
  }, [fetchGoals]);

  const open = goals.filter((g) => g.status !== "completed");
  const done = goals.filter((g) => g.status === "completed");
  const shown = tab === "completed" ? done : open;

  const act = async (action: () => Promise<unknown>, success: string) => {
    try {
      await action();
      toast.success(success);
    } catch (err) {
      toast.error(errorMessage(err, "Something went wrong"));
    }
  };

  return (
    <div className="px-4 pt-6 pb-8">
      <div className="flex items-center gap-2 mb-4">
        <Target className="w-5 h-5 text-indigo-400" />
        <h1 className="text-xl font-bold text-white">Goals</h1>
      </div>

      {stats && stats.total > 0 && (
        <div className="grid grid-cols-4 gap-2 mb-4">
          <StatTile label="Total" value={stats.total} />
          <StatTile label="Active" value={stats.active} />
          <StatTile label="Paused" value={stats.paused} />
          <StatTile label="Done" value={stats.completed} />
        </div>
      )}
      {stats?.mostCommonCompletedType && (
        <p className="text-xs text-slate-400 mb-4">
          You're best at {GOAL_TYPE_CONFIG[stats.mostCommonCompletedType].label.toLowerCase()} goals.
        </p>
      )}

      <div className="flex gap-1 bg-slate-900 rounded-xl p-1 mb-4">
        {TABS.map((t) => (
          <button
            key={t.value}
            onClick={() => setTab(t.value)}
            className={`flex-1 py-2 rounded-lg text-xs font-medium transition-colors ${
              tab === t.value ? "bg-slate-800 text-white" : "text-slate-500"
            }`}
          >
            {t.label}
          </button>
        ))}
      </div>

      {tab === "create" ? (
        <CreateGoalForm
          onCreate={async (dto) => {
            await createGoal(dto);
            toast.success("Goal created");
            setTab("active");
          }}
        />
      ) : loading && goals.length === 0 ? (
        <div className="space-y-3 animate-pulse">
          <div className="bg-slate-800/50 rounded-xl h-32 border border-slate-700/50" />
          <div className="bg-slate-800/50 rounded-xl h-32 border border-slate-700/50" />
        </div>
      ) : shown.length === 0 ? (
        <p className="text-center text-sm text-slate-400 py-12">
          {tab === "active" ? "No active goals. Set one to get started!" : "No completed goals yet."}
        </p>
      ) : (
        <div className="space-y-3">
          {shown.map((goal) => (
            <GoalCard
              key={goal.id}
              goal={goal}
              onEdit={() => setEditing(goal)}
              onComplete={() => void act(() => completeGoal(goal.id), "🎉 Goal completed!")}
              onToggleStatus={() =>
                void act(
                  () => setStatus(goal.id, goal.status === "paused" ? "active" : "paused"),
                  goal.status === "paused" ? "Goal resumed" : "Goal paused",
                )
              }
              onDelete={() => {
                if (window.confirm("Delete this goal?")) {
                  void act(() => deleteGoal(goal.id), "Goal deleted");
                }
              }}
            />
          ))}
        </div>
      )}

      {editing && (
        <GoalEditSheet
          goal={editing}
          onClose={() => setEditing(null)}
          onUpdateProgress={updateProgress}
          onExtend={extendDeadline}
        />
      )}
    </div>
  );
}

function StatTile({ label, value }: { label: string; value: number }) {
  return (
    <div className="bg-slate-800/50 rounded-xl py-2 border border-slate-700/50 text-center">
      <p className="text-lg font-bold text-white">{value}</p>
      <p className="text-[10px] text-slate-500 uppercase tracking-wider">{label}</p>
    </div>
  );
}
