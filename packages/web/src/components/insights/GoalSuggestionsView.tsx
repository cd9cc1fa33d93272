import { Plus } from "lucide-react";
import { GOAL_TYPE_CONFIG, type GoalSuggestionsContent, type SuggestedGoal } from "@vitalog/shared";

interface Props {
  content: GoalSuggestionsContent;
  onAdopt: (goal: SuggestedGoal) => void;
}

export function GoalSuggestionsView({ content, onAdopt }: Props) {
  if (content.recommended_goals.length === 0) {
    return (
      <p className="text-center text-sm text-slate-400 py-8">
        No new goals suggested right now.
      </p>
    );
  }

  return (
    <div className="space-y-3">
      {content.recommended_goals.map((g, i) => {
        const type = GOAL_TYPE_CONFIG[g.goal_type];
        return (
          <div key={`${g.goal_type}-${i}`} className="bg-slate-800/50 rounded-xl p-4 border border-slate-700/50">
            <div className="flex items-start justify-between gap-3">
              <div className="min-w-0">
                <p className="text-[10px] uppercase tracking-wider text-slate-500 mb-1">
                  {type.icon} {type.label}
                </p>
                <p className="text-sm font-medium text-white">{g.description}</p>
                <p className="text-xs text-slate-400 mt-1">
                  Target {g.target_value} in {g.timeframe_days} days
                </p>
              </div>
              <button
                onClick={() => onAdopt(g)}
                className="shrink-0 flex items-center gap-1 px-3 py-1.5 rounded-lg text-xs font-medium text-indigo-400 bg-indigo-500/10 active:bg-indigo-500/20"
              >
                <Plus className="w-3.5 h-3.5" />
                Add goal
              </button>
            </div>
            {g.rationale && (
              <p className="text-xs text-slate-400 mt-3 leading-relaxed">💭 {g.rationale}</p>
            )}
          </div>
        );
      })}
    </div>
  );
}
