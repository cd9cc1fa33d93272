import { useState } from "react";
import { Sparkles, RotateCw, Download } from "lucide-react";
import { toast } from "sonner";
import {
  INSIGHT_PERIODS,
  INSIGHT_TYPES,
  INSIGHT_TYPE_LABELS,
  addDays,
  todayIso,
  type InsightRecord,
  type InsightType,
  type SuggestedGoal,
} from "@vitalog/shared";
import { useInsights, type InsightPeriod } from "../hooks/useInsights";
import { useGoals } from "../hooks/useGoals";
import { ApiError } from "../api/client";
import { InsightLoader } from "../components/insights/InsightLoader";
import { AssessmentView } from "../components/insights/AssessmentView";
import { TrendsView } from "../components/insights/TrendsView";
import { GoalSuggestionsView } from "../components/insights/GoalSuggestionsView";
import { InsightHistoryCard } from "../components/insights/InsightHistoryCard";
import { MetricExplorer } from "../components/insights/MetricExplorer";
import { formatTimestamp } from "../lib/format";

export function InsightsPage() {
  const [type, setType] = useState<InsightType>("assessment");
  const [period, setPeriod] = useState<InsightPeriod>(30);
  const {
    result,
    loading,
    initialLoading,
    error,
    history,
    activeId,
    generate,
    loadById,
    remove,
    downloadReport,
  } = useInsights(type);
  const { createGoal } = useGoals();

  const adoptGoal = async (g: SuggestedGoal) => {
    try {
      await createGoal({
        type: g.goal_type,
        description: g.description.slice(0, 200),
        targetValue: g.target_value,
        currentValue: 0,
        targetDate: addDays(todayIso(), g.timeframe_days),
      });
      toast.success("Goal added");
    } catch (err) {
      toast.error(err instanceof ApiError ? err.message : "Failed to add goal");
    }
  };

  const handleDelete = async (id: string) => {
    try {
      await remove(id);
      toast.success("Insight deleted");
    } catch (err) {
      toast.error(err instanceof ApiError ? err.message : "Failed to delete insight");
    }
  };

  const handleDownload = async (id: string) => {
    try {
      await downloadReport(id);
    } catch (err) {
      toast.error(err instanceof ApiError ? err.message : "Download failed");
    }
  };

  return (
    <div className="px-4 pt-6 pb-8 space-y-6">
      <div className="flex items-center gap-2">
        <Sparkles className="w-5 h-5 text-indigo-400" />
        <h1 className="text-xl font-bold text-white">AI Insights</h1>
      </div>

      {/* Type tabs */}
      <div className="flex gap-1 bg-slate-900 rounded-xl p-1">
        {INSIGHT_TYPES.map((t) => (
          <button
            key={t}
            onClick={() => setType(t)}
            className={`flex-1 py-2 rounded-lg text-xs font-medium transition-colors ${
              type === t ? "bg-slate-800 text-white" : "text-slate-500"
            }`}
          >
            {INSIGHT_TYPE_LABELS[t]}
          </button>
        ))}
      </div>

      {/* Controls */}
      <div className="flex items-center gap-2">
        <div className="flex gap-1.5 flex-1">
          {INSIGHT_PERIODS.map((p) => (
            <button
              key={p}
              onClick={() => setPeriod(p)}
              className={`px-3 py-1.5 rounded-lg text-xs font-medium transition-colors ${
                period === p
                  ? "bg-indigo-600 text-white"
                  : "bg-slate-800 text-slate-400 hover:text-slate-300"
              }`}
            >
              {p}d
            </button>
          ))}
        </div>
        <button
          onClick={() => void generate(period, result !== null)}
          disabled={loading}
          className="flex items-center gap-1.5 px-3 py-1.5 rounded-lg text-xs font-medium text-white disabled:opacity-50"
          style={{ background: "linear-gradient(135deg, #8b5cf6 0%, #6366f1 100%)" }}
        >
          {result ? <RotateCw className="w-3.5 h-3.5" /> : <Sparkles className="w-3.5 h-3.5" />}
          {result ? "Regenerate" : "Generate"}
        </button>
      </div>

      {error?.type === "not_configured" && (
        <div className="bg-amber-500/10 border border-amber-500/30 rounded-xl p-4 text-sm text-amber-300">
          {error.message}
        </div>
      )}
      {error?.type === "no_data" && (
        <div className="text-center py-8">
          <p className="text-slate-400 text-sm mb-2">Not enough data</p>
          <p className="text-slate-500 text-xs">{error.message}</p>
        </div>
      )}
      {error?.type === "error" && (
        <div className="text-center py-8">
          <p className="text-red-400 text-sm mb-3">{error.message}</p>
          <button
            onClick={() => void generate(period)}
            className="text-sm text-indigo-400 hover:text-indigo-300"
          >
            Try again
          </button>
        </div>
      )}

      {(initialLoading || loading) && (loading ? <InsightLoader /> : (
        <div className="space-y-4 animate-pulse">
          <div className="bg-slate-800/50 rounded-2xl h-44 border border-slate-700/50" />
          <div className="bg-slate-800/50 rounded-xl h-20 border border-slate-700/50" />
        </div>
      ))}

      {!initialLoading && !loading && !result && !error && (
        <div className="text-center py-12">
          <div className="w-16 h-16 rounded-2xl bg-indigo-500/10 flex items-center justify-center mx-auto mb-4">
            <Sparkles className="w-8 h-8 text-indigo-400" />
          </div>
          <h2 className="text-lg font-semibold text-white mb-2">{INSIGHT_TYPE_LABELS[type]}</h2>
          <p className="text-sm text-slate-400 max-w-[280px] mx-auto">
            Generate an AI review of your last {period} days of health data.
          </p>
        </div>
      )}

      {result && !loading && (
        <div className="space-y-4">
          <ResultHeader
            record={result}
            viewingOld={activeId !== null}
            onDownload={(id) => void handleDownload(id)}
          />
          {result.type === "assessment" && <AssessmentView content={result.content} />}
          {result.type === "trend_analysis" && <TrendsView content={result.content} />}
          {result.type === "goal_suggestions" && (
            <GoalSuggestionsView content={result.content} onAdopt={(g) => void adoptGoal(g)} />
          )}
        </div>
      )}

      {history.length > 0 && (
        <section>
          <h2 className="text-sm font-semibold text-slate-300 mb-3">History</h2>
          <div className="space-y-2">
            {history.map((item) => (
              <InsightHistoryCard
                key={item.id}
                item={item}
                isActive={item.id === (activeId ?? result?.id)}
                onClick={() => void loadById(item.id)}
                onDelete={() => void handleDelete(item.id)}
              />
            ))}
          </div>
        </section>
      )}

      <MetricExplorer days={period} />

      <p className="text-[11px] text-slate-600 text-center">
        AI insights are informational only and not a substitute for professional medical advice.
      </p>
    </div>
  );
}

function ResultHeader({
  record,
  viewingOld,
  onDownload,
}: {
  record: InsightRecord;
  viewingOld: boolean;
  onDownload: (id: string) => void;
}) {
  const { id } = record;
  return (
    <div className="flex items-center justify-between gap-2 text-[11px] text-slate-500">
      <div className="flex flex-wrap items-center gap-2">
        <span>
          {record.periodStart} → {record.periodEnd} · {record.entryCount} entries
        </span>
        {record.cached && <span className="px-1.5 py-0.5 rounded bg-slate-800 text-slate-400">cached</span>}
        {record.stale && (
          <span className="px-1.5 py-0.5 rounded bg-amber-500/15 text-amber-300">
            data changed since
          </span>
        )}
        {viewingOld && <span>from {formatTimestamp(record.createdAt)}</span>}
      </div>
      {id && (
        <button
          onClick={() => onDownload(id)}
          className="flex items-center gap-1 text-indigo-400 hover:text-indigo-300 shrink-0"
        >
          <Download className="w-3.5 h-3.5" />
          Report
        </button>
      )}
    </div>
  );
}
