import { useMemo, useState, type ReactNode } from "react";
import { Link } from "react-router-dom";
import { PenLine, Sparkles, Target, RotateCw } from "lucide-react";
import { useAuth } from "../auth/AuthContext";
import { useDashboard } from "../hooks/useDashboard";
import { useDailyTip } from "../hooks/useDailyTip";
import { TipCard } from "../components/dashboard/TipCard";
import { HealthScoreCard } from "../components/dashboard/HealthScoreCard";
import { LatestEntryCard } from "../components/dashboard/LatestEntryCard";
import { RecentEntries } from "../components/dashboard/RecentEntries";
import {
  BloodPressureChart,
  GoalProgressChart,
  HeartRateChart,
  MoodChart,
  SleepExerciseChart,
  WeeklySummaryChart,
  WeightChart,
} from "../components/dashboard/HealthCharts";
import {
  bloodPressureSeries,
  goalProgressBars,
  metricSeries,
  moodSlices,
  sleepExerciseSeries,
  weeklySummaryBars,
  weightSeries,
} from "../lib/chart-data";

const PERIOD_OPTIONS = [7, 30, 90, 365] as const;
type Period = (typeof PERIOD_OPTIONS)[number];

export function DashboardPage() {
  const { user } = useAuth();
  const [days, setDays] = useState<Period>(30);
  const { overview, loading, error, reload } = useDashboard(days);
  const tip = useDailyTip();

  const charts = useMemo(() => {
    if (!overview) return null;
    return {
      weight: weightSeries(overview.series),
      bloodPressure: bloodPressureSeries(overview.series),
      heartRate: metricSeries(overview.series, "heartRate"),
      sleepExercise: sleepExerciseSeries(overview.series),
      moods: moodSlices(overview.moodDistribution),
      weekly: weeklySummaryBars(overview.weekly),
      goals: goalProgressBars(overview.activeGoals),
    };
  }, [overview]);

  return (
    <div className="px-4 pt-6 pb-6 space-y-4">
      <div className="flex items-end justify-between">
        <div>
          <p className="text-slate-400 text-sm">{getGreeting()}</p>
          <h1 className="text-xl font-bold">{user?.name || "Welcome"}</h1>
        </div>
        <select
          value={days}
          onChange={(e) => {
            const next = PERIOD_OPTIONS.find((p) => p === Number(e.target.value));
            if (next) setDays(next);
          }}
          className="bg-slate-800 text-xs text-slate-400 border border-slate-700 rounded-lg px-2 py-1.5 focus:outline-none focus:border-indigo-500"
        >
          {PERIOD_OPTIONS.map((p) => (
            <option key={p} value={p}>
              Last {p} days
            </option>
          ))}
        </select>
      </div>

      {tip.tip && (
        <TipCard
          tip={tip.tip}
          current={tip.current}
          total={tip.total}
          onDismiss={tip.dismiss}
          onNext={tip.next}
        />
      )}

      {loading && !overview && (
        <div className="space-y-4 animate-pulse">
          <div className="bg-slate-800/50 rounded-2xl h-44 border border-slate-700/50" />
          <div className="bg-slate-800/50 rounded-2xl h-32 border border-slate-700/50" />
          <div className="bg-slate-800/50 rounded-2xl h-64 border border-slate-700/50" />
        </div>
      )}

      {error && (
        <div className="text-center py-12">
          <p className="text-red-400 text-sm mb-3">{error}</p>
          <button
            onClick={() => void reload()}
            className="inline-flex items-center gap-1.5 text-sm text-indigo-400 hover:text-indigo-300"
          >
            <RotateCw className="w-4 h-4" />
            Try again
          </button>
        </div>
      )}

      {overview && charts && overview.summary.totalEntries === 0 && (
        <div className="text-center py-16">
          <h2 className="text-lg font-semibold text-white mb-2">No health data yet</h2>
          <p className="text-sm text-slate-400 mb-6">
            Log your first entry to see your dashboard come to life.
          </p>
          <Link
            to="/log"
            className="inline-block px-6 py-3 rounded-xl font-semibold text-white"
            style={{ background: "linear-gradient(135deg, #8b5cf6 0%, #6366f1 100%)" }}
          >
            Log today's metrics
          </Link>
        </div>
      )}

      {overview && charts && overview.summary.totalEntries > 0 && (
        <>
          <HealthScoreCard score={overview.healthScore} entries={overview.summary.totalEntries} />

          {overview.latest && (
            <LatestEntryCard
              entry={overview.latest.entry}
              assessment={overview.latest.assessment}
            />
          )}

          <div className="grid grid-cols-3 gap-2">
            <QuickAction to="/log" icon={<PenLine className="w-4 h-4" />} label="Log entry" />
            <QuickAction to="/insights" icon={<Sparkles className="w-4 h-4" />} label="AI insights" />
            <QuickAction to="/goals" icon={<Target className="w-4 h-4" />} label="Goals" />
          </div>

          <WeightChart data={charts.weight} />
          <BloodPressureChart data={charts.bloodPressure} />
          <HeartRateChart data={charts.heartRate} />
          <SleepExerciseChart data={charts.sleepExercise} />
          <div className="grid gap-4 md:grid-cols-2">
            <MoodChart data={charts.moods} />
            <WeeklySummaryChart data={charts.weekly} />
          </div>
          {charts.goals.length > 0 && <GoalProgressChart data={charts.goals} />}

          <RecentEntries entries={overview.recentEntries} />
        </>
      )}
    </div>
  );
}

function QuickAction({ to, icon, label }: { to: string; icon: ReactNode; label: string }) {
  return (
    <Link
      to={to}
      className="flex flex-col items-center gap-1 py-3 rounded-xl bg-slate-800/50 border border-slate-700/50 text-slate-300 text-xs active:bg-slate-800"
    >
      <span className="text-indigo-400">{icon}</span>
      {label}
    </Link>
  );
}

function getGreeting(): string {
  const hour = new Date().getHours();
  if (hour < 12) return "Good morning";
  if (hour < 18) return "Good afternoon";
  return "Good evening";
}
