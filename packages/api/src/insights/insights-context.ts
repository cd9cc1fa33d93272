import type { GoalType, MetricKey, Mood } from "@vitalog/shared";
import type { GoalRow, HealthEntryRow } from "../database/schema";
import { mean, round, valuesOf } from "../common/stats";

/** Metric names as the model sees them. */
const CONTEXT_METRICS: Array<[MetricKey, string]> = [
  ["weightKg", "weight"],
  ["systolic", "blood_pressure_systolic"],
  ["diastolic", "blood_pressure_diastolic"],
  ["heartRate", "heart_rate"],
  ["sleepHours", "sleep_hours"],
  ["exerciseMinutes", "exercise_minutes"],
];

const LOWER_IS_BETTER = new Set<MetricKey>(["weightKg", "systolic", "diastolic"]);

const RECENT_ENTRIES = 7;
const TREND_VALUES = 10;

export interface MetricAverages {
  recent: number;
  overall: number;
  trend: "improving" | "stable";
}

export interface DataSummary {
  total_entries: number;
  date_range: string;
  recent_averages: Record<string, MetricAverages>;
  recent_mood_pattern: Partial<Record<Mood, number>>;
}

export interface MetricTrendData {
  values: number[];
  change_percentage: number;
  current_value: number;
  min_value: number;
  max_value: number;
}

export interface GoalsSummary {
  active_goals: number;
  completed_goals: number;
  goal_types: GoalType[];
  recent_goals: Array<{
    goal_type: GoalType;
    target_value: number;
    current_value: number;
    description: string;
  }>;
}

/** Entries must be in ascending date order. */
export function buildDataSummary(entries: HealthEntryRow[]): DataSummary | null {
  if (!entries.length) return null;
  const recent = entries.slice(-RECENT_ENTRIES);

  const averages: Record<string, MetricAverages> = {};
  for (const [key, name] of CONTEXT_METRICS) {
    const recentAvg = mean(valuesOf(recent, key));
    const overallAvg = mean(valuesOf(entries, key));
    if (recentAvg == null || overallAvg == null) continue;
    averages[name] = {
      recent: round(recentAvg),
      overall: round(overallAvg),
      trend:
        recentAvg < overallAvg && LOWER_IS_BETTER.has(key) ? "improving" : "stable",
    };
  }

  const moods: Partial<Record<Mood, number>> = {};
  for (const mood of valuesOf(recent, "mood")) {
    moods[mood] = (moods[mood] ?? 0) + 1;
  }

  return {
    total_entries: entries.length,
    date_range: `${entries[0].date} to ${entries[entries.length - 1].date}`,
    recent_averages: averages,
    recent_mood_pattern: moods,
  };
}

/** First-half vs second-half change for every metric with two or more readings. */
export function buildTrendData(
  entries: HealthEntryRow[],
): Record<string, MetricTrendData> {
  const trends: Record<string, MetricTrendData> = {};
  for (const [key, name] of CONTEXT_METRICS) {
    const values = valuesOf(entries, key);
    if (values.length < 2) continue;

    const half = Math.floor(values.length / 2);
    const first = mean(values.slice(0, half)) ?? 0;
    const second = mean(values.slice(half)) ?? 0;
    const change = first !== 0 ? ((second - first) / first) * 100 : 0;

    trends[name] = {
      values: values.slice(-TREND_VALUES),
      change_percentage: round(change),
      current_value: values[values.length - 1],
      min_value: Math.min(...values),
      max_value: Math.max(...values),
    };
  }
  return trends;
}

export function buildGoalsSummary(goals: GoalRow[]): GoalsSummary | null {
  if (!goals.length) return null;
  const active = goals.filter((g) => g.status === "active");
  return {
    active_goals: active.length,
    completed_goals: goals.filter((g) => g.status === "completed").length,
    goal_types: active.map((g) => g.type),
    recent_goals: active.map((g) => ({
      goal_type: g.type,
      target_value: g.targetValue,
      current_value: g.currentValue,
      description: g.description,
    })),
  };
}
