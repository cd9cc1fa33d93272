import {
  METRIC_CONFIG,
  MOOD_CONFIG,
  type GoalResponse,
  type HealthEntryResponse,
  type MetricKey,
  type Mood,
  type WeeklyAverages,
} from "@vitalog/shared";

const round2 = (v: number) => Math.round(v * 100) / 100;

/**
 * Least-squares fit of `values` against their index. Returns the fitted
 * value for each point, or an empty array when there are fewer than two.
 */
export function linearTrend(values: number[]): number[] {
  const n = values.length;
  if (n < 2) return [];

  const xMean = (n - 1) / 2;
  const yMean = values.reduce((s, v) => s + v, 0) / n;
  let num = 0;
  let den = 0;
  values.forEach((y, x) => {
    num += (x - xMean) * (y - yMean);
    den += (x - xMean) ** 2;
  });
  const slope = num / den;
  const intercept = yMean - slope * xMean;
  return values.map((_, x) => round2(intercept + slope * x));
}

export interface WeightPoint {
  date: string;
  weight: number;
  trend: number | null;
}

export function weightSeries(entries: HealthEntryResponse[]): WeightPoint[] {
  const points = entries.flatMap((e) =>
    e.weightKg === null ? [] : [{ date: e.date, weight: e.weightKg }],
  );
  const trend = linearTrend(points.map((p) => p.weight));
  return points.map((p, i) => ({ ...p, trend: trend[i] ?? null }));
}

export interface BloodPressurePoint {
  date: string;
  systolic: number | null;
  diastolic: number | null;
}

export function bloodPressureSeries(entries: HealthEntryResponse[]): BloodPressurePoint[] {
  return entries
    .filter((e) => e.systolic !== null || e.diastolic !== null)
    .map((e) => ({ date: e.date, systolic: e.systolic, diastolic: e.diastolic }));
}

export interface ValuePoint {
  date: string;
  value: number;
}

export function metricSeries(entries: HealthEntryResponse[], key: MetricKey): ValuePoint[] {
  return entries.flatMap((e) => {
    const value = e[key];
    return value === null ? [] : [{ date: e.date, value }];
  });
}

export interface SleepExercisePoint {
  date: string;
  sleep: number | null;
  exercise: number | null;
}

export function sleepExerciseSeries(entries: HealthEntryResponse[]): SleepExercisePoint[] {
  return entries
    .filter((e) => e.sleepHours !== null || e.exerciseMinutes !== null)
    .map((e) => ({ date: e.date, sleep: e.sleepHours, exercise: e.exerciseMinutes }));
}

export interface MoodSlice {
  mood: Mood;
  name: string;
  value: number;
  color: string;
}

export function moodSlices(distribution: Array<{ mood: Mood; count: number }>): MoodSlice[] {
  return distribution.map(({ mood, count }) => ({
    mood,
    name: MOOD_CONFIG[mood].label,
    value: count,
    color: MOOD_CONFIG[mood].color,
  }));
}

export interface SummaryBar {
  label: string;
  value: number;
  color: string;
}

export function weeklySummaryBars(weekly: WeeklyAverages): SummaryBar[] {
  const bars: SummaryBar[] = [];
  if (weekly.weightKg !== null) {
    bars.push({ label: "Avg Weight", value: weekly.weightKg, color: METRIC_CONFIG.weightKg.color });
  }
  if (weekly.heartRate !== null) {
    bars.push({ label: "Avg Heart Rate", value: weekly.heartRate, color: METRIC_CONFIG.heartRate.color });
  }
  if (weekly.sleepHours !== null) {
    bars.push({ label: "Avg Sleep", value: weekly.sleepHours, color: METRIC_CONFIG.sleepHours.color });
  }
  if (weekly.exerciseTotal > 0) {
    bars.push({
      label: "Weekly Exercise",
      value: weekly.exerciseTotal,
      color: METRIC_CONFIG.exerciseMinutes.color,
    });
  }
  return bars;
}

export interface GoalBar {
  id: string;
  label: string;
  percent: number;
  achieved: boolean;
}

const GOAL_LABEL_MAX = 30;

export function goalProgressBars(goals: GoalResponse[]): GoalBar[] {
  return goals
    .filter((g) => g.status === "active")
    .map((g) => ({
      id: g.id,
      label:
        g.description.length > GOAL_LABEL_MAX
          ? `${g.description.slice(0, GOAL_LABEL_MAX)}...`
          : g.description,
      percent: g.progress.cappedPercent,
      achieved: g.progress.band === "achieved",
    }));
}

export interface MetricStats {
  average: number;
  min: number;
  max: number;
  latest: number;
}

export function metricStats(points: ValuePoint[]): MetricStats | null {
  if (points.length === 0) return null;
  const values = points.map((p) => p.value);
  return {
    average: round2(values.reduce((s, v) => s + v, 0) / values.length),
    min: Math.min(...values),
    max: Math.max(...values),
    latest: values[values.length - 1],
  };
}
