import type { MetricKey } from "@vitalog/shared";

/** CSV column for each metric, matching the health_data.csv layout. */
export const METRIC_CSV_COLUMNS: Record<MetricKey, string> = {
  weightKg: "weight",
  systolic: "blood_pressure_systolic",
  diastolic: "blood_pressure_diastolic",
  heartRate: "heart_rate",
  sleepHours: "sleep_hours",
  exerciseMinutes: "exercise_minutes",
};

/** Alternative header spellings accepted on import. */
export const METRIC_HEADER_ALIASES: Record<string, MetricKey> = {
  weight_kg: "weightKg",
  systolic: "systolic",
  diastolic: "diastolic",
  heart_rate_bpm: "heartRate",
  sleep: "sleepHours",
  exercise: "exerciseMinutes",
};

export const GOAL_CSV_COLUMNS = [
  "goal_type",
  "description",
  "target_value",
  "current_value",
  "target_date",
  "status",
  "created_date",
  "completed_at",
] as const;

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase().replace(/[\s-]+/g, "_");
}
