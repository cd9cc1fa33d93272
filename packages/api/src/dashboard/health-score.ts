import type { HealthScore } from "@vitalog/shared";
import type { HealthEntryRow } from "../database/schema";
import { mean, sampleStd, sum, valuesOf } from "../common/stats";

export const SCORE_WINDOW = 7;

/**
 * 0-100 score over the last SCORE_WINDOW entries (oldest first input).
 * Metrics without readings in the window contribute nothing.
 */
export function computeHealthScore(entries: HealthEntryRow[]): HealthScore {
  const recent = entries.slice(-SCORE_WINDOW);
  if (!recent.length) return { score: 0, factors: [] };

  let score = 0;
  const factors: string[] = [];
  const add = (points: number, factor: string) => {
    score += points;
    factors.push(factor);
  };

  const weightStd = sampleStd(valuesOf(recent, "weightKg"));
  if (weightStd != null && weightStd < 1) add(20, "Weight stability");

  const systolic = mean(valuesOf(recent, "systolic"));
  const diastolic = mean(valuesOf(recent, "diastolic"));
  if (systolic != null && diastolic != null) {
    if (systolic < 120 && diastolic < 80) add(25, "Good blood pressure");
    else if (systolic < 140 && diastolic < 90) add(15, "Acceptable blood pressure");
  }

  const heartRate = mean(valuesOf(recent, "heartRate"));
  if (heartRate != null && heartRate >= 60 && heartRate <= 100) {
    add(20, "Normal heart rate");
  }

  const sleep = mean(valuesOf(recent, "sleepHours"));
  if (sleep != null) {
    if (sleep >= 7 && sleep <= 9) add(20, "Adequate sleep");
    else if (sleep >= 6 && sleep <= 10) add(10, "Reasonable sleep");
  }

  // WHO: 150 minutes a week
  const exercise = sum(valuesOf(recent, "exerciseMinutes"));
  if (exercise >= 150) add(15, "Sufficient exercise");
  else if (exercise >= 75) add(10, "Some exercise");

  return { score: Math.min(score, 100), factors };
}
