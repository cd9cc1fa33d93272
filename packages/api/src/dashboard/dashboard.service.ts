import { Injectable } from "@nestjs/common";
import {
  MOODS,
  addDays,
  bloodPressureCategory,
  bmiCategory,
  calculateBmi,
  heartRateCategory,
  todayIso,
} from "@vitalog/shared";
import type {
  DashboardOverview,
  HealthAssessment,
  WeeklyAverages,
} from "@vitalog/shared";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { UsersRepository } from "../database/repositories/users.repository";
import type { HealthEntryRow } from "../database/schema";
import { mean, round, sum, valuesOf } from "../common/stats";
import { summarize, toEntryResponse } from "../metrics/metrics.service";
import { toGoalResponse } from "../goals/goals.service";
import { computeHealthScore, SCORE_WINDOW } from "./health-score";

export function assess(
  entry: HealthEntryRow,
  heightCm: number | null,
): HealthAssessment {
  const bmi = calculateBmi(entry.weightKg, heightCm);
  return {
    bmi,
    bmiCategory: bmiCategory(bmi),
    bloodPressureCategory: bloodPressureCategory(entry.systolic, entry.diastolic),
    heartRateCategory: heartRateCategory(entry.heartRate),
  };
}

export function weeklyAverages(entries: HealthEntryRow[]): WeeklyAverages {
  const week = entries.slice(-SCORE_WINDOW);
  const avg = (values: number[], digits: number) => {
    const m = mean(values);
    return m == null ? null : round(m, digits);
  };
  return {
    weightKg: avg(valuesOf(week, "weightKg"), 1),
    heartRate: avg(valuesOf(week, "heartRate"), 0),
    sleepHours: avg(valuesOf(week, "sleepHours"), 1),
    exerciseTotal: sum(valuesOf(week, "exerciseMinutes")),
  };
}

export function moodDistribution(entries: HealthEntryRow[]) {
  return MOODS.map((mood) => ({
    mood,
    count: entries.filter((e) => e.mood === mood).length,
  })).filter((m) => m.count > 0);
}

@Injectable()
export class DashboardService {
  constructor(
    private entries: HealthEntriesRepository,
    private goals: GoalsRepository,
    private users: UsersRepository,
  ) {}

  async overview(userId: string, days: number): Promise<DashboardOverview> {
    const today = todayIso();
    const [all, user, activeGoals] = await Promise.all([
      this.entries.findInRange(userId),
      this.users.findById(userId),
      this.goals.findAll(userId, "active"),
    ]);

    const from = addDays(today, -days);
    const window = all.filter((e) => e.date >= from);
    const latest = all.length ? all[all.length - 1] : null;

    return {
      days,
      healthScore: computeHealthScore(window),
      summary: summarize(all),
      latest: latest
        ? {
            entry: toEntryResponse(latest),
            assessment: assess(latest, user?.heightCm ?? null),
          }
        : null,
      weekly: weeklyAverages(window),
      moodDistribution: moodDistribution(window),
      series: window.map(toEntryResponse),
      recentEntries: all.slice(-SCORE_WINDOW).reverse().map(toEntryResponse),
      activeGoals: activeGoals.map((g) => toGoalResponse(g, today)),
    };
  }
}
