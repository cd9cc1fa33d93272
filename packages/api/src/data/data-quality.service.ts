import { Injectable } from "@nestjs/common";
import { daysBetween } from "@vitalog/shared";
import type {
  CompletenessKey,
  DataQualityReport,
  DatabaseStatus,
} from "@vitalog/shared";
import { DatabaseService } from "../database/database.service";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import type { HealthEntryRow } from "../database/schema";
import { quantile, round, valuesOf } from "../common/stats";

const GAP_THRESHOLD_DAYS = 7;
const MAX_REPORTED_GAPS = 5;

/** Share of entries with a value, as a percentage with one decimal. */
export function completeness(
  entries: HealthEntryRow[],
): Record<CompletenessKey, number> {
  const pct = (key: CompletenessKey) =>
    entries.length ? round((valuesOf(entries, key).length / entries.length) * 100, 1) : 0;
  return {
    weightKg: pct("weightKg"),
    heartRate: pct("heartRate"),
    systolic: pct("systolic"),
    sleepHours: pct("sleepHours"),
    exerciseMinutes: pct("exerciseMinutes"),
  };
}

/** Gaps longer than a week between consecutive entries (ascending input). */
export function dateGaps(entries: HealthEntryRow[]): string[] {
  const gaps: string[] = [];
  for (let i = 1; i < entries.length; i++) {
    const prev = entries[i - 1].date;
    const next = entries[i].date;
    const gap = daysBetween(prev, next);
    if (gap > GAP_THRESHOLD_DAYS) {
      gaps.push(`Gap of ${gap} days between ${prev} and ${next}`);
    }
  }
  return gaps.slice(0, MAX_REPORTED_GAPS);
}

/** Weight readings outside the 1.5 x IQR fences. */
export function weightOutliers(entries: HealthEntryRow[]): string[] {
  const weights = valuesOf(entries, "weightKg");
  const q1 = quantile(weights, 0.25);
  const q3 = quantile(weights, 0.75);
  if (q1 == null || q3 == null) return [];

  const iqr = q3 - q1;
  const lower = q1 - 1.5 * iqr;
  const upper = q3 + 1.5 * iqr;
  const count = weights.filter((w) => w < lower || w > upper).length;
  return count ? [`Weight outliers: ${count} records`] : [];
}

@Injectable()
export class DataQualityService {
  constructor(
    private database: DatabaseService,
    private entries: HealthEntriesRepository,
    private goals: GoalsRepository,
    private insights: InsightsRepository,
  ) {}

  async status(userId: string): Promise<DatabaseStatus> {
    if (!(await this.database.ping())) {
      return { connected: false, healthRecords: 0, goals: 0, insights: 0 };
    }
    const [healthRecords, goals, insights] = await Promise.all([
      this.entries.count(userId),
      this.goals.count(userId),
      this.insights.count(userId),
    ]);
    return { connected: true, healthRecords, goals, insights };
  }

  async quality(userId: string): Promise<DataQualityReport> {
    const [entries, goals] = await Promise.all([
      this.entries.findInRange(userId),
      this.goals.findAll(userId),
    ]);

    return {
      totalRecords: entries.length,
      dateRange: entries.length
        ? { start: entries[0].date, end: entries[entries.length - 1].date }
        : null,
      completeness: completeness(entries),
      dateGaps: dateGaps(entries),
      outliers: weightOutliers(entries),
      goals: {
        active: goals.filter((g) => g.status === "active").length,
        completed: goals.filter((g) => g.status === "completed").length,
      },
    };
  }
}
