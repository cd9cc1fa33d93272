import { z } from "zod";
import type { MetricKey } from "../metric-types";

export const EXPORT_FORMATS = ["csv", "xlsx"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const exportMetricsQueryDto = z.object({
  format: z.enum(EXPORT_FORMATS).default("csv"),
  days: z.coerce.number().int().min(1).max(3650).default(365),
});

export const exportGoalsQueryDto = z.object({
  format: z.enum(EXPORT_FORMATS).default("csv"),
});

export type ExportMetricsQueryDto = z.infer<typeof exportMetricsQueryDto>;
export type ExportGoalsQueryDto = z.infer<typeof exportGoalsQueryDto>;

export interface ImportResult {
  imported: number;
  updated: number;
  skipped: number;
  errors: string[];
}

export type CompletenessKey = Extract<
  MetricKey,
  "weightKg" | "heartRate" | "systolic" | "sleepHours" | "exerciseMinutes"
>;

export interface DataQualityReport {
  totalRecords: number;
  dateRange: { start: string; end: string } | null;
  completeness: Record<CompletenessKey, number>;
  dateGaps: string[];
  outliers: string[];
  goals: { active: number; completed: number };
}

export interface DatabaseStatus {
  connected: boolean;
  healthRecords: number;
  goals: number;
  insights: number;
}
