import { z } from "zod";
import { INSIGHT_TYPES } from "../metric-types";
import type { GoalType, InsightType } from "../metric-types";

// Request DTOs
export const insightRequestDto = z.object({
  days: z
    .union([z.literal(7), z.literal(14), z.literal(30), z.literal(90)])
    .default(30),
  refresh: z.boolean().default(false),
});

export const insightHistoryQueryDto = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
  type: z.enum(INSIGHT_TYPES).optional(),
});

export const latestInsightQueryDto = z.object({
  type: z.enum(INSIGHT_TYPES).default("assessment"),
});

export type InsightRequestDto = z.infer<typeof insightRequestDto>;
export type InsightHistoryQueryDto = z.infer<typeof insightHistoryQueryDto>;
export type LatestInsightQueryDto = z.infer<typeof latestInsightQueryDto>;

// Response types (from AI)

export interface HealthAssessmentContent {
  overall_health: string;
  recommendations: string[];
  trends: string[];
  risk_factors: string[];
  positive_aspects: string[];
  areas_for_improvement: string[];
}

export const TREND_DIRECTIONS = ["increasing", "decreasing", "stable"] as const;
export const SIGNIFICANCE_LEVELS = ["high", "medium", "low"] as const;

export type TrendDirection = (typeof TREND_DIRECTIONS)[number];
export type Significance = (typeof SIGNIFICANCE_LEVELS)[number];

export interface MetricTrend {
  metric: string;
  trend: TrendDirection;
  significance: Significance;
  description: string;
}

export interface HealthPattern {
  pattern: string;
  correlation: string;
  recommendation: string;
}

export interface TrendAnalysisContent {
  trends: MetricTrend[];
  patterns: HealthPattern[];
}

export interface SuggestedGoal {
  goal_type: GoalType;
  description: string;
  target_value: number;
  timeframe_days: number;
  rationale: string;
}

export interface GoalSuggestionsContent {
  recommended_goals: SuggestedGoal[];
}

export interface InsightContentMap {
  assessment: HealthAssessmentContent;
  trend_analysis: TrendAnalysisContent;
  goal_suggestions: GoalSuggestionsContent;
}

export interface InsightRecordBase {
  /** null when the result was not persisted (no data to analyse). */
  id: string | null;
  summary: string;
  periodStart: string;
  periodEnd: string;
  entryCount: number;
  stale: boolean;
  cached: boolean;
  createdAt: string;
}

export type InsightRecord = {
  [K in InsightType]: InsightRecordBase & {
    type: K;
    content: InsightContentMap[K];
  };
}[InsightType];

export type InsightRecordOf<K extends InsightType> = Extract<
  InsightRecord,
  { type: K }
>;

export interface InsightHistoryItem {
  id: string;
  type: InsightType;
  periodStart: string;
  periodEnd: string;
  createdAt: string;
  summary: string;
  entryCount: number;
  stale: boolean;
}
