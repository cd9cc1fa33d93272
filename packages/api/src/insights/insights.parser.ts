import {
  GOAL_TYPES,
  SIGNIFICANCE_LEVELS,
  TREND_DIRECTIONS,
} from "@vitalog/shared";
import type {
  GoalSuggestionsContent,
  HealthAssessmentContent,
  HealthPattern,
  MetricTrend,
  SuggestedGoal,
  TrendAnalysisContent,
} from "@vitalog/shared";
import { AiResponseError } from "./insights.errors";

type JsonObject = Record<string, unknown>;

export const MAX_SUGGESTED_GOALS = 5;
const DEFAULT_TIMEFRAME_DAYS = 30;

function isObject(val: unknown): val is JsonObject {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

/** Parses model output, tolerating a surrounding markdown code fence. */
export function parseModelJson(raw: string): JsonObject {
  let text = raw.trim();
  if (text.startsWith("```")) {
    text = text.split("\n").slice(1).join("\n");
    if (text.endsWith("```")) text = text.slice(0, -3);
    text = text.trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new AiResponseError("Model response is not valid JSON");
  }
  if (!isObject(parsed)) {
    throw new AiResponseError("Model response is not a JSON object");
  }
  return parsed;
}

export function validateEnum<T extends string>(
  val: unknown,
  allowed: readonly T[],
  fallback: T,
): T {
  return allowed.find((a) => a === val) ?? fallback;
}

function toText(val: unknown): string {
  if (typeof val === "string") return val.trim();
  if (typeof val === "number" || typeof val === "boolean") return String(val);
  return "";
}

function toNumber(val: unknown): number | null {
  if (typeof val === "number") return Number.isFinite(val) ? val : null;
  if (typeof val === "string") {
    const n = parseFloat(val);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function stringList(val: unknown): string[] {
  if (typeof val === "string") return val.trim() ? [val.trim()] : [];
  if (!Array.isArray(val)) return [];
  return val.map(toText).filter((s) => s !== "");
}

function validateArray<T>(
  val: unknown,
  sanitize: (item: JsonObject) => T | null,
): T[] {
  if (!Array.isArray(val)) return [];
  const out: T[] = [];
  for (const item of val) {
    if (!isObject(item)) continue;
    const clean = sanitize(item);
    if (clean) out.push(clean);
  }
  return out;
}

export function sanitizeAssessment(data: unknown): HealthAssessmentContent {
  if (!isObject(data)) throw new AiResponseError("Assessment is not an object");
  return {
    overall_health: toText(data.overall_health) || "No assessment available",
    recommendations: stringList(data.recommendations),
    trends: stringList(data.trends),
    risk_factors: stringList(data.risk_factors),
    positive_aspects: stringList(data.positive_aspects),
    areas_for_improvement: stringList(data.areas_for_improvement),
  };
}

export function sanitizeTrendAnalysis(data: unknown): TrendAnalysisContent {
  if (!isObject(data)) throw new AiResponseError("Trend analysis is not an object");
  return {
    trends: validateArray<MetricTrend>(data.trends, (t) => {
      const metric = toText(t.metric);
      if (!metric) return null;
      return {
        metric,
        trend: validateEnum(t.trend, TREND_DIRECTIONS, "stable"),
        significance: validateEnum(t.significance, SIGNIFICANCE_LEVELS, "low"),
        description: toText(t.description),
      };
    }),
    patterns: validateArray<HealthPattern>(data.patterns, (p) => {
      const pattern = toText(p.pattern);
      if (!pattern) return null;
      return {
        pattern,
        correlation: toText(p.correlation),
        recommendation: toText(p.recommendation),
      };
    }),
  };
}

export function sanitizeGoalSuggestions(data: unknown): GoalSuggestionsContent {
  if (!isObject(data)) throw new AiResponseError("Goal suggestions are not an object");
  const goals = validateArray<SuggestedGoal>(data.recommended_goals, (g) => {
    const description = toText(g.description);
    const target = toNumber(g.target_value);
    if (!description || target == null || target <= 0) return null;
    const timeframe = toNumber(g.timeframe_days ?? g.timeframe);
    return {
      goal_type: validateEnum(g.goal_type, GOAL_TYPES, "general"),
      description,
      target_value: target,
      timeframe_days:
        timeframe != null && timeframe >= 1
          ? Math.min(Math.round(timeframe), 365)
          : DEFAULT_TIMEFRAME_DAYS,
      rationale: toText(g.rationale),
    };
  });
  return { recommended_goals: goals.slice(0, MAX_SUGGESTED_GOALS) };
}
