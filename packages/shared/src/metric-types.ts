export const MOODS = [
  "excellent",
  "good",
  "average",
  "poor",
  "very_poor",
] as const;

export type Mood = (typeof MOODS)[number];

export const MOOD_CONFIG: Record<
  Mood,
  { label: string; emoji: string; color: string; score: number }
> = {
  excellent: { label: "Excellent", emoji: "😊", color: "#10B981", score: 5 },
  good: { label: "Good", emoji: "🙂", color: "#84CC16", score: 4 },
  average: { label: "Average", emoji: "😐", color: "#F59E0B", score: 3 },
  poor: { label: "Poor", emoji: "😔", color: "#F97316", score: 2 },
  very_poor: { label: "Very Poor", emoji: "😢", color: "#EF4444", score: 1 },
};

/** Numeric columns of a health entry, in display order. */
export const METRIC_KEYS = [
  "weightKg",
  "systolic",
  "diastolic",
  "heartRate",
  "sleepHours",
  "exerciseMinutes",
] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

export interface MetricConfig {
  label: string;
  unit: string;
  color: string;
  min: number;
  /** Whether `min` itself is accepted. Weight must be strictly positive. */
  minInclusive: boolean;
  max: number;
  integer: boolean;
  rangeMessage: string;
}

export const METRIC_CONFIG: Record<MetricKey, MetricConfig> = {
  weightKg: {
    label: "Weight",
    unit: "kg",
    color: "#6366F1",
    min: 0,
    minInclusive: false,
    max: 500,
    integer: false,
    rangeMessage: "Weight must be between 1 and 500 kg",
  },
  systolic: {
    label: "Systolic BP",
    unit: "mmHg",
    color: "#EF4444",
    min: 70,
    minInclusive: true,
    max: 300,
    integer: true,
    rangeMessage: "Systolic blood pressure must be between 70 and 300 mmHg",
  },
  diastolic: {
    label: "Diastolic BP",
    unit: "mmHg",
    color: "#F97316",
    min: 40,
    minInclusive: true,
    max: 200,
    integer: true,
    rangeMessage: "Diastolic blood pressure must be between 40 and 200 mmHg",
  },
  heartRate: {
    label: "Heart Rate",
    unit: "bpm",
    color: "#EC4899",
    min: 30,
    minInclusive: true,
    max: 220,
    integer: true,
    rangeMessage: "Heart rate must be between 30 and 220 bpm",
  },
  sleepHours: {
    label: "Sleep",
    unit: "hours",
    color: "#8B5CF6",
    min: 0,
    minInclusive: true,
    max: 24,
    integer: false,
    rangeMessage: "Sleep hours must be between 0 and 24",
  },
  exerciseMinutes: {
    label: "Exercise",
    unit: "min",
    color: "#10B981",
    min: 0,
    minInclusive: true,
    max: 1440,
    integer: true,
    rangeMessage: "Exercise minutes must be between 0 and 1440 (24 hours)",
  },
};

export const GOAL_TYPES = [
  "weight_loss",
  "weight_gain",
  "exercise",
  "sleep",
  "heart_rate",
  "blood_pressure",
  "general",
] as const;

export type GoalType = (typeof GOAL_TYPES)[number];

export const GOAL_TYPE_CONFIG: Record<
  GoalType,
  { label: string; icon: string; tip: string | null }
> = {
  weight_loss: {
    label: "Weight Loss",
    icon: "⚖️",
    tip: "A healthy weight loss rate is 0.5-1kg per week. Set realistic targets!",
  },
  weight_gain: { label: "Weight Gain", icon: "🏋️", tip: null },
  exercise: {
    label: "Exercise Minutes",
    icon: "🏃",
    tip: "WHO recommends at least 150 minutes of moderate exercise per week.",
  },
  sleep: {
    label: "Sleep Hours",
    icon: "😴",
    tip: "Most adults need 7-9 hours of sleep per night for optimal health.",
  },
  heart_rate: {
    label: "Heart Rate",
    icon: "❤️",
    tip: "Lower resting heart rate often indicates better cardiovascular fitness.",
  },
  blood_pressure: { label: "Blood Pressure", icon: "🩺", tip: null },
  general: { label: "General Health", icon: "🌱", tip: null },
};

export const GOAL_STATUSES = ["active", "paused", "completed"] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

export const INSIGHT_TYPES = [
  "assessment",
  "trend_analysis",
  "goal_suggestions",
] as const;

export type InsightType = (typeof INSIGHT_TYPES)[number];

export const INSIGHT_TYPE_LABELS: Record<InsightType, string> = {
  assessment: "Health Assessment",
  trend_analysis: "Trend Analysis",
  goal_suggestions: "Goal Suggestions",
};

export const INSIGHT_PERIODS = [7, 14, 30, 90] as const;

export type MetricTipTopic =
  | "weight"
  | "blood_pressure"
  | "heart_rate"
  | "sleep"
  | "exercise"
  | "mood";

export const METRIC_TIPS: Record<MetricTipTopic, { title: string; text: string }> = {
  weight: {
    title: "Weight Management Tip",
    text: "Track your weight at the same time each day, preferably in the morning after using the bathroom.",
  },
  blood_pressure: {
    title: "Blood Pressure Tip",
    text: "Take measurements at the same time daily, avoid caffeine 30 minutes before, and rest for 5 minutes beforehand.",
  },
  heart_rate: {
    title: "Heart Rate Tip",
    text: "Resting heart rate is best measured first thing in the morning. Lower resting heart rate often indicates better fitness.",
  },
  sleep: {
    title: "Sleep Tip",
    text: "Aim for 7-9 hours of quality sleep. Maintain consistent sleep and wake times, even on weekends.",
  },
  exercise: {
    title: "Exercise Tip",
    text: "WHO recommends at least 150 minutes of moderate-intensity exercise per week. Start small and gradually increase.",
  },
  mood: {
    title: "Mood Tip",
    text: "Regular exercise, adequate sleep, and social connections significantly impact mood and mental health.",
  },
};
