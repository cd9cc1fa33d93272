import { z } from "zod";
import { isValidIsoDate } from "../dates";
import {
  GOAL_STATUSES,
  GOAL_TYPES,
  METRIC_CONFIG,
  MOODS,
} from "../metric-types";
import type {
  GoalStatus,
  GoalType,
  MetricKey,
  Mood,
} from "../metric-types";

export const isoDate = z
  .string()
  .refine(isValidIsoDate, "Date must be a valid YYYY-MM-DD date");

function metricField(key: MetricKey) {
  const cfg = METRIC_CONFIG[key];
  const base = cfg.integer
    ? z.number().int(`${cfg.label} must be a whole number`)
    : z.number();
  return base
    .refine(
      (v) => (cfg.minInclusive ? v >= cfg.min : v > cfg.min) && v <= cfg.max,
      cfg.rangeMessage,
    )
    .nullable()
    .optional();
}

const optionalText = (max: number) =>
  z
    .string()
    .max(max)
    .transform((s) => s.trim() || null)
    .nullable()
    .optional();

// Auth DTOs
export const registerDto = z.object({
  email: z.string().email(),
  password: z.string().min(8),
  name: z.string().trim().max(100).optional(),
});

export const loginDto = z.object({
  email: z.string().email(),
  password: z.string(),
});

export const refreshDto = z.object({
  refreshToken: z.string(),
});

export const changePasswordDto = z.object({
  oldPassword: z.string(),
  newPassword: z.string().min(8),
});

// User DTOs
export const updateUserDto = z.object({
  name: z.string().trim().max(100).optional(),
  heightCm: z
    .number()
    .min(50, "Height must be between 50 and 272 cm")
    .max(272, "Height must be between 50 and 272 cm")
    .nullable()
    .optional(),
});

export const deleteAccountDto = z.object({
  password: z.string().min(1),
});

// Health entry DTOs
const entryFields = {
  weightKg: metricField("weightKg"),
  systolic: metricField("systolic"),
  diastolic: metricField("diastolic"),
  heartRate: metricField("heartRate"),
  sleepHours: metricField("sleepHours"),
  exerciseMinutes: metricField("exerciseMinutes"),
  mood: z.enum(MOODS).nullable().optional(),
  symptoms: optionalText(1000),
  notes: optionalText(2000),
};

export const healthEntryDto = z.object({
  date: isoDate,
  ...entryFields,
});

export const updateHealthEntryDto = z.object(entryFields);

export const metricsQueryDto = z
  .object({
    days: z.coerce.number().int().min(1).max(3650).optional(),
    from: isoDate.optional(),
    to: isoDate.optional(),
  })
  .refine((q) => !q.from || !q.to || q.from <= q.to, {
    message: "from must not be after to",
    path: ["from"],
  });

// Goal DTOs
export const createGoalDto = z.object({
  type: z.enum(GOAL_TYPES),
  description: z
    .string()
    .trim()
    .min(1, "Please provide a goal description.")
    .max(200),
  targetValue: z.number().positive("Target value must be greater than 0."),
  currentValue: z.number().min(0).default(0),
  targetDate: isoDate,
});

export const goalQueryDto = z.object({
  status: z.enum(GOAL_STATUSES).optional(),
});

export const updateGoalProgressDto = z.object({
  currentValue: z.number().min(0),
});

export const updateGoalStatusDto = z.object({
  status: z.enum(["active", "paused"]),
});

export const extendGoalDto = z.object({
  targetDate: isoDate,
});

// Dashboard DTOs
export const dashboardQueryDto = z.object({
  days: z.coerce.number().int().min(7).max(365).default(30),
});

// Inferred types
export type RegisterDto = z.infer<typeof registerDto>;
export type LoginDto = z.infer<typeof loginDto>;
export type RefreshDto = z.infer<typeof refreshDto>;
export type ChangePasswordDto = z.infer<typeof changePasswordDto>;
export type UpdateUserDto = z.infer<typeof updateUserDto>;
export type DeleteAccountDto = z.infer<typeof deleteAccountDto>;
export type HealthEntryDto = z.infer<typeof healthEntryDto>;
export type UpdateHealthEntryDto = z.infer<typeof updateHealthEntryDto>;
export type MetricsQueryDto = z.infer<typeof metricsQueryDto>;
export type CreateGoalDto = z.infer<typeof createGoalDto>;
export type GoalQueryDto = z.infer<typeof goalQueryDto>;
export type UpdateGoalProgressDto = z.infer<typeof updateGoalProgressDto>;
export type UpdateGoalStatusDto = z.infer<typeof updateGoalStatusDto>;
export type ExtendGoalDto = z.infer<typeof extendGoalDto>;
export type DashboardQueryDto = z.infer<typeof dashboardQueryDto>;

// Response types
export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
}

export interface UserResponse {
  id: string;
  email: string;
  name: string | null;
  heightCm: number | null;
  createdAt: string;
}

export interface HealthEntryResponse {
  id: string;
  date: string;
  weightKg: number | null;
  systolic: number | null;
  diastolic: number | null;
  heartRate: number | null;
  sleepHours: number | null;
  exerciseMinutes: number | null;
  mood: Mood | null;
  symptoms: string | null;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SaveEntryResponse {
  entry: HealthEntryResponse;
  created: boolean;
  feedback: string[];
}

export interface HealthSummary {
  totalEntries: number;
  averages: Record<MetricKey, number | null>;
  dateRange: { start: string; end: string } | null;
}

export type ProgressBand =
  | "achieved"
  | "almost_there"
  | "halfway"
  | "making_progress"
  | "get_started";

export interface GoalProgress {
  percent: number;
  cappedPercent: number;
  daysLeft: number;
  band: ProgressBand;
  message: string;
}

export interface GoalResponse {
  id: string;
  type: GoalType;
  description: string;
  targetValue: number;
  currentValue: number;
  targetDate: string;
  status: GoalStatus;
  createdDate: string;
  completedAt: string | null;
  createdAt: string;
  updatedAt: string;
  progress: GoalProgress;
}

export interface GoalStats {
  total: number;
  active: number;
  paused: number;
  completed: number;
  mostCommonCompletedType: GoalType | null;
}

export interface HealthScore {
  score: number;
  factors: string[];
}

export interface HealthAssessment {
  bmi: number | null;
  bmiCategory: string;
  bloodPressureCategory: string;
  heartRateCategory: string;
}

export interface WeeklyAverages {
  weightKg: number | null;
  heartRate: number | null;
  sleepHours: number | null;
  exerciseTotal: number;
}

export interface DashboardOverview {
  days: number;
  healthScore: HealthScore;
  summary: HealthSummary;
  latest: { entry: HealthEntryResponse; assessment: HealthAssessment } | null;
  weekly: WeeklyAverages;
  moodDistribution: Array<{ mood: Mood; count: number }>;
  series: HealthEntryResponse[];
  recentEntries: HealthEntryResponse[];
  activeGoals: GoalResponse[];
}

export type TipCategory =
  | "exercise"
  | "sleep"
  | "mood"
  | "blood_pressure"
  | "general"
  | "insight";

export interface HealthTip {
  text: string;
  category: TipCategory;
  source: "insight" | "heuristic" | "default";
}

export * from "./insights.dto";
export * from "./data.dto";
