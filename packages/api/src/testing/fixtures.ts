import type {
  GoalRow,
  HealthEntryRow,
  HealthInsightRow,
  UserRow,
} from "../database/schema";

const STAMP = new Date("2025-01-01T08:00:00.000Z");

export function entryRow(overrides: Partial<HealthEntryRow> = {}): HealthEntryRow {
  return {
    id: "entry-1",
    userId: "user-1",
    date: "2025-01-01",
    weightKg: null,
    systolic: null,
    diastolic: null,
    heartRate: null,
    sleepHours: null,
    exerciseMinutes: null,
    mood: null,
    symptoms: null,
    notes: null,
    createdAt: STAMP,
    updatedAt: STAMP,
    ...overrides,
  };
}

/** One entry per consecutive day starting at `start`. */
export function entrySeries(
  start: string,
  values: Array<Partial<HealthEntryRow>>,
): HealthEntryRow[] {
  const first = Date.parse(`${start}T00:00:00Z`);
  return values.map((v, i) =>
    entryRow({
      id: `entry-${i + 1}`,
      date: new Date(first + i * 86_400_000).toISOString().slice(0, 10),
      ...v,
    }),
  );
}

export function goalRow(overrides: Partial<GoalRow> = {}): GoalRow {
  return {
    id: "goal-1",
    userId: "user-1",
    type: "exercise",
    description: "Exercise 150 minutes a week",
    targetValue: 150,
    currentValue: 0,
    targetDate: "2025-02-01",
    status: "active",
    createdDate: "2025-01-01",
    completedAt: null,
    createdAt: STAMP,
    updatedAt: STAMP,
    ...overrides,
  };
}

export function userRow(overrides: Partial<UserRow> = {}): UserRow {
  return {
    id: "user-1",
    email: "test@example.com",
    passwordHash: "not-a-real-hash",
    name: "Test User",
    heightCm: null,
    createdAt: STAMP,
    updatedAt: STAMP,
    ...overrides,
  };
}

export function insightRow(
  overrides: Partial<HealthInsightRow> = {},
): HealthInsightRow {
  return {
    id: "insight-1",
    userId: "user-1",
    type: "assessment",
    content: {
      overall_health: "Generally healthy",
      recommendations: ["Walk daily"],
      trends: [],
      risk_factors: [],
      positive_aspects: [],
      areas_for_improvement: [],
    },
    summary: "Generally healthy",
    periodStart: "2025-01-01",
    periodEnd: "2025-01-31",
    entryCount: 12,
    stale: false,
    createdAt: STAMP,
    ...overrides,
  };
}
