import { buildDataSummary, buildGoalsSummary, buildTrendData } from "./insights-context";
import { entrySeries, goalRow } from "../testing/fixtures";

const entries = entrySeries("2025-01-01", [
  { weightKg: 84, sleepHours: 6 },
  { weightKg: 84, heartRate: 70 },
  { weightKg: 80 },
  { weightKg: 80 },
  { weightKg: 80 },
  { weightKg: 80, mood: "poor" },
  { weightKg: 80, mood: "good" },
  { weightKg: 80, heartRate: 70, mood: "good" },
]);

describe("buildDataSummary", () => {
  it("returns null without entries", () => {
    expect(buildDataSummary([])).toBeNull();
  });

  it("compares the last seven entries with the whole period", () => {
    expect(buildDataSummary(entries)).toEqual({
      total_entries: 8,
      date_range: "2025-01-01 to 2025-01-08",
      recent_averages: {
        weight: { recent: 80.57, overall: 81, trend: "improving" },
        heart_rate: { recent: 70, overall: 70, trend: "stable" },
      },
      recent_mood_pattern: { poor: 1, good: 2 },
    });
  });
});

describe("buildTrendData", () => {
  it("reports half-over-half change for metrics with two or more readings", () => {
    expect(buildTrendData(entries)).toEqual({
      weight: {
        values: [84, 84, 80, 80, 80, 80, 80, 80],
        change_percentage: -2.44,
        current_value: 80,
        min_value: 80,
        max_value: 84,
      },
      heart_rate: {
        values: [70, 70],
        change_percentage: 0,
        current_value: 70,
        min_value: 70,
        max_value: 70,
      },
    });
  });

  it("keeps only the last ten values and avoids dividing by zero", () => {
    const days = entrySeries(
      "2025-01-01",
      Array.from({ length: 12 }, (_, i) => ({ exerciseMinutes: i < 6 ? 0 : 30 })),
    );

    const trend = buildTrendData(days).exercise_minutes;

    expect(trend?.values).toHaveLength(10);
    expect(trend?.change_percentage).toBe(0);
  });
});

describe("buildGoalsSummary", () => {
  it("returns null without goals", () => {
    expect(buildGoalsSummary([])).toBeNull();
  });

  it("lists active goals and counts completed ones", () => {
    const goals = [
      goalRow({
        type: "sleep",
        description: "Sleep 8 hours",
        targetValue: 8,
        currentValue: 7,
      }),
      goalRow({ id: "goal-2", status: "completed" }),
      goalRow({ id: "goal-3", status: "paused" }),
    ];

    expect(buildGoalsSummary(goals)).toEqual({
      active_goals: 1,
      completed_goals: 1,
      goal_types: ["sleep"],
      recent_goals: [
        {
          goal_type: "sleep",
          target_value: 8,
          current_value: 7,
          description: "Sleep 8 hours",
        },
      ],
    });
  });
});
