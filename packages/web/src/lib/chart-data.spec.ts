import type { GoalResponse, HealthEntryResponse } from "@vitalog/shared";
import {
  bloodPressureSeries,
  goalProgressBars,
  linearTrend,
  metricSeries,
  metricStats,
  moodSlices,
  weeklySummaryBars,
  weightSeries,
} from "./chart-data";
import { formatBloodPressure, formatMetric, parseNumberInput } from "./format";

function entry(date: string, overrides: Partial<HealthEntryResponse> = {}): HealthEntryResponse {
  return {
    id: `entry-${date}`,
    date,
    weightKg: null,
    systolic: null,
    diastolic: null,
    heartRate: null,
    sleepHours: null,
    exerciseMinutes: null,
    mood: null,
    symptoms: null,
    notes: null,
    createdAt: `${date}T08:00:00.000Z`,
    updatedAt: `${date}T08:00:00.000Z`,
    ...overrides,
  };
}

function goal(overrides: Partial<GoalResponse> = {}): GoalResponse {
  return {
    id: "goal-1",
    type: "exercise",
    description: "Walk more",
    targetValue: 150,
    currentValue: 75,
    targetDate: "2025-03-01",
    status: "active",
    createdDate: "2025-01-01",
    completedAt: null,
    createdAt: "2025-01-01T08:00:00.000Z",
    updatedAt: "2025-01-01T08:00:00.000Z",
    progress: {
      percent: 50,
      cappedPercent: 50,
      daysLeft: 30,
      band: "halfway",
      message: "📈 Good progress! You're halfway to your goal.",
    },
    ...overrides,
  };
}

describe("linearTrend", () => {
  it("fits a least-squares line through the points", () => {
    expect(linearTrend([70, 71, 70, 69])).toEqual([70.6, 70.2, 69.8, 69.4]);
  });

  it("reproduces a perfectly linear series", () => {
    expect(linearTrend([1, 2, 3])).toEqual([1, 2, 3]);
  });

  it("returns nothing for fewer than two points", () => {
    expect(linearTrend([72])).toEqual([]);
    expect(linearTrend([])).toEqual([]);
  });
});

describe("series builders", () => {
  const entries = [
    entry("2025-01-01", { weightKg: 70, systolic: 118, diastolic: 76 }),
    entry("2025-01-02", { heartRate: 64 }),
    entry("2025-01-03", { weightKg: 72, diastolic: 80 }),
  ];

  it("skips days without a weight and attaches the trend", () => {
    expect(weightSeries(entries)).toEqual([
      { date: "2025-01-01", weight: 70, trend: 70 },
      { date: "2025-01-03", weight: 72, trend: 72 },
    ]);
  });

  it("leaves the trend empty for a single weight", () => {
    expect(weightSeries([entry("2025-01-01", { weightKg: 70 })])).toEqual([
      { date: "2025-01-01", weight: 70, trend: null },
    ]);
  });

  it("keeps days with either blood pressure reading", () => {
    expect(bloodPressureSeries(entries)).toEqual([
      { date: "2025-01-01", systolic: 118, diastolic: 76 },
      { date: "2025-01-03", systolic: null, diastolic: 80 },
    ]);
  });

  it("extracts a single metric", () => {
    expect(metricSeries(entries, "heartRate")).toEqual([{ date: "2025-01-02", value: 64 }]);
  });
});

describe("metricStats", () => {
  it("summarises the values in order", () => {
    expect(
      metricStats([
        { date: "2025-01-01", value: 7 },
        { date: "2025-01-02", value: 6.5 },
        { date: "2025-01-03", value: 8 },
      ]),
    ).toEqual({ average: 7.17, min: 6.5, max: 8, latest: 8 });
  });

  it("is null without values", () => {
    expect(metricStats([])).toBeNull();
  });
});

describe("moodSlices", () => {
  it("labels and colours each mood", () => {
    expect(moodSlices([{ mood: "good", count: 3 }])).toEqual([
      { mood: "good", name: "Good", value: 3, color: "#84CC16" },
    ]);
  });
});

describe("weeklySummaryBars", () => {
  it("omits metrics with no recent values", () => {
    expect(
      weeklySummaryBars({ weightKg: null, heartRate: 68, sleepHours: null, exerciseTotal: 0 }),
    ).toEqual([{ label: "Avg Heart Rate", value: 68, color: "#EC4899" }]);
  });
});

describe("goalProgressBars", () => {
  it("shortens long descriptions and ignores inactive goals", () => {
    const bars = goalProgressBars([
      goal({ description: "Walk at least thirty minutes every single day" }),
      goal({ id: "goal-2", status: "completed" }),
    ]);
    expect(bars).toEqual([
      {
        id: "goal-1",
        label: "Walk at least thirty minutes e...",
        percent: 50,
        achieved: false,
      },
    ]);
  });

  it("marks a bar achieved only when the goal's band is achieved", () => {
    const nearly = goal({
      progress: {
        percent: 100,
        cappedPercent: 99.9,
        daysLeft: 3,
        band: "almost_there",
        message: "🔥 You're almost there! Keep up the great work!",
      },
    });
    const done = goal({
      id: "goal-2",
      progress: {
        percent: 112.5,
        cappedPercent: 100,
        daysLeft: 3,
        band: "achieved",
        message: "🎉 Goal achieved! Consider marking it as complete.",
      },
    });

    expect(goalProgressBars([nearly, done]).map((b) => b.achieved)).toEqual([false, true]);
  });
});

describe("format helpers", () => {
  it("formats metrics with their unit", () => {
    expect(formatMetric("weightKg", 70.26)).toBe("70.3 kg");
    expect(formatMetric("heartRate", 71.6)).toBe("72 bpm");
    expect(formatMetric("sleepHours", null)).toBe("—");
  });

  it("formats blood pressure only when both readings exist", () => {
    expect(formatBloodPressure(120, 80)).toBe("120/80 mmHg");
    expect(formatBloodPressure(120, null)).toBe("—");
  });

  it("treats blank number inputs as null", () => {
    expect(parseNumberInput("  ")).toBeNull();
    expect(parseNumberInput("72.5")).toBe(72.5);
  });
});
