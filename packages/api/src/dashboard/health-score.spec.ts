import { computeHealthScore } from "./health-score";
import { entrySeries } from "../testing/fixtures";

describe("computeHealthScore", () => {
  it("scores zero without entries", () => {
    expect(computeHealthScore([])).toEqual({ score: 0, factors: [] });
  });

  it("awards every factor for a healthy week", () => {
    const week = entrySeries(
      "2025-01-01",
      Array.from({ length: 7 }, () => ({
        weightKg: 70.2,
        systolic: 115,
        diastolic: 75,
        heartRate: 68,
        sleepHours: 8,
        exerciseMinutes: 30,
      })),
    );

    expect(computeHealthScore(week)).toEqual({
      score: 100,
      factors: [
        "Weight stability",
        "Good blood pressure",
        "Normal heart rate",
        "Adequate sleep",
        "Sufficient exercise",
      ],
    });
  });

  it("uses the lower tiers for borderline readings", () => {
    const days = entrySeries("2025-01-01", [
      { systolic: 130, diastolic: 85, sleepHours: 6, exerciseMinutes: 40 },
      { systolic: 134, diastolic: 86, sleepHours: 6.5, exerciseMinutes: 40 },
    ]);

    expect(computeHealthScore(days)).toEqual({
      score: 35,
      factors: ["Acceptable blood pressure", "Reasonable sleep", "Some exercise"],
    });
  });

  it("only looks at the last seven entries", () => {
    const days = entrySeries("2025-01-01", [
      { exerciseMinutes: 500 },
      ...Array.from({ length: 7 }, () => ({ exerciseMinutes: 10 })),
    ]);

    expect(computeHealthScore(days)).toEqual({ score: 0, factors: [] });
  });

  it("needs two weights to judge stability", () => {
    const days = entrySeries("2025-01-01", [{ weightKg: 70 }]);

    expect(computeHealthScore(days).factors).not.toContain("Weight stability");
  });

  it("skips fluctuating weight", () => {
    const days = entrySeries("2025-01-01", [{ weightKg: 70 }, { weightKg: 73 }]);

    expect(computeHealthScore(days)).toEqual({ score: 0, factors: [] });
  });
});
