import {
  calculateBmi,
  bmiCategory,
  bloodPressureCategory,
  heartRateCategory,
  goalProgress,
} from "./health";
import { healthEntryDto, createGoalDto } from "./dto";
import { addDays, daysBetween, isValidIsoDate } from "./dates";

describe("health calculations", () => {
  describe("calculateBmi", () => {
    it("divides weight by squared height in metres", () => {
      expect(calculateBmi(70, 175)).toBe(22.9);
    });

    it("returns null when height or weight is missing", () => {
      expect(calculateBmi(70, null)).toBeNull();
      expect(calculateBmi(null, 180)).toBeNull();
    });
  });

  it("categorises BMI", () => {
    expect(bmiCategory(18.4)).toBe("Underweight");
    expect(bmiCategory(22.9)).toBe("Normal weight");
    expect(bmiCategory(25)).toBe("Overweight");
    expect(bmiCategory(30)).toBe("Obese");
    expect(bmiCategory(null)).toBe("Unknown");
  });

  it("categorises blood pressure", () => {
    expect(bloodPressureCategory(115, 75)).toBe("Normal");
    expect(bloodPressureCategory(125, 78)).toBe("Elevated");
    expect(bloodPressureCategory(135, 85)).toBe("High Blood Pressure Stage 1");
    expect(bloodPressureCategory(150, 95)).toBe("High Blood Pressure Stage 2");
    expect(bloodPressureCategory(185, 125)).toBe("Hypertensive Crisis");
    expect(bloodPressureCategory(120, null)).toBe("Unknown");
  });

  it("categorises heart rate", () => {
    expect(heartRateCategory(55)).toBe("Below Normal (Bradycardia)");
    expect(heartRateCategory(100)).toBe("Normal");
    expect(heartRateCategory(101)).toBe("Above Normal (Tachycardia)");
  });

  describe("goalProgress", () => {
    it("reports percent, days left and band", () => {
      const progress = goalProgress(
        { currentValue: 90, targetValue: 150, targetDate: "2025-03-11" },
        "2025-03-01",
      );
      expect(progress).toEqual({
        percent: 60,
        cappedPercent: 60,
        daysLeft: 10,
        band: "halfway",
        message: "📈 Good progress! You're halfway to your goal.",
      });
    });

    it("caps the bar at 100 but keeps the raw percent", () => {
      const progress = goalProgress(
        { currentValue: 9, targetValue: 8, targetDate: "2025-03-01" },
        "2025-03-01",
      );
      expect(progress.percent).toBe(112.5);
      expect(progress.cappedPercent).toBe(100);
      expect(progress.band).toBe("achieved");
      expect(progress.daysLeft).toBe(0);
    });

    it("does not round a nearly met target up to a full bar", () => {
      const progress = goalProgress(
        { currentValue: 9996, targetValue: 10000, targetDate: "2025-03-01" },
        "2025-03-01",
      );
      expect(progress.percent).toBe(100);
      expect(progress.cappedPercent).toBe(99.9);
      expect(progress.band).toBe("almost_there");
    });

    it("treats a non-positive target as zero progress", () => {
      const progress = goalProgress(
        { currentValue: 5, targetValue: 0, targetDate: "2025-02-27" },
        "2025-03-01",
      );
      expect(progress.percent).toBe(0);
      expect(progress.band).toBe("get_started");
      expect(progress.daysLeft).toBe(-2);
    });
  });
});

describe("dates", () => {
  it("adds days across month boundaries", () => {
    expect(addDays("2024-02-28", 2)).toBe("2024-03-01");
    expect(addDays("2024-03-01", -30)).toBe("2024-01-31");
  });

  it("counts whole days between dates", () => {
    expect(daysBetween("2024-01-01", "2024-01-31")).toBe(30);
  });

  it("rejects impossible calendar dates", () => {
    expect(isValidIsoDate("2024-02-30")).toBe(false);
    expect(isValidIsoDate("2024-2-3")).toBe(false);
    expect(isValidIsoDate("2024-02-29")).toBe(true);
  });
});

describe("healthEntryDto", () => {
  it("accepts a partial entry and normalises blank text", () => {
    const result = healthEntryDto.parse({
      date: "2025-01-10",
      weightKg: 72.4,
      sleepHours: 7.5,
      symptoms: "   ",
    });
    expect(result).toEqual({
      date: "2025-01-10",
      weightKg: 72.4,
      sleepHours: 7.5,
      symptoms: null,
    });
  });

  it("reports range errors with the metric's message", () => {
    const result = healthEntryDto.safeParse({
      date: "2025-01-10",
      weightKg: 0,
      heartRate: 250,
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.errors.map((e) => e.message)).toEqual([
      "Weight must be between 1 and 500 kg",
      "Heart rate must be between 30 and 220 bpm",
    ]);
  });

  it("requires whole numbers for blood pressure", () => {
    const result = healthEntryDto.safeParse({ date: "2025-01-10", systolic: 120.5 });
    expect(result.success).toBe(false);
  });
});

describe("createGoalDto", () => {
  it("defaults current value to zero", () => {
    expect(
      createGoalDto.parse({
        type: "exercise",
        description: " Walk more ",
        targetValue: 150,
        targetDate: "2025-06-01",
      }),
    ).toEqual({
      type: "exercise",
      description: "Walk more",
      targetValue: 150,
      currentValue: 0,
      targetDate: "2025-06-01",
    });
  });

  it("rejects a blank description", () => {
    const result = createGoalDto.safeParse({
      type: "sleep",
      description: "  ",
      targetValue: 8,
      targetDate: "2025-06-01",
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.errors[0].message).toBe("Please provide a goal description.");
  });
});
