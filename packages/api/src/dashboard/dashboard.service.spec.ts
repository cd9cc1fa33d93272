import { Test } from "@nestjs/testing";
import { addDays, todayIso } from "@vitalog/shared";
import { DashboardService, moodDistribution, weeklyAverages } from "./dashboard.service";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { UsersRepository } from "../database/repositories/users.repository";
import { entryRow, entrySeries, goalRow, userRow } from "../testing/fixtures";

describe("weeklyAverages", () => {
  it("averages the last seven entries and totals exercise", () => {
    const days = entrySeries("2025-01-01", [
      { weightKg: 90, exerciseMinutes: 100 },
      ...Array.from({ length: 7 }, (_, i) => ({
        weightKg: 80 + (i % 2),
        heartRate: 70,
        exerciseMinutes: 20,
      })),
    ]);

    expect(weeklyAverages(days)).toEqual({
      weightKg: 80.4,
      heartRate: 70,
      sleepHours: null,
      exerciseTotal: 140,
    });
  });
});

describe("moodDistribution", () => {
  it("counts moods in scale order and omits absent ones", () => {
    const days = entrySeries("2025-01-01", [
      { mood: "poor" },
      { mood: "excellent" },
      {},
      { mood: "poor" },
    ]);

    expect(moodDistribution(days)).toEqual([
      { mood: "excellent", count: 1 },
      { mood: "poor", count: 2 },
    ]);
  });
});

describe("DashboardService", () => {
  let service: DashboardService;
  let entries: { findInRange: jest.Mock };
  let goals: { findAll: jest.Mock };
  let users: { findById: jest.Mock };

  beforeEach(async () => {
    entries = { findInRange: jest.fn().mockResolvedValue([]) };
    goals = { findAll: jest.fn().mockResolvedValue([]) };
    users = { findById: jest.fn().mockResolvedValue(userRow()) };

    const module = await Test.createTestingModule({
      providers: [
        DashboardService,
        { provide: HealthEntriesRepository, useValue: entries },
        { provide: GoalsRepository, useValue: goals },
        { provide: UsersRepository, useValue: users },
      ],
    }).compile();

    service = module.get(DashboardService);
  });

  it("returns an empty overview without entries", async () => {
    const result = await service.overview("user-1", 30);

    expect(result.healthScore).toEqual({ score: 0, factors: [] });
    expect(result.latest).toBeNull();
    expect(result.series).toEqual([]);
    expect(result.summary.dateRange).toBeNull();
    expect(goals.findAll).toHaveBeenCalledWith("user-1", "active");
  });

  it("builds the overview from the selected window", async () => {
    const today = todayIso();
    const old = entryRow({
      id: "old",
      date: addDays(today, -60),
      weightKg: 90,
      mood: "poor",
    });
    const recent = entrySeries(addDays(today, -2), [
      { weightKg: 70, heartRate: 70, sleepHours: 8, exerciseMinutes: 30, mood: "good" },
      { weightKg: 71, heartRate: 72, sleepHours: 7, exerciseMinutes: 0, mood: "good" },
      { weightKg: 70.5, heartRate: 74, systolic: 118, diastolic: 76, mood: "excellent" },
    ]);
    entries.findInRange.mockResolvedValue([old, ...recent]);
    users.findById.mockResolvedValue(userRow({ heightCm: 175 }));
    goals.findAll.mockResolvedValue([
      goalRow({ currentValue: 75, targetDate: addDays(today, 5) }),
    ]);

    const result = await service.overview("user-1", 30);

    expect(result.healthScore).toEqual({
      score: 85,
      factors: [
        "Weight stability",
        "Good blood pressure",
        "Normal heart rate",
        "Adequate sleep",
      ],
    });
    expect(result.summary.totalEntries).toBe(4);
    expect(result.summary.dateRange).toEqual({
      start: addDays(today, -60),
      end: today,
    });
    expect(result.latest?.entry.id).toBe("entry-3");
    expect(result.latest?.assessment).toEqual({
      bmi: 23,
      bmiCategory: "Normal weight",
      bloodPressureCategory: "Normal",
      heartRateCategory: "Normal",
    });
    expect(result.weekly).toEqual({
      weightKg: 70.5,
      heartRate: 72,
      sleepHours: 7.5,
      exerciseTotal: 30,
    });
    expect(result.moodDistribution).toEqual([
      { mood: "excellent", count: 1 },
      { mood: "good", count: 2 },
    ]);
    expect(result.series.map((e) => e.id)).toEqual(["entry-1", "entry-2", "entry-3"]);
    expect(result.recentEntries.map((e) => e.id)).toEqual([
      "entry-3",
      "entry-2",
      "entry-1",
      "old",
    ]);
    expect(result.activeGoals[0].progress).toMatchObject({
      percent: 50,
      daysLeft: 5,
      band: "halfway",
    });
  });
});
