import { Test } from "@nestjs/testing";
import {
  DataQualityService,
  completeness,
  dateGaps,
  weightOutliers,
} from "./data-quality.service";
import { DatabaseService } from "../database/database.service";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import { entryRow, goalRow } from "../testing/fixtures";

const entries = [
  entryRow({ id: "e1", date: "2025-01-01", weightKg: 70, heartRate: 64, sleepHours: 7 }),
  entryRow({ id: "e2", date: "2025-01-02", weightKg: 71, heartRate: 66 }),
  entryRow({ id: "e3", date: "2025-01-15", weightKg: 70.5 }),
  entryRow({ id: "e4", date: "2025-01-16", weightKg: 72 }),
  entryRow({ id: "e5", date: "2025-02-01", weightKg: 110 }),
];

describe("data quality checks", () => {
  it("computes completeness per metric", () => {
    expect(completeness(entries)).toEqual({
      weightKg: 100,
      heartRate: 40,
      systolic: 0,
      sleepHours: 20,
      exerciseMinutes: 0,
    });
  });

  it("reports zero completeness without entries", () => {
    expect(completeness([]).weightKg).toBe(0);
  });

  it("lists gaps longer than a week", () => {
    expect(dateGaps(entries)).toEqual([
      "Gap of 13 days between 2025-01-02 and 2025-01-15",
      "Gap of 16 days between 2025-01-16 and 2025-02-01",
    ]);
  });

  it("reports at most five gaps", () => {
    const sparse = Array.from({ length: 8 }, (_, i) =>
      entryRow({ date: `2025-${String(i + 1).padStart(2, "0")}-01` }),
    );

    expect(dateGaps(sparse)).toHaveLength(5);
  });

  it("counts weight outliers outside the IQR fences", () => {
    expect(weightOutliers(entries)).toEqual(["Weight outliers: 1 records"]);
    expect(weightOutliers(entries.slice(0, 4))).toEqual([]);
  });
});

describe("DataQualityService", () => {
  let service: DataQualityService;
  let database: { ping: jest.Mock };
  let healthEntries: { count: jest.Mock; findInRange: jest.Mock };
  let goals: { count: jest.Mock; findAll: jest.Mock };
  let insights: { count: jest.Mock };

  beforeEach(async () => {
    database = { ping: jest.fn().mockResolvedValue(true) };
    healthEntries = {
      count: jest.fn().mockResolvedValue(5),
      findInRange: jest.fn().mockResolvedValue(entries),
    };
    goals = {
      count: jest.fn().mockResolvedValue(3),
      findAll: jest.fn().mockResolvedValue([
        goalRow(),
        goalRow({ id: "goal-2", status: "completed" }),
        goalRow({ id: "goal-3", status: "paused" }),
      ]),
    };
    insights = { count: jest.fn().mockResolvedValue(2) };

    const module = await Test.createTestingModule({
      providers: [
        DataQualityService,
        { provide: DatabaseService, useValue: database },
        { provide: HealthEntriesRepository, useValue: healthEntries },
        { provide: GoalsRepository, useValue: goals },
        { provide: InsightsRepository, useValue: insights },
      ],
    }).compile();

    service = module.get(DataQualityService);
  });

  it("reports counts when the database is reachable", async () => {
    expect(await service.status("user-1")).toEqual({
      connected: true,
      healthRecords: 5,
      goals: 3,
      insights: 2,
    });
  });

  it("reports a disconnected database without querying counts", async () => {
    database.ping.mockResolvedValue(false);

    expect(await service.status("user-1")).toEqual({
      connected: false,
      healthRecords: 0,
      goals: 0,
      insights: 0,
    });
    expect(healthEntries.count).not.toHaveBeenCalled();
  });

  it("assembles the quality report", async () => {
    const report = await service.quality("user-1");

    expect(report.totalRecords).toBe(5);
    expect(report.dateRange).toEqual({ start: "2025-01-01", end: "2025-02-01" });
    expect(report.dateGaps).toHaveLength(2);
    expect(report.outliers).toEqual(["Weight outliers: 1 records"]);
    expect(report.goals).toEqual({ active: 1, completed: 1 });
  });
});
