import { Test } from "@nestjs/testing";
import { todayIso } from "@vitalog/shared";
import { ExportService } from "./export.service";
import { readCsv } from "./import.service";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { entryRow, goalRow } from "../testing/fixtures";

describe("ExportService", () => {
  let service: ExportService;
  let entries: { findInRange: jest.Mock };
  let goals: { findAll: jest.Mock };

  beforeEach(async () => {
    entries = {
      findInRange: jest
        .fn()
        .mockResolvedValue([entryRow({ weightKg: 80.5, mood: "good", notes: "Felt fine" })]),
    };
    goals = { findAll: jest.fn().mockResolvedValue([goalRow()]) };

    const module = await Test.createTestingModule({
      providers: [
        ExportService,
        { provide: HealthEntriesRepository, useValue: entries },
        { provide: GoalsRepository, useValue: goals },
      ],
    }).compile();

    service = module.get(ExportService);
  });

  it("writes metrics as CSV with the health_data.csv column names", async () => {
    const file = await service.exportMetrics("user-1", { format: "csv", days: 30 });

    const header = file.buffer.toString("utf8").replace(/^\uFEFF/, "").split("\n")[0];
    expect(header).toBe(
      "date,weight,blood_pressure_systolic,blood_pressure_diastolic,heart_rate,sleep_hours,exercise_minutes,mood,symptoms,notes",
    );
    expect(file.contentType).toBe("text/csv; charset=utf-8");
    expect(file.filename).toBe(`vitalog-health-data-${todayIso()}.csv`);
  });

  it("writes values the importer reads back", async () => {
    const file = await service.exportMetrics("user-1", { format: "csv", days: 30 });

    const [{ cells: record }] = await readCsv(file.buffer);
    expect(record.get("date")).toBe("2025-01-01");
    expect(record.get("weight")).toBe("80.5");
    expect(record.get("mood")).toBe("good");
    expect(record.get("notes")).toBe("Felt fine");
  });

  it("writes goals as an xlsx workbook", async () => {
    const file = await service.exportGoals("user-1", { format: "xlsx" });

    expect(file.buffer.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(file.filename).toBe(`vitalog-goals-${todayIso()}.xlsx`);
  });
});
