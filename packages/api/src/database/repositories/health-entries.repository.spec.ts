import { Test } from "@nestjs/testing";
import { getTableColumns } from "drizzle-orm";
import { DatabaseService } from "../database.service";
import { healthEntries } from "../schema";
import { HealthEntriesRepository } from "./health-entries.repository";
import {
  driverRow,
  recordingDatabase,
  RecordingDatabase,
} from "../../testing/recording-database";

describe("HealthEntriesRepository", () => {
  let repository: HealthEntriesRepository;
  let database: RecordingDatabase;

  beforeEach(async () => {
    database = recordingDatabase();
    const module = await Test.createTestingModule({
      providers: [
        HealthEntriesRepository,
        { provide: DatabaseService, useValue: database },
      ],
    }).compile();
    repository = module.get(HealthEntriesRepository);
  });

  describe("upsert", () => {
    it("overwrites provided fields, clears explicit nulls and keeps absent ones", async () => {
      database.respondWith([
        driverRow(
          { ...getTableColumns(healthEntries), inserted: true },
          { date: "2025-03-01", exerciseMinutes: 30, inserted: false },
        ),
      ]);

      const result = await repository.upsert("user-1", "2025-03-01", {
        weightKg: undefined,
        sleepHours: null,
        exerciseMinutes: 30,
      });

      const [{ text, params }] = database.queries;
      const setClause = text.slice(text.indexOf("do update set"));
      expect(setClause).toContain(
        'do update set "sleep_hours" = $5, "exercise_minutes" = $6, "updated_at" = $7',
      );
      expect(setClause).not.toContain('"weight_kg"');
      expect(params.slice(0, 6)).toEqual(["user-1", "2025-03-01", null, 30, null, 30]);
      expect(result.created).toBe(false);
      expect(result.entry.exerciseMinutes).toBe(30);
      expect(result.entry).not.toHaveProperty("inserted");
    });

    it("reports a fresh insert as created", async () => {
      database.respondWith([
        driverRow(
          { ...getTableColumns(healthEntries), inserted: true },
          { date: "2025-03-02", inserted: true },
        ),
      ]);

      const result = await repository.upsert("user-1", "2025-03-02", { mood: "good" });

      expect(result.created).toBe(true);
      expect(result.entry.date).toBe("2025-03-02");
    });
  });

  describe("update", () => {
    it("sets only provided fields and scopes the row to its owner", async () => {
      const row = await repository.update("user-1", "2025-03-01", {
        mood: undefined,
        notes: null,
      });

      const [{ text, params }] = database.queries;
      expect(text).toContain('set "notes" = $1, "updated_at" = $2 where');
      expect(text).toMatch(
        /where \(("health_entries"\.)?"user_id" = \$3 and ("health_entries"\.)?"date" = \$4\)/,
      );
      expect(params[0]).toBeNull();
      expect(params.slice(2, 4)).toEqual(["user-1", "2025-03-01"]);
      expect(row).toBeNull();
    });
  });

  describe("findByDate", () => {
    it("filters on the owner as well as the date", async () => {
      const row = await repository.findByDate("user-2", "2025-03-01");

      const [{ text, params }] = database.queries;
      expect(text).toMatch(
        /where \(("health_entries"\.)?"user_id" = \$1 and ("health_entries"\.)?"date" = \$2\)/,
      );
      expect(params.slice(0, 2)).toEqual(["user-2", "2025-03-01"]);
      expect(row).toBeNull();
    });
  });

  describe("delete", () => {
    it("returns false when the owner has no entry for the date", async () => {
      const deleted = await repository.delete("user-2", "2025-03-01");

      const [{ text, params }] = database.queries;
      expect(text).toMatch(/^delete from "health_entries" where \(/);
      expect(params).toEqual(["user-2", "2025-03-01"]);
      expect(deleted).toBe(false);
    });
  });
});
