import { Test } from "@nestjs/testing";
import { DatabaseService } from "../database.service";
import { InsightsRepository } from "./insights.repository";
import {
  recordingDatabase,
  RecordingDatabase,
} from "../../testing/recording-database";

describe("InsightsRepository", () => {
  let repository: InsightsRepository;
  let database: RecordingDatabase;

  beforeEach(async () => {
    database = recordingDatabase();
    const module = await Test.createTestingModule({
      providers: [InsightsRepository, { provide: DatabaseService, useValue: database }],
    }).compile();
    repository = module.get(InsightsRepository);
  });

  describe("markStale", () => {
    it("flags only the user's fresh results and counts them", async () => {
      database.respondWith([["insight-1"], ["insight-2"]]);

      const count = await repository.markStale("user-1");

      const [{ text, params }] = database.queries;
      expect(text).toMatch(
        /^update "health_insights" set "stale" = \$1 where \(("health_insights"\.)?"user_id" = \$2 and ("health_insights"\.)?"stale" = \$3\)/,
      );
      expect(params).toEqual([true, "user-1", false]);
      expect(count).toBe(2);
    });
  });

  describe("findFresh", () => {
    it("matches type, exact period and the fresh flag for the owner", async () => {
      const row = await repository.findFresh(
        "user-1",
        "assessment",
        "2025-02-01",
        "2025-03-02",
      );

      const [{ params }] = database.queries;
      expect(params.slice(0, 5)).toEqual([
        "user-1",
        "assessment",
        "2025-02-01",
        "2025-03-02",
        false,
      ]);
      expect(row).toBeNull();
    });
  });

  describe("findById", () => {
    it("returns null for another user's record", async () => {
      const row = await repository.findById("user-2", "insight-1");

      const [{ text, params }] = database.queries;
      expect(text).toMatch(
        /where \(("health_insights"\.)?"id" = \$1 and ("health_insights"\.)?"user_id" = \$2\)/,
      );
      expect(params.slice(0, 2)).toEqual(["insight-1", "user-2"]);
      expect(row).toBeNull();
    });
  });
});
