import { Test } from "@nestjs/testing";
import { NotFoundException } from "@nestjs/common";
import { addDays, todayIso } from "@vitalog/shared";
import { InsightsService, NO_DATA_ASSESSMENT } from "./insights.service";
import { OPENAI_CLIENT } from "./openai.provider";
import { AiNotConfiguredError, AiResponseError, NoDataError } from "./insights.errors";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import { APP_CONFIG, parseConfig } from "../config/configuration";
import { entrySeries, goalRow, insightRow } from "../testing/fixtures";

const config = parseConfig({
  DATABASE_URL: "postgresql://localhost/vitalog_test",
  JWT_SECRET: "test-secret-test-secret",
  OPENAI_API_KEY: "test-key",
  OPENAI_MODEL: "test-model",
});

function completion(content: string | null) {
  return {
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 120, completion_tokens: 80 },
  };
}

describe("InsightsService", () => {
  let service: InsightsService;
  let openai: { chat: { completions: { create: jest.Mock } } };
  let entries: { findInRange: jest.Mock };
  let goals: { findAll: jest.Mock };
  let insights: {
    create: jest.Mock;
    findFresh: jest.Mock;
    findLatest: jest.Mock;
    findById: jest.Mock;
    findSince: jest.Mock;
    delete: jest.Mock;
  };

  const week = entrySeries(addDays(todayIso(), -6), [
    { weightKg: 80, sleepHours: 7 },
    { weightKg: 79.5, sleepHours: 6.5 },
    { weightKg: 79.4, sleepHours: 8 },
  ]);

  async function build(client: unknown) {
    const module = await Test.createTestingModule({
      providers: [
        InsightsService,
        { provide: OPENAI_CLIENT, useValue: client },
        { provide: APP_CONFIG, useValue: config },
        { provide: HealthEntriesRepository, useValue: entries },
        { provide: GoalsRepository, useValue: goals },
        { provide: InsightsRepository, useValue: insights },
      ],
    }).compile();
    return module.get(InsightsService);
  }

  beforeEach(async () => {
    openai = { chat: { completions: { create: jest.fn() } } };
    entries = { findInRange: jest.fn().mockResolvedValue(week) };
    goals = { findAll: jest.fn().mockResolvedValue([]) };
    insights = {
      create: jest.fn(async (data: object) => insightRow({ id: "insight-new", ...data })),
      findFresh: jest.fn().mockResolvedValue(null),
      findLatest: jest.fn().mockResolvedValue(null),
      findById: jest.fn().mockResolvedValue(null),
      findSince: jest.fn().mockResolvedValue([]),
      delete: jest.fn().mockResolvedValue(false),
    };
    service = await build(openai);
  });

  // -- assessment -------------------------------------------------------------

  describe("generateAssessment", () => {
    it("returns the no-data response without calling the model", async () => {
      entries.findInRange.mockResolvedValue([]);

      const result = await service.generateAssessment("user-1", { days: 30, refresh: false });

      expect(result.id).toBeNull();
      expect(result.content).toEqual(NO_DATA_ASSESSMENT);
      expect(openai.chat.completions.create).not.toHaveBeenCalled();
      expect(insights.create).not.toHaveBeenCalled();
    });

    it("queries the selected period", async () => {
      openai.chat.completions.create.mockResolvedValue(
        completion('{"overall_health": "Stable"}'),
      );
      const today = todayIso();

      await service.generateAssessment("user-1", { days: 14, refresh: false });

      expect(entries.findInRange).toHaveBeenCalledWith("user-1", addDays(today, -14), today);
    });

    it("serves a fresh cached result", async () => {
      insights.findFresh.mockResolvedValue(insightRow());

      const result = await service.generateAssessment("user-1", { days: 30, refresh: false });

      expect(result.cached).toBe(true);
      expect(result.id).toBe("insight-1");
      expect(result.content.recommendations).toEqual(["Walk daily"]);
      expect(openai.chat.completions.create).not.toHaveBeenCalled();
    });

    it("calls the model in JSON mode and stores the result", async () => {
      openai.chat.completions.create.mockResolvedValue(
        completion(
          JSON.stringify({
            overall_health: "Weight is trending down steadily.",
            recommendations: ["Keep logging"],
            trends: ["Weight down 0.6 kg"],
            risk_factors: [],
            positive_aspects: ["Consistent sleep"],
            areas_for_improvement: [],
          }),
        ),
      );
      const today = todayIso();

      const result = await service.generateAssessment("user-1", { days: 30, refresh: true });

      expect(insights.findFresh).not.toHaveBeenCalled();
      const [request, options] = openai.chat.completions.create.mock.calls[0];
      expect(request).toMatchObject({
        model: "test-model",
        response_format: { type: "json_object" },
        max_tokens: 1500,
      });
      expect(request.messages[1].content).toContain('"total_entries": 3');
      expect(options).toEqual({ timeout: 120_000 });
      expect(insights.create).toHaveBeenCalledWith({
        userId: "user-1",
        type: "assessment",
        content: {
          overall_health: "Weight is trending down steadily.",
          recommendations: ["Keep logging"],
          trends: ["Weight down 0.6 kg"],
          risk_factors: [],
          positive_aspects: ["Consistent sleep"],
          areas_for_improvement: [],
        },
        summary: "Weight is trending down steadily.",
        periodStart: addDays(today, -30),
        periodEnd: today,
        entryCount: 3,
      });
      expect(result).toMatchObject({ id: "insight-new", type: "assessment", cached: false });
    });

    it("rejects an empty model response", async () => {
      openai.chat.completions.create.mockResolvedValue(completion(null));

      await expect(
        service.generateAssessment("user-1", { days: 30, refresh: false }),
      ).rejects.toThrow(AiResponseError);
      expect(insights.create).not.toHaveBeenCalled();
    });

    it("requires a configured client", async () => {
      service = await build(null);

      await expect(
        service.generateAssessment("user-1", { days: 30, refresh: false }),
      ).rejects.toThrow(AiNotConfiguredError);
    });
  });

  // -- trends -----------------------------------------------------------------

  describe("analyzeTrends", () => {
    it("returns empty lists without data", async () => {
      entries.findInRange.mockResolvedValue([]);

      const result = await service.analyzeTrends("user-1", { days: 7, refresh: false });

      expect(result.content).toEqual({ trends: [], patterns: [] });
      expect(openai.chat.completions.create).not.toHaveBeenCalled();
    });

    it("summarises the stored result by counts", async () => {
      openai.chat.completions.create.mockResolvedValue(
        completion(
          JSON.stringify({
            trends: [{ metric: "weight", trend: "decreasing", significance: "medium" }],
            patterns: [],
          }),
        ),
      );

      await service.analyzeTrends("user-1", { days: 7, refresh: false });

      expect(insights.create.mock.calls[0][0].summary).toBe("1 trends, 0 patterns");
    });
  });

  // -- goal suggestions -------------------------------------------------------

  describe("suggestGoals", () => {
    it("needs logged data", async () => {
      entries.findInRange.mockResolvedValue([]);

      await expect(
        service.suggestGoals("user-1", { days: 30, refresh: false }),
      ).rejects.toThrow(NoDataError);
    });

    it("includes existing goals in the prompt", async () => {
      goals.findAll.mockResolvedValue([goalRow({ description: "Walk 150 minutes" })]);
      openai.chat.completions.create.mockResolvedValue(
        completion(
          JSON.stringify({
            recommended_goals: [
              { goal_type: "sleep", description: "Sleep 8 hours", target_value: 8 },
            ],
          }),
        ),
      );

      const result = await service.suggestGoals("user-1", { days: 30, refresh: false });

      const request = openai.chat.completions.create.mock.calls[0][0];
      expect(request.messages[1].content).toContain('"description": "Walk 150 minutes"');
      expect(result.content.recommended_goals).toEqual([
        {
          goal_type: "sleep",
          description: "Sleep 8 hours",
          target_value: 8,
          timeframe_days: 30,
          rationale: "",
        },
      ]);
    });
  });

  // -- history ----------------------------------------------------------------

  describe("history and lookup", () => {
    it("maps rows to history items", async () => {
      insights.findSince.mockResolvedValue([insightRow({ stale: true })]);

      const items = await service.history("user-1", { days: 30, type: "assessment" });

      expect(insights.findSince).toHaveBeenCalledWith(
        "user-1",
        expect.any(Date),
        "assessment",
      );
      expect(items).toEqual([
        {
          id: "insight-1",
          type: "assessment",
          periodStart: "2025-01-01",
          periodEnd: "2025-01-31",
          createdAt: "2025-01-01T08:00:00.000Z",
          summary: "Generally healthy",
          entryCount: 12,
          stale: true,
        },
      ]);
    });

    it("returns null when nothing was generated yet", async () => {
      expect(await service.latest("user-1", "trend_analysis")).toBeNull();
    });

    it("throws for an unknown insight", async () => {
      await expect(service.findOne("user-1", "missing")).rejects.toThrow(NotFoundException);
      await expect(service.remove("user-1", "missing")).rejects.toThrow("Insight not found");
    });

    it("renders a report for a stored insight", async () => {
      insights.findById.mockResolvedValue(insightRow());

      const report = await service.report("user-1", "insight-1");

      expect(report.split("\n")[0]).toBe(`# Health Insights Report - ${todayIso()}`);
    });
  });
});
