import { Test } from "@nestjs/testing";
import { TipsService, heuristicTips } from "./tips.service";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import { entryRow } from "../testing/fixtures";

describe("heuristicTips", () => {
  it("falls back to the first three general tips without an entry", () => {
    expect(heuristicTips(null).map((t) => t.text)).toEqual([
      "💧 Stay hydrated - aim for 8 glasses of water daily",
      "🥗 Include more fruits and vegetables in your diet",
      "🚶‍♂️ Take regular breaks to move throughout the day",
    ]);
  });

  it("ignores metrics that were not recorded", () => {
    const tips = heuristicTips(entryRow({ sleepHours: 8 }));

    expect(tips.every((t) => t.source === "default")).toBe(true);
  });

  it("flags short sleep, low exercise and poor mood", () => {
    const tips = heuristicTips(
      entryRow({ exerciseMinutes: 10, sleepHours: 5.5, mood: "very_poor" }),
    );

    expect(tips.map((t) => t.category)).toEqual(["exercise", "sleep", "mood"]);
    expect(tips[1]).toEqual({
      text: "😴 Aim for 7-9 hours of sleep per night for optimal recovery.",
      category: "sleep",
      source: "heuristic",
    });
  });

  it("caps the list at three tips", () => {
    const tips = heuristicTips(
      entryRow({
        exerciseMinutes: 0,
        sleepHours: 4,
        mood: "poor",
        systolic: 145,
        diastolic: 95,
      }),
    );

    expect(tips).toHaveLength(3);
    expect(tips.map((t) => t.category)).not.toContain("blood_pressure");
  });

  it("flags blood pressure above 130/80", () => {
    const tips = heuristicTips(entryRow({ systolic: 125, diastolic: 85 }));

    expect(tips.map((t) => t.category)).toEqual(["blood_pressure"]);
  });
});

describe("TipsService", () => {
  let service: TipsService;
  let insights: { findLatest: jest.Mock };
  let entries: { findLatest: jest.Mock };

  beforeEach(async () => {
    insights = { findLatest: jest.fn().mockResolvedValue(null) };
    entries = { findLatest: jest.fn().mockResolvedValue(null) };

    const module = await Test.createTestingModule({
      providers: [
        TipsService,
        { provide: InsightsRepository, useValue: insights },
        { provide: HealthEntriesRepository, useValue: entries },
      ],
    }).compile();

    service = module.get(TipsService);
  });

  it("uses recommendations from a current assessment", async () => {
    insights.findLatest.mockResolvedValue({
      stale: false,
      content: {
        recommendations: ["Walk after dinner", "", "Sleep earlier", "Drink water", "Stretch"],
      },
    });

    const tips = await service.getTips("user-1");

    expect(insights.findLatest).toHaveBeenCalledWith("user-1", "assessment");
    expect(tips).toEqual([
      { text: "Walk after dinner", category: "insight", source: "insight" },
      { text: "Sleep earlier", category: "insight", source: "insight" },
      { text: "Drink water", category: "insight", source: "insight" },
    ]);
    expect(entries.findLatest).not.toHaveBeenCalled();
  });

  it("ignores a stale assessment", async () => {
    insights.findLatest.mockResolvedValue({
      stale: true,
      content: { recommendations: ["Old advice"] },
    });
    entries.findLatest.mockResolvedValue(entryRow({ exerciseMinutes: 5 }));

    const tips = await service.getTips("user-1");

    expect(tips).toEqual([
      {
        text: "🏃‍♂️ Try to get at least 30 minutes of exercise daily for better health.",
        category: "exercise",
        source: "heuristic",
      },
    ]);
  });

  it("falls back when the assessment has no usable recommendations", async () => {
    insights.findLatest.mockResolvedValue({ stale: false, content: { recommendations: "none" } });

    const tips = await service.getTips("user-1");

    expect(tips[0].source).toBe("default");
  });
});
