import type { InsightRecord } from "@vitalog/shared";
import { renderInsightReport } from "./insights-report";

const base = {
  id: "insight-1",
  summary: "",
  periodStart: "2025-01-01",
  periodEnd: "2025-01-31",
  entryCount: 12,
  stale: false,
  cached: false,
  createdAt: "2025-01-31T09:00:00.000Z",
};

describe("renderInsightReport", () => {
  it("renders every assessment section", () => {
    const record: InsightRecord = {
      ...base,
      type: "assessment",
      content: {
        overall_health: "Good overall.",
        recommendations: ["Walk daily", "Sleep earlier"],
        trends: [],
        risk_factors: ["Elevated blood pressure"],
        positive_aspects: [],
        areas_for_improvement: ["Sleep"],
      },
    };

    expect(renderInsightReport(record, "2025-02-01")).toBe(
      [
        "# Health Insights Report - 2025-02-01",
        "",
        "**Health Assessment** for 2025-01-01 to 2025-01-31 (12 entries)",
        "",
        "## Overall Health Assessment",
        "Good overall.",
        "",
        "## Recommendations",
        "• Walk daily",
        "• Sleep earlier",
        "",
        "## Health Trends",
        "_None noted._",
        "",
        "## Risk Factors",
        "• Elevated blood pressure",
        "",
        "## Positive Aspects",
        "_None noted._",
        "",
        "## Areas for Improvement",
        "• Sleep",
        "",
        "---",
        "*AI-generated insights are informational only and are not medical advice. Consult a healthcare professional about health concerns.*",
        "",
      ].join("\n"),
    );
  });

  it("renders trends and patterns", () => {
    const record: InsightRecord = {
      ...base,
      type: "trend_analysis",
      content: {
        trends: [
          {
            metric: "weight",
            trend: "decreasing",
            significance: "high",
            description: "Down 2 kg",
          },
        ],
        patterns: [
          {
            pattern: "Better sleep on active days",
            correlation: "exercise, sleep",
            recommendation: "Keep moving",
          },
        ],
      },
    };

    const lines = renderInsightReport(record, "2025-02-01").split("\n");

    expect(lines).toContain("• **Weight** (decreasing, high significance): Down 2 kg");
    expect(lines).toContain(
      "• Better sleep on active days (related: exercise, sleep). Recommendation: Keep moving",
    );
  });

  it("numbers suggested goals with their rationale", () => {
    const record: InsightRecord = {
      ...base,
      type: "goal_suggestions",
      content: {
        recommended_goals: [
          {
            goal_type: "sleep",
            description: "Sleep 8 hours",
            target_value: 8,
            timeframe_days: 30,
            rationale: "Average sleep is 6.2 hours",
          },
        ],
      },
    };

    const lines = renderInsightReport(record, "2025-02-01").split("\n");

    expect(lines).toContain("1. **Sleep Hours**: Sleep 8 hours (target 8, 30 days)");
    expect(lines).toContain("   Average sleep is 6.2 hours");
  });
});
