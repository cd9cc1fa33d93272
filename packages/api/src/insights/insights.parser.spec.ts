import {
  parseModelJson,
  sanitizeAssessment,
  sanitizeGoalSuggestions,
  sanitizeTrendAnalysis,
  validateEnum,
} from "./insights.parser";
import { AiResponseError } from "./insights.errors";

describe("parseModelJson", () => {
  it("strips a markdown code fence", () => {
    expect(parseModelJson('```json\n{"trends": []}\n```')).toEqual({ trends: [] });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseModelJson("Sure! Here are your insights")).toThrow(AiResponseError);
  });

  it("rejects a JSON array", () => {
    expect(() => parseModelJson("[1, 2]")).toThrow("Model response is not a JSON object");
  });
});

describe("validateEnum", () => {
  it("falls back for unknown values", () => {
    expect(validateEnum("rising", ["increasing", "stable"] as const, "stable")).toBe("stable");
    expect(validateEnum("increasing", ["increasing", "stable"] as const, "stable")).toBe(
      "increasing",
    );
  });
});

describe("sanitizeAssessment", () => {
  it("fills missing fields and drops non-text list items", () => {
    expect(
      sanitizeAssessment({
        recommendations: ["Walk daily", 42, null, "  ", { text: "x" }],
        trends: "Weight is trending down",
      }),
    ).toEqual({
      overall_health: "No assessment available",
      recommendations: ["Walk daily", "42"],
      trends: ["Weight is trending down"],
      risk_factors: [],
      positive_aspects: [],
      areas_for_improvement: [],
    });
  });
});

describe("sanitizeTrendAnalysis", () => {
  it("defaults unknown enums and drops unnamed items", () => {
    expect(
      sanitizeTrendAnalysis({
        trends: [
          { metric: "weight", trend: "down", significance: "HIGH", description: "Lost 2 kg" },
          { trend: "stable" },
          "sleep",
        ],
        patterns: [{ pattern: "More sleep on active days" }],
      }),
    ).toEqual({
      trends: [
        { metric: "weight", trend: "stable", significance: "low", description: "Lost 2 kg" },
      ],
      patterns: [
        { pattern: "More sleep on active days", correlation: "", recommendation: "" },
      ],
    });
  });
});

describe("sanitizeGoalSuggestions", () => {
  it("normalises goal types, targets and timeframes", () => {
    const result = sanitizeGoalSuggestions({
      recommended_goals: [
        {
          goal_type: "heart_health",
          description: "Lower resting heart rate",
          target_value: "65 bpm",
          timeframe: "60",
          rationale: "Resting rate is 78",
        },
        { goal_type: "exercise", description: "Move more", target_value: 150 },
        { goal_type: "sleep", description: "No target", target_value: 0 },
      ],
    });

    expect(result.recommended_goals).toEqual([
      {
        goal_type: "general",
        description: "Lower resting heart rate",
        target_value: 65,
        timeframe_days: 60,
        rationale: "Resting rate is 78",
      },
      {
        goal_type: "exercise",
        description: "Move more",
        target_value: 150,
        timeframe_days: 30,
        rationale: "",
      },
    ]);
  });

  it("keeps at most five suggestions", () => {
    const goals = Array.from({ length: 7 }, (_, i) => ({
      goal_type: "exercise",
      description: `Goal ${i + 1}`,
      target_value: 10,
    }));

    expect(sanitizeGoalSuggestions({ recommended_goals: goals }).recommended_goals).toHaveLength(5);
  });

  it("rejects a non-object", () => {
    expect(() => sanitizeGoalSuggestions(null)).toThrow(AiResponseError);
  });
});
