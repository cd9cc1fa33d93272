import { GOAL_TYPE_CONFIG, INSIGHT_TYPE_LABELS } from "@vitalog/shared";
import type { InsightRecord } from "@vitalog/shared";

const NONE = "_None noted._";

function bullets(items: string[]): string {
  return items.length ? items.map((i) => `• ${i}`).join("\n") : NONE;
}

function section(title: string, body: string): string[] {
  return [`## ${title}`, body, ""];
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function body(record: InsightRecord): string[] {
  switch (record.type) {
    case "assessment": {
      const c = record.content;
      return [
        ...section("Overall Health Assessment", c.overall_health),
        ...section("Recommendations", bullets(c.recommendations)),
        ...section("Health Trends", bullets(c.trends)),
        ...section("Risk Factors", bullets(c.risk_factors)),
        ...section("Positive Aspects", bullets(c.positive_aspects)),
        ...section("Areas for Improvement", bullets(c.areas_for_improvement)),
      ];
    }
    case "trend_analysis": {
      const c = record.content;
      return [
        ...section(
          "Trends",
          bullets(
            c.trends.map(
              (t) =>
                `**${capitalize(t.metric)}** (${t.trend}, ${t.significance} significance): ${t.description}`,
            ),
          ),
        ),
        ...section(
          "Patterns",
          bullets(
            c.patterns.map((p) => {
              const related = p.correlation ? ` (related: ${p.correlation})` : "";
              const action = p.recommendation ? ` Recommendation: ${p.recommendation}` : "";
              return `${p.pattern}${related}.${action}`;
            }),
          ),
        ),
      ];
    }
    case "goal_suggestions": {
      const goals = record.content.recommended_goals;
      const lines = goals.map((g, i) => {
        const head = `${i + 1}. **${GOAL_TYPE_CONFIG[g.goal_type].label}**: ${g.description} (target ${g.target_value}, ${g.timeframe_days} days)`;
        return g.rationale ? `${head}\n   ${g.rationale}` : head;
      });
      return section("Suggested Goals", lines.length ? lines.join("\n") : NONE);
    }
  }
}

/** Markdown export of a single insight. */
export function renderInsightReport(record: InsightRecord, generatedOn: string): string {
  return [
    `# Health Insights Report - ${generatedOn}`,
    "",
    `**${INSIGHT_TYPE_LABELS[record.type]}** for ${record.periodStart} to ${record.periodEnd} (${record.entryCount} entries)`,
    "",
    ...body(record),
    "---",
    "*AI-generated insights are informational only and are not medical advice. Consult a healthcare professional about health concerns.*",
    "",
  ].join("\n");
}
