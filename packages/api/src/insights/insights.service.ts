import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import type OpenAI from "openai";
import { addDays, todayIso } from "@vitalog/shared";
import type {
  GoalSuggestionsContent,
  HealthAssessmentContent,
  InsightHistoryItem,
  InsightHistoryQueryDto,
  InsightRecord,
  InsightRecordBase,
  InsightRecordOf,
  InsightRequestDto,
  InsightType,
  TrendAnalysisContent,
} from "@vitalog/shared";
import { APP_CONFIG } from "../config/configuration";
import type { AppConfig } from "../config/configuration";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { GoalsRepository } from "../database/repositories/goals.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import type { HealthEntryRow, HealthInsightRow } from "../database/schema";
import { OPENAI_CLIENT } from "./openai.provider";
import {
  buildDataSummary,
  buildGoalsSummary,
  buildTrendData,
} from "./insights-context";
import {
  ASSESSMENT_SYSTEM_PROMPT,
  GOALS_SYSTEM_PROMPT,
  TRENDS_SYSTEM_PROMPT,
  assessmentPrompt,
  goalsPrompt,
  trendsPrompt,
} from "./insights.prompt";
import {
  parseModelJson,
  sanitizeAssessment,
  sanitizeGoalSuggestions,
  sanitizeTrendAnalysis,
} from "./insights.parser";
import { AiNotConfiguredError, AiResponseError, NoDataError } from "./insights.errors";
import { renderInsightReport } from "./insights-report";

const SUMMARY_LENGTH = 200;

export const NO_DATA_ASSESSMENT: HealthAssessmentContent = {
  overall_health: "No data available for analysis",
  recommendations: ["Please log your health data to receive personalized insights"],
  trends: [],
  risk_factors: [],
  positive_aspects: [],
  areas_for_improvement: [],
};

interface Period {
  start: string;
  end: string;
}

function baseOf(row: HealthInsightRow, cached: boolean): InsightRecordBase {
  return {
    id: row.id,
    summary: row.summary,
    periodStart: row.periodStart,
    periodEnd: row.periodEnd,
    entryCount: row.entryCount,
    stale: row.stale,
    cached,
    createdAt: row.createdAt.toISOString(),
  };
}

/** Re-validates stored content; rows written by older releases may lack fields. */
export function toInsightRecord(row: HealthInsightRow, cached = false): InsightRecord {
  switch (row.type) {
    case "assessment":
      return {
        ...baseOf(row, cached),
        type: "assessment",
        content: sanitizeAssessment(row.content),
      };
    case "trend_analysis":
      return {
        ...baseOf(row, cached),
        type: "trend_analysis",
        content: sanitizeTrendAnalysis(row.content),
      };
    case "goal_suggestions":
      return {
        ...baseOf(row, cached),
        type: "goal_suggestions",
        content: sanitizeGoalSuggestions(row.content),
      };
  }
}

@Injectable()
export class InsightsService {
  private readonly logger = new Logger(InsightsService.name);

  constructor(
    @Inject(OPENAI_CLIENT) private openai: OpenAI | null,
    @Inject(APP_CONFIG) private config: AppConfig,
    private entries: HealthEntriesRepository,
    private goals: GoalsRepository,
    private insights: InsightsRepository,
  ) {}

  async generateAssessment(
    userId: string,
    dto: InsightRequestDto,
  ): Promise<InsightRecordOf<"assessment">> {
    const period = this.periodFor(dto.days);
    const entries = await this.entries.findInRange(userId, period.start, period.end);
    if (!entries.length) {
      return {
        ...this.unsaved(period),
        type: "assessment",
        content: NO_DATA_ASSESSMENT,
      };
    }

    const cached = dto.refresh ? null : await this.findCached(userId, "assessment", period);
    if (cached) {
      return {
        ...baseOf(cached, true),
        type: "assessment",
        content: sanitizeAssessment(cached.content),
      };
    }

    const raw = await this.complete(userId, "assessment", entries.length, {
      system: ASSESSMENT_SYSTEM_PROMPT,
      user: assessmentPrompt(buildDataSummary(entries)),
      maxTokens: 1500,
    });
    const content = sanitizeAssessment(raw);
    const row = await this.save(
      userId,
      "assessment",
      period,
      entries,
      content,
      content.overall_health,
    );
    return { ...baseOf(row, false), type: "assessment", content };
  }

  async analyzeTrends(
    userId: string,
    dto: InsightRequestDto,
  ): Promise<InsightRecordOf<"trend_analysis">> {
    const period = this.periodFor(dto.days);
    const entries = await this.entries.findInRange(userId, period.start, period.end);
    if (!entries.length) {
      return {
        ...this.unsaved(period),
        type: "trend_analysis",
        content: { trends: [], patterns: [] },
      };
    }

    const cached = dto.refresh ? null : await this.findCached(userId, "trend_analysis", period);
    if (cached) {
      return {
        ...baseOf(cached, true),
        type: "trend_analysis",
        content: sanitizeTrendAnalysis(cached.content),
      };
    }

    const raw = await this.complete(userId, "trend_analysis", entries.length, {
      system: TRENDS_SYSTEM_PROMPT,
      user: trendsPrompt(buildTrendData(entries)),
      maxTokens: 1000,
    });
    const content: TrendAnalysisContent = sanitizeTrendAnalysis(raw);
    const row = await this.save(
      userId,
      "trend_analysis",
      period,
      entries,
      content,
      `${content.trends.length} trends, ${content.patterns.length} patterns`,
    );
    return { ...baseOf(row, false), type: "trend_analysis", content };
  }

  async suggestGoals(
    userId: string,
    dto: InsightRequestDto,
  ): Promise<InsightRecordOf<"goal_suggestions">> {
    const period = this.periodFor(dto.days);
    const entries = await this.entries.findInRange(userId, period.start, period.end);
    if (!entries.length) {
      throw new NoDataError("Log some health data before asking for goal suggestions");
    }

    const cached = dto.refresh ? null : await this.findCached(userId, "goal_suggestions", period);
    if (cached) {
      return {
        ...baseOf(cached, true),
        type: "goal_suggestions",
        content: sanitizeGoalSuggestions(cached.content),
      };
    }

    const goals = await this.goals.findAll(userId);
    const raw = await this.complete(userId, "goal_suggestions", entries.length, {
      system: GOALS_SYSTEM_PROMPT,
      user: goalsPrompt(buildDataSummary(entries), buildGoalsSummary(goals)),
      maxTokens: 1000,
    });
    const content: GoalSuggestionsContent = sanitizeGoalSuggestions(raw);
    const row = await this.save(
      userId,
      "goal_suggestions",
      period,
      entries,
      content,
      `${content.recommended_goals.length} suggested goals`,
    );
    return { ...baseOf(row, false), type: "goal_suggestions", content };
  }

  async latest(userId: string, type: InsightType): Promise<InsightRecord | null> {
    const row = await this.insights.findLatest(userId, type);
    return row ? toInsightRecord(row) : null;
  }

  async history(
    userId: string,
    query: InsightHistoryQueryDto,
  ): Promise<InsightHistoryItem[]> {
    const since = new Date(Date.now() - query.days * 86_400_000);
    const rows = await this.insights.findSince(userId, since, query.type);
    return rows.map((row) => ({
      id: row.id,
      type: row.type,
      periodStart: row.periodStart,
      periodEnd: row.periodEnd,
      createdAt: row.createdAt.toISOString(),
      summary: row.summary,
      entryCount: row.entryCount,
      stale: row.stale,
    }));
  }

  async findOne(userId: string, id: string): Promise<InsightRecord> {
    const row = await this.insights.findById(userId, id);
    if (!row) throw new NotFoundException("Insight not found");
    return toInsightRecord(row);
  }

  async report(userId: string, id: string): Promise<string> {
    return renderInsightReport(await this.findOne(userId, id), todayIso());
  }

  async remove(userId: string, id: string) {
    const deleted = await this.insights.delete(userId, id);
    if (!deleted) throw new NotFoundException("Insight not found");
    return { deleted: true };
  }

  private periodFor(days: number): Period {
    const end = todayIso();
    return { start: addDays(end, -days), end };
  }

  private unsaved(period: Period): InsightRecordBase {
    return {
      id: null,
      summary: "No data available for analysis",
      periodStart: period.start,
      periodEnd: period.end,
      entryCount: 0,
      stale: false,
      cached: false,
      createdAt: new Date().toISOString(),
    };
  }

  private findCached(userId: string, type: InsightType, period: Period) {
    return this.insights.findFresh(userId, type, period.start, period.end);
  }

  private save(
    userId: string,
    type: InsightType,
    period: Period,
    entries: HealthEntryRow[],
    content: unknown,
    summary: string,
  ): Promise<HealthInsightRow> {
    return this.insights.create({
      userId,
      type,
      content,
      summary: summary.slice(0, SUMMARY_LENGTH),
      periodStart: period.start,
      periodEnd: period.end,
      entryCount: entries.length,
    });
  }

  private async complete(
    userId: string,
    type: InsightType,
    entryCount: number,
    prompt: { system: string; user: string; maxTokens: number },
  ): Promise<unknown> {
    if (!this.openai) throw new AiNotConfiguredError();

    const { model, timeoutMs } = this.config.openai;
    this.logger.log(
      `Requesting ${type} for user ${userId}: ${entryCount} entries (model: ${model}, timeout: ${timeoutMs / 1000}s)`,
    );
    const startTime = Date.now();

    const completion = await this.openai.chat.completions.create(
      {
        model,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        max_tokens: prompt.maxTokens,
        temperature: 0.3,
      },
      { timeout: timeoutMs },
    );

    const elapsedSec = ((Date.now() - startTime) / 1000).toFixed(1);
    const usage = completion.usage;
    this.logger.log(
      `${type} ready in ${elapsedSec}s for user ${userId} (tokens: ${usage?.prompt_tokens ?? "?"}in/${usage?.completion_tokens ?? "?"}out)`,
    );

    const raw = completion.choices[0]?.message?.content;
    if (!raw) throw new AiResponseError("Empty response from the model");
    return parseModelJson(raw);
  }
}
