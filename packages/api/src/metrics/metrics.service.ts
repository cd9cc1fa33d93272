import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from "@nestjs/common";
import { addDays, todayIso } from "@vitalog/shared";
import type {
  HealthEntryDto,
  HealthEntryResponse,
  HealthSummary,
  MetricKey,
  MetricsQueryDto,
  SaveEntryResponse,
  UpdateHealthEntryDto,
} from "@vitalog/shared";
import { HealthEntriesRepository } from "../database/repositories/health-entries.repository";
import { InsightsRepository } from "../database/repositories/insights.repository";
import type { HealthEntryRow } from "../database/schema";
import { mean, round, valuesOf } from "../common/stats";

export const DEFAULT_WINDOW_DAYS = 30;

export function toEntryResponse(row: HealthEntryRow): HealthEntryResponse {
  return {
    id: row.id,
    date: row.date,
    weightKg: row.weightKg,
    systolic: row.systolic,
    diastolic: row.diastolic,
    heartRate: row.heartRate,
    sleepHours: row.sleepHours,
    exerciseMinutes: row.exerciseMinutes,
    mood: row.mood,
    symptoms: row.symptoms,
    notes: row.notes,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

/** Encouragement shown after an entry is saved. */
export function entryFeedback(
  entry: Pick<HealthEntryRow, "exerciseMinutes" | "sleepHours" | "mood">,
): string[] {
  const feedback: string[] = [];
  if (entry.exerciseMinutes != null && entry.exerciseMinutes >= 30) {
    feedback.push("🏃‍♂️ Great job on getting 30+ minutes of exercise!");
  }
  if (entry.sleepHours != null && entry.sleepHours >= 7) {
    feedback.push("😴 Excellent sleep duration!");
  }
  if (entry.mood === "good" || entry.mood === "excellent") {
    feedback.push("😊 It's great that you're feeling positive!");
  }
  return feedback;
}

/** Averages ignore missing and zero readings. */
export function summarize(rows: HealthEntryRow[]): HealthSummary {
  const avg = (key: MetricKey) => {
    const m = mean(valuesOf(rows, key).filter((v) => v !== 0));
    return m == null ? null : round(m);
  };
  return {
    totalEntries: rows.length,
    averages: {
      weightKg: avg("weightKg"),
      systolic: avg("systolic"),
      diastolic: avg("diastolic"),
      heartRate: avg("heartRate"),
      sleepHours: avg("sleepHours"),
      exerciseMinutes: avg("exerciseMinutes"),
    },
    dateRange: rows.length
      ? { start: rows[0].date, end: rows[rows.length - 1].date }
      : null,
  };
}

@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(
    private entries: HealthEntriesRepository,
    private insights: InsightsRepository,
  ) {}

  async save(userId: string, dto: HealthEntryDto): Promise<SaveEntryResponse> {
    const { date, ...fields } = dto;
    this.assertNotFuture(date);

    const { entry, created } = await this.entries.upsert(userId, date, fields);
    await this.markInsightsStale(userId);
    this.logger.log(`${created ? "Created" : "Updated"} entry ${date} for user ${userId}`);

    return {
      entry: toEntryResponse(entry),
      created,
      feedback: entryFeedback(entry),
    };
  }

  async findAll(
    userId: string,
    query: MetricsQueryDto,
  ): Promise<HealthEntryResponse[]> {
    let from = query.from;
    const to = query.to;
    if (!from && !to) {
      from = addDays(todayIso(), -(query.days ?? DEFAULT_WINDOW_DAYS));
    }
    const rows = await this.entries.findInRange(userId, from, to);
    return rows.map(toEntryResponse);
  }

  async findLatest(userId: string) {
    const row = await this.entries.findLatest(userId);
    return { entry: row ? toEntryResponse(row) : null };
  }

  async findOne(userId: string, date: string): Promise<HealthEntryResponse> {
    const row = await this.entries.findByDate(userId, date);
    if (!row) throw new NotFoundException("Entry not found");
    return toEntryResponse(row);
  }

  async update(
    userId: string,
    date: string,
    dto: UpdateHealthEntryDto,
  ): Promise<HealthEntryResponse> {
    const row = await this.entries.update(userId, date, dto);
    if (!row) throw new NotFoundException("Entry not found");
    await this.markInsightsStale(userId);
    return toEntryResponse(row);
  }

  async remove(userId: string, date: string) {
    const deleted = await this.entries.delete(userId, date);
    if (!deleted) throw new NotFoundException("Entry not found");
    await this.markInsightsStale(userId);
    return { deleted: true };
  }

  async summary(userId: string): Promise<HealthSummary> {
    return summarize(await this.entries.findInRange(userId));
  }

  private assertNotFuture(date: string) {
    if (date > todayIso()) {
      throw new BadRequestException("Entry date cannot be in the future");
    }
  }

  private async markInsightsStale(userId: string) {
    const count = await this.insights.markStale(userId);
    if (count > 0) {
      this.logger.debug(`Marked ${count} insights stale for user ${userId}`);
    }
  }
}
