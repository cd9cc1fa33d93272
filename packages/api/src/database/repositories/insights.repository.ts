import { Injectable } from "@nestjs/common";
import { and, count, desc, eq, gte } from "drizzle-orm";
import type { InsightType } from "@vitalog/shared";
import { DatabaseService } from "../database.service";
import { healthInsights } from "../schema";
import type { HealthInsightRow } from "../schema";

export interface NewInsight {
  userId: string;
  type: InsightType;
  content: unknown;
  summary: string;
  periodStart: string;
  periodEnd: string;
  entryCount: number;
}

@Injectable()
export class InsightsRepository {
  constructor(private database: DatabaseService) {}

  async create(data: NewInsight): Promise<HealthInsightRow> {
    const [row] = await this.database.db
      .insert(healthInsights)
      .values(data)
      .returning();
    return row;
  }

  /** Most recent non-stale result for exactly this period, if any. */
  async findFresh(
    userId: string,
    type: InsightType,
    periodStart: string,
    periodEnd: string,
  ): Promise<HealthInsightRow | null> {
    const [row] = await this.database.db
      .select()
      .from(healthInsights)
      .where(
        and(
          eq(healthInsights.userId, userId),
          eq(healthInsights.type, type),
          eq(healthInsights.periodStart, periodStart),
          eq(healthInsights.periodEnd, periodEnd),
          eq(healthInsights.stale, false),
        ),
      )
      .orderBy(desc(healthInsights.createdAt))
      .limit(1);
    return row ?? null;
  }

  async findLatest(
    userId: string,
    type: InsightType,
  ): Promise<HealthInsightRow | null> {
    const [row] = await this.database.db
      .select()
      .from(healthInsights)
      .where(
        and(eq(healthInsights.userId, userId), eq(healthInsights.type, type)),
      )
      .orderBy(desc(healthInsights.createdAt))
      .limit(1);
    return row ?? null;
  }

  async findById(userId: string, id: string): Promise<HealthInsightRow | null> {
    const [row] = await this.database.db
      .select()
      .from(healthInsights)
      .where(and(eq(healthInsights.id, id), eq(healthInsights.userId, userId)))
      .limit(1);
    return row ?? null;
  }

  /** Newest first. */
  findSince(
    userId: string,
    since: Date,
    type?: InsightType,
  ): Promise<HealthInsightRow[]> {
    return this.database.db
      .select()
      .from(healthInsights)
      .where(
        and(
          eq(healthInsights.userId, userId),
          gte(healthInsights.createdAt, since),
          type ? eq(healthInsights.type, type) : undefined,
        ),
      )
      .orderBy(desc(healthInsights.createdAt));
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const rows = await this.database.db
      .delete(healthInsights)
      .where(and(eq(healthInsights.id, id), eq(healthInsights.userId, userId)))
      .returning({ id: healthInsights.id });
    return rows.length > 0;
  }

  /** Marks every cached result stale; stale rows stay readable as history. */
  async markStale(userId: string): Promise<number> {
    const rows = await this.database.db
      .update(healthInsights)
      .set({ stale: true })
      .where(
        and(eq(healthInsights.userId, userId), eq(healthInsights.stale, false)),
      )
      .returning({ id: healthInsights.id });
    return rows.length;
  }

  async count(userId: string): Promise<number> {
    const [row] = await this.database.db
      .select({ value: count() })
      .from(healthInsights)
      .where(eq(healthInsights.userId, userId));
    return row?.value ?? 0;
  }
}
