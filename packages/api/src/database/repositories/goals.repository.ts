import { Injectable } from "@nestjs/common";
import { and, count, desc, eq } from "drizzle-orm";
import type { GoalStatus } from "@vitalog/shared";
import { DatabaseService } from "../database.service";
import { goals } from "../schema";
import type { GoalRow, NewGoalRow } from "../schema";

export type GoalPatch = Partial<
  Pick<
    GoalRow,
    "currentValue" | "status" | "targetDate" | "completedAt" | "description"
  >
>;

@Injectable()
export class GoalsRepository {
  constructor(private database: DatabaseService) {}

  async create(data: NewGoalRow): Promise<GoalRow> {
    const [row] = await this.database.db.insert(goals).values(data).returning();
    return row;
  }

  /** Newest first. */
  findAll(userId: string, status?: GoalStatus): Promise<GoalRow[]> {
    return this.database.db
      .select()
      .from(goals)
      .where(
        and(
          eq(goals.userId, userId),
          status ? eq(goals.status, status) : undefined,
        ),
      )
      .orderBy(desc(goals.createdAt));
  }

  async findById(userId: string, id: string): Promise<GoalRow | null> {
    const [row] = await this.database.db
      .select()
      .from(goals)
      .where(and(eq(goals.id, id), eq(goals.userId, userId)))
      .limit(1);
    return row ?? null;
  }

  async update(
    userId: string,
    id: string,
    patch: GoalPatch,
  ): Promise<GoalRow | null> {
    const [row] = await this.database.db
      .update(goals)
      .set({ ...patch, updatedAt: new Date() })
      .where(and(eq(goals.id, id), eq(goals.userId, userId)))
      .returning();
    return row ?? null;
  }

  async delete(userId: string, id: string): Promise<boolean> {
    const rows = await this.database.db
      .delete(goals)
      .where(and(eq(goals.id, id), eq(goals.userId, userId)))
      .returning({ id: goals.id });
    return rows.length > 0;
  }

  async count(userId: string): Promise<number> {
    const [row] = await this.database.db
      .select({ value: count() })
      .from(goals)
      .where(eq(goals.userId, userId));
    return row?.value ?? 0;
  }
}
