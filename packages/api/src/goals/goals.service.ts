import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from "@nestjs/common";
import { goalProgress, todayIso } from "@vitalog/shared";
import type {
  CreateGoalDto,
  GoalResponse,
  GoalStats,
  GoalStatus,
  GoalType,
} from "@vitalog/shared";
import { GoalsRepository } from "../database/repositories/goals.repository";
import type { GoalPatch } from "../database/repositories/goals.repository";
import type { GoalRow } from "../database/schema";

export function toGoalResponse(row: GoalRow, today: string): GoalResponse {
  return {
    id: row.id,
    type: row.type,
    description: row.description,
    targetValue: row.targetValue,
    currentValue: row.currentValue,
    targetDate: row.targetDate,
    status: row.status,
    createdDate: row.createdDate,
    completedAt: row.completedAt ? row.completedAt.toISOString() : null,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
    progress: goalProgress(row, today),
  };
}

/** Most frequent type among `rows`; ties go to the type seen first. */
export function mostCommonType(rows: GoalRow[]): GoalType | null {
  const counts = new Map<GoalType, number>();
  for (const row of rows) {
    counts.set(row.type, (counts.get(row.type) ?? 0) + 1);
  }
  let best: GoalType | null = null;
  let bestCount = 0;
  for (const [type, n] of counts) {
    if (n > bestCount) {
      best = type;
      bestCount = n;
    }
  }
  return best;
}

@Injectable()
export class GoalsService {
  private readonly logger = new Logger(GoalsService.name);

  constructor(private goals: GoalsRepository) {}

  async create(userId: string, dto: CreateGoalDto): Promise<GoalResponse> {
    const today = todayIso();
    this.assertNotPast(dto.targetDate, today);

    const row = await this.goals.create({
      userId,
      type: dto.type,
      description: dto.description,
      targetValue: dto.targetValue,
      currentValue: dto.currentValue,
      targetDate: dto.targetDate,
      status: "active",
      createdDate: today,
    });
    this.logger.log(`Created ${dto.type} goal ${row.id} for user ${userId}`);
    return toGoalResponse(row, today);
  }

  async findAll(userId: string, status?: GoalStatus): Promise<GoalResponse[]> {
    const today = todayIso();
    const rows = await this.goals.findAll(userId, status);
    return rows.map((row) => toGoalResponse(row, today));
  }

  async findOne(userId: string, id: string): Promise<GoalResponse> {
    return toGoalResponse(await this.getOwned(userId, id), todayIso());
  }

  async stats(userId: string): Promise<GoalStats> {
    const rows = await this.goals.findAll(userId);
    const completed = rows.filter((g) => g.status === "completed");
    return {
      total: rows.length,
      active: rows.filter((g) => g.status === "active").length,
      paused: rows.filter((g) => g.status === "paused").length,
      completed: completed.length,
      mostCommonCompletedType: mostCommonType(completed),
    };
  }

  /** Reaching the target completes the goal. */
  async updateProgress(
    userId: string,
    id: string,
    currentValue: number,
  ): Promise<GoalResponse> {
    const goal = await this.getOwned(userId, id);
    const patch: GoalPatch = { currentValue };
    if (currentValue >= goal.targetValue && goal.status !== "completed") {
      patch.status = "completed";
      patch.completedAt = new Date();
      this.logger.log(`Goal ${id} reached its target of ${goal.targetValue}`);
    }

    const row = await this.save(userId, id, patch);
    return toGoalResponse(row, todayIso());
  }

  async complete(userId: string, id: string): Promise<GoalResponse> {
    const goal = await this.getOwned(userId, id);
    if (goal.status === "completed") {
      return toGoalResponse(goal, todayIso());
    }
    return this.updateProgress(userId, id, goal.targetValue);
  }

  async setStatus(
    userId: string,
    id: string,
    status: Exclude<GoalStatus, "completed">,
  ): Promise<GoalResponse> {
    const goal = await this.getOwned(userId, id);
    if (goal.status === "completed") {
      throw new BadRequestException("Completed goals cannot be paused or resumed");
    }
    const row = await this.save(userId, id, { status });
    return toGoalResponse(row, todayIso());
  }

  async extendDeadline(
    userId: string,
    id: string,
    targetDate: string,
  ): Promise<GoalResponse> {
    const today = todayIso();
    this.assertNotPast(targetDate, today);
    await this.getOwned(userId, id);
    const row = await this.save(userId, id, { targetDate });
    return toGoalResponse(row, today);
  }

  async remove(userId: string, id: string) {
    const deleted = await this.goals.delete(userId, id);
    if (!deleted) throw new NotFoundException("Goal not found");
    return { deleted: true };
  }

  private async getOwned(userId: string, id: string): Promise<GoalRow> {
    const goal = await this.goals.findById(userId, id);
    if (!goal) throw new NotFoundException("Goal not found");
    return goal;
  }

  private async save(
    userId: string,
    id: string,
    patch: GoalPatch,
  ): Promise<GoalRow> {
    const row = await this.goals.update(userId, id, patch);
    if (!row) throw new NotFoundException("Goal not found");
    return row;
  }

  private assertNotPast(targetDate: string, today: string) {
    if (targetDate < today) {
      throw new BadRequestException("Target date cannot be in the past");
    }
  }
}
