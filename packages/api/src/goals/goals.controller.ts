import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  ParseUUIDPipe,
  UseGuards,
} from "@nestjs/common";
import { GoalsService } from "./goals.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  createGoalDto,
  extendGoalDto,
  goalQueryDto,
  updateGoalProgressDto,
  updateGoalStatusDto,
} from "@vitalog/shared";
import type {
  CreateGoalDto,
  ExtendGoalDto,
  GoalQueryDto,
  UpdateGoalProgressDto,
  UpdateGoalStatusDto,
} from "@vitalog/shared";

@Controller("goals")
@UseGuards(JwtAuthGuard)
export class GoalsController {
  constructor(private goals: GoalsService) {}

  @Post()
  create(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(createGoalDto)) body: CreateGoalDto,
  ) {
    return this.goals.create(userId, body);
  }

  @Get()
  findAll(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(goalQueryDto)) query: GoalQueryDto,
  ) {
    return this.goals.findAll(userId, query.status);
  }

  @Get("stats")
  stats(@CurrentUser("id") userId: string) {
    return this.goals.stats(userId);
  }

  @Get(":id")
  findOne(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
  ) {
    return this.goals.findOne(userId, id);
  }

  @Patch(":id/progress")
  updateProgress(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
    @Body(new ZodPipe(updateGoalProgressDto)) body: UpdateGoalProgressDto,
  ) {
    return this.goals.updateProgress(userId, id, body.currentValue);
  }

  @Post(":id/complete")
  @HttpCode(200)
  complete(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
  ) {
    return this.goals.complete(userId, id);
  }

  @Patch(":id/status")
  setStatus(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
    @Body(new ZodPipe(updateGoalStatusDto)) body: UpdateGoalStatusDto,
  ) {
    return this.goals.setStatus(userId, id, body.status);
  }

  @Patch(":id/deadline")
  extendDeadline(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
    @Body(new ZodPipe(extendGoalDto)) body: ExtendGoalDto,
  ) {
    return this.goals.extendDeadline(userId, id, body.targetDate);
  }

  @Delete(":id")
  remove(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
  ) {
    return this.goals.remove(userId, id);
  }
}
