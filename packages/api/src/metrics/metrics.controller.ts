import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  UseGuards,
} from "@nestjs/common";
import { MetricsService } from "./metrics.service";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import {
  healthEntryDto,
  isoDate,
  metricsQueryDto,
  updateHealthEntryDto,
} from "@vitalog/shared";
import type {
  HealthEntryDto,
  MetricsQueryDto,
  UpdateHealthEntryDto,
} from "@vitalog/shared";

@Controller("metrics")
@UseGuards(JwtAuthGuard)
export class MetricsController {
  constructor(private metrics: MetricsService) {}

  @Post()
  save(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(healthEntryDto)) body: HealthEntryDto,
  ) {
    return this.metrics.save(userId, body);
  }

  @Get()
  findAll(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(metricsQueryDto)) query: MetricsQueryDto,
  ) {
    return this.metrics.findAll(userId, query);
  }

  @Get("latest")
  findLatest(@CurrentUser("id") userId: string) {
    return this.metrics.findLatest(userId);
  }

  @Get("summary")
  summary(@CurrentUser("id") userId: string) {
    return this.metrics.summary(userId);
  }

  @Get(":date")
  findOne(
    @CurrentUser("id") userId: string,
    @Param("date", new ZodPipe(isoDate)) date: string,
  ) {
    return this.metrics.findOne(userId, date);
  }

  @Patch(":date")
  update(
    @CurrentUser("id") userId: string,
    @Param("date", new ZodPipe(isoDate)) date: string,
    @Body(new ZodPipe(updateHealthEntryDto)) body: UpdateHealthEntryDto,
  ) {
    return this.metrics.update(userId, date, body);
  }

  @Delete(":date")
  remove(
    @CurrentUser("id") userId: string,
    @Param("date", new ZodPipe(isoDate)) date: string,
  ) {
    return this.metrics.remove(userId, date);
  }
}
