import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Header,
  HttpCode,
  HttpException,
  InternalServerErrorException,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  ServiceUnavailableException,
  UseGuards,
} from "@nestjs/common";
import { Throttle, ThrottlerGuard } from "@nestjs/throttler";
import {
  insightHistoryQueryDto,
  insightRequestDto,
  latestInsightQueryDto,
} from "@vitalog/shared";
import type {
  InsightHistoryQueryDto,
  InsightRequestDto,
  LatestInsightQueryDto,
} from "@vitalog/shared";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { InsightsService } from "./insights.service";
import { AiNotConfiguredError, AiResponseError, NoDataError } from "./insights.errors";

@Controller("insights")
@UseGuards(JwtAuthGuard)
export class InsightsController {
  private readonly logger = new Logger(InsightsController.name);

  constructor(private insights: InsightsService) {}

  @Post("assessment")
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 10, ttl: 60_000 } })
  assessment(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(insightRequestDto)) body: InsightRequestDto,
  ) {
    return this.generate(userId, "Assessment", () =>
      this.insights.generateAssessment(userId, body),
    );
  }

  @Post("trends")
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 10, ttl: 60_000 } })
  trends(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(insightRequestDto)) body: InsightRequestDto,
  ) {
    return this.generate(userId, "Trend analysis", () =>
      this.insights.analyzeTrends(userId, body),
    );
  }

  @Post("goal-suggestions")
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  @Throttle({ default: { limit: 10, ttl: 60_000 } })
  goalSuggestions(
    @CurrentUser("id") userId: string,
    @Body(new ZodPipe(insightRequestDto)) body: InsightRequestDto,
  ) {
    return this.generate(userId, "Goal suggestions", () =>
      this.insights.suggestGoals(userId, body),
    );
  }

  @Get("latest")
  async getLatest(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(latestInsightQueryDto)) query: LatestInsightQueryDto,
  ) {
    return { insight: await this.insights.latest(userId, query.type) };
  }

  @Get("history")
  getHistory(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(insightHistoryQueryDto)) query: InsightHistoryQueryDto,
  ) {
    return this.insights.history(userId, query);
  }

  @Get(":id/report")
  @Header("Content-Type", "text/markdown; charset=utf-8")
  @Header("Content-Disposition", 'attachment; filename="health-insights-report.md"')
  getReport(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
  ) {
    return this.insights.report(userId, id);
  }

  @Get(":id")
  getById(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
  ) {
    return this.insights.findOne(userId, id);
  }

  @Delete(":id")
  remove(
    @CurrentUser("id") userId: string,
    @Param("id", ParseUUIDPipe) id: string,
  ) {
    return this.insights.remove(userId, id);
  }

  private async generate<T>(
    userId: string,
    label: string,
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof NoDataError) {
        throw new BadRequestException({ error: "NO_DATA", message: err.message });
      }
      if (err instanceof AiNotConfiguredError) {
        throw new ServiceUnavailableException({
          error: "AI_NOT_CONFIGURED",
          message: err.message,
        });
      }
      if (err instanceof AiResponseError) {
        this.logger.warn(`${label} for user ${userId}: ${err.message}`);
        throw new BadGatewayException({
          error: "AI_BAD_RESPONSE",
          message: "The AI service returned an unusable response. Please try again.",
        });
      }
      if (err instanceof HttpException) throw err;
      this.logger.error(
        `${label} failed for user ${userId}`,
        err instanceof Error ? err.stack : String(err),
      );
      throw new InternalServerErrorException({
        error: "INSIGHTS_FAILED",
        message: "Failed to generate insights. Please try again later.",
      });
    }
  }
}
