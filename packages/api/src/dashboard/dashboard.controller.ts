import { Controller, Get, Query, UseGuards } from "@nestjs/common";
import { dashboardQueryDto } from "@vitalog/shared";
import type { DashboardQueryDto } from "@vitalog/shared";
import { JwtAuthGuard } from "../auth/jwt-auth.guard";
import { CurrentUser } from "../common/user.decorator";
import { ZodPipe } from "../common/zod.pipe";
import { DashboardService } from "./dashboard.service";
import { TipsService } from "./tips.service";

@Controller("dashboard")
@UseGuards(JwtAuthGuard)
export class DashboardController {
  constructor(
    private dashboard: DashboardService,
    private tips: TipsService,
  ) {}

  @Get()
  overview(
    @CurrentUser("id") userId: string,
    @Query(new ZodPipe(dashboardQueryDto)) query: DashboardQueryDto,
  ) {
    return this.dashboard.overview(userId, query.days);
  }

  @Get("tips")
  async getTips(@CurrentUser("id") userId: string) {
    return { tips: await this.tips.getTips(userId) };
  }
}
