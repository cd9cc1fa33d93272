import { Module } from "@nestjs/common";
import { DashboardController } from "./dashboard.controller";
import { DashboardService } from "./dashboard.service";
import { TipsService } from "./tips.service";

@Module({
  controllers: [DashboardController],
  providers: [DashboardService, TipsService],
})
export class DashboardModule {}
