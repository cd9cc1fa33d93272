import { Module } from "@nestjs/common";
import { ScheduleModule } from "@nestjs/schedule";
import { ThrottlerModule } from "@nestjs/throttler";
import { APP_INTERCEPTOR } from "@nestjs/core";
import { ConfigModule } from "./config/config.module";
import { DatabaseModule } from "./database/database.module";
import { AuthModule } from "./auth/auth.module";
import { UsersModule } from "./users/users.module";
import { MetricsModule } from "./metrics/metrics.module";
import { GoalsModule } from "./goals/goals.module";
import { DashboardModule } from "./dashboard/dashboard.module";
import { InsightsModule } from "./insights/insights.module";
import { DataModule } from "./data/data.module";
import { RequestLoggingInterceptor } from "./common/request-logging.interceptor";

@Module({
  imports: [
    ConfigModule,
    ScheduleModule.forRoot(),
    ThrottlerModule.forRoot([{ ttl: 60_000, limit: 60 }]),
    DatabaseModule,
    AuthModule,
    UsersModule,
    MetricsModule,
    GoalsModule,
    DashboardModule,
    InsightsModule,
    DataModule,
  ],
  providers: [
    {
      provide: APP_INTERCEPTOR,
      useClass: RequestLoggingInterceptor,
    },
  ],
})
export class AppModule {}
