import { Global, Module } from "@nestjs/common";
import { DatabaseService } from "./database.service";
import { UsersRepository } from "./repositories/users.repository";
import { RefreshTokenRepository } from "./repositories/refresh-token.repository";
import { HealthEntriesRepository } from "./repositories/health-entries.repository";
import { GoalsRepository } from "./repositories/goals.repository";
import { InsightsRepository } from "./repositories/insights.repository";

const repositories = [
  UsersRepository,
  RefreshTokenRepository,
  HealthEntriesRepository,
  GoalsRepository,
  InsightsRepository,
];

@Global()
@Module({
  providers: [DatabaseService, ...repositories],
  exports: [DatabaseService, ...repositories],
})
export class DatabaseModule {}
