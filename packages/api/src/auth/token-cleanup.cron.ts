import { Injectable, Logger } from "@nestjs/common";
import { Cron } from "@nestjs/schedule";
import { RefreshTokenRepository } from "../database/repositories/refresh-token.repository";

@Injectable()
export class TokenCleanupCron {
  private readonly logger = new Logger(TokenCleanupCron.name);

  constructor(private refreshTokens: RefreshTokenRepository) {}

  @Cron("0 3 * * *")
  async purgeExpiredTokens() {
    const count = await this.refreshTokens.deleteExpired(new Date());
    if (count > 0) {
      this.logger.log(`Purged ${count} expired refresh tokens`);
    }
  }
}
