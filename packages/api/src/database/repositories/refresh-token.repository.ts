import { Injectable } from "@nestjs/common";
import { eq, lt } from "drizzle-orm";
import { DatabaseService } from "../database.service";
import { refreshTokens } from "../schema";
import type { RefreshTokenRow } from "../schema";

@Injectable()
export class RefreshTokenRepository {
  constructor(private database: DatabaseService) {}

  async create(data: {
    token: string;
    userId: string;
    expiresAt: Date;
  }): Promise<void> {
    await this.database.db.insert(refreshTokens).values(data);
  }

  async findByToken(token: string): Promise<RefreshTokenRow | null> {
    const [row] = await this.database.db
      .select()
      .from(refreshTokens)
      .where(eq(refreshTokens.token, token))
      .limit(1);
    return row ?? null;
  }

  async deleteById(id: string): Promise<number> {
    const rows = await this.database.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.id, id))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }

  async deleteByToken(token: string): Promise<number> {
    const rows = await this.database.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.token, token))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }

  async deleteForUser(userId: string): Promise<number> {
    const rows = await this.database.db
      .delete(refreshTokens)
      .where(eq(refreshTokens.userId, userId))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }

  async deleteExpired(now: Date): Promise<number> {
    const rows = await this.database.db
      .delete(refreshTokens)
      .where(lt(refreshTokens.expiresAt, now))
      .returning({ id: refreshTokens.id });
    return rows.length;
  }
}
