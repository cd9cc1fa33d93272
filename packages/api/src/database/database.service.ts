import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from "@nestjs/common";
import { readFile } from "fs/promises";
import * as path from "path";
import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import { APP_CONFIG } from "../config/configuration";
import type { AppConfig } from "../config/configuration";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

export const SCHEMA_SQL_PATH = path.join(__dirname, "schema.sql");

export async function applySchema(pool: Pool): Promise<void> {
  const sql = await readFile(SCHEMA_SQL_PATH, "utf8");
  await pool.query(sql);
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool;
  readonly db: Database;

  constructor(@Inject(APP_CONFIG) private config: AppConfig) {
    this.pool = new Pool({ connectionString: config.database.url });
    this.pool.on("error", (err) =>
      this.logger.error("Idle PostgreSQL client error", err),
    );
    this.db = drizzle(this.pool, { schema });
  }

  async onModuleInit() {
    if (!this.config.database.autoMigrate) return;
    await applySchema(this.pool);
    this.logger.log("Database schema is up to date");
  }

  async onModuleDestroy() {
    await this.pool.end();
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query("SELECT 1");
      return true;
    } catch (err) {
      this.logger.warn(`Database ping failed: ${String(err)}`);
      return false;
    }
  }
}
