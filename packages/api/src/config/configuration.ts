import * as path from "path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

export const APP_CONFIG = Symbol("APP_CONFIG");

const OPENAI_KEY_PLACEHOLDER = "your-openai-api-key-here";

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().min(1, "is required"),
  DB_AUTO_MIGRATE: flag,
  JWT_SECRET: z.string().min(16, "must be at least 16 characters"),
  JWT_EXPIRES_IN: z.string().default("15m"),
  REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().min(1).max(365).default(7),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o"),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120_000),
  CORS_ORIGIN: z.string().optional(),
});

export interface AppConfig {
  env: "development" | "production" | "test";
  port: number;
  database: { url: string; autoMigrate: boolean };
  auth: { jwtSecret: string; jwtExpiresIn: string; refreshTokenTtlDays: number };
  openai: {
    apiKey: string | null;
    baseUrl: string | null;
    model: string;
    timeoutMs: number;
  };
  corsOrigins: string[];
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  ${problems.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`),
    );
  }
  const e = result.data;
  const apiKey = e.OPENAI_API_KEY?.trim();

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    database: { url: e.DATABASE_URL, autoMigrate: e.DB_AUTO_MIGRATE },
    auth: {
      jwtSecret: e.JWT_SECRET,
      jwtExpiresIn: e.JWT_EXPIRES_IN,
      refreshTokenTtlDays: e.REFRESH_TOKEN_TTL_DAYS,
    },
    openai: {
      apiKey: apiKey && apiKey !== OPENAI_KEY_PLACEHOLDER ? apiKey : null,
      baseUrl: e.OPENAI_BASE_URL ?? null,
      model: e.OPENAI_MODEL,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
    },
    corsOrigins: (e.CORS_ORIGIN ?? "")
      .split(",")
      .map((o) => o.trim())
      .filter(Boolean),
  };
}

/** Reads the repository-root .env (if any) and validates process.env. */
export function loadConfig(): AppConfig {
  loadDotenv({ path: path.resolve(__dirname, "../../../../.env") });
  return parseConfig(process.env);
}
