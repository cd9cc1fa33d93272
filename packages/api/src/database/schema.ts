import {
  pgTable,
  uuid,
  text,
  integer,
  doublePrecision,
  boolean,
  date,
  timestamp,
  jsonb,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import type {
  GoalStatus,
  GoalType,
  InsightType,
  Mood,
} from "@vitalog/shared";

const createdAt = () =>
  timestamp("created_at", { withTimezone: true }).defaultNow().notNull();
const updatedAt = () =>
  timestamp("updated_at", { withTimezone: true }).defaultNow().notNull();

export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  email: text("email").notNull().unique(),
  passwordHash: text("password_hash").notNull(),
  name: text("name"),
  heightCm: doublePrecision("height_cm"),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const refreshTokens = pgTable(
  "refresh_tokens",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    token: text("token").notNull().unique(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
    createdAt: createdAt(),
  },
  (t) => ({
    userIdx: index("refresh_tokens_user_idx").on(t.userId),
  }),
);

export const healthEntries = pgTable(
  "health_entries",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    date: date("date", { mode: "string" }).notNull(),
    weightKg: doublePrecision("weight_kg"),
    systolic: integer("systolic"),
    diastolic: integer("diastolic"),
    heartRate: integer("heart_rate"),
    sleepHours: doublePrecision("sleep_hours"),
    exerciseMinutes: integer("exercise_minutes"),
    mood: text("mood").$type<Mood>(),
    symptoms: text("symptoms"),
    notes: text("notes"),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (t) => ({
    userDate: uniqueIndex("health_entries_user_date_idx").on(t.userId, t.date),
  }),
);

export const goals = pgTable(
  "goals",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    type: text("type").$type<GoalType>().notNull(),
    description: text("description").notNull(),
    targetValue: doublePrecision("target_value").notNull(),
    currentValue: doublePrecision("current_value").notNull().default(0),
    targetDate: date("target_date", { mode: "string" }).notNull(),
    status: text("status").$type<GoalStatus>().notNull().default("active"),
    createdDate: date("created_date", { mode: "string" }).notNull(),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    createdAt: createdAt(),
    updatedAt: updatedAt(),
  },
  (t) => ({
    userStatusIdx: index("goals_user_status_idx").on(t.userId, t.status),
  }),
);

export const healthInsights = pgTable(
  "health_insights",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: uuid("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    type: text("type").$type<InsightType>().notNull(),
    content: jsonb("content").$type<unknown>().notNull(),
    summary: text("summary").notNull(),
    periodStart: date("period_start", { mode: "string" }).notNull(),
    periodEnd: date("period_end", { mode: "string" }).notNull(),
    entryCount: integer("entry_count").notNull(),
    stale: boolean("stale").notNull().default(false),
    createdAt: createdAt(),
  },
  (t) => ({
    userCreatedIdx: index("health_insights_user_created_idx").on(
      t.userId,
      t.createdAt,
    ),
  }),
);

export type UserRow = typeof users.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
export type HealthEntryRow = typeof healthEntries.$inferSelect;
export type NewHealthEntryRow = typeof healthEntries.$inferInsert;
export type GoalRow = typeof goals.$inferSelect;
export type NewGoalRow = typeof goals.$inferInsert;
export type HealthInsightRow = typeof healthInsights.$inferSelect;
