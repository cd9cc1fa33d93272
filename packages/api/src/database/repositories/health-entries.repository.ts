import { Injectable } from "@nestjs/common";
import { and, asc, count, desc, eq, gte, lte, sql, getTableColumns } from "drizzle-orm";
import { DatabaseService } from "../database.service";
import { healthEntries } from "../schema";
import type { HealthEntryRow, NewHealthEntryRow } from "../schema";

/** Writable measurement columns; `undefined` leaves a stored value untouched. */
export type EntryFields = Partial<
  Pick<
    NewHealthEntryRow,
    | "weightKg"
    | "systolic"
    | "diastolic"
    | "heartRate"
    | "sleepHours"
    | "exerciseMinutes"
    | "mood"
    | "symptoms"
    | "notes"
  >
>;

@Injectable()
export class HealthEntriesRepository {
  constructor(private database: DatabaseService) {}

  /**
   * Inserts the entry for (user, date) or overwrites the provided fields of
   * the existing one. `created` is true when a new row was inserted.
   */
  async upsert(
    userId: string,
    date: string,
    fields: EntryFields,
  ): Promise<{ entry: HealthEntryRow; created: boolean }> {
    const [row] = await this.database.db
      .insert(healthEntries)
      .values({ ...fields, userId, date })
      .onConflictDoUpdate({
        target: [healthEntries.userId, healthEntries.date],
        set: { ...fields, updatedAt: new Date() },
      })
      .returning({
        ...getTableColumns(healthEntries),
        inserted: sql<boolean>`(xmax = 0)`,
      });
    const { inserted, ...entry } = row;
    return { entry, created: inserted };
  }

  /** Entries between `from` and `to` (inclusive, either optional), oldest first. */
  findInRange(
    userId: string,
    from?: string,
    to?: string,
  ): Promise<HealthEntryRow[]> {
    return this.database.db
      .select()
      .from(healthEntries)
      .where(
        and(
          eq(healthEntries.userId, userId),
          from ? gte(healthEntries.date, from) : undefined,
          to ? lte(healthEntries.date, to) : undefined,
        ),
      )
      .orderBy(asc(healthEntries.date));
  }

  async findLatest(userId: string): Promise<HealthEntryRow | null> {
    const [row] = await this.database.db
      .select()
      .from(healthEntries)
      .where(eq(healthEntries.userId, userId))
      .orderBy(desc(healthEntries.date))
      .limit(1);
    return row ?? null;
  }

  async findByDate(userId: string, date: string): Promise<HealthEntryRow | null> {
    const [row] = await this.database.db
      .select()
      .from(healthEntries)
      .where(and(eq(healthEntries.userId, userId), eq(healthEntries.date, date)))
      .limit(1);
    return row ?? null;
  }

  async update(
    userId: string,
    date: string,
    fields: EntryFields,
  ): Promise<HealthEntryRow | null> {
    const [row] = await this.database.db
      .update(healthEntries)
      .set({ ...fields, updatedAt: new Date() })
      .where(and(eq(healthEntries.userId, userId), eq(healthEntries.date, date)))
      .returning();
    return row ?? null;
  }

  async delete(userId: string, date: string): Promise<boolean> {
    const rows = await this.database.db
      .delete(healthEntries)
      .where(and(eq(healthEntries.userId, userId), eq(healthEntries.date, date)))
      .returning({ id: healthEntries.id });
    return rows.length > 0;
  }

  async count(userId: string): Promise<number> {
    const [row] = await this.database.db
      .select({ value: count() })
      .from(healthEntries)
      .where(eq(healthEntries.userId, userId));
    return row?.value ?? 0;
  }
}
