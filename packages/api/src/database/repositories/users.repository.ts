import { Injectable } from "@nestjs/common";
import { eq } from "drizzle-orm";
import { DatabaseService } from "../database.service";
import { users } from "../schema";
import type { UserRow } from "../schema";

export type UserPatch = Partial<
  Pick<UserRow, "name" | "heightCm" | "passwordHash">
>;

@Injectable()
export class UsersRepository {
  constructor(private database: DatabaseService) {}

  async findById(id: string): Promise<UserRow | null> {
    const [row] = await this.database.db
      .select()
      .from(users)
      .where(eq(users.id, id))
      .limit(1);
    return row ?? null;
  }

  async findByEmail(email: string): Promise<UserRow | null> {
    const [row] = await this.database.db
      .select()
      .from(users)
      .where(eq(users.email, email.toLowerCase()))
      .limit(1);
    return row ?? null;
  }

  async create(data: {
    email: string;
    passwordHash: string;
    name?: string | null;
  }): Promise<UserRow> {
    const [row] = await this.database.db
      .insert(users)
      .values({ ...data, email: data.email.toLowerCase() })
      .returning();
    return row;
  }

  async update(id: string, patch: UserPatch): Promise<UserRow | null> {
    const [row] = await this.database.db
      .update(users)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(users.id, id))
      .returning();
    return row ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.database.db
      .delete(users)
      .where(eq(users.id, id))
      .returning({ id: users.id });
    return rows.length > 0;
  }
}
