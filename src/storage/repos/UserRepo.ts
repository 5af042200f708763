import { asc, eq, inArray, or } from "drizzle-orm";
import type { LedgerDatabase } from "../db.js";
import { users } from "../schema.js";
import type { User } from "../../types/index.js";
import type { UserLookup } from "../../validation/index.js";

export class UserRepo implements UserLookup {
  private db: LedgerDatabase;

  constructor(db: LedgerDatabase) {
    this.db = db;
  }

  async create(user: Omit<User, "id">): Promise<User> {
    return this.db
      .insert(users)
      .values({ username: user.username, email: user.email })
      .returning()
      .get();
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.db.select().from(users).where(eq(users.id, id)).get();
    return result ?? null;
  }

  /** Exact match on either field; no case folding. */
  async findByUsernameOrEmail(username: string, email: string): Promise<User | null> {
    const result = await this.db
      .select()
      .from(users)
      .where(or(eq(users.username, username), eq(users.email, email)))
      .get();

    return result ?? null;
  }

  async findAll(): Promise<User[]> {
    return this.db.select().from(users).orderBy(asc(users.id));
  }

  async findExistingIds(ids: number[]): Promise<Set<number>> {
    if (ids.length === 0) {
      return new Set();
    }

    const rows = await this.db
      .select({ id: users.id })
      .from(users)
      .where(inArray(users.id, ids));

    return new Set(rows.map((row) => row.id));
  }
}
